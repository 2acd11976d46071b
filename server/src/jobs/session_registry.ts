import type { Store } from "../store.js";

/**
 * Per-thread pointer to the tool's conversation session. A missing entry means the next
 * invocation starts a fresh session. Written only after a job succeeds; last write wins.
 */
export interface SessionRegistry {
  get(threadId: string): string | null;
  set(threadId: string, sessionId: string): void;
}

export class StoreSessionRegistry implements SessionRegistry {
  private store: Pick<Store, "getSessionId" | "setSessionId">;

  constructor(store: Pick<Store, "getSessionId" | "setSessionId">) {
    this.store = store;
  }

  get(threadId: string): string | null {
    return this.store.getSessionId(threadId);
  }

  set(threadId: string, sessionId: string): void {
    // A thread deleted mid-job simply has nowhere to record the session.
    this.store.setSessionId(threadId, sessionId);
  }
}

export class MemorySessionRegistry implements SessionRegistry {
  private sessions = new Map<string, string>();

  get(threadId: string): string | null {
    return this.sessions.get(threadId) ?? null;
  }

  set(threadId: string, sessionId: string): void {
    this.sessions.set(threadId, sessionId);
  }
}
