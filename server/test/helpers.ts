import path from "node:path";
import { fileURLToPath } from "node:url";
import type { InvokeInput, InvokeResult, ProcessInvoker } from "../src/tools/invoker.js";

export function sleep(ms: number) {
  return new Promise((r) => setTimeout(r, ms));
}

// Lets queued microtasks (dispatch, completion handlers) run.
export function tick() {
  return sleep(0);
}

export async function waitFor(fn: () => Promise<boolean> | boolean, timeoutMs = 5000) {
  const start = Date.now();
  while (Date.now() - start < timeoutMs) {
    if (await fn()) return;
    await sleep(25);
  }
  throw new Error("timeout waiting for condition");
}

export function fakeClaudePath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.join(here, "fixtures", "fake_claude.mjs");
}

export function fakeTool(env: Record<string, string> = {}, timeoutMs = 10_000) {
  return { command: process.execPath, args: [fakeClaudePath()], timeoutMs, env };
}

type PendingCall = {
  input: InvokeInput;
  resolve: (r: InvokeResult) => void;
  reject: (e: unknown) => void;
};

/** In-process invoker whose calls stay pending until the test settles them. */
export class ManualInvoker implements ProcessInvoker {
  calls: PendingCall[] = [];
  private open = new Set<PendingCall>();

  invoke(input: InvokeInput): Promise<InvokeResult> {
    return new Promise((resolve, reject) => {
      const call: PendingCall = {
        input,
        resolve: (r) => {
          this.open.delete(call);
          resolve(r);
        },
        reject: (e) => {
          this.open.delete(call);
          reject(e);
        },
      };
      this.calls.push(call);
      this.open.add(call);
    });
  }

  inFlight(): PendingCall[] {
    return [...this.open];
  }

  messages(): string[] {
    return this.calls.map((c) => c.input.message);
  }

  succeed(i: number, sessionId: string, text = `ok ${i}`) {
    const call = this.calls[i];
    if (!call) throw new Error(`no call #${i}`);
    call.resolve({ sessionId, text, raw: { session_id: sessionId, result: text } });
  }

  fail(i: number, error: unknown) {
    const call = this.calls[i];
    if (!call) throw new Error(`no call #${i}`);
    call.reject(error);
  }
}
