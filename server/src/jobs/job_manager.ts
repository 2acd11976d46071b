import path from "node:path";
import { nanoid } from "nanoid";
import { CapacityExceededError, describeError, type ErrorDetail } from "../errors.js";
import { modeFor, type InvocationMode, type InvokeResult, type ProcessInvoker } from "../tools/invoker.js";
import type { SessionRegistry } from "./session_registry.js";
import {
  isTerminal,
  silentLogger,
  systemClock,
  type Clock,
  type JobStatus,
  type JobView,
  type Logger,
  type SubmitInput,
  type SubmitResult,
} from "./types.js";

export type QueueLimits = {
  // Queued + running jobs allowed for one thread. 0 = unbounded.
  perThread: number;
  // Queued (not yet running) jobs allowed across all threads. 0 = unbounded.
  total: number;
};

export const DEFAULT_LIMITS: QueueLimits = { perThread: 16, total: 256 };

export type JobManagerOptions = {
  invoker: ProcessInvoker;
  sessions: SessionRegistry;
  workers?: number;
  timeoutMs?: number;
  limits?: Partial<QueueLimits>;
  retainTerminal?: number;
  clock?: Clock;
  newId?: () => string;
  logger?: Logger;
};

type JobRecord = {
  id: string;
  seq: number;
  threadId: string;
  cwd: string;
  // Resolved cwd; two running jobs never share one.
  dirKey: string;
  message: string;
  status: JobStatus;
  createdAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  mode: InvocationMode["kind"] | null;
  resumedSessionId: string | null;
  sessionId: string | null;
  result: string | null;
  error: ErrorDetail | null;
  // Frozen once the job is terminal; served as-is from then on.
  final: JobView | null;
};

type Outcome = { ok: true; res: InvokeResult } | { ok: false; error: ErrorDetail };

function snapshot(j: JobRecord): JobView {
  return Object.freeze({
    id: j.id,
    threadId: j.threadId,
    message: j.message,
    status: j.status,
    createdAt: j.createdAt,
    startedAt: j.startedAt,
    finishedAt: j.finishedAt,
    mode: j.mode,
    resumedSessionId: j.resumedSessionId,
    sessionId: j.sessionId,
    result: j.result,
    error: j.error ? Object.freeze({ ...j.error }) : null,
  });
}

/**
 * Accepts messages for many threads and runs them through the invoker on a bounded pool
 * of worker slots. Each thread has its own FIFO queue and at most one running job, and no
 * two running jobs share a working directory, so a thread's directory and session id only
 * ever see one tool process at a time, even when several threads live in one project.
 */
export class JobManager {
  private jobs = new Map<string, JobRecord>();
  private queues = new Map<string, JobRecord[]>();
  private running = new Map<string, JobRecord>(); // threadId -> job
  private busyDirs = new Set<string>();
  private terminalOrder: string[] = [];
  private settledListeners = new Set<(job: JobView) => void>();
  private idleWaiters: Array<() => void> = [];
  private queuedTotal = 0;
  private seq = 0;
  private pumpScheduled = false;
  private closed = false;

  private invoker: ProcessInvoker;
  private sessions: SessionRegistry;
  private workers: number;
  private timeoutMs: number;
  private limits: QueueLimits;
  private retainTerminal: number;
  private clock: Clock;
  private newId: () => string;
  private log: Logger;

  constructor(opts: JobManagerOptions) {
    this.invoker = opts.invoker;
    this.sessions = opts.sessions;
    this.workers = Math.max(1, Math.floor(opts.workers ?? 2));
    this.timeoutMs = Math.max(1, Math.floor(opts.timeoutMs ?? 300_000));
    this.limits = { ...DEFAULT_LIMITS, ...(opts.limits ?? {}) };
    this.retainTerminal = Math.max(0, Math.floor(opts.retainTerminal ?? 1000));
    this.clock = opts.clock ?? systemClock;
    this.newId = opts.newId ?? (() => nanoid(16));
    this.log = opts.logger ?? silentLogger;
  }

  submit(input: SubmitInput): SubmitResult {
    if (this.closed) return { ok: false, error: new CapacityExceededError("closed", 0) };
    const { perThread, total } = this.limits;
    if (perThread > 0 && this.pendingFor(input.threadId) >= perThread) {
      return { ok: false, error: new CapacityExceededError("thread", perThread) };
    }
    if (total > 0 && this.queuedTotal >= total) {
      return { ok: false, error: new CapacityExceededError("global", total) };
    }

    let id = this.newId();
    while (this.jobs.has(id)) id = this.newId();

    const job: JobRecord = {
      id,
      seq: (this.seq += 1),
      threadId: input.threadId,
      cwd: input.cwd,
      dirKey: path.resolve(input.cwd),
      message: input.message,
      status: "queued",
      createdAt: this.clock.now(),
      startedAt: null,
      finishedAt: null,
      mode: null,
      resumedSessionId: null,
      sessionId: null,
      result: null,
      error: null,
      final: null,
    };
    this.jobs.set(id, job);
    const q = this.queues.get(job.threadId);
    if (q) q.push(job);
    else this.queues.set(job.threadId, [job]);
    this.queuedTotal += 1;
    this.log.debug({ jobId: id, threadId: job.threadId }, "job queued");

    this.schedulePump();
    return { ok: true, job: snapshot(job) };
  }

  get(jobId: string): JobView | null {
    const j = this.jobs.get(jobId);
    if (!j) return null;
    return j.final ?? snapshot(j);
  }

  listJobs(threadId: string): JobView[] {
    const out: JobView[] = [];
    for (const j of this.jobs.values()) {
      if (j.threadId === threadId) out.push(j.final ?? snapshot(j));
    }
    return out;
  }

  /** Queued plus running jobs for a thread; non-zero means the thread must not be deleted. */
  pendingFor(threadId: string): number {
    return (this.queues.get(threadId)?.length ?? 0) + (this.running.has(threadId) ? 1 : 0);
  }

  stats(): { workers: number; running: number; queued: number; retained: number } {
    return { workers: this.workers, running: this.running.size, queued: this.queuedTotal, retained: this.jobs.size };
  }

  onSettled(fn: (job: JobView) => void): () => void {
    this.settledListeners.add(fn);
    return () => this.settledListeners.delete(fn);
  }

  /** Resolves once nothing is queued or running. */
  idle(): Promise<void> {
    if (this.running.size === 0 && this.queuedTotal === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  /**
   * Stops accepting work and cancels everything still queued. Running jobs cannot be
   * interrupted mid-flight; the returned promise waits for them (bounded by the timeout).
   */
  close(): Promise<void> {
    if (!this.closed) {
      this.closed = true;
      for (const q of this.queues.values()) {
        for (const job of q) {
          this.queuedTotal -= 1;
          this.settle(job, { ok: false, error: { kind: "Cancelled", message: "server shut down before the job started" } });
        }
      }
      this.queues.clear();
    }
    return this.idle();
  }

  private schedulePump() {
    if (this.pumpScheduled) return;
    this.pumpScheduled = true;
    queueMicrotask(() => {
      this.pumpScheduled = false;
      this.pump();
    });
  }

  private pump() {
    while (this.running.size < this.workers) {
      const next = this.pickEligible();
      if (!next) break;
      this.start(next);
    }
    this.notifyIfIdle();
  }

  // Oldest head job among threads that have nothing running and whose directory is free.
  private pickEligible(): JobRecord | null {
    let best: JobRecord | null = null;
    for (const [threadId, q] of this.queues) {
      if (this.running.has(threadId)) continue;
      const head = q[0];
      if (!head || this.busyDirs.has(head.dirKey)) continue;
      if (!best || head.seq < best.seq) best = head;
    }
    return best;
  }

  private start(job: JobRecord) {
    const q = this.queues.get(job.threadId);
    q?.shift();
    if (q && q.length === 0) this.queues.delete(job.threadId);
    this.queuedTotal -= 1;

    job.status = "running";
    job.startedAt = this.clock.now();
    this.running.set(job.threadId, job);
    this.busyDirs.add(job.dirKey);
    void this.execute(job);
  }

  private async execute(job: JobRecord) {
    let outcome: Outcome;
    try {
      const prior = this.sessions.get(job.threadId);
      const mode = modeFor(prior);
      job.mode = mode.kind;
      job.resumedSessionId = prior;
      this.log.info({ jobId: job.id, threadId: job.threadId, mode: mode.kind }, "job started");

      const res = await this.invoker.invoke({ cwd: job.cwd, mode, message: job.message, timeoutMs: this.timeoutMs });
      outcome = { ok: true, res };
    } catch (e) {
      outcome = { ok: false, error: describeError(e) };
    }

    if (outcome.ok) {
      try {
        this.sessions.set(job.threadId, outcome.res.sessionId);
      } catch (e) {
        outcome = {
          ok: false,
          error: { kind: "InternalError", message: `could not record session: ${describeError(e).message}` },
        };
      }
    }

    this.running.delete(job.threadId);
    this.busyDirs.delete(job.dirKey);
    this.settle(job, outcome);
    this.pump();
  }

  private settle(job: JobRecord, outcome: Outcome) {
    if (isTerminal(job.status)) return;
    const finishedAt = this.clock.now();
    job.finishedAt = finishedAt;
    if (outcome.ok) {
      job.status = "done";
      job.result = outcome.res.text;
      job.sessionId = outcome.res.sessionId;
    } else {
      job.status = "failed";
      job.error = outcome.error;
    }
    job.final = snapshot(job);

    const tookMs = job.startedAt != null ? finishedAt - job.startedAt : null;
    if (outcome.ok) this.log.info({ jobId: job.id, threadId: job.threadId, tookMs }, "job done");
    else this.log.warn({ jobId: job.id, threadId: job.threadId, tookMs, error: outcome.error }, "job failed");

    this.retain(job.id);
    for (const fn of this.settledListeners) {
      try {
        fn(job.final);
      } catch (e) {
        this.log.error({ jobId: job.id, err: describeError(e) }, "settled listener threw");
      }
    }
  }

  private retain(jobId: string) {
    this.terminalOrder.push(jobId);
    while (this.terminalOrder.length > this.retainTerminal) {
      const old = this.terminalOrder.shift();
      if (old != null) this.jobs.delete(old);
    }
  }

  private notifyIfIdle() {
    if (this.running.size > 0 || this.queuedTotal > 0) return;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const w of waiters) w();
  }
}
