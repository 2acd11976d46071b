import type { FastifyBaseLogger } from "fastify";
import type { CapacityExceededError, ErrorDetail, NotFoundError } from "../errors.js";
import type { InvocationMode } from "../tools/invoker.js";

export type JobStatus = "queued" | "running" | "done" | "failed";

const TERMINAL_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(["done", "failed"]);

export function isTerminal(status: JobStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export type JobView = Readonly<{
  id: string;
  threadId: string;
  message: string;
  status: JobStatus;
  createdAt: number;
  startedAt: number | null;
  finishedAt: number | null;
  // How the tool was started; null until the job runs.
  mode: InvocationMode["kind"] | null;
  // Session the job resumed from, and the one it produced on success.
  resumedSessionId: string | null;
  sessionId: string | null;
  result: string | null;
  error: ErrorDetail | null;
}>;

export type SubmitInput = {
  threadId: string;
  cwd: string;
  message: string;
};

export type SubmitResult = { ok: true; job: JobView } | { ok: false; error: CapacityExceededError };

export type StatusResult = { ok: true; job: JobView } | { ok: false; error: NotFoundError };

export type Clock = { now(): number };

export const systemClock: Clock = { now: () => Date.now() };

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
