export type ErrorKind =
  | "LaunchError"
  | "TimeoutError"
  | "NonZeroExitError"
  | "MalformedOutputError"
  | "ToolReportedError"
  | "CapacityExceededError"
  | "NotFoundError"
  | "Cancelled"
  | "InternalError";

export type ErrorDetail = { kind: ErrorKind; message: string };

export abstract class ThreadRunnerError extends Error {
  abstract readonly kind: ErrorKind;

  toJSON(): ErrorDetail {
    return { kind: this.kind, message: this.message };
  }
}

/** The executable could not be started at all (missing, not executable, spawn failure). */
export class LaunchError extends ThreadRunnerError {
  readonly kind = "LaunchError";
  readonly command: string;

  constructor(command: string, reason: string) {
    super(`could not launch ${command}: ${reason}`);
    this.name = "LaunchError";
    this.command = command;
  }
}

export class TimeoutError extends ThreadRunnerError {
  readonly kind = "TimeoutError";
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`tool did not finish within ${timeoutMs}ms and was terminated`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class NonZeroExitError extends ThreadRunnerError {
  readonly kind = "NonZeroExitError";
  readonly code: number | null;
  readonly signal: string | null;
  readonly stderr: string;

  constructor(input: { code: number | null; signal: string | null; stderr: string }) {
    const how = input.code != null ? `exited with code ${input.code}` : `was killed by ${input.signal ?? "a signal"}`;
    const tail = input.stderr.trim();
    super(tail ? `tool ${how}: ${tail}` : `tool ${how}`);
    this.name = "NonZeroExitError";
    this.code = input.code;
    this.signal = input.signal;
    this.stderr = input.stderr;
  }
}

export class MalformedOutputError extends ThreadRunnerError {
  readonly kind = "MalformedOutputError";
  readonly output: string;

  constructor(reason: string, output: string) {
    super(`could not parse tool output: ${reason}`);
    this.name = "MalformedOutputError";
    this.output = output;
  }
}

/** The tool ran and produced valid output, but flagged the turn itself as an error. */
export class ToolReportedError extends ThreadRunnerError {
  readonly kind = "ToolReportedError";
  readonly sessionId: string | null;

  constructor(message: string, sessionId: string | null) {
    super(message || "tool reported an error");
    this.name = "ToolReportedError";
    this.sessionId = sessionId;
  }
}

export type CapacityScope = "thread" | "global" | "closed";

export class CapacityExceededError extends ThreadRunnerError {
  readonly kind = "CapacityExceededError";
  readonly scope: CapacityScope;
  readonly limit: number;

  constructor(scope: CapacityScope, limit: number) {
    super(
      scope === "closed"
        ? "job manager is shutting down"
        : scope === "thread"
          ? `thread already has ${limit} pending jobs`
          : `server already has ${limit} queued jobs`,
    );
    this.name = "CapacityExceededError";
    this.scope = scope;
    this.limit = limit;
  }
}

export class NotFoundError extends ThreadRunnerError {
  readonly kind = "NotFoundError";
  readonly id: string;

  constructor(what: string, id: string) {
    super(`${what} not found: ${id}`);
    this.name = "NotFoundError";
    this.id = id;
  }
}

export function describeError(e: unknown): ErrorDetail {
  if (e instanceof ThreadRunnerError) return e.toJSON();
  if (e instanceof Error) return { kind: "InternalError", message: e.message || e.name };
  return { kind: "InternalError", message: String(e) };
}
