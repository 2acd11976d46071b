import { NotFoundError } from "../errors.js";
import type { JobView, StatusResult } from "./types.js";

export interface JobSource {
  get(jobId: string): JobView | null;
}

/**
 * Read-only view over job state for clients polling for completion. Unknown ids come back
 * as a NotFoundError value so callers can't mistake them for a failed job.
 */
export class StatusPoller {
  private source: JobSource;

  constructor(source: JobSource) {
    this.source = source;
  }

  status(jobId: string): StatusResult {
    const job = jobId ? this.source.get(jobId) : null;
    if (!job) return { ok: false, error: new NotFoundError("job", jobId) };
    return { ok: true, job };
  }
}

export type JobStatusBody =
  | { ok: true; jobId: string; threadId: string; status: JobView["status"]; result?: string; error?: JobView["error"] }
  | { ok: false; error: "not_found"; jobId: string };

/** Wire shape for the status endpoint: result only once done, error only once failed. */
export function toStatusBody(r: StatusResult, jobId: string): JobStatusBody {
  if (!r.ok) return { ok: false, error: "not_found", jobId };
  const j = r.job;
  const body: JobStatusBody = { ok: true, jobId: j.id, threadId: j.threadId, status: j.status };
  if (j.status === "done" && j.result != null) body.result = j.result;
  if (j.status === "failed" && j.error) body.error = j.error;
  return body;
}
