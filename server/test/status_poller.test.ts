import { describe, expect, test } from "vitest";
import { NotFoundError } from "../src/errors.js";
import { StatusPoller, toStatusBody } from "../src/jobs/status_poller.js";
import type { JobView } from "../src/jobs/types.js";

function view(patch: Partial<JobView>): JobView {
  return {
    id: "j1",
    threadId: "t1",
    message: "hi",
    status: "queued",
    createdAt: 1,
    startedAt: null,
    finishedAt: null,
    mode: null,
    resumedSessionId: null,
    sessionId: null,
    result: null,
    error: null,
    ...patch,
  };
}

function pollerFor(jobs: JobView[]) {
  const byId = new Map(jobs.map((j) => [j.id, j]));
  return new StatusPoller({ get: (id) => byId.get(id) ?? null });
}

describe("status poller", () => {
  test("unknown and empty ids are not found", () => {
    const poller = pollerFor([]);
    for (const id of ["nope", ""]) {
      const r = poller.status(id);
      expect(r.ok).toBe(false);
      if (!r.ok) {
        expect(r.error).toBeInstanceOf(NotFoundError);
        expect(r.error.message).toBe(`job not found: ${id}`);
      }
    }
  });

  test("queued and running jobs carry neither result nor error", () => {
    const poller = pollerFor([view({ id: "q" }), view({ id: "r", status: "running", startedAt: 2 })]);
    expect(toStatusBody(poller.status("q"), "q")).toEqual({ ok: true, jobId: "q", threadId: "t1", status: "queued" });
    expect(toStatusBody(poller.status("r"), "r")).toEqual({ ok: true, jobId: "r", threadId: "t1", status: "running" });
  });

  test("done jobs carry the result", () => {
    const poller = pollerFor([view({ status: "done", result: "hello", sessionId: "S1", finishedAt: 3 })]);
    expect(toStatusBody(poller.status("j1"), "j1")).toEqual({
      ok: true,
      jobId: "j1",
      threadId: "t1",
      status: "done",
      result: "hello",
    });
  });

  test("failed jobs carry the error detail", () => {
    const error = { kind: "TimeoutError" as const, message: "tool did not finish within 1000ms and was terminated" };
    const poller = pollerFor([view({ status: "failed", error, finishedAt: 3 })]);
    expect(toStatusBody(poller.status("j1"), "j1")).toEqual({ ok: true, jobId: "j1", threadId: "t1", status: "failed", error });
  });

  test("not-found body echoes the id", () => {
    expect(toStatusBody(pollerFor([]).status("x"), "x")).toEqual({ ok: false, error: "not_found", jobId: "x" });
  });

  test("repeated polls of a settled job return the same answer", () => {
    const poller = pollerFor([view({ status: "done", result: "hello" })]);
    expect(poller.status("j1")).toEqual(poller.status("j1"));
  });
});
