import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { createStore, type Store } from "../src/store.js";

describe("store", () => {
  let dir: string;
  let store: Store;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "tr-store-"));
    store = createStore(dir);
  });

  afterEach(() => {
    store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  test("projects list with their thread counts", () => {
    store.createProject({ id: "a", name: "Alpha", dir: "/x/a" });
    store.createThread({ id: "t1", projectId: "a", name: "one" });
    store.createThread({ id: "t2", projectId: "a", name: "two" });

    const projects = store.listProjects();
    expect(projects.map((p) => [p.id, p.name, p.threadCount])).toEqual([["a", "Alpha", 2]]);
    expect(store.getProject("a")?.dir).toBe("/x/a");
    expect(store.getProject("missing")).toBeNull();
  });

  test("threads start without a session", () => {
    store.createProject({ id: "a", name: "Alpha", dir: "/x/a" });
    const t = store.createThread({ id: "t1", projectId: "a", name: "one" });
    expect(t).toMatchObject({ id: "t1", projectId: "a", sessionId: null, messageCount: 0, lastActivity: null });
    expect(store.getThread("t1")).toEqual(t);
    expect(store.listThreads("a").map((x) => x.id)).toEqual(["t1"]);
  });

  test("thread needs an existing project", () => {
    expect(() => store.createThread({ id: "t1", projectId: "nope", name: "x" })).toThrow();
  });

  test("session id round-trips per thread", () => {
    store.createProject({ id: "a", name: "Alpha", dir: "/x/a" });
    store.createThread({ id: "t1", projectId: "a", name: "one" });
    expect(store.getSessionId("t1")).toBeNull();
    expect(store.setSessionId("t1", "S1")).toBe(true);
    expect(store.getSessionId("t1")).toBe("S1");
    expect(store.setSessionId("nope", "S1")).toBe(false);
  });

  test("recordExchange appends a user/assistant pair and bumps counters", () => {
    store.createProject({ id: "a", name: "Alpha", dir: "/x/a" });
    store.createThread({ id: "t1", projectId: "a", name: "one" });

    expect(store.recordExchange({ threadId: "t1", jobId: "j1", message: "hi", response: "hello", ts: 500 })).toBe(true);
    expect(store.recordExchange({ threadId: "t1", jobId: "j2", message: "more", response: "sure", ts: 600 })).toBe(true);

    const msgs = store.listMessages("t1");
    expect(msgs.map((m) => [m.role, m.content, m.jobId])).toEqual([
      ["user", "hi", "j1"],
      ["assistant", "hello", "j1"],
      ["user", "more", "j2"],
      ["assistant", "sure", "j2"],
    ]);
    expect(store.listMessages("t1", 1).map((m) => m.content)).toEqual(["hi"]);
    expect(store.getThread("t1")).toMatchObject({ messageCount: 2, lastActivity: 600 });
    expect(store.recordExchange({ threadId: "nope", jobId: "j3", message: "x", response: "y", ts: 1 })).toBe(false);
  });

  test("deleting a project removes its threads and messages", () => {
    store.createProject({ id: "a", name: "Alpha", dir: "/x/a" });
    store.createThread({ id: "t1", projectId: "a", name: "one" });
    store.recordExchange({ threadId: "t1", jobId: "j1", message: "hi", response: "hello", ts: 1 });

    expect(store.deleteProject("a")).toBe(true);
    expect(store.getThread("t1")).toBeNull();
    expect(store.listMessages("t1")).toEqual([]);
    expect(store.deleteProject("a")).toBe(false);
  });

  test("deleting a thread leaves its siblings", () => {
    store.createProject({ id: "a", name: "Alpha", dir: "/x/a" });
    store.createThread({ id: "t1", projectId: "a", name: "one" });
    store.createThread({ id: "t2", projectId: "a", name: "two" });
    expect(store.deleteThread("t1")).toBe(true);
    expect(store.listThreads("a").map((t) => t.id)).toEqual(["t2"]);
  });
});
