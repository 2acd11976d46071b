import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, expect, test } from "vitest";
import {
  allocateProjectDir,
  expandHome,
  isUnderRoot,
  removeProjectDir,
  sanitizeProjectName,
  validateWorkingDir,
} from "../src/projects.js";

function withRoot(fn: (root: string) => void) {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), "tr-projects-"));
  try {
    fn(root);
  } finally {
    fs.rmSync(root, { recursive: true, force: true });
  }
}

describe("projects", () => {
  test("expandHome", () => {
    expect(expandHome("~")).toBe(os.homedir());
    expect(expandHome("~/x")).toBe(path.join(os.homedir(), "x"));
    expect(expandHome("/abs")).toBe("/abs");
  });

  test("isUnderRoot rejects traversal outside", () => {
    expect(isUnderRoot("/a/b", "/a")).toBe(true);
    expect(isUnderRoot("/a", "/a")).toBe(true);
    expect(isUnderRoot("/a/../etc", "/a")).toBe(false);
    expect(isUnderRoot("/ab", "/a")).toBe(false);
  });

  test("sanitizeProjectName keeps a folder-safe slug", () => {
    expect(sanitizeProjectName("My App")).toBe("My-App");
    expect(sanitizeProjectName("../../etc/passwd")).toBe("etcpasswd");
    expect(sanitizeProjectName("café_2")).toBe("café_2");
    expect(sanitizeProjectName("///")).toMatch(/^project-[a-z0-9_-]{8}$/);
  });

  test("allocateProjectDir suffixes taken names", () => {
    withRoot((root) => {
      const a = allocateProjectDir(root, "demo");
      const b = allocateProjectDir(root, "demo");
      const c = allocateProjectDir(root, "demo");
      expect([a, b, c].map((r) => (r.ok ? r.id : r.reason))).toEqual(["demo", "demo-1", "demo-2"]);
      if (b.ok) expect(fs.statSync(b.dir).isDirectory()).toBe(true);
    });
  });

  test("validateWorkingDir", () => {
    withRoot((root) => {
      fs.mkdirSync(path.join(root, "ok"));
      fs.writeFileSync(path.join(root, "file"), "");

      expect(validateWorkingDir(path.join(root, "ok"), root)).toEqual({ ok: true, cwd: path.join(root, "ok") });
      expect(validateWorkingDir(path.join(root, "missing"), root)).toEqual({
        ok: false,
        reason: "working directory does not exist",
      });
      expect(validateWorkingDir(path.join(root, "file"), root)).toEqual({
        ok: false,
        reason: "working directory is not a directory",
      });
      expect(validateWorkingDir(os.tmpdir(), root)).toEqual({
        ok: false,
        reason: "working directory is outside the projects root",
      });
    });
  });

  test("removeProjectDir only removes inside the root", () => {
    withRoot((root) => {
      const dir = path.join(root, "p");
      fs.mkdirSync(dir);
      fs.writeFileSync(path.join(dir, "f.txt"), "x");

      expect(removeProjectDir(root, root).ok).toBe(false);
      expect(removeProjectDir(os.tmpdir(), root).ok).toBe(false);
      expect(removeProjectDir(dir, root)).toEqual({ ok: true });
      expect(fs.existsSync(dir)).toBe(false);
      expect(fs.existsSync(root)).toBe(true);
    });
  });
});
