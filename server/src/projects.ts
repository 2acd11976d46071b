import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { nanoid } from "nanoid";

export function expandHome(p: string): string {
  if (p === "~") return os.homedir();
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function isUnderRoot(p: string, root: string): boolean {
  const rel = path.relative(root, p);
  return rel === "" || (!rel.startsWith("..") && !path.isAbsolute(rel));
}

/**
 * Folder-safe slug for a display name: keeps letters, digits, space, `-` and `_`,
 * then turns spaces into dashes. Empty results get a random `project-xxxxxxxx` name.
 */
export function sanitizeProjectName(name: string): string {
  const kept = Array.from(String(name ?? ""))
    .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
    .join("")
    .trim()
    .replace(/ /g, "-");
  return kept || `project-${nanoid(8).toLowerCase()}`;
}

export function allocateProjectDir(
  root: string,
  name: string,
): { ok: true; id: string; dir: string } | { ok: false; reason: string } {
  const base = sanitizeProjectName(name);
  try {
    fs.mkdirSync(root, { recursive: true });
  } catch {
    return { ok: false, reason: "cannot create projects root" };
  }

  let id = base;
  for (let counter = 1; counter < 10_000; counter += 1) {
    const dir = path.join(root, id);
    try {
      fs.mkdirSync(dir, { recursive: false });
      return { ok: true, id, dir };
    } catch (e) {
      if (Reflect.get(Object(e), "code") !== "EEXIST") return { ok: false, reason: "cannot create directory" };
    }
    id = `${base}-${counter}`;
  }
  return { ok: false, reason: "too many projects with that name" };
}

export function validateWorkingDir(dir: string, root: string): { ok: true; cwd: string } | { ok: false; reason: string } {
  if (!dir) return { ok: false, reason: "working directory is empty" };
  const cwd = path.resolve(expandHome(dir));
  if (!isUnderRoot(cwd, path.resolve(root))) return { ok: false, reason: "working directory is outside the projects root" };
  let st: fs.Stats;
  try {
    st = fs.statSync(cwd);
  } catch {
    return { ok: false, reason: "working directory does not exist" };
  }
  if (!st.isDirectory()) return { ok: false, reason: "working directory is not a directory" };
  return { ok: true, cwd };
}

export function removeProjectDir(dir: string, root: string): { ok: true } | { ok: false; reason: string } {
  const cwd = path.resolve(dir);
  const r = path.resolve(root);
  if (cwd === r || !isUnderRoot(cwd, r)) return { ok: false, reason: "refusing to remove a directory outside the projects root" };
  try {
    fs.rmSync(cwd, { recursive: true, force: true });
  } catch {
    return { ok: false, reason: "cannot remove directory" };
  }
  return { ok: true };
}
