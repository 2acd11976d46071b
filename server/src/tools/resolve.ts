import fs from "node:fs";
import os from "node:os";
import path from "node:path";

function toRealpathSafe(p: string): string {
  try {
    return fs.realpathSync(p);
  } catch {
    return p;
  }
}

function isProbablyAbsolute(p: string): boolean {
  if (!p) return false;
  if (path.isAbsolute(p)) return true;
  // Windows drive letter absolute path.
  return /^[a-zA-Z]:[\\/]/.test(p);
}

function hasPathSeparator(cmd: string): boolean {
  return cmd.includes("/") || cmd.includes("\\");
}

function pathExtCandidates(name: string, env: NodeJS.ProcessEnv): string[] {
  if (os.platform() !== "win32") return [name];
  const ext = String(env.PATHEXT ?? ".COM;.EXE;.BAT;.CMD")
    .split(";")
    .map((x) => x.trim())
    .filter(Boolean);
  const lower = name.toLowerCase();
  if (ext.some((x) => lower.endsWith(x.toLowerCase()))) return [name];
  return [name, ...ext.map((x) => `${name}${x}`)];
}

function isExecutableFile(p: string): boolean {
  try {
    const st = fs.statSync(p);
    if (!st.isFile()) return false;
    if (os.platform() === "win32") return true;
    fs.accessSync(p, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function splitPathEnv(env: NodeJS.ProcessEnv): string[] {
  const raw = String(env.PATH ?? "").trim();
  if (!raw) return [];
  return raw.split(path.delimiter).map((p) => p.trim()).filter(Boolean);
}

function resolveCommandCandidates(cmd: string, env: NodeJS.ProcessEnv = process.env): string[] {
  const c = String(cmd ?? "").trim();
  if (!c) return [];

  if (hasPathSeparator(c) || isProbablyAbsolute(c)) {
    const abs = path.isAbsolute(c) ? c : path.resolve(c);
    return isExecutableFile(abs) ? [abs] : [];
  }

  const out: string[] = [];
  const seen = new Set<string>();
  for (const d of splitPathEnv(env)) {
    for (const n of pathExtCandidates(c, env)) {
      const cand = path.join(d, n);
      if (!isExecutableFile(cand)) continue;
      const key = toRealpathSafe(cand);
      if (seen.has(key)) continue;
      seen.add(key);
      out.push(cand);
    }
  }
  return out;
}

export type ResolvedCommand = { ok: true; path: string } | { ok: false; reason: string };

/**
 * Locate the tool binary up front so a missing install surfaces as a launch failure
 * with a readable reason instead of a bare ENOENT from spawn.
 */
export function resolveCommand(cmd: string, env: NodeJS.ProcessEnv = process.env): ResolvedCommand {
  const c = String(cmd ?? "").trim();
  if (!c) return { ok: false, reason: "command is empty" };
  const first = resolveCommandCandidates(c, env)[0];
  if (first) return { ok: true, path: first };
  if (hasPathSeparator(c) || isProbablyAbsolute(c)) {
    return { ok: false, reason: fs.existsSync(c) ? "file is not executable" : "file does not exist" };
  }
  return { ok: false, reason: "not found on PATH" };
}
