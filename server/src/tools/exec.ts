import { spawn } from "node:child_process";

export type ExecResult = {
  ok: boolean;
  code: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  // Set when the process could not be started (ENOENT, EACCES, ...).
  spawnError?: { code: string | null; message: string };
  truncated: boolean;
};

export type ExecOptions = {
  timeoutMs?: number;
  cwd?: string;
  env?: Record<string, string>;
  maxOutputBytes?: number;
  killGraceMs?: number;
};

const DEFAULT_MAX_OUTPUT_BYTES = 8 * 1024 * 1024;

function errnoCode(e: Error): string | null {
  const code: unknown = Reflect.get(e, "code");
  return typeof code === "string" ? code : null;
}

export async function execCapture(cmd: string, args: string[], opts?: ExecOptions): Promise<ExecResult> {
  const timeoutMs = opts?.timeoutMs ?? 2500;
  const killGraceMs = opts?.killGraceMs ?? 1500;
  const maxBytes = opts?.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;

  return await new Promise((resolve) => {
    const child = spawn(cmd, args, {
      cwd: opts?.cwd,
      env: { ...process.env, ...(opts?.env ?? {}) },
      stdio: ["ignore", "pipe", "pipe"],
    });

    const out: Buffer[] = [];
    const err: Buffer[] = [];
    let outBytes = 0;
    let errBytes = 0;
    let truncated = false;
    let timedOut = false;
    let settled = false;
    let killTimer: NodeJS.Timeout | null = null;

    child.stdout.on("data", (d: Buffer) => {
      if (outBytes + d.length > maxBytes) {
        truncated = true;
        return;
      }
      outBytes += d.length;
      out.push(d);
    });
    child.stderr.on("data", (d: Buffer) => {
      // stderr is only used for error messages; keep the head.
      if (errBytes + d.length > maxBytes) return;
      errBytes += d.length;
      err.push(d);
    });

    const finish = (res: Omit<ExecResult, "stdout" | "stderr" | "truncated" | "timedOut">) => {
      if (settled) return;
      settled = true;
      clearTimeout(t);
      resolve({
        ...res,
        stdout: Buffer.concat(out).toString("utf8"),
        stderr: Buffer.concat(err).toString("utf8"),
        truncated,
        timedOut,
      });
    };

    // The caller gets the timeout result right away; termination carries on in the background.
    const t = setTimeout(() => {
      timedOut = true;
      try {
        child.kill("SIGTERM");
      } catch {
        // already gone
      }
      killTimer = setTimeout(() => {
        try {
          child.kill("SIGKILL");
        } catch {
          // already gone
        }
      }, killGraceMs);
      killTimer.unref();
      finish({ ok: false, code: null, signal: null });
    }, timeoutMs);

    child.on("error", (e) => {
      finish({ ok: false, code: null, signal: null, spawnError: { code: errnoCode(e), message: e.message } });
    });

    child.on("exit", () => {
      if (killTimer) clearTimeout(killTimer);
    });

    child.on("close", (code, signal) => {
      finish({ ok: code === 0 && !timedOut, code, signal });
    });
  });
}
