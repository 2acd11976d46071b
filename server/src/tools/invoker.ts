import { z } from "zod";
import {
  LaunchError,
  MalformedOutputError,
  NonZeroExitError,
  TimeoutError,
  ToolReportedError,
} from "../errors.js";
import { execCapture, type ExecResult } from "./exec.js";
import { resolveCommand } from "./resolve.js";

export type ToolCommand = {
  command: string;
  args: string[];
  env?: Record<string, string>;
};

// Resume mode hands the previous session id back to the tool so it reloads its context.
export type InvocationMode = { kind: "fresh" } | { kind: "resume"; sessionId: string };

export type InvokeInput = {
  cwd: string;
  mode: InvocationMode;
  message: string;
  timeoutMs: number;
};

export type InvokeResult = {
  sessionId: string;
  text: string;
  raw: ToolOutput;
};

export interface ProcessInvoker {
  invoke(input: InvokeInput): Promise<InvokeResult>;
}

export function modeFor(sessionId: string | null): InvocationMode {
  return sessionId ? { kind: "resume", sessionId } : { kind: "fresh" };
}

export function buildInvocationArgs(baseArgs: string[], mode: InvocationMode, message: string): string[] {
  const args = [...baseArgs];
  if (mode.kind === "resume") args.push("--resume", mode.sessionId);
  args.push("-p", message, "--output-format", "json");
  return args;
}

const toolOutputSchema = z
  .object({
    type: z.string().optional(),
    subtype: z.string().optional(),
    is_error: z.boolean().optional(),
    session_id: z.string().optional(),
    result: z.string().optional(),
    content: z.string().optional(),
    duration_ms: z.number().optional(),
    total_cost_usd: z.number().optional(),
  })
  .passthrough();

export type ToolOutput = z.infer<typeof toolOutputSchema>;

function parseJsonSafe(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

// The tool prints a single JSON document, but wrappers sometimes add banner lines
// before it. Fall back to the last line that parses as an object.
function extractJson(stdout: string): unknown {
  const trimmed = stdout.trim();
  if (!trimmed) return undefined;
  const whole = parseJsonSafe(trimmed);
  if (whole !== undefined) return whole;
  const lines = trimmed.split(/\r?\n/);
  for (let i = lines.length - 1; i >= 0; i -= 1) {
    const line = lines[i]?.trim() ?? "";
    if (!line.startsWith("{")) continue;
    const v = parseJsonSafe(line);
    if (v !== undefined) return v;
  }
  return undefined;
}

/** Returns null when stdout holds no JSON object at all. */
export function readToolOutput(stdout: string): ToolOutput | null {
  const json = extractJson(stdout);
  if (json === undefined) return null;
  const parsed = toolOutputSchema.safeParse(json);
  return parsed.success ? parsed.data : null;
}

export function interpretToolOutput(stdout: string): InvokeResult {
  const out = readToolOutput(stdout);
  if (!out) throw new MalformedOutputError("expected a JSON object", stdout);

  const text = out.result ?? out.content;
  if (out.is_error === true) {
    throw new ToolReportedError(text || out.subtype || "", out.session_id ?? null);
  }
  if (!out.session_id) throw new MalformedOutputError("missing session_id", stdout);
  if (typeof text !== "string") throw new MalformedOutputError("missing result text", stdout);
  return { sessionId: out.session_id, text, raw: out };
}

export type CliProcessInvokerOptions = {
  tool: ToolCommand;
  maxOutputBytes?: number;
  killGraceMs?: number;
};

/** Runs the conversational CLI once per message and turns its JSON reply into a result. */
export class CliProcessInvoker implements ProcessInvoker {
  private opts: CliProcessInvokerOptions;

  constructor(opts: CliProcessInvokerOptions) {
    this.opts = opts;
  }

  async invoke(input: InvokeInput): Promise<InvokeResult> {
    const { tool } = this.opts;
    const env = { ...process.env, ...(tool.env ?? {}) };
    const resolved = resolveCommand(tool.command, env);
    if (!resolved.ok) throw new LaunchError(tool.command, resolved.reason);

    const args = buildInvocationArgs(tool.args, input.mode, input.message);
    const res = await execCapture(resolved.path, args, {
      cwd: input.cwd,
      env: tool.env,
      timeoutMs: input.timeoutMs,
      maxOutputBytes: this.opts.maxOutputBytes,
      killGraceMs: this.opts.killGraceMs,
    });
    return this.interpret(tool.command, input, res);
  }

  private interpret(command: string, input: InvokeInput, res: ExecResult): InvokeResult {
    if (res.spawnError) throw new LaunchError(command, res.spawnError.code ?? res.spawnError.message);
    if (res.timedOut) throw new TimeoutError(input.timeoutMs);
    if (res.truncated) throw new MalformedOutputError("output exceeded capture limit", res.stdout.slice(0, 4096));

    if (!res.ok) {
      // A failed turn still prints its JSON envelope with is_error set; prefer that.
      const out = readToolOutput(res.stdout);
      if (out?.is_error === true) {
        throw new ToolReportedError(out.result ?? out.content ?? out.subtype ?? "", out.session_id ?? null);
      }
      throw new NonZeroExitError({ code: res.code, signal: res.signal, stderr: tailOf(res.stderr) });
    }
    return interpretToolOutput(res.stdout);
  }
}

function tailOf(s: string, max = 2000): string {
  const t = s.trim();
  return t.length > max ? t.slice(t.length - max) : t;
}
