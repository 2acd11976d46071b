import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { nanoid } from "nanoid";
import * as TOML from "@iarna/toml";
import { z } from "zod";
import { expandHome } from "./projects.js";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type Config = {
  server: { bind: string; port: number; logLevel: LogLevel };
  auth: { token: string };
  data: { dir: string };
  tool: {
    command: string;
    args: string[];
    timeoutMs: number;
    env: Record<string, string>;
  };
  jobs: {
    workers: number;
    maxQueuedPerThread: number;
    maxQueuedTotal: number;
    retainTerminal: number;
  };
};

export function configDir(): string {
  return path.join(os.homedir(), ".threadrunner");
}

export function configPath(): string {
  return path.join(configDir(), "config.toml");
}

export function defaultConfig(): Config {
  return {
    // Loopback unless TR_BIND says otherwise.
    server: { bind: "127.0.0.1", port: 7440, logLevel: "info" },
    auth: { token: nanoid(48) },
    data: { dir: configDir() },
    tool: {
      command: "claude",
      // Runs headless; there is nobody to answer permission prompts.
      args: ["--dangerously-skip-permissions"],
      timeoutMs: 5 * 60_000,
      env: {},
    },
    jobs: { workers: 2, maxQueuedPerThread: 16, maxQueuedTotal: 256, retainTerminal: 1000 },
  };
}

function clampInt(min: number, max: number) {
  return z.coerce.number().int().min(min).max(max);
}

// Every key is optional; anything missing or mistyped falls back to the default.
const fileSchema = z
  .object({
    server: z
      .object({
        bind: z.string().min(1).optional().catch(undefined),
        port: clampInt(1, 65535).optional().catch(undefined),
        logLevel: z.enum(LOG_LEVELS).optional().catch(undefined),
      })
      .partial()
      .optional()
      .catch(undefined),
    auth: z.object({ token: z.string().min(1).optional().catch(undefined) }).optional().catch(undefined),
    data: z.object({ dir: z.string().min(1).optional().catch(undefined) }).optional().catch(undefined),
    tool: z
      .object({
        command: z.string().min(1).optional().catch(undefined),
        args: z.array(z.string()).optional().catch(undefined),
        timeoutMs: clampInt(1_000, 24 * 60 * 60_000).optional().catch(undefined),
        env: z.record(z.string()).optional().catch(undefined),
      })
      .optional()
      .catch(undefined),
    jobs: z
      .object({
        workers: clampInt(1, 64).optional().catch(undefined),
        maxQueuedPerThread: clampInt(0, 100_000).optional().catch(undefined),
        maxQueuedTotal: clampInt(0, 1_000_000).optional().catch(undefined),
        retainTerminal: clampInt(0, 1_000_000).optional().catch(undefined),
      })
      .optional()
      .catch(undefined),
  })
  .passthrough();

export function parseConfigToml(raw: string): Config {
  const d = defaultConfig();
  const f = fileSchema.parse(TOML.parse(raw));
  return {
    server: {
      bind: f.server?.bind ?? d.server.bind,
      port: f.server?.port ?? d.server.port,
      logLevel: f.server?.logLevel ?? d.server.logLevel,
    },
    auth: { token: f.auth?.token ?? d.auth.token },
    data: { dir: path.resolve(expandHome(f.data?.dir ?? d.data.dir)) },
    tool: {
      command: f.tool?.command ?? d.tool.command,
      args: f.tool?.args ?? d.tool.args,
      timeoutMs: f.tool?.timeoutMs ?? d.tool.timeoutMs,
      env: f.tool?.env ?? d.tool.env,
    },
    jobs: {
      workers: f.jobs?.workers ?? d.jobs.workers,
      maxQueuedPerThread: f.jobs?.maxQueuedPerThread ?? d.jobs.maxQueuedPerThread,
      maxQueuedTotal: f.jobs?.maxQueuedTotal ?? d.jobs.maxQueuedTotal,
      retainTerminal: f.jobs?.retainTerminal ?? d.jobs.retainTerminal,
    },
  };
}

export function stringifyConfigToml(cfg: Config): string {
  return TOML.stringify(cfg);
}

/** Runtime-only overrides; they are never written back to config.toml. */
export function applyEnvOverrides(cfg: Config, env: NodeJS.ProcessEnv = process.env): Config {
  const out = structuredClone(cfg);
  const str = (k: string) => (typeof env[k] === "string" ? String(env[k]).trim() : "");
  const int = (k: string, min: number, max: number) => {
    const raw = str(k);
    if (!raw) return null;
    const n = Number(raw);
    if (!Number.isFinite(n) || n < min || n > max) return null;
    return Math.floor(n);
  };

  const bind = str("TR_BIND");
  if (bind) out.server.bind = bind;
  const port = int("TR_PORT", 1, 65535);
  if (port != null) out.server.port = port;
  const level = LOG_LEVELS.find((l) => l === str("TR_LOG_LEVEL"));
  if (level) out.server.logLevel = level;
  const dataDir = str("TR_DATA_DIR");
  if (dataDir) out.data.dir = path.resolve(expandHome(dataDir));
  const command = str("TR_TOOL_COMMAND");
  if (command) out.tool.command = command;
  const workers = int("TR_WORKERS", 1, 64);
  if (workers != null) out.jobs.workers = workers;
  return out;
}

export async function loadOrCreateConfig(): Promise<Config> {
  const p = configPath();
  let cfg: Config;
  if (!fs.existsSync(p)) {
    fs.mkdirSync(configDir(), { recursive: true });
    cfg = defaultConfig();
    fs.writeFileSync(p, stringifyConfigToml(cfg), { encoding: "utf8", mode: 0o600 });
  } else {
    cfg = parseConfigToml(fs.readFileSync(p, "utf8"));
  }
  return applyEnvOverrides(cfg);
}
