#!/usr/bin/env node
import { loadOrCreateConfig } from "./config.js";
import { buildApp } from "./app.js";

const cfg = await loadOrCreateConfig();

const app = await buildApp({
  token: cfg.auth.token,
  dataDir: cfg.data.dir,
  tool: cfg.tool,
  jobs: cfg.jobs,
  logLevel: cfg.server.logLevel,
});

try {
  await app.listen({ host: cfg.server.bind, port: cfg.server.port });
} catch (e) {
  if (e instanceof Error && Reflect.get(e, "code") === "EADDRINUSE") {
    app.log.fatal(`Port already in use: ${cfg.server.bind}:${cfg.server.port}`);
    app.log.fatal(`To find the process: lsof -iTCP:${cfg.server.port} -sTCP:LISTEN -P`);
    process.exit(1);
  }
  throw e;
}

let shuttingDown = false;
async function shutdown(signal: string) {
  if (shuttingDown) return;
  shuttingDown = true;
  app.log.info({ signal, jobs: "draining" }, "shutting down");
  try {
    // Cancels queued jobs and waits for running ones (bounded by the tool timeout).
    await app.close();
    process.exit(0);
  } catch (e) {
    app.log.error({ err: e }, "shutdown failed");
    process.exit(1);
  }
}
process.on("SIGINT", () => void shutdown("SIGINT"));
process.on("SIGTERM", () => void shutdown("SIGTERM"));

app.log.info(
  { dataDir: cfg.data.dir, tool: cfg.tool.command, workers: cfg.jobs.workers },
  `threadrunner listening on http://${cfg.server.bind}:${cfg.server.port}`,
);
