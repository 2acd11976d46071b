import Fastify from "fastify";
import helmet from "@fastify/helmet";
import compress from "@fastify/compress";
import type { FastifyInstance } from "fastify";
import path from "node:path";
import { nanoid } from "nanoid";
import { z } from "zod";
import { addAuthGuard } from "./auth.js";
import { configDir, defaultConfig, type Config, type LogLevel } from "./config.js";
import { createStore } from "./store.js";
import { allocateProjectDir, removeProjectDir, validateWorkingDir } from "./projects.js";
import { CliProcessInvoker, type ProcessInvoker } from "./tools/invoker.js";
import { JobManager } from "./jobs/job_manager.js";
import { StoreSessionRegistry } from "./jobs/session_registry.js";
import { StatusPoller, toStatusBody } from "./jobs/status_poller.js";

export type AppConfig = {
  token: string;
  dataDir?: string;
  tool?: Config["tool"];
  jobs?: Config["jobs"];
  // false turns request/job logging off entirely.
  logLevel?: LogLevel | false;
  invoker?: ProcessInvoker;
};

const createProjectBody = z.object({ name: z.string().trim().min(1).max(200) });
const createThreadBody = z.object({ name: z.string().trim().max(200).optional() }).nullish();
const sendMessageBody = z.object({ message: z.string().refine((s) => s.trim().length > 0) });

type ProjectParams = { Params: { projectId: string } };
type ThreadParams = { Params: { threadId: string } };

export async function buildApp(cfg: AppConfig): Promise<FastifyInstance> {
  const app = Fastify({
    logger: cfg.logLevel ? { level: cfg.logLevel } : false,
    bodyLimit: 1024 * 1024,
  });

  await app.register(helmet, { contentSecurityPolicy: false });
  await app.register(compress);

  addAuthGuard(app, cfg.token, { onlyPrefixes: ["/api"], exceptPaths: ["/api/health"] });

  const defaults = defaultConfig();
  const baseDir = cfg.dataDir ?? configDir();
  const projectsRoot = path.join(baseDir, "projects");
  const tool = cfg.tool ?? defaults.tool;
  const limits = cfg.jobs ?? defaults.jobs;

  const store = createStore(baseDir);
  const jobs = new JobManager({
    invoker: cfg.invoker ?? new CliProcessInvoker({ tool }),
    sessions: new StoreSessionRegistry(store),
    workers: limits.workers,
    timeoutMs: tool.timeoutMs,
    limits: { perThread: limits.maxQueuedPerThread, total: limits.maxQueuedTotal },
    retainTerminal: limits.retainTerminal,
    logger: app.log,
  });
  const poller = new StatusPoller(jobs);

  // The session id is already persisted through the registry; this keeps the history and
  // counters that the thread endpoints report.
  jobs.onSettled((job) => {
    if (job.status !== "done" || job.result == null) return;
    store.recordExchange({
      threadId: job.threadId,
      jobId: job.id,
      message: job.message,
      response: job.result,
      ts: job.finishedAt ?? Date.now(),
    });
  });

  app.addHook("onClose", async () => {
    await jobs.close();
    store.close();
  });

  app.setErrorHandler((err, req, reply) => {
    const status: unknown = err instanceof Error ? Reflect.get(err, "statusCode") : undefined;
    const code = typeof status === "number" && status >= 400 && status < 600 ? status : 500;
    const message = err instanceof Error ? err.message : String(err);
    if (code >= 500) req.log.error({ err }, "request failed");
    return reply.code(code).send({ ok: false, error: code >= 500 ? "internal" : "bad_request", message });
  });

  app.get("/api/health", async () => {
    return { ok: true, service: "threadrunner", jobs: jobs.stats() };
  });

  app.get("/api/projects", async () => {
    const projects = store.listProjects();
    return { ok: true, projects, count: projects.length };
  });

  app.post("/api/projects", async (req, reply) => {
    const body = createProjectBody.safeParse(req.body);
    if (!body.success) return reply.code(400).send({ ok: false, error: "missing_name" });

    const dir = allocateProjectDir(projectsRoot, body.data.name);
    if (!dir.ok) return reply.code(500).send({ ok: false, error: "mkdir_failed", reason: dir.reason });
    const project = store.createProject({ id: dir.id, name: body.data.name, dir: dir.dir });
    req.log.info({ projectId: project.id }, "project created");
    return reply.code(201).send({ ok: true, project });
  });

  app.delete<ProjectParams>("/api/projects/:projectId", async (req, reply) => {
    const project = store.getProject(req.params.projectId);
    if (!project) return reply.code(404).send({ ok: false, error: "not_found" });

    const busy = store.listThreads(project.id).filter((t) => jobs.pendingFor(t.id) > 0);
    if (busy.length > 0) {
      return reply.code(409).send({ ok: false, error: "jobs_pending", threadIds: busy.map((t) => t.id) });
    }

    const rm = removeProjectDir(project.dir, projectsRoot);
    if (!rm.ok) return reply.code(500).send({ ok: false, error: "rm_failed", reason: rm.reason });
    store.deleteProject(project.id);
    req.log.info({ projectId: project.id }, "project deleted");
    return { ok: true, projectId: project.id };
  });

  app.get<ProjectParams>("/api/projects/:projectId/threads", async (req, reply) => {
    const project = store.getProject(req.params.projectId);
    if (!project) return reply.code(404).send({ ok: false, error: "not_found" });
    const threads = store.listThreads(project.id);
    return { ok: true, projectId: project.id, threads, count: threads.length };
  });

  app.post<ProjectParams>("/api/projects/:projectId/threads", async (req, reply) => {
    const project = store.getProject(req.params.projectId);
    if (!project) return reply.code(404).send({ ok: false, error: "not_found" });
    const body = createThreadBody.safeParse(req.body);
    if (!body.success) return reply.code(400).send({ ok: false, error: "bad_request" });

    const id = nanoid(10);
    const name = body.data?.name || `Thread ${id}`;
    const thread = store.createThread({ id, projectId: project.id, name });
    return reply.code(201).send({ ok: true, thread });
  });

  app.get<ThreadParams>("/api/threads/:threadId", async (req, reply) => {
    const thread = store.getThread(req.params.threadId);
    if (!thread) return reply.code(404).send({ ok: false, error: "not_found" });
    return { ok: true, thread: { ...thread, pending: jobs.pendingFor(thread.id) } };
  });

  app.delete<ThreadParams>("/api/threads/:threadId", async (req, reply) => {
    const thread = store.getThread(req.params.threadId);
    if (!thread) return reply.code(404).send({ ok: false, error: "not_found" });
    if (jobs.pendingFor(thread.id) > 0) return reply.code(409).send({ ok: false, error: "jobs_pending" });
    store.deleteThread(thread.id);
    return { ok: true, threadId: thread.id };
  });

  app.get<ThreadParams & { Querystring: { limit?: string } }>("/api/threads/:threadId/messages", async (req, reply) => {
    const thread = store.getThread(req.params.threadId);
    if (!thread) return reply.code(404).send({ ok: false, error: "not_found" });
    const limit = Number(req.query.limit ?? 500);
    const messages = store.listMessages(thread.id, Number.isFinite(limit) ? limit : 500);
    return { ok: true, threadId: thread.id, messages, count: messages.length };
  });

  app.get<ThreadParams>("/api/threads/:threadId/jobs", async (req, reply) => {
    const thread = store.getThread(req.params.threadId);
    if (!thread) return reply.code(404).send({ ok: false, error: "not_found" });
    return { ok: true, threadId: thread.id, jobs: jobs.listJobs(thread.id) };
  });

  app.post<ThreadParams>("/api/threads/:threadId/messages", async (req, reply) => {
    const body = sendMessageBody.safeParse(req.body);
    if (!body.success) return reply.code(400).send({ ok: false, error: "missing_message" });
    const thread = store.getThread(req.params.threadId);
    if (!thread) return reply.code(404).send({ ok: false, error: "not_found" });
    const project = store.getProject(thread.projectId);
    if (!project) return reply.code(404).send({ ok: false, error: "project_not_found" });

    const wd = validateWorkingDir(project.dir, projectsRoot);
    if (!wd.ok) return reply.code(409).send({ ok: false, error: "bad_working_dir", reason: wd.reason });

    const submitted = jobs.submit({ threadId: thread.id, cwd: wd.cwd, message: body.data.message });
    if (!submitted.ok) {
      const e = submitted.error;
      return reply.code(429).send({ ok: false, error: "capacity_exceeded", scope: e.scope, limit: e.limit, message: e.message });
    }
    return reply.code(202).send({ ok: true, jobId: submitted.job.id, threadId: thread.id, status: submitted.job.status });
  });

  app.get<{ Params: { jobId: string } }>("/api/jobs/:jobId", async (req, reply) => {
    const r = poller.status(req.params.jobId);
    const body = toStatusBody(r, req.params.jobId);
    if (!body.ok) return reply.code(404).send(body);
    return body;
  });

  return app;
}
