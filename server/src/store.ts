import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";

export type ProjectRow = {
  id: string;
  name: string;
  dir: string;
  createdAt: number;
};

export type ProjectListItem = ProjectRow & { threadCount: number };

export type ThreadRow = {
  id: string;
  projectId: string;
  name: string;
  sessionId: string | null;
  messageCount: number;
  lastActivity: number | null;
  createdAt: number;
};

export type MessageRole = "user" | "assistant";

export type MessageRow = {
  id: number;
  threadId: string;
  jobId: string | null;
  ts: number;
  role: MessageRole;
  content: string;
};

type MessageDbRow = Omit<MessageRow, "role"> & { role: string };

export type Store = ReturnType<typeof createStore>;

export function createStore(baseDir: string) {
  fs.mkdirSync(baseDir, { recursive: true });
  const dbPath = path.join(baseDir, "data.sqlite");
  const db = new Database(dbPath);

  db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");

  db.exec(`
    CREATE TABLE IF NOT EXISTS projects (
      id TEXT PRIMARY KEY,
      name TEXT NOT NULL,
      dir TEXT NOT NULL,
      createdAt INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS threads (
      id TEXT PRIMARY KEY,
      projectId TEXT NOT NULL REFERENCES projects(id) ON DELETE CASCADE,
      name TEXT NOT NULL,
      sessionId TEXT,
      messageCount INTEGER NOT NULL DEFAULT 0,
      lastActivity INTEGER,
      createdAt INTEGER NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_threads_projectId ON threads(projectId, createdAt);

    CREATE TABLE IF NOT EXISTS messages (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      threadId TEXT NOT NULL REFERENCES threads(id) ON DELETE CASCADE,
      jobId TEXT,
      ts INTEGER NOT NULL,
      role TEXT NOT NULL,
      content TEXT NOT NULL
    );
    CREATE INDEX IF NOT EXISTS idx_messages_threadId ON messages(threadId, id);
  `);

  const stmtCreateProject = db.prepare<ProjectRow>(
    "INSERT INTO projects (id, name, dir, createdAt) VALUES (@id, @name, @dir, @createdAt)",
  );
  const stmtListProjects = db.prepare<[], ProjectListItem>(`
    SELECT p.id, p.name, p.dir, p.createdAt, COUNT(t.id) AS threadCount
    FROM projects p
    LEFT JOIN threads t ON t.projectId = p.id
    GROUP BY p.id
    ORDER BY p.createdAt DESC, p.id ASC
  `);
  const stmtGetProject = db.prepare<[string], ProjectRow>("SELECT id, name, dir, createdAt FROM projects WHERE id = ?");
  const stmtDeleteProject = db.prepare<[string]>("DELETE FROM projects WHERE id = ?");

  const stmtCreateThread = db.prepare<Pick<ThreadRow, "id" | "projectId" | "name" | "createdAt">>(
    "INSERT INTO threads (id, projectId, name, sessionId, messageCount, lastActivity, createdAt) VALUES (@id, @projectId, @name, NULL, 0, NULL, @createdAt)",
  );
  const stmtListThreads = db.prepare<[string], ThreadRow>(
    "SELECT * FROM threads WHERE projectId = ? ORDER BY createdAt DESC, id ASC",
  );
  const stmtGetThread = db.prepare<[string], ThreadRow>("SELECT * FROM threads WHERE id = ?");
  const stmtDeleteThread = db.prepare<[string]>("DELETE FROM threads WHERE id = ?");
  const stmtGetSessionId = db.prepare<[string], { sessionId: string | null }>(
    "SELECT sessionId FROM threads WHERE id = ?",
  );
  const stmtSetSessionId = db.prepare<[string, string]>("UPDATE threads SET sessionId = ? WHERE id = ?");
  const stmtBumpThread = db.prepare<[number, string]>(
    "UPDATE threads SET messageCount = messageCount + 1, lastActivity = ? WHERE id = ?",
  );

  const stmtInsertMessage = db.prepare<Omit<MessageRow, "id">>(
    "INSERT INTO messages (threadId, jobId, ts, role, content) VALUES (@threadId, @jobId, @ts, @role, @content)",
  );
  const stmtListMessages = db.prepare<[string, number], MessageDbRow>(
    "SELECT id, threadId, jobId, ts, role, content FROM messages WHERE threadId = ? ORDER BY id ASC LIMIT ?",
  );

  function createProject(input: { id: string; name: string; dir: string }): ProjectRow {
    const row: ProjectRow = { ...input, createdAt: Date.now() };
    stmtCreateProject.run(row);
    return row;
  }

  function listProjects(): ProjectListItem[] {
    return stmtListProjects.all();
  }

  function getProject(id: string): ProjectRow | null {
    return stmtGetProject.get(id) ?? null;
  }

  function deleteProject(id: string): boolean {
    return stmtDeleteProject.run(id).changes > 0;
  }

  function createThread(input: { id: string; projectId: string; name: string }): ThreadRow {
    const createdAt = Date.now();
    stmtCreateThread.run({ ...input, createdAt });
    return { ...input, sessionId: null, messageCount: 0, lastActivity: null, createdAt };
  }

  function listThreads(projectId: string): ThreadRow[] {
    return stmtListThreads.all(projectId);
  }

  function getThread(id: string): ThreadRow | null {
    return stmtGetThread.get(id) ?? null;
  }

  function deleteThread(id: string): boolean {
    return stmtDeleteThread.run(id).changes > 0;
  }

  function getSessionId(threadId: string): string | null {
    return stmtGetSessionId.get(threadId)?.sessionId ?? null;
  }

  function setSessionId(threadId: string, sessionId: string): boolean {
    return stmtSetSessionId.run(sessionId, threadId).changes > 0;
  }

  const recordExchangeTx = db.transaction(
    (input: { threadId: string; jobId: string; message: string; response: string; ts: number }) => {
      stmtInsertMessage.run({ threadId: input.threadId, jobId: input.jobId, ts: input.ts, role: "user", content: input.message });
      stmtInsertMessage.run({
        threadId: input.threadId,
        jobId: input.jobId,
        ts: input.ts,
        role: "assistant",
        content: input.response,
      });
      stmtBumpThread.run(input.ts, input.threadId);
    },
  );

  /** Appends one user/assistant pair and bumps the thread's counters atomically. */
  function recordExchange(input: { threadId: string; jobId: string; message: string; response: string; ts: number }) {
    if (!getThread(input.threadId)) return false;
    recordExchangeTx(input);
    return true;
  }

  function listMessages(threadId: string, limit = 500): MessageRow[] {
    const n = Math.max(1, Math.min(5000, Math.floor(limit)));
    return stmtListMessages.all(threadId, n).map((r): MessageRow => ({ ...r, role: r.role === "user" ? "user" : "assistant" }));
  }

  function close() {
    db.close();
  }

  return {
    createProject,
    listProjects,
    getProject,
    deleteProject,
    createThread,
    listThreads,
    getThread,
    deleteThread,
    getSessionId,
    setSessionId,
    recordExchange,
    listMessages,
    close,
  };
}
