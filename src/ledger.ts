import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import Database from "better-sqlite3";
import { LedgerError } from "./errors.js";
import { nullEventLog, type EventLog } from "./log.js";
import { ensureDir, errorMessage, isRecord, sleep } from "./utils.js";
import type { Config } from "./config.js";

export type TaskStatus = "running" | "completed" | "failed";

export type TaskRecord = {
  taskId: string;
  projectPath: string;
  agentKind: string;
  model?: string;
  status: TaskStatus;
  createdAt: string;
  finishedAt?: string;
  contentFingerprint: string;
  filesModified: string[];
  summary?: string;
  error?: string;
  cliOutput?: string;
  runnerPid?: number;
  sessionId?: string;
};

export type NewTaskRecord = {
  taskId: string;
  projectPath: string;
  agentKind: string;
  model?: string;
  contentFingerprint: string;
  createdAt: string;
};

export type TaskAnnotation = {
  runnerPid?: number;
  sessionId?: string;
};

export type TransitionResult =
  | { ok: true; record: TaskRecord }
  | { ok: false; reason: "not_found" }
  | { ok: false; reason: "already_terminal"; record: TaskRecord };

/**
 * Synchronous view handed to {@link TaskLedger.exclusive}. Every call sees
 * the committed state plus the writes made earlier in the same section.
 */
export interface LedgerView {
  findRunning(projectPath: string): TaskRecord | undefined;
  findRecentByFingerprint(fingerprint: string, since: string): TaskRecord | undefined;
  /** Fails the record only if it is still running. */
  markFailed(taskId: string, error: string, finishedAt: string): boolean;
  insert(record: TaskRecord): void;
}

export interface TaskLedger {
  init(): Promise<void>;
  close(): Promise<void>;
  create(input: NewTaskRecord): Promise<TaskRecord>;
  get(taskId: string): Promise<TaskRecord | undefined>;
  findRunning(projectPath: string): Promise<TaskRecord | undefined>;
  findRecentByFingerprint(fingerprint: string, withinMs: number, now?: Date): Promise<TaskRecord | undefined>;
  complete(taskId: string, filesModified: string[], summary: string, cliOutput?: string): Promise<TransitionResult>;
  fail(taskId: string, error: string): Promise<TransitionResult>;
  annotate(taskId: string, annotation: TaskAnnotation): Promise<TransitionResult>;
  listRecent(limit: number): Promise<TaskRecord[]>;
  listRunning(): Promise<TaskRecord[]>;
  exclusive<T>(fn: (view: LedgerView) => T): Promise<T>;
}

export type LedgerOptions = {
  eventLog?: EventLog;
  now?: () => Date;
  lockTimeoutMs?: number;
  staleLockMs?: number;
};

export function newRunningRecord(input: NewTaskRecord): TaskRecord {
  return {
    taskId: input.taskId,
    projectPath: input.projectPath,
    agentKind: input.agentKind,
    model: input.model,
    status: "running",
    createdAt: input.createdAt,
    contentFingerprint: input.contentFingerprint,
    filesModified: [],
  };
}

export function windowStart(withinMs: number, now: Date): string {
  return new Date(now.getTime() - withinMs).toISOString();
}

function newestFirst(a: TaskRecord, b: TaskRecord): number {
  return b.createdAt.localeCompare(a.createdAt) || b.taskId.localeCompare(a.taskId);
}

function isStatus(value: unknown): value is TaskStatus {
  return value === "running" || value === "completed" || value === "failed";
}

function optionalString(value: unknown): string | undefined {
  return typeof value === "string" ? value : undefined;
}

/** Validates a record read back from disk; anything malformed is rejected. */
export function parseTaskRecord(value: unknown): TaskRecord | undefined {
  if (!isRecord(value)) return undefined;
  const data = value;
  const { taskId, projectPath, agentKind, status, createdAt, contentFingerprint } = data;
  if (
    typeof taskId !== "string" ||
    typeof projectPath !== "string" ||
    typeof agentKind !== "string" ||
    !isStatus(status) ||
    typeof createdAt !== "string" ||
    typeof contentFingerprint !== "string"
  ) {
    return undefined;
  }
  const files = Array.isArray(data.filesModified)
    ? data.filesModified.filter((item): item is string => typeof item === "string")
    : [];
  return {
    taskId,
    projectPath,
    agentKind,
    model: optionalString(data.model),
    status,
    createdAt,
    finishedAt: optionalString(data.finishedAt),
    contentFingerprint,
    filesModified: files,
    summary: optionalString(data.summary),
    error: optionalString(data.error),
    cliOutput: optionalString(data.cliOutput),
    runnerPid: typeof data.runnerPid === "number" ? data.runnerPid : undefined,
    sessionId: optionalString(data.sessionId),
  };
}

function applyComplete(record: TaskRecord, finishedAt: string, filesModified: string[], summary: string, cliOutput?: string) {
  record.status = "completed";
  record.finishedAt = finishedAt;
  record.filesModified = [...filesModified];
  record.summary = summary;
  record.cliOutput = cliOutput;
}

function applyFail(record: TaskRecord, finishedAt: string, error: string) {
  record.status = "failed";
  record.finishedAt = finishedAt;
  record.error = error;
  record.summary ??= `Failed: ${error}`;
}

function applyAnnotation(record: TaskRecord, annotation: TaskAnnotation) {
  if (annotation.runnerPid !== undefined) record.runnerPid = annotation.runnerPid;
  if (annotation.sessionId !== undefined) record.sessionId = annotation.sessionId;
}

class MemoryView implements LedgerView {
  readonly inserted: TaskRecord[] = [];
  readonly failed: TaskRecord[] = [];

  constructor(private readonly records: TaskRecord[]) {}

  findRunning(projectPath: string): TaskRecord | undefined {
    return this.records
      .filter((record) => record.status === "running" && record.projectPath === projectPath)
      .sort(newestFirst)[0];
  }

  findRecentByFingerprint(fingerprint: string, since: string): TaskRecord | undefined {
    return this.records
      .filter((record) => record.contentFingerprint === fingerprint && record.createdAt >= since)
      .sort(newestFirst)[0];
  }

  markFailed(taskId: string, error: string, finishedAt: string): boolean {
    const record = this.records.find((item) => item.taskId === taskId);
    if (!record || record.status !== "running") return false;
    applyFail(record, finishedAt, error);
    this.failed.push(record);
    return true;
  }

  insert(record: TaskRecord): void {
    if (this.records.some((item) => item.taskId === record.taskId)) {
      throw new LedgerError("already_exists", `Task id collision: ${record.taskId}`);
    }
    this.records.push(record);
    this.inserted.push(record);
  }
}

/**
 * Deletes the lock at `lockPath` only while it still holds `staleToken`.
 * The lock is renamed aside before its owner is checked; a lock someone
 * else took in the meantime is linked back into place. Returns whether the
 * stale lock was removed.
 */
export async function breakStaleLock(lockPath: string, staleToken: string): Promise<boolean> {
  const aside = `${lockPath}.${process.pid}.${crypto.randomUUID()}.stale`;
  try {
    await fs.rename(lockPath, aside);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === "ENOENT") return false;
    throw error;
  }
  try {
    if ((await fs.readFile(aside, "utf8")) === staleToken) return true;
    try {
      await fs.link(aside, lockPath);
    } catch (error) {
      // A newer lock already took the path; its owner keeps it.
      if ((error as NodeJS.ErrnoException).code !== "EEXIST") throw error;
    }
    return false;
  } finally {
    await fs.unlink(aside).catch(() => undefined);
  }
}

/**
 * One JSON file per task under `<dataDir>/tasks`. Mutations hold an
 * exclusive lock file; record files are replaced by rename so readers in
 * other processes never observe a partial write.
 */
export class JsonLedger implements TaskLedger {
  private tasksDir: string;
  private lockPath: string;
  private log: EventLog;
  private now: () => Date;
  private lockTimeoutMs: number;
  private staleLockMs: number;

  constructor(private dataDir: string, options: LedgerOptions = {}) {
    this.tasksDir = path.join(this.dataDir, "tasks");
    this.lockPath = path.join(this.dataDir, "ledger.lock");
    this.log = options.eventLog ?? nullEventLog;
    this.now = options.now ?? (() => new Date());
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
    this.staleLockMs = options.staleLockMs ?? 30_000;
  }

  async init(): Promise<void> {
    try {
      await ensureDir(this.tasksDir);
    } catch (error) {
      throw new LedgerError("storage_unavailable", `Cannot create ${this.tasksDir}: ${errorMessage(error)}`, { cause: error });
    }
  }

  async close(): Promise<void> {
    return undefined;
  }

  private recordPath(taskId: string): string {
    return path.join(this.tasksDir, `${taskId}.json`);
  }

  private async readRecord(taskId: string): Promise<TaskRecord | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.recordPath(taskId), "utf8");
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === "ENOENT") return undefined;
      throw new LedgerError("storage_unavailable", `Cannot read task ${taskId}: ${err.message}`, { cause: error });
    }
    try {
      return parseTaskRecord(JSON.parse(raw));
    } catch {
      return undefined;
    }
  }

  private async readAll(): Promise<TaskRecord[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.tasksDir);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === "ENOENT") return [];
      throw new LedgerError("storage_unavailable", `Cannot list ${this.tasksDir}: ${err.message}`, { cause: error });
    }
    const ids = entries.filter((name) => name.endsWith(".json")).map((name) => name.slice(0, -".json".length));
    const records = await Promise.all(ids.map((id) => this.readRecord(id)));
    return records.filter((record): record is TaskRecord => record !== undefined);
  }

  private async writeRecord(record: TaskRecord): Promise<void> {
    const target = this.recordPath(record.taskId);
    const temp = `${target}.${process.pid}.${crypto.randomUUID()}.tmp`;
    try {
      await fs.writeFile(temp, JSON.stringify(record, null, 2), "utf8");
      await fs.rename(temp, target);
    } catch (error) {
      await fs.unlink(temp).catch(() => undefined);
      throw new LedgerError("storage_unavailable", `Cannot write task ${record.taskId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  private async clearStaleLock(): Promise<void> {
    let token: string;
    let mtimeMs: number;
    try {
      // Token before mtime: a lock replaced in between then looks fresh and is left alone.
      token = await fs.readFile(this.lockPath, "utf8");
      mtimeMs = (await fs.stat(this.lockPath)).mtimeMs;
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === "ENOENT") return;
      throw new LedgerError("storage_unavailable", `Cannot inspect ledger lock: ${err.message}`, { cause: error });
    }
    if (Date.now() - mtimeMs <= this.staleLockMs) return;

    let broken: boolean;
    try {
      broken = await breakStaleLock(this.lockPath, token);
    } catch (error) {
      throw new LedgerError("storage_unavailable", `Cannot break ledger lock: ${errorMessage(error)}`, { cause: error });
    }
    if (broken) await this.log.append("lock_broken", { owner: token });
  }

  private async releaseLock(token: string): Promise<void> {
    try {
      if ((await fs.readFile(this.lockPath, "utf8")) === token) await fs.unlink(this.lockPath);
    } catch (error) {
      const err = error as NodeJS.ErrnoException;
      if (err.code !== "ENOENT") await this.log.append("lock_release_failed", { error: err.message });
    }
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    const token = `${process.pid}:${crypto.randomUUID()}`;
    while (true) {
      try {
        const handle = await fs.open(this.lockPath, "wx");
        await handle.writeFile(token, "utf8");
        await handle.close();
        break;
      } catch (error) {
        const err = error as NodeJS.ErrnoException;
        if (err.code === "ENOENT") {
          await this.init();
          continue;
        }
        if (err.code !== "EEXIST") {
          throw new LedgerError("storage_unavailable", `Cannot acquire ledger lock: ${err.message}`, { cause: error });
        }
        if (Date.now() - start > this.lockTimeoutMs) {
          throw new LedgerError("lock_timeout", "Timed out waiting for ledger lock");
        }
        await this.clearStaleLock();
        await sleep(50);
      }
    }

    try {
      return await fn();
    } finally {
      await this.releaseLock(token);
    }
  }

  async create(input: NewTaskRecord): Promise<TaskRecord> {
    const record = newRunningRecord(input);
    await this.withLock(async () => {
      const existing = await this.readRecord(record.taskId);
      if (existing) throw new LedgerError("already_exists", `Task id collision: ${record.taskId}`);
      await this.writeRecord(record);
    });
    await this.log.append("task_create", { task: record });
    return record;
  }

  async get(taskId: string): Promise<TaskRecord | undefined> {
    return this.readRecord(taskId);
  }

  async findRunning(projectPath: string): Promise<TaskRecord | undefined> {
    return new MemoryView(await this.readAll()).findRunning(projectPath);
  }

  async findRecentByFingerprint(fingerprint: string, withinMs: number, now = this.now()): Promise<TaskRecord | undefined> {
    return new MemoryView(await this.readAll()).findRecentByFingerprint(fingerprint, windowStart(withinMs, now));
  }

  private async transition(
    taskId: string,
    event: string,
    requireRunning: boolean,
    mutate: (record: TaskRecord) => void
  ): Promise<TransitionResult> {
    const result = await this.withLock(async (): Promise<TransitionResult> => {
      const record = await this.readRecord(taskId);
      if (!record) return { ok: false, reason: "not_found" };
      if (requireRunning && record.status !== "running") {
        return { ok: false, reason: "already_terminal", record };
      }
      mutate(record);
      await this.writeRecord(record);
      return { ok: true, record };
    });
    if (result.ok) await this.log.append(event, { task: result.record });
    return result;
  }

  async complete(taskId: string, filesModified: string[], summary: string, cliOutput?: string): Promise<TransitionResult> {
    const finishedAt = this.now().toISOString();
    return this.transition(taskId, "task_complete", true, (record) =>
      applyComplete(record, finishedAt, filesModified, summary, cliOutput)
    );
  }

  async fail(taskId: string, error: string): Promise<TransitionResult> {
    const finishedAt = this.now().toISOString();
    return this.transition(taskId, "task_fail", true, (record) => applyFail(record, finishedAt, error));
  }

  async annotate(taskId: string, annotation: TaskAnnotation): Promise<TransitionResult> {
    return this.transition(taskId, "task_annotate", true, (record) => applyAnnotation(record, annotation));
  }

  async listRecent(limit: number): Promise<TaskRecord[]> {
    const records = (await this.readAll()).sort(newestFirst);
    return limit > 0 ? records.slice(0, limit) : records;
  }

  async listRunning(): Promise<TaskRecord[]> {
    return (await this.readAll()).filter((record) => record.status === "running").sort(newestFirst);
  }

  async exclusive<T>(fn: (view: LedgerView) => T): Promise<T> {
    const { result, view } = await this.withLock(async () => {
      const view = new MemoryView(await this.readAll());
      const result = fn(view);
      for (const record of [...view.failed, ...view.inserted]) {
        await this.writeRecord(record);
      }
      return { result, view };
    });
    for (const record of view.failed) await this.log.append("task_fail", { task: record });
    for (const record of view.inserted) await this.log.append("task_create", { task: record });
    return result;
  }
}

type TaskRow = {
  task_id: string;
  project_path: string;
  agent_kind: string;
  model: string | null;
  status: TaskStatus;
  created_at: string;
  finished_at: string | null;
  content_fingerprint: string;
  files_modified: string | null;
  summary: string | null;
  error: string | null;
  cli_output: string | null;
  runner_pid: number | null;
  session_id: string | null;
};

function parseFiles(raw: string | null): string[] {
  if (!raw) return [];
  try {
    const parsed: unknown = JSON.parse(raw);
    return Array.isArray(parsed) ? parsed.filter((item): item is string => typeof item === "string") : [];
  } catch {
    return [];
  }
}

function toLedgerError(error: unknown, action: string): unknown {
  if (error instanceof LedgerError) return error;
  if (error instanceof Database.SqliteError) {
    if (error.code === "SQLITE_BUSY" || error.code === "SQLITE_LOCKED") {
      return new LedgerError("lock_timeout", `${action}: database is busy`, { cause: error });
    }
    if (error.code.startsWith("SQLITE_CONSTRAINT")) {
      return new LedgerError("already_exists", `${action}: ${error.message}`, { cause: error });
    }
    return new LedgerError("storage_unavailable", `${action}: ${error.message}`, { cause: error });
  }
  return error;
}

export class SqliteLedger implements TaskLedger {
  private db?: Database.Database;
  private log: EventLog;
  private now: () => Date;
  private busyTimeoutMs: number;

  constructor(private dbPath: string, options: LedgerOptions = {}) {
    this.log = options.eventLog ?? nullEventLog;
    this.now = options.now ?? (() => new Date());
    this.busyTimeoutMs = options.lockTimeoutMs ?? 5000;
  }

  async init(): Promise<void> {
    try {
      await ensureDir(path.dirname(this.dbPath));
      this.db = new Database(this.dbPath);
      this.db.pragma("journal_mode = WAL");
      this.db.pragma(`busy_timeout = ${this.busyTimeoutMs}`);
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS tasks (
          task_id TEXT PRIMARY KEY,
          project_path TEXT NOT NULL,
          agent_kind TEXT NOT NULL,
          model TEXT,
          status TEXT NOT NULL,
          created_at TEXT NOT NULL,
          finished_at TEXT,
          content_fingerprint TEXT NOT NULL,
          files_modified TEXT,
          summary TEXT,
          error TEXT,
          cli_output TEXT,
          runner_pid INTEGER,
          session_id TEXT
        );

        CREATE INDEX IF NOT EXISTS tasks_project_status ON tasks (project_path, status);
        CREATE INDEX IF NOT EXISTS tasks_fingerprint ON tasks (content_fingerprint, created_at);
        CREATE INDEX IF NOT EXISTS tasks_created ON tasks (created_at);
      `);
    } catch (error) {
      throw toLedgerError(error, `Cannot open ${this.dbPath}`);
    }
  }

  async close(): Promise<void> {
    this.db?.close();
    this.db = undefined;
  }

  private getDb(): Database.Database {
    if (!this.db) throw new LedgerError("storage_unavailable", "Database not initialized");
    return this.db;
  }

  private run<T>(action: string, fn: (db: Database.Database) => T): T {
    try {
      return fn(this.getDb());
    } catch (error) {
      throw toLedgerError(error, action);
    }
  }

  private parseTask(row: TaskRow): TaskRecord {
    return {
      taskId: row.task_id,
      projectPath: row.project_path,
      agentKind: row.agent_kind,
      model: row.model ?? undefined,
      status: row.status,
      createdAt: row.created_at,
      finishedAt: row.finished_at ?? undefined,
      contentFingerprint: row.content_fingerprint,
      filesModified: parseFiles(row.files_modified),
      summary: row.summary ?? undefined,
      error: row.error ?? undefined,
      cliOutput: row.cli_output ?? undefined,
      runnerPid: row.runner_pid ?? undefined,
      sessionId: row.session_id ?? undefined,
    };
  }

  private selectById(db: Database.Database, taskId: string): TaskRecord | undefined {
    const row = db.prepare("SELECT * FROM tasks WHERE task_id = ?").get(taskId) as TaskRow | undefined;
    return row ? this.parseTask(row) : undefined;
  }

  private selectRunning(db: Database.Database, projectPath: string): TaskRecord | undefined {
    const row = db
      .prepare(
        "SELECT * FROM tasks WHERE project_path = ? AND status = 'running' ORDER BY created_at DESC, task_id DESC LIMIT 1"
      )
      .get(projectPath) as TaskRow | undefined;
    return row ? this.parseTask(row) : undefined;
  }

  private selectByFingerprint(db: Database.Database, fingerprint: string, since: string): TaskRecord | undefined {
    const row = db
      .prepare(
        `SELECT * FROM tasks WHERE content_fingerprint = ? AND created_at >= ?
         ORDER BY created_at DESC, task_id DESC LIMIT 1`
      )
      .get(fingerprint, since) as TaskRow | undefined;
    return row ? this.parseTask(row) : undefined;
  }

  private insertRow(db: Database.Database, record: TaskRecord): void {
    db.prepare(
      `INSERT INTO tasks (task_id, project_path, agent_kind, model, status, created_at, content_fingerprint, files_modified)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    ).run(
      record.taskId,
      record.projectPath,
      record.agentKind,
      record.model ?? null,
      record.status,
      record.createdAt,
      record.contentFingerprint,
      JSON.stringify(record.filesModified)
    );
  }

  private failRow(db: Database.Database, taskId: string, error: string, finishedAt: string): boolean {
    const info = db
      .prepare(
        `UPDATE tasks SET status = 'failed', finished_at = ?, error = ?, summary = COALESCE(summary, ?)
         WHERE task_id = ? AND status = 'running'`
      )
      .run(finishedAt, error, `Failed: ${error}`, taskId);
    return info.changes > 0;
  }

  async create(input: NewTaskRecord): Promise<TaskRecord> {
    const record = newRunningRecord(input);
    this.run(`Cannot create task ${record.taskId}`, (db) => this.insertRow(db, record));
    await this.log.append("task_create", { task: record });
    return record;
  }

  async get(taskId: string): Promise<TaskRecord | undefined> {
    return this.run(`Cannot read task ${taskId}`, (db) => this.selectById(db, taskId));
  }

  async findRunning(projectPath: string): Promise<TaskRecord | undefined> {
    return this.run("Cannot query running tasks", (db) => this.selectRunning(db, projectPath));
  }

  async findRecentByFingerprint(fingerprint: string, withinMs: number, now = this.now()): Promise<TaskRecord | undefined> {
    const since = windowStart(withinMs, now);
    return this.run("Cannot query by fingerprint", (db) => this.selectByFingerprint(db, fingerprint, since));
  }

  /** Runs a `WHERE status = 'running'` update and classifies a miss. */
  private async transition(
    taskId: string,
    event: string,
    update: (db: Database.Database) => number
  ): Promise<TransitionResult> {
    const result = this.run(`Cannot update task ${taskId}`, (db): TransitionResult => {
      const changes = update(db);
      const record = this.selectById(db, taskId);
      if (!record) return { ok: false, reason: "not_found" };
      if (changes === 0) return { ok: false, reason: "already_terminal", record };
      return { ok: true, record };
    });
    if (result.ok) await this.log.append(event, { task: result.record });
    return result;
  }

  async complete(taskId: string, filesModified: string[], summary: string, cliOutput?: string): Promise<TransitionResult> {
    const finishedAt = this.now().toISOString();
    return this.transition(taskId, "task_complete", (db) =>
      db
        .prepare(
          `UPDATE tasks SET status = 'completed', finished_at = ?, files_modified = ?, summary = ?, cli_output = ?
           WHERE task_id = ? AND status = 'running'`
        )
        .run(finishedAt, JSON.stringify(filesModified), summary, cliOutput ?? null, taskId).changes
    );
  }

  async fail(taskId: string, error: string): Promise<TransitionResult> {
    const finishedAt = this.now().toISOString();
    return this.transition(taskId, "task_fail", (db) => (this.failRow(db, taskId, error, finishedAt) ? 1 : 0));
  }

  async annotate(taskId: string, annotation: TaskAnnotation): Promise<TransitionResult> {
    return this.transition(taskId, "task_annotate", (db) =>
      db
        .prepare(
          `UPDATE tasks SET runner_pid = COALESCE(?, runner_pid), session_id = COALESCE(?, session_id)
           WHERE task_id = ? AND status = 'running'`
        )
        .run(annotation.runnerPid ?? null, annotation.sessionId ?? null, taskId).changes
    );
  }

  async listRecent(limit: number): Promise<TaskRecord[]> {
    return this.run("Cannot list tasks", (db) => {
      const sql = "SELECT * FROM tasks ORDER BY created_at DESC, task_id DESC";
      const rows = (limit > 0 ? db.prepare(`${sql} LIMIT ?`).all(limit) : db.prepare(sql).all()) as TaskRow[];
      return rows.map((row) => this.parseTask(row));
    });
  }

  async listRunning(): Promise<TaskRecord[]> {
    return this.run("Cannot list running tasks", (db) => {
      const rows = db
        .prepare("SELECT * FROM tasks WHERE status = 'running' ORDER BY created_at DESC, task_id DESC")
        .all() as TaskRow[];
      return rows.map((row) => this.parseTask(row));
    });
  }

  async exclusive<T>(fn: (view: LedgerView) => T): Promise<T> {
    const inserted: TaskRecord[] = [];
    const failed: string[] = [];
    const result = this.run("Cannot run ledger transaction", (db) => {
      const view: LedgerView = {
        findRunning: (projectPath) => this.selectRunning(db, projectPath),
        findRecentByFingerprint: (fingerprint, since) => this.selectByFingerprint(db, fingerprint, since),
        markFailed: (taskId, error, finishedAt) => {
          const changed = this.failRow(db, taskId, error, finishedAt);
          if (changed) failed.push(taskId);
          return changed;
        },
        insert: (record) => {
          this.insertRow(db, record);
          inserted.push(record);
        },
      };
      return db.transaction(() => fn(view)).immediate();
    });
    for (const taskId of failed) {
      const record = await this.get(taskId);
      await this.log.append("task_fail", { task: record ?? { taskId } });
    }
    for (const record of inserted) await this.log.append("task_create", { task: record });
    return result;
  }
}

export function createLedger(config: Config, eventLog?: EventLog): TaskLedger {
  if (config.storage === "json") {
    return new JsonLedger(config.dataDir, { eventLog });
  }
  return new SqliteLedger(config.dbPath, { eventLog });
}
