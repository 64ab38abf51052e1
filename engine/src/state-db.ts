/**
 * Cellar Engine — State Database
 *
 * Local SQLite database that tracks:
 * - Install runs (one row per request, with outcome and shortcut)
 * - Execution log (installer state transitions)
 *
 * Uses sql.js (Emscripten-compiled SQLite) for zero-native-dependency operation.
 * The database is persisted to disk on every write operation.
 */

import initSqlJs, { Database as SqlJsDatabase, SqlValue } from "sql.js";
import * as path from "path";
import * as fs from "fs";
import { z } from "zod";
import {
  InstallErrorInfo,
  InstallErrorKind,
  InstallRun,
  InstallStage,
  InstallStrategy,
  InstallerState,
  ShortcutEntry,
  StateLogEntry,
} from "./types";
import { Logger } from "./utils/logger";

// ─── Row Decoding ────────────────────────────────────────────────

const STRATEGIES: readonly InstallStrategy[] = ["file", "folder"];
const RUN_STATUSES: readonly InstallRun["status"][] = ["running", "succeeded", "failed"];
const ERROR_KINDS: readonly InstallErrorKind[] = [
  "ClassificationError",
  "EnvironmentError",
  "StagingError",
  "DiscoveryError",
  "DependencyInstallError",
  "ExecutionError",
  "ShortcutConflictError",
  "CancellationError",
];
const STAGES: readonly InstallStage[] = [
  "request",
  "lease",
  "classification",
  "environment",
  "staging",
  "copy",
  "discovery",
  "dependencies",
  "execution",
  "shortcut",
];
const STATES: readonly InstallerState[] = [
  "CREATED",
  "ENVIRONMENT_READY",
  "STAGED",
  "COPIED",
  "EXECUTABLE_DISCOVERED",
  "DEPENDENCIES_RESOLVED",
  "EXECUTED",
  "SHORTCUT_CREATED",
  "SHORTCUT_RECORDED",
  "DONE",
  "FAILED",
];

const StoredShortcutSchema = z.object({
  bottle_name: z.string(),
  display_name: z.string(),
  target_executable_path: z.string(),
  source: z.enum(["environment_native", "manual_record"]),
});

function text(value: SqlValue | undefined): string | null {
  return typeof value === "string" ? value : null;
}

function oneOf<T extends string>(values: readonly T[], value: SqlValue | undefined): T | null {
  return values.find((v) => v === value) ?? null;
}

function decodeShortcut(value: SqlValue | undefined): ShortcutEntry | null {
  const raw = text(value);
  if (raw === null) return null;
  try {
    const parsed = StoredShortcutSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export interface RunStart {
  execution_id: string;
  bottle_name: string;
  target_path: string;
  started_at: string;
}

export interface RunFinish {
  strategy?: InstallStrategy;
  status: "succeeded" | "failed";
  error?: InstallErrorInfo;
  shortcut?: ShortcutEntry;
  finished_at: string;
}

export class StateDB {
  private db: SqlJsDatabase | null = null;
  private dbPath: string;
  private logger: Logger;
  private initialized = false;

  constructor(dbPath: string, logger: Logger) {
    this.dbPath = dbPath;
    this.logger = logger;
  }

  /**
   * Initialize the database. Must be called before any operations.
   * sql.js requires async initialization.
   */
  async init(): Promise<void> {
    if (this.initialized) return;

    fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });

    const SQL = await initSqlJs();

    if (fs.existsSync(this.dbPath)) {
      this.db = new SQL.Database(fs.readFileSync(this.dbPath));
    } else {
      this.db = new SQL.Database();
    }

    this.initialized = true;
    this.initSchema();
    this.logger.debug({ path: this.dbPath }, "State database initialized");
  }

  private ensureInit(): SqlJsDatabase {
    if (!this.db || !this.initialized) {
      throw new Error("StateDB not initialized. Call init() first.");
    }
    return this.db;
  }

  /**
   * Persist database to disk.
   */
  private persist(): void {
    const db = this.ensureInit();
    fs.writeFileSync(this.dbPath, Buffer.from(db.export()));
  }

  private initSchema(): void {
    const db = this.ensureInit();
    db.run(`
      CREATE TABLE IF NOT EXISTS install_runs (
        execution_id   TEXT    PRIMARY KEY,
        bottle_name    TEXT    NOT NULL,
        target_path    TEXT    NOT NULL,
        strategy       TEXT,
        status         TEXT    NOT NULL,
        error_kind     TEXT,
        error_stage    TEXT,
        error_message  TEXT,
        shortcut       TEXT,
        started_at     TEXT    NOT NULL,
        finished_at    TEXT
      )
    `);

    db.run(`
      CREATE TABLE IF NOT EXISTS install_log (
        id            INTEGER PRIMARY KEY AUTOINCREMENT,
        execution_id  TEXT    NOT NULL,
        bottle_name   TEXT    NOT NULL,
        state         TEXT    NOT NULL,
        entered_at    TEXT    NOT NULL
      )
    `);

    db.run(`
      CREATE INDEX IF NOT EXISTS idx_log_execution
        ON install_log (execution_id)
    `);
    db.run(`
      CREATE INDEX IF NOT EXISTS idx_runs_bottle
        ON install_runs (bottle_name)
    `);

    this.persist();
  }

  // ─── Install Runs ────────────────────────────────────────────

  recordRunStart(run: RunStart): void {
    const db = this.ensureInit();
    db.run(
      `INSERT INTO install_runs
         (execution_id, bottle_name, target_path, status, started_at)
       VALUES (?, ?, ?, 'running', ?)`,
      [run.execution_id, run.bottle_name, run.target_path, run.started_at],
    );
    this.persist();
  }

  recordRunFinish(executionId: string, finish: RunFinish): void {
    const db = this.ensureInit();
    db.run(
      `UPDATE install_runs
       SET strategy = ?, status = ?, error_kind = ?, error_stage = ?,
           error_message = ?, shortcut = ?, finished_at = ?
       WHERE execution_id = ?`,
      [
        finish.strategy ?? null,
        finish.status,
        finish.error?.kind ?? null,
        finish.error?.stage ?? null,
        finish.error?.message ?? null,
        finish.shortcut ? JSON.stringify(finish.shortcut) : null,
        finish.finished_at,
        executionId,
      ],
    );
    this.persist();
    this.logger.debug(
      { execution_id: executionId, status: finish.status },
      "Recorded install run",
    );
  }

  /**
   * Most recent runs first, optionally for one bottle.
   */
  getRuns(bottleName?: string, limit: number = 20): InstallRun[] {
    const db = this.ensureInit();
    const stmt = db.prepare(
      bottleName === undefined
        ? `SELECT * FROM install_runs ORDER BY started_at DESC, rowid DESC LIMIT ?`
        : `SELECT * FROM install_runs WHERE bottle_name = ?
           ORDER BY started_at DESC, rowid DESC LIMIT ?`,
    );
    stmt.bind(bottleName === undefined ? [limit] : [bottleName, limit]);

    const results: InstallRun[] = [];
    while (stmt.step()) {
      const row = stmt.getAsObject();
      results.push({
        execution_id: text(row.execution_id) ?? "",
        bottle_name: text(row.bottle_name) ?? "",
        target_path: text(row.target_path) ?? "",
        strategy: oneOf(STRATEGIES, row.strategy),
        status: oneOf(RUN_STATUSES, row.status) ?? "running",
        error_kind: oneOf(ERROR_KINDS, row.error_kind),
        error_stage: oneOf(STAGES, row.error_stage),
        error_message: text(row.error_message),
        shortcut: decodeShortcut(row.shortcut),
        started_at: text(row.started_at) ?? "",
        finished_at: text(row.finished_at),
      });
    }
    stmt.free();

    return results;
  }

  // ─── Execution Log ──────────────────────────────────────────

  logStateTransition(executionId: string, bottleName: string, state: InstallerState): void {
    const db = this.ensureInit();
    db.run(
      `INSERT INTO install_log (execution_id, bottle_name, state, entered_at)
       VALUES (?, ?, ?, ?)`,
      [executionId, bottleName, state, new Date().toISOString()],
    );
    this.persist();
  }

  getExecutionLog(executionId: string): StateLogEntry[] {
    const db = this.ensureInit();
    const stmt = db.prepare(
      `SELECT state, entered_at FROM install_log
       WHERE execution_id = ?
       ORDER BY id ASC`,
    );
    stmt.bind([executionId]);

    const results: StateLogEntry[] = [];
    while (stmt.step()) {
      const row = stmt.getAsObject();
      const state = oneOf(STATES, row.state);
      if (state === null) continue;
      results.push({ state, entered_at: text(row.entered_at) ?? "" });
    }
    stmt.free();

    return results;
  }

  /**
   * Close the database connection and persist final state.
   */
  close(): void {
    if (this.db) {
      if (this.initialized) {
        this.persist();
      }
      this.db.close();
      this.db = null;
      this.initialized = false;
    }
    this.logger.debug("State database closed");
  }
}
