/**
 * SQLite persistence adapter.
 * Uses better-sqlite3 with WAL mode. Runs migrations on open.
 * Writes are synchronous under the hood; the async surface matches IPersistenceAdapter.
 */

import Database from "better-sqlite3";
import { chmodSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { IAgentDescriptor } from "../types/agent.js";
import type { ITask, IWorkflowSnapshot } from "../types/task.js";
import { logger } from "../utils/logger.js";
import { ensureSecureDirectory, getDatabasePath } from "../utils/pathResolver.js";
import type { IPersistenceAdapter } from "./types.js";
import { MIGRATION_ID as INITIAL_MIGRATION_ID, up as initialMigrationUp } from "./migrations/001-initial.js";

const MIGRATIONS_TABLE_DDL = `
CREATE TABLE IF NOT EXISTS _migrations (
  id TEXT PRIMARY KEY,
  applied_at TEXT DEFAULT (datetime('now'))
)`;

const IN_MEMORY = ":memory:";

interface IMigration {
  readonly id: string;
  readonly up: (db: Database.Database) => void;
}

const MIGRATIONS: readonly IMigration[] = [
  { id: INITIAL_MIGRATION_ID, up: initialMigrationUp },
] as const;

// ── Row Schemas ───────────────────────────────────────────────────────

const StringListSchema = z.array(z.string());

const AgentConfigRowSchema = z.object({
  agent_id: z.string(),
  name: z.string().nullable(),
  role: z.string(),
  capabilities: z.string(),
  model_preference: z.string(),
});

const TaskResultRowSchema = z.object({
  task_id: z.string(),
  workflow_id: z.string(),
  task_key: z.string(),
  type: z.string(),
  state: z.string(),
  attempt: z.number(),
  assigned_agent: z.string().nullable(),
  result: z.string().nullable(),
  error_kind: z.string().nullable(),
  error_detail: z.string().nullable(),
  updated_at: z.string(),
});

export interface IStoredTaskResult {
  readonly taskId: string;
  readonly workflowId: string;
  readonly key: string;
  readonly type: string;
  readonly state: string;
  readonly attempt: number;
  readonly assignedAgent?: string | undefined;
  readonly result?: unknown;
  readonly error?: { readonly kind: string; readonly detail: string } | undefined;
  readonly updatedAt: string;
}

// ── SqlitePersistence ─────────────────────────────────────────────────

export class SqlitePersistence implements IPersistenceAdapter {
  private db: Database.Database | undefined;
  private closed = false;

  get database(): Database.Database {
    if (this.closed || !this.db) {
      throw new Error("SqlitePersistence is closed or not initialized");
    }
    return this.db;
  }

  /** Open (or create) the database. Accepts ":memory:". */
  open(dbPath?: string): void {
    if (this.db) {
      return;
    }

    const resolvedPath = dbPath ?? getDatabasePath();
    const onDisk = resolvedPath !== IN_MEMORY;
    if (onDisk) {
      ensureSecureDirectory(dirname(resolvedPath));
    }

    logger.info({ path: resolvedPath }, "Opening SQLite database");
    this.db = new Database(resolvedPath);
    this.closed = false;

    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 5000");
    this.db.pragma("synchronous = NORMAL");

    if (onDisk) {
      try {
        chmodSync(resolvedPath, 0o600);
      } catch (error: unknown) {
        const reason = error instanceof Error ? error.message : String(error);
        logger.warn({ path: resolvedPath, error: reason }, "Could not set database file permissions to 600");
      }
    }

    this.runMigrations();
  }

  async saveTaskResult(task: Readonly<ITask>): Promise<void> {
    this.database
      .prepare(
        `INSERT INTO task_results
           (task_id, workflow_id, task_key, type, state, attempt, assigned_agent, result, error_kind, error_detail, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(task_id) DO UPDATE SET
           state = excluded.state,
           attempt = excluded.attempt,
           assigned_agent = excluded.assigned_agent,
           result = excluded.result,
           error_kind = excluded.error_kind,
           error_detail = excluded.error_detail,
           updated_at = excluded.updated_at`,
      )
      .run(
        task.id,
        task.workflowId,
        task.key,
        task.type,
        task.state,
        task.attempt,
        task.assignedAgent ?? null,
        task.result === undefined ? null : JSON.stringify(task.result),
        task.error?.kind ?? null,
        task.error?.detail ?? null,
        task.updatedAt.toISOString(),
      );
    logger.debug({ taskId: task.id, state: task.state }, "Task result persisted");
  }

  async saveWorkflow(workflow: IWorkflowSnapshot): Promise<void> {
    this.database
      .prepare(
        `INSERT INTO workflows (id, name, mode, state, task_count, created_at, completed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           state = excluded.state,
           completed_at = excluded.completed_at`,
      )
      .run(
        workflow.id,
        workflow.name,
        workflow.mode,
        workflow.state,
        workflow.tasks.length,
        workflow.createdAt.toISOString(),
        workflow.completedAt?.toISOString() ?? null,
      );
  }

  async loadAgentConfig(agentId: string): Promise<IAgentDescriptor | undefined> {
    const raw: unknown = this.database.prepare("SELECT * FROM agent_configs WHERE agent_id = ?").get(agentId);
    if (raw === undefined) {
      return undefined;
    }

    const row = AgentConfigRowSchema.parse(raw);
    return {
      id: row.agent_id,
      name: row.name ?? undefined,
      role: row.role,
      capabilities: parseStringList(row.capabilities),
      modelPreference: parseStringList(row.model_preference),
    };
  }

  /** Store a descriptor so a restarted agent can be registered with the same settings. */
  async saveAgentConfig(agentId: string, descriptor: IAgentDescriptor): Promise<void> {
    this.database
      .prepare(
        `INSERT INTO agent_configs (agent_id, name, role, capabilities, model_preference, updated_at)
         VALUES (?, ?, ?, ?, ?, datetime('now'))
         ON CONFLICT(agent_id) DO UPDATE SET
           name = excluded.name,
           role = excluded.role,
           capabilities = excluded.capabilities,
           model_preference = excluded.model_preference,
           updated_at = excluded.updated_at`,
      )
      .run(
        agentId,
        descriptor.name ?? null,
        descriptor.role,
        JSON.stringify(descriptor.capabilities),
        JSON.stringify(descriptor.modelPreference ?? []),
      );
  }

  listTaskResults(workflowId: string): IStoredTaskResult[] {
    const rows: unknown[] = this.database
      .prepare("SELECT * FROM task_results WHERE workflow_id = ? ORDER BY rowid")
      .all(workflowId);

    return rows.map((raw) => {
      const row = TaskResultRowSchema.parse(raw);
      const result: unknown = row.result === null ? undefined : JSON.parse(row.result);
      return {
        taskId: row.task_id,
        workflowId: row.workflow_id,
        key: row.task_key,
        type: row.type,
        state: row.state,
        attempt: row.attempt,
        assignedAgent: row.assigned_agent ?? undefined,
        result,
        error:
          row.error_kind !== null && row.error_detail !== null
            ? { kind: row.error_kind, detail: row.error_detail }
            : undefined,
        updatedAt: row.updated_at,
      };
    });
  }

  close(): void {
    if (this.closed || !this.db) {
      return;
    }

    logger.info("Closing SQLite database");
    this.closed = true;

    try {
      this.db.pragma("wal_checkpoint(TRUNCATE)");
      this.db.close();
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message }, "Error closing database");
    }

    this.db = undefined;
  }

  private runMigrations(): void {
    const db = this.database;
    db.exec(MIGRATIONS_TABLE_DDL);

    const appliedStmt = db.prepare("SELECT id FROM _migrations WHERE id = ?");
    const insertStmt = db.prepare("INSERT INTO _migrations (id) VALUES (?)");

    for (const migration of MIGRATIONS) {
      if (appliedStmt.get(migration.id) !== undefined) continue;

      logger.info({ migrationId: migration.id }, "Running migration");
      db.transaction(() => {
        migration.up(db);
        insertStmt.run(migration.id);
      })();
      logger.info({ migrationId: migration.id }, "Migration applied");
    }
  }
}

function parseStringList(json: string): string[] {
  const parsed: unknown = JSON.parse(json);
  return StringListSchema.parse(parsed);
}
