/**
 * Initial schema: finished task results, finished workflows, agent descriptors.
 *
 * SAFETY: All DDL is static SQL. No user input is interpolated.
 */

import type Database from "better-sqlite3";

const MIGRATION_ID = "001-initial";

const CREATE_WORKFLOWS = `
CREATE TABLE IF NOT EXISTS workflows (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  mode TEXT NOT NULL,
  state TEXT NOT NULL,
  task_count INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  completed_at TEXT
)`;

const CREATE_TASK_RESULTS = `
CREATE TABLE IF NOT EXISTS task_results (
  task_id TEXT PRIMARY KEY,
  workflow_id TEXT NOT NULL,
  task_key TEXT NOT NULL,
  type TEXT NOT NULL,
  state TEXT NOT NULL,
  attempt INTEGER NOT NULL,
  assigned_agent TEXT,
  result TEXT,
  error_kind TEXT,
  error_detail TEXT,
  updated_at TEXT NOT NULL
)`;

const CREATE_AGENT_CONFIGS = `
CREATE TABLE IF NOT EXISTS agent_configs (
  agent_id TEXT PRIMARY KEY,
  name TEXT,
  role TEXT NOT NULL,
  capabilities TEXT NOT NULL DEFAULT '[]',
  model_preference TEXT NOT NULL DEFAULT '[]',
  updated_at TEXT DEFAULT (datetime('now'))
)`;

const CREATE_INDEXES = [
  "CREATE INDEX IF NOT EXISTS idx_task_results_workflow ON task_results(workflow_id)",
  "CREATE INDEX IF NOT EXISTS idx_workflows_state ON workflows(state)",
] as const;

const DROP_INDEXES = [
  "DROP INDEX IF EXISTS idx_workflows_state",
  "DROP INDEX IF EXISTS idx_task_results_workflow",
] as const;

const DROP_TABLES = [
  "DROP TABLE IF EXISTS agent_configs",
  "DROP TABLE IF EXISTS task_results",
  "DROP TABLE IF EXISTS workflows",
] as const;

export function up(db: Database.Database): void {
  db.exec(CREATE_WORKFLOWS);
  db.exec(CREATE_TASK_RESULTS);
  db.exec(CREATE_AGENT_CONFIGS);

  for (const sql of CREATE_INDEXES) {
    db.exec(sql);
  }
}

export function down(db: Database.Database): void {
  db.transaction(() => {
    for (const sql of DROP_INDEXES) {
      db.exec(sql);
    }
    for (const sql of DROP_TABLES) {
      db.exec(sql);
    }
  })();
}

export { MIGRATION_ID };
