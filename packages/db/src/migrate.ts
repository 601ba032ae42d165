import type { RunwrightDatabase } from './connection.js';
import { sql } from 'drizzle-orm';

export function migrateDatabase(db: RunwrightDatabase): void {
  db.run(sql`CREATE TABLE IF NOT EXISTS runs (
    run_id TEXT PRIMARY KEY,
    workflow_name TEXT NOT NULL,
    status TEXT NOT NULL DEFAULT 'pending',
    request TEXT NOT NULL,
    workspace_path TEXT,
    workspace_branch TEXT,
    backend_ref TEXT,
    session_id TEXT,
    elapsed_seconds REAL,
    turn_count INTEGER,
    cost_estimate REAL,
    error_code TEXT,
    error_message TEXT,
    error_details TEXT,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    started_at TEXT,
    finished_at TEXT,
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    CONSTRAINT runs_status_ck
      CHECK (status IN ('pending', 'running', 'completed', 'failed', 'timed_out')),
    CONSTRAINT runs_finished_timestamp_ck
      CHECK (
        (status IN ('pending', 'running') AND finished_at IS NULL)
        OR (status IN ('completed', 'failed', 'timed_out') AND finished_at IS NOT NULL)
      )
  )`);
  db.run(sql`CREATE INDEX IF NOT EXISTS runs_status_idx
    ON runs(status)`);
  db.run(sql`CREATE INDEX IF NOT EXISTS runs_created_at_idx
    ON runs(created_at)`);

  db.run(sql`CREATE TABLE IF NOT EXISTS run_log_entries (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    run_id TEXT NOT NULL,
    sequence INTEGER NOT NULL,
    timestamp TEXT NOT NULL,
    event_type TEXT NOT NULL,
    data TEXT NOT NULL,
    is_final INTEGER NOT NULL DEFAULT 0,
    size_bytes INTEGER NOT NULL,
    CONSTRAINT run_log_entries_event_type_ck
      CHECK (event_type IN ('init', 'progress', 'completion', 'error', 'raw')),
    CONSTRAINT run_log_entries_sequence_ck
      CHECK (sequence >= 1)
  )`);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS run_log_entries_run_id_sequence_uq
    ON run_log_entries(run_id, sequence)`);

  db.run(sql`CREATE TABLE IF NOT EXISTS workspaces (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    path TEXT NOT NULL,
    branch TEXT NOT NULL,
    base_branch TEXT NOT NULL,
    run_id TEXT NOT NULL,
    owning_run_id TEXT,
    status TEXT NOT NULL DEFAULT 'active',
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    last_activity_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    removed_at TEXT,
    CONSTRAINT workspaces_status_ck
      CHECK (status IN ('active', 'removed')),
    CONSTRAINT workspaces_removed_timestamp_ck
      CHECK (
        (status = 'active' AND removed_at IS NULL)
        OR (status = 'removed' AND removed_at IS NOT NULL AND owning_run_id IS NULL)
      )
  )`);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS workspaces_active_path_uq
    ON workspaces(path) WHERE status = 'active'`);
  db.run(sql`CREATE UNIQUE INDEX IF NOT EXISTS workspaces_owning_run_id_uq
    ON workspaces(owning_run_id) WHERE owning_run_id IS NOT NULL`);
  db.run(sql`CREATE INDEX IF NOT EXISTS workspaces_run_id_idx
    ON workspaces(run_id)`);

  db.run(sql`CREATE TABLE IF NOT EXISTS workflow_definitions (
    name TEXT PRIMARY KEY,
    display_name TEXT NOT NULL,
    description TEXT,
    prompt_template TEXT NOT NULL,
    allowed_tools TEXT NOT NULL,
    suggested_max_turns INTEGER,
    source_path TEXT NOT NULL,
    content_hash TEXT NOT NULL,
    created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now')),
    updated_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ','now'))
  )`);
}
