import { sql } from 'drizzle-orm';
import { check, index, integer, real, sqliteTable, text, uniqueIndex } from 'drizzle-orm/sqlite-core';
import type { RunRequest } from '@runwright/shared';

const utcNow = sql`(strftime('%Y-%m-%dT%H:%M:%fZ','now'))`;

export const runs = sqliteTable(
  'runs',
  {
    runId: text('run_id').primaryKey(),
    workflowName: text('workflow_name').notNull(),
    status: text('status').notNull().default('pending'),
    request: text('request', { mode: 'json' }).$type<RunRequest>().notNull(),
    workspacePath: text('workspace_path'),
    workspaceBranch: text('workspace_branch'),
    backendRef: text('backend_ref'),
    sessionId: text('session_id'),
    elapsedSeconds: real('elapsed_seconds'),
    turnCount: integer('turn_count'),
    costEstimate: real('cost_estimate'),
    errorCode: text('error_code'),
    errorMessage: text('error_message'),
    errorDetails: text('error_details', { mode: 'json' }).$type<Record<string, unknown>>(),
    createdAt: text('created_at').notNull().default(utcNow),
    startedAt: text('started_at'),
    finishedAt: text('finished_at'),
    updatedAt: text('updated_at').notNull().default(utcNow),
  },
  table => ({
    statusCheck: check(
      'runs_status_ck',
      sql`${table.status} in ('pending', 'running', 'completed', 'failed', 'timed_out')`,
    ),
    finishedTimestampCheck: check(
      'runs_finished_timestamp_ck',
      sql`(
        ${table.status} in ('pending', 'running')
        and ${table.finishedAt} is null
      ) or (
        ${table.status} in ('completed', 'failed', 'timed_out')
        and ${table.finishedAt} is not null
      )`,
    ),
    statusIdx: index('runs_status_idx').on(table.status),
    createdAtIdx: index('runs_created_at_idx').on(table.createdAt),
  }),
);

export const runLogEntries = sqliteTable(
  'run_log_entries',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    runId: text('run_id').notNull(),
    sequence: integer('sequence').notNull(),
    timestamp: text('timestamp').notNull(),
    eventType: text('event_type').notNull(),
    data: text('data', { mode: 'json' }).$type<Record<string, unknown>>().notNull(),
    isFinal: integer('is_final', { mode: 'boolean' }).notNull().default(false),
    sizeBytes: integer('size_bytes').notNull(),
  },
  table => ({
    eventTypeCheck: check(
      'run_log_entries_event_type_ck',
      sql`${table.eventType} in ('init', 'progress', 'completion', 'error', 'raw')`,
    ),
    sequenceCheck: check('run_log_entries_sequence_ck', sql`${table.sequence} >= 1`),
    runSequenceUnique: uniqueIndex('run_log_entries_run_id_sequence_uq').on(table.runId, table.sequence),
  }),
);

export const workspaces = sqliteTable(
  'workspaces',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    path: text('path').notNull(),
    branch: text('branch').notNull(),
    baseBranch: text('base_branch').notNull(),
    runId: text('run_id').notNull(),
    owningRunId: text('owning_run_id'),
    status: text('status').notNull().default('active'),
    createdAt: text('created_at').notNull().default(utcNow),
    lastActivityAt: text('last_activity_at').notNull().default(utcNow),
    removedAt: text('removed_at'),
  },
  table => ({
    statusCheck: check('workspaces_status_ck', sql`${table.status} in ('active', 'removed')`),
    removedTimestampCheck: check(
      'workspaces_removed_timestamp_ck',
      sql`(
        ${table.status} = 'active'
        and ${table.removedAt} is null
      ) or (
        ${table.status} = 'removed'
        and ${table.removedAt} is not null
        and ${table.owningRunId} is null
      )`,
    ),
    activePathUnique: uniqueIndex('workspaces_active_path_uq')
      .on(table.path)
      .where(sql`${table.status} = 'active'`),
    owningRunUnique: uniqueIndex('workspaces_owning_run_id_uq')
      .on(table.owningRunId)
      .where(sql`${table.owningRunId} is not null`),
    runIdIdx: index('workspaces_run_id_idx').on(table.runId),
  }),
);

export const workflowDefinitions = sqliteTable('workflow_definitions', {
  name: text('name').primaryKey(),
  displayName: text('display_name').notNull(),
  description: text('description'),
  promptTemplate: text('prompt_template').notNull(),
  allowedTools: text('allowed_tools', { mode: 'json' }).$type<string[]>().notNull(),
  suggestedMaxTurns: integer('suggested_max_turns'),
  sourcePath: text('source_path').notNull(),
  contentHash: text('content_hash').notNull(),
  createdAt: text('created_at').notNull().default(utcNow),
  updatedAt: text('updated_at').notNull().default(utcNow),
});
