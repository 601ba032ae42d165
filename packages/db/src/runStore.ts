import { and, asc, eq, inArray } from 'drizzle-orm';
import type { RunRecord, RunRecordPatch, RunStatus, RunStore } from '@runwright/shared';
import type { RunwrightDatabase } from './connection.js';
import { runs } from './schema.js';

type RunRow = typeof runs.$inferSelect;
type RunUpdate = Partial<typeof runs.$inferInsert>;

const runStatuses: readonly RunStatus[] = ['pending', 'running', 'completed', 'failed', 'timed_out'];

function assertKnownRunStatus(status: string): asserts status is RunStatus {
  if (!runStatuses.some(knownStatus => knownStatus === status)) {
    throw new Error(`Unknown run status: ${status}`);
  }
}

function toRunRecord(row: RunRow): RunRecord {
  assertKnownRunStatus(row.status);

  return {
    runId: row.runId,
    workflowName: row.workflowName,
    status: row.status,
    request: row.request,
    workspace: row.workspacePath !== null && row.workspaceBranch !== null
      ? { path: row.workspacePath, branch: row.workspaceBranch }
      : null,
    backendRef: row.backendRef,
    sessionId: row.sessionId,
    createdAt: row.createdAt,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt,
    metrics: {
      elapsedSeconds: row.elapsedSeconds,
      turnCount: row.turnCount,
      costEstimate: row.costEstimate,
    },
    error: row.errorCode !== null && row.errorMessage !== null
      ? {
          code: row.errorCode,
          message: row.errorMessage,
          ...(row.errorDetails ? { details: row.errorDetails } : {}),
        }
      : null,
  };
}

function toRunUpdate(patch: RunRecordPatch, occurredAt: string): RunUpdate {
  const update: RunUpdate = {
    updatedAt: occurredAt,
    status: patch.status,
    backendRef: patch.backendRef,
    sessionId: patch.sessionId,
    startedAt: patch.startedAt,
    finishedAt: patch.finishedAt,
  };

  if (patch.workspace !== undefined) {
    update.workspacePath = patch.workspace?.path ?? null;
    update.workspaceBranch = patch.workspace?.branch ?? null;
  }

  if (patch.metrics !== undefined) {
    update.elapsedSeconds = patch.metrics.elapsedSeconds;
    update.turnCount = patch.metrics.turnCount;
    update.costEstimate = patch.metrics.costEstimate;
  }

  if (patch.error !== undefined) {
    update.errorCode = patch.error?.code ?? null;
    update.errorMessage = patch.error?.message ?? null;
    update.errorDetails = patch.error?.details ?? null;
  }

  return update;
}

export function createSqliteRunStore(
  db: RunwrightDatabase,
  options: { now?: () => Date } = {},
): RunStore {
  const now = options.now ?? (() => new Date());

  function getRunSync(runId: string): RunRecord | null {
    const row = db.select().from(runs).where(eq(runs.runId, runId)).get();
    return row ? toRunRecord(row) : null;
  }

  return {
    async createRun(record) {
      db.insert(runs)
        .values({
          runId: record.runId,
          workflowName: record.workflowName,
          status: record.status,
          request: record.request,
          workspacePath: record.workspace?.path ?? null,
          workspaceBranch: record.workspace?.branch ?? null,
          backendRef: record.backendRef,
          sessionId: record.sessionId,
          elapsedSeconds: record.metrics.elapsedSeconds,
          turnCount: record.metrics.turnCount,
          costEstimate: record.metrics.costEstimate,
          errorCode: record.error?.code ?? null,
          errorMessage: record.error?.message ?? null,
          errorDetails: record.error?.details ?? null,
          createdAt: record.createdAt,
          startedAt: record.startedAt,
          finishedAt: record.finishedAt,
          updatedAt: record.createdAt,
        })
        .run();

      const created = getRunSync(record.runId);
      if (!created) {
        throw new Error(`Run insert did not return a row for id=${record.runId}.`);
      }

      return created;
    },

    async getRun(runId) {
      return getRunSync(runId);
    },

    async updateRun(runId, expectedStatus, patch) {
      const updated = db
        .update(runs)
        .set(toRunUpdate(patch, now().toISOString()))
        .where(and(eq(runs.runId, runId), eq(runs.status, expectedStatus)))
        .run();

      if (updated.changes !== 1) {
        return null;
      }

      return getRunSync(runId);
    },

    async listRuns(filter = {}) {
      const statuses = filter.statuses;
      const query = db.select().from(runs);
      const rows = statuses === undefined
        ? query.orderBy(asc(runs.createdAt), asc(runs.runId)).all()
        : query
            .where(inArray(runs.status, [...statuses]))
            .orderBy(asc(runs.createdAt), asc(runs.runId))
            .all();

      return rows.map(toRunRecord);
    },
  };
}
