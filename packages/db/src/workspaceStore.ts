import { and, asc, eq, isNull } from 'drizzle-orm';
import type { WorkspaceRecord, WorkspaceStatus, WorkspaceStore } from '@runwright/shared';
import type { RunwrightDatabase } from './connection.js';
import { workspaces } from './schema.js';

type WorkspaceRow = typeof workspaces.$inferSelect;

function assertKnownWorkspaceStatus(status: string): asserts status is WorkspaceStatus {
  if (status !== 'active' && status !== 'removed') {
    throw new Error(`Unknown workspace status: ${status}`);
  }
}

function toWorkspaceRecord(row: WorkspaceRow): WorkspaceRecord {
  assertKnownWorkspaceStatus(row.status);

  return {
    path: row.path,
    branch: row.branch,
    baseBranch: row.baseBranch,
    runId: row.runId,
    createdAt: row.createdAt,
    lastActivityAt: row.lastActivityAt,
    owningRunId: row.owningRunId,
    status: row.status,
    removedAt: row.removedAt,
  };
}

export function createSqliteWorkspaceStore(db: RunwrightDatabase): WorkspaceStore {
  function getActiveByPath(path: string): WorkspaceRecord | null {
    const row = db
      .select()
      .from(workspaces)
      .where(and(eq(workspaces.path, path), eq(workspaces.status, 'active')))
      .get();

    return row ? toWorkspaceRecord(row) : null;
  }

  return {
    async insertWorkspace(record) {
      db.insert(workspaces)
        .values({
          path: record.path,
          branch: record.branch,
          baseBranch: record.baseBranch,
          runId: record.runId,
          owningRunId: record.owningRunId,
          status: record.status,
          createdAt: record.createdAt,
          lastActivityAt: record.lastActivityAt,
          removedAt: record.removedAt,
        })
        .run();

      const created = getActiveByPath(record.path);
      if (!created) {
        throw new Error(`Workspace insert did not return an active row for path=${record.path}.`);
      }

      return created;
    },

    async getActiveWorkspaceByPath(path) {
      return getActiveByPath(path);
    },

    async getActiveWorkspaceByOwner(runId) {
      const row = db
        .select()
        .from(workspaces)
        .where(and(eq(workspaces.owningRunId, runId), eq(workspaces.status, 'active')))
        .get();

      return row ? toWorkspaceRecord(row) : null;
    },

    async listActiveWorkspaces() {
      return db
        .select()
        .from(workspaces)
        .where(eq(workspaces.status, 'active'))
        .orderBy(asc(workspaces.createdAt), asc(workspaces.id))
        .all()
        .map(toWorkspaceRecord);
    },

    async releaseOwnership(runId, occurredAt) {
      const updated = db
        .update(workspaces)
        .set({
          owningRunId: null,
          lastActivityAt: occurredAt,
        })
        .where(and(eq(workspaces.owningRunId, runId), eq(workspaces.status, 'active')))
        .run();

      return updated.changes > 0;
    },

    async touchWorkspace(runId, occurredAt) {
      db.update(workspaces)
        .set({ lastActivityAt: occurredAt })
        .where(and(eq(workspaces.runId, runId), eq(workspaces.status, 'active')))
        .run();
    },

    async markRemoved(path, occurredAt) {
      const updated = db
        .update(workspaces)
        .set({
          status: 'removed',
          removedAt: occurredAt,
        })
        .where(and(eq(workspaces.path, path), eq(workspaces.status, 'active'), isNull(workspaces.owningRunId)))
        .run();

      return updated.changes === 1;
    },
  };
}
