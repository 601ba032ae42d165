import { describe, expect, it } from 'vitest';
import type { WorkspaceRecord } from '@runwright/shared';
import { createDatabase } from './connection.js';
import { migrateDatabase } from './migrate.js';
import { createSqliteWorkspaceStore } from './workspaceStore.js';

function createStore() {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  return createSqliteWorkspaceStore(db);
}

function workspace(runId: string): WorkspaceRecord {
  return {
    path: `/tmp/worktrees/${runId}`,
    branch: `runwright/fix-tests/${runId}`,
    baseBranch: 'main',
    runId,
    createdAt: '2026-03-01T09:00:00.000Z',
    lastActivityAt: '2026-03-01T09:00:00.000Z',
    owningRunId: runId,
    status: 'active',
    removedAt: null,
  };
}

describe('sqlite workspace store', () => {
  it('inserts and looks up active workspaces by path and owner', async () => {
    const store = createStore();
    const inserted = await store.insertWorkspace(workspace('run-1'));

    expect(inserted).toEqual(workspace('run-1'));
    await expect(store.getActiveWorkspaceByPath('/tmp/worktrees/run-1')).resolves.toEqual(inserted);
    await expect(store.getActiveWorkspaceByOwner('run-1')).resolves.toEqual(inserted);
    await expect(store.getActiveWorkspaceByOwner('run-2')).resolves.toBeNull();
  });

  it('releases ownership once and keeps the record active', async () => {
    const store = createStore();
    await store.insertWorkspace(workspace('run-1'));

    await expect(store.releaseOwnership('run-1', '2026-03-01T10:00:00.000Z')).resolves.toBe(true);
    await expect(store.releaseOwnership('run-1', '2026-03-01T10:05:00.000Z')).resolves.toBe(false);

    const [released] = await store.listActiveWorkspaces();
    expect(released).toMatchObject({
      owningRunId: null,
      status: 'active',
      lastActivityAt: '2026-03-01T10:00:00.000Z',
    });
  });

  it('touches activity by run id', async () => {
    const store = createStore();
    await store.insertWorkspace(workspace('run-1'));
    await store.touchWorkspace('run-1', '2026-03-01T09:30:00.000Z');

    const touched = await store.getActiveWorkspaceByOwner('run-1');
    expect(touched?.lastActivityAt).toBe('2026-03-01T09:30:00.000Z');
  });

  it('marks only unowned workspaces removed', async () => {
    const store = createStore();
    await store.insertWorkspace(workspace('run-1'));

    await expect(store.markRemoved('/tmp/worktrees/run-1', '2026-03-02T00:00:00.000Z')).resolves.toBe(false);

    await store.releaseOwnership('run-1', '2026-03-01T10:00:00.000Z');
    await expect(store.markRemoved('/tmp/worktrees/run-1', '2026-03-02T00:00:00.000Z')).resolves.toBe(true);
    await expect(store.listActiveWorkspaces()).resolves.toEqual([]);

    await expect(store.insertWorkspace({ ...workspace('run-2'), path: '/tmp/worktrees/run-1' })).resolves.toMatchObject({
      runId: 'run-2',
    });
  });
});
