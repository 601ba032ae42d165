import { describe, expect, it } from 'vitest';
import type { RunRecord } from '@runwright/shared';
import { createDatabase } from './connection.js';
import { migrateDatabase } from './migrate.js';
import { createSqliteRunStore } from './runStore.js';

function createStore() {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  return createSqliteRunStore(db, { now: () => new Date('2026-03-01T10:00:00.000Z') });
}

function createPendingRecord(runId: string, createdAt = '2026-03-01T09:00:00.000Z'): RunRecord {
  return {
    runId,
    workflowName: 'fix-tests',
    status: 'pending',
    request: {
      message: 'Fix the failing tests',
      maxTurns: 30,
      timeoutSeconds: 3600,
      baseBranch: 'main',
      sessionId: null,
    },
    workspace: null,
    backendRef: null,
    sessionId: null,
    createdAt,
    startedAt: null,
    finishedAt: null,
    metrics: { elapsedSeconds: null, turnCount: null, costEstimate: null },
    error: null,
  };
}

describe('sqlite run store', () => {
  it('creates and reads back a pending run', async () => {
    const store = createStore();
    const record = createPendingRecord('run-1');

    await expect(store.createRun(record)).resolves.toEqual(record);
    await expect(store.getRun('run-1')).resolves.toEqual(record);
    await expect(store.getRun('missing')).resolves.toBeNull();
  });

  it('applies patches only when the expected status matches', async () => {
    const store = createStore();
    await store.createRun(createPendingRecord('run-1'));

    const running = await store.updateRun('run-1', 'pending', {
      status: 'running',
      startedAt: '2026-03-01T09:01:00.000Z',
      workspace: { path: '/tmp/worktrees/run-1', branch: 'runwright/fix-tests/run-1' },
      backendRef: 'sdk:run-1',
    });

    expect(running).toMatchObject({
      status: 'running',
      startedAt: '2026-03-01T09:01:00.000Z',
      workspace: { path: '/tmp/worktrees/run-1', branch: 'runwright/fix-tests/run-1' },
      backendRef: 'sdk:run-1',
    });

    await expect(store.updateRun('run-1', 'pending', { status: 'failed' })).resolves.toBeNull();
    await expect(store.updateRun('missing', 'pending', { status: 'running' })).resolves.toBeNull();
  });

  it('persists terminal metrics and errors', async () => {
    const store = createStore();
    await store.createRun(createPendingRecord('run-1'));
    await store.updateRun('run-1', 'pending', { status: 'running', startedAt: '2026-03-01T09:01:00.000Z' });

    const finished = await store.updateRun('run-1', 'running', {
      status: 'timed_out',
      finishedAt: '2026-03-01T09:02:00.000Z',
      metrics: { elapsedSeconds: 60, turnCount: 4, costEstimate: 0.25 },
      error: { code: 'TIMEOUT_EXCEEDED', message: 'Run exceeded 60 seconds.', details: { timeoutSeconds: 60 } },
    });

    expect(finished?.metrics).toEqual({ elapsedSeconds: 60, turnCount: 4, costEstimate: 0.25 });
    expect(finished?.error).toEqual({
      code: 'TIMEOUT_EXCEEDED',
      message: 'Run exceeded 60 seconds.',
      details: { timeoutSeconds: 60 },
    });
  });

  it('lists runs by status in creation order', async () => {
    const store = createStore();
    await store.createRun(createPendingRecord('run-b', '2026-03-01T09:00:02.000Z'));
    await store.createRun(createPendingRecord('run-a', '2026-03-01T09:00:01.000Z'));
    await store.createRun(createPendingRecord('run-c', '2026-03-01T09:00:03.000Z'));
    await store.updateRun('run-c', 'pending', { status: 'running', startedAt: '2026-03-01T09:01:00.000Z' });

    const all = await store.listRuns();
    expect(all.map(run => run.runId)).toEqual(['run-a', 'run-b', 'run-c']);

    const pending = await store.listRuns({ statuses: ['pending'] });
    expect(pending.map(run => run.runId)).toEqual(['run-a', 'run-b']);
  });
});
