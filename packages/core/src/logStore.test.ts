import { createDatabase, createSqliteLogRecordStore, createSqliteRunStore, migrateDatabase } from '@runwright/db';
import type { LogEntry, RunStatus } from '@runwright/shared';
import { describe, expect, it } from 'vitest';
import { LogStore, LogStoreError } from './logStore.js';

function createClock(start = '2026-03-01T09:00:00.000Z') {
  let current = new Date(start);
  return {
    now: () => current,
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
    set(iso: string) {
      current = new Date(iso);
    },
  };
}

function setup() {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  const clock = createClock();
  const store = new LogStore(createSqliteLogRecordStore(db), { now: clock.now, pollIntervalMs: 60_000 });
  return { store, clock };
}

function setupWithRuns() {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  const clock = createClock();
  const runs = createSqliteRunStore(db);
  const store = new LogStore(createSqliteLogRecordStore(db), {
    now: clock.now,
    pollIntervalMs: 5,
    runs,
    finalEntryGraceMs: 1_000,
  });

  const createRun = (runId: string, status: RunStatus, finishedAt: string | null) =>
    runs.createRun({
      runId,
      workflowName: 'fix_tests',
      status,
      request: { message: 'Fix the build', maxTurns: 12, timeoutSeconds: 3600, baseBranch: 'main', sessionId: null },
      workspace: null,
      backendRef: null,
      sessionId: null,
      createdAt: '2026-03-01T08:59:00.000Z',
      startedAt: '2026-03-01T08:59:00.000Z',
      finishedAt,
      metrics: { elapsedSeconds: null, turnCount: null, costEstimate: null },
      error: null,
    });

  return { store, clock, createRun };
}

async function collect(entries: AsyncIterable<LogEntry>): Promise<LogEntry[]> {
  const collected: LogEntry[] = [];
  for await (const entry of entries) {
    collected.push(entry);
  }
  return collected;
}

function sizeOf(entry: LogEntry): number {
  return Buffer.byteLength(JSON.stringify(entry), 'utf8');
}

describe('LogStore', () => {
  it('appends entries with gapless sequences and the current time', async () => {
    const { store, clock } = setup();

    const first = await store.append('run-1', 'init', { sessionId: 'session-1' });
    clock.advance(1_500);
    const second = await store.append('run-1', 'progress', { step: 'assistant_text' });

    expect(first).toEqual({
      runId: 'run-1',
      sequence: 1,
      timestamp: '2026-03-01T09:00:00.000Z',
      eventType: 'init',
      data: { sessionId: 'session-1' },
      final: false,
    });
    expect(second.sequence).toBe(2);
    expect(second.timestamp).toBe('2026-03-01T09:00:01.500Z');
    await expect(store.readAll('run-1')).resolves.toEqual([first, second]);
  });

  it('keeps call order for concurrent appends to the same run', async () => {
    const { store } = setup();

    const appended = await Promise.all(
      ['a', 'b', 'c', 'd', 'e'].map(step => store.append('run-1', 'progress', { step })),
    );

    expect(appended.map(entry => [entry.sequence, entry.data.step])).toEqual([
      [1, 'a'],
      [2, 'b'],
      [3, 'c'],
      [4, 'd'],
      [5, 'e'],
    ]);
  });

  it('numbers each run independently', async () => {
    const { store } = setup();

    await Promise.all([
      store.append('run-1', 'init'),
      store.append('run-2', 'init'),
      store.append('run-1', 'progress'),
    ]);

    expect((await store.readAll('run-1')).map(entry => entry.sequence)).toEqual([1, 2]);
    expect((await store.readAll('run-2')).map(entry => entry.sequence)).toEqual([1]);
  });

  it('rejects appends after the final entry without blocking later readers', async () => {
    const { store } = setup();
    await store.append('run-1', 'completion', { result: 'done' }, { final: true });

    let caught: unknown;
    try {
      await store.append('run-1', 'progress', { step: 'late' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(LogStoreError);
    expect(caught).toMatchObject({
      code: 'LOG_CLOSED',
      message: 'Log for run id=run-1 is closed; no entries can follow the final entry.',
      details: { runId: 'run-1', lastSequence: 1 },
    });
    await expect(store.readAll('run-1')).resolves.toHaveLength(1);
  });

  it('reads the tail of a log', async () => {
    const { store } = setup();
    for (const step of ['a', 'b', 'c']) {
      await store.append('run-1', 'progress', { step });
    }

    const tail = await store.readTail('run-1', 2);

    expect(tail.map(entry => entry.data.step)).toEqual(['b', 'c']);
    await expect(store.readTail('run-1', 0)).rejects.toThrow('Tail limit must be a positive integer; received 0.');
  });

  it('streams existing entries, then live ones, and ends after the final entry', async () => {
    const { store } = setup();
    await store.append('run-1', 'init', { sessionId: 'session-1' });

    const streaming = collect(store.stream('run-1'));
    await store.append('run-1', 'progress', { step: 'tool_use' });
    await store.append('run-1', 'completion', { result: 'done' }, { final: true });

    const entries = await streaming;
    expect(entries.map(entry => [entry.sequence, entry.eventType, entry.final])).toEqual([
      [1, 'init', false],
      [2, 'progress', false],
      [3, 'completion', true],
    ]);
  });

  it('resumes a stream after a known sequence', async () => {
    const { store } = setup();
    await store.append('run-1', 'init');
    await store.append('run-1', 'progress');
    await store.append('run-1', 'error', { message: 'boom' }, { final: true });

    const entries = await collect(store.stream('run-1', { afterSequence: 2 }));

    expect(entries.map(entry => entry.sequence)).toEqual([3]);
  });

  it('stops streaming when the signal aborts', async () => {
    const { store } = setup();
    await store.append('run-1', 'init');
    const controller = new AbortController();

    const streaming = collect(store.stream('run-1', { signal: controller.signal }));
    await new Promise(resolve => setImmediate(resolve));
    controller.abort();

    await expect(streaming).resolves.toHaveLength(1);
  });

  it('picks up entries written by another process through polling', async () => {
    const db = createDatabase(':memory:');
    migrateDatabase(db);
    const records = createSqliteLogRecordStore(db);
    const reader = new LogStore(records, { pollIntervalMs: 5 });
    const writer = new LogStore(records);

    const streaming = collect(reader.stream('run-1'));
    await new Promise(resolve => setTimeout(resolve, 15));
    await writer.append('run-1', 'completion', { result: 'done' }, { final: true });

    await expect(streaming).resolves.toHaveLength(1);
  });

  it('ends the stream for a finished run whose log was cleaned up', async () => {
    const { store, clock, createRun } = setupWithRuns();
    await createRun('run-1', 'completed', '2026-03-01T09:00:00.000Z');
    await store.append('run-1', 'init');
    await store.append('run-1', 'completion', { result: 'done' }, { final: true });
    clock.set('2026-04-29T09:00:00.000Z');
    await expect(store.cleanup(30)).resolves.toMatchObject({ deletedCount: 1 });

    await expect(collect(store.stream('run-1'))).resolves.toEqual([]);
  });

  it('ends the stream for an unknown run', async () => {
    const { store } = setupWithRuns();

    await expect(collect(store.stream('missing'))).resolves.toEqual([]);
  });

  it('waits out the grace period for a finished run that has no final entry', async () => {
    const { store, clock, createRun } = setupWithRuns();
    await createRun('run-1', 'failed', '2026-03-01T09:00:00.000Z');
    await store.append('run-1', 'init');

    let ended = false;
    const streaming = collect(store.stream('run-1')).finally(() => {
      ended = true;
    });
    await new Promise(resolve => setTimeout(resolve, 25));
    expect(ended).toBe(false);

    clock.advance(1_000);
    const entries = await streaming;
    expect(entries.map(entry => entry.eventType)).toEqual(['init']);
  });

  it('keeps following a running run until its final entry', async () => {
    const { store, createRun } = setupWithRuns();
    await createRun('run-1', 'running', null);

    const streaming = collect(store.stream('run-1'));
    await new Promise(resolve => setTimeout(resolve, 25));
    await store.append('run-1', 'completion', { result: 'done' }, { final: true });

    const entries = await streaming;
    expect(entries.map(entry => [entry.sequence, entry.final])).toEqual([[1, true]]);
  });

  it('summarizes a run log', async () => {
    const { store, clock } = setup();
    const entries = [await store.append('run-1', 'init')];
    clock.advance(30_000);
    entries.push(await store.append('run-1', 'progress', { step: 'tool_use' }));
    entries.push(await store.append('run-1', 'raw', { line: 'compiling' }));
    clock.advance(12_500);
    entries.push(await store.append('run-1', 'error', { code: 'BACKEND_RUNTIME_ERROR' }, { final: true }));

    await expect(store.summarize('run-1')).resolves.toEqual({
      runId: 'run-1',
      durationSeconds: 42.5,
      entryCount: 4,
      eventTypes: { init: 1, progress: 1, raw: 1, error: 1 },
      errorCount: 1,
      sizeBytes: entries.reduce((total, entry) => total + sizeOf(entry), 0),
      firstTimestamp: '2026-03-01T09:00:00.000Z',
      lastTimestamp: '2026-03-01T09:00:42.500Z',
      closed: true,
    });
    await expect(store.summarize('missing')).resolves.toBeNull();
  });

  it('cleans up closed logs older than the threshold', async () => {
    const { store, clock } = setup();
    const oldInit = await store.append('old-closed', 'init');
    const oldCompletion = await store.append('old-closed', 'completion', { result: 'done' }, { final: true });
    await store.append('old-open', 'init');
    clock.set('2026-03-09T09:00:00.000Z');
    await store.append('recent-closed', 'completion', { result: 'done' }, { final: true });
    clock.set('2026-03-10T09:00:00.000Z');

    const result = await store.cleanup(7);

    expect(result).toEqual({
      deletedCount: 1,
      deletedEntries: 2,
      freedBytes: sizeOf(oldInit) + sizeOf(oldCompletion),
      deletedRunIds: ['old-closed'],
    });
    expect((await store.list()).map(stats => stats.runId)).toEqual(['old-open', 'recent-closed']);
  });

  it('rejects a negative cleanup threshold', async () => {
    const { store } = setup();

    await expect(store.cleanup(-1)).rejects.toThrow(
      'Log max age must be a non-negative number of days; received -1.',
    );
  });
});
