import { LogStore } from '@runwright/core';
import { createDatabase, createSqliteLogRecordStore, createSqliteRunStore, migrateDatabase } from '@runwright/db';
import { describe, expect, it } from 'vitest';
import { main } from '../bin.js';
import { LOGS_CLEANUP_USAGE, LOGS_USAGE } from '../constants.js';
import { createCapturedIo, createRunRecord, createTestDependencies } from '../test-support.js';

function createLogDatabase() {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  let now = new Date('2026-03-01T09:00:00.000Z');
  const logs = new LogStore(createSqliteLogRecordStore(db), { now: () => now });
  return {
    db,
    logs,
    setNow: (value: Date) => {
      now = value;
    },
  };
}

async function seedClosedLog(logs: LogStore, setNow: (value: Date) => void, runId: string): Promise<void> {
  setNow(new Date('2026-03-01T09:00:00.000Z'));
  await logs.append(runId, 'init', { model: 'test-model' });
  setNow(new Date('2026-03-01T09:00:42.500Z'));
  await logs.append(runId, 'completion', { result: 'Done.' }, { final: true });
}

describe('runwright logs show', () => {
  it('prints every entry of the run log', async () => {
    const { db, logs, setNow } = createLogDatabase();
    await seedClosedLog(logs, setNow, 'run-7');
    const { dependencies } = createTestDependencies(db);
    const captured = createCapturedIo();

    await expect(main(['logs', 'show', '--run', 'run-7'], { dependencies, io: captured.io })).resolves.toBe(0);
    expect(captured.stdout).toEqual([
      '#1 2026-03-01T09:00:00.000Z init {"model":"test-model"}',
      '#2 2026-03-01T09:00:42.500Z completion (final) {"result":"Done."}',
    ]);
  });

  it('prints only the newest entries with --tail', async () => {
    const { db, logs, setNow } = createLogDatabase();
    await seedClosedLog(logs, setNow, 'run-7');
    const { dependencies } = createTestDependencies(db);
    const captured = createCapturedIo();

    await expect(
      main(['logs', 'show', '--run', 'run-7', '--tail', '1'], { dependencies, io: captured.io }),
    ).resolves.toBe(0);
    expect(captured.stdout).toEqual(['#2 2026-03-01T09:00:42.500Z completion (final) {"result":"Done."}']);
  });

  it('distinguishes unknown runs from runs without entries', async () => {
    const { db } = createLogDatabase();
    await createSqliteRunStore(db).createRun(createRunRecord({ runId: 'run-8' }));
    const { dependencies } = createTestDependencies(db);

    const missing = createCapturedIo();
    await expect(main(['logs', 'show', '--run', 'nope'], { dependencies, io: missing.io })).resolves.toBe(3);
    expect(missing.stderr).toEqual(['Run id=nope was not found.']);

    const empty = createCapturedIo();
    await expect(main(['logs', 'show', '--run', 'run-8'], { dependencies, io: empty.io })).resolves.toBe(0);
    expect(empty.stdout).toEqual(['Run id=run-8 has no log entries.']);
  });
});

describe('runwright logs summary', () => {
  it('summarizes a closed run log', async () => {
    const { db, logs, setNow } = createLogDatabase();
    await seedClosedLog(logs, setNow, 'run-7');
    const { dependencies } = createTestDependencies(db);
    const captured = createCapturedIo();

    await expect(main(['logs', 'summary', '--run', 'run-7'], { dependencies, io: captured.io })).resolves.toBe(0);
    expect(captured.stdout).toHaveLength(4);
    expect(captured.stdout[0]).toMatch(/^Run id=run-7 entries=2 errors=0 size=\d+B duration=42\.5s closed=yes$/);
    expect(captured.stdout.slice(1)).toEqual([
      'Event types: init=1 progress=0 completion=1 error=0 raw=0',
      'First entry: 2026-03-01T09:00:00.000Z',
      'Last entry: 2026-03-01T09:00:42.500Z',
    ]);
  });

  it('returns not-found when the run has no log', async () => {
    const { db } = createLogDatabase();
    const { dependencies } = createTestDependencies(db);
    const captured = createCapturedIo();

    await expect(main(['logs', 'summary', '--run', 'nope'], { dependencies, io: captured.io })).resolves.toBe(3);
    expect(captured.stderr).toEqual(['No log entries were found for run id=nope.']);
  });
});

describe('runwright logs cleanup', () => {
  it('deletes closed logs older than the cutoff and keeps open ones', async () => {
    const { db, logs, setNow } = createLogDatabase();
    setNow(new Date('2000-01-01T00:00:00.000Z'));
    await logs.append('run-old', 'init', {});
    await logs.append('run-old', 'error', { code: 'BACKEND_RUNTIME_ERROR' }, { final: true });
    await logs.append('run-open', 'init', {});
    setNow(new Date());
    await logs.append('run-new', 'completion', { result: 'Done.' }, { final: true });
    const { dependencies } = createTestDependencies(db);
    const captured = createCapturedIo();

    await expect(
      main(['logs', 'cleanup', '--max-age-days', '3650'], { dependencies, io: captured.io }),
    ).resolves.toBe(0);
    expect(captured.stdout).toHaveLength(2);
    expect(captured.stdout[0]).toBe('deleted log for run id=run-old');
    expect(captured.stdout[1]).toMatch(/^Deleted 1 run logs \(2 entries, \d+ bytes\)\.$/);
    await expect(logs.readAll('run-old')).resolves.toEqual([]);
    await expect(logs.readAll('run-open')).resolves.toHaveLength(1);
    await expect(logs.readAll('run-new')).resolves.toHaveLength(1);
  });

  it.each([
    [['--max-age-days', '-1'], 'Option "--max-age-days" must be a non-negative number; received "-1".'],
    [[], 'Missing required option: --max-age-days <days>'],
  ])('rejects invalid arguments %j', async (args, message) => {
    const { db } = createLogDatabase();
    const { dependencies } = createTestDependencies(db);
    const captured = createCapturedIo();

    await expect(main(['logs', 'cleanup', ...args], { dependencies, io: captured.io })).resolves.toBe(2);
    expect(captured.stderr).toEqual([message, LOGS_CLEANUP_USAGE]);
  });

  it('requires a subcommand', async () => {
    const { db } = createLogDatabase();
    const { dependencies } = createTestDependencies(db);
    const captured = createCapturedIo();

    await expect(main(['logs'], { dependencies, io: captured.io })).resolves.toBe(2);
    expect(captured.stderr).toEqual(['Missing required logs subcommand.', LOGS_USAGE]);
  });
});
