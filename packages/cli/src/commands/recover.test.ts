import { createDatabase, createSqliteLogRecordStore, createSqliteRunStore, migrateDatabase } from '@runwright/db';
import { describe, expect, it } from 'vitest';
import { main } from '../bin.js';
import { RECOVER_USAGE } from '../constants.js';
import { createCapturedIo, createRunRecord, createTestDependencies } from '../test-support.js';

describe('runwright recover', () => {
  it('fails runs left pending or running by a previous process', async () => {
    const db = createDatabase(':memory:');
    migrateDatabase(db);
    const runs = createSqliteRunStore(db);
    await runs.createRun(
      createRunRecord({ runId: 'run-r1', status: 'running', startedAt: '2026-03-01T09:00:05.000Z' }),
    );
    await runs.createRun(
      createRunRecord({ runId: 'run-r2', status: 'completed', finishedAt: '2026-03-01T09:10:00.000Z' }),
    );
    const { dependencies } = createTestDependencies(db);
    const captured = createCapturedIo();

    await expect(main(['recover'], { dependencies, io: captured.io })).resolves.toBe(0);
    expect(captured.stderr).toEqual(['Run id=run-r1 marked failed after interruption (was running).']);
    expect(captured.stdout).toEqual([
      'Run id=run-r1 workflow=fix_tests status=failed',
      'Recovered 1 interrupted runs.',
    ]);
    await expect(runs.getRun('run-r1')).resolves.toMatchObject({
      status: 'failed',
      error: { code: 'BACKEND_RUNTIME_ERROR', message: 'Run was interrupted before it finished.' },
    });
    await expect(runs.getRun('run-r2')).resolves.toMatchObject({ status: 'completed' });

    const entries = await createSqliteLogRecordStore(db).listEntries('run-r1');
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ eventType: 'error', final: true });
  });

  it('takes no options', async () => {
    const db = createDatabase(':memory:');
    migrateDatabase(db);
    const { dependencies } = createTestDependencies(db);
    const captured = createCapturedIo();

    await expect(main(['recover', '--all=yes'], { dependencies, io: captured.io })).resolves.toBe(2);
    expect(captured.stderr).toEqual(['Unknown option for "recover": --all', RECOVER_USAGE]);
  });
});
