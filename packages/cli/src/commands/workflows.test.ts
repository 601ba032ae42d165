import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createDatabase, migrateDatabase } from '@runwright/db';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { main } from '../bin.js';
import { WORKFLOWS_USAGE } from '../constants.js';
import { createCapturedIo, createTestDependencies, TEST_REPO_DIR, TEST_WORKTREE_BASE } from '../test-support.js';

let workflowsDir: string;

function createWorkflowsIo() {
  return createCapturedIo({
    env: {
      RUNWRIGHT_REPO_DIR: TEST_REPO_DIR,
      RUNWRIGHT_WORKTREE_DIR: TEST_WORKTREE_BASE,
      RUNWRIGHT_WORKFLOWS_DIR: workflowsDir,
    },
  });
}

async function writeWorkflowFile(name: string, file: string, content: string): Promise<void> {
  await mkdir(join(workflowsDir, name), { recursive: true });
  await writeFile(join(workflowsDir, name, file), content, 'utf8');
}

beforeEach(async () => {
  workflowsDir = await mkdtemp(join(tmpdir(), 'runwright-cli-workflows-'));
});

afterEach(async () => {
  await rm(workflowsDir, { recursive: true, force: true });
});

describe('runwright workflows', () => {
  it('syncs workflow directories into the catalog and lists them', async () => {
    await writeWorkflowFile('fix_tests', 'prompt.md', '# Fix failing tests\n\nMake the suite pass.\n');
    await writeWorkflowFile('fix_tests', 'allowed_tools.json', '["Read", "Edit"]');
    await writeWorkflowFile('docs', 'prompt.md', 'Document the public API.');
    await writeWorkflowFile('docs', 'config.json', '{"suggested_max_turns": 8}');
    const db = createDatabase(':memory:');
    migrateDatabase(db);
    const { dependencies } = createTestDependencies(db);

    const sync = createWorkflowsIo();
    await expect(main(['workflows', 'sync'], { dependencies, io: sync.io })).resolves.toBe(0);
    expect(sync.stderr).toEqual([]);
    expect(sync.stdout).toEqual([
      'Workflow catalog sync: discovered=2 registered=2 updated=0 unchanged=0 errors=0',
      'registered docs',
      'registered fix_tests',
    ]);

    const list = createWorkflowsIo();
    await expect(main(['workflows', 'list'], { dependencies, io: list.io })).resolves.toBe(0);
    expect(list.stdout).toEqual([
      'docs\tDocs\tmax_turns=8\ttools=-',
      '  Document the public API.',
      'fix_tests\tFix Tests\tmax_turns=-\ttools=Read,Edit',
      '  Fix failing tests',
    ]);

    const resync = createWorkflowsIo();
    await expect(main(['workflows', 'sync'], { dependencies, io: resync.io })).resolves.toBe(0);
    expect(resync.stdout.slice(1)).toEqual(['unchanged docs', 'unchanged fix_tests']);
  });

  it('reports invalid workflow directories with a runtime failure', async () => {
    await writeWorkflowFile('broken', 'config.json', '{}');
    await writeWorkflowFile('valid', 'prompt.md', 'Do the thing.');
    const db = createDatabase(':memory:');
    migrateDatabase(db);
    const { dependencies } = createTestDependencies(db);
    const captured = createWorkflowsIo();

    await expect(main(['workflows', 'sync'], { dependencies, io: captured.io })).resolves.toBe(4);
    expect(captured.stderr).toEqual([`Workflow catalog skipped ${join(workflowsDir, 'broken')}: Missing prompt.md.`]);
    expect(captured.stdout).toEqual([
      'Workflow catalog sync: discovered=1 registered=1 updated=0 unchanged=0 errors=1',
      'registered valid',
    ]);
  });

  it('explains how to populate an empty catalog', async () => {
    const db = createDatabase(':memory:');
    migrateDatabase(db);
    const { dependencies } = createTestDependencies(db);
    const captured = createWorkflowsIo();

    await expect(main(['workflows', 'list'], { dependencies, io: captured.io })).resolves.toBe(0);
    expect(captured.stdout).toEqual(['No workflows registered. Run "runwright workflows sync" first.']);
  });

  it('rejects missing and unknown subcommands', async () => {
    const db = createDatabase(':memory:');
    migrateDatabase(db);
    const { dependencies } = createTestDependencies(db);

    const missing = createWorkflowsIo();
    await expect(main(['workflows'], { dependencies, io: missing.io })).resolves.toBe(2);
    expect(missing.stderr).toEqual(['Missing required workflows subcommand.', WORKFLOWS_USAGE]);

    const unknown = createWorkflowsIo();
    await expect(main(['workflows', 'remove'], { dependencies, io: unknown.io })).resolves.toBe(2);
    expect(unknown.stderr).toEqual(['Unknown workflows subcommand "remove".', WORKFLOWS_USAGE]);
  });
});
