import { describe, expect, it } from 'vitest';
import type { WorkflowDefinition } from '@runwright/shared';
import { createDatabase } from './connection.js';
import { migrateDatabase } from './migrate.js';
import { createSqliteWorkflowCatalogStore } from './workflowCatalogStore.js';

function createStore() {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  return createSqliteWorkflowCatalogStore(db);
}

function definition(name: string, overrides: Partial<WorkflowDefinition> = {}): WorkflowDefinition {
  return {
    name,
    displayName: `Workflow ${name}`,
    description: null,
    promptTemplate: 'Do the work.',
    allowedTools: ['Read', 'Edit'],
    suggestedMaxTurns: 20,
    sourcePath: `/workflows/${name}`,
    contentHash: `hash-${name}`,
    ...overrides,
  };
}

describe('sqlite workflow catalog store', () => {
  it('inserts, reads and lists definitions by name', async () => {
    const store = createStore();
    await store.insertWorkflow(definition('review'), '2026-03-01T09:00:00.000Z');
    await store.insertWorkflow(definition('fix-tests'), '2026-03-01T09:00:00.000Z');

    await expect(store.getWorkflow('review')).resolves.toEqual(definition('review'));
    await expect(store.getWorkflow('missing')).resolves.toBeNull();

    const listed = await store.listWorkflows();
    expect(listed.map(item => item.name)).toEqual(['fix-tests', 'review']);
  });

  it('updates an existing definition in place', async () => {
    const store = createStore();
    await store.insertWorkflow(definition('review'), '2026-03-01T09:00:00.000Z');

    const changed = definition('review', { promptTemplate: 'Review carefully.', contentHash: 'hash-2' });
    await store.updateWorkflow(changed, '2026-03-02T09:00:00.000Z');

    await expect(store.getWorkflow('review')).resolves.toEqual(changed);
  });

  it('rejects updates for unknown workflows', async () => {
    const store = createStore();
    await expect(store.updateWorkflow(definition('missing'), '2026-03-02T09:00:00.000Z')).rejects.toThrow(
      'Workflow definition update precondition failed for name=missing.',
    );
  });
});
