import { asc, eq } from 'drizzle-orm';
import type { WorkflowCatalogStore, WorkflowDefinition } from '@runwright/shared';
import type { RunwrightDatabase } from './connection.js';
import { workflowDefinitions } from './schema.js';

type WorkflowDefinitionRow = typeof workflowDefinitions.$inferSelect;

function toWorkflowDefinition(row: WorkflowDefinitionRow): WorkflowDefinition {
  return {
    name: row.name,
    displayName: row.displayName,
    description: row.description,
    promptTemplate: row.promptTemplate,
    allowedTools: row.allowedTools,
    suggestedMaxTurns: row.suggestedMaxTurns,
    sourcePath: row.sourcePath,
    contentHash: row.contentHash,
  };
}

export function createSqliteWorkflowCatalogStore(db: RunwrightDatabase): WorkflowCatalogStore {
  return {
    async getWorkflow(name) {
      const row = db.select().from(workflowDefinitions).where(eq(workflowDefinitions.name, name)).get();
      return row ? toWorkflowDefinition(row) : null;
    },

    async listWorkflows() {
      return db
        .select()
        .from(workflowDefinitions)
        .orderBy(asc(workflowDefinitions.name))
        .all()
        .map(toWorkflowDefinition);
    },

    async insertWorkflow(definition, occurredAt) {
      db.insert(workflowDefinitions)
        .values({
          ...definition,
          createdAt: occurredAt,
          updatedAt: occurredAt,
        })
        .run();
    },

    async updateWorkflow(definition, occurredAt) {
      const updated = db
        .update(workflowDefinitions)
        .set({
          displayName: definition.displayName,
          description: definition.description,
          promptTemplate: definition.promptTemplate,
          allowedTools: definition.allowedTools,
          suggestedMaxTurns: definition.suggestedMaxTurns,
          sourcePath: definition.sourcePath,
          contentHash: definition.contentHash,
          updatedAt: occurredAt,
        })
        .where(eq(workflowDefinitions.name, definition.name))
        .run();

      if (updated.changes !== 1) {
        throw new Error(`Workflow definition update precondition failed for name=${definition.name}.`);
      }
    },
  };
}
