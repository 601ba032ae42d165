export { createDatabase, type RunwrightDatabase } from './connection.js';
export { and, asc, desc, eq, inArray, sql } from 'drizzle-orm';
export { migrateDatabase } from './migrate.js';
export { createSqliteLogRecordStore } from './logRecordStore.js';
export { createSqliteRunStore } from './runStore.js';
export { createSqliteWorkflowCatalogStore } from './workflowCatalogStore.js';
export { createSqliteWorkspaceStore } from './workspaceStore.js';
export * from './schema.js';
