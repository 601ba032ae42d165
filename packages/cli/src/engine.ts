import type { RunwrightDatabase } from '@runwright/db';
import {
  createSqliteLogRecordStore,
  createSqliteRunStore,
  createSqliteWorkflowCatalogStore,
  createSqliteWorkspaceStore,
} from '@runwright/db';
import {
  AllocationGate,
  LogStore,
  RunLifecycleManager,
  WorkflowCatalogSync,
} from '@runwright/core';
import { OrphanReaper } from '@runwright/git';
import type { EngineLogger, RunStore, WorkflowCatalogStore } from '@runwright/shared';
import { loadEngineConfig, type EngineConfig } from './config.js';
import { createIoLogger } from './io.js';
import type { CliDependencies, CliIo, EngineWorkspaces } from './types.js';

export type Engine = {
  config: EngineConfig;
  db: RunwrightDatabase;
  logger: EngineLogger;
  runs: RunStore;
  catalog: WorkflowCatalogStore;
  logs: LogStore;
  workspaces: EngineWorkspaces;
  manager: RunLifecycleManager;
  reaper: OrphanReaper;
  catalogSync: WorkflowCatalogSync;
};

/**
 * Wires every engine component for one CLI invocation. Configuration and
 * backend selection errors surface here, before any command runs.
 */
export function createEngine(dependencies: CliDependencies, io: CliIo): Engine {
  const config = loadEngineConfig(io.env, io.cwd);
  const logger = createIoLogger(io);
  const backend = dependencies.createBackend(
    {
      strategy: config.backend.strategy,
      command: config.backend.command,
      args: config.backend.args,
      logger,
    },
    io.env,
  );

  const db = dependencies.openDatabase(config.databasePath);
  dependencies.migrateDatabase(db);

  const runs = createSqliteRunStore(db);
  const catalog = createSqliteWorkflowCatalogStore(db);
  const logs = new LogStore(createSqliteLogRecordStore(db), { runs });
  const workspaces = dependencies.createWorkspaceManager(createSqliteWorkspaceStore(db), {
    repoDir: config.repoDir,
    worktreeBase: config.worktreeBase,
    branchTemplate: config.branchTemplate,
    environment: io.env,
  });
  const manager = new RunLifecycleManager({
    runs,
    catalog,
    logs,
    workspaces,
    backend,
    gate: new AllocationGate({
      maxConcurrentAllocations: config.maxConcurrentAllocations,
      maxQueuedRuns: config.maxQueuedRuns,
    }),
    defaultBaseBranch: config.defaultBaseBranch,
    defaultMaxTurns: config.defaultMaxTurns,
    defaultTimeoutSeconds: config.defaultTimeoutSeconds,
    logger,
  });

  return {
    config,
    db,
    logger,
    runs,
    catalog,
    logs,
    workspaces,
    manager,
    reaper: new OrphanReaper(workspaces, manager, { logger }),
    catalogSync: new WorkflowCatalogSync(catalog, { root: config.workflowsDir, logger }),
  };
}
