export { canTransitionRun, transitionRun, isRunTerminal } from './stateMachine.js';
export {
  DEFAULT_FINAL_ENTRY_GRACE_MS,
  DEFAULT_LOG_POLL_INTERVAL_MS,
  LogStore,
  LogStoreError,
  type AppendOptions,
  type LogCleanupResult,
  type LogStoreErrorCode,
  type LogStoreOptions,
  type LogSummary,
  type StreamOptions,
} from './logStore.js';
export {
  AllocationGate,
  DEFAULT_MAX_CONCURRENT_ALLOCATIONS,
  DEFAULT_MAX_QUEUED_RUNS,
  type AllocationGateOptions,
  type AllocationGateStats,
  type AllocationTicket,
} from './allocationGate.js';
export {
  createRunId,
  DEFAULT_BASE_BRANCH,
  DEFAULT_MAX_TURNS,
  DEFAULT_STATUS_TAIL,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
  MAX_TURNS_LIMIT,
  RunLifecycleManager,
  type RunLifecycleManagerOptions,
  type RunLogView,
  type RunStatusOptions,
  type RunStatusSnapshot,
  type RunWorkspaceAllocator,
  type StartRunRequest,
} from './runLifecycle.js';
export {
  computeWorkflowContentHash,
  toDisplayName,
  WORKFLOW_CONFIG_FILE,
  WORKFLOW_PROMPT_FILE,
  WORKFLOW_TOOLS_FILE,
  WorkflowCatalogSync,
  type CatalogDiscoveryError,
  type CatalogSyncReport,
  type DiscoveredWorkflows,
  type WorkflowCatalogSyncOptions,
} from './catalogSync.js';
