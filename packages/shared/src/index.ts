// Run statuses
export type RunStatus = 'pending' | 'running' | 'completed' | 'failed' | 'timed_out';

export const terminalRunStatuses: readonly RunStatus[] = ['completed', 'failed', 'timed_out'];

// Log event types
export type LogEventType = 'init' | 'progress' | 'completion' | 'error' | 'raw';

export const logEventTypes: readonly LogEventType[] = ['init', 'progress', 'completion', 'error', 'raw'];

// Injected message kinds
export type InjectedMessageKind = 'user' | 'system';

// Workspace bookkeeping statuses
export type WorkspaceStatus = 'active' | 'removed';

// Caller-facing run request
export type RunRequest = {
  message: string;
  maxTurns: number;
  timeoutSeconds: number;
  baseBranch: string;
  sessionId: string | null;
};

// Path + branch of an allocated workspace
export type WorkspaceRef = {
  path: string;
  branch: string;
};

export type RunMetrics = {
  elapsedSeconds: number | null;
  turnCount: number | null;
  costEstimate: number | null;
};

export type RunError = {
  code: string;
  message: string;
  details?: Record<string, unknown>;
};

// Persisted run record
export type RunRecord = {
  runId: string;
  workflowName: string;
  status: RunStatus;
  request: RunRequest;
  workspace: WorkspaceRef | null;
  backendRef: string | null;
  sessionId: string | null;
  createdAt: string;
  startedAt: string | null;
  finishedAt: string | null;
  metrics: RunMetrics;
  error: RunError | null;
};

// Immutable run log entry
export type LogEntry = {
  runId: string;
  sequence: number;
  timestamp: string;
  eventType: LogEventType;
  data: Record<string, unknown>;
  final: boolean;
};

export type InjectedMessage = {
  runId: string;
  kind: InjectedMessageKind;
  body: string;
  acceptedAt: string;
};

// Workspace bookkeeping record
export type WorkspaceRecord = {
  path: string;
  branch: string;
  baseBranch: string;
  runId: string;
  createdAt: string;
  lastActivityAt: string;
  owningRunId: string | null;
  status: WorkspaceStatus;
  removedAt: string | null;
};

// Catalog workflow definition
export type WorkflowDefinition = {
  name: string;
  displayName: string;
  description: string | null;
  promptTemplate: string;
  allowedTools: string[];
  suggestedMaxTurns: number | null;
  sourcePath: string;
  contentHash: string;
};

// Console-compatible sink for engine diagnostics
export type EngineLogger = Pick<Console, 'info' | 'warn' | 'error'>;

export * from './asyncChannel.js';
export * from './backend.js';
export * from './controlLine.js';
export * from './errors.js';
export * from './stores.js';
export * from './values.js';
