import type {
  LogEntry,
  RunError,
  RunMetrics,
  RunRecord,
  RunStatus,
  WorkflowDefinition,
  WorkspaceRecord,
  WorkspaceRef,
} from './index.js';

export type RunRecordPatch = {
  status?: RunStatus;
  workspace?: WorkspaceRef | null;
  backendRef?: string | null;
  sessionId?: string | null;
  startedAt?: string | null;
  finishedAt?: string | null;
  metrics?: RunMetrics;
  error?: RunError | null;
};

export interface RunStore {
  createRun(record: RunRecord): Promise<RunRecord>;
  getRun(runId: string): Promise<RunRecord | null>;
  /**
   * Applies `patch` only when the stored status equals `expectedStatus`;
   * resolves null when the precondition does not hold.
   */
  updateRun(runId: string, expectedStatus: RunStatus, patch: RunRecordPatch): Promise<RunRecord | null>;
  listRuns(filter?: { statuses?: readonly RunStatus[] }): Promise<RunRecord[]>;
}

export type RunLogStats = {
  runId: string;
  entryCount: number;
  sizeBytes: number;
  firstTimestamp: string;
  lastTimestamp: string;
  lastSequence: number;
  closed: boolean;
};

export interface LogRecordStore {
  /** Rejects when (runId, sequence) already exists. */
  insertEntry(entry: LogEntry, sizeBytes: number): Promise<void>;
  listEntries(runId: string, options?: { afterSequence?: number; limit?: number }): Promise<LogEntry[]>;
  listTail(runId: string, limit: number): Promise<LogEntry[]>;
  getRunStats(runId: string): Promise<RunLogStats | null>;
  listRunStats(): Promise<RunLogStats[]>;
  deleteRunLog(runId: string): Promise<number>;
}

export interface WorkspaceStore {
  insertWorkspace(record: WorkspaceRecord): Promise<WorkspaceRecord>;
  getActiveWorkspaceByPath(path: string): Promise<WorkspaceRecord | null>;
  getActiveWorkspaceByOwner(runId: string): Promise<WorkspaceRecord | null>;
  listActiveWorkspaces(): Promise<WorkspaceRecord[]>;
  /** Returns true when an owned workspace was released. */
  releaseOwnership(runId: string, occurredAt: string): Promise<boolean>;
  touchWorkspace(runId: string, occurredAt: string): Promise<void>;
  /** Marks an unowned active workspace removed; returns false when it was owned or already removed. */
  markRemoved(path: string, occurredAt: string): Promise<boolean>;
}

export interface WorkflowCatalogStore {
  getWorkflow(name: string): Promise<WorkflowDefinition | null>;
  listWorkflows(): Promise<WorkflowDefinition[]>;
  insertWorkflow(definition: WorkflowDefinition, occurredAt: string): Promise<void>;
  updateWorkflow(definition: WorkflowDefinition, occurredAt: string): Promise<void>;
}
