export type WorkflowEngineErrorCode =
  | 'UNKNOWN_WORKFLOW'
  | 'RUN_NOT_FOUND'
  | 'WORKSPACE_ALLOCATION_ERROR'
  | 'BACKEND_START_ERROR'
  | 'BACKEND_RUNTIME_ERROR'
  | 'RUN_NOT_RUNNING'
  | 'INVALID_MESSAGE'
  | 'TIMEOUT_EXCEEDED'
  | 'INVALID_RUN_REQUEST'
  | 'ADMISSION_REJECTED';

export class WorkflowEngineError extends Error {
  readonly code: WorkflowEngineErrorCode;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(
    code: WorkflowEngineErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'WorkflowEngineError';
    this.code = code;
    this.details = details;
    this.cause = cause;
  }
}

export class UnknownWorkflowError extends WorkflowEngineError {
  readonly workflowName: string;

  constructor(workflowName: string, availableWorkflows: readonly string[] = []) {
    const available = [...availableWorkflows].sort();
    const availableSuffix = available.length > 0 ? ` Available workflows: ${available.join(', ')}.` : '';
    super('UNKNOWN_WORKFLOW', `Unknown workflow "${workflowName}".${availableSuffix}`, {
      workflowName,
      availableWorkflows: available,
    });
    this.name = 'UnknownWorkflowError';
    this.workflowName = workflowName;
  }
}

export class RunNotFoundError extends WorkflowEngineError {
  constructor(runId: string) {
    super('RUN_NOT_FOUND', `Run id=${runId} was not found.`, { runId });
    this.name = 'RunNotFoundError';
  }
}

export class RunNotRunningError extends WorkflowEngineError {
  constructor(runId: string, status: string, note?: string) {
    const suffix = note ? `; ${note}` : '';
    super('RUN_NOT_RUNNING', `Run id=${runId} is not running (status=${status}${suffix}).`, { runId, status });
    this.name = 'RunNotRunningError';
  }
}

export class InvalidMessageError extends WorkflowEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_MESSAGE', message, details);
    this.name = 'InvalidMessageError';
  }
}

export class WorkspaceAllocationError extends WorkflowEngineError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super('WORKSPACE_ALLOCATION_ERROR', message, details, cause);
    this.name = 'WorkspaceAllocationError';
  }
}

export class InvalidRunRequestError extends WorkflowEngineError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_RUN_REQUEST', message, details);
    this.name = 'InvalidRunRequestError';
  }
}

export class AdmissionRejectedError extends WorkflowEngineError {
  constructor(queuedRuns: number, maxQueuedRuns: number) {
    super(
      'ADMISSION_REJECTED',
      `Run admission rejected: ${queuedRuns} runs are already waiting for a workspace (limit ${maxQueuedRuns}).`,
      { queuedRuns, maxQueuedRuns },
    );
    this.name = 'AdmissionRejectedError';
  }
}

export function isWorkflowEngineError(error: unknown): error is WorkflowEngineError {
  return error instanceof WorkflowEngineError;
}
