import { randomBytes } from 'node:crypto';
import {
  InvalidMessageError,
  InvalidRunRequestError,
  isControlLineType,
  isWorkflowEngineError,
  parseControlLine,
  RunNotFoundError,
  RunNotRunningError,
  toErrorMessage,
  toNonNegativeNumber,
  UnknownWorkflowError,
  WorkflowEngineError,
  type BackendEvent,
  type BackendExecution,
  type EngineLogger,
  type ExecutionBackend,
  type ExecutionRequest,
  type InjectedMessage,
  type InjectedMessageKind,
  type LogEntry,
  type RunError,
  type RunMetrics,
  type RunRecord,
  type RunRequest,
  type RunStore,
  type WorkflowCatalogStore,
  type WorkflowDefinition,
  type WorkspaceRef,
} from '@runwright/shared';
import { AllocationGate, type AllocationTicket } from './allocationGate.js';
import type { LogStore } from './logStore.js';
import { isRunTerminal, transitionRun } from './stateMachine.js';

export const DEFAULT_MAX_TURNS = 30;
export const MAX_TURNS_LIMIT = 100;
export const DEFAULT_TIMEOUT_SECONDS = 3600;
// Largest delay a Node.js timer accepts, in whole seconds.
export const MAX_TIMEOUT_SECONDS = 2_147_483;
export const DEFAULT_BASE_BRANCH = 'main';
export const DEFAULT_STATUS_TAIL = 20;

const RUN_ID_PATTERN = /^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/;

/** The slice of the Workspace Manager a run needs. */
export type RunWorkspaceAllocator = {
  allocate(runId: string, baseBranch: string, context: { workflowName?: string }): Promise<WorkspaceRef>;
  deallocate(runId: string): Promise<unknown>;
  touch(runId: string, at?: Date): Promise<void>;
};

export type StartRunRequest = {
  message: string;
  maxTurns?: number;
  timeoutSeconds?: number;
  baseBranch?: string;
  sessionId?: string | null;
  /** Caller-chosen id; must not be in use. */
  runId?: string;
};

export type RunLogView = 'none' | 'tail' | 'full';

export type RunStatusOptions = {
  logs?: RunLogView;
  tail?: number;
};

export type RunStatusSnapshot = {
  run: RunRecord;
  active: boolean;
  metrics: RunMetrics;
  logs: LogEntry[];
};

export type RunLifecycleManagerOptions = {
  runs: RunStore;
  catalog: WorkflowCatalogStore;
  logs: LogStore;
  workspaces: RunWorkspaceAllocator;
  backend: ExecutionBackend;
  gate?: AllocationGate;
  defaultBaseBranch?: string;
  defaultMaxTurns?: number;
  defaultTimeoutSeconds?: number;
  logger?: EngineLogger;
  now?: () => Date;
  createRunId?: () => string;
};

type StopReason = 'timeout' | 'shutdown' | 'killed';

type ActiveRun = {
  runId: string;
  timeoutSeconds: number;
  execution: BackendExecution | null;
  stopReason: StopReason | null;
  /** Settles when stopReason is set. */
  stopped: Promise<void>;
  signalStopped: () => void;
};

const KILLED_MESSAGE = 'Run was terminated by request.';

type RunOutcome =
  | {
      status: 'completed';
      result: string;
      turnCount: number | null;
      costEstimate: number | null;
      data: Record<string, unknown>;
    }
  | {
      status: 'failed' | 'timed_out';
      error: RunError;
      turnCount: number | null;
      costEstimate: number | null;
    };

export function createRunId(): string {
  return `${Date.now().toString(36)}-${randomBytes(4).toString('hex')}`;
}

function toRunError(error: unknown, fallbackCode: RunError['code']): RunError {
  if (isWorkflowEngineError(error)) {
    return error.details === undefined
      ? { code: error.code, message: error.message }
      : { code: error.code, message: error.message, details: error.details };
  }

  return { code: fallbackCode, message: toErrorMessage(error) };
}

function toElapsedSeconds(startedAt: string | null, finishedAt: Date): number | null {
  if (startedAt === null) {
    return null;
  }

  const startedAtMs = Date.parse(startedAt);
  if (Number.isNaN(startedAtMs)) {
    return null;
  }

  return Math.max(0, finishedAt.getTime() - startedAtMs) / 1000;
}

function failureOutcome(
  status: 'failed' | 'timed_out',
  error: RunError,
  metrics: { turnCount?: unknown; costEstimate?: unknown } = {},
): RunOutcome {
  return {
    status,
    error,
    turnCount: toNonNegativeNumber(metrics.turnCount) ?? null,
    costEstimate: toNonNegativeNumber(metrics.costEstimate) ?? null,
  };
}

/**
 * Owns the lifecycle of every run started through this process: admission,
 * workspace allocation, backend execution, timeout, and a single finalization.
 *
 * Execution happens in the background; callers observe it through the run
 * store and the log store. Background failures never reach callers, they end
 * up as run state.
 */
export class RunLifecycleManager {
  private readonly runs: RunStore;
  private readonly catalog: WorkflowCatalogStore;
  private readonly logs: LogStore;
  private readonly workspaces: RunWorkspaceAllocator;
  private readonly backend: ExecutionBackend;
  private readonly gate: AllocationGate;
  private readonly defaultBaseBranch: string;
  private readonly defaultMaxTurns: number;
  private readonly defaultTimeoutSeconds: number;
  private readonly logger: EngineLogger;
  private readonly now: () => Date;
  private readonly createRunId: () => string;
  private readonly activeRuns = new Map<string, ActiveRun>();
  private readonly executions = new Map<string, Promise<RunRecord | null>>();
  private shuttingDown = false;

  constructor(options: RunLifecycleManagerOptions) {
    this.runs = options.runs;
    this.catalog = options.catalog;
    this.logs = options.logs;
    this.workspaces = options.workspaces;
    this.backend = options.backend;
    this.gate = options.gate ?? new AllocationGate();
    this.defaultBaseBranch = options.defaultBaseBranch ?? DEFAULT_BASE_BRANCH;
    this.defaultMaxTurns = options.defaultMaxTurns ?? DEFAULT_MAX_TURNS;
    this.defaultTimeoutSeconds = options.defaultTimeoutSeconds ?? DEFAULT_TIMEOUT_SECONDS;
    this.logger = options.logger ?? console;
    this.now = options.now ?? (() => new Date());
    this.createRunId = options.createRunId ?? createRunId;
  }

  /** Creates a pending run and schedules its execution; resolves with the run id. */
  async startRun(workflowName: string, input: StartRunRequest): Promise<string> {
    if (this.shuttingDown) {
      throw new WorkflowEngineError('ADMISSION_REJECTED', 'Run admission is closed because the engine is shutting down.');
    }

    const workflow = await this.resolveWorkflow(workflowName);
    const request = this.normalizeRequest(workflow, input);
    const runId = await this.resolveRunId(input.runId);

    const ticket = this.gate.admit();
    let record: RunRecord;
    try {
      record = await this.runs.createRun({
        runId,
        workflowName: workflow.name,
        status: 'pending',
        request,
        workspace: null,
        backendRef: null,
        sessionId: request.sessionId,
        createdAt: this.now().toISOString(),
        startedAt: null,
        finishedAt: null,
        metrics: { elapsedSeconds: null, turnCount: null, costEstimate: null },
        error: null,
      });
    } catch (error) {
      ticket.release();
      throw error;
    }

    let signalStopped: () => void = () => undefined;
    const stopped = new Promise<void>(resolve => {
      signalStopped = resolve;
    });
    const active: ActiveRun = {
      runId,
      timeoutSeconds: request.timeoutSeconds,
      execution: null,
      stopReason: null,
      stopped,
      signalStopped,
    };
    this.activeRuns.set(runId, active);

    const execution: Promise<RunRecord | null> = this.executeRun(active, ticket, workflow, record)
      .catch((error: unknown) => this.markRunTerminalAfterBackgroundFailure(active, error))
      .finally(() => {
        this.activeRuns.delete(runId);
        if (this.executions.get(runId) === execution) {
          this.executions.delete(runId);
        }
      });
    this.executions.set(runId, execution);

    return runId;
  }

  async getStatus(runId: string, options: RunStatusOptions = {}): Promise<RunStatusSnapshot> {
    const run = await this.requireRun(runId);
    const view = options.logs ?? 'none';
    let logs: LogEntry[] = [];
    if (view === 'full') {
      logs = await this.logs.readAll(runId);
    } else if (view === 'tail') {
      logs = await this.logs.readTail(runId, options.tail ?? DEFAULT_STATUS_TAIL);
    }

    const metrics = run.status === 'running'
      ? { ...run.metrics, elapsedSeconds: toElapsedSeconds(run.startedAt, this.now()) }
      : run.metrics;

    return {
      run,
      active: this.activeRuns.has(runId),
      metrics,
      logs,
    };
  }

  /**
   * Forwards a message to the run's agent. Checks run existence, then that the
   * run is executing here, then the message itself.
   */
  async injectMessage(runId: string, kind: string, body: string): Promise<InjectedMessage> {
    try {
      const execution = await this.resolveInjectionTarget(runId);
      if (!isControlLineType(kind)) {
        throw new InvalidMessageError(`Injected message kind must be one of: user, system; received "${kind}".`, {
          kind,
        });
      }

      const message = body.trim();
      if (message.length === 0) {
        throw new InvalidMessageError('Injected message must not be empty.');
      }

      return await this.deliverMessage(runId, execution, kind, message);
    } catch (error) {
      this.logInjectionRejection(runId, error);
      throw error;
    }
  }

  /** Same as injectMessage, for a raw control line as read from the wire. */
  async injectControlLine(runId: string, line: string): Promise<InjectedMessage> {
    try {
      const execution = await this.resolveInjectionTarget(runId);
      const parsed = parseControlLine(line);
      if (!parsed.ok) {
        throw new InvalidMessageError(parsed.message, { reason: parsed.reason });
      }

      return await this.deliverMessage(runId, execution, parsed.value.type, parsed.value.message);
    } catch (error) {
      this.logInjectionRejection(runId, error);
      throw error;
    }
  }

  async listWorkflows(): Promise<WorkflowDefinition[]> {
    return this.catalog.listWorkflows();
  }

  isRunActive(runId: string): boolean {
    return this.activeRuns.has(runId);
  }

  listActiveRunIds(): string[] {
    return [...this.activeRuns.keys()].sort();
  }

  /** Resolves with the stored record once the run's execution in this process settles. */
  async waitForRun(runId: string): Promise<RunRecord> {
    const execution = this.executions.get(runId);
    if (execution) {
      const settled = await execution;
      if (settled) {
        return settled;
      }
    }

    return this.requireRun(runId);
  }

  /**
   * Fails runs left pending or running by an engine process that is gone.
   * Only call this when no other engine process shares the store.
   */
  async recoverInterruptedRuns(): Promise<RunRecord[]> {
    const candidates = await this.runs.listRuns({ statuses: ['pending', 'running'] });
    const recovered: RunRecord[] = [];

    for (const run of candidates) {
      if (this.activeRuns.has(run.runId)) {
        continue;
      }

      const finishedAt = this.now();
      const error: RunError = {
        code: 'BACKEND_RUNTIME_ERROR',
        message: 'Run was interrupted before it finished.',
        details: { interruptedStatus: run.status },
      };
      const metrics: RunMetrics = { ...run.metrics, elapsedSeconds: toElapsedSeconds(run.startedAt, finishedAt) };
      const updated = await this.runs.updateRun(run.runId, run.status, {
        status: transitionRun(run.status, 'failed'),
        finishedAt: finishedAt.toISOString(),
        metrics,
        error,
      });
      if (!updated) {
        continue;
      }

      await this.releaseWorkspace(run.runId);
      await this.appendFinalEntry(run.runId, 'error', { ...error, status: 'failed', metrics });
      this.logger.warn(`Run id=${run.runId} marked failed after interruption (was ${run.status}).`);
      recovered.push(updated);
    }

    return recovered;
  }

  /**
   * Stops one run started by this process. The run fails once its agent is
   * gone; resolves with the stored record.
   */
  async terminateRun(runId: string): Promise<RunRecord> {
    const run = await this.requireRun(runId);
    const active = this.activeRuns.get(runId);
    if (!active || isRunTerminal(run.status)) {
      throw new RunNotRunningError(runId, run.status, 'no agent execution is attached in this process');
    }

    if (!active.stopReason) {
      this.logger.warn(`Run id=${runId} termination requested; stopping the backend.`);
    }
    this.stopRun(active, 'killed');
    return this.waitForRun(runId);
  }

  /** Terminates every active backend and waits for the runs to settle. */
  async shutdown(): Promise<void> {
    this.shuttingDown = true;
    for (const active of this.activeRuns.values()) {
      this.stopRun(active, 'shutdown');
    }

    await Promise.all(this.executions.values());
  }

  private async executeRun(
    active: ActiveRun,
    ticket: AllocationTicket,
    workflow: WorkflowDefinition,
    record: RunRecord,
  ): Promise<RunRecord> {
    const { runId, request } = record;

    let workspace: WorkspaceRef;
    try {
      workspace = await this.acquireWorkspace(active, ticket, request.baseBranch, workflow.name);
    } catch (error) {
      return this.failPendingRun(runId, toRunError(error, 'WORKSPACE_ALLOCATION_ERROR'));
    }

    const running = await this.runs.updateRun(runId, 'pending', {
      status: transitionRun('pending', 'running'),
      startedAt: this.now().toISOString(),
      workspace: { path: workspace.path, branch: workspace.branch },
    });
    if (!running) {
      await this.releaseWorkspace(runId);
      return this.requireRun(runId);
    }

    await this.logs.append(runId, 'progress', {
      step: 'workspace_allocated',
      payload: { path: workspace.path, branch: workspace.branch, baseBranch: request.baseBranch },
    });

    const executionRequest: ExecutionRequest = {
      runId,
      workflowName: workflow.name,
      promptTemplate: workflow.promptTemplate,
      allowedTools: workflow.allowedTools,
      message: request.message,
      maxTurns: request.maxTurns,
      sessionId: request.sessionId,
    };

    let execution: BackendExecution;
    try {
      execution = this.backend.execute(workspace, executionRequest);
    } catch (error) {
      return this.finalizeRun(
        runId,
        failureOutcome('failed', {
          code: 'BACKEND_START_ERROR',
          message: `Failed to start the ${this.backend.name} backend: ${toErrorMessage(error)}`,
        }),
      );
    }

    active.execution = execution;
    if (active.stopReason) {
      execution.terminate();
    }
    await this.runs.updateRun(runId, 'running', { backendRef: execution.handle });

    const timeout = setTimeout(() => this.stopRun(active, 'timeout'), request.timeoutSeconds * 1000);
    let outcome: RunOutcome;
    try {
      outcome = await this.consumeEvents(active, execution);
    } finally {
      clearTimeout(timeout);
    }

    await this.awaitBackendExit(execution);
    return this.finalizeRun(runId, outcome);
  }

  private async acquireWorkspace(
    active: ActiveRun,
    ticket: AllocationTicket,
    baseBranch: string,
    workflowName: string,
  ): Promise<WorkspaceRef> {
    try {
      await Promise.race([ticket.granted, active.stopped]);
      if (active.stopReason === 'killed') {
        throw new WorkflowEngineError('BACKEND_RUNTIME_ERROR', KILLED_MESSAGE, { reason: 'killed' });
      }

      if (this.shuttingDown) {
        throw new WorkflowEngineError('BACKEND_START_ERROR', 'Engine shut down before the run started.');
      }

      return await this.workspaces.allocate(active.runId, baseBranch, { workflowName });
    } finally {
      ticket.release();
    }
  }

  private async consumeEvents(active: ActiveRun, execution: BackendExecution): Promise<RunOutcome> {
    let outcome: RunOutcome | null = null;

    try {
      for await (const event of execution.events) {
        if (active.stopReason) {
          break;
        }

        await this.touchWorkspace(active.runId);
        outcome = await this.recordEvent(active.runId, event);
        if (outcome) {
          break;
        }
      }
    } catch (error) {
      if (!active.stopReason) {
        return failureOutcome('failed', {
          code: 'BACKEND_RUNTIME_ERROR',
          message: `Backend event stream failed: ${toErrorMessage(error)}`,
        });
      }
    }

    if (outcome) {
      return outcome;
    }

    if (active.stopReason === 'timeout') {
      return failureOutcome('timed_out', {
        code: 'TIMEOUT_EXCEEDED',
        message: `Run exceeded its ${active.timeoutSeconds}s timeout.`,
        details: { timeoutSeconds: active.timeoutSeconds },
      });
    }

    if (active.stopReason === 'shutdown') {
      return failureOutcome('failed', {
        code: 'BACKEND_RUNTIME_ERROR',
        message: 'Run was terminated because the engine shut down.',
      });
    }

    if (active.stopReason === 'killed') {
      return failureOutcome('failed', {
        code: 'BACKEND_RUNTIME_ERROR',
        message: KILLED_MESSAGE,
        details: { reason: 'killed' },
      });
    }

    return failureOutcome('failed', {
      code: 'BACKEND_RUNTIME_ERROR',
      message: 'Backend event stream ended without a completion or error event.',
    });
  }

  /** Appends a non-terminal event; returns the outcome for terminal ones. */
  private async recordEvent(runId: string, event: BackendEvent): Promise<RunOutcome | null> {
    switch (event.type) {
      case 'init':
        if (event.sessionId !== null) {
          await this.runs.updateRun(runId, 'running', { sessionId: event.sessionId });
        }
        await this.logs.append(runId, 'init', { ...event.data, sessionId: event.sessionId });
        return null;
      case 'progress':
        await this.logs.append(runId, 'progress', { step: event.step, payload: event.payload });
        return null;
      case 'raw':
        await this.logs.append(runId, 'raw', { line: event.line });
        return null;
      case 'completion':
        return {
          status: 'completed',
          result: event.result,
          turnCount: event.turnCount,
          costEstimate: event.costEstimate,
          data: event.data,
        };
      case 'error':
        return failureOutcome(
          'failed',
          { code: event.code, message: event.message, details: event.detail },
          event.detail,
        );
    }
  }

  private async finalizeRun(runId: string, outcome: RunOutcome): Promise<RunRecord> {
    const current = await this.requireRun(runId);
    const finishedAt = this.now();
    const metrics: RunMetrics = {
      elapsedSeconds: toElapsedSeconds(current.startedAt, finishedAt),
      turnCount: outcome.turnCount,
      costEstimate: outcome.costEstimate,
    };

    const finalized = await this.runs.updateRun(runId, 'running', {
      status: transitionRun('running', outcome.status),
      finishedAt: finishedAt.toISOString(),
      metrics,
      error: outcome.status === 'completed' ? null : outcome.error,
    });
    await this.releaseWorkspace(runId);

    if (!finalized) {
      this.logger.warn(`Run id=${runId} was already finalized (status=${current.status}); keeping the stored outcome.`);
      return this.requireRun(runId);
    }

    if (outcome.status === 'completed') {
      await this.appendFinalEntry(runId, 'completion', {
        result: outcome.result,
        status: outcome.status,
        metrics,
        data: outcome.data,
      });
    } else {
      await this.appendFinalEntry(runId, 'error', { ...outcome.error, status: outcome.status, metrics });
    }

    return finalized;
  }

  private async failPendingRun(runId: string, error: RunError): Promise<RunRecord> {
    const failed = await this.runs.updateRun(runId, 'pending', {
      status: transitionRun('pending', 'failed'),
      finishedAt: this.now().toISOString(),
      error,
    });
    if (!failed) {
      return this.requireRun(runId);
    }

    await this.appendFinalEntry(runId, 'error', { ...error, status: 'failed', metrics: failed.metrics });
    return failed;
  }

  private async markRunTerminalAfterBackgroundFailure(active: ActiveRun, originalError: unknown): Promise<RunRecord | null> {
    const { runId } = active;
    this.logger.error(`Run id=${runId} background execution failed: ${toErrorMessage(originalError)}`);
    if (active.execution) {
      await this.awaitBackendExit(active.execution);
    }

    try {
      const run = await this.runs.getRun(runId);
      if (!run || isRunTerminal(run.status)) {
        return run;
      }

      const error: RunError = { code: 'BACKEND_RUNTIME_ERROR', message: toErrorMessage(originalError) };
      const finishedAt = this.now();
      const metrics: RunMetrics = { ...run.metrics, elapsedSeconds: toElapsedSeconds(run.startedAt, finishedAt) };
      const updated = await this.runs.updateRun(runId, run.status, {
        status: transitionRun(run.status, 'failed'),
        finishedAt: finishedAt.toISOString(),
        metrics,
        error,
      });
      await this.releaseWorkspace(runId);
      if (updated) {
        await this.appendFinalEntry(runId, 'error', { ...error, status: 'failed', metrics });
      }

      return updated ?? (await this.runs.getRun(runId));
    } catch (transitionError) {
      this.logger.error(`Run id=${runId} background failure status update failed: ${toErrorMessage(transitionError)}`);
      return null;
    }
  }

  private stopRun(active: ActiveRun, reason: StopReason): void {
    if (active.stopReason) {
      return;
    }

    active.stopReason = reason;
    active.signalStopped();
    if (reason === 'timeout') {
      this.logger.warn(`Run id=${active.runId} exceeded its ${active.timeoutSeconds}s timeout; terminating the backend.`);
    }
    active.execution?.terminate();
  }

  /** Keeps the workspace owned until the agent behind the execution is gone. */
  private async awaitBackendExit(execution: BackendExecution): Promise<void> {
    execution.terminate();
    await execution.exited;
  }

  private async deliverMessage(
    runId: string,
    execution: BackendExecution,
    kind: InjectedMessageKind,
    body: string,
  ): Promise<InjectedMessage> {
    execution.sendInput({ type: kind, message: body });
    const injected: InjectedMessage = { runId, kind, body, acceptedAt: this.now().toISOString() };

    try {
      await this.logs.append(runId, 'progress', {
        step: 'message_injected',
        payload: { kind, body, acceptedAt: injected.acceptedAt },
      });
    } catch (error) {
      this.logger.warn(`Run id=${runId} injected message log entry failed: ${toErrorMessage(error)}`);
    }

    return injected;
  }

  private async resolveInjectionTarget(runId: string): Promise<BackendExecution> {
    const run = await this.runs.getRun(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }

    if (run.status !== 'running') {
      throw new RunNotRunningError(runId, run.status);
    }

    const active = this.activeRuns.get(runId);
    if (!active?.execution) {
      throw new RunNotRunningError(runId, run.status, 'no agent execution is attached in this process');
    }

    if (active.stopReason) {
      throw new RunNotRunningError(runId, run.status, `the run is stopping after ${active.stopReason}`);
    }

    return active.execution;
  }

  private logInjectionRejection(runId: string, error: unknown): void {
    if (isWorkflowEngineError(error)) {
      this.logger.warn(`Run id=${runId} message injection rejected (${error.code}): ${error.message}`);
      return;
    }

    this.logger.error(`Run id=${runId} message injection failed: ${toErrorMessage(error)}`);
  }

  private async appendFinalEntry(
    runId: string,
    eventType: 'completion' | 'error',
    data: Record<string, unknown>,
  ): Promise<void> {
    try {
      await this.logs.append(runId, eventType, data, { final: true });
    } catch (error) {
      this.logger.error(`Run id=${runId} final log entry failed: ${toErrorMessage(error)}`);
    }
  }

  private async releaseWorkspace(runId: string): Promise<void> {
    try {
      await this.workspaces.deallocate(runId);
    } catch (error) {
      this.logger.error(`Run id=${runId} workspace release failed: ${toErrorMessage(error)}`);
    }
  }

  private async touchWorkspace(runId: string): Promise<void> {
    try {
      await this.workspaces.touch(runId, this.now());
    } catch (error) {
      this.logger.warn(`Run id=${runId} workspace activity update failed: ${toErrorMessage(error)}`);
    }
  }

  private async requireRun(runId: string): Promise<RunRecord> {
    const run = await this.runs.getRun(runId);
    if (!run) {
      throw new RunNotFoundError(runId);
    }

    return run;
  }

  private async resolveWorkflow(workflowName: string): Promise<WorkflowDefinition> {
    const workflow = await this.catalog.getWorkflow(workflowName);
    if (workflow) {
      return workflow;
    }

    const available = await this.catalog.listWorkflows();
    throw new UnknownWorkflowError(
      workflowName,
      available.map(definition => definition.name),
    );
  }

  private async resolveRunId(requested: string | undefined): Promise<string> {
    if (requested === undefined) {
      return this.createRunId();
    }

    if (!RUN_ID_PATTERN.test(requested)) {
      throw new InvalidRunRequestError(
        `Run id "${requested}" is invalid; use up to 128 letters, digits, ".", "_" or "-", starting with a letter or digit.`,
        { field: 'runId', value: requested },
      );
    }

    if (await this.runs.getRun(requested)) {
      throw new InvalidRunRequestError(`Run id "${requested}" is already in use.`, { field: 'runId', value: requested });
    }

    return requested;
  }

  private normalizeRequest(workflow: WorkflowDefinition, input: StartRunRequest): RunRequest {
    const message = typeof input.message === 'string' ? input.message.trim() : '';
    if (message.length === 0) {
      throw new InvalidRunRequestError('Run message must not be empty.', { field: 'message' });
    }

    const maxTurns = input.maxTurns ?? workflow.suggestedMaxTurns ?? this.defaultMaxTurns;
    if (!Number.isInteger(maxTurns) || maxTurns < 1 || maxTurns > MAX_TURNS_LIMIT) {
      throw new InvalidRunRequestError(
        `Max turns must be an integer between 1 and ${MAX_TURNS_LIMIT}; received ${maxTurns}.`,
        { field: 'maxTurns', value: maxTurns },
      );
    }

    const timeoutSeconds = input.timeoutSeconds ?? this.defaultTimeoutSeconds;
    if (!Number.isFinite(timeoutSeconds) || timeoutSeconds <= 0 || timeoutSeconds > MAX_TIMEOUT_SECONDS) {
      throw new InvalidRunRequestError(
        `Timeout must be a positive number of seconds up to ${MAX_TIMEOUT_SECONDS}; received ${timeoutSeconds}.`,
        { field: 'timeoutSeconds', value: timeoutSeconds },
      );
    }

    const baseBranch = (input.baseBranch ?? this.defaultBaseBranch).trim();
    if (baseBranch.length === 0) {
      throw new InvalidRunRequestError('Base branch must not be blank.', { field: 'baseBranch' });
    }

    const sessionId = input.sessionId?.trim() ?? '';

    return {
      message,
      maxTurns,
      timeoutSeconds,
      baseBranch,
      sessionId: sessionId.length > 0 ? sessionId : null,
    };
  }
}
