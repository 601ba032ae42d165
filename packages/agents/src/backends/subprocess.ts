import { spawn, type SpawnOptions } from 'node:child_process';
import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import {
  AsyncChannel,
  encodeControlLine,
  hasErrorCode,
  toErrorMessage,
  toNonNegativeNumber,
  toRecord,
  toTrimmedString,
  WorkflowEngineError,
  type BackendErrorCode,
  type BackendEvent,
  type BackendExecution,
  type ControlLine,
  type EngineLogger,
  type ExecutionBackend,
  type ExecutionRequest,
  type WorkspaceRef,
} from '@runwright/shared';
import { isAgentMessage, mapAgentMessage } from './agentMessages.js';

export const DEFAULT_TERMINATE_GRACE_MS = 5_000;

const STDERR_TAIL_LINES = 20;

/** The part of a spawned child process the backend relies on. */
export interface AgentProcess {
  readonly pid?: number | undefined;
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  once(event: 'error', listener: (error: Error) => void): unknown;
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnAgentProcess = (command: string, args: readonly string[], options: SpawnOptions) => AgentProcess;

export type KillProcessGroup = (pid: number, signal: NodeJS.Signals) => void;

export type SubprocessExecutionBackendOptions = {
  command: string;
  args?: readonly string[];
  env?: NodeJS.ProcessEnv;
  terminateGraceMs?: number;
  logger?: Pick<EngineLogger, 'warn'>;
  spawnProcess?: SpawnAgentProcess;
  killProcessGroup?: KillProcessGroup;
};

function defaultKillProcessGroup(pid: number, signal: NodeJS.Signals): void {
  try {
    process.kill(-pid, signal);
  } catch (error) {
    if (!hasErrorCode(error, 'ESRCH')) {
      throw error;
    }
  }
}

function readNullableNumber(value: unknown): number | null {
  return toNonNegativeNumber(value) ?? null;
}

/**
 * Maps the engine's own line protocol: `init`, `progress`, `completion` and
 * `error` records written by agents that speak it directly.
 */
export function mapNativeEvent(record: Record<string, unknown>): BackendEvent | null {
  switch (record.type) {
    case 'init':
      return {
        type: 'init',
        sessionId: toTrimmedString(record.session_id) ?? null,
        data: toRecord(record.data) ?? {},
      };
    case 'progress':
      return {
        type: 'progress',
        step: toTrimmedString(record.step) ?? 'progress',
        payload: toRecord(record.payload) ?? {},
      };
    case 'completion':
      return {
        type: 'completion',
        result: typeof record.result === 'string' ? record.result : '',
        turnCount: readNullableNumber(record.turn_count),
        costEstimate: readNullableNumber(record.cost_estimate),
        data: toRecord(record.data) ?? {},
      };
    case 'error':
      return {
        type: 'error',
        code: 'BACKEND_RUNTIME_ERROR',
        message: toTrimmedString(record.message) ?? 'Agent reported an error.',
        detail: toRecord(record.detail) ?? {},
      };
    default:
      return null;
  }
}

/** Parses one stdout line into the events it carries. */
export function parseAgentOutputLine(line: string): BackendEvent[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return [{ type: 'raw', line }];
  }

  const record = toRecord(parsed);
  if (!record) {
    return [{ type: 'raw', line }];
  }

  const nativeEvent = mapNativeEvent(record);
  if (nativeEvent) {
    return [nativeEvent];
  }

  if (isAgentMessage(record)) {
    return mapAgentMessage(record);
  }

  return [{ type: 'raw', line }];
}

function describeExit(code: number | null, signal: NodeJS.Signals | null): string {
  if (signal) {
    return `Agent process was killed by ${signal} before reporting a result.`;
  }

  if (code === 0) {
    return 'Agent process exited without reporting a result.';
  }

  return `Agent process exited with code ${code ?? 'unknown'} before reporting a result.`;
}

class SubprocessExecution implements BackendExecution {
  readonly handle: string;
  readonly events: AsyncIterable<BackendEvent>;
  readonly exited: Promise<void>;
  private readonly runId: string;
  private readonly child: AgentProcess;
  private readonly output = new AsyncChannel<BackendEvent>();
  private readonly stderrTail: string[] = [];
  private readonly graceMs: number;
  private readonly killProcessGroup: KillProcessGroup;
  private readonly logger: Pick<EngineLogger, 'warn'>;
  private initialized = false;
  private finished = false;
  private processGone = false;
  private killTimer: NodeJS.Timeout | undefined;
  private resolveExited: () => void = () => undefined;

  constructor(
    request: ExecutionRequest,
    child: AgentProcess,
    options: { graceMs: number; killProcessGroup: KillProcessGroup; logger: Pick<EngineLogger, 'warn'> },
  ) {
    this.runId = request.runId;
    this.child = child;
    this.graceMs = options.graceMs;
    this.killProcessGroup = options.killProcessGroup;
    this.logger = options.logger;
    this.handle = child.pid === undefined ? `subprocess:${request.runId}` : `pid:${child.pid}`;
    this.events = this.output;
    this.exited = new Promise(resolve => {
      this.resolveExited = resolve;
    });

    child.once('error', error => this.handleSpawnError(error));
    child.once('close', (code, signal) => this.handleClose(code, signal));
    child.stdin?.on('error', error => {
      this.logger.warn(`Run id=${this.runId} agent stdin write failed: ${error.message}`);
    });

    if (child.stdout) {
      const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });
      lines.on('line', line => this.handleStdoutLine(line));
    }

    if (child.stderr) {
      const lines = createInterface({ input: child.stderr, crlfDelay: Infinity });
      lines.on('line', line => {
        this.stderrTail.push(line);
        if (this.stderrTail.length > STDERR_TAIL_LINES) {
          this.stderrTail.shift();
        }
      });
    }

    if (request.promptTemplate.trim().length > 0) {
      this.writeLine({ type: 'system', message: request.promptTemplate });
    }
    this.writeLine({ type: 'user', message: request.message });
  }

  sendInput(line: ControlLine): void {
    if (this.finished || this.processGone) {
      throw new WorkflowEngineError(
        'RUN_NOT_RUNNING',
        `Agent process for run id=${this.runId} has finished; input is no longer accepted.`,
        { runId: this.runId },
      );
    }

    this.writeLine(line);
  }

  terminate(): void {
    if (this.finished) {
      return;
    }

    this.finish();
    this.signal('SIGTERM');
    this.scheduleKill();
  }

  private writeLine(line: ControlLine): void {
    const stdin = this.child.stdin;
    if (!stdin || stdin.writableEnded || stdin.destroyed) {
      return;
    }

    stdin.write(encodeControlLine(line));
  }

  private handleStdoutLine(line: string): void {
    if (this.finished || line.trim().length === 0) {
      return;
    }

    for (const event of parseAgentOutputLine(line)) {
      if (event.type === 'init') {
        this.initialized = true;
      }

      this.output.push(event);
      if (event.type === 'completion' || event.type === 'error') {
        // The outcome is decided; let the agent exit on end of input.
        this.finish();
        this.child.stdin?.end();
        this.scheduleKill();
        return;
      }
    }
  }

  private handleSpawnError(error: Error): void {
    if (this.finished) {
      return;
    }

    const code: BackendErrorCode = this.initialized ? 'BACKEND_RUNTIME_ERROR' : 'BACKEND_START_ERROR';
    this.output.push({
      type: 'error',
      code,
      message: `Agent process failed: ${error.message}`,
      detail: { errno: hasErrorCode(error, 'ENOENT') ? 'ENOENT' : null },
    });
    this.finish();
    if (this.child.pid === undefined) {
      // Never started, so no close event will follow.
      this.markExited();
    }
  }

  private handleClose(code: number | null, signal: NodeJS.Signals | null): void {
    this.markExited();
    if (this.finished) {
      return;
    }

    this.output.push({
      type: 'error',
      code: this.initialized ? 'BACKEND_RUNTIME_ERROR' : 'BACKEND_START_ERROR',
      message: describeExit(code, signal),
      detail: { exitCode: code, signal, stderrTail: [...this.stderrTail] },
    });
    this.finish();
  }

  private signal(signal: NodeJS.Signals): void {
    if (this.processGone) {
      return;
    }

    const pid = this.child.pid;
    try {
      if (pid === undefined) {
        this.child.kill(signal);
      } else {
        this.killProcessGroup(pid, signal);
      }
    } catch (error) {
      this.logger.warn(
        `Run id=${this.runId} failed to send ${signal} to the agent process group: ${toErrorMessage(error)}`,
      );
      this.child.kill(signal);
    }
  }

  private scheduleKill(): void {
    if (this.processGone || this.killTimer) {
      return;
    }

    this.killTimer = setTimeout(() => {
      this.signal('SIGKILL');
      this.killTimer = setTimeout(() => {
        this.killTimer = undefined;
        this.logger.warn(`Run id=${this.runId} agent process did not exit after SIGKILL; no longer waiting for it.`);
        this.resolveExited();
      }, this.graceMs);
    }, this.graceMs);
  }

  private markExited(): void {
    this.processGone = true;
    if (this.killTimer) {
      clearTimeout(this.killTimer);
      this.killTimer = undefined;
    }
    this.resolveExited();
  }

  private finish(): void {
    this.finished = true;
    this.output.close();
  }
}

/**
 * Runs the agent as a child process in its own process group, speaking
 * newline-delimited JSON on stdin and stdout.
 */
export class SubprocessExecutionBackend implements ExecutionBackend {
  readonly name = 'subprocess' as const;
  readonly #command: string;
  readonly #args: readonly string[];
  readonly #env: NodeJS.ProcessEnv;
  readonly #graceMs: number;
  readonly #logger: Pick<EngineLogger, 'warn'>;
  readonly #spawnProcess: SpawnAgentProcess;
  readonly #killProcessGroup: KillProcessGroup;

  constructor(options: SubprocessExecutionBackendOptions) {
    this.#command = options.command;
    this.#args = options.args ?? [];
    this.#env = options.env ?? process.env;
    this.#graceMs = options.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS;
    this.#logger = options.logger ?? console;
    this.#spawnProcess = options.spawnProcess ?? ((command, args, spawnOptions) => spawn(command, args, spawnOptions));
    this.#killProcessGroup = options.killProcessGroup ?? defaultKillProcessGroup;
  }

  execute(workspace: WorkspaceRef, request: ExecutionRequest): BackendExecution {
    const env: NodeJS.ProcessEnv = {
      ...this.#env,
      RUNWRIGHT_RUN_ID: request.runId,
      RUNWRIGHT_WORKFLOW: request.workflowName,
      RUNWRIGHT_MAX_TURNS: String(request.maxTurns),
      RUNWRIGHT_ALLOWED_TOOLS: request.allowedTools.join(','),
      RUNWRIGHT_WORKSPACE_BRANCH: workspace.branch,
    };
    if (request.sessionId) {
      env.RUNWRIGHT_SESSION_ID = request.sessionId;
    }

    const child = this.#spawnProcess(this.#command, this.#args, {
      cwd: workspace.path,
      env,
      detached: true,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    return new SubprocessExecution(request, child, {
      graceMs: this.#graceMs,
      killProcessGroup: this.#killProcessGroup,
      logger: this.#logger,
    });
  }
}
