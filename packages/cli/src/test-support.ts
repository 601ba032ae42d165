import { vi } from 'vitest';
import {
  createSqliteWorkflowCatalogStore,
  migrateDatabase,
  type RunwrightDatabase,
} from '@runwright/db';
import {
  resolveWorktreePath,
  WorkspaceManager,
  type CreateWorktreeParams,
  type WorktreeInfo,
} from '@runwright/git';
import {
  AsyncChannel,
  WorkflowEngineError,
  type BackendEvent,
  type BackendExecution,
  type ControlLine,
  type ExecutionBackend,
  type ExecutionRequest,
  type RunRecord,
  type WorkflowDefinition,
} from '@runwright/shared';
import type { CliDependencies, InputLines } from './types.js';

export const TEST_REPO_DIR = '/tmp/runwright-cli/repo';
export const TEST_WORKTREE_BASE = '/tmp/runwright-cli/worktrees';

export type CapturedIo = {
  stdout: string[];
  stderr: string[];
  io: {
    stdout: (message: string) => void;
    stderr: (message: string) => void;
    cwd: string;
    env: NodeJS.ProcessEnv;
  };
};

export function createCapturedIo(
  options: {
    cwd?: string;
    env?: NodeJS.ProcessEnv;
  } = {},
): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];

  return {
    stdout,
    stderr,
    io: {
      stdout: message => stdout.push(message),
      stderr: message => stderr.push(message),
      cwd: options.cwd ?? '/work/runwright',
      env: options.env ?? {
        RUNWRIGHT_REPO_DIR: TEST_REPO_DIR,
        RUNWRIGHT_WORKTREE_DIR: TEST_WORKTREE_BASE,
      },
    },
  };
}

export class FakeExecution implements BackendExecution {
  readonly handle: string;
  readonly request: ExecutionRequest;
  readonly channel = new AsyncChannel<BackendEvent>();
  readonly inputs: ControlLine[] = [];
  readonly exited: Promise<void>;
  terminated = 0;
  private markExited: () => void = () => undefined;
  onInput: (message: ControlLine) => void = () => undefined;

  constructor(request: ExecutionRequest) {
    this.request = request;
    this.handle = `fake:${request.runId}`;
    this.exited = new Promise(resolve => {
      this.markExited = resolve;
    });
  }

  get events(): AsyncIterable<BackendEvent> {
    return this.channel;
  }

  sendInput(message: ControlLine): void {
    if (this.channel.closed) {
      throw new WorkflowEngineError('RUN_NOT_RUNNING', 'Fake execution has finished.');
    }
    this.inputs.push(message);
    this.onInput(message);
  }

  terminate(): void {
    if (this.channel.closed) {
      return;
    }

    this.terminated += 1;
    this.channel.close();
    this.markExited();
  }

  /** The agent goes away on its own. */
  exit(): void {
    this.channel.close();
    this.markExited();
  }

  emit(event: BackendEvent): void {
    this.channel.push(event);
  }
}

/** Backend whose executions are driven by `script`, called as each one starts. */
export class FakeBackend implements ExecutionBackend {
  readonly name = 'fake';
  readonly executions: FakeExecution[] = [];
  private readonly script: (execution: FakeExecution) => void;

  constructor(script: (execution: FakeExecution) => void) {
    this.script = script;
  }

  execute(_workspace: unknown, request: ExecutionRequest): BackendExecution {
    const execution = new FakeExecution(request);
    this.executions.push(execution);
    this.script(execution);
    return execution;
  }
}

export function completeImmediately(execution: FakeExecution): void {
  execution.emit({ type: 'init', sessionId: 'session-1', data: { model: 'test-model' } });
  execution.emit({ type: 'progress', step: 'assistant', payload: { text: 'Looking at the failing test.' } });
  execution.emit({
    type: 'completion',
    result: 'All tests pass.',
    turnCount: 3,
    costEstimate: 0.25,
    data: {},
  });
}

/**
 * In-memory stand-in for the git commands and filesystem probes the
 * workspace manager uses.
 */
export function createFakeGit() {
  const directories = new Map<string, Date>();
  const branches = new Set<string>(['main']);
  const registered = new Map<string, WorktreeInfo>();

  const overrides = {
    createWorktree: vi.fn(async (_repoDir: string, worktreeBase: string, params: CreateWorktreeParams) => {
      const path = resolveWorktreePath(worktreeBase, params.branch);
      branches.add(params.branch);
      directories.set(path, new Date());
      const info: WorktreeInfo = { path, branch: params.branch, commit: 'abc123' };
      registered.set(path, info);
      return info;
    }),
    removeWorktree: vi.fn(async (_repoDir: string, path: string) => {
      directories.delete(path);
      registered.delete(path);
    }),
    pruneWorktrees: vi.fn(async (_repoDir: string) => undefined),
    deleteBranch: vi.fn(async (_repoDir: string, branch: string) => {
      branches.delete(branch);
    }),
    branchExists: vi.fn(async (_repoDir: string, branch: string) => branches.has(branch)),
    listWorktrees: vi.fn(async (_repoDir: string) => [...registered.values()]),
    statPath: vi.fn(async (path: string) => directories.get(path) ?? null),
    listDirectories: vi.fn(async (_path: string) => [...directories.keys()]),
  };

  return { directories, branches, registered, overrides };
}

export type TestDependencies = {
  dependencies: CliDependencies;
  backend: FakeBackend;
  git: ReturnType<typeof createFakeGit>;
  input: AsyncChannel<string>;
  interrupt: () => void;
};

export function createTestDependencies(
  db: RunwrightDatabase,
  options: {
    script?: (execution: FakeExecution) => void;
    withInput?: boolean;
  } = {},
): TestDependencies {
  const backend = new FakeBackend(options.script ?? completeImmediately);
  const git = createFakeGit();
  const input = new AsyncChannel<string>();
  let interruptHandler: (() => void) | null = null;
  const inputLines: InputLines = {
    lines: input,
    close: () => input.close(),
  };

  return {
    backend,
    git,
    input,
    interrupt: () => interruptHandler?.(),
    dependencies: {
      openDatabase: () => db,
      migrateDatabase: database => migrateDatabase(database),
      createBackend: () => backend,
      createWorkspaceManager: (store, managerOptions) =>
        new WorkspaceManager(store, { ...managerOptions, ...git.overrides }),
      openInputLines: () => (options.withInput ? inputLines : null),
      onInterrupt: handler => {
        interruptHandler = handler;
        return () => {
          interruptHandler = null;
        };
      },
    },
  };
}

export async function seedWorkflow(
  db: RunwrightDatabase,
  overrides: Partial<WorkflowDefinition> = {},
): Promise<WorkflowDefinition> {
  const definition: WorkflowDefinition = {
    name: 'fix_tests',
    displayName: 'Fix Tests',
    description: 'Make the failing tests pass.',
    promptTemplate: 'Make the failing tests pass.',
    allowedTools: ['Read', 'Edit'],
    suggestedMaxTurns: 12,
    sourcePath: '/tmp/workflows/fix_tests',
    contentHash: 'hash-fix-tests',
    ...overrides,
  };
  await createSqliteWorkflowCatalogStore(db).insertWorkflow(definition, '2026-03-01T09:00:00.000Z');
  return definition;
}

export function createRunRecord(overrides: Partial<RunRecord> = {}): RunRecord {
  return {
    runId: 'run-1',
    workflowName: 'fix_tests',
    status: 'pending',
    request: {
      message: 'Fix the build',
      maxTurns: 12,
      timeoutSeconds: 3600,
      baseBranch: 'main',
      sessionId: null,
    },
    workspace: null,
    backendRef: null,
    sessionId: null,
    createdAt: '2026-03-01T09:00:00.000Z',
    startedAt: null,
    finishedAt: null,
    metrics: { elapsedSeconds: null, turnCount: null, costEstimate: null },
    error: null,
    ...overrides,
  };
}
