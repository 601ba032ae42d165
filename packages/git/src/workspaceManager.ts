import { readdir, stat } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import {
  toErrorMessage,
  WorkspaceAllocationError,
  type WorkspaceRecord,
  type WorkspaceStore,
} from '@runwright/shared';
import { generateConfiguredBranchName } from './branchName.js';
import {
  branchExists as defaultBranchExists,
  createWorktree as defaultCreateWorktree,
  deleteBranch as defaultDeleteBranch,
  listWorktrees as defaultListWorktrees,
  pruneWorktrees as defaultPruneWorktrees,
  removeWorktree as defaultRemoveWorktree,
  resolveWorktreePath,
  type CreateWorktreeParams,
  type WorktreeInfo,
} from './worktree.js';

export type AllocatedWorkspace = WorkspaceRecord & {
  commit: string;
};

export type WorkspaceSnapshot = {
  path: string;
  branch: string;
  runId: string | null;
  owningRunId: string | null;
  createdAt: string | null;
  lastActivityAt: string | null;
  /** Idle time since the last recorded activity; null when it cannot be determined. */
  ageMs: number | null;
  managed: boolean;
  onDisk: boolean;
};

export type WorkspaceManagerOptions = {
  repoDir: string;
  worktreeBase: string;
  branchTemplate?: string | null;
  environment?: NodeJS.ProcessEnv;
  now?: () => Date;
  createWorktree?: (repoDir: string, worktreeBase: string, params: CreateWorktreeParams) => Promise<WorktreeInfo>;
  removeWorktree?: (repoDir: string, worktreePath: string) => Promise<void>;
  pruneWorktrees?: (repoDir: string) => Promise<void>;
  deleteBranch?: (repoDir: string, branch: string) => Promise<void>;
  branchExists?: (repoDir: string, branch: string) => Promise<boolean>;
  listWorktrees?: (repoDir: string) => Promise<WorktreeInfo[]>;
  /** Resolves the modification time of a path, or null when it does not exist. */
  statPath?: (path: string) => Promise<Date | null>;
  listDirectories?: (path: string) => Promise<string[]>;
};

export type WorkspaceRemovalErrorCode = 'WORKSPACE_NOT_MANAGED' | 'WORKSPACE_OWNED' | 'WORKSPACE_REMOVAL_FAILED';

export class WorkspaceRemovalError extends Error {
  readonly code: WorkspaceRemovalErrorCode;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(
    code: WorkspaceRemovalErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'WorkspaceRemovalError';
    this.code = code;
    this.details = details;
    this.cause = cause;
  }
}

async function defaultStatPath(path: string): Promise<Date | null> {
  try {
    const stats = await stat(path);
    return stats.mtime;
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return null;
    }

    throw error;
  }
}

async function defaultListDirectories(path: string): Promise<string[]> {
  try {
    const entries = await readdir(path, { withFileTypes: true });
    return entries.filter(entry => entry.isDirectory()).map(entry => join(path, entry.name));
  } catch (error) {
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT') {
      return [];
    }

    throw error;
  }
}

function isWithinDirectory(directory: string, candidate: string): boolean {
  return candidate.startsWith(`${directory}${sep}`);
}

function toAgeMs(nowMs: number, timestamp: string | Date | null): number | null {
  if (timestamp === null) {
    return null;
  }

  const timestampMs = typeof timestamp === 'string' ? Date.parse(timestamp) : timestamp.getTime();
  if (Number.isNaN(timestampMs)) {
    return null;
  }

  return Math.max(0, nowMs - timestampMs);
}

/**
 * Allocates one git worktree per run and keeps the ownership bookkeeping.
 *
 * Ownership only ever moves from a run to nobody: a released workspace is never
 * handed to another run, so `remove()` can rely on a null owner staying null.
 */
export class WorkspaceManager {
  private readonly store: WorkspaceStore;
  private readonly repoDir: string;
  private readonly worktreeBase: string;
  private readonly branchTemplate: string | null;
  private readonly environment: NodeJS.ProcessEnv;
  private readonly now: () => Date;
  private readonly createWorktree: NonNullable<WorkspaceManagerOptions['createWorktree']>;
  private readonly removeWorktree: NonNullable<WorkspaceManagerOptions['removeWorktree']>;
  private readonly pruneWorktrees: NonNullable<WorkspaceManagerOptions['pruneWorktrees']>;
  private readonly deleteBranch: NonNullable<WorkspaceManagerOptions['deleteBranch']>;
  private readonly branchExists: NonNullable<WorkspaceManagerOptions['branchExists']>;
  private readonly listWorktrees: NonNullable<WorkspaceManagerOptions['listWorktrees']>;
  private readonly statPath: NonNullable<WorkspaceManagerOptions['statPath']>;
  private readonly listDirectories: NonNullable<WorkspaceManagerOptions['listDirectories']>;
  private gitQueue: Promise<void> = Promise.resolve();

  constructor(store: WorkspaceStore, options: WorkspaceManagerOptions) {
    this.store = store;
    this.repoDir = resolve(options.repoDir);
    this.worktreeBase = resolve(options.worktreeBase);
    this.branchTemplate = options.branchTemplate ?? null;
    this.environment = options.environment ?? process.env;
    this.now = options.now ?? (() => new Date());
    this.createWorktree = options.createWorktree ?? defaultCreateWorktree;
    this.removeWorktree = options.removeWorktree ?? defaultRemoveWorktree;
    this.pruneWorktrees = options.pruneWorktrees ?? defaultPruneWorktrees;
    this.deleteBranch = options.deleteBranch ?? defaultDeleteBranch;
    this.branchExists = options.branchExists ?? defaultBranchExists;
    this.listWorktrees = options.listWorktrees ?? defaultListWorktrees;
    this.statPath = options.statPath ?? defaultStatPath;
    this.listDirectories = options.listDirectories ?? defaultListDirectories;
  }

  allocate(runId: string, baseBranch: string, context: { workflowName?: string } = {}): Promise<AllocatedWorkspace> {
    return this.serializeGit(() => this.allocateNow(runId, baseBranch, context.workflowName));
  }

  /** Clears ownership; files stay on disk for post-mortem inspection. */
  async deallocate(runId: string): Promise<boolean> {
    return this.store.releaseOwnership(runId, this.now().toISOString());
  }

  async touch(runId: string, at: Date = this.now()): Promise<void> {
    await this.store.touchWorkspace(runId, at.toISOString());
  }

  async list(): Promise<WorkspaceSnapshot[]> {
    const [records, worktrees, directories] = await Promise.all([
      this.store.listActiveWorkspaces(),
      this.listWorktrees(this.repoDir),
      this.listDirectories(this.worktreeBase),
    ]);
    const nowMs = this.now().getTime();

    const gitEntries = new Map<string, WorktreeInfo>();
    for (const worktree of worktrees) {
      const path = resolve(worktree.path);
      if (isWithinDirectory(this.worktreeBase, path)) {
        gitEntries.set(path, worktree);
      }
    }

    const snapshots: WorkspaceSnapshot[] = [];
    const seenPaths = new Set<string>();
    for (const record of records) {
      const path = resolve(record.path);
      seenPaths.add(path);
      const gitEntry = gitEntries.get(path);
      const onDisk = gitEntry ? gitEntry.prunable !== true : (await this.statPath(path)) !== null;
      snapshots.push({
        path: record.path,
        branch: record.branch,
        runId: record.runId,
        owningRunId: record.owningRunId,
        createdAt: record.createdAt,
        lastActivityAt: record.lastActivityAt,
        ageMs: toAgeMs(nowMs, record.lastActivityAt),
        managed: true,
        onDisk,
      });
    }

    const unmanagedPaths = new Set<string>([
      ...gitEntries.keys(),
      ...directories.map(directory => resolve(directory)),
    ]);
    for (const path of [...unmanagedPaths].sort()) {
      if (seenPaths.has(path)) {
        continue;
      }

      const gitEntry = gitEntries.get(path);
      const modifiedAt = await this.statPath(path);
      snapshots.push({
        path,
        branch: gitEntry?.branch ?? 'unknown',
        runId: null,
        owningRunId: null,
        createdAt: null,
        lastActivityAt: modifiedAt?.toISOString() ?? null,
        ageMs: toAgeMs(nowMs, modifiedAt),
        managed: false,
        onDisk: modifiedAt !== null,
      });
    }

    return snapshots;
  }

  /**
   * Physically removes an unowned managed workspace: the worktree, its branch,
   * and the bookkeeping record.
   */
  remove(path: string): Promise<void> {
    return this.serializeGit(() => this.removeNow(path));
  }

  private serializeGit<T>(operation: () => Promise<T>): Promise<T> {
    const result = this.gitQueue.then(operation);
    this.gitQueue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  private async allocateNow(runId: string, baseBranch: string, workflowName?: string): Promise<AllocatedWorkspace> {
    const existing = await this.store.getActiveWorkspaceByOwner(runId);
    if (existing) {
      throw new WorkspaceAllocationError(`Run id=${runId} already owns workspace ${existing.path}.`, {
        runId,
        path: existing.path,
      });
    }

    const branch = generateConfiguredBranchName(
      { runId, workflowName, baseBranch },
      this.branchTemplate,
      { environment: this.environment, now: this.now },
    );
    const path = resolveWorktreePath(this.worktreeBase, branch);
    const details = { runId, baseBranch, branch, path };

    const [branchTaken, existingPath] = await Promise.all([
      this.branchExists(this.repoDir, branch),
      this.statPath(path),
    ]);
    if (branchTaken) {
      throw new WorkspaceAllocationError(`Branch "${branch}" already exists; cannot allocate run id=${runId}.`, details);
    }
    if (existingPath !== null) {
      throw new WorkspaceAllocationError(`Workspace path ${path} already exists; cannot allocate run id=${runId}.`, details);
    }

    let worktree: WorktreeInfo;
    try {
      worktree = await this.createWorktree(this.repoDir, this.worktreeBase, { branch, baseRef: baseBranch });
    } catch (error) {
      const rollbackErrors = await this.rollbackAllocation(path, branch);
      throw new WorkspaceAllocationError(
        `Failed to create workspace for run id=${runId} from "${baseBranch}": ${toErrorMessage(error)}`,
        { ...details, rollbackErrors },
        error,
      );
    }

    const occurredAt = this.now().toISOString();
    try {
      const record = await this.store.insertWorkspace({
        path: worktree.path,
        branch: worktree.branch,
        baseBranch,
        runId,
        createdAt: occurredAt,
        lastActivityAt: occurredAt,
        owningRunId: runId,
        status: 'active',
        removedAt: null,
      });

      return {
        ...record,
        commit: worktree.commit,
      };
    } catch (error) {
      const rollbackErrors = await this.rollbackAllocation(worktree.path, worktree.branch);
      throw new WorkspaceAllocationError(
        `Failed to record workspace for run id=${runId}: ${toErrorMessage(error)}`,
        { ...details, rollbackErrors },
        error,
      );
    }
  }

  private async rollbackAllocation(path: string, branch: string): Promise<string[]> {
    const rollbackErrors: string[] = [];

    try {
      if ((await this.statPath(path)) !== null) {
        await this.removeWorktree(this.repoDir, path);
      } else {
        await this.pruneWorktrees(this.repoDir);
      }
    } catch (error) {
      rollbackErrors.push(`remove worktree ${path}: ${toErrorMessage(error)}`);
    }

    try {
      if (await this.branchExists(this.repoDir, branch)) {
        await this.deleteBranch(this.repoDir, branch);
      }
    } catch (error) {
      rollbackErrors.push(`delete branch ${branch}: ${toErrorMessage(error)}`);
    }

    return rollbackErrors;
  }

  private async removeNow(path: string): Promise<void> {
    const record = await this.store.getActiveWorkspaceByPath(path);
    if (!record) {
      throw new WorkspaceRemovalError('WORKSPACE_NOT_MANAGED', `Workspace ${path} is not managed.`, { path });
    }
    if (record.owningRunId !== null) {
      throw new WorkspaceRemovalError(
        'WORKSPACE_OWNED',
        `Workspace ${path} is owned by run id=${record.owningRunId}.`,
        { path, owningRunId: record.owningRunId },
      );
    }

    try {
      if ((await this.statPath(record.path)) !== null) {
        await this.removeWorktree(this.repoDir, record.path);
      } else {
        await this.pruneWorktrees(this.repoDir);
      }

      if (await this.branchExists(this.repoDir, record.branch)) {
        await this.deleteBranch(this.repoDir, record.branch);
      }
    } catch (error) {
      throw new WorkspaceRemovalError(
        'WORKSPACE_REMOVAL_FAILED',
        `Failed to remove workspace ${path}: ${toErrorMessage(error)}`,
        { path, branch: record.branch },
        error,
      );
    }

    const marked = await this.store.markRemoved(record.path, this.now().toISOString());
    if (!marked) {
      throw new WorkspaceRemovalError(
        'WORKSPACE_REMOVAL_FAILED',
        `Workspace ${path} changed state while it was being removed.`,
        { path },
      );
    }
  }
}
