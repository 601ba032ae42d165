import { vi } from 'vitest';
import { createDatabase, createSqliteWorkspaceStore, migrateDatabase } from '@runwright/db';
import type { WorkspaceStore } from '@runwright/shared';
import { resolveWorktreePath, type CreateWorktreeParams, type WorktreeInfo } from './worktree.js';
import type { WorkspaceManagerOptions } from './workspaceManager.js';

export const REPO_DIR = '/tmp/repo';
export const WORKTREE_BASE = '/tmp/runwright-worktrees';

export function createWorkspaceStore(): WorkspaceStore {
  const db = createDatabase(':memory:');
  migrateDatabase(db);
  return createSqliteWorkspaceStore(db);
}

export type FakeClock = {
  now: () => Date;
  set: (iso: string) => void;
};

export function createFakeClock(start = '2026-03-01T00:00:00.000Z'): FakeClock {
  let current = new Date(start);
  return {
    now: () => current,
    set: iso => {
      current = new Date(iso);
    },
  };
}

/**
 * In-memory stand-in for the git commands and filesystem probes the
 * workspace manager uses.
 */
export function createFakeGit(clock: FakeClock) {
  const directories = new Map<string, Date>();
  const branches = new Set<string>(['main']);
  const registered = new Map<string, WorktreeInfo>();

  const createWorktree = vi.fn(async (_repoDir: string, worktreeBase: string, params: CreateWorktreeParams) => {
    const path = resolveWorktreePath(worktreeBase, params.branch);
    branches.add(params.branch);
    directories.set(path, clock.now());
    const info: WorktreeInfo = { path, branch: params.branch, commit: 'abc123' };
    registered.set(path, info);
    return info;
  });

  const options = {
    repoDir: REPO_DIR,
    worktreeBase: WORKTREE_BASE,
    environment: {},
    now: clock.now,
    createWorktree,
    removeWorktree: vi.fn(async (_repoDir: string, path: string) => {
      directories.delete(path);
      registered.delete(path);
    }),
    pruneWorktrees: vi.fn(async (_repoDir: string) => {
      for (const path of registered.keys()) {
        if (!directories.has(path)) {
          registered.delete(path);
        }
      }
    }),
    deleteBranch: vi.fn(async (_repoDir: string, branch: string) => {
      branches.delete(branch);
    }),
    branchExists: vi.fn(async (_repoDir: string, branch: string) => branches.has(branch)),
    listWorktrees: vi.fn(async (_repoDir: string) => [
      { path: REPO_DIR, branch: 'main', commit: 'abc123' },
      ...registered.values(),
    ]),
    statPath: vi.fn(async (path: string) => directories.get(path) ?? null),
    listDirectories: vi.fn(async (_path: string) => [...directories.keys()]),
  } satisfies WorkspaceManagerOptions;

  return {
    directories,
    branches,
    registered,
    options,
  };
}
