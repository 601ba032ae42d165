import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { join } from 'node:path';

const execFileAsync = promisify(execFile);

export type WorktreeInfo = {
  path: string;
  branch: string;
  commit: string;
  locked?: boolean;
  prunable?: boolean;
};

export type CreateWorktreeParams = {
  branch: string;
  baseRef?: string;
};

export function resolveWorktreePath(worktreeBase: string, branch: string): string {
  return join(worktreeBase, branch.trim().replaceAll('/', '-'));
}

export async function createWorktree(
  repoDir: string,
  worktreeBase: string,
  params: CreateWorktreeParams,
): Promise<WorktreeInfo> {
  const branch = params.branch.trim();
  if (branch.length === 0) {
    throw new Error('createWorktree requires a non-empty branch name.');
  }

  const worktreePath = resolveWorktreePath(worktreeBase, branch);
  const worktreeAddArgs = ['worktree', 'add', '-b', branch, worktreePath];
  if (params.baseRef !== undefined && params.baseRef.trim().length > 0) {
    worktreeAddArgs.push(params.baseRef.trim());
  }

  await execFileAsync('git', worktreeAddArgs, {
    cwd: repoDir,
  });

  const { stdout: commit } = await execFileAsync('git', ['rev-parse', 'HEAD'], {
    cwd: worktreePath,
  });

  return {
    path: worktreePath,
    branch,
    commit: commit.trim(),
  };
}

export async function removeWorktree(repoDir: string, worktreePath: string): Promise<void> {
  await execFileAsync('git', ['worktree', 'remove', '--force', worktreePath], {
    cwd: repoDir,
  });
}

export async function pruneWorktrees(repoDir: string): Promise<void> {
  await execFileAsync('git', ['worktree', 'prune'], {
    cwd: repoDir,
  });
}

export async function deleteBranch(repoDir: string, branch: string): Promise<void> {
  const trimmedBranch = branch.trim();
  if (trimmedBranch.length === 0) {
    return;
  }

  await execFileAsync('git', ['branch', '--delete', '--force', trimmedBranch], {
    cwd: repoDir,
  });
}

export async function branchExists(repoDir: string, branch: string): Promise<boolean> {
  try {
    await execFileAsync('git', ['rev-parse', '--verify', '--quiet', `refs/heads/${branch.trim()}`], {
      cwd: repoDir,
    });
    return true;
  } catch (error) {
    // `--verify --quiet` exits with status 1 when the ref does not exist.
    if (typeof error === 'object' && error !== null && 'code' in error && error.code === 1) {
      return false;
    }

    throw error;
  }
}

export async function listWorktrees(repoDir: string): Promise<WorktreeInfo[]> {
  const { stdout } = await execFileAsync('git', ['worktree', 'list', '--porcelain'], {
    cwd: repoDir,
  });

  const worktrees: WorktreeInfo[] = [];
  let current: Partial<WorktreeInfo> = {};

  for (const line of `${stdout}\n`.split('\n')) {
    if (line.startsWith('worktree ')) {
      current.path = line.slice('worktree '.length);
    } else if (line.startsWith('HEAD ')) {
      current.commit = line.slice('HEAD '.length);
    } else if (line.startsWith('branch ')) {
      current.branch = line.slice('branch refs/heads/'.length);
    } else if (line === 'locked' || line.startsWith('locked ')) {
      current.locked = true;
    } else if (line === 'prunable' || line.startsWith('prunable ')) {
      current.prunable = true;
    } else if (line === '') {
      if (current.path && current.commit) {
        worktrees.push({
          path: current.path,
          branch: current.branch ?? 'detached',
          commit: current.commit,
          locked: current.locked ?? false,
          prunable: current.prunable ?? false,
        });
      }
      current = {};
    }
  }

  return worktrees;
}
