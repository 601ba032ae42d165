import { describe, expect, it, vi } from 'vitest';
import { OrphanReaper, type ActiveRunIndex } from './orphanReaper.js';
import {
  createFakeClock,
  createFakeGit,
  createWorkspaceStore,
  WORKTREE_BASE,
} from './test-support.js';
import { WorkspaceManager, type WorkspaceSnapshot } from './workspaceManager.js';

const HOUR_MS = 60 * 60 * 1000;

function createLogger() {
  return {
    info: vi.fn(),
    warn: vi.fn(),
  };
}

function activeRuns(...runIds: string[]): ActiveRunIndex {
  const active = new Set(runIds);
  return { isRunActive: runId => active.has(runId) };
}

function snapshot(overrides: Partial<WorkspaceSnapshot> & Pick<WorkspaceSnapshot, 'path'>): WorkspaceSnapshot {
  return {
    branch: 'runwright/run-x',
    runId: 'run-x',
    owningRunId: null,
    createdAt: '2026-03-01T00:00:00.000Z',
    lastActivityAt: '2026-03-01T00:00:00.000Z',
    ageMs: 0,
    managed: true,
    onDisk: true,
    ...overrides,
  };
}

async function setupIdleWorkspace() {
  const clock = createFakeClock('2026-03-01T00:00:00.000Z');
  const git = createFakeGit(clock);
  const manager = new WorkspaceManager(createWorkspaceStore(), git.options);
  const workspace = await manager.allocate('run-1', 'main', { workflowName: 'nightly' });
  await manager.deallocate('run-1');
  clock.set('2026-03-03T02:00:00.000Z');
  return { git, manager, workspace };
}

describe('OrphanReaper', () => {
  it('reports idle unowned workspaces without removing them in dry-run mode', async () => {
    const { git, manager, workspace } = await setupIdleWorkspace();
    const logger = createLogger();
    const reaper = new OrphanReaper(manager, activeRuns(), { logger });

    const report = await reaper.reap({ maxAgeMs: 48 * HOUR_MS, dryRun: true });

    expect(report).toEqual({
      total: 1,
      dryRun: true,
      maxAgeMs: 48 * HOUR_MS,
      orphaned: [{ path: workspace.path, branch: 'runwright/nightly/run-1', runId: 'run-1', ageHours: 50 }],
      cleaned: [],
      failed: [],
      skipped: [],
    });
    expect(git.options.removeWorktree).not.toHaveBeenCalled();
    expect(logger.info).toHaveBeenCalledWith(
      'Orphan reap (dry run): total=1 orphaned=1 cleaned=0 failed=0 skipped=0',
    );
  });

  it('removes idle unowned workspaces and their branches', async () => {
    const { git, manager, workspace } = await setupIdleWorkspace();
    const reaper = new OrphanReaper(manager, activeRuns(), { logger: createLogger() });

    const report = await reaper.reap({ maxAgeMs: 48 * HOUR_MS });

    expect(report.cleaned).toEqual([workspace.path]);
    expect(git.directories.has(workspace.path)).toBe(false);
    expect(git.branches.has('runwright/nightly/run-1')).toBe(false);
    await expect(manager.list()).resolves.toEqual([]);
  });

  it('keeps workspaces that are younger than the threshold', async () => {
    const { manager, workspace } = await setupIdleWorkspace();
    const reaper = new OrphanReaper(manager, activeRuns(), { logger: createLogger() });

    const report = await reaper.reap({ maxAgeMs: 72 * HOUR_MS });

    expect(report.orphaned).toEqual([]);
    expect(report.skipped).toEqual([
      {
        path: workspace.path,
        branch: 'runwright/nightly/run-1',
        reason: 'below_age_threshold',
        message: 'idle for 50h, below the 72h threshold',
      },
    ]);
  });

  it('never touches owned or unmanaged workspaces regardless of age', async () => {
    const workspaces = {
      list: vi.fn(async () => [
        snapshot({ path: `${WORKTREE_BASE}/a`, owningRunId: 'run-a', ageMs: 100 * HOUR_MS }),
        snapshot({ path: `${WORKTREE_BASE}/b`, owningRunId: 'run-b', ageMs: 100 * HOUR_MS }),
        snapshot({
          path: `${WORKTREE_BASE}/c`,
          branch: 'unknown',
          runId: null,
          managed: false,
          ageMs: 100 * HOUR_MS,
        }),
      ]),
      remove: vi.fn(async (_path: string) => undefined),
    };
    const reaper = new OrphanReaper(workspaces, activeRuns('run-a'), { logger: createLogger() });

    const report = await reaper.reap({ maxAgeMs: HOUR_MS });

    expect(workspaces.remove).not.toHaveBeenCalled();
    expect(report.skipped.map(skip => [skip.path, skip.reason])).toEqual([
      [`${WORKTREE_BASE}/a`, 'owned_by_active_run'],
      [`${WORKTREE_BASE}/b`, 'owned_by_inactive_run'],
      [`${WORKTREE_BASE}/c`, 'unmanaged'],
    ]);
    expect(report.skipped[2]?.message).toBe('unmanaged, requires manual review');
  });

  it('collects failures and continues with the remaining candidates', async () => {
    const workspaces = {
      list: vi.fn(async () => [
        snapshot({ path: `${WORKTREE_BASE}/a`, ageMs: 60 * HOUR_MS }),
        snapshot({ path: `${WORKTREE_BASE}/b`, ageMs: 60 * HOUR_MS }),
      ]),
      remove: vi.fn(async (path: string) => {
        if (path.endsWith('/a')) {
          throw new Error('worktree is locked');
        }
      }),
    };
    const logger = createLogger();
    const reaper = new OrphanReaper(workspaces, activeRuns(), { logger });

    const report = await reaper.reap();

    expect(report.failed).toEqual([{ path: `${WORKTREE_BASE}/a`, error: 'worktree is locked' }]);
    expect(report.cleaned).toEqual([`${WORKTREE_BASE}/b`]);
    expect(logger.warn).toHaveBeenCalledWith(
      `Orphan reaper failed to remove workspace ${WORKTREE_BASE}/a: worktree is locked`,
    );
  });

  it('rejects a negative age threshold', async () => {
    const workspaces = { list: vi.fn(async () => []), remove: vi.fn(async (_path: string) => undefined) };
    const reaper = new OrphanReaper(workspaces, activeRuns(), { logger: createLogger() });

    await expect(reaper.reap({ maxAgeMs: -1 })).rejects.toThrow(
      'Orphan max age must be a non-negative number of milliseconds; received -1.',
    );
    expect(workspaces.list).not.toHaveBeenCalled();
  });
});
