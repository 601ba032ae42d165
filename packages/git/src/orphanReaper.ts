import { toErrorMessage, type EngineLogger } from '@runwright/shared';
import type { WorkspaceManager, WorkspaceSnapshot } from './workspaceManager.js';

export const DEFAULT_ORPHAN_MAX_AGE_MS = 48 * 60 * 60 * 1000;

const MS_PER_HOUR = 60 * 60 * 1000;

export interface ActiveRunIndex {
  isRunActive(runId: string): boolean;
}

export type ReapSkipReason =
  | 'owned_by_active_run'
  | 'owned_by_inactive_run'
  | 'below_age_threshold'
  | 'unmanaged';

export type ReapCandidate = {
  path: string;
  branch: string;
  runId: string | null;
  ageHours: number;
};

export type ReapSkip = {
  path: string;
  branch: string;
  reason: ReapSkipReason;
  message: string;
};

export type ReapFailure = {
  path: string;
  error: string;
};

export type ReapReport = {
  total: number;
  dryRun: boolean;
  maxAgeMs: number;
  orphaned: ReapCandidate[];
  cleaned: string[];
  failed: ReapFailure[];
  skipped: ReapSkip[];
};

export type ReapOptions = {
  maxAgeMs?: number;
  dryRun?: boolean;
};

function toAgeHours(ageMs: number): number {
  return Math.round((ageMs / MS_PER_HOUR) * 10) / 10;
}

function classifySnapshot(
  snapshot: WorkspaceSnapshot,
  activeRuns: ActiveRunIndex,
  maxAgeMs: number,
): ReapSkip | ReapCandidate {
  const { path, branch } = snapshot;
  if (!snapshot.managed) {
    return { path, branch, reason: 'unmanaged', message: 'unmanaged, requires manual review' };
  }

  if (snapshot.owningRunId !== null) {
    if (activeRuns.isRunActive(snapshot.owningRunId)) {
      return {
        path,
        branch,
        reason: 'owned_by_active_run',
        message: `owned by active run ${snapshot.owningRunId}`,
      };
    }

    return {
      path,
      branch,
      reason: 'owned_by_inactive_run',
      message: `owned by run ${snapshot.owningRunId} which is not active here, requires manual review`,
    };
  }

  const ageMs = snapshot.ageMs ?? 0;
  if (ageMs < maxAgeMs) {
    return {
      path,
      branch,
      reason: 'below_age_threshold',
      message: `idle for ${toAgeHours(ageMs)}h, below the ${toAgeHours(maxAgeMs)}h threshold`,
    };
  }

  return { path, branch, runId: snapshot.runId, ageHours: toAgeHours(ageMs) };
}

function isSkip(value: ReapSkip | ReapCandidate): value is ReapSkip {
  return 'reason' in value;
}

/**
 * Finds workspaces with no owner that have been idle past a threshold and
 * removes them. Each candidate is attempted independently.
 */
export class OrphanReaper {
  private readonly workspaces: Pick<WorkspaceManager, 'list' | 'remove'>;
  private readonly activeRuns: ActiveRunIndex;
  private readonly logger: Pick<EngineLogger, 'info' | 'warn'>;

  constructor(
    workspaces: Pick<WorkspaceManager, 'list' | 'remove'>,
    activeRuns: ActiveRunIndex,
    options: { logger?: Pick<EngineLogger, 'info' | 'warn'> } = {},
  ) {
    this.workspaces = workspaces;
    this.activeRuns = activeRuns;
    this.logger = options.logger ?? console;
  }

  async reap(options: ReapOptions = {}): Promise<ReapReport> {
    const maxAgeMs = options.maxAgeMs ?? DEFAULT_ORPHAN_MAX_AGE_MS;
    const dryRun = options.dryRun ?? false;
    if (!Number.isFinite(maxAgeMs) || maxAgeMs < 0) {
      throw new Error(`Orphan max age must be a non-negative number of milliseconds; received ${maxAgeMs}.`);
    }

    const snapshots = await this.workspaces.list();
    const report: ReapReport = {
      total: snapshots.length,
      dryRun,
      maxAgeMs,
      orphaned: [],
      cleaned: [],
      failed: [],
      skipped: [],
    };

    for (const snapshot of snapshots) {
      const classified = classifySnapshot(snapshot, this.activeRuns, maxAgeMs);
      if (isSkip(classified)) {
        report.skipped.push(classified);
        continue;
      }

      report.orphaned.push(classified);
      if (dryRun) {
        continue;
      }

      try {
        await this.workspaces.remove(classified.path);
        report.cleaned.push(classified.path);
      } catch (error) {
        const message = toErrorMessage(error);
        this.logger.warn(`Orphan reaper failed to remove workspace ${classified.path}: ${message}`);
        report.failed.push({ path: classified.path, error: message });
      }
    }

    this.logger.info(
      `Orphan reap${dryRun ? ' (dry run)' : ''}: total=${report.total} orphaned=${report.orphaned.length} cleaned=${report.cleaned.length} failed=${report.failed.length} skipped=${report.skipped.length}`,
    );

    return report;
  }
}
