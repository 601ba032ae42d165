import type { LogEntry, LogEventType, LogRecordStore, RunLogStats, RunStore } from '@runwright/shared';
import { isRunTerminal } from './stateMachine.js';

export const DEFAULT_LOG_POLL_INTERVAL_MS = 500;
// How long a finished run may go without its final entry before streams stop waiting for it.
export const DEFAULT_FINAL_ENTRY_GRACE_MS = 2_000;

export type LogStoreErrorCode = 'LOG_CLOSED' | 'LOG_INVALID_ARGUMENT';

export class LogStoreError extends Error {
  readonly code: LogStoreErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: LogStoreErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'LogStoreError';
    this.code = code;
    this.details = details;
  }
}

export type LogStoreOptions = {
  now?: () => Date;
  pollIntervalMs?: number;
  /** Lets streams end for runs that finished, or never existed, without a final entry. */
  runs?: Pick<RunStore, 'getRun'>;
  finalEntryGraceMs?: number;
};

export type AppendOptions = {
  final?: boolean;
};

export type StreamOptions = {
  signal?: AbortSignal;
  pollIntervalMs?: number;
  afterSequence?: number;
};

export type LogSummary = {
  runId: string;
  durationSeconds: number;
  entryCount: number;
  eventTypes: Partial<Record<LogEventType, number>>;
  errorCount: number;
  sizeBytes: number;
  firstTimestamp: string;
  lastTimestamp: string;
  closed: boolean;
};

export type LogCleanupResult = {
  deletedCount: number;
  deletedEntries: number;
  freedBytes: number;
  deletedRunIds: string[];
};

type AppendWaiter = {
  promise: Promise<void>;
  cancel: () => void;
};

const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * Append-only per-run event log with live tailing.
 *
 * Appends for one run are chained so sequences stay gapless; each run has its
 * own chain, so a slow run never delays another.
 */
export class LogStore {
  private readonly records: LogRecordStore;
  private readonly now: () => Date;
  private readonly pollIntervalMs: number;
  private readonly runs: Pick<RunStore, 'getRun'> | null;
  private readonly finalEntryGraceMs: number;
  private readonly appendQueues = new Map<string, Promise<void>>();
  private readonly listeners = new Map<string, Set<() => void>>();

  constructor(records: LogRecordStore, options: LogStoreOptions = {}) {
    this.records = records;
    this.now = options.now ?? (() => new Date());
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_LOG_POLL_INTERVAL_MS;
    this.runs = options.runs ?? null;
    this.finalEntryGraceMs = options.finalEntryGraceMs ?? DEFAULT_FINAL_ENTRY_GRACE_MS;
  }

  append(
    runId: string,
    eventType: LogEventType,
    data: Record<string, unknown> = {},
    options: AppendOptions = {},
  ): Promise<LogEntry> {
    const previous = this.appendQueues.get(runId) ?? Promise.resolve();
    const result = previous.then(() => this.appendNow(runId, eventType, data, options.final === true));
    const settled = result.then(
      () => undefined,
      () => undefined,
    );
    this.appendQueues.set(runId, settled);
    void settled.then(() => {
      if (this.appendQueues.get(runId) === settled) {
        this.appendQueues.delete(runId);
      }
    });
    return result;
  }

  async readAll(runId: string): Promise<LogEntry[]> {
    return this.records.listEntries(runId);
  }

  async readTail(runId: string, limit: number): Promise<LogEntry[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new LogStoreError('LOG_INVALID_ARGUMENT', `Tail limit must be a positive integer; received ${limit}.`, {
        limit,
      });
    }

    return this.records.listTail(runId, limit);
  }

  /**
   * Yields the run's entries from the start (or after `afterSequence`), then
   * follows new appends until the final entry has been delivered or the signal
   * aborts. Appends made by other processes are picked up by polling.
   *
   * With a run lookup, the stream also ends once nothing is left to deliver
   * and the run is unknown, or finished longer than the grace period ago.
   */
  async *stream(runId: string, options: StreamOptions = {}): AsyncGenerator<LogEntry> {
    const pollIntervalMs = options.pollIntervalMs ?? this.pollIntervalMs;
    let cursor = options.afterSequence ?? 0;

    while (options.signal?.aborted !== true) {
      const waiter = this.waitForAppend(runId, pollIntervalMs, options.signal);
      try {
        const entries = await this.records.listEntries(runId, { afterSequence: cursor });
        for (const entry of entries) {
          cursor = entry.sequence;
          yield entry;
          if (entry.final) {
            return;
          }
        }

        if (entries.length === 0 && (await this.isAbandoned(runId))) {
          return;
        }

        await waiter.promise;
      } finally {
        waiter.cancel();
      }
    }
  }

  async summarize(runId: string): Promise<LogSummary | null> {
    const stats = await this.records.getRunStats(runId);
    if (!stats) {
      return null;
    }

    const entries = await this.records.listEntries(runId);
    const eventTypes: Partial<Record<LogEventType, number>> = {};
    for (const entry of entries) {
      eventTypes[entry.eventType] = (eventTypes[entry.eventType] ?? 0) + 1;
    }

    const durationMs = Date.parse(stats.lastTimestamp) - Date.parse(stats.firstTimestamp);
    return {
      runId,
      durationSeconds: Number.isFinite(durationMs) ? Math.max(0, durationMs) / 1000 : 0,
      entryCount: stats.entryCount,
      eventTypes,
      errorCount: eventTypes.error ?? 0,
      sizeBytes: stats.sizeBytes,
      firstTimestamp: stats.firstTimestamp,
      lastTimestamp: stats.lastTimestamp,
      closed: stats.closed,
    };
  }

  /** Deletes whole closed run logs whose last entry is older than `maxAgeDays`. */
  async cleanup(maxAgeDays: number): Promise<LogCleanupResult> {
    if (!Number.isFinite(maxAgeDays) || maxAgeDays < 0) {
      throw new LogStoreError(
        'LOG_INVALID_ARGUMENT',
        `Log max age must be a non-negative number of days; received ${maxAgeDays}.`,
        { maxAgeDays },
      );
    }

    const cutoffMs = this.now().getTime() - maxAgeDays * MS_PER_DAY;
    const result: LogCleanupResult = { deletedCount: 0, deletedEntries: 0, freedBytes: 0, deletedRunIds: [] };

    for (const stats of await this.records.listRunStats()) {
      if (!stats.closed || this.appendQueues.has(stats.runId)) {
        continue;
      }

      const lastMs = Date.parse(stats.lastTimestamp);
      if (Number.isNaN(lastMs) || lastMs >= cutoffMs) {
        continue;
      }

      result.deletedEntries += await this.records.deleteRunLog(stats.runId);
      result.deletedCount += 1;
      result.freedBytes += stats.sizeBytes;
      result.deletedRunIds.push(stats.runId);
    }

    return result;
  }

  async list(): Promise<RunLogStats[]> {
    return this.records.listRunStats();
  }

  private async appendNow(
    runId: string,
    eventType: LogEventType,
    data: Record<string, unknown>,
    final: boolean,
  ): Promise<LogEntry> {
    const stats = await this.records.getRunStats(runId);
    if (stats?.closed) {
      throw new LogStoreError('LOG_CLOSED', `Log for run id=${runId} is closed; no entries can follow the final entry.`, {
        runId,
        lastSequence: stats.lastSequence,
      });
    }

    const entry: LogEntry = {
      runId,
      sequence: (stats?.lastSequence ?? 0) + 1,
      timestamp: this.now().toISOString(),
      eventType,
      data,
      final,
    };
    await this.records.insertEntry(entry, Buffer.byteLength(JSON.stringify(entry), 'utf8'));
    this.notify(runId);
    return entry;
  }

  /** True when no final entry is coming for the run. */
  private async isAbandoned(runId: string): Promise<boolean> {
    if (!this.runs || this.appendQueues.has(runId)) {
      return false;
    }

    const run = await this.runs.getRun(runId);
    if (!run) {
      return true;
    }

    if (!isRunTerminal(run.status)) {
      return false;
    }

    const finishedAtMs = run.finishedAt === null ? Number.NaN : Date.parse(run.finishedAt);
    return Number.isNaN(finishedAtMs) || this.now().getTime() - finishedAtMs >= this.finalEntryGraceMs;
  }

  private notify(runId: string): void {
    const listeners = this.listeners.get(runId);
    if (!listeners) {
      return;
    }

    for (const listener of [...listeners]) {
      listener();
    }
  }

  private waitForAppend(runId: string, timeoutMs: number, signal?: AbortSignal): AppendWaiter {
    let release: () => void = () => undefined;
    const promise = new Promise<void>(resolve => {
      release = resolve;
    });

    const listeners = this.listeners.get(runId) ?? new Set<() => void>();
    this.listeners.set(runId, listeners);
    listeners.add(release);
    const timer = setTimeout(release, timeoutMs);
    signal?.addEventListener('abort', release, { once: true });

    return {
      promise,
      cancel: () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', release);
        listeners.delete(release);
        if (listeners.size === 0 && this.listeners.get(runId) === listeners) {
          this.listeners.delete(runId);
        }
      },
    };
  }
}
