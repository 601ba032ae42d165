import { and, asc, desc, eq, gt, sql } from 'drizzle-orm';
import type { LogEntry, LogEventType, LogRecordStore, RunLogStats } from '@runwright/shared';
import type { RunwrightDatabase } from './connection.js';
import { runLogEntries } from './schema.js';

type RunLogEntryRow = typeof runLogEntries.$inferSelect;

const knownEventTypes: readonly LogEventType[] = ['init', 'progress', 'completion', 'error', 'raw'];

function assertKnownLogEventType(eventType: string): asserts eventType is LogEventType {
  if (!knownEventTypes.some(knownEventType => knownEventType === eventType)) {
    throw new Error(`Unknown log event type: ${eventType}`);
  }
}

function toLogEntry(row: RunLogEntryRow): LogEntry {
  assertKnownLogEventType(row.eventType);

  return {
    runId: row.runId,
    sequence: row.sequence,
    timestamp: row.timestamp,
    eventType: row.eventType,
    data: row.data,
    final: row.isFinal,
  };
}

const runStatsColumns = {
  runId: runLogEntries.runId,
  entryCount: sql<number>`count(*)`,
  sizeBytes: sql<number>`coalesce(sum(${runLogEntries.sizeBytes}), 0)`,
  firstTimestamp: sql<string>`min(${runLogEntries.timestamp})`,
  lastTimestamp: sql<string>`max(${runLogEntries.timestamp})`,
  lastSequence: sql<number>`max(${runLogEntries.sequence})`,
  closed: sql<number>`max(${runLogEntries.isFinal})`,
};

type RunStatsRow = {
  runId: string;
  entryCount: number;
  sizeBytes: number;
  firstTimestamp: string;
  lastTimestamp: string;
  lastSequence: number;
  closed: number;
};

function toRunLogStats(row: RunStatsRow): RunLogStats {
  return {
    runId: row.runId,
    entryCount: Number(row.entryCount),
    sizeBytes: Number(row.sizeBytes),
    firstTimestamp: row.firstTimestamp,
    lastTimestamp: row.lastTimestamp,
    lastSequence: Number(row.lastSequence),
    closed: Number(row.closed) === 1,
  };
}

export function createSqliteLogRecordStore(db: RunwrightDatabase): LogRecordStore {
  return {
    async insertEntry(entry, sizeBytes) {
      db.insert(runLogEntries)
        .values({
          runId: entry.runId,
          sequence: entry.sequence,
          timestamp: entry.timestamp,
          eventType: entry.eventType,
          data: entry.data,
          isFinal: entry.final,
          sizeBytes,
        })
        .run();
    },

    async listEntries(runId, options = {}) {
      const where = options.afterSequence === undefined
        ? eq(runLogEntries.runId, runId)
        : and(eq(runLogEntries.runId, runId), gt(runLogEntries.sequence, options.afterSequence));

      const query = db
        .select()
        .from(runLogEntries)
        .where(where)
        .orderBy(asc(runLogEntries.sequence));

      const rows = options.limit === undefined ? query.all() : query.limit(options.limit).all();
      return rows.map(toLogEntry);
    },

    async listTail(runId, limit) {
      const rows = db
        .select()
        .from(runLogEntries)
        .where(eq(runLogEntries.runId, runId))
        .orderBy(desc(runLogEntries.sequence))
        .limit(limit)
        .all();

      return rows.reverse().map(toLogEntry);
    },

    async getRunStats(runId) {
      const row = db
        .select(runStatsColumns)
        .from(runLogEntries)
        .where(eq(runLogEntries.runId, runId))
        .groupBy(runLogEntries.runId)
        .get();

      return row ? toRunLogStats(row) : null;
    },

    async listRunStats() {
      return db
        .select(runStatsColumns)
        .from(runLogEntries)
        .groupBy(runLogEntries.runId)
        .orderBy(asc(runLogEntries.runId))
        .all()
        .map(toRunLogStats);
    },

    async deleteRunLog(runId) {
      const deleted = db.delete(runLogEntries).where(eq(runLogEntries.runId, runId)).run();
      return deleted.changes;
    },
  };
}
