import type { LogSummary } from '@runwright/core';
import { logEventTypes, type LogEntry, type RunMetrics, type RunRecord } from '@runwright/shared';

function formatOptional(value: number | null, suffix = ''): string {
  return value === null ? '-' : `${value}${suffix}`;
}

export function formatMetrics(metrics: RunMetrics): string {
  return `elapsed=${formatOptional(metrics.elapsedSeconds, 's')} turns=${formatOptional(metrics.turnCount)} cost=${formatOptional(metrics.costEstimate)}`;
}

export function formatLogEntry(entry: LogEntry): string {
  const finalMarker = entry.final ? ' (final)' : '';
  return `#${entry.sequence} ${entry.timestamp} ${entry.eventType}${finalMarker} ${JSON.stringify(entry.data)}`;
}

export function formatRunHeadline(run: RunRecord): string {
  return `Run id=${run.runId} workflow=${run.workflowName} status=${run.status}`;
}

export function formatRunDetails(run: RunRecord, metrics: RunMetrics): string[] {
  const lines = [
    formatRunHeadline(run),
    `Created at: ${run.createdAt}`,
    `Started at: ${run.startedAt ?? '(not started)'}`,
    `Finished at: ${run.finishedAt ?? '(not finished)'}`,
    `Workspace: ${run.workspace ? `${run.workspace.path} (branch ${run.workspace.branch})` : '(none)'}`,
    `Session: ${run.sessionId ?? '(none)'}`,
    `Metrics: ${formatMetrics(metrics)}`,
  ];
  if (run.error) {
    lines.push(`Error: ${run.error.code} ${run.error.message}`);
  }
  return lines;
}

export function formatLogSummary(summary: LogSummary): string[] {
  const eventCounts = logEventTypes.map(eventType => `${eventType}=${summary.eventTypes[eventType] ?? 0}`).join(' ');
  return [
    `Run id=${summary.runId} entries=${summary.entryCount} errors=${summary.errorCount} size=${summary.sizeBytes}B duration=${summary.durationSeconds}s closed=${summary.closed ? 'yes' : 'no'}`,
    `Event types: ${eventCounts}`,
    `First entry: ${summary.firstTimestamp}`,
    `Last entry: ${summary.lastTimestamp}`,
  ];
}
