import type { LogStore, RunLifecycleManager } from '@runwright/core';
import {
  encodeControlLine,
  hasErrorCode,
  isWorkflowEngineError,
  toErrorMessage,
  type RunRecord,
} from '@runwright/shared';
import {
  EXIT_NOT_FOUND,
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
} from './constants.js';
import { formatLogEntry, formatMetrics, formatRunHeadline } from './format.js';
import type { CliIo, ExitCode } from './types.js';

const notFoundErrorCodes = ['RUN_NOT_FOUND', 'UNKNOWN_WORKFLOW'];
const usageErrorCodes = ['INVALID_RUN_REQUEST', 'LOG_INVALID_ARGUMENT'];

/** Maps an engine failure to an exit code, printing it. */
export function reportCommandError(error: unknown, action: string, io: Pick<CliIo, 'stderr'>): ExitCode {
  if (notFoundErrorCodes.some(code => hasErrorCode(error, code))) {
    io.stderr(toErrorMessage(error));
    return EXIT_NOT_FOUND;
  }

  if (usageErrorCodes.some(code => hasErrorCode(error, code))) {
    io.stderr(toErrorMessage(error));
    return EXIT_USAGE_ERROR;
  }

  io.stderr(`Failed to ${action}: ${toErrorMessage(error)}`);
  return EXIT_RUNTIME_ERROR;
}

/** Plain text becomes a user message; lines starting with `{` are sent as typed. */
export function toControlLine(line: string): string {
  const trimmed = line.trim();
  if (trimmed.startsWith('{')) {
    return trimmed;
  }

  return encodeControlLine({ type: 'user', message: trimmed }).trimEnd();
}

export async function forwardInputLines(
  manager: Pick<RunLifecycleManager, 'injectControlLine'>,
  runId: string,
  lines: AsyncIterable<string>,
  io: Pick<CliIo, 'stderr'>,
): Promise<void> {
  for await (const line of lines) {
    if (line.trim().length === 0) {
      continue;
    }

    try {
      await manager.injectControlLine(runId, toControlLine(line));
    } catch (error) {
      // Engine rejections are already reported through the engine logger.
      if (!isWorkflowEngineError(error)) {
        io.stderr(`Failed to forward input to run id=${runId}: ${toErrorMessage(error)}`);
      }
    }
  }
}

/**
 * Prints the run log as it grows until the run settles, then drains whatever
 * the live stream had not delivered yet.
 */
export async function followRunLog(
  logs: LogStore,
  settled: Promise<RunRecord>,
  runId: string,
  io: Pick<CliIo, 'stdout'>,
): Promise<RunRecord> {
  const controller = new AbortController();
  let lastSequence = 0;
  const run = settled.finally(() => controller.abort());

  for await (const entry of logs.stream(runId, { signal: controller.signal })) {
    lastSequence = entry.sequence;
    io.stdout(formatLogEntry(entry));
  }

  const record = await run;
  for (const entry of await logs.readAll(runId)) {
    if (entry.sequence > lastSequence) {
      lastSequence = entry.sequence;
      io.stdout(formatLogEntry(entry));
    }
  }

  return record;
}

export function summarizeRunOutcome(run: RunRecord, io: Pick<CliIo, 'stdout' | 'stderr'>): ExitCode {
  io.stdout(formatRunHeadline(run));
  io.stdout(`Metrics: ${formatMetrics(run.metrics)}`);
  if (run.workspace) {
    io.stdout(`Workspace: ${run.workspace.path} (branch ${run.workspace.branch})`);
  }

  if (run.status === 'completed') {
    return EXIT_SUCCESS;
  }

  if (run.error) {
    io.stderr(`Run id=${run.runId} ${run.status}: ${run.error.code} ${run.error.message}`);
  }
  return EXIT_RUNTIME_ERROR;
}
