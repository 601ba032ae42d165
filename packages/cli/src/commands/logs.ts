import {
  EXIT_NOT_FOUND,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  LOGS_CLEANUP_USAGE,
  LOGS_SHOW_USAGE,
  LOGS_SUMMARY_USAGE,
  LOGS_USAGE,
} from '../constants.js';
import { createEngine } from '../engine.js';
import { reportCommandError } from '../execution.js';
import { formatLogEntry, formatLogSummary } from '../format.js';
import { usageError } from '../io.js';
import {
  getRequiredOption,
  parseNonNegativeNumber,
  readOptionalPositiveInteger,
  validateCommandOptions,
} from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleLogsShowCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'logs show',
      usage: LOGS_SHOW_USAGE,
      allowedOptions: ['run', 'tail'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const runId = getRequiredOption(parsedOptions.options, 'run', 'run_id', LOGS_SHOW_USAGE, io);
  if (!runId) {
    return EXIT_USAGE_ERROR;
  }

  const tail = readOptionalPositiveInteger(parsedOptions.options, 'tail', LOGS_SHOW_USAGE, io);
  if (!tail.ok) {
    return tail.exitCode;
  }

  try {
    const engine = createEngine(dependencies, io);
    const entries = tail.value === undefined
      ? await engine.logs.readAll(runId)
      : await engine.logs.readTail(runId, tail.value);

    if (entries.length === 0) {
      if (!(await engine.runs.getRun(runId))) {
        io.stderr(`Run id=${runId} was not found.`);
        return EXIT_NOT_FOUND;
      }

      io.stdout(`Run id=${runId} has no log entries.`);
      return EXIT_SUCCESS;
    }

    for (const entry of entries) {
      io.stdout(formatLogEntry(entry));
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return reportCommandError(error, 'read the run log', io);
  }
}

export async function handleLogsSummaryCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'logs summary',
      usage: LOGS_SUMMARY_USAGE,
      allowedOptions: ['run'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const runId = getRequiredOption(parsedOptions.options, 'run', 'run_id', LOGS_SUMMARY_USAGE, io);
  if (!runId) {
    return EXIT_USAGE_ERROR;
  }

  try {
    const engine = createEngine(dependencies, io);
    const summary = await engine.logs.summarize(runId);
    if (!summary) {
      io.stderr(`No log entries were found for run id=${runId}.`);
      return EXIT_NOT_FOUND;
    }

    for (const line of formatLogSummary(summary)) {
      io.stdout(line);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return reportCommandError(error, 'summarize the run log', io);
  }
}

export async function handleLogsCleanupCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'logs cleanup',
      usage: LOGS_CLEANUP_USAGE,
      allowedOptions: ['max-age-days'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const rawMaxAge = getRequiredOption(parsedOptions.options, 'max-age-days', 'days', LOGS_CLEANUP_USAGE, io);
  if (!rawMaxAge) {
    return EXIT_USAGE_ERROR;
  }

  const maxAgeDays = parseNonNegativeNumber(rawMaxAge);
  if (maxAgeDays === null) {
    return usageError(
      io,
      `Option "--max-age-days" must be a non-negative number; received "${rawMaxAge}".`,
      LOGS_CLEANUP_USAGE,
    );
  }

  try {
    const engine = createEngine(dependencies, io);
    const result = await engine.logs.cleanup(maxAgeDays);
    for (const runId of result.deletedRunIds) {
      io.stdout(`deleted log for run id=${runId}`);
    }
    io.stdout(
      `Deleted ${result.deletedCount} run logs (${result.deletedEntries} entries, ${result.freedBytes} bytes).`,
    );
    return EXIT_SUCCESS;
  } catch (error) {
    return reportCommandError(error, 'clean up run logs', io);
  }
}

export async function handleLogsCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const subcommand = rawArgs[0];
  if (!subcommand) {
    return usageError(io, 'Missing required logs subcommand.', LOGS_USAGE);
  }

  switch (subcommand) {
    case 'show':
      return handleLogsShowCommand(rawArgs.slice(1), dependencies, io);
    case 'summary':
      return handleLogsSummaryCommand(rawArgs.slice(1), dependencies, io);
    case 'cleanup':
      return handleLogsCleanupCommand(rawArgs.slice(1), dependencies, io);
    default:
      return usageError(io, `Unknown logs subcommand "${subcommand}".`, LOGS_USAGE);
  }
}
