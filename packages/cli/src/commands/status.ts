import {
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
  STATUS_USAGE,
} from '../constants.js';
import { createEngine } from '../engine.js';
import { reportCommandError } from '../execution.js';
import { formatLogEntry, formatRunDetails } from '../format.js';
import { usageError } from '../io.js';
import {
  getRequiredOption,
  parseRunLogView,
  readOptionalPositiveInteger,
  validateCommandOptions,
} from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleStatusCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'status',
      usage: STATUS_USAGE,
      allowedOptions: ['run', 'logs', 'tail'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const runId = getRequiredOption(parsedOptions.options, 'run', 'run_id', STATUS_USAGE, io);
  if (!runId) {
    return EXIT_USAGE_ERROR;
  }

  const logView = parseRunLogView(parsedOptions.options.get('logs'));
  if (logView === null) {
    return usageError(io, 'Option "--logs" must be one of: none, tail, full.', STATUS_USAGE);
  }

  const tail = readOptionalPositiveInteger(parsedOptions.options, 'tail', STATUS_USAGE, io);
  if (!tail.ok) {
    return tail.exitCode;
  }
  if (tail.value !== undefined && logView !== 'tail') {
    return usageError(io, 'Option "--tail" requires "--logs tail".', STATUS_USAGE);
  }

  try {
    const engine = createEngine(dependencies, io);
    const status = await engine.manager.getStatus(runId, { logs: logView, tail: tail.value });

    for (const line of formatRunDetails(status.run, status.metrics)) {
      io.stdout(line);
    }

    if (logView === 'none') {
      return EXIT_SUCCESS;
    }

    if (status.logs.length === 0) {
      io.stdout('Log entries: (none)');
      return EXIT_SUCCESS;
    }

    io.stdout('Log entries:');
    for (const entry of status.logs) {
      io.stdout(`  ${formatLogEntry(entry)}`);
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return reportCommandError(error, 'read run status', io);
  }
}
