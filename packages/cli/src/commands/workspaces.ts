import {
  DEFAULT_REAP_MAX_AGE_HOURS,
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  REAP_USAGE,
  WORKSPACES_USAGE,
} from '../constants.js';
import { createEngine } from '../engine.js';
import { reportCommandError } from '../execution.js';
import { usageError } from '../io.js';
import { parseNonNegativeNumber, validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

const MS_PER_HOUR = 60 * 60 * 1000;

function formatAge(ageMs: number | null): string {
  return ageMs === null ? '-' : `${Math.round((ageMs / MS_PER_HOUR) * 10) / 10}h`;
}

export async function handleWorkspacesCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const subcommand = rawArgs[0];
  if (subcommand !== 'list') {
    const message = subcommand
      ? `Unknown workspaces subcommand "${subcommand}".`
      : 'Missing required workspaces subcommand.';
    return usageError(io, message, WORKSPACES_USAGE);
  }

  const parsedOptions = validateCommandOptions(
    rawArgs.slice(1),
    {
      commandName: 'workspaces list',
      usage: WORKSPACES_USAGE,
      allowedOptions: [],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  try {
    const engine = createEngine(dependencies, io);
    const snapshots = await engine.workspaces.list();
    if (snapshots.length === 0) {
      io.stdout('No workspaces found.');
      return EXIT_SUCCESS;
    }

    for (const snapshot of snapshots) {
      io.stdout(
        [
          snapshot.path,
          `branch=${snapshot.branch}`,
          `run=${snapshot.runId ?? '-'}`,
          `owner=${snapshot.owningRunId ?? '-'}`,
          `idle=${formatAge(snapshot.ageMs)}`,
          `managed=${snapshot.managed ? 'yes' : 'no'}`,
          `on_disk=${snapshot.onDisk ? 'yes' : 'no'}`,
        ].join(' '),
      );
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return reportCommandError(error, 'list workspaces', io);
  }
}

export async function handleReapCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'reap',
      usage: REAP_USAGE,
      allowedOptions: ['max-age-hours', 'dry-run'],
      flagOptions: ['dry-run'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  const rawMaxAge = parsedOptions.options.get('max-age-hours');
  const maxAgeHours = rawMaxAge === undefined ? DEFAULT_REAP_MAX_AGE_HOURS : parseNonNegativeNumber(rawMaxAge);
  if (maxAgeHours === null) {
    return usageError(
      io,
      `Option "--max-age-hours" must be a non-negative number; received "${rawMaxAge ?? ''}".`,
      REAP_USAGE,
    );
  }
  const dryRun = parsedOptions.options.has('dry-run');

  try {
    const engine = createEngine(dependencies, io);
    const report = await engine.reaper.reap({ maxAgeMs: maxAgeHours * MS_PER_HOUR, dryRun });

    for (const candidate of report.orphaned) {
      const verb = dryRun ? 'would remove' : 'orphaned';
      io.stdout(`${verb} ${candidate.path} branch=${candidate.branch} idle=${candidate.ageHours}h`);
    }
    for (const path of report.cleaned) {
      io.stdout(`removed ${path}`);
    }
    for (const skip of report.skipped) {
      io.stdout(`skipped ${skip.path}: ${skip.message}`);
    }
    for (const failure of report.failed) {
      io.stderr(`failed ${failure.path}: ${failure.error}`);
    }

    return report.failed.length > 0 ? EXIT_RUNTIME_ERROR : EXIT_SUCCESS;
  } catch (error) {
    return reportCommandError(error, 'reap workspaces', io);
  }
}
