import {
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  WORKFLOWS_LIST_USAGE,
  WORKFLOWS_SYNC_USAGE,
  WORKFLOWS_USAGE,
} from '../constants.js';
import { createEngine } from '../engine.js';
import { reportCommandError } from '../execution.js';
import { usageError } from '../io.js';
import { validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleWorkflowsSyncCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'workflows sync',
      usage: WORKFLOWS_SYNC_USAGE,
      allowedOptions: [],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  try {
    const engine = createEngine(dependencies, io);
    const report = await engine.catalogSync.sync();
    for (const name of report.registered) {
      io.stdout(`registered ${name}`);
    }
    for (const name of report.updated) {
      io.stdout(`updated ${name}`);
    }
    for (const name of report.unchanged) {
      io.stdout(`unchanged ${name}`);
    }

    return report.errors.length > 0 ? EXIT_RUNTIME_ERROR : EXIT_SUCCESS;
  } catch (error) {
    return reportCommandError(error, 'sync workflows', io);
  }
}

export async function handleWorkflowsListCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'workflows list',
      usage: WORKFLOWS_LIST_USAGE,
      allowedOptions: [],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  try {
    const engine = createEngine(dependencies, io);
    const workflows = await engine.manager.listWorkflows();
    if (workflows.length === 0) {
      io.stdout('No workflows registered. Run "runwright workflows sync" first.');
      return EXIT_SUCCESS;
    }

    for (const workflow of workflows) {
      const tools = workflow.allowedTools.length > 0 ? workflow.allowedTools.join(',') : '-';
      io.stdout(
        `${workflow.name}\t${workflow.displayName}\tmax_turns=${workflow.suggestedMaxTurns ?? '-'}\ttools=${tools}`,
      );
      if (workflow.description) {
        io.stdout(`  ${workflow.description}`);
      }
    }
    return EXIT_SUCCESS;
  } catch (error) {
    return reportCommandError(error, 'list workflows', io);
  }
}

export async function handleWorkflowsCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const subcommand = rawArgs[0];
  if (!subcommand) {
    return usageError(io, 'Missing required workflows subcommand.', WORKFLOWS_USAGE);
  }

  switch (subcommand) {
    case 'sync':
      return handleWorkflowsSyncCommand(rawArgs.slice(1), dependencies, io);
    case 'list':
      return handleWorkflowsListCommand(rawArgs.slice(1), dependencies, io);
    default:
      return usageError(io, `Unknown workflows subcommand "${subcommand}".`, WORKFLOWS_USAGE);
  }
}
