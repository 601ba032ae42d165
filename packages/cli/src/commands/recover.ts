import { EXIT_SUCCESS, RECOVER_USAGE } from '../constants.js';
import { createEngine } from '../engine.js';
import { reportCommandError } from '../execution.js';
import { validateCommandOptions } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

/** Operator action: assumes no other engine process is using the database. */
export async function handleRecoverCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'recover',
      usage: RECOVER_USAGE,
      allowedOptions: [],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return parsedOptions.exitCode;
  }

  try {
    const engine = createEngine(dependencies, io);
    const recovered = await engine.manager.recoverInterruptedRuns();
    for (const run of recovered) {
      io.stdout(`Run id=${run.runId} workflow=${run.workflowName} status=${run.status}`);
    }
    io.stdout(`Recovered ${recovered.length} interrupted runs.`);
    return EXIT_SUCCESS;
  } catch (error) {
    return reportCommandError(error, 'recover interrupted runs', io);
  }
}
