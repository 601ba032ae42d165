import { toErrorMessage } from '@runwright/shared';
import { createEngine, type Engine } from '../engine.js';
import {
  followRunLog,
  forwardInputLines,
  reportCommandError,
  summarizeRunOutcome,
} from '../execution.js';
import { parseRunCommandInput } from '../parsing.js';
import type { CliDependencies, CliIo, ExitCode } from '../types.js';

export async function handleRunCommand(
  rawArgs: readonly string[],
  dependencies: CliDependencies,
  io: CliIo,
): Promise<ExitCode> {
  const parsedInput = parseRunCommandInput(rawArgs, io);
  if (!parsedInput.ok) {
    return parsedInput.exitCode;
  }

  let engine: Engine;
  let runId: string;
  try {
    engine = createEngine(dependencies, io);
    runId = await engine.manager.startRun(parsedInput.workflowName, {
      message: parsedInput.message,
      baseBranch: parsedInput.baseBranch,
      maxTurns: parsedInput.maxTurns,
      timeoutSeconds: parsedInput.timeoutSeconds,
      sessionId: parsedInput.sessionId ?? null,
      runId: parsedInput.runId,
    });
  } catch (error) {
    return reportCommandError(error, 'start the run', io);
  }

  io.stdout(`Run id=${runId} started workflow=${parsedInput.workflowName}`);
  const { manager } = engine;
  const removeInterruptHandler = dependencies.onInterrupt(() => {
    io.stderr(`Interrupted; terminating run id=${runId}.`);
    void manager.terminateRun(runId).catch((error: unknown) => {
      io.stderr(`Run id=${runId} could not be terminated: ${toErrorMessage(error)}`);
    });
  });
  const input = parsedInput.follow ? dependencies.openInputLines() : null;

  try {
    const forwarding = input ? forwardInputLines(manager, runId, input.lines, io) : Promise.resolve();
    const settled = manager.waitForRun(runId);
    const run = parsedInput.follow ? await followRunLog(engine.logs, settled, runId, io) : await settled;

    input?.close();
    await forwarding;
    return summarizeRunOutcome(run, io);
  } catch (error) {
    return reportCommandError(error, `follow run id=${runId}`, io);
  } finally {
    input?.close();
    removeInterruptHandler();
  }
}
