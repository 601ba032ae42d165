import type { EngineLogger } from '@runwright/shared';
import { EXIT_USAGE_ERROR } from './constants.js';
import type { CliIo } from './types.js';

export function createDefaultIo(): CliIo {
  return {
    stdout: message => console.log(message),
    stderr: message => console.error(message),
    cwd: process.cwd(),
    env: process.env,
  };
}

/** Routes engine diagnostics through the command's output streams. */
export function createIoLogger(io: Pick<CliIo, 'stdout' | 'stderr'>): EngineLogger {
  const format = (data: unknown[]): string => data.map(item => String(item)).join(' ');
  return {
    info: (...data: unknown[]) => io.stdout(format(data)),
    warn: (...data: unknown[]) => io.stderr(format(data)),
    error: (...data: unknown[]) => io.stderr(format(data)),
  };
}

export function printGeneralUsage(io: Pick<CliIo, 'stdout'>): void {
  io.stdout('Runwright - workflow execution engine for coding agents');
  io.stdout('');
  io.stdout('Usage: runwright <command> [options]');
  io.stdout('');
  io.stdout('Commands:');
  io.stdout('  workflows sync             Load workflow definitions from the workflows directory');
  io.stdout('  workflows list             List registered workflows');
  io.stdout('  run --workflow <name> --message <text> [--base-branch <branch>] [--max-turns <n>]');
  io.stdout('      [--timeout-seconds <n>] [--session-id <id>] [--run-id <id>] [--no-follow]');
  io.stdout('                             Execute a workflow run in a fresh workspace');
  io.stdout('  status --run <run_id> [--logs <none|tail|full>] [--tail <n>]');
  io.stdout('                             Show run status, metrics and log entries');
  io.stdout('  logs show --run <run_id> [--tail <n>]');
  io.stdout('                             Print a run log');
  io.stdout('  logs summary --run <run_id> Summarize a run log');
  io.stdout('  logs cleanup --max-age-days <days>');
  io.stdout('                             Delete finished run logs older than the threshold');
  io.stdout('  workspaces list            List run workspaces and their ownership');
  io.stdout('  reap [--max-age-hours <hours>] [--dry-run]');
  io.stdout('                             Remove idle workspaces that no run owns');
  io.stdout('  recover                    Mark runs interrupted by a previous process as failed');
}

export function usageError(io: Pick<CliIo, 'stderr'>, message: string, usage: string): typeof EXIT_USAGE_ERROR {
  io.stderr(message);
  io.stderr(usage);
  return EXIT_USAGE_ERROR;
}
