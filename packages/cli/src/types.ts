import { createInterface } from 'node:readline';
import {
  initializeClaudeSdkBootstrap,
  selectExecutionBackend,
  type ExecutionBackendConfig,
} from '@runwright/agents';
import { createDatabase, migrateDatabase, type RunwrightDatabase } from '@runwright/db';
import type { RunWorkspaceAllocator } from '@runwright/core';
import { WorkspaceManager, type WorkspaceManagerOptions } from '@runwright/git';
import type { ExecutionBackend, WorkspaceStore } from '@runwright/shared';
import {
  EXIT_NOT_FOUND,
  EXIT_RUNTIME_ERROR,
  EXIT_SUCCESS,
  EXIT_USAGE_ERROR,
} from './constants.js';

export type ExitCode =
  | typeof EXIT_SUCCESS
  | typeof EXIT_USAGE_ERROR
  | typeof EXIT_NOT_FOUND
  | typeof EXIT_RUNTIME_ERROR;

export type CliIo = {
  stdout: (message: string) => void;
  stderr: (message: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
};

/** Line source the `run` command forwards as control lines. */
export type InputLines = {
  lines: AsyncIterable<string>;
  close: () => void;
};

export type EngineWorkspaces = RunWorkspaceAllocator & Pick<WorkspaceManager, 'list' | 'remove'>;

export type CliDependencies = {
  openDatabase: (path: string) => RunwrightDatabase;
  migrateDatabase: (db: RunwrightDatabase) => void;
  createBackend: (config: ExecutionBackendConfig, env: NodeJS.ProcessEnv) => ExecutionBackend;
  createWorkspaceManager: (store: WorkspaceStore, options: WorkspaceManagerOptions) => EngineWorkspaces;
  openInputLines: () => InputLines | null;
  /** Registers an interrupt handler; the returned function removes it. */
  onInterrupt: (handler: () => void) => () => void;
};

export type MainOptions = {
  dependencies?: CliDependencies;
  io?: CliIo;
};

export type CliEntrypointRuntime = {
  argv: string[];
  exit: (code: number) => void;
};

export type ParsedOptions =
  | {
      ok: true;
      options: Map<string, string>;
      positionals: string[];
    }
  | {
      ok: false;
      message: string;
    };

export type ParsedLongOptionToken =
  | {
      kind: 'positional';
      value: string;
    }
  | {
      kind: 'separator';
    }
  | {
      kind: 'option-inline';
      optionName: string;
      optionValue: string;
    }
  | {
      kind: 'option-next';
      optionName: string;
    }
  | {
      kind: 'flag';
      optionName: string;
    }
  | {
      kind: 'error';
      message: string;
    };

export type ValidatedCommandOptions =
  | {
      ok: true;
      options: Map<string, string>;
      positionals: string[];
    }
  | {
      ok: false;
      exitCode: ExitCode;
    };

export type CommandValidationConfig = {
  commandName: string;
  usage: string;
  allowedOptions: readonly string[];
  flagOptions?: readonly string[];
  positionalCount?: number;
};

export type ParsedRunCommandInput =
  | {
      ok: true;
      workflowName: string;
      message: string;
      baseBranch: string | undefined;
      maxTurns: number | undefined;
      timeoutSeconds: number | undefined;
      sessionId: string | undefined;
      runId: string | undefined;
      follow: boolean;
    }
  | {
      ok: false;
      exitCode: ExitCode;
    };

function openStdinLines(): InputLines {
  const reader = createInterface({ input: process.stdin, crlfDelay: Infinity, terminal: false });
  return {
    lines: reader,
    close: () => reader.close(),
  };
}

export const defaultDependencies: CliDependencies = {
  openDatabase: path => createDatabase(path),
  migrateDatabase: db => migrateDatabase(db),
  createBackend: (config, env) =>
    selectExecutionBackend(config, {
      sdk: { bootstrap: () => initializeClaudeSdkBootstrap({ env }) },
      subprocess: { env },
    }),
  createWorkspaceManager: (store, options) => new WorkspaceManager(store, options),
  openInputLines: () => openStdinLines(),
  onInterrupt: handler => {
    process.once('SIGINT', handler);
    return () => {
      process.off('SIGINT', handler);
    };
  },
};
