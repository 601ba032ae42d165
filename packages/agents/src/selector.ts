import { compareStringsByCodeUnit, type EngineLogger, type ExecutionBackend } from '@runwright/shared';
import { SdkExecutionBackend, type SdkExecutionBackendOptions } from './backends/sdk.js';
import {
  SubprocessExecutionBackend,
  type SubprocessExecutionBackendOptions,
} from './backends/subprocess.js';

export const executionBackendStrategies = ['sdk', 'subprocess'] as const;

export type ExecutionBackendStrategy = (typeof executionBackendStrategies)[number];

export type ExecutionBackendConfig = {
  strategy: string;
  command?: string | null;
  args?: readonly string[];
  terminateGraceMs?: number;
  logger?: Pick<EngineLogger, 'warn'>;
};

/** Test seams forwarded to the backend constructors. */
export type ExecutionBackendOverrides = {
  sdk?: SdkExecutionBackendOptions;
  subprocess?: Pick<SubprocessExecutionBackendOptions, 'env' | 'spawnProcess' | 'killProcessGroup'>;
};

export class UnknownExecutionBackendError extends Error {
  readonly code = 'UNKNOWN_EXECUTION_BACKEND';
  readonly strategy: string;
  readonly availableStrategies: readonly string[];

  constructor(strategy: string, availableStrategies: readonly string[]) {
    const sortedStrategies = [...availableStrategies].sort(compareStringsByCodeUnit);
    super(`Unknown execution backend "${strategy}". Available backends: ${sortedStrategies.join(', ')}.`);

    this.name = 'UnknownExecutionBackendError';
    this.strategy = strategy;
    this.availableStrategies = sortedStrategies;
  }
}

export class ExecutionBackendConfigError extends Error {
  readonly code = 'EXECUTION_BACKEND_INVALID_CONFIG';
  readonly strategy: ExecutionBackendStrategy;

  constructor(strategy: ExecutionBackendStrategy, message: string) {
    super(message);
    this.name = 'ExecutionBackendConfigError';
    this.strategy = strategy;
  }
}

export function isExecutionBackendStrategy(value: string): value is ExecutionBackendStrategy {
  return executionBackendStrategies.some(strategy => strategy === value);
}

/**
 * Builds the configured backend. Misconfiguration throws here, before any run
 * is accepted.
 */
export function selectExecutionBackend(
  config: ExecutionBackendConfig,
  overrides: ExecutionBackendOverrides = {},
): ExecutionBackend {
  if (!isExecutionBackendStrategy(config.strategy)) {
    throw new UnknownExecutionBackendError(config.strategy, executionBackendStrategies);
  }

  switch (config.strategy) {
    case 'sdk':
      return new SdkExecutionBackend(overrides.sdk);
    case 'subprocess': {
      const command = config.command?.trim();
      if (!command) {
        throw new ExecutionBackendConfigError(
          'subprocess',
          'The subprocess backend requires an agent command (RUNWRIGHT_AGENT_COMMAND).',
        );
      }

      return new SubprocessExecutionBackend({
        ...overrides.subprocess,
        command,
        args: config.args,
        terminateGraceMs: config.terminateGraceMs,
        logger: config.logger,
      });
    }
  }
}
