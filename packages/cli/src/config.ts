import { homedir } from 'node:os';
import { isAbsolute, join, resolve } from 'node:path';
import {
  isExecutionBackendStrategy,
  type ExecutionBackendStrategy,
} from '@runwright/agents';
import {
  DEFAULT_BASE_BRANCH,
  DEFAULT_MAX_CONCURRENT_ALLOCATIONS,
  DEFAULT_MAX_QUEUED_RUNS,
  DEFAULT_MAX_TURNS,
  DEFAULT_TIMEOUT_SECONDS,
  MAX_TIMEOUT_SECONDS,
  MAX_TURNS_LIMIT,
} from '@runwright/core';
import { toErrorMessage } from '@runwright/shared';

export const DEFAULT_DATABASE_FILE = 'runwright.db';
export const DEFAULT_WORKFLOWS_SUBPATH = 'workflows';
const DEFAULT_WORKTREE_SUBPATH = join('.runwright', 'worktrees');

export type EngineConfig = {
  databasePath: string;
  repoDir: string;
  worktreeBase: string;
  workflowsDir: string;
  branchTemplate: string | null;
  backend: {
    strategy: string;
    command: string | null;
    args: string[];
  };
  defaultTimeoutSeconds: number;
  defaultMaxTurns: number;
  defaultBaseBranch: string;
  maxConcurrentAllocations: number;
  maxQueuedRuns: number;
};

export class EngineConfigError extends Error {
  readonly code = 'ENGINE_INVALID_CONFIG';
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(message);
    this.name = 'EngineConfigError';
    this.details = details;
    this.cause = cause;
  }
}

export function readConfiguredEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const rawValue = env[key];
  if (rawValue === undefined) {
    return undefined;
  }

  const normalizedValue = rawValue.trim();
  if (normalizedValue.length === 0) {
    throw new EngineConfigError(`${key} must be a non-empty string when set.`, { envKey: key });
  }

  return normalizedValue;
}

function resolveConfiguredPath(env: NodeJS.ProcessEnv, key: string, cwd: string, fallback: string): string {
  const configured = readConfiguredEnvValue(env, key);
  if (configured === undefined) {
    return fallback;
  }

  return isAbsolute(configured) ? configured : resolve(cwd, configured);
}

function readIntegerSetting(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number,
  max: number = Number.MAX_SAFE_INTEGER,
): number {
  const configured = readConfiguredEnvValue(env, key);
  if (configured === undefined) {
    return fallback;
  }

  const parsed = /^[1-9]\d*$/.test(configured) ? Number(configured) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed > max) {
    throw new EngineConfigError(`${key} must be an integer between 1 and ${max}; received "${configured}".`, {
      envKey: key,
      value: configured,
    });
  }

  return parsed;
}

function readTimeoutSetting(env: NodeJS.ProcessEnv, key: string): number {
  const configured = readConfiguredEnvValue(env, key);
  if (configured === undefined) {
    return DEFAULT_TIMEOUT_SECONDS;
  }

  const parsed = Number(configured);
  if (!Number.isFinite(parsed) || parsed <= 0 || parsed > MAX_TIMEOUT_SECONDS) {
    throw new EngineConfigError(
      `${key} must be a positive number of seconds up to ${MAX_TIMEOUT_SECONDS}; received "${configured}".`,
      { envKey: key, value: configured },
    );
  }

  return parsed;
}

/** Accepts a JSON array of strings or a whitespace-separated list. */
export function parseAgentArgs(value: string): string[] {
  if (!value.startsWith('[')) {
    return value.split(/\s+/).filter(arg => arg.length > 0);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (error) {
    throw new EngineConfigError(
      `RUNWRIGHT_AGENT_ARGS is not a valid JSON array: ${toErrorMessage(error)}`,
      { envKey: 'RUNWRIGHT_AGENT_ARGS' },
      error,
    );
  }

  if (!Array.isArray(parsed) || parsed.some(item => typeof item !== 'string')) {
    throw new EngineConfigError('RUNWRIGHT_AGENT_ARGS must be a JSON array of strings.', {
      envKey: 'RUNWRIGHT_AGENT_ARGS',
    });
  }

  return parsed.map(item => String(item));
}

function readBackendStrategy(env: NodeJS.ProcessEnv): ExecutionBackendStrategy {
  const configured = readConfiguredEnvValue(env, 'RUNWRIGHT_BACKEND') ?? 'sdk';
  if (!isExecutionBackendStrategy(configured)) {
    throw new EngineConfigError(`RUNWRIGHT_BACKEND must be one of: sdk, subprocess; received "${configured}".`, {
      envKey: 'RUNWRIGHT_BACKEND',
      value: configured,
    });
  }

  return configured;
}

export function loadEngineConfig(
  env: NodeJS.ProcessEnv,
  cwd: string,
  homeDir: string = homedir(),
): EngineConfig {
  const agentArgs = readConfiguredEnvValue(env, 'RUNWRIGHT_AGENT_ARGS');

  return {
    databasePath: resolveConfiguredPath(env, 'RUNWRIGHT_DB_PATH', cwd, resolve(cwd, DEFAULT_DATABASE_FILE)),
    repoDir: resolveConfiguredPath(env, 'RUNWRIGHT_REPO_DIR', cwd, resolve(cwd)),
    worktreeBase: resolveConfiguredPath(env, 'RUNWRIGHT_WORKTREE_DIR', cwd, join(homeDir, DEFAULT_WORKTREE_SUBPATH)),
    workflowsDir: resolveConfiguredPath(env, 'RUNWRIGHT_WORKFLOWS_DIR', cwd, resolve(cwd, DEFAULT_WORKFLOWS_SUBPATH)),
    branchTemplate: readConfiguredEnvValue(env, 'RUNWRIGHT_BRANCH_TEMPLATE') ?? null,
    backend: {
      strategy: readBackendStrategy(env),
      command: readConfiguredEnvValue(env, 'RUNWRIGHT_AGENT_COMMAND') ?? null,
      args: agentArgs === undefined ? [] : parseAgentArgs(agentArgs),
    },
    defaultTimeoutSeconds: readTimeoutSetting(env, 'RUNWRIGHT_DEFAULT_TIMEOUT_SECONDS'),
    defaultMaxTurns: readIntegerSetting(env, 'RUNWRIGHT_DEFAULT_MAX_TURNS', DEFAULT_MAX_TURNS, MAX_TURNS_LIMIT),
    defaultBaseBranch: readConfiguredEnvValue(env, 'RUNWRIGHT_BASE_BRANCH') ?? DEFAULT_BASE_BRANCH,
    maxConcurrentAllocations: readIntegerSetting(
      env,
      'RUNWRIGHT_MAX_CONCURRENT_ALLOCATIONS',
      DEFAULT_MAX_CONCURRENT_ALLOCATIONS,
    ),
    maxQueuedRuns: readIntegerSetting(env, 'RUNWRIGHT_MAX_QUEUED_RUNS', DEFAULT_MAX_QUEUED_RUNS),
  };
}
