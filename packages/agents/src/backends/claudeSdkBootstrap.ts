const CLAUDE_API_KEY_ENV_VAR = 'CLAUDE_API_KEY';
const ANTHROPIC_API_KEY_ENV_VAR = 'ANTHROPIC_API_KEY';
const CLAUDE_MODEL_ENV_VAR = 'CLAUDE_MODEL';
const CLAUDE_BASE_URL_ENV_VAR = 'CLAUDE_BASE_URL';
const ANTHROPIC_BASE_URL_ENV_VAR = 'ANTHROPIC_BASE_URL';

type ApiKeySource = typeof CLAUDE_API_KEY_ENV_VAR | typeof ANTHROPIC_API_KEY_ENV_VAR;

export type ClaudeBootstrapErrorCode = 'CLAUDE_BOOTSTRAP_INVALID_CONFIG' | 'CLAUDE_BOOTSTRAP_MISSING_AUTH';

export class ClaudeBootstrapError extends Error {
  readonly code: ClaudeBootstrapErrorCode;
  readonly details?: Record<string, unknown>;
  readonly cause?: unknown;

  constructor(
    code: ClaudeBootstrapErrorCode,
    message: string,
    details?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = 'ClaudeBootstrapError';
    this.code = code;
    this.details = details;
    this.cause = cause;
  }
}

export type ClaudeBootstrapOverrides = Readonly<{
  env?: NodeJS.ProcessEnv;
}>;

export type ClaudeSdkBootstrap = Readonly<{
  /** Unset means the agent's own default model. */
  model?: string;
  baseUrl?: string;
  apiKey: string;
  apiKeySource: ApiKeySource;
}>;

let cachedBootstrap: ClaudeSdkBootstrap | undefined;

function readConfiguredEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const rawValue = env[key];
  if (rawValue === undefined) {
    return undefined;
  }

  const normalizedValue = rawValue.trim();
  if (normalizedValue.length === 0) {
    throw new ClaudeBootstrapError(
      'CLAUDE_BOOTSTRAP_INVALID_CONFIG',
      `SDK backend requires ${key} to be a non-empty string when set.`,
      { envKey: key },
    );
  }

  return normalizedValue;
}

function resolveBaseUrl(env: NodeJS.ProcessEnv): string | undefined {
  const claudeBaseUrl = readConfiguredEnvValue(env, CLAUDE_BASE_URL_ENV_VAR);
  const baseUrl = claudeBaseUrl ?? readConfiguredEnvValue(env, ANTHROPIC_BASE_URL_ENV_VAR);
  if (baseUrl === undefined) {
    return undefined;
  }

  const sourceEnvKey = claudeBaseUrl ? CLAUDE_BASE_URL_ENV_VAR : ANTHROPIC_BASE_URL_ENV_VAR;
  let parsedBaseUrl: URL;
  try {
    parsedBaseUrl = new URL(baseUrl);
  } catch (error) {
    throw new ClaudeBootstrapError(
      'CLAUDE_BOOTSTRAP_INVALID_CONFIG',
      `SDK backend requires ${sourceEnvKey} to be a valid URL when set.`,
      { envKey: sourceEnvKey, baseUrl },
      error,
    );
  }

  if (parsedBaseUrl.protocol !== 'http:' && parsedBaseUrl.protocol !== 'https:') {
    throw new ClaudeBootstrapError(
      'CLAUDE_BOOTSTRAP_INVALID_CONFIG',
      `SDK backend requires ${sourceEnvKey} to use http or https.`,
      { envKey: sourceEnvKey, baseUrl },
    );
  }

  return parsedBaseUrl.toString();
}

function resolveApiKey(env: NodeJS.ProcessEnv): { apiKey: string; apiKeySource: ApiKeySource } | undefined {
  const claudeApiKey = readConfiguredEnvValue(env, CLAUDE_API_KEY_ENV_VAR);
  if (claudeApiKey !== undefined) {
    return { apiKey: claudeApiKey, apiKeySource: CLAUDE_API_KEY_ENV_VAR };
  }

  const anthropicApiKey = readConfiguredEnvValue(env, ANTHROPIC_API_KEY_ENV_VAR);
  if (anthropicApiKey !== undefined) {
    return { apiKey: anthropicApiKey, apiKeySource: ANTHROPIC_API_KEY_ENV_VAR };
  }

  return undefined;
}

export function resetClaudeSdkBootstrapCache(): void {
  cachedBootstrap = undefined;
}

/**
 * Resolves agent credentials and endpoint settings from the environment.
 * Calls without overrides read `process.env` once and reuse the result.
 */
export function initializeClaudeSdkBootstrap(overrides: ClaudeBootstrapOverrides = {}): ClaudeSdkBootstrap {
  const useCache = overrides.env === undefined;
  if (useCache && cachedBootstrap) {
    return cachedBootstrap;
  }

  const env = overrides.env ?? process.env;
  const apiKey = resolveApiKey(env);
  if (!apiKey) {
    throw new ClaudeBootstrapError(
      'CLAUDE_BOOTSTRAP_MISSING_AUTH',
      'SDK backend requires an API key via CLAUDE_API_KEY or ANTHROPIC_API_KEY.',
      { checkedEnvVars: [CLAUDE_API_KEY_ENV_VAR, ANTHROPIC_API_KEY_ENV_VAR] },
    );
  }

  const bootstrap: ClaudeSdkBootstrap = Object.freeze({
    model: readConfiguredEnvValue(env, CLAUDE_MODEL_ENV_VAR),
    baseUrl: resolveBaseUrl(env),
    apiKey: apiKey.apiKey,
    apiKeySource: apiKey.apiKeySource,
  });

  if (useCache) {
    cachedBootstrap = bootstrap;
  }

  return bootstrap;
}

/**
 * Environment handed to the agent process: the caller's environment with the
 * resolved credentials and endpoint under both variable spellings.
 */
export function createClaudeQueryEnvironment(
  bootstrap: ClaudeSdkBootstrap,
  baseEnv: NodeJS.ProcessEnv = process.env,
): Record<string, string | undefined> {
  const env: Record<string, string | undefined> = {
    ...baseEnv,
    CLAUDE_API_KEY: bootstrap.apiKey,
    ANTHROPIC_API_KEY: bootstrap.apiKey,
  };

  if (bootstrap.baseUrl) {
    env.CLAUDE_BASE_URL = bootstrap.baseUrl;
    env.ANTHROPIC_BASE_URL = bootstrap.baseUrl;
  }

  return env;
}
