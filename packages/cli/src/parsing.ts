import type { RunLogView } from '@runwright/core';
import {
  EXIT_USAGE_ERROR,
  RUN_USAGE,
} from './constants.js';
import { usageError } from './io.js';
import type {
  CliIo,
  CommandValidationConfig,
  ParsedLongOptionToken,
  ParsedOptions,
  ParsedRunCommandInput,
  ValidatedCommandOptions,
} from './types.js';

export function parseLongOptionToken(arg: string, flagOptions: ReadonlySet<string>): ParsedLongOptionToken {
  if (!arg.startsWith('--')) {
    return {
      kind: 'positional',
      value: arg,
    };
  }

  if (arg === '--') {
    return {
      kind: 'separator',
    };
  }

  const equalsIndex = arg.indexOf('=');
  const hasInlineValue = equalsIndex >= 0;
  const optionName = hasInlineValue ? arg.slice(2, equalsIndex) : arg.slice(2);
  if (optionName.length === 0) {
    return {
      kind: 'error',
      message: 'Option name cannot be empty.',
    };
  }

  if (!hasInlineValue) {
    if (flagOptions.has(optionName)) {
      return {
        kind: 'flag',
        optionName,
      };
    }

    return {
      kind: 'option-next',
      optionName,
    };
  }

  const optionValue = arg.slice(equalsIndex + 1);
  if (optionValue.length === 0) {
    return {
      kind: 'error',
      message: `Option "--${optionName}" requires a value.`,
    };
  }

  return {
    kind: 'option-inline',
    optionName,
    optionValue,
  };
}

export function parseLongOptions(
  args: readonly string[],
  parseOptions: {
    flagOptions?: readonly string[];
  } = {},
): ParsedOptions {
  const flagOptions = new Set(parseOptions.flagOptions ?? []);
  const resolvedOptions = new Map<string, string>();
  const positionals: string[] = [];

  let cursor = 0;
  while (cursor < args.length) {
    const parsedToken = parseLongOptionToken(args[cursor], flagOptions);
    if (parsedToken.kind === 'error') {
      return {
        ok: false,
        message: parsedToken.message,
      };
    }

    if (parsedToken.kind === 'separator') {
      positionals.push(...args.slice(cursor + 1));
      break;
    }

    if (parsedToken.kind === 'positional') {
      positionals.push(parsedToken.value);
      cursor += 1;
      continue;
    }

    const { optionName } = parsedToken;
    if (resolvedOptions.has(optionName)) {
      return {
        ok: false,
        message: `Option "--${optionName}" cannot be provided more than once.`,
      };
    }

    if (parsedToken.kind === 'option-inline') {
      resolvedOptions.set(optionName, parsedToken.optionValue);
      cursor += 1;
      continue;
    }

    if (parsedToken.kind === 'flag') {
      resolvedOptions.set(optionName, 'true');
      cursor += 1;
      continue;
    }

    const optionValue = args[cursor + 1];
    if (!optionValue || optionValue.startsWith('--')) {
      return {
        ok: false,
        message: `Option "--${optionName}" requires a value.`,
      };
    }

    resolvedOptions.set(optionName, optionValue);
    cursor += 2;
  }

  return {
    ok: true,
    options: resolvedOptions,
    positionals,
  };
}

export function validateCommandOptions(
  rawArgs: readonly string[],
  config: CommandValidationConfig,
  io: Pick<CliIo, 'stderr'>,
): ValidatedCommandOptions {
  const parsedOptions = parseLongOptions(rawArgs, {
    flagOptions: config.flagOptions,
  });
  if (!parsedOptions.ok) {
    return {
      ok: false,
      exitCode: usageError(io, parsedOptions.message, config.usage),
    };
  }

  const { options, positionals } = parsedOptions;
  const expectedPositionals = config.positionalCount ?? 0;
  if (positionals.length > expectedPositionals) {
    return {
      ok: false,
      exitCode: usageError(
        io,
        `Unexpected positional arguments for "${config.commandName}": ${positionals.join(' ')}`,
        config.usage,
      ),
    };
  }
  if (positionals.length < expectedPositionals) {
    return {
      ok: false,
      exitCode: usageError(
        io,
        `Missing required positional argument for "${config.commandName}".`,
        config.usage,
      ),
    };
  }

  const allowedOptions = new Set(config.allowedOptions);
  for (const optionName of options.keys()) {
    if (allowedOptions.has(optionName)) {
      continue;
    }
    return {
      ok: false,
      exitCode: usageError(io, `Unknown option for "${config.commandName}": --${optionName}`, config.usage),
    };
  }

  return {
    ok: true,
    options,
    positionals,
  };
}

export function getRequiredOption(
  options: ReadonlyMap<string, string>,
  optionName: string,
  optionDescription: string,
  usage: string,
  io: Pick<CliIo, 'stderr'>,
): string | null {
  const value = options.get(optionName);
  if (value) {
    return value;
  }

  usageError(io, `Missing required option: --${optionName} <${optionDescription}>`, usage);
  return null;
}

export function parseStrictPositiveInteger(value: string): number | null {
  if (!/^[1-9]\d*$/.test(value)) {
    return null;
  }

  const parsed = Number(value);
  if (!Number.isSafeInteger(parsed)) {
    return null;
  }

  return parsed;
}

export function parseStrictPositiveNumber(value: string): number | null {
  if (!/^(?:\d+\.?\d*|\.\d+)$/.test(value)) {
    return null;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }

  return parsed;
}

export function parseNonNegativeNumber(value: string): number | null {
  if (!/^(?:\d+\.?\d*|\.\d+)$/.test(value)) {
    return null;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

const runLogViews: readonly RunLogView[] = ['none', 'tail', 'full'];

export function parseRunLogView(value: string | undefined): RunLogView | null {
  if (value === undefined) {
    return 'none';
  }

  return runLogViews.find(view => view === value) ?? null;
}

/** Reads an optional positive-integer option; a rejected value is reported before returning. */
export function readOptionalPositiveInteger(
  options: ReadonlyMap<string, string>,
  optionName: string,
  usage: string,
  io: Pick<CliIo, 'stderr'>,
): { ok: true; value: number | undefined } | { ok: false; exitCode: typeof EXIT_USAGE_ERROR } {
  const raw = options.get(optionName);
  if (raw === undefined) {
    return { ok: true, value: undefined };
  }

  const value = parseStrictPositiveInteger(raw);
  if (value === null) {
    return {
      ok: false,
      exitCode: usageError(io, `Option "--${optionName}" must be a positive integer; received "${raw}".`, usage),
    };
  }

  return { ok: true, value };
}

function readOptionalText(
  options: ReadonlyMap<string, string>,
  optionName: string,
  io: Pick<CliIo, 'stderr'>,
): { ok: true; value: string | undefined } | { ok: false; exitCode: typeof EXIT_USAGE_ERROR } {
  const raw = options.get(optionName);
  const value = raw?.trim();
  if (raw !== undefined && value === '') {
    return { ok: false, exitCode: usageError(io, `Option "--${optionName}" requires a value.`, RUN_USAGE) };
  }

  return { ok: true, value };
}

export function parseRunCommandInput(rawArgs: readonly string[], io: CliIo): ParsedRunCommandInput {
  const parsedOptions = validateCommandOptions(
    rawArgs,
    {
      commandName: 'run',
      usage: RUN_USAGE,
      allowedOptions: [
        'workflow',
        'message',
        'base-branch',
        'max-turns',
        'timeout-seconds',
        'session-id',
        'run-id',
        'no-follow',
      ],
      flagOptions: ['no-follow'],
    },
    io,
  );
  if (!parsedOptions.ok) {
    return {
      ok: false,
      exitCode: parsedOptions.exitCode,
    };
  }

  const { options } = parsedOptions;
  const workflowName = getRequiredOption(options, 'workflow', 'name', RUN_USAGE, io);
  if (!workflowName) {
    return { ok: false, exitCode: EXIT_USAGE_ERROR };
  }

  const message = getRequiredOption(options, 'message', 'text', RUN_USAGE, io);
  if (!message) {
    return { ok: false, exitCode: EXIT_USAGE_ERROR };
  }

  const maxTurns = readOptionalPositiveInteger(options, 'max-turns', RUN_USAGE, io);
  if (!maxTurns.ok) {
    return maxTurns;
  }

  const timeoutRaw = options.get('timeout-seconds');
  let timeoutSeconds: number | undefined;
  if (timeoutRaw !== undefined) {
    const parsedTimeout = parseStrictPositiveNumber(timeoutRaw);
    if (parsedTimeout === null) {
      return {
        ok: false,
        exitCode: usageError(
          io,
          `Option "--timeout-seconds" must be a positive number; received "${timeoutRaw}".`,
          RUN_USAGE,
        ),
      };
    }
    timeoutSeconds = parsedTimeout;
  }

  const baseBranch = readOptionalText(options, 'base-branch', io);
  if (!baseBranch.ok) {
    return baseBranch;
  }
  const sessionId = readOptionalText(options, 'session-id', io);
  if (!sessionId.ok) {
    return sessionId;
  }
  const runId = readOptionalText(options, 'run-id', io);
  if (!runId.ok) {
    return runId;
  }

  return {
    ok: true,
    workflowName: workflowName.trim(),
    message,
    baseBranch: baseBranch.value,
    maxTurns: maxTurns.value,
    timeoutSeconds,
    sessionId: sessionId.value,
    runId: runId.value,
    follow: !options.has('no-follow'),
  };
}
