import { describe, expect, expectTypeOf, it } from 'vitest';
import { EXIT_USAGE_ERROR, RUN_USAGE } from './constants.js';
import { createIoLogger, usageError } from './io.js';
import { readOptionalPositiveInteger } from './parsing.js';
import { createCapturedIo } from './test-support.js';

describe('usageError', () => {
  it('reports the message and usage and returns the usage exit code', () => {
    const captured = createCapturedIo();

    const exitCode = usageError(captured.io, 'Missing required option: --workflow <name>', RUN_USAGE);

    expect(exitCode).toBe(2);
    expect(captured.stderr).toEqual(['Missing required option: --workflow <name>', RUN_USAGE]);
    expectTypeOf(usageError).returns.toEqualTypeOf<typeof EXIT_USAGE_ERROR>();
  });

  it('fits results that promise the usage exit code', () => {
    const captured = createCapturedIo();

    const result = readOptionalPositiveInteger(new Map([['max-turns', 'many']]), 'max-turns', RUN_USAGE, captured.io);

    expect(result).toEqual({ ok: false, exitCode: EXIT_USAGE_ERROR });
    expect(captured.stderr[0]).toBe('Option "--max-turns" must be a positive integer; received "many".');
  });
});

describe('createIoLogger', () => {
  it('sends info to stdout and warnings and errors to stderr', () => {
    const captured = createCapturedIo();
    const logger = createIoLogger(captured.io);

    logger.info('Run id=run-1', 'started');
    logger.warn('slow');
    logger.error('broken');

    expect(captured.stdout).toEqual(['Run id=run-1 started']);
    expect(captured.stderr).toEqual(['slow', 'broken']);
  });
});
