import { describe, expect, it } from 'vitest';
import { encodeControlLine, formatInjectionNotice, parseControlLine } from './controlLine.js';

describe('parseControlLine', () => {
  it('accepts a well-formed user line', () => {
    expect(parseControlLine('{"type":"user","message":"hello"}')).toEqual({
      ok: true,
      value: { type: 'user', message: 'hello' },
    });
  });

  it('trims the message of an accepted system line', () => {
    expect(parseControlLine('{"type":"system","message":"  stop after tests  "}')).toEqual({
      ok: true,
      value: { type: 'system', message: 'stop after tests' },
    });
  });

  it.each([
    ['', 'blank'],
    ['   \t', 'blank'],
    ['{"type":"user"', 'malformed'],
    ['[1,2]', 'malformed'],
    ['"text"', 'malformed'],
    ['{"message":"x"}', 'missing_field'],
    ['{"type":"user"}', 'missing_field'],
    ['{"type":"bogus","message":"x"}', 'invalid_type'],
    ['{"type":"user","message":42}', 'invalid_message'],
    ['{"type":"user","message":""}', 'invalid_message'],
    ['{"type":"user","message":"   "}', 'invalid_message'],
  ])('rejects %j as %s', (line, reason) => {
    const result = parseControlLine(line);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.reason).toBe(reason);
    }
  });

  it('checks the type before the message', () => {
    const result = parseControlLine('{"type":"bogus","message":""}');
    expect(result).toMatchObject({ ok: false, reason: 'invalid_type' });
  });

  it('ignores unknown extra fields', () => {
    expect(parseControlLine('{"type":"user","message":"go","priority":1}')).toEqual({
      ok: true,
      value: { type: 'user', message: 'go' },
    });
  });
});

describe('encodeControlLine', () => {
  it('writes a single newline-terminated JSON object', () => {
    expect(encodeControlLine({ type: 'user', message: 'line one\nline two' })).toBe(
      '{"type":"user","message":"line one\\nline two"}\n',
    );
  });
});

describe('formatInjectionNotice', () => {
  it('passes user bodies through unchanged', () => {
    expect(formatInjectionNotice('user', 'keep going')).toBe('keep going');
  });

  it('wraps system bodies in a notice block', () => {
    const notice = formatInjectionNotice('system', 'Stop editing docs/.');
    expect(notice.startsWith('<system-notice>\n')).toBe(true);
    expect(notice.endsWith('\nStop editing docs/.\n</system-notice>')).toBe(true);
  });
});
