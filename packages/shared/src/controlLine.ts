import type { InjectedMessageKind } from './index.js';

/**
 * One newline-delimited control record fed into a running agent's input.
 */
export type ControlLine = {
  type: InjectedMessageKind;
  message: string;
};

export type ControlLineRejectionReason =
  | 'blank'
  | 'malformed'
  | 'missing_field'
  | 'invalid_type'
  | 'invalid_message';

export type ControlLineParseResult =
  | {
      ok: true;
      value: ControlLine;
    }
  | {
      ok: false;
      reason: ControlLineRejectionReason;
      message: string;
    };

export const controlLineTypes: readonly InjectedMessageKind[] = ['user', 'system'];

export function isControlLineType(value: unknown): value is InjectedMessageKind {
  return value === 'user' || value === 'system';
}

function reject(reason: ControlLineRejectionReason, message: string): ControlLineParseResult {
  return { ok: false, reason, message };
}

/**
 * Parses a single control line. Never throws: rejection is a normal outcome
 * reported through `ok: false`.
 */
export function parseControlLine(line: string): ControlLineParseResult {
  if (line.trim().length === 0) {
    return reject('blank', 'Control line is blank.');
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return reject('malformed', 'Control line is not valid JSON.');
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return reject('malformed', 'Control line must be a JSON object.');
  }

  if (!('type' in parsed) || !('message' in parsed)) {
    return reject('missing_field', 'Control line requires both "type" and "message" fields.');
  }

  if (!isControlLineType(parsed.type)) {
    return reject('invalid_type', `Control line "type" must be one of: ${controlLineTypes.join(', ')}.`);
  }

  if (typeof parsed.message !== 'string') {
    return reject('invalid_message', 'Control line "message" must be a string.');
  }

  const message = parsed.message.trim();
  if (message.length === 0) {
    return reject('invalid_message', 'Control line "message" must not be empty.');
  }

  return {
    ok: true,
    value: {
      type: parsed.type,
      message,
    },
  };
}

export function encodeControlLine(value: ControlLine): string {
  return `${JSON.stringify({ type: value.type, message: value.message })}\n`;
}

/**
 * Renders a system-kind injection for agents that only accept user turns.
 */
export function formatInjectionNotice(kind: InjectedMessageKind, body: string): string {
  if (kind === 'user') {
    return body;
  }

  return [
    '<system-notice>',
    'The operator sent the following instruction while you were working.',
    'Acknowledge it and adjust your current task accordingly.',
    '',
    body,
    '</system-notice>',
  ].join('\n');
}
