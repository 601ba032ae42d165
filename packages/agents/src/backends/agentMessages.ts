import {
  toNonNegativeNumber,
  toRecord,
  toTrimmedString,
  type BackendEvent,
} from '@runwright/shared';

const agentMessageTypes = new Set([
  'system',
  'assistant',
  'user',
  'result',
  'tool_progress',
  'tool_use_summary',
  'stream_event',
  'auth_status',
]);

/**
 * True for records shaped like agent stream-json messages (the same messages
 * the agent SDK yields in process).
 */
export function isAgentMessage(value: unknown): value is Record<string, unknown> & { type: string } {
  const record = toRecord(value);
  return record !== undefined && typeof record.type === 'string' && agentMessageTypes.has(record.type);
}

function toContentBlocks(message: Record<string, unknown>): Record<string, unknown>[] {
  const body = toRecord(message.message);
  const content = body?.content;
  if (!Array.isArray(content)) {
    return [];
  }

  const blocks: Record<string, unknown>[] = [];
  for (const block of content) {
    const record = toRecord(block);
    if (record) {
      blocks.push(record);
    }
  }

  return blocks;
}

function toStringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter((entry): entry is string => toTrimmedString(entry) !== undefined);
}

function summarizeToolResultContent(content: unknown): string | null {
  if (typeof content === 'string') {
    return content;
  }

  if (!Array.isArray(content)) {
    return null;
  }

  const texts: string[] = [];
  for (const entry of content) {
    const text = toTrimmedString(toRecord(entry)?.text);
    if (text) {
      texts.push(text);
    }
  }

  return texts.length > 0 ? texts.join('\n') : null;
}

function mapSystemMessage(message: Record<string, unknown>): BackendEvent[] {
  const subtype = toTrimmedString(message.subtype) ?? 'unknown';
  if (subtype !== 'init') {
    return [{ type: 'progress', step: 'system', payload: { subtype } }];
  }

  return [
    {
      type: 'init',
      sessionId: toTrimmedString(message.session_id) ?? null,
      data: {
        model: toTrimmedString(message.model) ?? null,
        cwd: toTrimmedString(message.cwd) ?? null,
        tools: toStringList(message.tools),
        permissionMode: toTrimmedString(message.permissionMode) ?? null,
      },
    },
  ];
}

function mapAssistantMessage(message: Record<string, unknown>): BackendEvent[] {
  const events: BackendEvent[] = [];
  for (const block of toContentBlocks(message)) {
    switch (block.type) {
      case 'text': {
        const text = toTrimmedString(block.text);
        if (text) {
          events.push({ type: 'progress', step: 'assistant_text', payload: { text } });
        }
        break;
      }
      case 'tool_use':
        events.push({
          type: 'progress',
          step: 'tool_use',
          payload: {
            toolName: toTrimmedString(block.name) ?? 'unknown',
            toolUseId: toTrimmedString(block.id) ?? null,
            input: toRecord(block.input) ?? {},
          },
        });
        break;
      case 'thinking':
      case 'redacted_thinking': {
        const text = toTrimmedString(block.thinking) ?? toTrimmedString(block.text);
        if (text) {
          events.push({ type: 'progress', step: 'thinking', payload: { text } });
        }
        break;
      }
      default:
        break;
    }
  }

  return events;
}

function mapUserMessage(message: Record<string, unknown>): BackendEvent[] {
  const events: BackendEvent[] = [];
  for (const block of toContentBlocks(message)) {
    if (block.type !== 'tool_result') {
      continue;
    }

    events.push({
      type: 'progress',
      step: 'tool_result',
      payload: {
        toolUseId: toTrimmedString(block.tool_use_id) ?? null,
        isError: block.is_error === true,
        content: summarizeToolResultContent(block.content),
      },
    });
  }

  return events;
}

function mapResultMessage(message: Record<string, unknown>): BackendEvent[] {
  const subtype = toTrimmedString(message.subtype) ?? 'unknown';
  const turnCount = toNonNegativeNumber(message.num_turns) ?? null;
  const costEstimate = toNonNegativeNumber(message.total_cost_usd) ?? null;

  if (subtype === 'success' && message.is_error !== true) {
    return [
      {
        type: 'completion',
        result: typeof message.result === 'string' ? message.result : '',
        turnCount,
        costEstimate,
        data: {
          sessionId: toTrimmedString(message.session_id) ?? null,
          durationMs: toNonNegativeNumber(message.duration_ms) ?? null,
          usage: toRecord(message.usage) ?? null,
        },
      },
    ];
  }

  const errors = toStringList(message.errors);
  return [
    {
      type: 'error',
      code: 'BACKEND_RUNTIME_ERROR',
      message: errors[0] ?? `Agent finished with result subtype "${subtype}".`,
      detail: { subtype, errors, turnCount, costEstimate },
    },
  ];
}

/**
 * Maps one agent stream-json message to backend events. Unrecognized but
 * well-formed messages surface as progress so nothing the agent reports is lost.
 */
export function mapAgentMessage(message: Record<string, unknown> & { type: string }): BackendEvent[] {
  switch (message.type) {
    case 'system':
      return mapSystemMessage(message);
    case 'assistant':
      return mapAssistantMessage(message);
    case 'user':
      return mapUserMessage(message);
    case 'result':
      return mapResultMessage(message);
    case 'tool_progress':
      return [
        {
          type: 'progress',
          step: 'tool_progress',
          payload: {
            toolName: toTrimmedString(message.tool_name) ?? 'unknown',
            toolUseId: toTrimmedString(message.tool_use_id) ?? null,
            elapsedTimeSeconds: toNonNegativeNumber(message.elapsed_time_seconds) ?? null,
          },
        },
      ];
    case 'tool_use_summary':
      return [
        {
          type: 'progress',
          step: 'tool_summary',
          payload: { summary: typeof message.summary === 'string' ? message.summary : '' },
        },
      ];
    case 'stream_event':
      return [];
    default:
      return [{ type: 'progress', step: message.type, payload: { message } }];
  }
}
