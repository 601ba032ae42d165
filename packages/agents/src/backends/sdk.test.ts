import type { SDKUserMessage } from '@anthropic-ai/claude-agent-sdk';
import { formatInjectionNotice, type BackendEvent, type ExecutionRequest } from '@runwright/shared';
import { describe, expect, it, vi } from 'vitest';
import { ClaudeBootstrapError, type ClaudeSdkBootstrap } from './claudeSdkBootstrap.js';
import { SdkExecutionBackend, type SdkQueryFn, type SdkQueryParams } from './sdk.js';

const workspace = { path: '/tmp/runwright-worktrees/runwright-fix-tests-run-1', branch: 'runwright/fix-tests/run-1' };

function createRequest(overrides: Partial<ExecutionRequest> = {}): ExecutionRequest {
  return {
    runId: 'run-1',
    workflowName: 'fix_tests',
    promptTemplate: 'Make the test suite pass.',
    allowedTools: ['Read', 'Edit', 'Bash'],
    message: 'The date parser test is flaky.',
    maxTurns: 12,
    sessionId: null,
    ...overrides,
  };
}

function createBootstrap(): ClaudeSdkBootstrap {
  return {
    model: 'claude-sonnet-4-5',
    apiKey: 'test-secret',
    apiKeySource: 'CLAUDE_API_KEY',
  };
}

const initMessage = { type: 'system', subtype: 'init', session_id: 'session-1' };
const successMessage = { type: 'result', subtype: 'success', result: 'Fixed.', num_turns: 3, total_cost_usd: 0.1 };

async function readPrompt(
  prompt: AsyncIterator<SDKUserMessage>,
  received: SDKUserMessage[],
): Promise<SDKUserMessage | undefined> {
  const next = await prompt.next();
  if (next.done) {
    return undefined;
  }

  received.push(next.value);
  return next.value;
}

async function collect(events: AsyncIterable<BackendEvent>): Promise<BackendEvent[]> {
  const collected: BackendEvent[] = [];
  for await (const event of events) {
    collected.push(event);
  }
  return collected;
}

describe('SdkExecutionBackend', () => {
  it('streams mapped events and configures the agent session for the workspace', async () => {
    const received: SDKUserMessage[] = [];
    const calls: SdkQueryParams[] = [];
    const query = vi.fn<SdkQueryFn>(async function* (params) {
      calls.push(params);
      await readPrompt(params.prompt[Symbol.asyncIterator](), received);
      yield initMessage;
      yield { type: 'assistant', message: { content: [{ type: 'text', text: 'Looking at the parser.' }] } };
      yield successMessage;
    });
    const backend = new SdkExecutionBackend({ query, bootstrap: createBootstrap });

    const execution = backend.execute(workspace, createRequest());
    const events = await collect(execution.events);

    expect(execution.handle).toBe('sdk:run-1');
    expect(events.map(event => event.type)).toEqual(['init', 'progress', 'completion']);
    expect(events[2]).toEqual({
      type: 'completion',
      result: 'Fixed.',
      turnCount: 3,
      costEstimate: 0.1,
      data: { sessionId: null, durationMs: null, usage: null },
    });
    expect(received).toEqual([
      {
        type: 'user',
        message: { role: 'user', content: 'The date parser test is flaky.' },
        parent_tool_use_id: null,
        session_id: '',
      },
    ]);

    const options = calls[0]?.options;
    expect(options).toMatchObject({
      cwd: workspace.path,
      systemPrompt: { type: 'preset', preset: 'claude_code', append: 'Make the test suite pass.' },
      allowedTools: ['Read', 'Edit', 'Bash'],
      maxTurns: 12,
      permissionMode: 'default',
      model: 'claude-sonnet-4-5',
    });
    expect(options?.resume).toBeUndefined();
    expect(options?.env?.CLAUDE_API_KEY).toBe('test-secret');
  });

  it('delivers injected messages to the live session as user turns', async () => {
    const received: SDKUserMessage[] = [];
    const query = vi.fn<SdkQueryFn>(async function* (params) {
      const prompt = params.prompt[Symbol.asyncIterator]();
      await readPrompt(prompt, received);
      yield initMessage;
      await readPrompt(prompt, received);
      yield successMessage;
    });
    const backend = new SdkExecutionBackend({ query, bootstrap: createBootstrap });
    const execution = backend.execute(workspace, createRequest());

    const events: BackendEvent[] = [];
    for await (const event of execution.events) {
      events.push(event);
      if (event.type === 'init') {
        execution.sendInput({ type: 'system', message: 'Wrap up and summarize.' });
      }
    }

    expect(events.map(event => event.type)).toEqual(['init', 'completion']);
    expect(received[1]).toEqual({
      type: 'user',
      message: { role: 'user', content: formatInjectionNotice('system', 'Wrap up and summarize.') },
      parent_tool_use_id: null,
      session_id: 'session-1',
    });
  });

  it('rejects input once the session has finished', async () => {
    const query = vi.fn<SdkQueryFn>(async function* () {
      yield successMessage;
    });
    const execution = new SdkExecutionBackend({ query, bootstrap: createBootstrap }).execute(workspace, createRequest());
    await collect(execution.events);

    expect(() => execution.sendInput({ type: 'user', message: 'too late' })).toThrowError(
      'Agent session for run id=run-1 has finished; input is no longer accepted.',
    );
  });

  it('resumes an existing session when one is supplied', async () => {
    const received: SDKUserMessage[] = [];
    const calls: SdkQueryParams[] = [];
    const query = vi.fn<SdkQueryFn>(async function* (params) {
      calls.push(params);
      await readPrompt(params.prompt[Symbol.asyncIterator](), received);
      yield successMessage;
    });

    const execution = new SdkExecutionBackend({ query, bootstrap: createBootstrap }).execute(
      workspace,
      createRequest({ sessionId: 'session-0' }),
    );
    await collect(execution.events);

    expect(calls[0]?.options.resume).toBe('session-0');
    expect(received[0]?.session_id).toBe('session-0');
  });

  it('reports a bootstrap failure as a single start error', async () => {
    const query = vi.fn<SdkQueryFn>(async function* () {
      yield successMessage;
    });
    const backend = new SdkExecutionBackend({
      query,
      bootstrap: () => {
        throw new ClaudeBootstrapError('CLAUDE_BOOTSTRAP_MISSING_AUTH', 'No API key configured.', {
          checkedEnvVars: ['CLAUDE_API_KEY'],
        });
      },
    });

    const events = await collect(backend.execute(workspace, createRequest()).events);

    expect(query).not.toHaveBeenCalled();
    expect(events).toEqual([
      {
        type: 'error',
        code: 'BACKEND_START_ERROR',
        message: 'No API key configured.',
        detail: { bootstrapCode: 'CLAUDE_BOOTSTRAP_MISSING_AUTH', checkedEnvVars: ['CLAUDE_API_KEY'] },
      },
    ]);
  });

  it('classifies stream failures by whether the session initialized', async () => {
    const failingBeforeInit = vi.fn<SdkQueryFn>(async function* () {
      yield* [];
      throw new Error('spawn claude ENOENT');
    });
    const failingAfterInit = vi.fn<SdkQueryFn>(async function* () {
      yield initMessage;
      throw new Error('connection reset');
    });

    const before = await collect(
      new SdkExecutionBackend({ query: failingBeforeInit, bootstrap: createBootstrap }).execute(workspace, createRequest()).events,
    );
    const after = await collect(
      new SdkExecutionBackend({ query: failingAfterInit, bootstrap: createBootstrap }).execute(workspace, createRequest()).events,
    );

    expect(before).toEqual([
      { type: 'error', code: 'BACKEND_START_ERROR', message: 'spawn claude ENOENT', detail: {} },
    ]);
    expect(after.at(-1)).toEqual({
      type: 'error',
      code: 'BACKEND_RUNTIME_ERROR',
      message: 'connection reset',
      detail: {},
    });
  });

  it('reports a session that ends without a result', async () => {
    const query = vi.fn<SdkQueryFn>(async function* () {
      yield initMessage;
    });

    const events = await collect(
      new SdkExecutionBackend({ query, bootstrap: createBootstrap }).execute(workspace, createRequest()).events,
    );

    expect(events.at(-1)).toEqual({
      type: 'error',
      code: 'BACKEND_RUNTIME_ERROR',
      message: 'Agent session ended without reporting a result.',
      detail: {},
    });
  });

  it('aborts the session and ends the stream on terminate', async () => {
    let signal: AbortSignal | undefined;
    const query = vi.fn<SdkQueryFn>(async function* (params) {
      const abortSignal = params.options.abortController?.signal;
      signal = abortSignal;
      yield initMessage;
      await new Promise(resolve => abortSignal?.addEventListener('abort', resolve));
      throw new Error('Operation aborted');
    });
    const execution = new SdkExecutionBackend({ query, bootstrap: createBootstrap }).execute(workspace, createRequest());

    const events: BackendEvent[] = [];
    for await (const event of execution.events) {
      events.push(event);
      execution.terminate();
      execution.terminate();
    }

    expect(events.map(event => event.type)).toEqual(['init']);
    expect(signal?.aborted).toBe(true);
    await expect(execution.exited).resolves.toBeUndefined();
    expect(() => execution.sendInput({ type: 'user', message: 'hello' })).toThrowError(/has finished/);
  });
});
