import { query, type Options as ClaudeQueryOptions, type SDKUserMessage } from '@anthropic-ai/claude-agent-sdk';
import {
  AsyncChannel,
  formatInjectionNotice,
  toErrorMessage,
  WorkflowEngineError,
  type BackendErrorCode,
  type BackendEvent,
  type BackendExecution,
  type ControlLine,
  type ExecutionBackend,
  type ExecutionRequest,
  type WorkspaceRef,
} from '@runwright/shared';
import { isAgentMessage, mapAgentMessage } from './agentMessages.js';
import {
  ClaudeBootstrapError,
  createClaudeQueryEnvironment,
  initializeClaudeSdkBootstrap,
  type ClaudeSdkBootstrap,
} from './claudeSdkBootstrap.js';

export type SdkQueryParams = {
  prompt: AsyncIterable<SDKUserMessage>;
  options: ClaudeQueryOptions;
};

/** The slice of the SDK's `query()` the backend drives. */
export type SdkQueryFn = (params: SdkQueryParams) => AsyncIterable<unknown>;

export type SdkExecutionBackendOptions = {
  query?: SdkQueryFn;
  bootstrap?: () => ClaudeSdkBootstrap;
};

function createUserMessage(content: string, sessionId: string | null): SDKUserMessage {
  return {
    type: 'user',
    message: { role: 'user', content },
    parent_tool_use_id: null,
    session_id: sessionId ?? '',
  };
}

export function createSdkQueryOptions(
  bootstrap: ClaudeSdkBootstrap,
  workspace: WorkspaceRef,
  request: ExecutionRequest,
  abortController: AbortController,
): ClaudeQueryOptions {
  const allowedTools = [...request.allowedTools];
  const options: ClaudeQueryOptions = {
    cwd: workspace.path,
    systemPrompt: { type: 'preset', preset: 'claude_code', append: request.promptTemplate },
    allowedTools,
    maxTurns: request.maxTurns,
    permissionMode: 'default',
    // Tools outside the workflow's allow-list are refused instead of prompting.
    canUseTool: async toolName => ({
      behavior: 'deny',
      message: `Tool "${toolName}" is not allowed by workflow "${request.workflowName}".`,
    }),
    env: createClaudeQueryEnvironment(bootstrap),
    abortController,
  };

  if (bootstrap.model) {
    options.model = bootstrap.model;
  }

  if (request.sessionId) {
    options.resume = request.sessionId;
  }

  return options;
}

class SdkExecution implements BackendExecution {
  readonly handle: string;
  readonly events: AsyncIterable<BackendEvent>;
  readonly exited: Promise<void>;
  private readonly runId: string;
  private readonly input = new AsyncChannel<SDKUserMessage>();
  private readonly output = new AsyncChannel<BackendEvent>();
  private readonly abortController = new AbortController();
  private sessionId: string | null;
  private initialized = false;
  private finished = false;

  constructor(
    request: ExecutionRequest,
    start: (input: AsyncIterable<SDKUserMessage>, abortController: AbortController) => AsyncIterable<unknown>,
  ) {
    this.runId = request.runId;
    this.handle = `sdk:${request.runId}`;
    this.events = this.output;
    this.sessionId = request.sessionId;
    this.input.push(createUserMessage(request.message, request.sessionId));
    this.exited = this.pump(() => start(this.input, this.abortController));
  }

  sendInput(line: ControlLine): void {
    if (this.finished) {
      throw new WorkflowEngineError(
        'RUN_NOT_RUNNING',
        `Agent session for run id=${this.runId} has finished; input is no longer accepted.`,
        { runId: this.runId },
      );
    }

    this.input.push(createUserMessage(formatInjectionNotice(line.type, line.message), this.sessionId));
  }

  terminate(): void {
    if (this.finished) {
      return;
    }

    this.finish();
    this.abortController.abort();
  }

  private emitError(code: BackendErrorCode, message: string, detail: Record<string, unknown> = {}): void {
    this.output.push({ type: 'error', code, message, detail });
  }

  private async pump(start: () => AsyncIterable<unknown>): Promise<void> {
    try {
      for await (const message of start()) {
        if (this.finished) {
          return;
        }

        if (!isAgentMessage(message)) {
          this.output.push({ type: 'raw', line: JSON.stringify(message) });
          continue;
        }

        for (const event of mapAgentMessage(message)) {
          if (event.type === 'init') {
            this.initialized = true;
            this.sessionId = event.sessionId ?? this.sessionId;
          }

          this.output.push(event);
          if (event.type === 'completion' || event.type === 'error') {
            return;
          }
        }
      }

      if (!this.finished) {
        this.emitError(
          this.initialized ? 'BACKEND_RUNTIME_ERROR' : 'BACKEND_START_ERROR',
          'Agent session ended without reporting a result.',
        );
      }
    } catch (error) {
      if (!this.finished) {
        const detail = error instanceof ClaudeBootstrapError ? { bootstrapCode: error.code, ...error.details } : {};
        this.emitError(
          this.initialized ? 'BACKEND_RUNTIME_ERROR' : 'BACKEND_START_ERROR',
          toErrorMessage(error),
          detail,
        );
      }
    } finally {
      this.finish();
    }
  }

  private finish(): void {
    this.finished = true;
    this.input.close();
    this.output.close();
  }
}

/**
 * Runs the agent in process through the SDK's streaming-input mode, so injected
 * messages reach the live session as additional user turns.
 */
export class SdkExecutionBackend implements ExecutionBackend {
  readonly name = 'sdk' as const;
  readonly #query: SdkQueryFn;
  readonly #bootstrap: () => ClaudeSdkBootstrap;

  constructor(options: SdkExecutionBackendOptions = {}) {
    this.#query = options.query ?? query;
    this.#bootstrap = options.bootstrap ?? initializeClaudeSdkBootstrap;
  }

  execute(workspace: WorkspaceRef, request: ExecutionRequest): BackendExecution {
    return new SdkExecution(request, (input, abortController) => {
      const bootstrap = this.#bootstrap();
      return this.#query({
        prompt: input,
        options: createSdkQueryOptions(bootstrap, workspace, request, abortController),
      });
    });
  }
}
