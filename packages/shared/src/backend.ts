import type { ControlLine } from './controlLine.js';
import type { WorkspaceRef } from './index.js';

export type BackendErrorCode = 'BACKEND_START_ERROR' | 'BACKEND_RUNTIME_ERROR';

// Structured events emitted by an execution backend, in generation order.
export type BackendEvent =
  | {
      type: 'init';
      sessionId: string | null;
      data: Record<string, unknown>;
    }
  | {
      type: 'progress';
      step: string;
      payload: Record<string, unknown>;
    }
  | {
      type: 'completion';
      result: string;
      turnCount: number | null;
      costEstimate: number | null;
      data: Record<string, unknown>;
    }
  | {
      type: 'error';
      code: BackendErrorCode;
      message: string;
      detail: Record<string, unknown>;
    }
  | {
      type: 'raw';
      line: string;
    };

// What a backend needs to drive one run inside its workspace.
export type ExecutionRequest = {
  runId: string;
  workflowName: string;
  promptTemplate: string;
  allowedTools: readonly string[];
  message: string;
  maxTurns: number;
  sessionId: string | null;
};

export interface BackendExecution {
  /** Opaque handle to the underlying process or session. */
  readonly handle: string;
  readonly events: AsyncIterable<BackendEvent>;
  /** Enqueues a control message; throws once the execution has finished. */
  sendInput(message: ControlLine): void;
  /** Idempotent; ends the event stream and asks the agent to stop. */
  terminate(): void;
  /**
   * Settles once the underlying process or session is gone, after any forced
   * kill. Never rejects.
   */
  readonly exited: Promise<void>;
}

export interface ExecutionBackend {
  readonly name: string;
  execute(workspace: WorkspaceRef, request: ExecutionRequest): BackendExecution;
}
