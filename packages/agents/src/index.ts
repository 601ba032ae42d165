export { isAgentMessage, mapAgentMessage } from './backends/agentMessages.js';
export {
  ClaudeBootstrapError,
  createClaudeQueryEnvironment,
  initializeClaudeSdkBootstrap,
  resetClaudeSdkBootstrapCache,
} from './backends/claudeSdkBootstrap.js';
export type {
  ClaudeBootstrapErrorCode,
  ClaudeBootstrapOverrides,
  ClaudeSdkBootstrap,
} from './backends/claudeSdkBootstrap.js';
export { createSdkQueryOptions, SdkExecutionBackend } from './backends/sdk.js';
export type { SdkExecutionBackendOptions, SdkQueryFn, SdkQueryParams } from './backends/sdk.js';
export {
  DEFAULT_TERMINATE_GRACE_MS,
  mapNativeEvent,
  parseAgentOutputLine,
  SubprocessExecutionBackend,
} from './backends/subprocess.js';
export type {
  AgentProcess,
  KillProcessGroup,
  SpawnAgentProcess,
  SubprocessExecutionBackendOptions,
} from './backends/subprocess.js';
export {
  ExecutionBackendConfigError,
  executionBackendStrategies,
  isExecutionBackendStrategy,
  selectExecutionBackend,
  UnknownExecutionBackendError,
} from './selector.js';
export type {
  ExecutionBackendConfig,
  ExecutionBackendOverrides,
  ExecutionBackendStrategy,
} from './selector.js';
