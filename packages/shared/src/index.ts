// @stepwise/shared — barrel export
export type { EngineStatus, EngineState, AgentAction } from './agent.types.js';
export type {
  MessageRole,
  TaskMessage,
  ToolResult,
  ToolExecutionRecord,
  UserInput,
  RelatedTask,
  TaskSearchHit,
  TaskHistoryEntry,
  TaskStateSnapshot,
} from './task.types.js';
export type { Checkpoint } from './checkpoint.types.js';
export type { BreakpointKind, BreakpointConfig, DebugInfo } from './debug.types.js';
export type {
  OllamaProviderConfig,
  OpenAIProviderConfig,
  ProviderConfig,
  StorageType,
  StateStorageConfig,
  DebugConfig,
  LogLevel,
  LoggingConfig,
  StepwiseConfig,
} from './config.types.js';
export type { ChatMessage, TokenUsage, ProviderAdapter } from './provider.types.js';
