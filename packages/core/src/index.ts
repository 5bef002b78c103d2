// @stepwise/core entry point
export * from './config/config.defaults.js';
export * from './config/config.loader.js';
export { createLogger, silentLogger } from './logging/logger.js';
export type { Logger } from './logging/logger.js';

// Engine
export { AgentEngine } from './agents/agent.engine.js';
export type { AgentEngineOptions, DebugCallback, EngineConfig } from './agents/agent.engine.js';
export { createEngine } from './agents/engine.factory.js';
export type { CreateEngineOptions } from './agents/engine.factory.js';
export { LlmOracle } from './agents/llm.oracle.js';
export type { Oracle } from './agents/llm.oracle.js';
export { parseAction, extractJson } from './agents/agent.parser.js';
export { buildSystemPrompt, buildTaskPrompt, buildToolsDescription } from './agents/agent.prompts.js';
export * from './agents/agent.errors.js';

// State and persistence
export { TaskState } from './state/task.state.js';
export type { StateStorage, StorageOptions } from './storage/storage.types.js';
export { NoStateError, CheckpointNotFoundError, CheckpointError } from './storage/storage.types.js';
export { JsonStateStorage } from './storage/json.storage.js';
export { SqliteStateStorage } from './storage/sqlite.storage.js';
export { createStorage } from './storage/storage.factory.js';

// Control
export { RateLimiter } from './ratelimit/rate.limiter.js';
export type { RateLimiterOptions } from './ratelimit/rate.limiter.js';
export { ApprovalGate } from './approval/approval.gate.js';
export type { ApprovalCallback, ApprovalDecision, ApprovalPolicy } from './approval/approval.gate.js';
export { DebugSession } from './debug/debug.session.js';
export type { Breakpoint, DebugSessionOptions } from './debug/debug.session.js';
export {
  ConditionSyntaxError,
  parseCondition,
  evaluateCondition,
  matchesCondition,
} from './debug/breakpoint.condition.js';

// Providers
export { OllamaAdapter } from './providers/ollama/ollama.adapter.js';
export { OpenAIAdapter } from './providers/openai/openai.adapter.js';
export { createProvider } from './providers/provider.factory.js';

// Tools
export { ToolRegistry, DEFAULT_TOOLS } from './tools/tool.registry.js';
export type {
  ToolDefinition,
  ToolCall,
  ToolResult,
  ToolContext,
  ToolImpl,
  ToolParameter,
} from './tools/tool.types.js';
export { readFileTool } from './tools/tools/read_file.js';
export { writeFileTool } from './tools/tools/write_file.js';
export { listFilesTool } from './tools/tools/list_files.js';
export { searchFilesTool } from './tools/tools/search_files.js';
export { applyDiffTool } from './tools/tools/apply_diff.js';
export { runCommandTool } from './tools/tools/run_command.js';
