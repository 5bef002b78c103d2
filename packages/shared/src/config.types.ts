import type { BreakpointConfig } from './debug.types.js';

export interface OllamaProviderConfig {
  name: 'ollama';
  model: string;
  host: string;
  port: number;
}

export interface OpenAIProviderConfig {
  name: 'openai';
  model: string;
  /** Falls back to OPENAI_API_KEY when omitted. */
  api_key?: string;
  /** Any OpenAI-compatible endpoint. */
  base_url?: string;
}

export type ProviderConfig = OllamaProviderConfig | OpenAIProviderConfig;

export type StorageType = 'json' | 'sqlite';

export interface StateStorageConfig {
  type: StorageType;
  /** Directory for json, database file for sqlite. Null means under working_directory/.stepwise. */
  path: string | null;
  auto_checkpoint: boolean;
  max_checkpoints: number;
}

export interface DebugConfig {
  enabled: boolean;
  step_by_step: boolean;
  breakpoints: Record<string, BreakpointConfig>;
}

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface LoggingConfig {
  level: LogLevel;
  file_path: string | null;
}

export interface StepwiseConfig {
  provider: ProviderConfig;
  working_directory: string;
  rate_limit: number;
  max_retries: number;
  max_iterations: number;
  auto_approve_tools: boolean;
  max_consecutive_auto_approvals: number;
  /** 0 waits forever. */
  approval_timeout_ms: number;
  state_storage: StateStorageConfig;
  debug: DebugConfig;
  logging: LoggingConfig;
}
