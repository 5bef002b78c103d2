import type { MessageRole } from './task.types.js';

export interface ChatMessage {
  role: MessageRole;
  content: string;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface ProviderAdapter {
  complete(messages: ChatMessage[], signal?: AbortSignal): AsyncGenerator<string>;
  isAvailable(): Promise<boolean>;
  /** Returns token usage from the most recent complete() call, or null if unavailable. */
  getLastUsage?(): TokenUsage | null;
}
