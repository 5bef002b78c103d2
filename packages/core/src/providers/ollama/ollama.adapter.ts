import { Ollama } from 'ollama';
import type { AbortableAsyncIterator, ChatResponse as OllamaChatResponse } from 'ollama';
import type {
  StepwiseConfig,
  ProviderAdapter,
  ChatMessage,
  OllamaProviderConfig,
  TokenUsage,
} from '@stepwise/shared';
import { ConfigurationError } from '../../agents/agent.errors.js';
import { isTransientNetworkError, withRetry } from '../retry.js';

export class OllamaAdapter implements ProviderAdapter {
  private readonly client: Ollama;
  private readonly providerConfig: OllamaProviderConfig;
  private readonly maxRetries: number;
  private _lastUsage: TokenUsage | null = null;

  constructor(config: StepwiseConfig) {
    if (config.provider.name !== 'ollama') {
      throw new ConfigurationError('OllamaAdapter requires provider.name === "ollama"');
    }
    this.providerConfig = config.provider;
    this.maxRetries = config.max_retries;
    this.client = new Ollama({
      host: `http://${this.providerConfig.host}:${this.providerConfig.port}`,
    });
  }

  async *complete(messages: ChatMessage[], signal?: AbortSignal): AsyncGenerator<string> {
    if (signal?.aborted) {
      return;
    }

    this._lastUsage = null;

    const stream: AbortableAsyncIterator<OllamaChatResponse> = await withRetry(
      () =>
        this.client.chat({
          model: this.providerConfig.model,
          messages: messages.map((m) => ({ role: m.role, content: m.content })),
          stream: true,
        }),
      { maxRetries: this.maxRetries, isRetryable: isTransientNetworkError, signal },
    );

    // Wire the AbortSignal to the ollama stream's abort mechanism
    const onAbort = () => stream.abort();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      for await (const chunk of stream) {
        if (signal?.aborted) {
          return;
        }
        if (chunk.message?.content) {
          yield chunk.message.content;
        }
        if (chunk.done && chunk.prompt_eval_count != null && chunk.eval_count != null) {
          const promptTokens = chunk.prompt_eval_count;
          const completionTokens = chunk.eval_count;
          this._lastUsage = {
            promptTokens,
            completionTokens,
            totalTokens: promptTokens + completionTokens,
          };
        }
      }
    } catch (err: unknown) {
      // stream.abort() throws an AbortError when we triggered it
      if (signal?.aborted) {
        return;
      }
      throw err;
    } finally {
      signal?.removeEventListener('abort', onAbort);
    }
  }

  getLastUsage(): TokenUsage | null {
    return this._lastUsage;
  }

  /** True when the server answers a model listing. */
  async isAvailable(): Promise<boolean> {
    try {
      await this.client.list();
      return true;
    } catch {
      return false;
    }
  }
}
