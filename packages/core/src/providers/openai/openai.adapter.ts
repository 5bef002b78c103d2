import OpenAI from 'openai';
import type {
  StepwiseConfig,
  ProviderAdapter,
  ChatMessage,
  OpenAIProviderConfig,
  TokenUsage,
} from '@stepwise/shared';
import { ConfigurationError } from '../../agents/agent.errors.js';
import { isTransientNetworkError, withRetry } from '../retry.js';

const AVAILABILITY_TIMEOUT_MS = 5000;

/** Return true for transient errors worth retrying. */
export function isRetryableOpenAIError(err: unknown): boolean {
  if (err instanceof OpenAI.APIConnectionError) {
    return true;
  }
  if (err instanceof OpenAI.APIError) {
    // Rate limit or server errors are retryable; auth/bad-request errors are not
    return err.status !== undefined && (err.status === 429 || err.status >= 500);
  }
  return isTransientNetworkError(err);
}

/** Any OpenAI-compatible chat completions endpoint. */
export class OpenAIAdapter implements ProviderAdapter {
  private readonly client: OpenAI;
  private readonly providerConfig: OpenAIProviderConfig;
  private readonly maxRetries: number;
  private _lastUsage: TokenUsage | null = null;

  constructor(config: StepwiseConfig, env: NodeJS.ProcessEnv = process.env) {
    if (config.provider.name !== 'openai') {
      throw new ConfigurationError('OpenAIAdapter requires provider.name === "openai"');
    }
    this.providerConfig = config.provider;

    const apiKey = this.providerConfig.api_key ?? env.OPENAI_API_KEY;
    if (!apiKey) {
      throw new ConfigurationError(
        'provider.api_key or the OPENAI_API_KEY environment variable is required for the openai provider',
      );
    }

    this.maxRetries = config.max_retries;
    this.client = new OpenAI({
      apiKey,
      baseURL: this.providerConfig.base_url,
      // Retries are ours, with our own backoff
      maxRetries: 0,
    });
  }

  async *complete(messages: ChatMessage[], signal?: AbortSignal): AsyncGenerator<string> {
    if (signal?.aborted) {
      return;
    }

    this._lastUsage = null;

    const stream = await withRetry(
      () =>
        this.client.chat.completions.create(
          {
            model: this.providerConfig.model,
            messages: messages.map((m) => ({ role: m.role, content: m.content })),
            temperature: 0,
            stream: true,
            stream_options: { include_usage: true },
          },
          { signal },
        ),
      { maxRetries: this.maxRetries, isRetryable: isRetryableOpenAIError, signal },
    );

    try {
      for await (const chunk of stream) {
        if (signal?.aborted) {
          return;
        }
        // Populated on the final chunk when stream_options.include_usage is set
        if (chunk.usage) {
          this._lastUsage = {
            promptTokens: chunk.usage.prompt_tokens,
            completionTokens: chunk.usage.completion_tokens,
            totalTokens: chunk.usage.total_tokens,
          };
        }
        const content = chunk.choices[0]?.delta?.content;
        if (content) {
          yield content;
        }
      }
    } catch (err: unknown) {
      if (signal?.aborted) {
        return;
      }
      throw err;
    }
  }

  getLastUsage(): TokenUsage | null {
    return this._lastUsage;
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.client.models.list({ timeout: AVAILABILITY_TIMEOUT_MS });
      return true;
    } catch {
      return false;
    }
  }
}
