import type { StepwiseConfig, ProviderAdapter } from '@stepwise/shared';
import { OllamaAdapter } from './ollama/ollama.adapter.js';
import { OpenAIAdapter } from './openai/openai.adapter.js';

export function createProvider(
  config: StepwiseConfig,
  env: NodeJS.ProcessEnv = process.env,
): ProviderAdapter {
  switch (config.provider.name) {
    case 'ollama':
      return new OllamaAdapter(config);
    case 'openai':
      return new OpenAIAdapter(config, env);
  }
}
