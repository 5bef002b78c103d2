import type { Logger } from 'pino';
import type { ProviderAdapter, StepwiseConfig } from '@stepwise/shared';
import type { ApprovalCallback } from '../approval/approval.gate.js';
import { resolveLogPath, resolveStoragePath } from '../config/config.loader.js';
import { createLogger } from '../logging/logger.js';
import { createProvider } from '../providers/provider.factory.js';
import { RateLimiter } from '../ratelimit/rate.limiter.js';
import { createStorage } from '../storage/storage.factory.js';
import type { StateStorage } from '../storage/storage.types.js';
import { DEFAULT_TOOLS, ToolRegistry } from '../tools/tool.registry.js';
import type { ToolImpl } from '../tools/tool.types.js';
import { AgentEngine } from './agent.engine.js';
import { LlmOracle, type Oracle } from './llm.oracle.js';

export interface CreateEngineOptions {
  approval: ApprovalCallback;
  /** Takes precedence over `provider`. */
  oracle?: Oracle;
  provider?: ProviderAdapter;
  logger?: Logger;
  /** Pass one instance to several engines to share a request budget. */
  rateLimiter?: RateLimiter;
  storage?: StateStorage;
  tools?: readonly ToolImpl[];
  /** Aborting it cancels the model call in flight and fails the running task. */
  signal?: AbortSignal;
}

/** Wire an engine and its collaborators from a loaded config. */
export function createEngine(config: StepwiseConfig, options: CreateEngineOptions): AgentEngine {
  const logger =
    options.logger ??
    createLogger({ level: config.logging.level, file_path: resolveLogPath(config) });
  const tools = new ToolRegistry(options.tools ?? DEFAULT_TOOLS, logger);
  const oracle =
    options.oracle ??
    new LlmOracle(options.provider ?? createProvider(config), tools, logger, options.signal);
  const storage =
    options.storage ?? createStorage(config.state_storage, resolveStoragePath(config));
  const rateLimiter = options.rateLimiter ?? new RateLimiter({ rpm: config.rate_limit, logger });

  logger.debug(
    { provider: config.provider.name, model: config.provider.model, storage: config.state_storage.type },
    'engine created',
  );

  return new AgentEngine({
    config,
    oracle,
    storage,
    approval: options.approval,
    rateLimiter,
    tools,
    logger,
  });
}
