import type { StepwiseConfig } from '@stepwise/shared';

export const DEFAULT_CONFIG: StepwiseConfig = {
  provider: {
    name: 'ollama',
    model: 'llama3.1:8b',
    host: 'localhost',
    port: 11434,
  },
  working_directory: '.',
  rate_limit: 60,
  max_retries: 2,
  max_iterations: 50,
  auto_approve_tools: false,
  max_consecutive_auto_approvals: 3,
  approval_timeout_ms: 0,
  state_storage: {
    type: 'json',
    path: null,
    auto_checkpoint: true,
    max_checkpoints: 10,
  },
  debug: {
    enabled: false,
    step_by_step: false,
    breakpoints: {},
  },
  logging: {
    level: 'info',
    file_path: null,
  },
};
