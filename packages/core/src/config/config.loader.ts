import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import yaml from 'js-yaml';
import type {
  BreakpointConfig,
  LogLevel,
  OpenAIProviderConfig,
  ProviderConfig,
  StepwiseConfig,
} from '@stepwise/shared';
import { DEFAULT_CONFIG } from './config.defaults.js';
import { ConfigurationError } from '../agents/agent.errors.js';

const STEPWISE_DIR = path.join(os.homedir(), '.stepwise');
const CONFIG_PATH = path.join(STEPWISE_DIR, 'config.yaml');

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
const BREAKPOINT_KINDS = ['tool', 'state', 'llm'] as const;

type Raw = Record<string, unknown>;

function isRecord(value: unknown): value is Raw {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function deepMerge(base: Raw, override: Raw): Raw {
  const result: Raw = { ...base };
  for (const [key, overrideVal] of Object.entries(override)) {
    const baseVal = base[key];
    if (isRecord(overrideVal) && isRecord(baseVal)) {
      result[key] = deepMerge(baseVal, overrideVal);
    } else if (overrideVal !== undefined) {
      result[key] = overrideVal;
    }
  }
  return result;
}

/** Replace `${NAME}` in every string value with the environment variable of that name. */
function substituteEnv(value: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof value === 'string') {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (_match, name: string) => {
      const resolved = env[name];
      if (resolved === undefined) {
        throw new ConfigurationError(
          `Config validation failed: environment variable ${name} is not set`,
        );
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item) => substituteEnv(item, env));
  }
  if (isRecord(value)) {
    const out: Raw = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = substituteEnv(item, env);
    }
    return out;
  }
  return value;
}

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function fail(message: string): never {
  throw new ConfigurationError(`Config validation failed: ${message}`);
}

function section(raw: Raw, key: string): Raw {
  const value = raw[key];
  if (!isRecord(value)) fail(`${key} must be a mapping`);
  return value;
}

function str(raw: Raw, key: string, label: string): string {
  const value = raw[key];
  if (typeof value !== 'string' || value.length === 0) {
    fail(`${label} must be a non-empty string`);
  }
  return value;
}

function optStr(raw: Raw, key: string, label: string): string | undefined {
  const value = raw[key];
  if (value === undefined || value === null) return undefined;
  return str(raw, key, label);
}

function nullableStr(raw: Raw, key: string, label: string): string | null {
  return optStr(raw, key, label) ?? null;
}

function int(raw: Raw, key: string, label: string, min: number): number {
  const value = raw[key];
  if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
    fail(`${label} must be an integer >= ${min}`);
  }
  return value;
}

function bool(raw: Raw, key: string, label: string): boolean {
  const value = raw[key];
  if (typeof value !== 'boolean') fail(`${label} must be true or false`);
  return value;
}

function parseProvider(raw: Raw): ProviderConfig {
  const name = str(raw, 'name', 'provider.name');
  const model = str(raw, 'model', 'provider.model');

  switch (name) {
    case 'ollama': {
      const host = str(raw, 'host', 'provider.host');
      const port = raw['port'];
      if (typeof port !== 'number' || port <= 0 || port > 65535) {
        fail('provider.port must be a valid port number (1-65535)');
      }
      return { name, model, host, port };
    }
    case 'openai': {
      const provider: OpenAIProviderConfig = { name, model };
      const apiKey = optStr(raw, 'api_key', 'provider.api_key');
      const baseUrl = optStr(raw, 'base_url', 'provider.base_url');
      if (apiKey !== undefined) provider.api_key = apiKey;
      if (baseUrl !== undefined) provider.base_url = baseUrl;
      return provider;
    }
    default:
      return fail(`unknown provider "${name}"`);
  }
}

function parseBreakpoints(raw: Raw): Record<string, BreakpointConfig> {
  const out: Record<string, BreakpointConfig> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (!isRecord(value)) fail(`debug.breakpoints.${name} must be a mapping`);
    const type = BREAKPOINT_KINDS.find((kind) => kind === value['type']);
    if (!type) {
      fail(`debug.breakpoints.${name}.type must be one of ${BREAKPOINT_KINDS.join(', ')}`);
    }
    const enabled = value['enabled'];
    out[name] = {
      type,
      condition: nullableStr(value, 'condition', `debug.breakpoints.${name}.condition`),
      enabled: typeof enabled === 'boolean' ? enabled : true,
    };
  }
  return out;
}

/** Validate a merged raw document and return the typed config. */
export function validateConfig(raw: Raw): StepwiseConfig {
  const storage = section(raw, 'state_storage');
  const debug = section(raw, 'debug');
  const logging = section(raw, 'logging');

  const storageType = storage['type'];
  if (storageType !== 'json' && storageType !== 'sqlite') {
    fail('state_storage.type must be "json" or "sqlite"');
  }
  const level = LOG_LEVELS.find((candidate) => candidate === logging['level']);
  if (!level) fail(`logging.level must be one of ${LOG_LEVELS.join(', ')}`);

  const rawBreakpoints = debug['breakpoints'] ?? {};
  if (!isRecord(rawBreakpoints)) fail('debug.breakpoints must be a mapping');

  return {
    provider: parseProvider(section(raw, 'provider')),
    working_directory: str(raw, 'working_directory', 'working_directory'),
    rate_limit: int(raw, 'rate_limit', 'rate_limit', 1),
    max_retries: int(raw, 'max_retries', 'max_retries', 0),
    max_iterations: int(raw, 'max_iterations', 'max_iterations', 1),
    auto_approve_tools: bool(raw, 'auto_approve_tools', 'auto_approve_tools'),
    max_consecutive_auto_approvals: int(
      raw,
      'max_consecutive_auto_approvals',
      'max_consecutive_auto_approvals',
      0,
    ),
    approval_timeout_ms: int(raw, 'approval_timeout_ms', 'approval_timeout_ms', 0),
    state_storage: {
      type: storageType,
      path: nullableStr(storage, 'path', 'state_storage.path'),
      auto_checkpoint: bool(storage, 'auto_checkpoint', 'state_storage.auto_checkpoint'),
      max_checkpoints: int(storage, 'max_checkpoints', 'state_storage.max_checkpoints', 0),
    },
    debug: {
      enabled: bool(debug, 'enabled', 'debug.enabled'),
      step_by_step: bool(debug, 'step_by_step', 'debug.step_by_step'),
      breakpoints: parseBreakpoints(rawBreakpoints),
    },
    logging: {
      level,
      file_path: nullableStr(logging, 'file_path', 'logging.file_path'),
    },
  };
}

function toRaw(config: StepwiseConfig): Raw {
  // Round-trip through JSON to get a plain record yaml can dump.
  const plain: unknown = JSON.parse(JSON.stringify(config));
  return isRecord(plain) ? plain : {};
}

export function writeConfig(config: StepwiseConfig, configPath: string = CONFIG_PATH): void {
  validateConfig(toRaw(config));
  fs.mkdirSync(path.dirname(configPath), { recursive: true });
  fs.writeFileSync(configPath, yaml.dump(toRaw(config)), 'utf8');
}

/**
 * Load the YAML config. Without an explicit path the file in ~/.stepwise is
 * used and created from the defaults when missing; an explicit path must exist.
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<StepwiseConfig> {
  const target = configPath ?? CONFIG_PATH;
  let userConfig: Raw = {};

  if (fs.existsSync(target)) {
    const raw = fs.readFileSync(target, 'utf8');
    let parsed: unknown;
    try {
      parsed = yaml.load(raw);
    } catch (err) {
      throw new ConfigurationError(
        `Config validation failed: ${target} is not valid YAML`,
        { cause: err },
      );
    }
    if (isRecord(parsed)) {
      userConfig = parsed;
    }
  } else if (configPath !== undefined) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  } else {
    fs.mkdirSync(STEPWISE_DIR, { recursive: true });
    fs.writeFileSync(CONFIG_PATH, yaml.dump(toRaw(DEFAULT_CONFIG)), 'utf8');
    process.stderr.write(`Created default config at ${CONFIG_PATH}\n`);
  }

  const substituted = substituteEnv(userConfig, env);
  const merged = deepMerge(toRaw(DEFAULT_CONFIG), isRecord(substituted) ? substituted : {});
  return validateConfig(merged);
}

/** Resolve the storage location, defaulting under the working directory. */
export function resolveStoragePath(config: StepwiseConfig): string {
  if (config.state_storage.path) {
    return path.resolve(config.working_directory, config.state_storage.path);
  }
  const base = path.resolve(config.working_directory, '.stepwise');
  return config.state_storage.type === 'sqlite'
    ? path.join(base, 'state.db')
    : path.join(base, 'state');
}

export function resolveLogPath(config: StepwiseConfig): string {
  return path.resolve(
    config.working_directory,
    config.logging.file_path ?? path.join('.stepwise', 'logs', 'agent.log'),
  );
}

export { STEPWISE_DIR, CONFIG_PATH };
