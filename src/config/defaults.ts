/**
 * Default client configuration
 *
 * Resolution order for every setting: explicit ClientOptions, then the
 * environment, then DEFAULT_CLIENT_CONFIG.
 */

import { LogLevel, parseLogLevel } from '@services/Logger.js';
import { ConfigurationError } from '../errors.js';
import { API_TIMEOUTS, RETRY_CONFIG } from './constants.js';

export interface ClientConfig {
  apiKey: string | null;
  baseURL: string | null;
  defaultModel: string | null;
  logLevel: LogLevel;
  retryDelayMs: number;
  requestTimeoutMs: number;
}

/**
 * Settings a caller may pass explicitly; anything omitted falls back
 */
export type ClientConfigInput = Partial<ClientConfig>;

/**
 * Environment variables read by resolveClientConfig
 */
export const ENV_VARS = {
  API_KEY: 'OPENAI_API_KEY',
  BASE_URL: 'OPENAI_API_BASE',
  MODEL: 'TURNKIT_MODEL',
  LOG_LEVEL: 'TURNKIT_LOG_LEVEL',
} as const;

export const DEFAULT_CLIENT_CONFIG: ClientConfig = {
  apiKey: null, // Required unless a custom ModelClient is supplied
  baseURL: null, // OpenAI SDK default endpoint
  defaultModel: null, // Every ask must then name a model
  logLevel: LogLevel.ERROR, // Library stays quiet unless asked
  retryDelayMs: RETRY_CONFIG.DEFAULT_DELAY_MS, // First backoff between attempts
  requestTimeoutMs: API_TIMEOUTS.MODEL_REQUEST, // Per-request timeout
};

/**
 * Expected type for each configuration key
 */
export const CONFIG_TYPES: Record<keyof ClientConfig, 'string' | 'number' | 'logLevel'> = {
  apiKey: 'string',
  baseURL: 'string',
  defaultModel: 'string',
  logLevel: 'logLevel',
  retryDelayMs: 'number',
  requestTimeoutMs: 'number',
};

const CONFIG_KEYS: ReadonlyArray<keyof ClientConfig> = [
  'apiKey',
  'baseURL',
  'defaultModel',
  'logLevel',
  'retryDelayMs',
  'requestTimeoutMs',
];

/**
 * Validate a configuration value against its expected type
 *
 * null is accepted for the string settings, which are optional.
 */
export function validateConfigValue(key: keyof ClientConfig, value: unknown): { valid: boolean; error?: string } {
  switch (CONFIG_TYPES[key]) {
    case 'string':
      if (value === null || (typeof value === 'string' && value.trim() !== '')) {
        return { valid: true };
      }
      return { valid: false, error: `${key}: expected a non-empty string, got ${JSON.stringify(value)}` };

    case 'number':
      if (typeof value === 'number' && Number.isFinite(value) && value >= 0) {
        return { valid: true };
      }
      return { valid: false, error: `${key}: expected a non-negative number, got ${String(value)}` };

    case 'logLevel':
      if (typeof value === 'number' && LogLevel[value] !== undefined) {
        return { valid: true };
      }
      return { valid: false, error: `${key}: expected a LogLevel, got ${String(value)}` };
  }
}

function fromEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

/**
 * Merge explicit options, environment and defaults
 *
 * @param options - Explicit settings; `undefined` fields fall through
 * @param env - Environment to read (process.env by default)
 * @throws ConfigurationError when a value fails validation
 */
export function resolveClientConfig(
  options: ClientConfigInput = {},
  env: NodeJS.ProcessEnv = process.env
): ClientConfig {
  let envLogLevel: LogLevel | undefined;
  const rawLevel = fromEnv(env, ENV_VARS.LOG_LEVEL);
  if (rawLevel !== undefined) {
    envLogLevel = parseLogLevel(rawLevel);
    if (envLogLevel === undefined) {
      throw new ConfigurationError(
        `${ENV_VARS.LOG_LEVEL} must be one of error, warn, info, verbose, debug (got '${rawLevel}')`
      );
    }
  }

  const config: ClientConfig = {
    apiKey: options.apiKey ?? fromEnv(env, ENV_VARS.API_KEY) ?? DEFAULT_CLIENT_CONFIG.apiKey,
    baseURL: options.baseURL ?? fromEnv(env, ENV_VARS.BASE_URL) ?? DEFAULT_CLIENT_CONFIG.baseURL,
    defaultModel: options.defaultModel ?? fromEnv(env, ENV_VARS.MODEL) ?? DEFAULT_CLIENT_CONFIG.defaultModel,
    logLevel: options.logLevel ?? envLogLevel ?? DEFAULT_CLIENT_CONFIG.logLevel,
    retryDelayMs: options.retryDelayMs ?? DEFAULT_CLIENT_CONFIG.retryDelayMs,
    requestTimeoutMs: options.requestTimeoutMs ?? DEFAULT_CLIENT_CONFIG.requestTimeoutMs,
  };

  for (const key of CONFIG_KEYS) {
    const result = validateConfigValue(key, config[key]);
    if (!result.valid) {
      throw new ConfigurationError(`invalid client configuration: ${result.error}`);
    }
  }

  return config;
}
