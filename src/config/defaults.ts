/**
 * Default configuration values for tool-agents
 *
 * This file defines all default settings with their types and default values.
 * Configuration can be overridden via config file or environment variables.
 */

import type { Config } from '../types/index.js';
import { AGENT_CONFIG, API_TIMEOUTS, RETRY_CONFIG, TIME_UNITS } from './constants.js';

/**
 * Default configuration object
 */
export const DEFAULT_CONFIG: Config = {
  // ==========================================
  // LLM MODEL SETTINGS
  // ==========================================
  model: null, // Must be chosen by the user (config, env, or --model)
  endpoint: 'https://openrouter.ai/api/v1', // OpenAI-compatible base URL
  api_key: null, // Read from the environment when not set
  temperature: null, // null = let the provider decide

  // ==========================================
  // EXECUTION SETTINGS
  // ==========================================
  max_iterations: AGENT_CONFIG.DEFAULT_MAX_ITERATIONS, // Reasoning-loop budget
  request_timeout: API_TIMEOUTS.LLM_REQUEST_DEFAULT / TIME_UNITS.MS_PER_SECOND, // Seconds per model request
  max_retries: RETRY_CONFIG.DEFAULT_MAX_RETRIES, // Retries for transient endpoint failures
  mcp_handshake_timeout: API_TIMEOUTS.MCP_HANDSHAKE_DEFAULT / TIME_UNITS.MS_PER_SECOND, // Seconds
};

/**
 * All recognised configuration keys, in display order
 */
export const CONFIG_KEYS = [
  'model',
  'endpoint',
  'api_key',
  'temperature',
  'max_iterations',
  'request_timeout',
  'max_retries',
  'mcp_handshake_timeout',
] as const satisfies readonly (keyof Config)[];

export type ConfigValidation<T> =
  | { valid: true; coercedValue: T }
  | { valid: false; error: string };

type ConfigValidators = { [K in keyof Config]: (value: unknown) => ConfigValidation<Config[K]> };

function coerceNumber(value: unknown): number | null {
  if (typeof value === 'number' && !isNaN(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = parseFloat(value);
    if (!isNaN(parsed)) {
      return parsed;
    }
  }
  return null;
}

function stringValue(value: unknown): ConfigValidation<string> {
  if (typeof value === 'string' && value.length > 0) {
    return { valid: true, coercedValue: value };
  }
  return { valid: false, error: `Expected non-empty string, got ${typeof value}` };
}

function nullableString(value: unknown): ConfigValidation<string | null> {
  if (value === null || value === undefined || value === '') {
    return { valid: true, coercedValue: null };
  }
  return stringValue(value);
}

function nullableNumber(value: unknown): ConfigValidation<number | null> {
  if (value === null || value === undefined) {
    return { valid: true, coercedValue: null };
  }
  const parsed = coerceNumber(value);
  if (parsed === null) {
    return { valid: false, error: `Expected number, got ${typeof value}` };
  }
  return { valid: true, coercedValue: parsed };
}

function positiveNumber(value: unknown): ConfigValidation<number> {
  const parsed = coerceNumber(value);
  if (parsed === null || parsed <= 0) {
    return { valid: false, error: `Expected positive number, got ${JSON.stringify(value)}` };
  }
  return { valid: true, coercedValue: parsed };
}

function nonNegativeInteger(value: unknown): ConfigValidation<number> {
  const parsed = coerceNumber(value);
  if (parsed === null || !Number.isInteger(parsed) || parsed < 0) {
    return { valid: false, error: `Expected non-negative integer, got ${JSON.stringify(value)}` };
  }
  return { valid: true, coercedValue: parsed };
}

function positiveInteger(value: unknown): ConfigValidation<number> {
  const result = nonNegativeInteger(value);
  if (result.valid && result.coercedValue === 0) {
    return { valid: false, error: 'Expected positive integer, got 0' };
  }
  return result;
}

const CONFIG_VALIDATORS: ConfigValidators = {
  model: nullableString,
  endpoint: stringValue,
  api_key: nullableString,
  temperature: nullableNumber,
  max_iterations: positiveInteger,
  request_timeout: positiveNumber,
  max_retries: nonNegativeInteger,
  mcp_handshake_timeout: positiveNumber,
};

/**
 * Check whether a string is a recognised configuration key
 */
export function isConfigKey(key: string): key is keyof Config {
  return CONFIG_KEYS.some(configKey => configKey === key);
}

/**
 * Validate a configuration value against its expected type, coercing
 * numeric strings (as found in environment variables) where possible
 */
export function validateConfigValue<K extends keyof Config>(
  key: K,
  value: unknown
): ConfigValidation<Config[K]> {
  return CONFIG_VALIDATORS[key](value);
}
