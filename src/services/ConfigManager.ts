/**
 * ConfigManager - Configuration management service
 *
 * Resolves the effective configuration from three layers (lowest to highest):
 * 1. Default values (DEFAULT_CONFIG)
 * 2. Config file (~/.tool-agents/config.json)
 * 3. Environment variables
 *
 * Implements the IService interface for lifecycle management.
 */

import { promises as fs } from 'fs';
import { dirname } from 'path';
import type { Config, IService } from '../types/index.js';
import { CONFIG_KEYS, DEFAULT_CONFIG, isConfigKey, validateConfigValue } from '../config/defaults.js';
import { getConfigFile } from '../config/paths.js';
import { isFileNotFoundError } from '../utils/errorUtils.js';
import { logger } from './Logger.js';

/**
 * Environment variables that override config keys, checked in order
 */
const ENV_OVERRIDES: ReadonlyArray<{ key: keyof Config; vars: readonly string[] }> = [
  { key: 'model', vars: ['TOOL_AGENTS_MODEL'] },
  { key: 'endpoint', vars: ['TOOL_AGENTS_ENDPOINT'] },
  { key: 'api_key', vars: ['OPENROUTER_API_KEY', 'OPENAI_API_KEY'] },
];

export type ConfigSource = 'env' | 'file' | 'default';

/**
 * Validate a raw value and write it into a partial config
 *
 * @returns Validation error message, or null when the value was applied
 */
function applyValue<K extends keyof Config>(target: Partial<Config>, key: K, value: unknown): string | null {
  const validated = validateConfigValue(key, value);
  if (!validated.valid) {
    return validated.error;
  }
  target[key] = validated.coercedValue;
  return null;
}

export class ConfigManager implements IService {
  private _config: Config;
  private _configPath: string;
  private _fileConfig: Partial<Config> = {};
  private _envConfig: Partial<Config> = {};
  private _env: NodeJS.ProcessEnv;

  constructor(configPath?: string, env: NodeJS.ProcessEnv = process.env) {
    this._configPath = configPath || getConfigFile();
    this._env = env;
    this._config = { ...DEFAULT_CONFIG };
  }

  /**
   * Initialize the service
   * Loads configuration from disk and environment
   */
  async initialize(): Promise<void> {
    await this.loadConfig();
  }

  async cleanup(): Promise<void> {
    // No-op: configuration is persisted on save
  }

  /**
   * Read and validate the config file
   *
   * Invalid values and unknown keys are reported and skipped.
   */
  private async loadFileConfig(): Promise<Partial<Config>> {
    let raw: unknown;
    try {
      const content = await fs.readFile(this._configPath, 'utf-8');
      raw = JSON.parse(content);
    } catch (error) {
      if (!isFileNotFoundError(error)) {
        logger.warn(`[CONFIG] Error loading config file ${this._configPath}:`, error);
      }
      return {};
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      logger.warn(`[CONFIG] Config file ${this._configPath} is not a JSON object, ignoring`);
      return {};
    }

    const fileConfig: Partial<Config> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (!isConfigKey(key)) {
        logger.warn(`[CONFIG] Unknown key '${key}' in config file, ignoring`);
        continue;
      }
      const error = applyValue(fileConfig, key, value);
      if (error) {
        logger.warn(`[CONFIG] Invalid value for ${key} in config file: ${error}. Using default.`);
      }
    }
    return fileConfig;
  }

  /**
   * Collect overrides from environment variables
   */
  private loadEnvConfig(): Partial<Config> {
    const envConfig: Partial<Config> = {};
    for (const { key, vars } of ENV_OVERRIDES) {
      const name = vars.find(v => this._env[v]);
      if (!name) {
        continue;
      }
      const error = applyValue(envConfig, key, this._env[name]);
      if (error) {
        logger.warn(`[CONFIG] Invalid value for ${key} in ${name}: ${error}`);
      }
    }
    return envConfig;
  }

  /**
   * Load configuration: defaults, then config file, then environment
   */
  async loadConfig(): Promise<void> {
    this._fileConfig = await this.loadFileConfig();
    this._envConfig = this.loadEnvConfig();
    this._config = { ...DEFAULT_CONFIG, ...this._fileConfig, ...this._envConfig };
    logger.debug('[CONFIG] Loaded configuration from', this._configPath);
  }

  /**
   * Save configuration to disk
   *
   * Only file-layer values that differ from the defaults are written;
   * environment overrides are never persisted.
   */
  async saveConfig(): Promise<void> {
    try {
      await fs.mkdir(dirname(this._configPath), { recursive: true });

      const configToSave: Partial<Config> = {};
      for (const key of CONFIG_KEYS) {
        const value = this._fileConfig[key];
        if (value !== undefined && JSON.stringify(value) !== JSON.stringify(DEFAULT_CONFIG[key])) {
          applyValue(configToSave, key, value);
        }
      }

      await fs.writeFile(this._configPath, JSON.stringify(configToSave, null, 2), 'utf-8');
      logger.debug('[CONFIG] Saved config');
    } catch (error) {
      logger.error('[CONFIG] Error saving config:', error);
      throw error;
    }
  }

  /**
   * Get the complete configuration object
   */
  getConfig(): Readonly<Config> {
    return { ...this._config };
  }

  /**
   * Get a specific configuration value
   */
  getValue<K extends keyof Config>(key: K): Config[K] {
    return this._config[key];
  }

  /**
   * Set a configuration value with validation and save it
   *
   * @throws Error if validation fails
   */
  async setValue<K extends keyof Config>(key: K, value: unknown): Promise<void> {
    const validation = validateConfigValue(key, value);
    if (!validation.valid) {
      throw new Error(`Cannot set config value '${key}': ${validation.error}`);
    }

    this._fileConfig[key] = validation.coercedValue;
    this._config[key] = validation.coercedValue;
    // An explicit set wins over the environment for the rest of the session
    delete this._envConfig[key];
    await this.saveConfig();
  }

  /**
   * Reset configuration to default values (environment overrides still apply)
   *
   * @returns Keys whose value changed
   */
  async reset(): Promise<string[]> {
    const changed = CONFIG_KEYS.filter(
      key => !(key in this._envConfig) && JSON.stringify(this._config[key]) !== JSON.stringify(DEFAULT_CONFIG[key])
    );
    this._fileConfig = {};
    this._config = { ...DEFAULT_CONFIG, ...this._envConfig };
    await this.saveConfig();
    return changed;
  }

  /**
   * Report which layer a configuration value came from
   */
  getConfigSource(key: keyof Config): ConfigSource {
    if (key in this._envConfig) {
      return 'env';
    }
    if (key in this._fileConfig) {
      return 'file';
    }
    return 'default';
  }

  /**
   * Check if a configuration key exists
   */
  hasKey(key: string): key is keyof Config {
    return isConfigKey(key);
  }

  getKeys(): Array<keyof Config> {
    return [...CONFIG_KEYS];
  }

  getConfigPath(): string {
    return this._configPath;
  }
}
