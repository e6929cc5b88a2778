/**
 * MCP server configuration model
 *
 * The file maps server names to the command that starts them:
 *
 * ```json
 * { "servers": { "memory": { "command": "npx", "args": ["-y", "@modelcontextprotocol/server-memory"], "autoStart": true } } }
 * ```
 */

import { promises as fs } from 'fs';
import { MCPError } from './MCPError.js';
import { isRecord } from './types.js';
import { formatError, isFileNotFoundError } from '../utils/errorUtils.js';

export interface MCPConfig {
  servers: Record<string, MCPServerConfig>;
}

export interface MCPServerConfig {
  /** Command to execute */
  command: string;
  /** Command arguments */
  args?: string[];
  /** Environment variables added to the process environment */
  env?: Record<string, string>;
  /** Whether this server may be started (default: true) */
  enabled?: boolean;
  /** Whether to start with the session (default: false) */
  autoStart?: boolean;
}

export type ResolvedServerConfig = MCPServerConfig & Required<Pick<MCPServerConfig, 'args' | 'enabled' | 'autoStart'>>;

/**
 * Apply defaults to a server config
 */
export function applyConfigDefaults(config: MCPServerConfig): ResolvedServerConfig {
  return {
    ...config,
    args: config.args ?? [],
    enabled: config.enabled ?? true,
    autoStart: config.autoStart ?? false,
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return isRecord(value) && Object.values(value).every(item => typeof item === 'string');
}

/**
 * Validate one server entry
 *
 * @throws MCPError CONFIG_INVALID naming the server and the offending field
 */
export function parseServerConfig(name: string, raw: unknown): MCPServerConfig {
  const invalid = (detail: string) =>
    new MCPError('CONFIG_INVALID', `Invalid configuration for server '${name}': ${detail}`, name);

  if (!isRecord(raw)) {
    throw invalid('expected an object');
  }
  const { command, args, env, enabled, autoStart } = raw;
  if (typeof command !== 'string' || command.trim() === '') {
    throw invalid('"command" must be a non-empty string');
  }

  const config: MCPServerConfig = { command };
  if (args !== undefined) {
    if (!isStringArray(args)) throw invalid('"args" must be an array of strings');
    config.args = args;
  }
  if (env !== undefined) {
    if (!isStringRecord(env)) throw invalid('"env" must map names to strings');
    config.env = env;
  }
  if (enabled !== undefined) {
    if (typeof enabled !== 'boolean') throw invalid('"enabled" must be a boolean');
    config.enabled = enabled;
  }
  if (autoStart !== undefined) {
    if (typeof autoStart !== 'boolean') throw invalid('"autoStart" must be a boolean');
    config.autoStart = autoStart;
  }
  return config;
}

/**
 * Validate a parsed configuration document
 */
export function parseMCPConfig(raw: unknown): MCPConfig {
  if (!isRecord(raw) || !isRecord(raw.servers)) {
    throw new MCPError('CONFIG_INVALID', 'MCP configuration must contain a "servers" object');
  }
  const servers: Record<string, MCPServerConfig> = {};
  for (const [name, entry] of Object.entries(raw.servers)) {
    servers[name] = parseServerConfig(name, entry);
  }
  return { servers };
}

/**
 * Read and validate a configuration file
 *
 * @throws MCPError CONFIG_NOT_FOUND when the file does not exist
 * @throws MCPError CONFIG_INVALID when it is not valid JSON or has the wrong shape
 */
export async function loadMCPConfig(path: string): Promise<MCPConfig> {
  let content: string;
  try {
    content = await fs.readFile(path, 'utf-8');
  } catch (error) {
    if (isFileNotFoundError(error)) {
      throw new MCPError('CONFIG_NOT_FOUND', `MCP configuration not found: ${path}`);
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new MCPError('CONFIG_INVALID', `MCP configuration ${path} is not valid JSON: ${formatError(error)}`);
  }
  return parseMCPConfig(raw);
}
