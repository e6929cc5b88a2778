/**
 * Path configuration for tool-agents
 *
 * Defines the standard locations of the configuration files. The base
 * directory defaults to ~/.tool-agents and can be moved with TOOL_AGENTS_HOME.
 */

import { homedir } from 'os';
import { join } from 'path';

/**
 * Base directory for all tool-agents data
 */
export function getHomeDir(): string {
  return process.env.TOOL_AGENTS_HOME || join(homedir(), '.tool-agents');
}

/**
 * Main configuration file
 */
export function getConfigFile(): string {
  return join(getHomeDir(), 'config.json');
}

/**
 * MCP server configuration file
 */
export function getMCPConfigFile(): string {
  return join(getHomeDir(), 'mcp-config.json');
}
