/**
 * MCP (Model Context Protocol) module
 *
 * Connects to MCP providers over stdio and exposes their tools through the
 * same registry as local tools.
 */

export { MCPClient, createStdioTransport, toToolDescriptor } from './MCPClient.js';
export { MCPServerManager } from './MCPServerManager.js';
export type { MCPServerManagerOptions } from './MCPServerManager.js';
export { MCPToolFactory } from './MCPToolFactory.js';
export { MCPError, ConnectionError } from './MCPError.js';
export type { MCPErrorCode } from './MCPError.js';
export { applyConfigDefaults, loadMCPConfig, parseMCPConfig, parseServerConfig } from './MCPConfig.js';
export type { MCPConfig, MCPServerConfig, ResolvedServerConfig } from './MCPConfig.js';
export type {
  MCPConnectOptions,
  MCPConnectionState,
  MCPContentBlock,
  MCPToolResult,
  TransportFactory,
} from './types.js';
