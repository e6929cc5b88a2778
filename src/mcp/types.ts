/**
 * Shared types for MCP (Model Context Protocol) server integration
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';

export type MCPConnectionState = 'disconnected' | 'connecting' | 'ready' | 'closed';

/**
 * One block of a tools/call result, kept as the server sent it
 */
export interface MCPContentBlock {
  type: string;
  text?: string;
  [key: string]: unknown;
}

export interface MCPToolResult {
  content: MCPContentBlock[];
  /** The server reported a tool-level fault */
  isError: boolean;
  /** Text blocks joined by newlines */
  text: string;
}

/**
 * Builds the transport for a provider; the default spawns a child process
 */
export type TransportFactory = (command: string, args: string[], env?: Record<string, string>) => Transport;

export interface MCPConnectOptions {
  /** Bound on the initialize handshake in milliseconds */
  handshakeTimeoutMs?: number;
  /** Extra environment for the child process */
  env?: Record<string, string>;
  transportFactory?: TransportFactory;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
