/**
 * MCPClient - One connection to an MCP tool provider
 *
 * Wraps the SDK client and its transport in a small state machine:
 *
 *   disconnected → connecting → ready → closed
 *                  connecting → closed   (failed handshake)
 *
 * A connection reaches `closed` exactly once and is never reused.
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { CallToolResultSchema, ListToolsResultSchema } from '@modelcontextprotocol/sdk/types.js';
import type { JsonValue, ParameterSchema, ToolDescriptor } from '../types/index.js';
import { API_TIMEOUTS, MCP_CLIENT_INFO } from '../config/constants.js';
import { logger } from '../services/Logger.js';
import { formatError } from '../utils/errorUtils.js';
import { ConnectionError, MCPError } from './MCPError.js';
import { isRecord } from './types.js';
import type { MCPConnectOptions, MCPConnectionState, MCPContentBlock, MCPToolResult } from './types.js';

/**
 * Spawn the provider as a child process, forwarding its stderr to the debug log
 */
export function createStdioTransport(
  serverName: string,
  command: string,
  args: string[],
  env?: Record<string, string>
): Transport {
  const transport = new StdioClientTransport({
    command,
    args,
    env: providerEnvironment(env),
    stderr: 'pipe',
  });

  const stderrStream = transport.stderr;
  if (stderrStream) {
    stderrStream.on('data', (chunk: Buffer) => {
      const line = chunk.toString().trimEnd();
      if (line) logger.debug(`[MCP:${serverName}] ${line}`);
    });
  }

  return transport;
}

/**
 * Environment for a provider process: configured variables on top of our own.
 * Without configured variables the SDK's default environment applies.
 */
export function providerEnvironment(env?: Record<string, string>): Record<string, string> | undefined {
  if (!env) {
    return undefined;
  }
  const merged: Record<string, string> = {};
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) merged[key] = value;
  }
  return { ...merged, ...env };
}

/**
 * Copy a remote property schema key by key, keeping every keyword
 */
function toParameterSchema(value: unknown): ParameterSchema {
  const schema: ParameterSchema = {};
  if (isRecord(value)) {
    for (const [keyword, entry] of Object.entries(value)) {
      schema[keyword] = entry;
    }
  }
  return schema;
}

/**
 * Map a remote tool to a descriptor, passing its input schema through
 */
export function toToolDescriptor(tool: { name: string; description?: string; inputSchema: unknown }): ToolDescriptor {
  const inputSchema = isRecord(tool.inputSchema) ? tool.inputSchema : {};
  const properties: Record<string, ParameterSchema> = {};
  if (isRecord(inputSchema.properties)) {
    for (const [name, schema] of Object.entries(inputSchema.properties)) {
      properties[name] = toParameterSchema(schema);
    }
  }
  const required = Array.isArray(inputSchema.required)
    ? inputSchema.required.filter((name): name is string => typeof name === 'string')
    : [];

  return {
    name: tool.name,
    description: tool.description ?? '',
    parameters: { ...inputSchema, type: 'object', properties, required },
  };
}

function toContentBlocks(content: unknown): MCPContentBlock[] {
  if (!Array.isArray(content)) {
    return [];
  }
  const blocks: MCPContentBlock[] = [];
  for (const item of content) {
    if (!isRecord(item) || typeof item.type !== 'string') continue;
    const block: MCPContentBlock = { type: item.type };
    for (const [key, value] of Object.entries(item)) {
      block[key] = value;
    }
    blocks.push(block);
  }
  return blocks;
}

export class MCPClient {
  readonly serverName: string;
  private _state: MCPConnectionState = 'disconnected';
  private client: Client | null = null;
  private tools: ToolDescriptor[] = [];
  private exitListeners: Array<() => void> = [];

  constructor(serverName = 'provider') {
    this.serverName = serverName;
  }

  get state(): MCPConnectionState {
    return this._state;
  }

  /**
   * Tools discovered by the last listTools() call
   */
  get discoveredTools(): ToolDescriptor[] {
    return [...this.tools];
  }

  /**
   * Register a listener for a provider that closes the connection on its own
   *
   * Not called when the connection is closed through close().
   */
  onExit(listener: () => void): void {
    this.exitListeners.push(listener);
  }

  /**
   * Start the provider and perform the initialize handshake
   *
   * @throws ConnectionError ALREADY_CONNECTED when called twice
   * @throws ConnectionError TIMEOUT when the handshake outlasts handshakeTimeoutMs
   * @throws ConnectionError CONNECTION_FAILED on spawn or protocol failure
   */
  async connect(command: string, args: string[] = [], options: MCPConnectOptions = {}): Promise<void> {
    if (this._state !== 'disconnected') {
      const code = this._state === 'closed' ? 'CONNECTION_CLOSED' : 'ALREADY_CONNECTED';
      throw new ConnectionError(code, `Provider '${this.serverName}' is ${this._state}`, this.serverName);
    }
    this._state = 'connecting';

    const timeoutMs = options.handshakeTimeoutMs ?? API_TIMEOUTS.MCP_HANDSHAKE_DEFAULT;
    const client = new Client({ ...MCP_CLIENT_INFO }, { capabilities: {} });
    this.client = client;
    let timer: NodeJS.Timeout | undefined;

    try {
      const transport = options.transportFactory
        ? options.transportFactory(command, args, options.env)
        : createStdioTransport(this.serverName, command, args, options.env);

      await Promise.race([
        client.connect(transport),
        new Promise<never>((_, reject) => {
          timer = setTimeout(
            () =>
              reject(
                new ConnectionError(
                  'TIMEOUT',
                  `Handshake with '${this.serverName}' timed out after ${timeoutMs}ms`,
                  this.serverName
                )
              ),
            timeoutMs
          );
        }),
      ]);
    } catch (error) {
      await this.close();
      if (error instanceof ConnectionError) throw error;
      throw new ConnectionError(
        'CONNECTION_FAILED',
        `Failed to connect to '${this.serverName}': ${formatError(error)}`,
        this.serverName,
        { cause: error }
      );
    } finally {
      clearTimeout(timer);
    }

    client.onclose = () => {
      if (this._state === 'ready') {
        logger.warn(`[MCP] Provider '${this.serverName}' closed the connection`);
        this._state = 'closed';
        this.client = null;
        for (const listener of this.exitListeners) {
          try {
            listener();
          } catch (error) {
            logger.error(`[MCP] Error in exit listener of '${this.serverName}':`, error);
          }
        }
      }
    };
    this._state = 'ready';
    logger.debug(`[MCP] Connected to '${this.serverName}'`);
  }

  /**
   * Fetch the provider's tools as descriptors
   */
  async listTools(): Promise<ToolDescriptor[]> {
    const client = this.requireReady();
    let result;
    try {
      result = await client.request({ method: 'tools/list' }, ListToolsResultSchema);
    } catch (error) {
      throw new MCPError(
        'PROTOCOL_ERROR',
        `Listing tools of '${this.serverName}' failed: ${formatError(error)}`,
        this.serverName,
        { cause: error }
      );
    }

    this.tools = result.tools.map(tool => toToolDescriptor(tool));
    logger.debug(`[MCP] '${this.serverName}' offers ${this.tools.length} tool(s)`);
    return [...this.tools];
  }

  /**
   * Call a remote tool
   *
   * A fault the server reports comes back with isError set; only transport
   * and protocol failures are thrown.
   *
   * @throws MCPError TOOL_CALL_FAILED
   */
  async callTool(name: string, args: Record<string, JsonValue>): Promise<MCPToolResult> {
    const client = this.requireReady();
    let result;
    try {
      result = await client.request(
        { method: 'tools/call', params: { name, arguments: args } },
        CallToolResultSchema
      );
    } catch (error) {
      throw new MCPError(
        'TOOL_CALL_FAILED',
        `Tool '${name}' on '${this.serverName}' failed: ${formatError(error)}`,
        this.serverName,
        { cause: error }
      );
    }

    const content = toContentBlocks(result.content);
    const text = content
      .map(block => block.text)
      .filter((blockText): blockText is string => typeof blockText === 'string')
      .join('\n');
    return { content, isError: result.isError === true, text };
  }

  /**
   * Close the connection; a no-op once closed
   */
  async close(): Promise<void> {
    if (this._state === 'closed') {
      return;
    }
    this._state = 'closed';
    const client = this.client;
    this.client = null;
    if (!client) {
      return;
    }
    try {
      await client.close();
    } catch (error) {
      logger.warn(`[MCP] Error closing connection to '${this.serverName}':`, error);
    }
    logger.debug(`[MCP] Closed '${this.serverName}'`);
  }

  private requireReady(): Client {
    if (this._state === 'closed') {
      throw new ConnectionError('CONNECTION_CLOSED', `Provider '${this.serverName}' is closed`, this.serverName);
    }
    if (this._state !== 'ready' || !this.client) {
      throw new ConnectionError('NOT_CONNECTED', `Provider '${this.serverName}' is not connected`, this.serverName);
    }
    return this.client;
  }
}
