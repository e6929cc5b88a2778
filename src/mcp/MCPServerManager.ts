/**
 * MCPServerManager - Lifecycle manager for MCP providers
 *
 * Holds the configured servers, starts them on request, registers their
 * tools in the shared ToolManager and removes them again when a server
 * stops. Implements IService so a session can release every provider in
 * one cleanup() call.
 */

import type { IService } from '../types/index.js';
import { ActivityEventType } from '../types/index.js';
import type { ToolManager } from '../tools/ToolManager.js';
import type { ActivityStream } from '../services/ActivityStream.js';
import { logger } from '../services/Logger.js';
import { getMCPConfigFile } from '../config/paths.js';
import type { MCPServerConfig, ResolvedServerConfig } from './MCPConfig.js';
import { applyConfigDefaults, loadMCPConfig, parseServerConfig } from './MCPConfig.js';
import { MCPClient } from './MCPClient.js';
import { MCPError } from './MCPError.js';
import { MCPToolFactory } from './MCPToolFactory.js';
import type { TransportFactory } from './types.js';

export interface MCPServerManagerOptions {
  activityStream?: ActivityStream;
  /** Bound on each provider's handshake in milliseconds */
  handshakeTimeoutMs?: number;
  transportFactory?: TransportFactory;
}

interface RunningServer {
  client: MCPClient;
  toolNames: string[];
}

export class MCPServerManager implements IService {
  private serverConfigs: Map<string, MCPServerConfig> = new Map();
  private running: Map<string, RunningServer> = new Map();
  private starting: Map<string, Promise<string[]>> = new Map();
  private closing = false;
  private toolManager: ToolManager;
  private options: MCPServerManagerOptions;

  constructor(toolManager: ToolManager, options: MCPServerManagerOptions = {}) {
    this.toolManager = toolManager;
    this.options = options;
  }

  async initialize(): Promise<void> {
    // Configuration is loaded explicitly through loadConfig()
  }

  /**
   * Stop every server, including those still connecting
   */
  async cleanup(): Promise<void> {
    this.closing = true;
    try {
      await Promise.allSettled(this.starting.values());
      const names = this.getConnectedServers();
      const results = await Promise.allSettled(names.map(name => this.stopServer(name)));
      results.forEach((result, index) => {
        if (result.status === 'rejected') {
          logger.warn(`[MCP] Failed to stop server '${names[index]}':`, result.reason);
        }
      });
    } finally {
      this.closing = false;
    }
  }

  /**
   * Load server configurations from a JSON file
   *
   * Without a path the default file is read, and a missing default file
   * means no servers. An explicit path must exist.
   *
   * @returns Names of the loaded servers
   */
  async loadConfig(path?: string): Promise<string[]> {
    let servers: Record<string, MCPServerConfig>;
    try {
      servers = (await loadMCPConfig(path ?? getMCPConfigFile())).servers;
    } catch (error) {
      if (!path && error instanceof MCPError && error.code === 'CONFIG_NOT_FOUND') {
        return [];
      }
      throw error;
    }

    for (const [name, config] of Object.entries(servers)) {
      this.serverConfigs.set(name, config);
    }
    const names = Object.keys(servers);
    logger.debug(`[MCP] Loaded ${names.length} server config(s)`);
    return names;
  }

  /**
   * Add or replace one server configuration
   *
   * @throws MCPError CONFIG_INVALID
   */
  addServerConfig(name: string, config: MCPServerConfig): void {
    this.serverConfigs.set(name, parseServerConfig(name, config));
  }

  /**
   * Start a configured server and register its tools
   *
   * @returns Names of the registered tools
   * @throws MCPError SERVER_NOT_FOUND, SERVER_DISABLED or ALREADY_CONNECTED
   * @throws ConnectionError when the handshake fails
   * @throws DuplicateToolError when a provided tool name is already taken
   */
  async startServer(name: string): Promise<string[]> {
    const rawConfig = this.serverConfigs.get(name);
    if (!rawConfig) {
      throw new MCPError('SERVER_NOT_FOUND', `No configuration found for server '${name}'`, name);
    }
    const config = applyConfigDefaults(rawConfig);
    if (!config.enabled) {
      throw new MCPError('SERVER_DISABLED', `Server '${name}' is disabled`, name);
    }
    if (this.running.has(name) || this.starting.has(name)) {
      throw new MCPError('ALREADY_CONNECTED', `Server '${name}' is already connected`, name);
    }
    if (this.closing) {
      throw new MCPError('CONNECTION_CLOSED', `Cannot start '${name}' while servers are shutting down`, name);
    }

    const start = this.connectServer(name, config);
    this.starting.set(name, start);
    try {
      return await start;
    } finally {
      this.starting.delete(name);
    }
  }

  private async connectServer(name: string, config: ResolvedServerConfig): Promise<string[]> {
    const client = new MCPClient(name);
    await client.connect(config.command, config.args, {
      env: config.env,
      handshakeTimeoutMs: this.options.handshakeTimeoutMs,
      transportFactory: this.options.transportFactory,
    });

    let toolNames: string[] = [];
    try {
      this.ensureNotClosing(name);
      toolNames = await MCPToolFactory.registerTools(this.toolManager, client);
      this.ensureNotClosing(name);
    } catch (error) {
      for (const toolName of toolNames) {
        this.toolManager.unregister(toolName);
      }
      await client.close();
      throw error;
    }

    const server: RunningServer = { client, toolNames };
    this.running.set(name, server);
    client.onExit(() => this.handleExit(name, server));
    this.options.activityStream?.publish(ActivityEventType.PROVIDER_CONNECTED, { serverName: name, toolNames });
    logger.debug(`[MCP] Server '${name}' connected with ${toolNames.length} tool(s)`);
    return toolNames;
  }

  private ensureNotClosing(name: string): void {
    if (this.closing) {
      throw new MCPError('CONNECTION_CLOSED', `Server '${name}' was stopped while connecting`, name);
    }
  }

  /**
   * A provider that exits on its own loses its tools and can be started again
   */
  private handleExit(name: string, server: RunningServer): void {
    if (this.running.get(name) !== server) {
      return;
    }
    logger.warn(`[MCP] Server '${name}' exited; removing its tools`);
    this.detach(name, server);
    this.options.activityStream?.publish(ActivityEventType.PROVIDER_DISCONNECTED, { serverName: name, exited: true });
  }

  private detach(name: string, server: RunningServer): void {
    this.running.delete(name);
    for (const toolName of server.toolNames) {
      this.toolManager.unregister(toolName);
    }
  }

  /**
   * Start every enabled server marked autoStart
   *
   * A server that fails to start is logged and skipped.
   *
   * @returns Names of the servers that started
   */
  async startAutoStartServers(): Promise<string[]> {
    const started: string[] = [];
    for (const [name, rawConfig] of this.serverConfigs) {
      const config = applyConfigDefaults(rawConfig);
      if (!config.enabled || !config.autoStart || this.running.has(name) || this.starting.has(name)) continue;

      try {
        await this.startServer(name);
        started.push(name);
      } catch (error) {
        logger.error(`[MCP] Failed to auto-start server '${name}':`, error);
      }
    }
    return started;
  }

  /**
   * Stop a server and unregister its tools; a no-op if it is not running
   *
   * @throws MCPError SERVER_NOT_FOUND for an unknown name
   */
  async stopServer(name: string): Promise<void> {
    if (!this.serverConfigs.has(name)) {
      throw new MCPError('SERVER_NOT_FOUND', `No configuration found for server '${name}'`, name);
    }
    const server = this.running.get(name);
    if (!server) {
      return;
    }

    this.detach(name, server);
    await server.client.close();
    this.options.activityStream?.publish(ActivityEventType.PROVIDER_DISCONNECTED, { serverName: name, exited: false });
    logger.debug(`[MCP] Server '${name}' stopped`);
  }

  getConfiguredServers(): string[] {
    return Array.from(this.serverConfigs.keys());
  }

  getConnectedServers(): string[] {
    return Array.from(this.running.keys());
  }

  getServerConfig(name: string): MCPServerConfig | undefined {
    return this.serverConfigs.get(name);
  }

  /**
   * Tool names a running server registered
   */
  getServerTools(name: string): string[] {
    return [...(this.running.get(name)?.toolNames ?? [])];
  }

  isConnected(name: string): boolean {
    return this.running.has(name);
  }
}
