/**
 * AgentSession - Owns the registry, memory, providers and model client of
 * one conversation
 *
 * Callers build a session, register local functions and providers, run
 * tasks, and release everything with cleanup(). withSession() guarantees
 * the release on every exit path.
 *
 * @example
 * ```typescript
 * const answer = await withSession({ config: { model: 'openai/gpt-4o-mini' } }, async session => {
 *   session.addFunction(
 *     { name: 'add', description: 'Add two numbers', parameters: [{ name: 'a', type: 'number' }, { name: 'b', type: 'number' }] },
 *     ({ a, b }) => Number(a) + Number(b)
 *   );
 *   return session.run('What is 7 + 2?');
 * });
 * ```
 */

import type { Config, Message, Tool, ToolDescriptor, ToolExecutor } from '../types/index.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { TIME_UNITS } from '../config/constants.js';
import type { ModelClient } from '../llm/ModelClient.js';
import { OpenAIClient } from '../llm/OpenAIClient.js';
import { MessageHistory } from '../llm/MessageHistory.js';
import { ToolManager } from '../tools/ToolManager.js';
import { createTool } from '../tools/SchemaDeriver.js';
import type { ToolSpec } from '../tools/SchemaDeriver.js';
import { MCPServerManager } from '../mcp/MCPServerManager.js';
import type { MCPServerConfig } from '../mcp/MCPConfig.js';
import type { TransportFactory } from '../mcp/types.js';
import { ActivityStream } from '../services/ActivityStream.js';
import { logger } from '../services/Logger.js';
import { Agent } from './Agent.js';
import type { AgentRunResult, AgentTask, RunOptions } from './Agent.js';

export interface AgentSessionOptions {
  /** Overrides applied on top of the defaults */
  config?: Partial<Config>;
  /** Client to use instead of an OpenAIClient built from config */
  modelClient?: ModelClient;
  systemPrompt?: string;
  activityStream?: ActivityStream;
  /** Transport for providers; the default spawns each server as a child process */
  transportFactory?: TransportFactory;
}

/**
 * Build the HTTP client described by a configuration
 *
 * @throws Error when no model is configured
 */
export function createModelClient(config: Config): ModelClient {
  if (!config.model) {
    throw new Error('No model configured. Set TOOL_AGENTS_MODEL, the "model" config key, or pass --model.');
  }
  return new OpenAIClient({
    endpoint: config.endpoint,
    modelName: config.model,
    apiKey: config.api_key,
    temperature: config.temperature,
    requestTimeoutMs: config.request_timeout * TIME_UNITS.MS_PER_SECOND,
    maxRetries: config.max_retries,
  });
}

export class AgentSession {
  readonly config: Config;
  readonly tools: ToolManager;
  readonly memory: MessageHistory;
  readonly providers: MCPServerManager;
  readonly activityStream: ActivityStream;
  private modelClient: ModelClient;
  private agent: Agent;
  private closed = false;

  constructor(options: AgentSessionOptions = {}) {
    this.config = { ...DEFAULT_CONFIG, ...options.config };
    this.activityStream = options.activityStream ?? new ActivityStream();
    this.tools = new ToolManager();
    this.memory = new MessageHistory();
    this.providers = new MCPServerManager(this.tools, {
      activityStream: this.activityStream,
      handshakeTimeoutMs: this.config.mcp_handshake_timeout * TIME_UNITS.MS_PER_SECOND,
      transportFactory: options.transportFactory,
    });
    this.modelClient = options.modelClient ?? createModelClient(this.config);
    this.agent = new Agent(this.modelClient, this.tools, this.memory, this.activityStream, {
      maxIterations: this.config.max_iterations,
      temperature: this.config.temperature,
    });

    if (options.systemPrompt) {
      this.setSystemPrompt(options.systemPrompt);
    }
  }

  /**
   * Register a ready-made tool
   *
   * @throws DuplicateToolError
   */
  addTool(tool: Tool): void {
    this.tools.registerTool(tool);
  }

  /**
   * Derive a descriptor from a declaration and register it
   *
   * @throws SchemaError
   * @throws DuplicateToolError
   */
  addFunction(spec: ToolSpec, executor: ToolExecutor): ToolDescriptor {
    const tool = createTool(spec, executor);
    this.tools.registerTool(tool);
    return tool.descriptor;
  }

  /**
   * Start an MCP provider and register its tools
   *
   * @returns The registered tool names
   */
  async connectProvider(name: string, serverConfig: MCPServerConfig): Promise<string[]> {
    this.providers.addServerConfig(name, serverConfig);
    return this.providers.startServer(name);
  }

  /**
   * Load provider configurations from a file
   */
  async loadProviders(path?: string): Promise<string[]> {
    return this.providers.loadConfig(path);
  }

  setSystemPrompt(content: string): void {
    this.memory.insertSystemMessage(content);
  }

  async run(task: AgentTask, options?: RunOptions): Promise<AgentRunResult> {
    if (this.closed) {
      throw new Error('Session has been cleaned up');
    }
    return this.agent.run(task, options);
  }

  getMessages(): Message[] {
    return this.memory.getMessages();
  }

  /**
   * Close every provider and the model client; later calls do nothing
   */
  async cleanup(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    try {
      await this.providers.cleanup();
    } finally {
      await this.modelClient.close();
      logger.debug('[SESSION] Cleaned up');
    }
  }
}

/**
 * Run a function with a fresh session and always clean it up
 */
export async function withSession<T>(
  options: AgentSessionOptions,
  fn: (session: AgentSession) => Promise<T>
): Promise<T> {
  const session = new AgentSession(options);
  try {
    return await fn(session);
  } finally {
    await session.cleanup();
  }
}
