/**
 * ToolManager - Registry and execution manager for all tools
 *
 * Holds local tools and provider-backed tools in one namespace, produces the
 * function definitions shown to the model, and dispatches calls. Failures
 * inside a call are returned as content, never thrown, so the model can see
 * them and correct itself.
 */

import type {
  FunctionDefinition,
  JsonValue,
  Tool,
  ToolDescriptor,
  ToolExecutor,
  ToolInvocationResult,
} from '../types/index.js';
import { ToolValidator } from './ToolValidator.js';
import { DuplicateToolError, SchemaError, ToolArgumentError, UnknownToolError } from './ToolErrors.js';
import { formatError, isAbortError } from '../utils/errorUtils.js';
import { validateToolName } from '../utils/namingValidation.js';
import { logger } from '../services/Logger.js';

/**
 * Render a tool's raw return value as tool-result content
 *
 * Strings pass through verbatim, scalars become their literal text,
 * null and undefined become "null", everything else compact JSON.
 */
export function stringifyToolResult(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  try {
    const json = JSON.stringify(value);
    if (json !== undefined) {
      return json;
    }
  } catch (error) {
    logger.debug('[TOOL_MANAGER] Result is not JSON-serialisable, falling back to String():', formatError(error));
  }
  return String(value);
}

/**
 * Render a tool error as tool-result content
 */
function errorContent(message: string): string {
  return `Error: ${message}`;
}

export class ToolManager {
  private tools: Map<string, Tool>;
  private validator: ToolValidator;
  private functionDefinitionsCache: FunctionDefinition[] | null = null;

  constructor(tools: Tool[] = []) {
    this.tools = new Map();
    this.validator = new ToolValidator();

    for (const tool of tools) {
      this.registerTool(tool);
    }
  }

  /**
   * Register a tool from a descriptor and an executor
   *
   * @throws DuplicateToolError if the name is taken; the first registration stays
   * @throws SchemaError if the descriptor name is invalid
   */
  register(descriptor: ToolDescriptor, executor: ToolExecutor): void {
    this.registerTool({ descriptor, execute: executor });
  }

  /**
   * Register a tool
   *
   * @throws DuplicateToolError if the name is taken; the first registration stays
   * @throws SchemaError if the descriptor name is invalid
   */
  registerTool(tool: Tool): void {
    const name = tool.descriptor.name;
    const validation = validateToolName(name);
    if (!validation.valid) {
      throw new SchemaError(`Failed to register tool: ${validation.error}`, name);
    }

    if (this.tools.has(name)) {
      throw new DuplicateToolError(name);
    }
    this.tools.set(name, tool);
    this.functionDefinitionsCache = null;
    logger.debug(`[TOOL_MANAGER] Registered tool: ${name}`);
  }

  /**
   * Remove a tool by name
   *
   * @returns true if a tool was removed
   */
  unregister(name: string): boolean {
    if (!this.tools.delete(name)) {
      logger.debug(`[TOOL_MANAGER] Tool '${name}' not found, skipping unregister`);
      return false;
    }
    this.functionDefinitionsCache = null;
    logger.debug(`[TOOL_MANAGER] Unregistered tool: ${name}`);
    return true;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getTool(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /**
   * Tool names in registration order
   */
  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Descriptors in registration order
   */
  listDescriptors(): ToolDescriptor[] {
    return Array.from(this.tools.values(), tool => tool.descriptor);
  }

  /**
   * Function definitions for the model endpoint, in registration order
   */
  getFunctionDefinitions(): FunctionDefinition[] {
    if (!this.functionDefinitionsCache) {
      this.functionDefinitionsCache = this.listDescriptors().map(descriptor => ({
        type: 'function',
        function: descriptor,
      }));
    }
    return [...this.functionDefinitionsCache];
  }

  /**
   * Invoke a tool by name
   *
   * Unknown tools, invalid arguments and executor failures all come back as
   * `{ isError: true }` content. Arguments reach the executor exactly as
   * given; declared defaults are not filled in. Only an abort propagates.
   */
  async invoke(name: string, args: Record<string, JsonValue>): Promise<ToolInvocationResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      const error = new UnknownToolError(name, this.getToolNames());
      logger.debug(`[TOOL_MANAGER] ${error.message}`);
      return { content: errorContent(error.message), isError: true };
    }

    const validation = this.validator.validateArguments(tool.descriptor, args);
    if (!validation.valid) {
      const error = new ToolArgumentError(
        validation.error ?? `Invalid arguments for ${name}`,
        name,
        validation.parameterName
      );
      logger.debug(`[TOOL_MANAGER] ${error.message}`);
      const suggestion = validation.suggestion ? ` ${validation.suggestion}` : '';
      return { content: errorContent(`${error.message}.${suggestion}`), isError: true };
    }

    try {
      const result = await tool.execute(args);
      return { content: stringifyToolResult(result), isError: false };
    } catch (error) {
      if (isAbortError(error)) {
        throw error;
      }
      logger.debug(`[TOOL_MANAGER] Tool '${name}' failed:`, error);
      return { content: errorContent(formatError(error)), isError: true };
    }
  }

  /**
   * Remove every tool
   */
  clear(): void {
    this.tools.clear();
    this.functionDefinitionsCache = null;
  }
}
