/**
 * MCPToolFactory - Registers a provider's tools in a ToolManager
 */

import type { JsonValue } from '../types/index.js';
import type { ToolManager } from '../tools/ToolManager.js';
import { logger } from '../services/Logger.js';
import type { MCPClient } from './MCPClient.js';
import { MCPError } from './MCPError.js';

export class MCPToolFactory {
  /**
   * List the provider's tools and register each one with an executor that
   * forwards to callTool. A fault the server reports is thrown from the
   * executor, so the registry returns it as error content.
   *
   * Registration is all or nothing: if one name is taken, the tools
   * registered so far are removed again and the error is rethrown.
   *
   * @returns The registered tool names
   */
  static async registerTools(toolManager: ToolManager, client: MCPClient): Promise<string[]> {
    const descriptors = await client.listTools();
    const registered: string[] = [];

    try {
      for (const descriptor of descriptors) {
        toolManager.register(descriptor, async (args: Record<string, JsonValue>) => {
          const result = await client.callTool(descriptor.name, args);
          if (result.isError) {
            throw new MCPError(
              'TOOL_CALL_FAILED',
              result.text || `Tool '${descriptor.name}' reported an error`,
              client.serverName
            );
          }
          return result.text;
        });
        registered.push(descriptor.name);
      }
    } catch (error) {
      for (const name of registered) {
        toolManager.unregister(name);
      }
      throw error;
    }

    logger.debug(`[MCP] Registered ${registered.length} tool(s) from '${client.serverName}'`);
    return registered;
  }
}
