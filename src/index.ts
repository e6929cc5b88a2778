/**
 * tool-agents - public API
 */

export * from './agent/index.js';
export * from './tools/index.js';
export * from './llm/index.js';
export * from './mcp/index.js';

export { ActivityStream } from './services/ActivityStream.js';
export { ConfigManager } from './services/ConfigManager.js';
export type { ConfigSource } from './services/ConfigManager.js';
export { logger, LogLevel } from './services/Logger.js';
export { DEFAULT_CONFIG, validateConfigValue } from './config/defaults.js';

export { ActivityEventType } from './types/index.js';
export type {
  ActivityCallback,
  ActivityEvent,
  Config,
  FunctionDefinition,
  JsonObject,
  JsonValue,
  Message,
  MessageRole,
  ParameterSchema,
  Tool,
  ToolCall,
  ToolDescriptor,
  ToolExecutor,
  ToolInvocationResult,
} from './types/index.js';
