/**
 * FunctionCalling - Utilities for function calling / tool use
 *
 * Provides utilities for:
 * - Parsing tool call arguments received from the endpoint
 * - Building tool result messages
 * - Checking the shape of tool calls
 *
 * Supports the OpenAI function calling format.
 */

import type { JsonObject, JsonValue, Message, ToolCall } from '../types/index.js';
import { TEXT_LIMITS } from '../config/constants.js';
import { logger } from '../services/Logger.js';

/**
 * Check that a value is a plain JSON object (not null, not an array)
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse tool call arguments from a JSON string or object
 *
 * Invalid JSON, or JSON that is not an object, yields an empty object
 * and a warning.
 */
export function parseToolCallArguments(args: unknown): Record<string, JsonValue> {
  if (typeof args === 'string') {
    if (args.trim() === '') {
      return {};
    }
    let parsed: unknown;
    try {
      parsed = JSON.parse(args);
    } catch (error) {
      logger.warn('[FUNCTION_CALLING] Failed to parse tool call arguments:', error);
      logger.warn(
        '[FUNCTION_CALLING] Invalid JSON string:',
        args.substring(0, TEXT_LIMITS.MESSAGE_PREVIEW_MAX) + (args.length > TEXT_LIMITS.MESSAGE_PREVIEW_MAX ? '...' : '')
      );
      return {};
    }
    if (isJsonObject(parsed)) {
      return parsed;
    }
    logger.warn('[FUNCTION_CALLING] Tool call arguments are not a JSON object, ignoring them');
    return {};
  }

  return isJsonObject(args) ? args : {};
}

/**
 * Create a tool result message answering one tool call
 */
export function createToolResultMessage(toolCallId: string, toolName: string, content: string): Message {
  return {
    role: 'tool',
    tool_call_id: toolCallId,
    name: toolName,
    content,
  };
}

/**
 * Check if a message carries tool calls
 */
export function hasToolCalls(message: { tool_calls?: ToolCall[] }): message is { tool_calls: ToolCall[] } {
  return Array.isArray(message.tool_calls) && message.tool_calls.length > 0;
}

/**
 * Check that a value has the wire shape of a tool call: an id,
 * type 'function' and a function name
 */
export function isValidToolCall(toolCall: unknown): toolCall is {
  id: string;
  type: 'function';
  function: { name: string; arguments?: unknown };
} {
  if (!isJsonObject(toolCall)) {
    return false;
  }
  if (typeof toolCall.id !== 'string' || !toolCall.id) {
    return false;
  }
  if (toolCall.type !== 'function') {
    return false;
  }
  const fn = toolCall.function;
  return isJsonObject(fn) && typeof fn.name === 'string' && fn.name.length > 0;
}
