/**
 * Core type definitions for tool-agents
 */

// ===========================
// JSON Types
// ===========================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

// ===========================
// Message Types
// ===========================

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface Message {
  role: MessageRole;
  content: string | null;
  name?: string; // Tool name on tool-result messages
  tool_call_id?: string; // Only on tool-result messages
  tool_calls?: ToolCall[]; // Only on assistant messages
}

// ===========================
// Tool Types
// ===========================

export interface ToolCall {
  id: string;
  type: 'function';
  function: {
    name: string;
    arguments: Record<string, JsonValue>;
  };
}

export type ParameterType = 'string' | 'number' | 'integer' | 'boolean' | 'array' | 'object';

export interface ParameterSchema {
  type?: ParameterType;
  description?: string;
  default?: JsonValue;
  items?: ParameterSchema;
  properties?: Record<string, ParameterSchema>;
  required?: string[];
  enum?: JsonValue[];
  // Provider schemas are passed through verbatim and may carry further keywords
  [keyword: string]: unknown;
}

export interface ToolParameters {
  type: 'object';
  properties: Record<string, ParameterSchema>;
  required: string[];
}

/**
 * The function-calling declaration shown to the model.
 * Identical for local and provider-backed tools.
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  parameters: ToolParameters;
}

export interface FunctionDefinition {
  type: 'function';
  function: ToolDescriptor;
}

/**
 * Invocation function of a tool: argument mapping in, raw result out
 */
export type ToolExecutor = (args: Record<string, JsonValue>) => unknown;

export interface Tool {
  readonly descriptor: ToolDescriptor;
  readonly execute: ToolExecutor;
}

export interface ToolInvocationResult {
  /** Canonical textual form, used as the tool-result message content */
  content: string;
  isError: boolean;
}

// ===========================
// Activity Stream Types
// ===========================

export enum ActivityEventType {
  AGENT_START = 'agent_start',
  AGENT_END = 'agent_end',
  TOOL_CALL_START = 'tool_call_start',
  TOOL_CALL_END = 'tool_call_end',
  ASSISTANT_MESSAGE_COMPLETE = 'assistant_message_complete',
  PROVIDER_CONNECTED = 'provider_connected',
  PROVIDER_DISCONNECTED = 'provider_disconnected',
  ERROR = 'error',
}

export interface ActivityEvent {
  id: string;
  type: ActivityEventType;
  timestamp: number;
  parentId?: string;
  data: Record<string, unknown>;
}

export type ActivityCallback = (event: ActivityEvent) => void;

// ===========================
// Configuration Types
// ===========================

export interface Config {
  // LLM Settings
  model: string | null;
  endpoint: string;
  api_key: string | null;
  temperature: number | null;

  // Execution Settings
  max_iterations: number;
  request_timeout: number; // seconds
  max_retries: number;
  mcp_handshake_timeout: number; // seconds
}

// ===========================
// Service Types
// ===========================

export interface IService {
  initialize(): Promise<void>;
  cleanup(): Promise<void>;
}
