/**
 * LLM Integration Layer
 *
 * Main exports:
 * - ModelClient: Abstract base class for LLM clients
 * - OpenAIClient: OpenAI-compatible chat completions implementation
 * - MessageHistory: Conversation state management
 * - FunctionCalling utilities: tool call parsing and validation
 */

// Core abstractions
export { ModelClient, ModelClientError } from './ModelClient.js';
export type { LLMResponse, ModelClientConfig, ModelClientErrorOptions, SendOptions, TokenUsage } from './ModelClient.js';

// Implementations
export { OpenAIClient, toWireMessage } from './OpenAIClient.js';

// Message management
export { MessageHistory, TranscriptError } from './MessageHistory.js';
export type { MessageHistoryStats } from './MessageHistory.js';

// Function calling utilities
export {
  parseToolCallArguments,
  createToolResultMessage,
  hasToolCalls,
  isJsonObject,
  isValidToolCall,
} from './FunctionCalling.js';
