/**
 * ModelClient - Abstract interface for LLM providers
 *
 * Defines the contract the reasoning loop relies on: one request/response
 * round-trip per call, carrying the transcript and the tool definitions.
 * A client never mutates the transcript it is given.
 *
 * @example
 * ```typescript
 * const client = new OpenAIClient({ endpoint: 'https://openrouter.ai/api/v1', modelName: 'openai/gpt-4o-mini' });
 * const response = await client.send(messages, { functions });
 * ```
 */

import type { FunctionDefinition, Message, ToolCall } from '../types/index.js';

/**
 * Options for sending messages to the LLM
 */
export interface SendOptions {
  /** Function definitions for tool calling */
  functions?: FunctionDefinition[];
  /** Temperature for this request; overrides the client's default */
  temperature?: number | null;
  /** Aborts the in-flight request and any pending retry */
  signal?: AbortSignal;
}

export interface TokenUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

/**
 * Response from the LLM: a single assistant message
 */
export interface LLMResponse {
  role: 'assistant';
  content: string | null;
  /** Tool calls requested by the model, arguments already parsed */
  tool_calls?: ToolCall[];
  finish_reason?: string;
  usage?: TokenUsage;
}

/**
 * Configuration for model client initialization
 */
export interface ModelClientConfig {
  /** API base URL, e.g. https://openrouter.ai/api/v1 */
  endpoint: string;
  /** Model identifier */
  modelName: string;
  /** Bearer credential, sent as-is */
  apiKey?: string | null;
  /** Default sampling temperature; null lets the provider decide */
  temperature?: number | null;
  /** Per-request timeout in milliseconds */
  requestTimeoutMs?: number;
  /** Retries for transient failures */
  maxRetries?: number;
  /** Base delay of the exponential backoff in milliseconds */
  retryDelayMs?: number;
}

export interface ModelClientErrorOptions {
  httpStatus?: number;
  retryable?: boolean;
  suggestions?: string[];
  cause?: unknown;
}

/**
 * The model endpoint could not produce a reply
 */
export class ModelClientError extends Error {
  readonly httpStatus?: number;
  readonly retryable: boolean;
  readonly suggestions: string[];

  constructor(message: string, options: ModelClientErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'ModelClientError';
    this.httpStatus = options.httpStatus;
    this.retryable = options.retryable ?? false;
    this.suggestions = options.suggestions ?? [];
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Abstract base class for LLM clients
 *
 * Implementations must handle:
 * - Message sending with function calling support
 * - Error handling and retry logic
 * - Cancellation through the AbortSignal in SendOptions
 */
export abstract class ModelClient {
  /**
   * Send messages to the LLM and receive a response
   *
   * @throws ModelClientError when the endpoint fails for good
   */
  abstract send(messages: readonly Message[], options?: SendOptions): Promise<LLMResponse>;

  abstract get modelName(): string;

  abstract get endpoint(): string;

  /**
   * Close the client and cleanup resources
   */
  async close(): Promise<void> {
    // Nothing to release by default
  }
}
