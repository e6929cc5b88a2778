/**
 * OpenAIClient - OpenAI-compatible chat completions client with function calling
 *
 * Handles communication with any endpoint speaking the OpenAI
 * `/chat/completions` wire format (OpenRouter, OpenAI, local gateways):
 * - Function calling, with tool call arguments serialised to JSON strings on
 *   the way out and parsed back on the way in
 * - Legacy `function_call` replies converted to tool calls
 * - Retry with capped exponential backoff (network errors, timeouts,
 *   HTTP 429/500/502/503, malformed JSON bodies)
 * - Per-request timeout and caller cancellation via AbortController
 */

import {
  ModelClient,
  ModelClientConfig,
  ModelClientError,
  SendOptions,
  LLMResponse,
  TokenUsage,
} from './ModelClient.js';
import type { FunctionDefinition, Message, ToolCall } from '../types/index.js';
import { isJsonObject, isValidToolCall, parseToolCallArguments } from './FunctionCalling.js';
import { logger } from '../services/Logger.js';
import { formatError, isAbortError, isNetworkError } from '../utils/errorUtils.js';
import { generatePrefixedId } from '../utils/id.js';
import { API_TIMEOUTS, RETRY_CONFIG, TIME_UNITS } from '../config/constants.js';

/**
 * Message as sent on the wire: tool call arguments are JSON strings
 */
interface WireMessage {
  role: Message['role'];
  content: string | null;
  tool_call_id?: string;
  tool_calls?: Array<{
    id: string;
    type: 'function';
    function: { name: string; arguments: string };
  }>;
}

/**
 * Chat completions payload structure
 */
interface ChatCompletionPayload {
  model: string;
  messages: WireMessage[];
  tools?: FunctionDefinition[];
  tool_choice?: 'auto';
  temperature?: number;
}

/**
 * Convert a transcript message to its wire form
 */
export function toWireMessage(message: Message): WireMessage {
  const wire: WireMessage = { role: message.role, content: message.content };
  if (message.role === 'tool' && message.tool_call_id) {
    wire.tool_call_id = message.tool_call_id;
  }
  if (message.tool_calls && message.tool_calls.length > 0) {
    wire.tool_calls = message.tool_calls.map(call => ({
      id: call.id,
      type: 'function',
      function: {
        name: call.function.name,
        arguments: JSON.stringify(call.function.arguments),
      },
    }));
  }
  return wire;
}

function suggestionsFor(httpStatus: number | undefined, message: string): string[] {
  if (httpStatus === 401 || httpStatus === 403) {
    return ['Check the API key (OPENROUTER_API_KEY or OPENAI_API_KEY, or api_key in config.json)'];
  }
  if (httpStatus === 404) {
    return ['Check that the endpoint URL and model name are correct'];
  }
  if (httpStatus === 429) {
    return ['The endpoint is rate limiting requests; wait and try again, or raise max_retries'];
  }
  if (message.includes('ECONNREFUSED') || message.includes('ENOTFOUND')) {
    return ['Check that the endpoint URL is reachable'];
  }
  return [];
}

export class OpenAIClient extends ModelClient {
  private readonly _endpoint: string;
  private _modelName: string;
  private readonly apiKey: string | null;
  private readonly temperature: number | null;
  private readonly requestTimeoutMs: number;
  private readonly maxRetries: number;
  private readonly retryDelayMs: number;
  private readonly apiUrl: string;

  // Track active requests for cancellation (keyed by request ID)
  private activeRequests: Map<string, AbortController> = new Map();

  /**
   * @example
   * ```typescript
   * const client = new OpenAIClient({
   *   endpoint: 'https://openrouter.ai/api/v1',
   *   modelName: 'openai/gpt-4o-mini',
   *   apiKey: process.env.OPENROUTER_API_KEY,
   * });
   * ```
   */
  constructor(config: ModelClientConfig) {
    super();
    this._endpoint = config.endpoint.replace(/\/+$/, '');
    this._modelName = config.modelName;
    this.apiKey = config.apiKey ?? null;
    this.temperature = config.temperature ?? null;
    this.requestTimeoutMs = config.requestTimeoutMs ?? API_TIMEOUTS.LLM_REQUEST_DEFAULT;
    this.maxRetries = config.maxRetries ?? RETRY_CONFIG.DEFAULT_MAX_RETRIES;
    this.retryDelayMs = config.retryDelayMs ?? TIME_UNITS.MS_PER_SECOND;
    this.apiUrl = `${this._endpoint}/chat/completions`;
  }

  get modelName(): string {
    return this._modelName;
  }

  get endpoint(): string {
    return this._endpoint;
  }

  /**
   * Update the model name at runtime
   */
  setModelName(newModelName: string): void {
    logger.debug(`[OPENAI_CLIENT] Changing model from ${this._modelName} to ${newModelName}`);
    this._modelName = newModelName;
  }

  /**
   * Cancel all ongoing requests
   */
  cancel(): void {
    logger.debug('[OPENAI_CLIENT] Cancelling', this.activeRequests.size, 'active requests');
    for (const controller of this.activeRequests.values()) {
      controller.abort();
    }
    this.activeRequests.clear();
  }

  async close(): Promise<void> {
    this.cancel();
  }

  /**
   * Send messages and receive the assistant's reply
   *
   * Transient failures are retried up to maxRetries times with capped
   * exponential backoff. An abort through options.signal rejects with the
   * AbortError unchanged.
   *
   * @throws ModelClientError when the request fails for good
   */
  async send(messages: readonly Message[], options: SendOptions = {}): Promise<LLMResponse> {
    const { signal } = options;
    const requestId = generatePrefixedId('req');
    const payload = this.preparePayload(messages, options);
    logger.debug('[OPENAI_CLIENT] Starting request:', requestId, `(${messages.length} messages)`);

    let attempt = 0;
    while (true) {
      signal?.throwIfAborted();
      try {
        const response = await this.executeRequest(requestId, payload, signal);
        logger.debug('[OPENAI_CLIENT] Request complete:', requestId, response.finish_reason ?? '');
        return response;
      } catch (error) {
        if (signal?.aborted) {
          logger.debug('[OPENAI_CLIENT] Request aborted:', requestId);
          throw error;
        }

        const retryable = error instanceof ModelClientError ? error.retryable : isNetworkError(error);
        if (!retryable || attempt >= this.maxRetries) {
          if (retryable) {
            logger.warn(`[OPENAI_CLIENT] Giving up on request ${requestId} after ${attempt} retries`);
          }
          throw this.toModelClientError(error);
        }

        const backoffMs = Math.min(
          this.retryDelayMs * Math.pow(2, attempt),
          RETRY_CONFIG.MAX_BACKOFF_SECONDS * TIME_UNITS.MS_PER_SECOND
        );
        logger.debug(
          `[OPENAI_CLIENT] ${formatError(error)} on request ${requestId}, retrying in ${backoffMs}ms (attempt ${attempt + 1}/${this.maxRetries})`
        );
        await this.sleep(backoffMs, signal);
        attempt++;
      }
    }
  }

  /**
   * Prepare the chat completions payload
   */
  private preparePayload(messages: readonly Message[], options: SendOptions): ChatCompletionPayload {
    const payload: ChatCompletionPayload = {
      model: this._modelName,
      messages: messages.map(toWireMessage),
    };

    const temperature = options.temperature ?? this.temperature;
    if (temperature !== null) {
      payload.temperature = temperature;
    }

    if (options.functions && options.functions.length > 0) {
      payload.tools = options.functions;
      payload.tool_choice = 'auto';
    }

    return payload;
  }

  /**
   * Execute one HTTP request with timeout and cancellation support
   */
  private async executeRequest(
    requestId: string,
    payload: ChatCompletionPayload,
    signal?: AbortSignal
  ): Promise<LLMResponse> {
    const abortController = new AbortController();
    this.activeRequests.set(requestId, abortController);

    const onAbort = () => abortController.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      abortController.abort();
    }, this.requestTimeoutMs);

    try {
      const headers: Record<string, string> = { 'Content-Type': 'application/json' };
      if (this.apiKey) {
        headers.Authorization = `Bearer ${this.apiKey}`;
      }

      let response: Response;
      try {
        response = await fetch(this.apiUrl, {
          method: 'POST',
          headers,
          body: JSON.stringify(payload),
          signal: abortController.signal,
        });
      } catch (error) {
        if (timedOut) {
          throw new ModelClientError(`Request timed out after ${this.requestTimeoutMs}ms`, {
            retryable: true,
            cause: error,
          });
        }
        throw error;
      }

      if (!response.ok) {
        const errorText = await response.text();
        const status = response.status;
        throw new ModelClientError(`HTTP ${status}: ${errorText}`, {
          httpStatus: status,
          retryable: RETRY_CONFIG.RETRYABLE_HTTP_STATUSES.includes(status),
          suggestions: suggestionsFor(status, errorText),
        });
      }

      let data: unknown;
      try {
        data = await response.json();
      } catch (error) {
        if (isAbortError(error)) {
          throw error;
        }
        throw new ModelClientError('Endpoint returned a body that is not valid JSON', {
          retryable: true,
          cause: error,
        });
      }
      return this.parseResponse(data);
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      this.activeRequests.delete(requestId);
    }
  }

  /**
   * Parse a chat completions body into an assistant message
   */
  private parseResponse(data: unknown): LLMResponse {
    if (!isJsonObject(data)) {
      throw new ModelClientError('Endpoint returned an unexpected response body');
    }

    if (isJsonObject(data.error)) {
      const message = typeof data.error.message === 'string' ? data.error.message : JSON.stringify(data.error);
      throw new ModelClientError(`Endpoint error: ${message}`);
    }

    const choices = Array.isArray(data.choices) ? data.choices : [];
    const choice = choices[0];
    if (!isJsonObject(choice) || !isJsonObject(choice.message)) {
      throw new ModelClientError('Endpoint response contains no choices');
    }

    const message = choice.message;
    const result: LLMResponse = {
      role: 'assistant',
      content: typeof message.content === 'string' ? message.content : null,
    };

    const toolCalls = this.parseToolCalls(message.tool_calls, message.function_call);
    if (toolCalls.length > 0) {
      result.tool_calls = toolCalls;
    }

    if (typeof choice.finish_reason === 'string') {
      result.finish_reason = choice.finish_reason;
    }

    if (isJsonObject(data.usage)) {
      const usage: TokenUsage = {};
      const { prompt_tokens, completion_tokens, total_tokens } = data.usage;
      if (typeof prompt_tokens === 'number') usage.prompt_tokens = prompt_tokens;
      if (typeof completion_tokens === 'number') usage.completion_tokens = completion_tokens;
      if (typeof total_tokens === 'number') usage.total_tokens = total_tokens;
      result.usage = usage;
    }

    return result;
  }

  /**
   * Parse tool calls, converting a legacy function_call when present
   *
   * Calls without an id, type or function name are dropped with a warning.
   */
  private parseToolCalls(rawToolCalls: unknown, legacyFunctionCall: unknown): ToolCall[] {
    const toolCalls: ToolCall[] = [];

    if (Array.isArray(rawToolCalls)) {
      for (const raw of rawToolCalls) {
        if (!isValidToolCall(raw)) {
          logger.warn('[OPENAI_CLIENT] Dropping malformed tool call:', raw);
          continue;
        }
        toolCalls.push({
          id: raw.id,
          type: 'function',
          function: {
            name: raw.function.name,
            arguments: parseToolCallArguments(raw.function.arguments),
          },
        });
      }
    }

    if (toolCalls.length === 0 && isJsonObject(legacyFunctionCall) && typeof legacyFunctionCall.name === 'string') {
      logger.debug('[OPENAI_CLIENT] Converting legacy function_call to tool_calls');
      toolCalls.push({
        id: generatePrefixedId('call'),
        type: 'function',
        function: {
          name: legacyFunctionCall.name,
          arguments: parseToolCallArguments(legacyFunctionCall.arguments),
        },
      });
    }

    return toolCalls;
  }

  private toModelClientError(error: unknown): ModelClientError {
    if (error instanceof ModelClientError) {
      return error;
    }
    const message = formatError(error);
    return new ModelClientError(`Request to ${this.apiUrl} failed: ${message}`, {
      cause: error,
      suggestions: suggestionsFor(undefined, message),
    });
  }

  /**
   * Sleep for the backoff delay, waking early if the signal aborts
   */
  private sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      const onAbort = () => {
        clearTimeout(timer);
        reject(signal?.reason);
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
