/**
 * Tests for OpenAIClient
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { OpenAIClient, toWireMessage } from '../OpenAIClient.js';
import { ModelClientError } from '../ModelClient.js';
import type { FunctionDefinition, Message } from '../../types/index.js';

const mockFetch = vi.fn();

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body,
    text: async () => JSON.stringify(body),
  };
}

function completion(message: Record<string, unknown>, extra: Record<string, unknown> = {}) {
  return jsonResponse({ choices: [{ message: { role: 'assistant', ...message }, finish_reason: 'stop' }], ...extra });
}

function errorName(error: unknown): string | undefined {
  return error instanceof Error ? error.name : undefined;
}

function sentBody(callIndex = 0): Record<string, unknown> {
  const init = mockFetch.mock.calls[callIndex]?.[1];
  return JSON.parse(init.body);
}

const addFunction: FunctionDefinition = {
  type: 'function',
  function: {
    name: 'add',
    description: 'Add two numbers',
    parameters: {
      type: 'object',
      properties: { a: { type: 'number' }, b: { type: 'number' } },
      required: ['a', 'b'],
    },
  },
};

describe('OpenAIClient', () => {
  let client: OpenAIClient;

  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
    mockFetch.mockReset();
    client = new OpenAIClient({
      endpoint: 'https://models.example.test/v1/',
      modelName: 'test-model',
      apiKey: 'test-secret',
      temperature: 0.2,
      maxRetries: 2,
      retryDelayMs: 0,
    });
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe('Initialization', () => {
    it('should strip trailing slashes from the endpoint', () => {
      expect(client.endpoint).toBe('https://models.example.test/v1');
      expect(client.modelName).toBe('test-model');
    });
  });

  describe('Requests', () => {
    it('should POST the chat completions payload', async () => {
      mockFetch.mockResolvedValueOnce(completion({ content: 'Hi' }));

      await client.send([{ role: 'user', content: 'Hello' }], { functions: [addFunction] });

      const [url, init] = mockFetch.mock.calls[0] ?? [];
      expect(url).toBe('https://models.example.test/v1/chat/completions');
      expect(init.method).toBe('POST');
      expect(init.headers).toEqual({
        'Content-Type': 'application/json',
        Authorization: 'Bearer test-secret',
      });
      expect(sentBody()).toEqual({
        model: 'test-model',
        messages: [{ role: 'user', content: 'Hello' }],
        temperature: 0.2,
        tools: [addFunction],
        tool_choice: 'auto',
      });
    });

    it('should omit tools and temperature when not set', async () => {
      const plain = new OpenAIClient({ endpoint: 'https://models.example.test/v1', modelName: 'test-model' });
      mockFetch.mockResolvedValueOnce(completion({ content: 'Hi' }));

      await plain.send([{ role: 'user', content: 'Hello' }], { functions: [] });

      expect(sentBody()).toEqual({
        model: 'test-model',
        messages: [{ role: 'user', content: 'Hello' }],
      });
      expect(mockFetch.mock.calls[0]?.[1].headers).toEqual({ 'Content-Type': 'application/json' });
    });

    it('should let the per-request temperature win', async () => {
      mockFetch.mockResolvedValueOnce(completion({ content: 'Hi' }));

      await client.send([{ role: 'user', content: 'Hello' }], { temperature: 0.9 });

      expect(sentBody().temperature).toBe(0.9);
    });

    it('should serialise tool call arguments as JSON strings', async () => {
      mockFetch.mockResolvedValueOnce(completion({ content: '9' }));
      const messages: Message[] = [
        { role: 'user', content: 'What is 7 + 2?' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'add', arguments: { a: 7, b: 2 } } }],
        },
        { role: 'tool', tool_call_id: 'call_1', name: 'add', content: '9' },
      ];

      await client.send(messages);

      expect(sentBody().messages).toEqual([
        { role: 'user', content: 'What is 7 + 2?' },
        {
          role: 'assistant',
          content: null,
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'add', arguments: '{"a":7,"b":2}' } }],
        },
        { role: 'tool', tool_call_id: 'call_1', content: '9' },
      ]);
    });
  });

  describe('Responses', () => {
    it('should return the assistant message', async () => {
      mockFetch.mockResolvedValueOnce(
        completion({ content: 'Hello! How can I help?' }, { usage: { prompt_tokens: 5, completion_tokens: 6, total_tokens: 11 } })
      );

      const result = await client.send([{ role: 'user', content: 'Hello' }]);

      expect(result).toEqual({
        role: 'assistant',
        content: 'Hello! How can I help?',
        finish_reason: 'stop',
        usage: { prompt_tokens: 5, completion_tokens: 6, total_tokens: 11 },
      });
    });

    it('should parse tool call arguments', async () => {
      mockFetch.mockResolvedValueOnce(
        completion({
          content: null,
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'add', arguments: '{"a": 7, "b": 2}' } }],
        })
      );

      const result = await client.send([{ role: 'user', content: 'Add' }]);

      expect(result.content).toBeNull();
      expect(result.tool_calls).toEqual([
        { id: 'call_1', type: 'function', function: { name: 'add', arguments: { a: 7, b: 2 } } },
      ]);
    });

    it('should replace invalid argument JSON with an empty object', async () => {
      mockFetch.mockResolvedValueOnce(
        completion({
          content: null,
          tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'add', arguments: '{"a": 7,' } }],
        })
      );

      const result = await client.send([{ role: 'user', content: 'Add' }]);

      expect(result.tool_calls?.[0]?.function.arguments).toEqual({});
    });

    it('should drop malformed tool calls', async () => {
      mockFetch.mockResolvedValueOnce(
        completion({
          content: 'partial',
          tool_calls: [{ type: 'function', function: { name: 'add', arguments: '{}' } }],
        })
      );

      const result = await client.send([{ role: 'user', content: 'Add' }]);

      expect(result.tool_calls).toBeUndefined();
    });

    it('should convert a legacy function_call', async () => {
      mockFetch.mockResolvedValueOnce(
        completion({ content: null, function_call: { name: 'add', arguments: '{"a": 1, "b": 2}' } })
      );

      const result = await client.send([{ role: 'user', content: 'Add' }]);

      expect(result.tool_calls).toHaveLength(1);
      expect(result.tool_calls?.[0]?.function).toEqual({ name: 'add', arguments: { a: 1, b: 2 } });
      expect(result.tool_calls?.[0]?.id).toMatch(/^call-/);
    });

    it('should raise endpoint errors reported in the body', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ error: { message: 'model not found' } }));

      await expect(client.send([{ role: 'user', content: 'Hi' }])).rejects.toThrow('Endpoint error: model not found');
    });
  });

  describe('Retries', () => {
    it('should retry retryable HTTP statuses', async () => {
      mockFetch
        .mockResolvedValueOnce(jsonResponse({ error: 'busy' }, 503))
        .mockResolvedValueOnce(completion({ content: 'Recovered' }));

      const result = await client.send([{ role: 'user', content: 'Hello' }]);

      expect(result.content).toBe('Recovered');
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should retry network errors', async () => {
      mockFetch
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(completion({ content: 'Recovered' }));

      const result = await client.send([{ role: 'user', content: 'Hello' }]);

      expect(result.content).toBe('Recovered');
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('should give up after maxRetries', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ error: 'down' }, 500));

      const error = await client.send([{ role: 'user', content: 'Hello' }]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ModelClientError);
      expect(error).toMatchObject({ httpStatus: 500, retryable: true });
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('should not retry other HTTP statuses', async () => {
      mockFetch.mockResolvedValue(jsonResponse({ error: 'unauthorized' }, 401));

      const error = await client.send([{ role: 'user', content: 'Hello' }]).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ModelClientError);
      expect(error).toMatchObject({ httpStatus: 401, retryable: false });
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('should wrap non-retryable failures in ModelClientError', async () => {
      mockFetch.mockRejectedValueOnce(new Error('socket hang up'));

      await expect(client.send([{ role: 'user', content: 'Hello' }])).rejects.toThrow(
        'Request to https://models.example.test/v1/chat/completions failed: socket hang up'
      );
    });
  });

  describe('Cancellation', () => {
    it('should not send when the signal is already aborted', async () => {
      const controller = new AbortController();
      controller.abort();

      const error = await client.send([{ role: 'user', content: 'Hello' }], { signal: controller.signal }).catch((e: unknown) => e);

      expect(errorName(error)).toBe('AbortError');
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should pass an abort through without retrying', async () => {
      const controller = new AbortController();
      mockFetch.mockImplementationOnce(async () => {
        controller.abort();
        throw controller.signal.reason;
      });

      const error = await client.send([{ role: 'user', content: 'Hello' }], { signal: controller.signal }).catch((e: unknown) => e);

      expect(errorName(error)).toBe('AbortError');
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });
  });

  describe('toWireMessage', () => {
    it('should keep plain messages unchanged', () => {
      expect(toWireMessage({ role: 'system', content: 'Be brief.' })).toEqual({ role: 'system', content: 'Be brief.' });
    });
  });
});
