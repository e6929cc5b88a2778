/**
 * Tests for MessageHistory
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { MessageHistory, TranscriptError } from '../MessageHistory.js';
import type { Message } from '../../types/index.js';

const assistantWithCalls: Message = {
  role: 'assistant',
  content: null,
  tool_calls: [
    { id: 'call_1', type: 'function', function: { name: 'add', arguments: { a: 1, b: 2 } } },
    { id: 'call_2', type: 'function', function: { name: 'add', arguments: { a: 3, b: 4 } } },
  ],
};

describe('MessageHistory', () => {
  let history: MessageHistory;

  beforeEach(() => {
    history = new MessageHistory();
  });

  describe('appending', () => {
    it('should keep insertion order', () => {
      history.addMessage({ role: 'user', content: 'one' });
      history.addMessages([
        { role: 'assistant', content: 'two' },
        { role: 'user', content: 'three' },
      ]);

      expect(history.getMessages().map(m => m.content)).toEqual(['one', 'two', 'three']);
      expect(history.messageCount).toBe(3);
    });

    it('should never prune', () => {
      for (let i = 0; i < 2000; i++) {
        history.addMessage({ role: 'user', content: `message ${i}` });
      }
      expect(history.messageCount).toBe(2000);
    });

    it('should return a copy of the log', () => {
      history.addMessage({ role: 'user', content: 'one' });
      history.getMessages().push({ role: 'user', content: 'sneaky' });

      expect(history.messageCount).toBe(1);
    });

    it('should return the last N messages', () => {
      history.addMessages([
        { role: 'user', content: 'a' },
        { role: 'assistant', content: 'b' },
        { role: 'user', content: 'c' },
      ]);

      expect(history.getLastMessages(2).map(m => m.content)).toEqual(['b', 'c']);
      expect(history.getLastMessages(0)).toEqual([]);
    });
  });

  describe('tool results', () => {
    beforeEach(() => {
      history.addMessage({ role: 'user', content: 'Add things' });
      history.addMessage(assistantWithCalls);
    });

    it('should accept results for calls of the last assistant message', () => {
      history.addMessage({ role: 'tool', tool_call_id: 'call_2', name: 'add', content: '7' });
      history.addMessage({ role: 'tool', tool_call_id: 'call_1', name: 'add', content: '3' });

      expect(history.messageCount).toBe(4);
      expect(history.getUnansweredToolCalls()).toEqual([]);
    });

    it('should reject results for unknown calls', () => {
      expect(() => history.addMessage({ role: 'tool', tool_call_id: 'call_9', name: 'add', content: '0' })).toThrow(
        TranscriptError
      );
      expect(history.messageCount).toBe(2);
    });

    it('should reject results without a call id', () => {
      expect(() => history.addMessage({ role: 'tool', name: 'add', content: '0' })).toThrow(
        'Tool result message has no tool_call_id'
      );
    });

    it('should reject a second result for the same call', () => {
      history.addMessage({ role: 'tool', tool_call_id: 'call_1', name: 'add', content: '3' });

      expect(() => history.addMessage({ role: 'tool', tool_call_id: 'call_1', name: 'add', content: '3' })).toThrow(
        "Tool call 'call_1' has already been answered"
      );
    });

    it('should reject results for calls of an earlier assistant message', () => {
      history.addMessage({ role: 'tool', tool_call_id: 'call_1', name: 'add', content: '3' });
      history.addMessage({ role: 'tool', tool_call_id: 'call_2', name: 'add', content: '7' });
      history.addMessage({ role: 'assistant', content: 'Done' });

      expect(() => history.addMessage({ role: 'tool', tool_call_id: 'call_1', name: 'add', content: '3' })).toThrow(
        TranscriptError
      );
    });

    it('should reject results that do not directly follow the requesting message', () => {
      history.addMessage({ role: 'user', content: 'Never mind' });

      expect(() => history.addMessage({ role: 'tool', tool_call_id: 'call_1', name: 'add', content: '3' })).toThrow(
        "Tool result for 'call_1' must follow the assistant message that requested it, not a user message"
      );
      expect(history.getMessages().map(message => message.role)).toEqual(['user', 'assistant', 'user']);
    });

    it('should report unanswered calls in order', () => {
      history.addMessage({ role: 'tool', tool_call_id: 'call_1', name: 'add', content: '3' });

      expect(history.getUnansweredToolCalls().map(call => call.id)).toEqual(['call_2']);
    });
  });

  describe('system message', () => {
    it('should insert a system message at the front', () => {
      history.addMessage({ role: 'user', content: 'Hello' });
      history.insertSystemMessage('Be brief.');

      expect(history.getMessages()).toEqual([
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'Hello' },
      ]);
    });

    it('should replace an existing leading system message', () => {
      history.insertSystemMessage('Be brief.');
      history.addMessage({ role: 'user', content: 'Hello' });
      history.insertSystemMessage('Be thorough.');

      expect(history.messageCount).toBe(2);
      expect(history.getSystemMessage()).toEqual({ role: 'system', content: 'Be thorough.' });
    });

    it('should keep the system message when asked on clear', () => {
      history.insertSystemMessage('Be brief.');
      history.addMessage({ role: 'user', content: 'Hello' });

      history.clear(true);
      expect(history.getMessages()).toEqual([{ role: 'system', content: 'Be brief.' }]);

      history.clear();
      expect(history.messageCount).toBe(0);
    });
  });

  describe('stats and serialisation', () => {
    it('should count messages by role and tool calls', () => {
      history.insertSystemMessage('Be brief.');
      history.addMessage({ role: 'user', content: 'Add things' });
      history.addMessage(assistantWithCalls);
      history.addMessage({ role: 'tool', tool_call_id: 'call_1', name: 'add', content: '3' });

      expect(history.getStats()).toEqual({
        messageCount: 4,
        hasSystemMessage: true,
        toolCallCount: 2,
        messagesByRole: { system: 1, user: 1, assistant: 1, tool: 1 },
      });
      expect(history.getSummary()).toBe('Messages: 4 | Tool calls: 2 | System: Yes');
    });

    it('should round-trip through JSON', () => {
      history.addMessage({ role: 'user', content: 'Add things' });
      history.addMessage(assistantWithCalls);

      const restored = new MessageHistory();
      restored.fromJSON(JSON.parse(JSON.stringify(history)));

      expect(restored.getMessages()).toEqual(history.getMessages());
    });

    it('should leave the history unchanged when loading an invalid transcript', () => {
      history.addMessage({ role: 'user', content: 'Keep me' });

      expect(() => history.fromJSON([{ role: 'tool', tool_call_id: 'call_1', content: 'orphan' }])).toThrow(
        TranscriptError
      );
      expect(history.getMessages()).toEqual([{ role: 'user', content: 'Keep me' }]);
    });
  });
});
