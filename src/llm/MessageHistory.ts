/**
 * MessageHistory - Conversation state management
 *
 * An ordered, append-only transcript replayed to the model every round.
 * Nothing is pruned automatically. Tool result messages are checked on the
 * way in: each must answer a call made by the most recent assistant message.
 *
 * Messages follow the OpenAI format with roles: system, user, assistant, tool
 */

import type { Message, MessageRole, ToolCall } from '../types/index.js';

/**
 * The message log would no longer be a valid transcript
 */
export class TranscriptError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TranscriptError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export interface MessageHistoryStats {
  messageCount: number;
  hasSystemMessage: boolean;
  toolCallCount: number;
  messagesByRole: Record<MessageRole, number>;
}

export class MessageHistory {
  private messages: Message[] = [];

  /**
   * @example
   * ```typescript
   * const history = new MessageHistory();
   * history.addMessage({ role: 'user', content: 'What is 7 + 2?' });
   * ```
   */
  constructor(messages: Message[] = []) {
    this.addMessages(messages);
  }

  /**
   * Add a message to the history
   *
   * @throws TranscriptError if a tool message does not answer a call of the
   *   most recent assistant message, or answers one twice
   */
  addMessage(message: Message): void {
    if (message.role === 'tool') {
      this.checkToolResult(message);
    }
    this.messages.push(message);
  }

  /**
   * Add multiple messages in order
   */
  addMessages(messages: readonly Message[]): void {
    for (const message of messages) {
      this.addMessage(message);
    }
  }

  /**
   * Get all messages in the history
   */
  getMessages(): Message[] {
    return [...this.messages];
  }

  /**
   * Get the last N messages
   */
  getLastMessages(count: number): Message[] {
    if (count <= 0) {
      return [];
    }
    return this.messages.slice(-count);
  }

  /**
   * Set the system prompt
   *
   * Replaces message 0 when it is a system message, otherwise inserts the
   * system message at the front.
   */
  insertSystemMessage(content: string): void {
    const systemMessage: Message = { role: 'system', content };
    if (this.messages[0]?.role === 'system') {
      this.messages[0] = systemMessage;
    } else {
      this.messages.unshift(systemMessage);
    }
  }

  getSystemMessage(): Message | undefined {
    const first = this.messages[0];
    return first?.role === 'system' ? first : undefined;
  }

  /**
   * Clear all messages
   *
   * @param keepSystemMessage - Keep a leading system message
   */
  clear(keepSystemMessage = false): void {
    const systemMessage = keepSystemMessage ? this.getSystemMessage() : undefined;
    this.messages = systemMessage ? [systemMessage] : [];
  }

  get messageCount(): number {
    return this.messages.length;
  }

  /**
   * Tool calls of the most recent assistant message that have no result yet
   */
  getUnansweredToolCalls(): ToolCall[] {
    const index = this.findLastAssistantIndex();
    if (index === -1) {
      return [];
    }
    const calls = this.messages[index]?.tool_calls ?? [];
    const answered = new Set(
      this.messages.slice(index + 1).flatMap(m => (m.role === 'tool' && m.tool_call_id ? [m.tool_call_id] : []))
    );
    return calls.filter(call => !answered.has(call.id));
  }

  /**
   * Get message statistics
   */
  getStats(): MessageHistoryStats {
    const messagesByRole: Record<MessageRole, number> = { system: 0, user: 0, assistant: 0, tool: 0 };
    let toolCallCount = 0;

    for (const message of this.messages) {
      messagesByRole[message.role] += 1;
      toolCallCount += message.tool_calls?.length ?? 0;
    }

    return {
      messageCount: this.messageCount,
      hasSystemMessage: this.getSystemMessage() !== undefined,
      toolCallCount,
      messagesByRole,
    };
  }

  /**
   * Get a formatted summary of the history
   */
  getSummary(): string {
    const stats = this.getStats();
    return [
      `Messages: ${stats.messageCount}`,
      `Tool calls: ${stats.toolCallCount}`,
      `System: ${stats.hasSystemMessage ? 'Yes' : 'No'}`,
    ].join(' | ');
  }

  /**
   * Export messages to JSON
   */
  toJSON(): Message[] {
    return this.getMessages();
  }

  /**
   * Load messages from JSON, replacing the current history
   *
   * @throws TranscriptError if the messages do not form a valid transcript;
   *   the current history is left unchanged
   */
  fromJSON(messages: Message[]): void {
    const loaded = new MessageHistory(messages);
    this.messages = loaded.messages;
  }

  private findLastAssistantIndex(): number {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      if (this.messages[i]?.role === 'assistant') {
        return i;
      }
    }
    return -1;
  }

  private checkToolResult(message: Message): void {
    const callId = message.tool_call_id;
    if (!callId) {
      throw new TranscriptError('Tool result message has no tool_call_id');
    }

    const index = this.findLastAssistantIndex();
    const between = index === -1 ? undefined : this.messages.slice(index + 1).find(m => m.role !== 'tool');
    if (between) {
      throw new TranscriptError(
        `Tool result for '${callId}' must follow the assistant message that requested it, not a ${between.role} message`
      );
    }

    const pending = this.getUnansweredToolCalls();
    if (pending.some(call => call.id === callId)) {
      return;
    }

    const calls = index === -1 ? [] : (this.messages[index]?.tool_calls ?? []);
    if (calls.some(call => call.id === callId)) {
      throw new TranscriptError(`Tool call '${callId}' has already been answered`);
    }
    throw new TranscriptError(
      `Tool result references '${callId}', which is not a call of the most recent assistant message`
    );
  }
}
