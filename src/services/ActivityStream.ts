/**
 * ActivityStream - Event stream for agent runs, tool calls and providers
 *
 * Lets the CLI (or any embedding program) observe the reasoning loop without
 * the loop knowing who is listening.
 */

import { ActivityEvent, ActivityEventType, ActivityCallback } from '../types/index.js';
import { generatePrefixedId } from '../utils/id.js';
import { logger } from './Logger.js';

export class ActivityStream {
  private listeners: Map<ActivityEventType | '*', Set<ActivityCallback>>;
  private parentId?: string;

  /**
   * Listener count per event type above which a leak warning is logged
   */
  private readonly MAX_LISTENERS_PER_TYPE = 50;

  constructor(parentId?: string) {
    this.listeners = new Map();
    this.parentId = parentId;
  }

  /**
   * Emit an event to type-specific listeners, then wildcard listeners
   *
   * A throwing listener is logged and does not stop delivery to the others.
   */
  emit(event: ActivityEvent): void {
    if (this.parentId && !event.parentId) {
      event.parentId = this.parentId;
    }

    const typeListeners = this.listeners.get(event.type);
    const wildcardListeners = this.listeners.get('*');

    for (const callbacks of [typeListeners, wildcardListeners]) {
      if (!callbacks) continue;
      for (const callback of callbacks) {
        try {
          callback(event);
        } catch (error) {
          logger.error('[ACTIVITY_STREAM] Error in activity stream listener:', error);
        }
      }
    }
  }

  /**
   * Build and emit an event with a fresh id and timestamp
   */
  publish(type: ActivityEventType, data: Record<string, unknown> = {}, id?: string): ActivityEvent {
    const event: ActivityEvent = {
      id: id ?? generatePrefixedId('evt'),
      type,
      timestamp: Date.now(),
      data,
    };
    this.emit(event);
    return event;
  }

  /**
   * Subscribe to a specific event type, or '*' for all events
   *
   * @returns Unsubscribe function
   *
   * @example
   * ```typescript
   * const unsubscribe = stream.subscribe(ActivityEventType.TOOL_CALL_START, (event) => {
   *   console.log('Tool started:', event.data.toolName);
   * });
   * unsubscribe();
   * ```
   */
  subscribe(eventType: ActivityEventType | '*', callback: ActivityCallback): () => void {
    let callbacks = this.listeners.get(eventType);
    if (!callbacks) {
      callbacks = new Set();
      this.listeners.set(eventType, callbacks);
    }
    callbacks.add(callback);

    if (callbacks.size > this.MAX_LISTENERS_PER_TYPE) {
      logger.warn(
        `[ACTIVITY_STREAM] High listener count (${callbacks.size}) for event type '${eventType}'. ` +
        `Ensure all subscribers call unsubscribe() when done.`
      );
    }

    const registered = callbacks;
    return () => {
      registered.delete(callback);
      if (registered.size === 0) {
        this.listeners.delete(eventType);
      }
    };
  }

  /**
   * Create a stream whose events carry the given parent id
   */
  createScoped(parentId: string): ActivityStream {
    return new ActivityStream(parentId);
  }

  getParentId(): string | undefined {
    return this.parentId;
  }

  /**
   * Remove all listeners
   */
  cleanup(): void {
    const total = this.getListenerCount();
    if (total > 0) {
      logger.debug(`[ACTIVITY_STREAM] Removing ${total} listeners across ${this.listeners.size} event types`);
    }
    this.listeners.clear();
  }

  getListenerCount(): number {
    let count = 0;
    this.listeners.forEach(callbacks => {
      count += callbacks.size;
    });
    return count;
  }
}
