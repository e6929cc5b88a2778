/**
 * Agent - Reasoning loop over a model client and a tool registry
 *
 * Each run alternates between two phases until the model answers without
 * requesting tools or the iteration budget runs out:
 *
 * - reasoning: send the full conversation and the current function
 *   definitions to the model, append its reply
 * - acting: execute the requested tool calls one by one, in the order the
 *   model emitted them, appending one tool message per call
 *
 * Terminal states are `done` (final answer), `aborted` (budget exhausted)
 * and `cancelled` (the caller's AbortSignal fired).
 */

import type { ModelClient } from '../llm/ModelClient.js';
import type { MessageHistory } from '../llm/MessageHistory.js';
import { TranscriptError } from '../llm/MessageHistory.js';
import { createToolResultMessage, hasToolCalls } from '../llm/FunctionCalling.js';
import type { ToolManager } from '../tools/ToolManager.js';
import { ActivityStream } from '../services/ActivityStream.js';
import { logger } from '../services/Logger.js';
import { ActivityEventType } from '../types/index.js';
import type { Message, ToolCall } from '../types/index.js';
import { AGENT_CONFIG, TEXT_LIMITS } from '../config/constants.js';
import { formatError, isAbortError } from '../utils/errorUtils.js';
import { generatePrefixedId } from '../utils/id.js';

export type AgentState = 'reasoning' | 'acting' | 'done' | 'aborted' | 'cancelled';

export type AgentRunStatus = Extract<AgentState, 'done' | 'aborted' | 'cancelled'>;

/**
 * A task is a user prompt, or messages appended as given
 */
export type AgentTask = string | Message | Message[];

export interface AgentConfig {
  /** Iteration budget per run */
  maxIterations?: number;
  /** Sampling temperature passed to every model call */
  temperature?: number | null;
}

export interface RunOptions {
  /** Overrides the configured budget for this run */
  maxIterations?: number;
  /** Cancels the run between iterations and aborts the in-flight model request */
  signal?: AbortSignal;
}

export interface AgentRunResult {
  status: AgentRunStatus;
  /** Final answer, the budget message, or null when cancelled */
  content: string | null;
  /** Completed acting phases */
  iterations: number;
  /** Last assistant message of the run */
  lastMessage: Message | null;
}

const CANCELLED_TOOL_RESULT = 'Error: Tool call cancelled';

export function budgetExhaustedMessage(maxIterations: number): string {
  return `Stopped after reaching the maximum of ${maxIterations} iterations without a final answer.`;
}

function preview(text: string | null, max: number = TEXT_LIMITS.MESSAGE_PREVIEW_MAX): string {
  if (!text) return '';
  return text.length > max ? `${text.slice(0, max)}...` : text;
}

export class Agent {
  readonly instanceId: string;
  private modelClient: ModelClient;
  private toolManager: ToolManager;
  private memory: MessageHistory;
  private activityStream: ActivityStream;
  private config: AgentConfig;

  constructor(
    modelClient: ModelClient,
    toolManager: ToolManager,
    memory: MessageHistory,
    activityStream: ActivityStream = new ActivityStream(),
    config: AgentConfig = {}
  ) {
    this.instanceId = generatePrefixedId('agent');
    this.modelClient = modelClient;
    this.toolManager = toolManager;
    this.memory = memory;
    this.activityStream = activityStream;
    this.config = config;
  }

  /**
   * Run the reasoning loop for a task
   *
   * Tool failures are returned to the model as content and never end the run.
   * Model failures and transcript errors are thrown to the caller.
   *
   * @throws ModelClientError when the endpoint fails for good
   * @throws TranscriptError when the conversation holds unanswered tool calls
   */
  async run(task: AgentTask, options: RunOptions = {}): Promise<AgentRunResult> {
    const maxIterations = options.maxIterations ?? this.config.maxIterations ?? AGENT_CONFIG.DEFAULT_MAX_ITERATIONS;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new RangeError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }
    const { signal } = options;

    // Leave memory untouched when the transcript cannot be continued
    this.ensureNoUnansweredCalls();
    this.appendTask(task);
    this.activityStream.publish(ActivityEventType.AGENT_START, {
      instanceId: this.instanceId,
      maxIterations,
      task: typeof task === 'string' ? preview(task) : undefined,
    });
    logger.debug('[AGENT]', this.instanceId, `Run started (max ${maxIterations} iterations)`);

    let iterations = 0;
    let lastMessage: Message | null = null;
    let state: AgentState = 'reasoning';
    const finish = (status: AgentRunStatus, content: string | null): AgentRunResult => {
      state = status;
      this.activityStream.publish(ActivityEventType.AGENT_END, { instanceId: this.instanceId, status, iterations });
      logger.debug('[AGENT]', this.instanceId, `Run ${state} after ${iterations} iteration(s)`);
      return { status, content, iterations, lastMessage };
    };

    try {
      for (;;) {
        // reasoning
        if (signal?.aborted) {
          return finish('cancelled', null);
        }
        if (iterations >= maxIterations) {
          return finish('aborted', budgetExhaustedMessage(maxIterations));
        }
        this.ensureNoUnansweredCalls();

        const response = await this.modelClient.send(this.memory.getMessages(), {
          functions: this.toolManager.getFunctionDefinitions(),
          temperature: this.config.temperature,
          signal,
        });
        const reply: Message = { role: 'assistant', content: response.content };
        if (response.tool_calls && response.tool_calls.length > 0) {
          reply.tool_calls = response.tool_calls;
        }
        this.memory.addMessage(reply);
        lastMessage = reply;
        this.activityStream.publish(ActivityEventType.ASSISTANT_MESSAGE_COMPLETE, {
          instanceId: this.instanceId,
          content: reply.content,
          toolCallCount: reply.tool_calls?.length ?? 0,
        });

        if (!hasToolCalls(reply)) {
          return finish('done', reply.content);
        }

        state = 'acting';
        for (const toolCall of reply.tool_calls) {
          await this.executeToolCall(toolCall);
        }
        iterations += 1;
        state = 'reasoning';
      }
    } catch (error) {
      if (isAbortError(error)) {
        this.answerPendingCalls();
        return finish('cancelled', null);
      }
      logger.error('[AGENT]', this.instanceId, `Run failed while ${state}:`, formatError(error));
      this.activityStream.publish(ActivityEventType.ERROR, { instanceId: this.instanceId, error: formatError(error) });
      this.activityStream.publish(ActivityEventType.AGENT_END, {
        instanceId: this.instanceId,
        status: 'error',
        iterations,
      });
      throw error;
    }
  }

  private appendTask(task: AgentTask): void {
    if (typeof task === 'string') {
      this.memory.addMessage({ role: 'user', content: task });
    } else if (Array.isArray(task)) {
      this.memory.addMessages(task);
    } else {
      this.memory.addMessage(task);
    }
  }

  private ensureNoUnansweredCalls(): void {
    const unanswered = this.memory.getUnansweredToolCalls();
    if (unanswered.length > 0) {
      const ids = unanswered.map(call => call.id).join(', ');
      throw new TranscriptError(`Cannot call the model with unanswered tool calls: ${ids}`);
    }
  }

  private async executeToolCall(toolCall: ToolCall): Promise<void> {
    const { id, function: fn } = toolCall;
    this.activityStream.publish(ActivityEventType.TOOL_CALL_START, {
      instanceId: this.instanceId,
      callId: id,
      toolName: fn.name,
      arguments: fn.arguments,
    });

    const result = await this.toolManager.invoke(fn.name, fn.arguments);
    this.memory.addMessage(createToolResultMessage(id, fn.name, result.content));

    this.activityStream.publish(ActivityEventType.TOOL_CALL_END, {
      instanceId: this.instanceId,
      callId: id,
      toolName: fn.name,
      isError: result.isError,
      content: preview(result.content, TEXT_LIMITS.CONTENT_PREVIEW_MAX),
    });
    logger.debug('[AGENT]', this.instanceId, `Tool ${fn.name} ${result.isError ? 'failed' : 'succeeded'}`);
  }

  /**
   * Close out calls left open by a cancellation so the transcript stays valid
   */
  private answerPendingCalls(): void {
    for (const call of this.memory.getUnansweredToolCalls()) {
      this.memory.addMessage(createToolResultMessage(call.id, call.function.name, CANCELLED_TOOL_RESULT));
    }
  }
}
