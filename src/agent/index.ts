/**
 * Agent system exports
 */

export { Agent, budgetExhaustedMessage } from './Agent.js';
export type { AgentConfig, AgentRunResult, AgentRunStatus, AgentState, AgentTask, RunOptions } from './Agent.js';
export { AgentSession, createModelClient, withSession } from './AgentSession.js';
export type { AgentSessionOptions } from './AgentSession.js';
