/**
 * @module @loopwright/agent-contracts/conversation
 * Conversation history for an agent run.
 *
 * History is append-only and owned by the orchestrator. It lives for one run
 * and is never persisted.
 */

import type { ToolCall, ToolResult } from './tool-types.js';

/**
 * What the model said on one turn
 */
export interface AssistantEntry {
  role: 'assistant';
  /** Collected text; empty string when the model only called tools */
  content: string;
  toolCalls: ToolCall[];
  /** 1-based turn number */
  turn: number;
}

/**
 * Results of the tool calls made on one turn
 */
export interface ToolResultsEntry {
  role: 'tool-results';
  results: ToolResult[];
  turn: number;
}

export type ConversationEntry = AssistantEntry | ToolResultsEntry;

export type ConversationRole = ConversationEntry['role'];

export type ConversationHistory = readonly ConversationEntry[];

/**
 * Raw result of one model round-trip
 */
export interface TurnResult {
  text: string;
  toolCalls: ToolCall[];
  turn: number;
}
