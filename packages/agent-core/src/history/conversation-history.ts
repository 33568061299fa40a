/**
 * Append-only helpers for a run's conversation history.
 *
 * Each helper returns a new array; the orchestrator holds the only reference.
 */

import type {
  ConversationEntry,
  ConversationHistory,
  ToolCall,
  ToolResult,
} from '@loopwright/agent-contracts';

export function appendAssistantEntry(
  history: ConversationHistory,
  content: string,
  toolCalls: ToolCall[],
  turn: number,
): ConversationHistory {
  const entry: ConversationEntry = { role: 'assistant', content, toolCalls, turn };
  return [...history, entry];
}

export function appendToolResults(
  history: ConversationHistory,
  results: ToolResult[],
  turn: number,
): ConversationHistory {
  const entry: ConversationEntry = { role: 'tool-results', results, turn };
  return [...history, entry];
}

/** Number of model replies in the history */
export function countAssistantTurns(history: ConversationHistory): number {
  return history.filter((entry) => entry.role === 'assistant').length;
}
