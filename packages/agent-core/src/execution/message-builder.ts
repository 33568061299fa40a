/**
 * Builds the message list sent to the model on each turn.
 *
 * Layout:
 *   1. user: goal + current turn
 *   2. per history entry, in order:
 *      - assistant   → one assistant message
 *      - tool-results → one user message per result
 *      - anything else → skipped
 */

import type { ChatMessage, ConversationHistory, ToolResult } from '@loopwright/agent-contracts';
import { isToolFailure } from '@loopwright/agent-contracts';

export function buildGoalMessage(goal: string, turn: number): ChatMessage {
  return {
    role: 'user',
    content:
      `GOAL: ${goal}\n\n` +
      'Please work autonomously toward this goal. ' +
      'Take initiative, use tools as needed, and continue ' +
      `until the goal is achieved. This is turn ${turn}.`,
  };
}

export function formatToolResult(result: ToolResult): string {
  const body = isToolFailure(result) ? `Error: ${result.error}` : result.result;
  return (
    `TOOL RESULT (${result.toolName}): ${body}\n\n` +
    'Analyze this result. If it shows the goal is achieved, conclude. ' +
    'If not, adapt your approach and try something different.'
  );
}

export function buildMessages(history: ConversationHistory, goal: string, turn: number): ChatMessage[] {
  const messages: ChatMessage[] = [buildGoalMessage(goal, turn)];

  for (const entry of history) {
    switch (entry.role) {
      case 'assistant':
        messages.push({ role: 'assistant', content: entry.content });
        break;
      case 'tool-results':
        for (const result of entry.results) {
          messages.push({ role: 'user', content: formatToolResult(result) });
        }
        break;
      default:
        break;
    }
  }

  return messages;
}
