/**
 * ResponseCollector: folds a model part stream into `{ text, toolCalls }`.
 *
 * The transport exposes a forward-only iterator, so collection is a single
 * pass with two running accumulators.
 */

import type { ResponsePart, ToolCall } from '@loopwright/agent-contracts';

export interface CollectedResponse {
  text: string;
  toolCalls: ToolCall[];
}

export async function collectResponse(parts: AsyncIterable<ResponsePart>): Promise<CollectedResponse> {
  let text = '';
  const toolCalls: ToolCall[] = [];

  for await (const part of parts) {
    switch (part.type) {
      case 'text':
        text += part.value;
        break;
      case 'tool-call':
        toolCalls.push({ id: part.callId, name: part.name, input: part.input });
        break;
      default:
        // data parts carry nothing the loop uses
        break;
    }
  }

  return { text, toolCalls };
}
