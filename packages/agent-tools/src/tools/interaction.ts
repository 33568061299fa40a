/**
 * Human interaction tools
 */

import type { HumanSelection, QueryItem } from '@loopwright/agent-contracts';
import { AskHumanInputSchema } from '@loopwright/agent-contracts';
import type { HumanQuery } from '@loopwright/human-query';
import { ASK_HUMAN_CONFIG } from '../config.js';
import type { Tool } from '../types.js';
import { toolError } from './tool-error.js';

function itemText(item: QueryItem): string {
  return typeof item === 'string' ? item : item.label;
}

function selectionText(selection: HumanSelection): string {
  return Array.isArray(selection) ? selection.map(itemText).join(', ') : itemText(selection);
}

/**
 * Ask the human a question through a deadline-bound quick pick
 */
export function createAskHumanTool(humanQuery: HumanQuery): Tool {
  return {
    definition: {
      name: ASK_HUMAN_CONFIG.name,
      description: ASK_HUMAN_CONFIG.description,
      inputSchema: {
        type: 'object',
        properties: {
          question: {
            type: 'string',
            description: 'Question to ask the human',
          },
          context: {
            type: 'string',
            description: 'One line explaining why you are asking',
          },
          items: {
            type: 'array',
            items: { type: 'string' },
            description: 'Likely answers to offer',
          },
          timeoutSeconds: {
            type: 'number',
            description: 'How long to wait before giving up (default 60, max 600)',
          },
        },
        required: ['question'],
      },
    },
    executor: async (input: Record<string, unknown>) => {
      const parsed = AskHumanInputSchema.safeParse(input);
      if (!parsed.success) {
        throw toolError({
          code: 'INVALID_INPUT',
          message: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
          hint: 'Pass a non-empty question, optional string items and a timeout of at most 600 seconds.',
        });
      }

      const { question, context, items, timeoutSeconds } = parsed.data;
      const outcome = await humanQuery.askDetailed({
        question,
        context: context ?? ASK_HUMAN_CONFIG.defaultContext,
        items,
        timeoutSeconds,
      });

      switch (outcome.phase) {
        case 'answered':
          return `The human answered: ${selectionText(outcome.value)}`;
        case 'timed-out':
          return `The human did not answer within ${timeoutSeconds} seconds. Continue with your best judgement.`;
        case 'cancelled':
          return 'The human dismissed the question. Continue without their input.';
      }
    },
  };
}
