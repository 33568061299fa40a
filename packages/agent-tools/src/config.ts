/**
 * Centralized configuration constants for agent tools.
 */

import { ASK_HUMAN_TOOL_NAME } from '@loopwright/agent-contracts';

// ═══════════════════════════════════════════════════════════════════════════
// Interaction tool config
// ═══════════════════════════════════════════════════════════════════════════

export const ASK_HUMAN_CONFIG = {
  name: ASK_HUMAN_TOOL_NAME,
  description:
    'Ask the human a question and wait for their answer. Offer likely answers as items; the human can also type their own. Returns a note instead of an answer when the human does not respond in time or declines.',
  /** Shown when the model supplies no context line */
  defaultContext: 'Pick an option or choose Other to type an answer',
} as const;
