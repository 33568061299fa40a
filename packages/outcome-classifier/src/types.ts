/**
 * @module @loopwright/outcome-classifier/types
 * Type definitions for turn outcome classification.
 */

import type { Outcome, OutcomeReason, ToolCall } from '@loopwright/agent-contracts';

// Re-export for convenience
export type { Outcome, OutcomeReason };

/**
 * Input for outcome classification.
 */
export interface ClassifyOutcomeInput {
  /** Index of the turn being classified, compared against maxTurns */
  turn: number;
  /** Turn budget of the run */
  maxTurns: number;
  /** Tool calls the model made this turn */
  toolCalls: readonly ToolCall[];
  /** Text the model produced this turn (null/empty when it only called tools) */
  text: string | null | undefined;
}

/**
 * Turn outcome classifier interface.
 */
export interface IOutcomeClassifier {
  classify(input: ClassifyOutcomeInput): Outcome;
}

/**
 * Reads intent signals out of model text.
 * Swapping the detector changes detection policy without touching the loop.
 */
export interface TextSignalDetector {
  /** Model announced a further step ("let me", "next step", ...) */
  indicatesContinuation(text: string): boolean;
  /** Model reported the goal as done */
  indicatesCompletion(text: string): boolean;
}

/**
 * Keyword sets used by the heuristic detector (all matched case-insensitively).
 */
export interface SignalPatterns {
  /** Any match means the model intends to continue */
  continuation: RegExp[];
  /** Things that can be complete: "task", "goal", ... */
  completionNouns: string[];
  /** Words stating completion: "done", "achieved", ... */
  completionWords: string[];
  /** Token that, directly before a completion word, negates it */
  negators: string[];
  /** Phrases that mean completion on their own */
  completionPhrases: RegExp[];
}
