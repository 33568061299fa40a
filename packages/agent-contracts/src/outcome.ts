/**
 * @module @loopwright/agent-contracts/outcome
 * Turn outcomes and terminal run results.
 */

import type { ConversationHistory, TurnResult } from './conversation.js';

// ═══════════════════════════════════════════════════════════════════════
// Turn Outcome
// ═══════════════════════════════════════════════════════════════════════

/**
 * Why the loop continues or stops after a turn.
 *
 * - 'max-turns-reached': turn budget exhausted
 * - 'tools-executing':   model requested tools; results go back next turn
 * - 'agent-continuing':  model announced a further step
 * - 'task-complete':     model reported the goal as done
 * - 'agent-finished':    model stopped without either signal
 */
export type ContinueReason = 'tools-executing' | 'agent-continuing';

export type CompletionReason = 'max-turns-reached' | 'task-complete' | 'agent-finished';

export type OutcomeReason = ContinueReason | CompletionReason;

export type Outcome =
  | { continue: true; reason: ContinueReason }
  | { continue: false; reason: CompletionReason };

// ═══════════════════════════════════════════════════════════════════════
// Run Result
// ═══════════════════════════════════════════════════════════════════════

export type FailureReason = 'model-not-found-error' | 'transport-error';

export type RunReason = CompletionReason | FailureReason;

export interface CompletedRun {
  error?: false;
  reason: CompletionReason;
  history: ConversationHistory;
  /** Raw result of the last model round-trip (null if none ran) */
  finalResponse: TurnResult | null;
}

export interface FailedRun {
  error: true;
  reason: FailureReason;
  errorMessage: string;
  /** History up to the failure (empty for model-not-found) */
  history: ConversationHistory;
  finalResponse: TurnResult | null;
}

/**
 * Terminal result of an agent run.
 * Uses a discriminated union on `error` instead of thrown exceptions.
 */
export type AgentRunResult = CompletedRun | FailedRun;

export function isFailedRun(result: AgentRunResult): result is FailedRun {
  return result.error === true;
}

/**
 * Receives human-readable progress lines ("Turn 2/6", run summaries)
 */
export type ProgressCallback = (step: string) => void;
