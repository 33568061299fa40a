/**
 * @module @loopwright/outcome-classifier
 * Turn outcome classifier for the agent loop.
 *
 * A pure decision table over (turn, maxTurns, toolCalls, text). Reading intent
 * out of the text is delegated to a TextSignalDetector; the default one is
 * keyword based and can be given other keyword sets.
 *
 * @example
 * ```typescript
 * import { OutcomeClassifier, HeuristicSignalDetector } from '@loopwright/outcome-classifier';
 *
 * const classifier = new OutcomeClassifier(
 *   new HeuristicSignalDetector({ completionNouns: ['task', 'goal', 'job'] }),
 * );
 * ```
 */

export { classifyOutcome, OutcomeClassifier } from './outcome-classifier.js';
export { HeuristicSignalDetector, DEFAULT_SIGNAL_PATTERNS } from './heuristic-signal-detector.js';

export type {
  ClassifyOutcomeInput,
  IOutcomeClassifier,
  TextSignalDetector,
  SignalPatterns,
  Outcome,
  OutcomeReason,
} from './types.js';
