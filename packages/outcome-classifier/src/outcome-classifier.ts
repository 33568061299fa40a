/**
 * @module @loopwright/outcome-classifier/outcome-classifier
 * Decides whether the agent loop continues after a turn.
 *
 * Rules, first match wins:
 *   1. turn >= maxTurns     → stop, max-turns-reached
 *   2. tool calls present   → continue, tools-executing
 *   3. continuation signal  → continue, agent-continuing
 *   4. completion signal    → stop, task-complete
 *   5. otherwise            → stop, agent-finished
 *
 * Tool calls outrank completion text: a turn that still calls tools is not done.
 */

import type { Outcome } from '@loopwright/agent-contracts';
import { HeuristicSignalDetector } from './heuristic-signal-detector.js';
import type { ClassifyOutcomeInput, IOutcomeClassifier, TextSignalDetector } from './types.js';

const defaultDetector = new HeuristicSignalDetector();

export function classifyOutcome(
  input: ClassifyOutcomeInput,
  detector: TextSignalDetector = defaultDetector,
): Outcome {
  const { turn, maxTurns, toolCalls } = input;
  const text = input.text ?? '';

  if (turn >= maxTurns) {
    return { continue: false, reason: 'max-turns-reached' };
  }
  if (toolCalls.length > 0) {
    return { continue: true, reason: 'tools-executing' };
  }
  if (text !== '' && detector.indicatesContinuation(text)) {
    return { continue: true, reason: 'agent-continuing' };
  }
  if (text !== '' && detector.indicatesCompletion(text)) {
    return { continue: false, reason: 'task-complete' };
  }
  return { continue: false, reason: 'agent-finished' };
}

/**
 * Outcome classifier bound to one signal detector.
 *
 * @example
 * ```typescript
 * const classifier = new OutcomeClassifier();
 * classifier.classify({ turn: 0, maxTurns: 3, toolCalls: [], text: 'Task complete' });
 * // { continue: false, reason: 'task-complete' }
 * ```
 */
export class OutcomeClassifier implements IOutcomeClassifier {
  constructor(private readonly detector: TextSignalDetector = new HeuristicSignalDetector()) {}

  classify(input: ClassifyOutcomeInput): Outcome {
    return classifyOutcome(input, this.detector);
  }
}
