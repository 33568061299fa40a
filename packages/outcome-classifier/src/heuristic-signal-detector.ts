/**
 * @module @loopwright/outcome-classifier/heuristic-signal-detector
 * Regex/keyword detector for continuation and completion signals.
 *
 * Completion is judged per sentence (text split on `.`, `!`, `?`, `;` and
 * newlines; commas and colons stay inside the sentence):
 * a completion noun followed by a completion word, unless a negator is the
 * token directly before that word. Only that single token is checked, so
 * "is absolutely not yet complete" still reads as complete.
 */

import type { SignalPatterns, TextSignalDetector } from './types.js';

/**
 * Default detection patterns.
 */
export const DEFAULT_SIGNAL_PATTERNS: SignalPatterns = {
  continuation: [
    /\bnext\b.*\b(?:step|action)/i,
    /\bi['’]ll\b/i,
    /\bi will\b/i,
    /\blet me\b/i,
    /\bcontinu/i,
    /\bproceed/i,
  ],
  completionNouns: ['task', 'goal', 'mission'],
  completionWords: [
    'complete',
    'completed',
    'done',
    'finished',
    'achieved',
    'reached',
    'accomplished',
    'success',
    'successful',
  ],
  negators: ['not'],
  completionPhrases: [/\bsuccessfully (?:completed|finished)\b/i],
};

const CLAUSE_SEPARATOR = /[.!?;\n]+/;

function escapeRegExp(word: string): string {
  return word.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function wordAlternation(words: readonly string[], suffix = ''): RegExp {
  const body = words.map(escapeRegExp).join('|');
  return new RegExp(`\\b(?:${body})${suffix}\\b`, 'gi');
}

/**
 * Heuristic signal detector.
 *
 * @example
 * ```typescript
 * const detector = new HeuristicSignalDetector();
 * detector.indicatesCompletion('Task complete');        // true
 * detector.indicatesCompletion('The task is not done');  // false
 * detector.indicatesContinuation("Next, I'll list files"); // true
 * ```
 */
export class HeuristicSignalDetector implements TextSignalDetector {
  private readonly patterns: SignalPatterns;
  private readonly nounPattern: RegExp;
  private readonly wordPattern: RegExp;
  private readonly negators: Set<string>;

  constructor(patterns: Partial<SignalPatterns> = {}) {
    this.patterns = { ...DEFAULT_SIGNAL_PATTERNS, ...patterns };
    this.nounPattern = wordAlternation(this.patterns.completionNouns, 's?');
    this.wordPattern = wordAlternation(this.patterns.completionWords);
    this.negators = new Set(this.patterns.negators.map((n) => n.toLowerCase()));
  }

  indicatesContinuation(text: string): boolean {
    return this.patterns.continuation.some((pattern) => pattern.test(text));
  }

  indicatesCompletion(text: string): boolean {
    return text.split(CLAUSE_SEPARATOR).some((clause) => this.clauseIndicatesCompletion(clause));
  }

  private clauseIndicatesCompletion(clause: string): boolean {
    for (const phrase of this.patterns.completionPhrases) {
      const match = phrase.exec(clause);
      if (match && !this.isNegatedAt(clause, match.index)) {
        return true;
      }
    }

    this.nounPattern.lastIndex = 0;
    const noun = this.nounPattern.exec(clause);
    if (!noun) {
      return false;
    }

    const words = new RegExp(this.wordPattern.source, 'gi');
    words.lastIndex = noun.index + noun[0].length;
    for (let match = words.exec(clause); match; match = words.exec(clause)) {
      if (!this.isNegatedAt(clause, match.index)) {
        return true;
      }
    }
    return false;
  }

  /** True when the token right before `index` is a negator */
  private isNegatedAt(clause: string, index: number): boolean {
    const previous = clause.slice(0, index).trim().split(/\s+/).at(-1) ?? '';
    return this.negators.has(previous.toLowerCase());
  }
}
