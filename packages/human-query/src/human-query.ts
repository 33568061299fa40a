/**
 * @module @loopwright/human-query/human-query
 * Deadline-bound quick pick with a free-text fallback.
 */

import type {
  HumanAnswer,
  HumanQueryOptionsInput,
  HumanQueryOutcome,
  ILogger,
  InteractiveUi,
  QueryItem,
} from '@loopwright/agent-contracts';
import { HumanQueryOptionsSchema } from '@loopwright/agent-contracts';
import { QuerySession } from './query-session.js';

export interface HumanQueryDeps {
  ui: InteractiveUi;
  logger?: ILogger;
  /** Overrides HUMAN_QUERY_CONFIG.engagementGraceMs */
  engagementGraceMs?: number;
}

export class InvalidQueryError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid human query options: ${issues.join('; ')}`);
    this.name = 'InvalidQueryError';
  }
}

/**
 * Asks a human to pick from a list.
 *
 * @example
 * ```typescript
 * const query = new HumanQuery({ ui });
 * const answer = await query.ask('Which package?', 'Pick one or type a name', ['core', 'tools'], 30);
 * if (answer === 'timeout') { ... }
 * ```
 */
export class HumanQuery {
  constructor(private readonly deps: HumanQueryDeps) {}

  /**
   * Resolves to the picked item exactly as supplied, the typed text,
   * 'timeout' or 'cancelled'.
   */
  async ask(
    question: string,
    context: string,
    items: readonly QueryItem[],
    timeoutSeconds: number,
  ): Promise<HumanAnswer> {
    const outcome = await this.askDetailed({ question, context, items: [...items], timeoutSeconds });
    switch (outcome.phase) {
      case 'answered':
        return outcome.value;
      case 'timed-out':
        return 'timeout';
      case 'cancelled':
        return 'cancelled';
    }
  }

  /**
   * Like ask(), but keeps answers and non-answers apart.
   */
  askDetailed(options: HumanQueryOptionsInput): Promise<HumanQueryOutcome> {
    return this.open(options).outcome;
  }

  /**
   * Start a query and return its session, whose state can be observed
   * while it is pending.
   */
  open(options: HumanQueryOptionsInput): QuerySession {
    const parsed = HumanQueryOptionsSchema.safeParse(options);
    if (!parsed.success) {
      throw new InvalidQueryError(
        parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
      );
    }

    const session = new QuerySession(
      this.deps.ui,
      {
        question: parsed.data.question,
        context: parsed.data.context,
        // parsed items are copies; answers must be the caller's own objects
        items: options.items,
        timeoutSeconds: parsed.data.timeoutSeconds,
        canSelectMany: parsed.data.canSelectMany,
        engagementGraceMs: this.deps.engagementGraceMs,
      },
      this.deps.logger,
    );
    session.start();
    return session;
  }
}
