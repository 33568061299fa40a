/**
 * @module @loopwright/progress-reporter/reporter
 * Progress reporter for agent runs.
 *
 * UX-only component - events are NOT visible to the turn loop.
 * Used for real-time progress feedback in a CLI or an editor panel.
 */

import type {
  CompletionReason,
  FailureReason,
  ILogger,
  Outcome,
  ToolResult,
} from '@loopwright/agent-contracts';
import { isToolFailure } from '@loopwright/agent-contracts';
import type { ProgressEvent, ProgressEventCallback } from './types.js';

/**
 * Progress reporter - emits UX-only progress events.
 *
 * @example
 * ```typescript
 * const reporter = new ProgressReporter(logger, (event) => {
 *   panel.postMessage(event);
 * });
 *
 * reporter.start({ goal: 'Count files', modelId: 'gpt-4o-mini', maxTurns: 6, toolNames: [] });
 * reporter.turnStarted(1, 6);
 * reporter.complete('task-complete', 1);
 * ```
 */
export class ProgressReporter {
  private events: ProgressEvent[] = [];
  private startTime: number = 0;

  constructor(
    private logger: ILogger,
    private onProgress?: ProgressEventCallback
  ) {}

  /**
   * Start tracking a new run.
   */
  start(run: { goal: string; modelId: string; maxTurns: number; toolNames: string[] }): void {
    this.startTime = Date.now();
    this.emit({
      type: 'run_started',
      timestamp: this.startTime,
      data: { ...run, toolNames: [...run.toolNames] },
    });
    this.logger.info(`🚀 Starting agentic conversation with goal: ${run.goal}`, {
      modelId: run.modelId,
      maxTurns: run.maxTurns,
    });
  }

  turnStarted(turn: number, maxTurns: number): void {
    this.emit({
      type: 'turn_started',
      timestamp: Date.now(),
      data: { turn, maxTurns },
    });
    this.logger.debug(`🔄 Turn ${turn}/${maxTurns}`);
  }

  /**
   * Report the settled tool calls of a turn.
   */
  toolsDispatched(turn: number, results: readonly ToolResult[]): void {
    const failed = results.filter(isToolFailure).length;
    this.emit({
      type: 'tools_dispatched',
      timestamp: Date.now(),
      data: { turn, toolNames: results.map((r) => r.toolName), failed },
    });

    if (failed > 0) {
      this.logger.warn(`⚠️  Tools executed with ${failed} failure(s)`, { turn });
    } else {
      this.logger.info(`✅ Tools executed: ${results.length}`, { turn });
    }
  }

  turnCompleted(turn: number, outcome: Outcome): void {
    this.emit({
      type: 'turn_completed',
      timestamp: Date.now(),
      data: { turn, outcome: { ...outcome } },
    });
    if (outcome.continue) {
      this.logger.info(`↻ Continuing to next step (${outcome.reason})`, { turn });
    }
  }

  /**
   * Report run completion.
   */
  complete(reason: CompletionReason, turns: number): void {
    const totalDuration = this.elapsed();
    this.emit({
      type: 'run_completed',
      timestamp: Date.now(),
      data: { reason, turns, totalDuration },
    });
    this.logger.info(`🎯 Agentic conversation ended: ${reason}`, {
      turns,
      durationMs: totalDuration,
    });
  }

  /**
   * Report run failure.
   */
  failed(reason: FailureReason, error: string): void {
    const totalDuration = this.elapsed();
    this.emit({
      type: 'run_failed',
      timestamp: Date.now(),
      data: { reason, error, totalDuration },
    });
    this.logger.error(`❌ Agentic conversation failed: ${error}`, { reason });
  }

  /**
   * Get all emitted events (for debugging/testing).
   */
  getEvents(): readonly ProgressEvent[] {
    return [...this.events];
  }

  /**
   * Clear all events.
   */
  clear(): void {
    this.events = [];
    this.startTime = 0;
  }

  private elapsed(): number {
    return this.startTime === 0 ? 0 : Date.now() - this.startTime;
  }

  /**
   * Emit event to callback and store in history.
   */
  private emit(event: ProgressEvent): void {
    this.events.push(event);
    if (this.onProgress) {
      this.onProgress(event);
    }
  }
}
