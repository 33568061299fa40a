/**
 * @module @loopwright/progress-reporter
 * UX-only progress feedback for agent runs.
 *
 * Provides typed progress events for a CLI or an editor panel.
 * Events are invisible to the turn loop.
 *
 * @example
 * ```typescript
 * import { ProgressReporter } from '@loopwright/progress-reporter';
 *
 * const reporter = new ProgressReporter(logger, (event) => {
 *   socket.send(JSON.stringify(event));
 * });
 * ```
 */

export { ProgressReporter } from './reporter.js';

export type {
  ProgressEvent,
  ProgressEventType,
  ProgressEventCallback,
  RunStartedEvent,
  TurnStartedEvent,
  ToolsDispatchedEvent,
  TurnCompletedEvent,
  RunCompletedEvent,
  RunFailedEvent,
} from './types.js';
