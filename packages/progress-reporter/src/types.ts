/**
 * @module @loopwright/progress-reporter/types
 * Type definitions for progress feedback system.
 */

import type { CompletionReason, FailureReason, Outcome } from "@loopwright/agent-contracts";

/**
 * Progress event types.
 */
export type ProgressEventType =
  | "run_started"
  | "turn_started"
  | "tools_dispatched"
  | "turn_completed"
  | "run_completed"
  | "run_failed";

/**
 * Base progress event.
 */
export interface BaseProgressEvent {
  type: ProgressEventType;
  timestamp: number;
}

/**
 * Run started event.
 */
export interface RunStartedEvent extends BaseProgressEvent {
  type: "run_started";
  data: {
    goal: string;
    modelId: string;
    maxTurns: number;
    toolNames: string[];
  };
}

/**
 * Turn started event.
 */
export interface TurnStartedEvent extends BaseProgressEvent {
  type: "turn_started";
  data: {
    turn: number;
    maxTurns: number;
  };
}

/**
 * Tools dispatched event (after all calls of the turn settled).
 */
export interface ToolsDispatchedEvent extends BaseProgressEvent {
  type: "tools_dispatched";
  data: {
    turn: number;
    toolNames: string[];
    failed: number;
  };
}

/**
 * Turn completed event.
 */
export interface TurnCompletedEvent extends BaseProgressEvent {
  type: "turn_completed";
  data: {
    turn: number;
    outcome: Outcome;
  };
}

/**
 * Run completed event.
 */
export interface RunCompletedEvent extends BaseProgressEvent {
  type: "run_completed";
  data: {
    reason: CompletionReason;
    turns: number;
    totalDuration: number;
  };
}

/**
 * Run failed event.
 */
export interface RunFailedEvent extends BaseProgressEvent {
  type: "run_failed";
  data: {
    reason: FailureReason;
    error: string;
    totalDuration: number;
  };
}

/**
 * Union of all progress events.
 */
export type ProgressEvent =
  | RunStartedEvent
  | TurnStartedEvent
  | ToolsDispatchedEvent
  | TurnCompletedEvent
  | RunCompletedEvent
  | RunFailedEvent;

/**
 * Progress event callback.
 */
export type ProgressEventCallback = (event: ProgressEvent) => void;
