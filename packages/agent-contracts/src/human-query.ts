/**
 * @module @loopwright/agent-contracts/human-query
 * Types for a deadline-bound interactive question.
 *
 * The widget interfaces describe only what the query needs from a UI host:
 * a selectable list and a single-line text box, each emitting accept/hide
 * events. Rendering belongs to the host.
 */

// ═══════════════════════════════════════════════════════════════════════
// Items
// ═══════════════════════════════════════════════════════════════════════

export interface QuickPickItem {
  label: string;
  description?: string;
  detail?: string;
}

/**
 * Caller-supplied choice. Plain strings are wrapped as `{ label }` for display,
 * but the answer always hands back the value exactly as supplied.
 */
export type QueryItem = string | QuickPickItem;

/**
 * What an answered query resolves to: one original item, the typed text,
 * or (for multi-select) the selected originals plus any typed text.
 */
export type HumanSelection = QueryItem | QueryItem[];

// ═══════════════════════════════════════════════════════════════════════
// State
// ═══════════════════════════════════════════════════════════════════════

export type HumanQueryPhase =
  | 'idle'
  | 'shown'
  | 'awaiting-free-text'
  | 'answered'
  | 'timed-out'
  | 'cancelled';

export type TerminalQueryPhase = Extract<HumanQueryPhase, 'answered' | 'timed-out' | 'cancelled'>;

export interface HumanQueryState {
  phase: HumanQueryPhase;
  /** Display items selected at accept time (sentinel included) */
  selection: readonly QuickPickItem[];
  /** Active-item changes seen so far */
  engagementCount: number;
  /** Set once by the first terminal transition */
  resolved: boolean;
}

export type HumanQueryOutcome =
  | { phase: 'answered'; value: HumanSelection }
  | { phase: 'timed-out' }
  | { phase: 'cancelled' };

/**
 * Flat answer shape: the selection, or a marker string for the two
 * non-answers. A typed free-text answer can collide with the markers;
 * use the detailed outcome when that matters.
 */
export type HumanAnswer = HumanSelection | 'timeout' | 'cancelled';

// ═══════════════════════════════════════════════════════════════════════
// UI host
// ═══════════════════════════════════════════════════════════════════════

export interface Disposable {
  dispose(): void;
}

export type UiEvent<T = void> = (listener: (event: T) => void) => Disposable;

interface WidgetBase {
  title: string | undefined;
  placeholder: string | undefined;
  /** Keep the widget open when focus moves elsewhere */
  ignoreFocusOut: boolean;
  readonly onDidAccept: UiEvent;
  readonly onDidHide: UiEvent;
  show(): void;
  hide(): void;
  /** Close and release; fires onDidHide if the widget was visible */
  dispose(): void;
}

export interface QuickPickWidget extends WidgetBase {
  items: readonly QuickPickItem[];
  canSelectMany: boolean;
  readonly selectedItems: readonly QuickPickItem[];
  readonly onDidChangeActive: UiEvent<readonly QuickPickItem[]>;
}

export interface InputBoxWidget extends WidgetBase {
  value: string;
}

export interface InteractiveUi {
  createQuickPick(): QuickPickWidget;
  createInputBox(): InputBoxWidget;
}
