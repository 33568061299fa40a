/**
 * @module @loopwright/human-query/query-session
 * One pending human question.
 *
 * Three producers race to end the session: accept, hide and the deadline.
 * Whichever reaches `settle()` first sets `resolved`; the others become
 * no-ops. The deadline timer is cleared on every terminal transition.
 *
 *   idle → shown → answered | timed-out | cancelled | awaiting-free-text
 *   awaiting-free-text → answered | cancelled
 */

import type {
  Disposable,
  HumanQueryOutcome,
  HumanQueryPhase,
  HumanQueryState,
  ILogger,
  InputBoxWidget,
  InteractiveUi,
  QueryItem,
  QuickPickItem,
  QuickPickWidget,
} from '@loopwright/agent-contracts';
import { HUMAN_QUERY_CONFIG } from './config.js';

const ALLOWED_TRANSITIONS: Record<HumanQueryPhase, HumanQueryPhase[]> = {
  idle: ['shown'],
  shown: ['answered', 'timed-out', 'cancelled', 'awaiting-free-text'],
  'awaiting-free-text': ['answered', 'cancelled'],
  answered: [],
  'timed-out': [],
  cancelled: [],
};

export interface QuerySessionOptions {
  question: string;
  context: string;
  items: readonly QueryItem[];
  timeoutSeconds: number;
  canSelectMany: boolean;
  /** Defaults to HUMAN_QUERY_CONFIG.engagementGraceMs */
  engagementGraceMs?: number;
}

export class QuerySession {
  readonly outcome: Promise<HumanQueryOutcome>;

  private phase: HumanQueryPhase = 'idle';
  private selection: readonly QuickPickItem[] = [];
  private engagementCount = 0;
  private resolved = false;
  /** Accept already handled (answered, or waiting for free text) */
  private accepted = false;
  private timedOut = false;

  private shownAt = 0;
  private deadline: ReturnType<typeof setTimeout> | undefined;
  private quickPick: QuickPickWidget | undefined;
  private inputBox: InputBoxWidget | undefined;
  private readonly subscriptions: Disposable[] = [];

  private readonly displayItems: QuickPickItem[];
  private readonly originals = new Map<QuickPickItem, QueryItem>();
  private readonly sentinel: QuickPickItem = { ...HUMAN_QUERY_CONFIG.otherItem };
  private resolveOutcome: (outcome: HumanQueryOutcome) => void = () => {};

  constructor(
    private readonly ui: InteractiveUi,
    private readonly options: QuerySessionOptions,
    private readonly logger?: ILogger,
  ) {
    this.outcome = new Promise((resolve) => {
      this.resolveOutcome = resolve;
    });

    this.displayItems = options.items.map((item) => {
      const wrapped = typeof item === 'string' ? { label: item } : item;
      this.originals.set(wrapped, item);
      return wrapped;
    });
  }

  get state(): HumanQueryState {
    return {
      phase: this.phase,
      selection: [...this.selection],
      engagementCount: this.engagementCount,
      resolved: this.resolved,
    };
  }

  /**
   * Show the list and arm the deadline.
   */
  start(): void {
    if (this.phase !== 'idle') {
      return;
    }

    const quickPick = this.ui.createQuickPick();
    quickPick.title = this.options.question;
    quickPick.placeholder = this.options.context;
    quickPick.items = [...this.displayItems, this.sentinel];
    quickPick.ignoreFocusOut = true;
    quickPick.canSelectMany = this.options.canSelectMany;

    this.subscriptions.push(
      quickPick.onDidAccept(() => this.handleAccept()),
      quickPick.onDidHide(() => this.handleListHide()),
      quickPick.onDidChangeActive(() => this.handleActiveChange()),
    );
    this.quickPick = quickPick;

    this.transition('shown');
    this.shownAt = Date.now();
    quickPick.show();

    if (!this.resolved) {
      const delayMs = Math.min(this.options.timeoutSeconds * 1000, HUMAN_QUERY_CONFIG.maxDeadlineMs);
      this.deadline = setTimeout(() => this.handleDeadline(), delayMs);
    }
  }

  // ─── Producers ──────────────────────────────────────────────────────────────

  private handleAccept(): void {
    if (this.resolved || this.accepted || !this.quickPick) {
      return;
    }
    const selected = [...this.quickPick.selectedItems];
    if (selected.length === 0) {
      return;
    }

    this.selection = selected;
    this.accepted = true;
    this.clearDeadline();

    if (selected.includes(this.sentinel)) {
      this.transition('awaiting-free-text');
      this.disposeQuickPick();
      this.openInputBox();
      return;
    }

    const values = selected.map((item) => this.originalOf(item));
    this.settle({ phase: 'answered', value: this.options.canSelectMany ? values : values[0] });
  }

  private handleListHide(): void {
    if (this.resolved || this.accepted) {
      return;
    }
    this.settle(this.timedOut ? { phase: 'timed-out' } : { phase: 'cancelled' });
  }

  private handleActiveChange(): void {
    if (this.resolved || this.accepted) {
      return;
    }
    this.engagementCount += 1;
    const graceMs = this.options.engagementGraceMs ?? HUMAN_QUERY_CONFIG.engagementGraceMs;
    if (this.engagementCount > 0 && Date.now() - this.shownAt >= graceMs && this.deadline !== undefined) {
      this.logger?.debug('Human engaged with the question; deadline disabled', {
        engagementCount: this.engagementCount,
      });
      this.clearDeadline();
    }
  }

  private handleDeadline(): void {
    this.deadline = undefined;
    if (this.resolved || this.accepted) {
      return;
    }
    this.timedOut = true;
    this.logger?.debug('Human query timed out', { timeoutSeconds: this.options.timeoutSeconds });
    // the hide handler settles as timed-out; a host that does not report the hide is settled here
    this.quickPick?.hide();
    this.settle({ phase: 'timed-out' });
  }

  private handleFreeTextAccept(): void {
    if (this.resolved || !this.inputBox) {
      return;
    }
    const text = this.inputBox.value;
    const others = this.selection.filter((item) => item !== this.sentinel).map((item) => this.originalOf(item));
    this.settle({ phase: 'answered', value: others.length === 0 ? text : [...others, text] });
  }

  private handleInputHide(): void {
    if (this.resolved) {
      return;
    }
    this.settle({ phase: 'cancelled' });
  }

  // ─── Internals ──────────────────────────────────────────────────────────────

  private openInputBox(): void {
    const inputBox = this.ui.createInputBox();
    inputBox.title = this.options.question;
    inputBox.placeholder = this.options.context;
    inputBox.ignoreFocusOut = true;

    this.subscriptions.push(
      inputBox.onDidAccept(() => this.handleFreeTextAccept()),
      inputBox.onDidHide(() => this.handleInputHide()),
    );
    this.inputBox = inputBox;
    inputBox.show();
  }

  private settle(outcome: HumanQueryOutcome): void {
    if (this.resolved) {
      return;
    }
    this.resolved = true;
    this.clearDeadline();
    this.transition(outcome.phase);

    this.disposeQuickPick();
    if (this.inputBox) {
      const inputBox = this.inputBox;
      this.inputBox = undefined;
      inputBox.dispose();
    }
    for (const subscription of this.subscriptions.splice(0)) {
      subscription.dispose();
    }

    this.logger?.debug('Human query resolved', { phase: outcome.phase });
    this.resolveOutcome(outcome);
  }

  private disposeQuickPick(): void {
    if (!this.quickPick) {
      return;
    }
    const quickPick = this.quickPick;
    this.quickPick = undefined;
    quickPick.dispose();
  }

  private clearDeadline(): void {
    if (this.deadline !== undefined) {
      clearTimeout(this.deadline);
      this.deadline = undefined;
    }
  }

  private originalOf(item: QuickPickItem): QueryItem {
    const direct = this.originals.get(item);
    if (direct !== undefined) {
      return direct;
    }
    for (const [wrapped, original] of this.originals) {
      if (wrapped.label === item.label) {
        return original;
      }
    }
    return item.label;
  }

  private transition(to: HumanQueryPhase): void {
    if (!ALLOWED_TRANSITIONS[this.phase].includes(to)) {
      throw new Error(`Invalid state transition: ${this.phase} -> ${to}`);
    }
    this.phase = to;
  }
}
