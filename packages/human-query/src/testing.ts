/**
 * @loopwright/human-query/testing
 *
 * In-process fake of an interactive UI host. Widgets record their
 * configuration and expose drivers (`select`, `accept`, `changeActive`,
 * `hide`) that fire the same events a real host would.
 */

import type {
  Disposable,
  InputBoxWidget,
  InteractiveUi,
  QuickPickItem,
  QuickPickWidget,
  UiEvent,
} from '@loopwright/agent-contracts';

class Emitter<T = void> {
  private readonly listeners = new Set<(event: T) => void>();

  readonly event: UiEvent<T> = (listener) => {
    this.listeners.add(listener);
    const subscription: Disposable = {
      dispose: () => {
        this.listeners.delete(listener);
      },
    };
    return subscription;
  };

  fire(event: T): void {
    for (const listener of [...this.listeners]) {
      listener(event);
    }
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

abstract class FakeWidget {
  title: string | undefined = undefined;
  placeholder: string | undefined = undefined;
  ignoreFocusOut = false;
  visible = false;
  disposed = false;

  protected readonly acceptEmitter = new Emitter();
  protected readonly hideEmitter = new Emitter();
  readonly onDidAccept = this.acceptEmitter.event;
  readonly onDidHide = this.hideEmitter.event;

  show(): void {
    if (this.disposed) {
      throw new Error('Widget is disposed');
    }
    this.visible = true;
  }

  /** Close the widget, as the human pressing Escape would */
  hide(): void {
    if (!this.visible) {
      return;
    }
    this.visible = false;
    this.hideEmitter.fire();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.hide();
    this.disposed = true;
  }

  /** Confirm the current selection or text, as Enter would */
  accept(): void {
    if (this.visible) {
      this.acceptEmitter.fire();
    }
  }

  /** Listeners still attached (accept + hide) */
  get listenerCount(): number {
    return this.acceptEmitter.listenerCount + this.hideEmitter.listenerCount;
  }
}

export class FakeQuickPick extends FakeWidget implements QuickPickWidget {
  items: readonly QuickPickItem[] = [];
  canSelectMany = false;
  selectedItems: readonly QuickPickItem[] = [];

  private readonly activeEmitter = new Emitter<readonly QuickPickItem[]>();
  readonly onDidChangeActive = this.activeEmitter.event;

  /** Select the items with these labels */
  select(...labels: string[]): void {
    this.selectedItems = this.items.filter((item) => labels.includes(item.label));
  }

  /** Move the highlight to the item with this label (first item by default) */
  changeActive(label?: string): void {
    const active = this.items.filter((item) => (label === undefined ? item === this.items[0] : item.label === label));
    this.activeEmitter.fire(active);
  }

  override get listenerCount(): number {
    return super.listenerCount + this.activeEmitter.listenerCount;
  }
}

export class FakeInputBox extends FakeWidget implements InputBoxWidget {
  value = '';

  /** Type text and press Enter */
  submit(text: string): void {
    this.value = text;
    this.accept();
  }
}

export class FakeInteractiveUi implements InteractiveUi {
  readonly quickPicks: FakeQuickPick[] = [];
  readonly inputBoxes: FakeInputBox[] = [];

  createQuickPick(): FakeQuickPick {
    const quickPick = new FakeQuickPick();
    this.quickPicks.push(quickPick);
    return quickPick;
  }

  createInputBox(): FakeInputBox {
    const inputBox = new FakeInputBox();
    this.inputBoxes.push(inputBox);
    return inputBox;
  }

  /** Most recently created quick pick */
  get quickPick(): FakeQuickPick {
    const quickPick = this.quickPicks.at(-1);
    if (!quickPick) {
      throw new Error('No quick pick was created');
    }
    return quickPick;
  }

  /** Most recently created input box */
  get inputBox(): FakeInputBox {
    const inputBox = this.inputBoxes.at(-1);
    if (!inputBox) {
      throw new Error('No input box was created');
    }
    return inputBox;
  }
}
