import { completionConfig } from '@/config/completion';
import { createCompletionPopupStore, type CompletionPopupStore } from '@/store/completionPopupStore';
import type { CompletionPopup, SelectListener } from '@/types/completion';
import { filterCandidates } from '@/utils/completionHistory';
import { telemetry } from '@/utils/telemetry';

export interface CompletionPopupOptions {
  maxVisibleItems?: number;
}

/**
 * Default popup: keeps its state in a zustand store that `CompletionPopup`
 * renders, so the imperative API and the view never disagree.
 */
export class CompletionPopupController implements CompletionPopup {
  readonly store: CompletionPopupStore;
  private readonly maxVisibleItems: number;
  private readonly associated = new Set<HTMLElement | string>();
  private readonly selectListeners = new Set<SelectListener>();

  constructor(options: CompletionPopupOptions = {}) {
    this.maxVisibleItems = options.maxVisibleItems ?? completionConfig.maxVisibleItems;
    this.store = createCompletionPopupStore();
  }

  get isVisible(): boolean {
    return this.store.getState().visible;
  }

  get currentText(): string {
    const { candidates, highlighted } = this.store.getState();
    return highlighted >= 0 && highlighted < candidates.length ? candidates[highlighted] : '';
  }

  popup(anchor: HTMLElement): void {
    const { candidates } = this.store.getState();
    if (candidates.length === 0) {
      this.hide();
      return;
    }
    this.store.setState({ visible: true, anchor });
    telemetry.popupShow({ anchor: anchor.id, candidates: candidates.length });
  }

  hide(): void {
    if (!this.store.getState().visible) return;
    this.store.setState({ visible: false, highlighted: -1, anchor: null });
  }

  setQuery(text: string): void {
    this.refilter(this.store.getState().items, text);
  }

  setAllItems(items: readonly string[]): void {
    this.refilter(items.slice(), this.store.getState().query);
  }

  moveHighlight(step = 1): void {
    const { candidates, highlighted } = this.store.getState();
    const count = candidates.length;
    if (count === 0 || step === 0) return;
    const next = highlighted < 0
      ? (step > 0 ? 0 : count - 1)
      : (((highlighted + step) % count) + count) % count;
    this.store.setState({ highlighted: next });
  }

  setHighlight(index: number): void {
    if (index < 0 || index >= this.store.getState().candidates.length) return;
    this.store.setState({ highlighted: index });
  }

  handleKeydown(key: string): boolean {
    if (!this.isVisible) return false;
    switch (key) {
      case 'down':
        this.moveHighlight(1);
        return true;
      case 'up':
        this.moveHighlight(-1);
        return true;
      case 'escape':
        this.hide();
        return true;
      case 'enter': {
        const text = this.currentText;
        if (!text) return false;
        this.emitSelect(text);
        return true;
      }
      default:
        return false;
    }
  }

  /** Select the candidate at `index`, as a click on it does. */
  select(index: number): void {
    const { candidates } = this.store.getState();
    if (index < 0 || index >= candidates.length) return;
    this.emitSelect(candidates[index]);
  }

  onSelect(listener: SelectListener): () => void {
    this.selectListeners.add(listener);
    return () => {
      this.selectListeners.delete(listener);
    };
  }

  addAssociatedWidget(widget: HTMLElement | string): void {
    this.associated.add(widget);
  }

  removeAssociatedWidget(widget: HTMLElement | string): void {
    this.associated.delete(widget);
  }

  /** Whether `target` lies inside the anchor or an associated widget. */
  containsTarget(target: EventTarget | null): boolean {
    if (!(target instanceof Node)) return false;
    if (this.store.getState().anchor?.contains(target)) return true;
    for (const widget of this.associated) {
      const element = typeof widget === 'string' ? document.getElementById(widget) : widget;
      if (element?.contains(target)) return true;
    }
    return false;
  }

  private refilter(items: string[], query: string): void {
    const candidates = filterCandidates(items, query).slice(0, this.maxVisibleItems);
    const { visible } = this.store.getState();
    this.store.setState({
      items,
      query,
      candidates,
      highlighted: -1,
      visible: visible && candidates.length > 0,
    });
  }

  private emitSelect(text: string): void {
    this.hide();
    this.selectListeners.forEach((listener) => listener(text));
  }
}
