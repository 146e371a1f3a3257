export type CompletionInputMode = 'text' | 'search';

/**
 * The parts of a keyboard event a key decoder reads. Both DOM and React
 * keyboard events satisfy it.
 */
export interface KeyInput {
  key: string;
  ctrlKey: boolean;
  altKey: boolean;
  shiftKey: boolean;
  metaKey: boolean;
}

/** Maps a keyboard event to a canonical key name such as `enter` or `shift+tab`. */
export type KeyDecoder = (event: KeyInput) => string;

export type SelectListener = (text: string) => void;

/**
 * Overlay listing completion candidates for an input.
 */
export interface CompletionPopup {
  /** Show the popup next to `anchor`. */
  popup(anchor: HTMLElement): void;
  hide(): void;
  readonly isVisible: boolean;
  setQuery(text: string): void;
  setAllItems(items: readonly string[]): void;
  /** Highlighted candidate, or an empty string when nothing is highlighted. */
  readonly currentText: string;
  moveHighlight(step?: number): void;
  /** Returns true when the popup consumed the key. */
  handleKeydown(key: string): boolean;
  /** Presses inside an associated widget are part of the popup's UI group. */
  addAssociatedWidget(widget: HTMLElement | string): void;
  removeAssociatedWidget?(widget: HTMLElement | string): void;
  onSelect?(listener: SelectListener): () => void;
}

/**
 * Local key-value store of string lists, keyed by field name.
 */
export interface HistoryStore {
  get(key: string): string[] | undefined;
  set(key: string, items: readonly string[]): void;
  open?(): void;
  close?(): void;
}
