import { createStore } from 'zustand/vanilla';

export interface CompletionPopupState {
  /** Every candidate the popup may show, most relevant first. */
  items: string[];
  query: string;
  /** `items` filtered by `query`, capped to the visible maximum. */
  candidates: string[];
  /** Index into `candidates`, -1 when nothing is highlighted. */
  highlighted: number;
  visible: boolean;
  anchor: HTMLElement | null;
}

export const createCompletionPopupStore = () =>
  createStore<CompletionPopupState>()(() => ({
    items: [],
    query: '',
    candidates: [],
    highlighted: -1,
    visible: false,
    anchor: null,
  }));

export type CompletionPopupStore = ReturnType<typeof createCompletionPopupStore>;
