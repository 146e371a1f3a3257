import { create } from 'zustand';
import { persist } from 'zustand/middleware';
import { completionConfig } from '@/config/completion';
import { isRecord } from '@/utils/errors';

export type SearchMode = 'normal' | 'regex';
export type SearchDirection = 'down' | 'up';

export interface SearchOptions {
  mode: SearchMode;
  caseSensitive: boolean;
  direction: SearchDirection;
  /** Continue from the start once the end is reached. */
  wrap: boolean;
  /** Let `.` match newlines; regex mode only. */
  dotAll: boolean;
}

export const DEFAULT_SEARCH_OPTIONS: SearchOptions = {
  mode: 'normal',
  caseSensitive: false,
  direction: 'down',
  wrap: true,
  dotAll: false,
};

export const isSearchMode = (value: unknown): value is SearchMode => value === 'normal' || value === 'regex';

export const isSearchDirection = (value: unknown): value is SearchDirection => value === 'down' || value === 'up';

const pickBoolean = (value: unknown, fallback: boolean): boolean => (typeof value === 'boolean' ? value : fallback);

// Keeps every valid stored option and falls back to the default for the rest
const sanitizeOptions = (persisted: unknown): SearchOptions => {
  if (!isRecord(persisted) || !isRecord(persisted.options)) {
    return { ...DEFAULT_SEARCH_OPTIONS };
  }
  const stored = persisted.options;
  return {
    mode: isSearchMode(stored.mode) ? stored.mode : DEFAULT_SEARCH_OPTIONS.mode,
    caseSensitive: pickBoolean(stored.caseSensitive, DEFAULT_SEARCH_OPTIONS.caseSensitive),
    direction: isSearchDirection(stored.direction) ? stored.direction : DEFAULT_SEARCH_OPTIONS.direction,
    wrap: pickBoolean(stored.wrap, DEFAULT_SEARCH_OPTIONS.wrap),
    dotAll: pickBoolean(stored.dotAll, DEFAULT_SEARCH_OPTIONS.dotAll),
  };
};

interface SearchOptionsState {
  options: SearchOptions;
  setOption: <K extends keyof SearchOptions>(key: K, value: SearchOptions[K]) => void;
  resetOptions: () => void;
}

export const useSearchOptionsStore = create<SearchOptionsState>()(
  persist(
    (set) => ({
      options: { ...DEFAULT_SEARCH_OPTIONS },
      setOption: (key, value) => {
        set((state) => ({ options: { ...state.options, [key]: value } }));
      },
      resetOptions: () => set({ options: { ...DEFAULT_SEARCH_OPTIONS } }),
    }),
    {
      name: completionConfig.searchOptionsKey,
      partialize: (state) => ({ options: state.options }),
      merge: (persisted, current) => ({ ...current, options: sanitizeOptions(persisted) }),
    }
  )
);
