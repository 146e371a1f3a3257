const toPositiveInteger = (value: unknown, fallback: number): number => {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    return fallback;
  }
  return parsed;
};

const toNonEmptyString = (value: unknown, fallback: string): string => {
  if (typeof value !== 'string' || value.trim().length === 0) {
    return fallback;
  }
  return value.trim();
};

export const DEFAULT_MAX_HISTORY = 100;

export const completionConfig = {
  maxHistory: toPositiveInteger(import.meta.env.VITE_COMPLETION_MAX_HISTORY, DEFAULT_MAX_HISTORY),
  maxVisibleItems: toPositiveInteger(import.meta.env.VITE_COMPLETION_MAX_VISIBLE, 10),
  storageKey: toNonEmptyString(import.meta.env.VITE_COMPLETION_STORAGE_KEY, 'completion-history'),
  preferencesKey: 'completion-preferences',
  searchOptionsKey: 'search-options',
} as const;
