import { createStore } from 'zustand/vanilla';
import { createJSONStorage, persist, type StateStorage } from 'zustand/middleware';
import { completionConfig } from '@/config/completion';
import type { HistoryStore } from '@/types/completion';
import { isRecord, extractErrorMessage } from '@/utils/errors';
import { normalizeHistory } from '@/utils/completionHistory';
import { telemetry } from '@/utils/telemetry';

interface HistoryState {
  entries: Record<string, string[]>;
}

export interface HistoryStoreOptions {
  /** Storage key the whole history map is written under. */
  name?: string;
  /** Defaults to `window.localStorage`. */
  storage?: StateStorage;
}

export interface PersistentHistoryStore extends HistoryStore {
  readonly name: string;
  open(): void;
  close(): void;
}

// Lists are only cleaned here; each field applies its own size limit
const sanitizeEntries = (persisted: unknown): Record<string, string[]> => {
  if (!isRecord(persisted) || !isRecord(persisted.entries)) {
    return {};
  }
  const entries: Record<string, string[]> = {};
  for (const [key, value] of Object.entries(persisted.entries)) {
    if (Array.isArray(value)) {
      entries[key] = normalizeHistory(value);
    }
  }
  return entries;
};

/**
 * Create a history store persisted under a single storage key. Writes are
 * synchronous; while open, the store follows writes made by other tabs.
 */
export const createHistoryStore = (options: HistoryStoreOptions = {}): PersistentHistoryStore => {
  const name = options.name ?? completionConfig.storageKey;

  const store = createStore<HistoryState>()(
    persist(
      () => ({ entries: {} }),
      {
        name,
        version: 1,
        storage: createJSONStorage(() => options.storage ?? window.localStorage),
        merge: (persisted, current) => ({ ...current, entries: sanitizeEntries(persisted) }),
        onRehydrateStorage: () => (_state, error) => {
          if (error) {
            telemetry.storeError({ store: name, error: extractErrorMessage(error, 'Failed to read history') });
          }
        },
      }
    )
  );

  const handleStorage = (event: StorageEvent) => {
    if (event.key !== name) return;
    telemetry.storeSync({ store: name });
    void store.persist.rehydrate();
  };

  let opened = false;

  return {
    name,
    get(key) {
      const { entries } = store.getState();
      return Object.hasOwn(entries, key) ? entries[key].slice() : undefined;
    },
    set(key, items) {
      store.setState((state) => ({ entries: { ...state.entries, [key]: items.slice() } }));
    },
    open() {
      if (opened) return;
      opened = true;
      window.addEventListener('storage', handleStorage);
    },
    close() {
      if (!opened) return;
      opened = false;
      window.removeEventListener('storage', handleStorage);
    },
  };
};
