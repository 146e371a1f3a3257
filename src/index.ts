import '@/i18n';

export { CompletingTextInput } from '@/components/completion/CompletingTextInput';
export type { CompletingTextInputHandle, CompletingTextInputProps } from '@/components/completion/CompletingTextInput';
export { HistoryInput } from '@/components/completion/HistoryInput';
export type { HistoryInputHandle, HistoryInputProps } from '@/components/completion/HistoryInput';
export { HistoryStoreProvider } from '@/components/completion/HistoryStoreProvider';
export { CompletionPopup } from '@/components/completion/CompletionPopup';
export { CompletionPopupController } from '@/components/completion/CompletionPopupController';
export type { CompletionPopupOptions } from '@/components/completion/CompletionPopupController';
export { SearchBar } from '@/components/search/SearchBar';
export type { SearchAction, SearchBarHandle, SearchRequest } from '@/components/search/SearchBar';
export { useHistoryStore } from '@/hooks/useHistoryStore';
export { createHistoryStore } from '@/store/historyStore';
export type { HistoryStoreOptions, PersistentHistoryStore } from '@/store/historyStore';
export { usePreferencesStore } from '@/store/preferencesStore';
export { DEFAULT_SEARCH_OPTIONS, useSearchOptionsStore } from '@/store/searchOptionsStore';
export type { SearchDirection, SearchMode, SearchOptions } from '@/store/searchOptionsStore';
export { completionConfig, DEFAULT_MAX_HISTORY } from '@/config/completion';
export { decodeKey } from '@/utils/keys';
export { escapeRegex } from '@/utils/regex';
export { filterCandidates, isCommittable, normalizeHistory, pushHistory } from '@/utils/completionHistory';
export type {
  CompletionInputMode,
  CompletionPopup as CompletionPopupContract,
  HistoryStore,
  KeyDecoder,
  KeyInput,
  SelectListener,
} from '@/types/completion';
