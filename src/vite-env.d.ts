/// <reference types="vite/client" />

interface ImportMetaEnv {
  readonly VITE_ENABLE_DEBUG_LOGS?: string;
  readonly VITE_COMPLETION_MAX_HISTORY?: string;
  readonly VITE_COMPLETION_MAX_VISIBLE?: string;
  readonly VITE_COMPLETION_STORAGE_KEY?: string;
}

interface ImportMeta {
  readonly env: ImportMetaEnv;
}
