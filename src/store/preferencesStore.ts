import { create } from 'zustand';
import { persist } from 'zustand/middleware';
import { completionConfig } from '@/config/completion';

interface PreferencesState {
  /** Fields whose history completion popup the user switched off. */
  disabledCompletion: Record<string, boolean>;
  setCompletionDisabled: (field: string, disabled: boolean) => void;
  toggleCompletion: (field: string) => void;
}

export const usePreferencesStore = create<PreferencesState>()(
  persist(
    (set, get) => ({
      disabledCompletion: {},
      setCompletionDisabled: (field, disabled) => {
        set((state) => ({ disabledCompletion: { ...state.disabledCompletion, [field]: disabled } }));
      },
      toggleCompletion: (field) => {
        get().setCompletionDisabled(field, get().disabledCompletion[field] !== true);
      },
    }),
    {
      name: completionConfig.preferencesKey,
      partialize: (state) => ({ disabledCompletion: state.disabledCompletion }),
    }
  )
);
