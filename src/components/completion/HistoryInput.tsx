import React, { forwardRef, useCallback, useEffect, useImperativeHandle, useRef, useState } from 'react';
import { useTranslation } from 'react-i18next';
import toast from '@/components/Toast/toast';
import {
    CompletingTextInput,
    type CompletingTextInputHandle,
    type CompletingTextInputProps,
} from '@/components/completion/CompletingTextInput';
import { completionConfig } from '@/config/completion';
import { useHistoryStore } from '@/hooks/useHistoryStore';
import { usePreferencesStore } from '@/store/preferencesStore';
import { isCommittable, normalizeHistory, pushHistory } from '@/utils/completionHistory';
import { telemetry } from '@/utils/telemetry';

export interface HistoryInputHandle extends CompletingTextInputHandle {
    /** Hand the current text to `onCommit` and record it in history. */
    commit: () => void;
    clearHistory: () => void;
    readonly history: string[];
}

export interface HistoryInputProps extends Omit<CompletingTextInputProps, 'completionEnabled' | 'onContextMenu'> {
    maxHistory?: number;
    /** Label of the context menu entry that clears this field's history. */
    clearLabel?: string;
}

interface MenuPosition {
    x: number;
    y: number;
}

export const HistoryInput = forwardRef<HistoryInputHandle, HistoryInputProps>(({
    name,
    onCommit,
    maxHistory = completionConfig.maxHistory,
    clearLabel,
    ...inputProps
}, ref) => {
    const { t } = useTranslation();
    const store = useHistoryStore();
    const completionDisabled = usePreferencesStore((s) => s.disabledCompletion[name] === true);
    const toggleCompletion = usePreferencesStore((s) => s.toggleCompletion);
    const inputRef = useRef<CompletingTextInputHandle>(null);
    const menuRef = useRef<HTMLDivElement>(null);
    const [menu, setMenu] = useState<MenuPosition | null>(null);

    const loadHistory = useCallback(
        () => normalizeHistory(store.get(name), maxHistory),
        [store, name, maxHistory]
    );

    useEffect(() => {
        const history = loadHistory();
        inputRef.current?.setAllItems(history);
        telemetry.historyLoad({ field: name, size: history.length });
    }, [loadHistory, name]);

    useEffect(() => {
        if (!menu) return;
        const handleClickOutside = (event: MouseEvent) => {
            if (menuRef.current && event.target instanceof Node && !menuRef.current.contains(event.target)) {
                setMenu(null);
            }
        };
        const handleEscape = (event: KeyboardEvent) => {
            if (event.key === 'Escape') setMenu(null);
        };
        document.addEventListener('mousedown', handleClickOutside);
        document.addEventListener('keydown', handleEscape);
        return () => {
            document.removeEventListener('mousedown', handleClickOutside);
            document.removeEventListener('keydown', handleEscape);
        };
    }, [menu]);

    const commit = useCallback(() => {
        const input = inputRef.current;
        if (!input) return;
        const text = input.text;
        input.hideCompletionPopup();
        onCommit?.(text);
        if (!isCommittable(text)) return;

        const history = pushHistory(loadHistory(), text, maxHistory);
        store.set(name, history);
        input.setAllItems(history);
        telemetry.historyCommit({ field: name, size: history.length });
    }, [onCommit, loadHistory, maxHistory, store, name]);

    const clearHistory = useCallback(() => {
        store.set(name, []);
        inputRef.current?.setAllItems([]);
        inputRef.current?.hideCompletionPopup();
        telemetry.historyClear({ field: name });
        toast.info(t('completion.historyCleared'));
    }, [store, name, t]);

    useImperativeHandle(ref, () => ({
        get input() {
            return inputRef.current?.input ?? null;
        },
        get text() {
            return inputRef.current?.text ?? '';
        },
        get history() {
            return loadHistory();
        },
        setText: (text) => inputRef.current?.setText(text),
        setAllItems: (items) => inputRef.current?.setAllItems(items),
        applyCompletion: (text) => inputRef.current?.applyCompletion(text) ?? false,
        hideCompletionPopup: () => inputRef.current?.hideCompletionPopup(),
        focus: () => inputRef.current?.focus(),
        commit,
        clearHistory,
    }), [loadHistory, commit, clearHistory]);

    const handleContextMenu = (e: React.MouseEvent<HTMLInputElement>) => {
        e.preventDefault();
        inputRef.current?.hideCompletionPopup();
        setMenu({ x: e.clientX, y: e.clientY });
    };

    const runMenuAction = (action: () => void) => {
        action();
        setMenu(null);
    };

    return (
        <>
            <CompletingTextInput
                ref={inputRef}
                name={name}
                {...inputProps}
                onCommit={commit}
                completionEnabled={!completionDisabled}
                onContextMenu={handleContextMenu}
            />
            {menu && (
                <div
                    ref={menuRef}
                    role="menu"
                    style={{ top: menu.y, left: menu.x }}
                    className="fixed z-50 min-w-[14rem] bg-white dark:bg-dropdown-dark rounded-xl shadow-lg border border-slate-100 dark:border-border-dark py-1"
                >
                    <button
                        type="button"
                        role="menuitem"
                        onClick={() => runMenuAction(clearHistory)}
                        className="focus-ring w-full px-4 py-2 text-left text-sm text-red-400 hover:text-red-600 hover:bg-slate-50 dark:hover:bg-surface-dark"
                    >
                        {clearLabel ?? t('completion.clearHistory')}
                    </button>
                    <button
                        type="button"
                        role="menuitem"
                        onClick={() => runMenuAction(() => toggleCompletion(name))}
                        className="focus-ring w-full px-4 py-2 text-left text-sm text-slate-700 dark:text-slate-200 hover:bg-slate-50 dark:hover:bg-surface-dark"
                    >
                        {completionDisabled ? t('completion.enable') : t('completion.disable')}
                    </button>
                </div>
            )}
        </>
    );
});

HistoryInput.displayName = 'HistoryInput';
