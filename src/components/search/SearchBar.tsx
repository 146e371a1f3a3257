import React, { forwardRef, useImperativeHandle, useRef } from 'react';
import { flushSync } from 'react-dom';
import { useTranslation } from 'react-i18next';
import { HistoryInput, type HistoryInputHandle } from '@/components/completion/HistoryInput';
import {
    isSearchDirection,
    isSearchMode,
    useSearchOptionsStore,
    type SearchOptions,
} from '@/store/searchOptionsStore';
import { escapeRegex } from '@/utils/regex';

export type SearchAction = 'find' | 'replace-find' | 'replace' | 'replace-all';

export interface SearchRequest {
    find: string;
    replace: string;
    options: SearchOptions;
}

export interface SearchBarHandle {
    /** Put `text` in the find field, escaped in regex mode, and select it. */
    preFill: (text: string) => void;
    focus: () => void;
}

interface SearchBarProps {
    onSearch: (action: SearchAction, request: SearchRequest) => void;
    maxHistory?: number;
}

const FIND_BUTTON_ID = 'search-find-button';
const REPLACE_FIND_BUTTON_ID = 'search-replace-find-button';
const REPLACE_BUTTON_ID = 'search-replace-button';
const REPLACE_ALL_BUTTON_ID = 'search-replace-all-button';
const REPLACE_BUTTONS = [REPLACE_FIND_BUTTON_ID, REPLACE_BUTTON_ID, REPLACE_ALL_BUTTON_ID];
const FIND_BUTTONS = [FIND_BUTTON_ID];

/**
 * Find / replace bar. Each field keeps its own history; an action commits the
 * field it belongs to. Search options are remembered between sessions.
 */
export const SearchBar = forwardRef<SearchBarHandle, SearchBarProps>(({ onSearch, maxHistory }, ref) => {
    const { t } = useTranslation();
    const options = useSearchOptionsStore((s) => s.options);
    const setOption = useSearchOptionsStore((s) => s.setOption);
    const findRef = useRef<HistoryInputHandle>(null);
    const replaceRef = useRef<HistoryInputHandle>(null);
    const replaceActionRef = useRef<SearchAction>('replace');

    useImperativeHandle(ref, () => ({
        preFill: (text) => {
            const find = findRef.current;
            if (!find) return;
            const value = useSearchOptionsStore.getState().options.mode === 'regex' ? escapeRegex(text) : text;
            flushSync(() => find.setText(value));
            find.focus();
            find.input?.select();
        },
        focus: () => findRef.current?.focus(),
    }), []);

    const request = (find: string, replace: string): SearchRequest => ({
        find,
        replace,
        options: useSearchOptionsStore.getState().options,
    });

    const handleFindCommit = (find: string) => {
        onSearch('find', request(find, replaceRef.current?.text ?? ''));
    };

    const handleReplaceCommit = (replace: string) => {
        const action = replaceActionRef.current;
        replaceActionRef.current = 'replace';
        onSearch(action, request(findRef.current?.text ?? '', replace));
    };

    const triggerReplace = (action: SearchAction) => {
        replaceActionRef.current = action;
        replaceRef.current?.commit();
    };

    const buttonClass = 'focus-ring px-4 py-2 rounded-xl text-sm font-semibold whitespace-nowrap transition-colors';
    const secondaryButtonClass = `${buttonClass} border border-slate-200 dark:border-white/10 text-slate-700 dark:text-slate-300 hover:bg-slate-50 dark:hover:bg-white/5`;
    const labelClass = 'text-sm text-right text-slate-500 dark:text-slate-400';
    const selectClass = 'focus-ring px-2 py-1 rounded-lg bg-surface-light dark:bg-surface-dark text-sm text-slate-700 dark:text-slate-200';

    return (
        <div className="grid grid-cols-[auto_1fr_auto_auto] items-center gap-2">
            <label htmlFor="search-find" className={labelClass}>
                {t('search.findLabel')}
            </label>
            <HistoryInput
                ref={findRef}
                name="search-find"
                mode="search"
                placeholder={t('search.findPlaceholder')}
                clearLabel={t('search.clearFindHistory')}
                associatedWidgets={FIND_BUTTONS}
                maxHistory={maxHistory}
                onCommit={handleFindCommit}
            />
            <button
                id={FIND_BUTTON_ID}
                type="button"
                onClick={() => findRef.current?.commit()}
                className={`${buttonClass} bg-primary text-white hover:bg-sky-500`}
            >
                {t('search.find')}
            </button>
            <button
                id={REPLACE_FIND_BUTTON_ID}
                type="button"
                onClick={() => triggerReplace('replace-find')}
                className={secondaryButtonClass}
            >
                {t('search.replaceFind')}
            </button>

            <label htmlFor="search-replace" className={labelClass}>
                {t('search.replaceLabel')}
            </label>
            <HistoryInput
                ref={replaceRef}
                name="search-replace"
                placeholder={t('search.replacePlaceholder')}
                clearLabel={t('search.clearReplaceHistory')}
                associatedWidgets={REPLACE_BUTTONS}
                maxHistory={maxHistory}
                onCommit={handleReplaceCommit}
            />
            <button
                id={REPLACE_BUTTON_ID}
                type="button"
                onClick={() => triggerReplace('replace')}
                className={secondaryButtonClass}
            >
                {t('search.replace')}
            </button>
            <button
                id={REPLACE_ALL_BUTTON_ID}
                type="button"
                onClick={() => triggerReplace('replace-all')}
                className={secondaryButtonClass}
            >
                {t('search.replaceAll')}
            </button>

            <label htmlFor="search-mode" className={labelClass}>
                {t('search.modeLabel')}
            </label>
            <div className="col-span-3 flex flex-wrap items-center gap-3 text-sm text-slate-700 dark:text-slate-300">
                <select
                    id="search-mode"
                    value={options.mode}
                    title={t('search.modeTitle')}
                    onChange={(e) => {
                        if (isSearchMode(e.target.value)) setOption('mode', e.target.value);
                    }}
                    className={selectClass}
                >
                    <option value="normal">{t('search.modeNormal')}</option>
                    <option value="regex">{t('search.modeRegex')}</option>
                </select>
                <select
                    aria-label={t('search.direction')}
                    value={options.direction}
                    onChange={(e) => {
                        if (isSearchDirection(e.target.value)) setOption('direction', e.target.value);
                    }}
                    className={selectClass}
                >
                    <option value="down">{t('search.directionDown')}</option>
                    <option value="up">{t('search.directionUp')}</option>
                </select>
                <label className="flex items-center gap-1.5 cursor-pointer">
                    <input
                        type="checkbox"
                        checked={options.caseSensitive}
                        onChange={(e) => setOption('caseSensitive', e.target.checked)}
                    />
                    {t('search.caseSensitive')}
                </label>
                <label className="flex items-center gap-1.5 cursor-pointer" title={t('search.wrapTitle')}>
                    <input
                        type="checkbox"
                        checked={options.wrap}
                        onChange={(e) => setOption('wrap', e.target.checked)}
                    />
                    {t('search.wrap')}
                </label>
                {options.mode === 'regex' && (
                    <label className="flex items-center gap-1.5 cursor-pointer" title={t('search.dotAllTitle')}>
                        <input
                            type="checkbox"
                            checked={options.dotAll}
                            onChange={(e) => setOption('dotAll', e.target.checked)}
                        />
                        {t('search.dotAll')}
                    </label>
                )}
            </div>
        </div>
    );
});

SearchBar.displayName = 'SearchBar';
