import React, { forwardRef, useCallback, useEffect, useImperativeHandle, useRef, useState } from 'react';
import { createPortal } from 'react-dom';
import { useStore } from 'zustand';
import { CompletionPopup, optionId } from '@/components/completion/CompletionPopup';
import { CompletionPopupController } from '@/components/completion/CompletionPopupController';
import type { CompletionInputMode, CompletionPopup as CompletionPopupContract, KeyDecoder } from '@/types/completion';
import { decodeKey as defaultDecodeKey } from '@/utils/keys';

export interface CompletingTextInputHandle {
    readonly input: HTMLInputElement | null;
    readonly text: string;
    setText: (text: string) => void;
    setAllItems: (items: readonly string[]) => void;
    /** Returns false, leaving the field untouched, when `text` is empty. */
    applyCompletion: (text: string) => boolean;
    hideCompletionPopup: () => void;
    focus: () => void;
}

export interface CompletingTextInputProps {
    /** Field name; also the element id. */
    name: string;
    placeholder?: string;
    /** Tooltip. */
    title?: string;
    /** Render the field into this element instead of in place. */
    container?: HTMLElement | null;
    mode?: CompletionInputMode;
    onCommit?: (text: string) => void;
    /** Serves this input only; share one popup between inputs and both apply its selections. */
    popup?: CompletionPopupContract;
    decodeKey?: KeyDecoder;
    /** Ids of elements whose presses should not dismiss the popup. */
    associatedWidgets?: readonly string[];
    completionEnabled?: boolean;
    defaultValue?: string;
    onTextChange?: (text: string) => void;
    onContextMenu?: React.MouseEventHandler<HTMLInputElement>;
    className?: string;
    'aria-label'?: string;
}

const NO_WIDGETS: readonly string[] = [];

export const CompletingTextInput = forwardRef<CompletingTextInputHandle, CompletingTextInputProps>(({
    name,
    placeholder,
    title,
    container,
    mode = 'text',
    onCommit,
    popup: injectedPopup,
    decodeKey = defaultDecodeKey,
    associatedWidgets = NO_WIDGETS,
    completionEnabled = true,
    defaultValue = '',
    onTextChange,
    onContextMenu,
    className,
    'aria-label': ariaLabel,
}, ref) => {
    const [ownPopup] = useState(() => new CompletionPopupController());
    const popup = injectedPopup ?? ownPopup;
    const controller = popup instanceof CompletionPopupController ? popup : null;
    const visible = useStore((controller ?? ownPopup).store, (s) => s.visible);
    const highlighted = useStore((controller ?? ownPopup).store, (s) => s.highlighted);

    const inputRef = useRef<HTMLInputElement>(null);
    const [text, setTextState] = useState(defaultValue);
    // Read synchronously by handlers that run before the next render
    const textRef = useRef(defaultValue);

    const updateText = useCallback((next: string) => {
        textRef.current = next;
        setTextState(next);
        onTextChange?.(next);
    }, [onTextChange]);

    const applyCompletion = useCallback((completion: string): boolean => {
        if (!completion) return false;
        updateText(completion);
        inputRef.current?.focus();
        return true;
    }, [updateText]);

    useEffect(() => {
        const input = inputRef.current;
        if (input) popup.addAssociatedWidget(input);
        return () => {
            popup.hide();
            if (input) popup.removeAssociatedWidget?.(input);
        };
    }, [popup]);

    useEffect(() => {
        associatedWidgets.forEach((widget) => popup.addAssociatedWidget(widget));
        return () => associatedWidgets.forEach((widget) => popup.removeAssociatedWidget?.(widget));
    }, [popup, associatedWidgets]);

    useEffect(() => popup.onSelect?.((selected) => { applyCompletion(selected); }), [popup, applyCompletion]);

    useEffect(() => {
        if (!completionEnabled) popup.hide();
    }, [completionEnabled, popup]);

    useImperativeHandle(ref, () => ({
        get input() {
            return inputRef.current;
        },
        get text() {
            return textRef.current;
        },
        setText: updateText,
        setAllItems: (items) => popup.setAllItems(items),
        applyCompletion,
        hideCompletionPopup: () => popup.hide(),
        focus: () => inputRef.current?.focus(),
    }), [popup, updateText, applyCompletion]);

    const handleChange = (e: React.ChangeEvent<HTMLInputElement>) => {
        const value = e.target.value;
        updateText(value);
        if (!completionEnabled) return;
        popup.setQuery(value);
        popup.popup(e.target);
    };

    const handleKeyDown = (e: React.KeyboardEvent<HTMLInputElement>) => {
        const key = decodeKey(e);

        if (popup.isVisible && popup.handleKeydown(key)) {
            e.preventDefault();
            e.stopPropagation();
            return;
        }

        if (key === 'enter') {
            e.preventDefault();
            e.stopPropagation();
            popup.hide();
            onCommit?.(textRef.current);
            return;
        }

        if (key === 'tab' && popup.isVisible) {
            e.preventDefault();
            e.stopPropagation();
            if (applyCompletion(popup.currentText)) {
                popup.hide();
            } else {
                popup.moveHighlight();
            }
        }
    };

    const listId = `${name}-completions`;
    const expanded = controller ? visible : popup.isVisible;

    const field = (
        <div className="relative w-full">
            <input
                ref={inputRef}
                id={name}
                name={name}
                type={mode === 'search' ? 'search' : 'text'}
                value={text}
                placeholder={placeholder}
                title={title}
                role="combobox"
                autoComplete="off"
                spellCheck={false}
                aria-label={ariaLabel}
                aria-autocomplete="list"
                aria-expanded={expanded}
                aria-controls={controller ? listId : undefined}
                aria-activedescendant={controller && visible && highlighted >= 0 ? optionId(listId, highlighted) : undefined}
                onChange={handleChange}
                onKeyDown={handleKeyDown}
                onContextMenu={onContextMenu}
                className={className ?? 'block w-full px-3 py-2 rounded-xl border-none bg-surface-light dark:bg-surface-dark text-slate-900 dark:text-white placeholder-slate-400 focus:ring-2 focus:ring-primary/50 shadow-sm text-sm'}
            />
            {controller && <CompletionPopup controller={controller} id={listId} />}
        </div>
    );

    return container ? createPortal(field, container) : field;
});

CompletingTextInput.displayName = 'CompletingTextInput';
