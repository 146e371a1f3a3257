import React, { useEffect, useRef } from 'react';
import { motion, AnimatePresence } from 'framer-motion';
import { useTranslation } from 'react-i18next';
import { useStore } from 'zustand';
import { Highlight } from '@/components/common/Highlight';
import { CompletionPopupController } from '@/components/completion/CompletionPopupController';

interface CompletionPopupProps {
    controller: CompletionPopupController;
    /** Id of the listbox; option ids are derived from it. */
    id: string;
}

export const optionId = (listId: string, index: number): string => `${listId}-option-${index}`;

export const CompletionPopup: React.FC<CompletionPopupProps> = ({ controller, id }) => {
    const { t } = useTranslation();
    const visible = useStore(controller.store, (s) => s.visible);
    const candidates = useStore(controller.store, (s) => s.candidates);
    const highlighted = useStore(controller.store, (s) => s.highlighted);
    const query = useStore(controller.store, (s) => s.query);
    const anchor = useStore(controller.store, (s) => s.anchor);
    const listRef = useRef<HTMLUListElement>(null);

    // Presses outside the popup's UI group dismiss it
    useEffect(() => {
        if (!visible) return;
        const handleMouseDown = (event: MouseEvent) => {
            const target = event.target;
            if (target instanceof Node && listRef.current?.contains(target)) return;
            if (controller.containsTarget(target)) return;
            controller.hide();
        };
        document.addEventListener('mousedown', handleMouseDown);
        return () => document.removeEventListener('mousedown', handleMouseDown);
    }, [visible, controller]);

    const position = anchor
        ? { top: anchor.offsetTop + anchor.offsetHeight, left: anchor.offsetLeft, minWidth: anchor.offsetWidth }
        : undefined;

    return (
        <AnimatePresence>
            {visible && candidates.length > 0 && (
                <motion.ul
                    key="completion-popup"
                    ref={listRef}
                    id={id}
                    role="listbox"
                    aria-label={t('completion.listLabel')}
                    initial={{ opacity: 0, y: -4 }}
                    animate={{ opacity: 1, y: 0 }}
                    exit={{ opacity: 0, y: -4 }}
                    transition={{ duration: 0.15 }}
                    style={position}
                    className="absolute mt-1 bg-white dark:bg-dropdown-dark rounded-xl shadow-xl border border-slate-100 dark:border-border-dark z-50 overflow-hidden"
                >
                    {candidates.map((item, index) => (
                        <li
                            key={`${index}:${item}`}
                            id={optionId(id, index)}
                            role="option"
                            aria-selected={index === highlighted}
                            onMouseDown={(e) => { e.preventDefault(); controller.select(index); }}
                            onMouseEnter={() => controller.setHighlight(index)}
                            className={`px-4 py-2 text-sm cursor-pointer truncate transition-colors ${index === highlighted
                                    ? 'bg-primary/10 dark:bg-primary/15 text-primary'
                                    : 'text-slate-700 dark:text-slate-200 hover:bg-slate-50 dark:hover:bg-surface-dark'
                                }`}
                        >
                            <Highlight text={item} query={query} />
                        </li>
                    ))}
                </motion.ul>
            )}
        </AnimatePresence>
    );
};
