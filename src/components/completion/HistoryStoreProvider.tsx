import React, { createContext, useEffect } from 'react';
import type { HistoryStore } from '@/types/completion';

export const HistoryStoreContext = createContext<HistoryStore | null>(null);

/**
 * Makes `store` available to history inputs below it and keeps it open for
 * as long as the provider is mounted.
 */
export const HistoryStoreProvider: React.FC<{ store: HistoryStore; children: React.ReactNode }> = ({ store, children }) => {
    useEffect(() => {
        store.open?.();
        return () => store.close?.();
    }, [store]);

    return (
        <HistoryStoreContext.Provider value={store}>
            {children}
        </HistoryStoreContext.Provider>
    );
};
