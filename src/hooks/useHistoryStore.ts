import { useContext } from 'react';
import { HistoryStoreContext } from '@/components/completion/HistoryStoreProvider';

export function useHistoryStore() {
    const store = useContext(HistoryStoreContext);
    if (!store) {
        throw new Error('useHistoryStore must be used within a HistoryStoreProvider');
    }
    return store;
}
