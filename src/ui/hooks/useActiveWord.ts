import { useCallback, useSyncExternalStore } from 'react';
import type { SyncEngine, SyncSnapshot } from '../../core/services/SyncEngine';

/**
 * Re-renders whenever the engine's highlighted word, state or rate changes.
 */
export function useActiveWord(engine: SyncEngine): SyncSnapshot {
    const subscribe = useCallback((onChange: () => void) => engine.subscribeState(onChange), [engine]);
    const getSnapshot = useCallback(() => engine.getSnapshot(), [engine]);

    return useSyncExternalStore(subscribe, getSnapshot, getSnapshot);
}
