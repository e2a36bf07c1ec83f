/**
 * Tangram Session Store
 *
 * Vanilla zustand store holding the pieces and the drag state machine.
 * Hosts drive it with press / pointerMove / release and render `docking`.
 */

import { createStore, type StoreApi } from 'zustand/vanilla';

import type { DockingMatch, TangramPiece } from '../types';
import { createDefaultTangram } from '../utils/layout';

import { createDragSlice, createShapesSlice, type DragSlice, type ShapesSlice } from './slices';

export type TangramState = ShapesSlice & DragSlice;

export type TangramStore = StoreApi<TangramState>;

export function createTangramStore(initialPieces: TangramPiece[] = createDefaultTangram()): TangramStore {
    return createStore<TangramState>()((set, get, api) => ({
        ...createShapesSlice(set, get, api),
        ...createDragSlice(set, get, api),
        pieces: [...initialPieces],
    }));
}

export type DockingListener = (docking: DockingMatch | null) => void;

/**
 * Notifies whenever the docking highlight changes. A throwing listener is
 * logged and does not stop the store update.
 */
export function subscribeDocking(store: TangramStore, listener: DockingListener): () => void {
    return store.subscribe((state, previous) => {
        if (state.docking === previous.docking) return;
        try {
            listener(state.docking);
        } catch (error) {
            console.error('Docking listener failed', error);
        }
    });
}

export * from './slices';
