/**
 * Shapes Slice
 *
 * Owns the tangram pieces on the field. Pieces keep their list order, which
 * is also the hit-test order.
 */

import type { StateCreator } from 'zustand/vanilla';

import { shapeContains } from '../../shapes';
import type { Point2D, Shape, TangramPiece } from '../../types';
import { createDefaultTangram } from '../../utils/layout';

// =============================================================================
// Types
// =============================================================================

export interface ShapesSliceState {
    pieces: TangramPiece[];
}

export interface ShapesSliceActions {
    setPieces: (pieces: TangramPiece[]) => void;
    replaceShape: (id: string, shape: Shape) => void;
    raisePiece: (id: string) => void;
    resetLayout: () => void;
    findPieceAt: (point: Point2D) => TangramPiece | null;
}

export type ShapesSlice = ShapesSliceState & ShapesSliceActions;

// =============================================================================
// Slice Creator
// =============================================================================

export const createShapesSlice: StateCreator<ShapesSlice, [], [], ShapesSlice> = (set, get) => ({
    // Initial State
    pieces: [],

    // Actions
    setPieces: (pieces) => set({ pieces: [...pieces] }),

    replaceShape: (id, shape) =>
        set((state) => ({
            pieces: state.pieces.map((piece) => (piece.id === id ? { ...piece, shape } : piece)),
        })),

    raisePiece: (id) =>
        set((state) => {
            const piece = state.pieces.find((item) => item.id === id);
            if (!piece) return {};
            return { pieces: [...state.pieces.filter((item) => item.id !== id), piece] };
        }),

    resetLayout: () => set({ pieces: createDefaultTangram() }),

    findPieceAt: (point) => get().pieces.find((piece) => shapeContains(piece.shape, point)) ?? null,
});
