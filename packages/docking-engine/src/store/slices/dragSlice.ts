/**
 * Drag Slice
 *
 * Drag state machine for the active piece: idle → moving | rotating → idle.
 * A press inside a piece's inner circle moves it; anywhere else in the piece
 * rotates it about its reference point. After every pointer sample the moved
 * piece is matched against the other pieces, so the docking highlight always
 * refers to the edges currently on screen.
 */

import type { StateCreator } from 'zustand/vanilla';

import { DEFAULT_DOCKING_SETTINGS } from '../../constants/docking';
import { dock } from '../../docking/DockingEngine';
import { snapToDocking } from '../../docking/docking-transform';
import { moveShapeBy, rotateShape } from '../../shapes';
import type {
    DockingMatch,
    DockingSettings,
    DragMode,
    Point2D,
    Shape,
    TangramPiece,
    Vector2D,
} from '../../types';
import { distance, inclinationAngle, normalizeAngle, vectorBetween } from '../../utils/geometry';

// =============================================================================
// Types
// =============================================================================

export interface DragSettings extends DockingSettings {
    /** Lay the active piece flush against the highlighted edge on release. */
    snapOnRelease: boolean;
}

export const DEFAULT_DRAG_SETTINGS: DragSettings = {
    ...DEFAULT_DOCKING_SETTINGS,
    snapOnRelease: false,
};

export interface DragSliceState {
    mode: DragMode;
    activePieceId: string | null;
    previousPointer: Point2D | null;
    docking: DockingMatch | null;
    settings: DragSettings;
}

export interface DragSliceActions {
    press: (point: Point2D) => void;
    pointerMove: (point: Point2D) => void;
    release: () => void;
    updateSettings: (settings: Partial<DragSettings>) => void;
}

export type DragSlice = DragSliceState & DragSliceActions;

// =============================================================================
// Slice Dependencies Interface
// =============================================================================

interface SliceDependencies {
    pieces: TangramPiece[];
    findPieceAt: (point: Point2D) => TangramPiece | null;
    replaceShape: (id: string, shape: Shape) => void;
    raisePiece: (id: string) => void;
}

const ZERO_MOVE: Vector2D = { x: 0, y: 0 };

// =============================================================================
// Slice Creator
// =============================================================================

export const createDragSlice: StateCreator<
    DragSlice & SliceDependencies,
    [],
    [],
    DragSlice
> = (set, get) => {
    const findDocking = (id: string, floating: Shape, rotateSign: number, move: Vector2D): DockingMatch | null => {
        const { pieces, settings } = get();
        const staticShapes = pieces.filter((piece) => piece.id !== id).map((piece) => piece.shape);
        return dock(
            staticShapes,
            floating,
            settings.angularThresholdCos,
            settings.distanceThreshold,
            rotateSign,
            move
        );
    };

    return {
        // Initial State
        mode: 'idle',
        activePieceId: null,
        previousPointer: null,
        docking: null,
        settings: { ...DEFAULT_DRAG_SETTINGS },

        // Actions
        press: (point) => {
            if (get().mode !== 'idle') return;
            const piece = get().findPieceAt(point);
            if (!piece) return;

            const insideInnerCircle = distance(point, piece.shape.referencePoint) <= piece.shape.innerRadius;
            set({
                mode: insideInnerCircle ? 'moving' : 'rotating',
                activePieceId: piece.id,
                previousPointer: point,
                docking: null,
            });
        },

        pointerMove: (point) => {
            const { mode, activePieceId, previousPointer, pieces, replaceShape } = get();
            if (mode === 'idle' || !previousPointer) return;
            const active = pieces.find((piece) => piece.id === activePieceId);
            if (!active) return;

            if (mode === 'moving') {
                const move = vectorBetween(previousPointer, point);
                const moved = moveShapeBy(active.shape, move);
                replaceShape(active.id, moved);
                set({ previousPointer: point, docking: findDocking(active.id, moved, 0, move) });
                return;
            }

            const pivot = active.shape.referencePoint;
            const angle = normalizeAngle(inclinationAngle(pivot, point) - inclinationAngle(pivot, previousPointer));
            const rotated = rotateShape(active.shape, angle);
            replaceShape(active.id, rotated);
            set({ previousPointer: point, docking: findDocking(active.id, rotated, Math.sign(angle), ZERO_MOVE) });
        },

        release: () => {
            const { mode, activePieceId, docking, settings, pieces, replaceShape, raisePiece } = get();
            if (mode === 'idle') return;

            const active = pieces.find((piece) => piece.id === activePieceId);
            if (active) {
                if (settings.snapOnRelease && docking) {
                    replaceShape(active.id, snapToDocking(active.shape, docking));
                }
                raisePiece(active.id);
            }
            set({ mode: 'idle', activePieceId: null, previousPointer: null, docking: null });
        },

        updateSettings: (settings) =>
            set((state) => ({
                settings: {
                    ...state.settings,
                    ...settings,
                    distanceThreshold: Math.max(settings.distanceThreshold ?? state.settings.distanceThreshold, 0),
                },
            })),
    };
};
