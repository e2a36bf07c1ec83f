/**
 * Store Slices
 *
 * Domain-specific slices composed into the tangram session store.
 */

export { createShapesSlice } from './shapesSlice';
export type { ShapesSlice, ShapesSliceState, ShapesSliceActions } from './shapesSlice';

export { createDragSlice, DEFAULT_DRAG_SETTINGS } from './dragSlice';
export type { DragSlice, DragSliceState, DragSliceActions, DragSettings } from './dragSlice';
