/**
 * Interaction Types
 *
 * Host-side drag state used by the tangram session store.
 */

import type { Shape } from './index';

export type DragMode = 'idle' | 'moving' | 'rotating';

export interface TangramPiece {
    id: string;
    shape: Shape;
}
