/**
 * Tangram Layout Constants
 *
 * The seven classic pieces cut from a 120 x 120 square, and the field they
 * are spread over at start-up.
 */

import type { Point2D, ShapeKind } from '../types';

export interface PieceDefinition {
    id: string;
    kind: ShapeKind;
    /** Three consecutive vertices; quadrilaterals derive the fourth. */
    vertices: readonly [Point2D, Point2D, Point2D];
    /** Grid cell as (column, row). */
    cell: { column: number; row: number };
}

export const FIELD_SIZE = { width: 640, height: 420 } as const;

export const FIELD_GRID = { columns: 3, rows: 3 } as const;

export const TANGRAM_PIECES: readonly PieceDefinition[] = [
    {
        id: 'large-triangle-a',
        kind: 'triangle',
        vertices: [{ x: 0, y: 0 }, { x: 60, y: 60 }, { x: 0, y: 120 }],
        cell: { column: 0, row: 0 },
    },
    {
        id: 'small-triangle-a',
        kind: 'triangle',
        vertices: [{ x: 0, y: 0 }, { x: 60, y: 0 }, { x: 30, y: 30 }],
        cell: { column: 1, row: 0 },
    },
    {
        id: 'medium-triangle',
        kind: 'triangle',
        vertices: [{ x: 60, y: 0 }, { x: 120, y: 0 }, { x: 120, y: 60 }],
        cell: { column: 2, row: 1 },
    },
    {
        id: 'large-triangle-b',
        kind: 'triangle',
        vertices: [{ x: 0, y: 120 }, { x: 60, y: 60 }, { x: 120, y: 120 }],
        cell: { column: 2, row: 2 },
    },
    {
        id: 'small-triangle-b',
        kind: 'triangle',
        vertices: [{ x: 60, y: 60 }, { x: 90, y: 30 }, { x: 90, y: 90 }],
        cell: { column: 0, row: 1 },
    },
    {
        id: 'square',
        kind: 'quadrilateral',
        vertices: [{ x: 60, y: 0 }, { x: 90, y: 30 }, { x: 60, y: 60 }],
        cell: { column: 0, row: 2 },
    },
    {
        id: 'parallelogram',
        kind: 'quadrilateral',
        vertices: [{ x: 90, y: 30 }, { x: 120, y: 60 }, { x: 120, y: 120 }],
        cell: { column: 2, row: 0 },
    },
];
