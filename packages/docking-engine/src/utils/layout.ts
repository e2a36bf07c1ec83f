/**
 * Layout Utilities
 *
 * Builds the start-up tangram layout and prints shape positions.
 */

import { FIELD_GRID, FIELD_SIZE, TANGRAM_PIECES, type PieceDefinition } from '../constants/tangram';
import { moveShapeTo, shapeFromVertices } from '../shapes';
import type { Point2D, TangramPiece } from '../types';

export function cellCenter(column: number, row: number): Point2D {
    const cellWidth = FIELD_SIZE.width / FIELD_GRID.columns;
    const cellHeight = FIELD_SIZE.height / FIELD_GRID.rows;
    return {
        x: (column + 0.5) * cellWidth,
        y: (row + 0.5) * cellHeight,
    };
}

export function createLayout(definitions: readonly PieceDefinition[]): TangramPiece[] {
    return definitions.map((definition) => {
        try {
            const shape = shapeFromVertices(definition.kind, definition.vertices);
            return {
                id: definition.id,
                shape: moveShapeTo(shape, cellCenter(definition.cell.column, definition.cell.row)),
            };
        } catch (error) {
            console.warn(`Tangram piece "${definition.id}" could not be built`, error);
            throw error;
        }
    });
}

export function createDefaultTangram(): TangramPiece[] {
    return createLayout(TANGRAM_PIECES);
}

export function formatLayout(pieces: readonly TangramPiece[]): string {
    const lines: string[] = [];
    pieces.forEach((piece, index) => {
        lines.push(`Shape ${index} vertices:`);
        piece.shape.vertices.forEach((vertex) => {
            lines.push(`\t (${vertex.x.toFixed(2)}, ${vertex.y.toFixed(2)})`);
        });
    });
    return lines.join('\n');
}
