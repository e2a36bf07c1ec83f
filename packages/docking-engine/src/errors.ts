/**
 * Geometry errors.
 *
 * A single failure kind covers every line, intersection or distance
 * computation that has no defined answer.
 */

export type GeometryErrorKind = 'degenerate-geometry';

export class DegenerateGeometryError extends Error {
    readonly kind: GeometryErrorKind = 'degenerate-geometry';

    constructor(message: string) {
        super(message);
        this.name = 'DegenerateGeometryError';
    }
}

export function isDegenerateGeometryError(error: unknown): error is DegenerateGeometryError {
    return error instanceof DegenerateGeometryError;
}
