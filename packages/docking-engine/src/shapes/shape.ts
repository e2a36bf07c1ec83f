/**
 * Shape Model
 *
 * Queries and rigid transforms shared by every shape kind. Shapes are
 * immutable values: transforms return a new shape whose vertices and
 * reference point were moved by the same motion. The reference point is
 * never re-derived from the moved vertices and the inner radius never changes.
 */

import type { Edge, Point2D, Shape, ShapeKind, Vector2D } from '../types';
import { addVectors, cross, rotateAbout, vectorBetween } from '../utils/geometry';

// =============================================================================
// Queries
// =============================================================================

export function shapeVertices(shape: Shape): readonly Point2D[] {
    return shape.vertices;
}

export function referencePoint(shape: Shape): Point2D {
    return shape.referencePoint;
}

export function innerRadius(shape: Shape): number {
    return shape.innerRadius;
}

/**
 * Yields the boundary edges in winding order, starting at (last, first).
 * Each call returns a fresh iterator.
 */
export function* shapeEdges(shape: Shape): Generator<Edge, void, undefined> {
    const { vertices } = shape;
    let tail = vertices[vertices.length - 1];
    for (const head of vertices) {
        yield { tail, head };
        tail = head;
    }
}

const SHAPE_KINDS: readonly ShapeKind[] = ['triangle', 'quadrilateral'];

export function isShape(value: unknown): value is Shape {
    if (typeof value !== 'object' || value === null) return false;
    if (!('kind' in value) || !('vertices' in value)) return false;
    const { kind, vertices } = value;
    if (typeof kind !== 'string' || !SHAPE_KINDS.some((known) => known === kind)) return false;
    if (!Array.isArray(vertices)) return false;
    return vertices.length === (kind === 'triangle' ? 3 : 4);
}

// =============================================================================
// Containment
// =============================================================================

/**
 * Same-side test against each edge. A point on the boundary counts as inside.
 * Assumes a non-degenerate triangle, which shape construction guarantees.
 */
export function triangleContains(point: Point2D, a: Point2D, b: Point2D, c: Point2D): boolean {
    const corners = [a, b, c];
    for (let n = 0; n < 3; n += 1) {
        const opposite = corners[n];
        const from = corners[(n + 1) % 3];
        const to = corners[(n + 2) % 3];
        const edge = vectorBetween(from, to);
        const pointSide = cross(edge, vectorBetween(from, point));
        const oppositeSide = cross(edge, vectorBetween(from, opposite));
        if (pointSide * oppositeSide < 0) return false;
    }
    return true;
}

export function shapeContains(shape: Shape, point: Point2D): boolean {
    switch (shape.kind) {
        case 'triangle': {
            const [a, b, c] = shape.vertices;
            return triangleContains(point, a, b, c);
        }
        case 'quadrilateral': {
            const [a, b, c, d] = shape.vertices;
            return triangleContains(point, a, b, c) || triangleContains(point, c, d, a);
        }
    }
}

// =============================================================================
// Rigid Transforms
// =============================================================================

function mapShapePoints(shape: Shape, transform: (point: Point2D) => Point2D): Shape {
    const referencePoint = transform(shape.referencePoint);
    switch (shape.kind) {
        case 'triangle': {
            const [a, b, c] = shape.vertices;
            return { ...shape, vertices: [transform(a), transform(b), transform(c)], referencePoint };
        }
        case 'quadrilateral': {
            const [a, b, c, d] = shape.vertices;
            return {
                ...shape,
                vertices: [transform(a), transform(b), transform(c), transform(d)],
                referencePoint,
            };
        }
    }
}

/** Counter-clockwise rotation (radians) about the current reference point. */
export function rotateShape(shape: Shape, angle: number): Shape {
    const pivot = shape.referencePoint;
    return mapShapePoints(shape, (point) => rotateAbout(point, pivot, angle));
}

export function moveShapeBy(shape: Shape, offset: Vector2D): Shape {
    return mapShapePoints(shape, (point) => addVectors(point, offset));
}

/** Translates the shape so that its reference point lands exactly on `point`. */
export function moveShapeTo(shape: Shape, point: Point2D): Shape {
    const moved = moveShapeBy(shape, vectorBetween(shape.referencePoint, point));
    return { ...moved, referencePoint: { x: point.x, y: point.y } };
}
