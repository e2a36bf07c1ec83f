import { describe, expect, it } from 'vitest';

import { DegenerateGeometryError } from '../src/errors';
import {
    createQuadrilateral,
    createTriangle,
    innerRadius,
    isShape,
    moveShapeBy,
    moveShapeTo,
    referencePoint,
    rotateShape,
    shapeContains,
    shapeEdges,
    shapeFromVertices,
    shapeVertices,
    triangleContains,
} from '../src/shapes';
import type { Shape } from '../src/types';
import { expectPointClose, expectVerticesClose, toPoint } from './test-utils';

function buildShape(vertices: Shape['vertices'], reference: { x: number; y: number }): Shape {
    if (vertices.length === 3) {
        return { kind: 'triangle', vertices, referencePoint: reference, innerRadius: 1 };
    }
    return { kind: 'quadrilateral', vertices, referencePoint: reference, innerRadius: 1 };
}

describe('triangle construction', () => {
    it('places the reference point at the incenter of an equilateral triangle', () => {
        const triangle = createTriangle(toPoint(0, 4), toPoint(2 * Math.sqrt(3), -2), toPoint(-2 * Math.sqrt(3), -2));
        expectPointClose(referencePoint(triangle), toPoint(0, 0));
        expect(Math.abs(innerRadius(triangle) - 2)).toBeLessThanOrEqual(1e-6);
    });

    it('finds the incenter of a scalene triangle at any offset', () => {
        [toPoint(0, 0), toPoint(3, 0), toPoint(0, 5), toPoint(-10, 7)].forEach((offset) => {
            const triangle = createTriangle(
                toPoint(-22 + offset.x, -7 + offset.y),
                toPoint(11 + offset.x, 23 + offset.y),
                toPoint(12 + offset.x, -12 + offset.y)
            );
            expectPointClose(triangle.referencePoint, toPoint(1.2 + offset.x, 0.1 + offset.y), 0.1);
            expect(Math.abs(triangle.innerRadius - 10.4)).toBeLessThan(0.005);
        });
    });

    it('copies the defining vertices in winding order', () => {
        const a = toPoint(0, 0);
        const triangle = createTriangle(a, toPoint(60, 60), toPoint(0, 120));
        expect(triangle.kind).toBe('triangle');
        expect(shapeVertices(triangle)).toEqual([toPoint(0, 0), toPoint(60, 60), toPoint(0, 120)]);
        expect(triangle.vertices[0]).not.toBe(a);
    });

    it('rejects collinear vertices', () => {
        expect(() => createTriangle(toPoint(0, 0), toPoint(1, 1), toPoint(2, 2))).toThrow(DegenerateGeometryError);
        expect(() => createTriangle(toPoint(1, 2), toPoint(3, 2), toPoint(5, 2))).toThrow(DegenerateGeometryError);
    });
});

describe('quadrilateral construction', () => {
    it('closes the parallelogram and centres the reference point', () => {
        const quadrilateral = createQuadrilateral(toPoint(2, 1), toPoint(7, 1), toPoint(8, 4));
        expect(quadrilateral.vertices[3]).toEqual({ x: 3, y: 4 });
        expectPointClose(quadrilateral.referencePoint, toPoint(5, 2.5));
        expect(quadrilateral.innerRadius).toBe(1.5);
    });

    it('rejects collinear defining vertices', () => {
        expect(() => createQuadrilateral(toPoint(0, 0), toPoint(1, 0), toPoint(2, 0))).toThrow(
            DegenerateGeometryError
        );
    });

    it('builds either kind from three vertices', () => {
        const defining = [toPoint(2, 1), toPoint(7, 1), toPoint(8, 4)] as const;
        expect(shapeFromVertices('triangle', defining).vertices).toHaveLength(3);
        expect(shapeFromVertices('quadrilateral', defining).vertices).toHaveLength(4);
    });
});

describe('edges', () => {
    it('starts at (last, first) and covers the boundary once', () => {
        const triangle = createTriangle(toPoint(2, 1), toPoint(5, 2), toPoint(3, 4));
        expect(Array.from(shapeEdges(triangle))).toEqual([
            { tail: toPoint(3, 4), head: toPoint(2, 1) },
            { tail: toPoint(2, 1), head: toPoint(5, 2) },
            { tail: toPoint(5, 2), head: toPoint(3, 4) },
        ]);
    });

    it('restarts on every call', () => {
        const quadrilateral = createQuadrilateral(toPoint(2, 1), toPoint(7, 1), toPoint(8, 4));
        expect(Array.from(shapeEdges(quadrilateral))).toHaveLength(4);
        expect(Array.from(shapeEdges(quadrilateral))).toHaveLength(4);
    });
});

describe('containment', () => {
    const tri = [toPoint(0, 3), toPoint(4, -1), toPoint(-2, -1)] as const;

    it('tests points against a triangle', () => {
        expect(triangleContains(toPoint(0, 0), toPoint(0, 1), toPoint(1, -1), toPoint(-1, -1))).toBe(true);
        expect(triangleContains(toPoint(1, 1), toPoint(0, 1), toPoint(1, -1), toPoint(-1, -1))).toBe(false);
        expect(triangleContains(toPoint(0, 0), ...tri)).toBe(true);
    });

    it('counts vertices and edges as inside', () => {
        expect(triangleContains(tri[1], ...tri)).toBe(true);
        expect(triangleContains(toPoint(5, 2.5), toPoint(3, 1), toPoint(6, 1), toPoint(7, 4))).toBe(true);
    });

    it('contains points of either half of a parallelogram', () => {
        const quadrilateral = createQuadrilateral(toPoint(2, 1), toPoint(7, 1), toPoint(8, 4));
        expect(shapeContains(quadrilateral, toPoint(4, 3))).toBe(true);
        expect(shapeContains(quadrilateral, toPoint(6, 2))).toBe(true);
        expect(shapeContains(quadrilateral, toPoint(1, 3))).toBe(false);
    });

    it('contains its own reference point', () => {
        const shapes: Shape[] = [
            createTriangle(toPoint(-1, 0), toPoint(0, 1), toPoint(1, 0)),
            createTriangle(toPoint(0, 0), toPoint(60, 60), toPoint(0, 120)),
            createTriangle(toPoint(0, 120), toPoint(60, 60), toPoint(120, 120)),
            createTriangle(toPoint(-22, -7), toPoint(11, 23), toPoint(12, -12)),
            createQuadrilateral(toPoint(2, 1), toPoint(7, 1), toPoint(8, 4)),
            createQuadrilateral(toPoint(60, 0), toPoint(90, 30), toPoint(60, 60)),
        ];
        shapes.forEach((shape) => {
            expect(shapeContains(shape, shape.referencePoint)).toBe(true);
        });
        expect(shapeContains(shapes[0], toPoint(10, 10))).toBe(false);
    });
});

describe('rigid transforms', () => {
    it('rotates about the reference point', () => {
        const shape = buildShape([toPoint(0, 0), toPoint(0, 3), toPoint(1, 0)], toPoint(0, 0));
        expectVerticesClose(rotateShape(shape, Math.PI), [toPoint(0, 0), toPoint(0, -3), toPoint(-1, 0)]);
        expectVerticesClose(rotateShape(shape, Math.PI / 2), [toPoint(0, 0), toPoint(-3, 0), toPoint(0, 1)]);

        const offCentre = buildShape([toPoint(1, -2), toPoint(4, 5), toPoint(6, -2)], toPoint(4, 5));
        expectVerticesClose(rotateShape(offCentre, Math.PI / 2), [toPoint(11, 2), toPoint(4, 5), toPoint(11, 7)]);
    });

    it('treats a full turn as identity', () => {
        const triangle = createTriangle(toPoint(-22, -7), toPoint(11, 23), toPoint(12, -12));
        expectVerticesClose(rotateShape(triangle, 2 * Math.PI), triangle.vertices);
    });

    it('undoes a rotation with the opposite angle', () => {
        const quadrilateral = createQuadrilateral(toPoint(2, 1), toPoint(7, 1), toPoint(8, 4));
        const restored = rotateShape(rotateShape(quadrilateral, 0.7), -0.7);
        expectVerticesClose(restored, quadrilateral.vertices);
        expectPointClose(restored.referencePoint, quadrilateral.referencePoint);
    });

    it('keeps the incircle under rotation instead of re-deriving it', () => {
        const triangle = createTriangle(toPoint(-22, -7), toPoint(11, 23), toPoint(12, -12));
        const rotated = rotateShape(triangle, Math.PI / 3);
        expect(rotated.referencePoint).toEqual(triangle.referencePoint);
        expect(rotated.innerRadius).toBe(triangle.innerRadius);

        const [a, b, c] = rotated.vertices;
        const rebuilt = createTriangle(a, b, c);
        expectPointClose(rebuilt.referencePoint, triangle.referencePoint);
        expect(rebuilt.innerRadius).toBeCloseTo(triangle.innerRadius, 6);
    });

    it('moves to an absolute position', () => {
        const shape = buildShape([toPoint(0, 0), toPoint(0, 3), toPoint(2, 0)], toPoint(4, 6));
        const moved = moveShapeTo(shape, toPoint(1, 2));
        expect(moved.referencePoint).toEqual({ x: 1, y: 2 });
        expect(moved.vertices).toEqual([toPoint(-3, -4), toPoint(-3, -1), toPoint(-1, -4)]);
    });

    it('moves relatively and back', () => {
        const shape = buildShape([toPoint(0, 0), toPoint(0, 3), toPoint(2, 0)], toPoint(4, 6));
        const moved = moveShapeBy(shape, toPoint(1, 2));
        expect(moved.referencePoint).toEqual({ x: 5, y: 8 });
        expect(moved.vertices).toEqual([toPoint(1, 2), toPoint(1, 5), toPoint(3, 2)]);

        const restored = moveShapeBy(moved, toPoint(-1, -2));
        expect(restored.vertices).toEqual(shape.vertices);
        expect(restored.referencePoint).toEqual(shape.referencePoint);
    });

    it('leaves the original shape untouched', () => {
        const quadrilateral = createQuadrilateral(toPoint(2, 1), toPoint(7, 1), toPoint(8, 4));
        rotateShape(quadrilateral, 1);
        moveShapeBy(quadrilateral, toPoint(10, 10));
        expect(quadrilateral.vertices).toEqual([toPoint(2, 1), toPoint(7, 1), toPoint(8, 4), toPoint(3, 4)]);
        expect(quadrilateral.kind).toBe('quadrilateral');
    });
});

describe('shape guard', () => {
    it('recognises shapes by kind and vertex count', () => {
        expect(isShape(createTriangle(toPoint(0, 0), toPoint(1, 0), toPoint(0, 1)))).toBe(true);
        expect(isShape({ kind: 'triangle', vertices: [] })).toBe(false);
        expect(isShape({ kind: 'hexagon', vertices: [] })).toBe(false);
        expect(isShape(null)).toBe(false);
    });
});
