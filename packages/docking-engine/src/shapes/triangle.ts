import { DegenerateGeometryError } from '../errors';
import type { Point2D, TriangleShape } from '../types';
import {
    cross,
    inclinationAngle,
    lineIntersection,
    pointToLineDistance,
    vectorBetween,
} from '../utils/geometry';

export function assertNotCollinear(a: Point2D, b: Point2D, c: Point2D): void {
    if (cross(vectorBetween(a, b), vectorBetween(a, c)) === 0) {
        throw new DegenerateGeometryError(
            `Points (${a.x}, ${a.y}), (${b.x}, ${b.y}), (${c.x}, ${c.y}) are collinear.`
        );
    }
}

/**
 * Mean of two ray inclinations taken across the interior angle between them.
 * Without the wrap, rays straddling ±π would average onto the external bisector.
 */
function bisectInclinations(first: number, second: number): number {
    let a = first;
    let b = second;
    if (Math.abs(a - b) > Math.PI) {
        if (a < b) {
            a += 2 * Math.PI;
        } else {
            b += 2 * Math.PI;
        }
    }
    return (a + b) / 2;
}

/**
 * Builds a triangle whose reference point is the incenter, found as the
 * intersection of the internal bisectors at A and C.
 *
 * @throws DegenerateGeometryError when the vertices are collinear.
 */
export function createTriangle(a: Point2D, b: Point2D, c: Point2D): TriangleShape {
    assertNotCollinear(a, b, c);

    const inclinationAB = inclinationAngle(a, b);
    const inclinationAC = inclinationAngle(a, c);
    const inclinationCB = inclinationAngle(c, b);

    const bisectorA = bisectInclinations(inclinationAB, inclinationAC);
    // The ray C→A points opposite to A→C.
    const bisectorC = bisectInclinations(inclinationCB, inclinationAC + Math.PI);

    const incenter = lineIntersection(
        a,
        { x: Math.cos(bisectorA), y: Math.sin(bisectorA) },
        c,
        { x: Math.cos(bisectorC), y: Math.sin(bisectorC) }
    );

    return {
        kind: 'triangle',
        vertices: [
            { x: a.x, y: a.y },
            { x: b.x, y: b.y },
            { x: c.x, y: c.y },
        ],
        referencePoint: incenter,
        innerRadius: pointToLineDistance(incenter, a, vectorBetween(a, c)),
    };
}
