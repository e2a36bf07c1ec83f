import type { Point2D, QuadrilateralShape } from '../types';
import { addVectors, lineIntersection, pointToLineDistance, vectorBetween } from '../utils/geometry';

import { assertNotCollinear } from './triangle';

/**
 * Builds a parallelogram from three consecutive vertices; the fourth closes
 * it as D = A + C − B. The reference point is the diagonal intersection.
 *
 * @throws DegenerateGeometryError when the diagonals are parallel.
 */
export function createQuadrilateral(a: Point2D, b: Point2D, c: Point2D): QuadrilateralShape {
    assertNotCollinear(a, b, c);

    const d = addVectors(a, vectorBetween(b, c));
    const center = lineIntersection(a, vectorBetween(a, c), b, vectorBetween(d, b));
    const innerRadius = Math.min(
        pointToLineDistance(center, a, vectorBetween(a, b)),
        pointToLineDistance(center, a, vectorBetween(a, d))
    );

    return {
        kind: 'quadrilateral',
        vertices: [
            { x: a.x, y: a.y },
            { x: b.x, y: b.y },
            { x: c.x, y: c.y },
            d,
        ],
        referencePoint: center,
        innerRadius,
    };
}
