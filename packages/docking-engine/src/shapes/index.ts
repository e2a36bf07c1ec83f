/**
 * Shapes
 *
 * Convex tangram pieces: triangles and parallelograms.
 */

import type { Point2D, Shape, ShapeKind } from '../types';

import { createQuadrilateral } from './quadrilateral';
import { createTriangle } from './triangle';

export { createTriangle } from './triangle';
export { createQuadrilateral } from './quadrilateral';
export {
    innerRadius,
    isShape,
    moveShapeBy,
    moveShapeTo,
    referencePoint,
    rotateShape,
    shapeContains,
    shapeEdges,
    shapeVertices,
    triangleContains,
} from './shape';

/**
 * Both kinds are defined by three consecutive vertices.
 */
export function shapeFromVertices(
    kind: ShapeKind,
    defining: readonly [Point2D, Point2D, Point2D]
): Shape {
    const [a, b, c] = defining;
    return kind === 'triangle' ? createTriangle(a, b, c) : createQuadrilateral(a, b, c);
}
