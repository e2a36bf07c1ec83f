/**
 * Docking Transform
 *
 * Resolves the rigid motion that lays a matched floating edge flush against
 * its static edge: a rotation about the floating shape's reference point that
 * makes the edges antiparallel, followed by a translation along the static
 * edge's normal onto its line.
 */

import { DegenerateGeometryError } from '../errors';
import { moveShapeBy, rotateShape } from '../shapes';
import type { DockingMatch, DockingTransform, Shape } from '../types';
import {
    dot,
    inclinationAngle,
    length,
    normalizeAngle,
    perpendicular,
    rotateAbout,
    scaleVector,
    vectorBetween,
} from '../utils/geometry';

export function resolveDockingTransform(floating: Shape, match: DockingMatch): DockingTransform {
    const { staticEdge, floatingEdge } = match;
    const staticVector = vectorBetween(staticEdge.tail, staticEdge.head);
    const staticLength = length(staticVector);
    if (staticLength === 0) {
        throw new DegenerateGeometryError('Static edge has zero length.');
    }

    const angle = normalizeAngle(
        inclinationAngle(staticEdge.head, staticEdge.tail) -
            inclinationAngle(floatingEdge.tail, floatingEdge.head)
    );

    const rotatedTail = rotateAbout(floatingEdge.tail, floating.referencePoint, angle);
    const normal = scaleVector(perpendicular(staticVector), 1 / staticLength);
    const gap = dot(normal, vectorBetween(rotatedTail, staticEdge.tail));

    return { angle, offset: scaleVector(normal, gap) };
}

export function applyDockingTransform(shape: Shape, transform: DockingTransform): Shape {
    return moveShapeBy(rotateShape(shape, transform.angle), transform.offset);
}

export function snapToDocking(floating: Shape, match: DockingMatch): Shape {
    return applyDockingTransform(floating, resolveDockingTransform(floating, match));
}
