/**
 * Geometry Kernel
 *
 * Stateless point/vector arithmetic and line algebra. Lines are never stored:
 * they are passed either as (base point, direction vector) or as two points.
 * Every division is guarded so that NaN/Infinity never leaks into callers.
 */

import { DegenerateGeometryError } from '../errors';
import type { Point2D, Vector2D } from '../types';

// =============================================================================
// Vector Arithmetic
// =============================================================================

export function vectorBetween(from: Point2D, to: Point2D): Vector2D {
    return { x: to.x - from.x, y: to.y - from.y };
}

export function addVectors(a: Point2D, b: Vector2D): Point2D {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function scaleVector(vector: Vector2D, factor: number): Vector2D {
    return { x: vector.x * factor, y: vector.y * factor };
}

export function length(vector: Vector2D): number {
    return Math.hypot(vector.x, vector.y);
}

export function distance(a: Point2D, b: Point2D): number {
    return Math.hypot(b.x - a.x, b.y - a.y);
}

export function dot(a: Vector2D, b: Vector2D): number {
    return a.x * b.x + a.y * b.y;
}

/** Scalar 2D cross product; positive when `b` turns counter-clockwise from `a`. */
export function cross(a: Vector2D, b: Vector2D): number {
    return a.x * b.y - b.x * a.y;
}

/** 90° counter-clockwise rotation. */
export function perpendicular(vector: Vector2D): Vector2D {
    return { x: -vector.y, y: vector.x };
}

/**
 * Angle of the ray a→b in (−π, π]. Coincident points give 0.
 */
export function inclinationAngle(a: Point2D, b: Point2D): number {
    const ab = vectorBetween(a, b);
    if (ab.x === 0 && ab.y === 0) return 0;
    return Math.atan2(ab.y, ab.x);
}

/** Wraps an angle into (−π, π]. */
export function normalizeAngle(angle: number): number {
    let wrapped = angle % (2 * Math.PI);
    if (wrapped <= -Math.PI) wrapped += 2 * Math.PI;
    if (wrapped > Math.PI) wrapped -= 2 * Math.PI;
    return wrapped;
}

export function rotateAbout(point: Point2D, pivot: Point2D, angle: number): Point2D {
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    const dx = point.x - pivot.x;
    const dy = point.y - pivot.y;
    return {
        x: pivot.x + dx * cos - dy * sin,
        y: pivot.y + dx * sin + dy * cos,
    };
}

// =============================================================================
// Line Algebra
// =============================================================================

/**
 * Intersection of the lines baseA + p·dirA and baseB + q·dirB.
 *
 * @throws DegenerateGeometryError when the directions are parallel or either is zero-length.
 */
export function lineIntersection(
    baseA: Point2D,
    dirA: Vector2D,
    baseB: Point2D,
    dirB: Vector2D
): Point2D {
    const normalB = perpendicular(dirB);
    const denominator = dot(normalB, dirA);
    if (denominator === 0) {
        throw new DegenerateGeometryError('Lines are parallel or have a zero-length direction.');
    }
    const p = dot(normalB, vectorBetween(baseA, baseB)) / denominator;
    if (!Number.isFinite(p)) {
        throw new DegenerateGeometryError('Line intersection is not finite.');
    }
    return addVectors(baseA, scaleVector(dirA, p));
}

/**
 * @throws DegenerateGeometryError when `dir` has zero length.
 */
export function pointToLineDistance(point: Point2D, base: Point2D, dir: Vector2D): number {
    const dirLength = length(dir);
    if (dirLength === 0) {
        throw new DegenerateGeometryError('Line direction has zero length.');
    }
    return Math.abs(cross(vectorBetween(point, base), dir)) / dirLength;
}
