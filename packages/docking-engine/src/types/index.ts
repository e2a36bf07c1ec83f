/**
 * Tangram Engine Types
 *
 * Core type definitions for the geometry kernel, shapes and docking.
 */

// Re-export interaction types
export * from './interaction';

// =============================================================================
// Geometry Types
// =============================================================================

export interface Point2D {
    readonly x: number;
    readonly y: number;
}

/** Same layout as a point, but always a displacement and never owned by a shape. */
export type Vector2D = Point2D;

export interface Edge {
    readonly tail: Point2D;
    readonly head: Point2D;
}

// =============================================================================
// Shape Types
// =============================================================================

export type ShapeKind = 'triangle' | 'quadrilateral';

interface ShapeBase {
    readonly vertices: readonly Point2D[];
    readonly referencePoint: Point2D;
    readonly innerRadius: number;
}

export interface TriangleShape extends ShapeBase {
    readonly kind: 'triangle';
    readonly vertices: readonly [Point2D, Point2D, Point2D];
}

export interface QuadrilateralShape extends ShapeBase {
    readonly kind: 'quadrilateral';
    readonly vertices: readonly [Point2D, Point2D, Point2D, Point2D];
}

export type Shape = TriangleShape | QuadrilateralShape;

// =============================================================================
// Docking Types
// =============================================================================

export interface DockingMatch {
    staticEdge: Edge;
    floatingEdge: Edge;
}

export interface DockingCandidate extends DockingMatch {
    /** Largest distance from a floating edge endpoint to the static edge line. */
    distance: number;
    cosTheta: number;
    overlap: number;
}

export interface DockingSettings {
    angularThresholdCos: number;
    distanceThreshold: number;
}

export interface MotionIntent {
    /** +1, -1 or 0; only the sign matters. */
    rotateSign: number;
    move: Vector2D;
}

export interface DockingTransform {
    angle: number;
    offset: Vector2D;
}
