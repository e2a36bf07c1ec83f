/**
 * Docking Engine
 *
 * Finds the edge pair along which a floating shape should dock against one of
 * the static shapes. Each ordered (floating edge, static edge) pair passes five
 * filters: motion direction, rotation direction, proximity, angular alignment
 * and overlap. Survivors are ranked by (−distance, cosTheta, overlap). On a
 * full tie the pair found first wins.
 *
 * Inputs are never mutated. "No docking" is `null`, never an error.
 */

import { DOCKING_EPSILON, resolveDockingSettings } from '../constants/docking';
import type {
    DockingCandidate,
    DockingMatch,
    DockingSettings,
    Edge,
    MotionIntent,
    Shape,
    Vector2D,
} from '../types';
import { shapeEdges } from '../shapes';
import { cross, dot, length, pointToLineDistance, vectorBetween } from '../utils/geometry';

export interface DockingContext {
    staticShapes: readonly Shape[];
    floating: Shape;
    angularThresholdCos: number;
    distanceThreshold: number;
    manualRotateSign: number;
    manualMove: Vector2D;
}

interface EdgeVector {
    edge: Edge;
    vector: Vector2D;
    length: number;
}

function toEdgeVector(edge: Edge): EdgeVector {
    const vector = vectorBetween(edge.tail, edge.head);
    return { edge, vector, length: length(vector) };
}

/**
 * Length of the part of the static edge covered by the floating edge's
 * projection onto the static edge's line.
 */
function projectedOverlap(staticEdge: EdgeVector, floatingEdge: Edge): number {
    const squared = staticEdge.length * staticEdge.length;
    const tailFraction = dot(staticEdge.vector, vectorBetween(staticEdge.edge.tail, floatingEdge.tail)) / squared;
    const headFraction = dot(staticEdge.vector, vectorBetween(staticEdge.edge.tail, floatingEdge.head)) / squared;
    const lower = Math.max(Math.min(tailFraction, headFraction), 0);
    const upper = Math.min(Math.max(tailFraction, headFraction), 1);
    return staticEdge.length * (upper - lower);
}

function outranks(candidate: DockingCandidate, best: DockingCandidate): boolean {
    if (candidate.distance !== best.distance) return candidate.distance < best.distance;
    if (candidate.cosTheta !== best.cosTheta) return candidate.cosTheta > best.cosTheta;
    return candidate.overlap > best.overlap;
}

export class DockingEngine {
    constructor(private readonly epsilon: number = DOCKING_EPSILON) {}

    findBestDocking(context: DockingContext): DockingMatch | null {
        let best: DockingCandidate | null = null;
        for (const candidate of this.collectCandidates(context)) {
            if (!best || outranks(candidate, best)) {
                best = candidate;
            }
        }
        if (!best) return null;
        return { staticEdge: best.staticEdge, floatingEdge: best.floatingEdge };
    }

    /**
     * Yields surviving candidates in enumeration order: floating edge, then
     * static shape, then static edge.
     */
    *collectCandidates(context: DockingContext): Generator<DockingCandidate, void, undefined> {
        const staticEdges = context.staticShapes.map((shape) => Array.from(shapeEdges(shape), toEdgeVector));

        for (const floatingEdge of shapeEdges(context.floating)) {
            const floating = toEdgeVector(floatingEdge);
            if (floating.length === 0) continue;
            if (!this.followsManualMove(floating, context.manualMove)) continue;

            for (const edges of staticEdges) {
                for (const staticEdge of edges) {
                    const candidate = this.evaluatePair(staticEdge, floating, context);
                    if (candidate) yield candidate;
                }
            }
        }
    }

    /** The drag must not point to the outside of the floating edge. */
    private followsManualMove(floating: EdgeVector, manualMove: Vector2D): boolean {
        return cross(floating.vector, manualMove) <= this.epsilon;
    }

    private evaluatePair(
        staticEdge: EdgeVector,
        floating: EdgeVector,
        context: DockingContext
    ): DockingCandidate | null {
        if (staticEdge.length === 0) return null;

        // Zero sign disables this filter.
        if (cross(staticEdge.vector, floating.vector) * context.manualRotateSign < -this.epsilon) {
            return null;
        }

        const distance = Math.max(
            pointToLineDistance(floating.edge.tail, staticEdge.edge.tail, staticEdge.vector),
            pointToLineDistance(floating.edge.head, staticEdge.edge.tail, staticEdge.vector)
        );
        if (distance > context.distanceThreshold) return null;

        // Correctly docked edges run antiparallel.
        const cosTheta = -dot(floating.vector, staticEdge.vector) / (floating.length * staticEdge.length);
        if (cosTheta < context.angularThresholdCos) return null;

        const overlap = projectedOverlap(staticEdge, floating.edge);
        if (overlap <= this.epsilon) return null;

        return {
            distance,
            cosTheta,
            overlap,
            staticEdge: staticEdge.edge,
            floatingEdge: floating.edge,
        };
    }
}

const defaultEngine = new DockingEngine();

export function dock(
    staticShapes: readonly Shape[],
    floating: Shape,
    angularThresholdCos: number,
    distanceThreshold: number,
    manualRotateSign: number,
    manualMove: Vector2D
): DockingMatch | null {
    return defaultEngine.findBestDocking({
        staticShapes,
        floating,
        angularThresholdCos,
        distanceThreshold,
        manualRotateSign,
        manualMove,
    });
}

export function collectDockingCandidates(context: DockingContext): DockingCandidate[] {
    return Array.from(defaultEngine.collectCandidates(context));
}

/** `dock` with the motion intent bundled and thresholds taken from settings. */
export function dockShapes(
    staticShapes: readonly Shape[],
    floating: Shape,
    intent: MotionIntent,
    settings: Partial<DockingSettings> = {}
): DockingMatch | null {
    const resolved = resolveDockingSettings(settings);
    return dock(
        staticShapes,
        floating,
        resolved.angularThresholdCos,
        resolved.distanceThreshold,
        intent.rotateSign,
        intent.move
    );
}
