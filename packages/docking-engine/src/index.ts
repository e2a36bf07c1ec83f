/**
 * @tangram/docking-engine
 *
 * Geometry kernel, convex tangram shapes and edge docking, plus a zustand
 * session store that hosts can drive from pointer events.
 */

// Geometry kernel
export {
    vectorBetween,
    addVectors,
    scaleVector,
    length,
    distance,
    dot,
    cross,
    perpendicular,
    inclinationAngle,
    normalizeAngle,
    rotateAbout,
    lineIntersection,
    pointToLineDistance,
} from './utils/geometry';

// Errors
export { DegenerateGeometryError, isDegenerateGeometryError, type GeometryErrorKind } from './errors';

// Shapes
export {
    createTriangle,
    createQuadrilateral,
    shapeFromVertices,
    isShape,
    shapeVertices,
    shapeEdges,
    shapeContains,
    triangleContains,
    referencePoint,
    innerRadius,
    rotateShape,
    moveShapeBy,
    moveShapeTo,
} from './shapes';

// Docking
export {
    DockingEngine,
    dock,
    dockShapes,
    collectDockingCandidates,
    type DockingContext,
} from './docking/DockingEngine';
export {
    resolveDockingTransform,
    applyDockingTransform,
    snapToDocking,
} from './docking/docking-transform';

// Configuration
export { DOCKING_EPSILON, DEFAULT_DOCKING_SETTINGS, resolveDockingSettings } from './constants/docking';
export { FIELD_SIZE, FIELD_GRID, TANGRAM_PIECES, type PieceDefinition } from './constants/tangram';

// Layout
export { cellCenter, createLayout, createDefaultTangram, formatLayout } from './utils/layout';

// Store
export {
    createTangramStore,
    subscribeDocking,
    createShapesSlice,
    createDragSlice,
    DEFAULT_DRAG_SETTINGS,
    type TangramState,
    type TangramStore,
    type DockingListener,
    type ShapesSlice,
    type DragSlice,
    type DragSettings,
} from './store';

// Interaction
export {
    createFrameScheduler,
    bindPointerScheduler,
    type FrameScheduler,
    type FrameSchedulerOptions,
} from './interaction/pointer-scheduler';

// Types
export type {
    Point2D,
    Vector2D,
    Edge,
    ShapeKind,
    Shape,
    TriangleShape,
    QuadrilateralShape,
    DockingMatch,
    DockingCandidate,
    DockingSettings,
    DockingTransform,
    MotionIntent,
    DragMode,
    TangramPiece,
} from './types';
