/**
 * Physics 2D Module
 *
 * Layer/mask collision detection between rectangle and circle shapes.
 * No dynamics: bodies report overlaps, game code decides what to do.
 */

// Shapes
export { Shape2DType, ShapeKind, Shape, RectangleShape, CircleShape, VisibilityNotifier } from './shapes';
export type { CircleGeometry, BoxGeometry, Geometry2D } from './shapes';

// Narrow Phase
export { circleCircle, circleBox, geometriesCollide, shapesCollide } from './collision';

// Collision Layers
export { Layers, detects, bitIndices } from './layers';
export type { CollisionFilter } from './layers';

// Bodies
export { BodyKind, Body, Area, StaticBody, KinematicBody, boundsOverlap } from './body';

// Physics Server
export { PhysicsServer } from './server';
