/**
 * Math Module
 *
 * Vector and bounding-box helpers for scene transforms and collision.
 */

// 2D Vectors
export {
    vec2,
    vec2Zero,
    vec2One,
    vec2Clone,
    vec2Add,
    vec2Sub,
    vec2Scale,
    vec2Mul,
    vec2LengthSq,
    vec2DistanceSq,
    Anchors
} from './vec';
export type { Vec2 } from './vec';

// Bounding boxes
export {
    aabb2DFromRect,
    aabb2DOverlap,
    aabb2DUnion,
    aabb2DCenter,
    aabb2DHalfExtents,
    aabb2DEquals
} from './aabb';
export type { AABB2D } from './aabb';
