/**
 * 2D Narrow Phase
 *
 * Exact overlap tests between shape geometries. Every test is inclusive:
 * shapes that merely touch are colliding.
 */

import { AABB2D, Vec2, aabb2DCenter, aabb2DHalfExtents, aabb2DOverlap, vec2DistanceSq } from '../../math';
import { Geometry2D, Shape, Shape2DType } from './shapes';

// ============================================
// Primitive Tests
// ============================================

/**
 * Circle vs circle: center distance against the sum of the radii.
 */
export function circleCircle(centerA: Vec2, radiusA: number, centerB: Vec2, radiusB: number): boolean {
    const sumRadius = radiusA + radiusB;
    return vec2DistanceSq(centerA, centerB) <= sumRadius * sumRadius;
}

/**
 * Circle vs axis-aligned box.
 * Box2D-style closest point test, done on absolute axis distances:
 * - too far on either axis: no collision
 * - within the half extent on either axis: collision
 * - otherwise the box corner decides
 */
export function circleBox(center: Vec2, radius: number, box: AABB2D): boolean {
    const boxCenter = aabb2DCenter(box);
    const half = aabb2DHalfExtents(box);
    const dx = Math.abs(center.x - boxCenter.x);
    const dy = Math.abs(center.y - boxCenter.y);

    if (dx > half.x + radius || dy > half.y + radius) return false;
    if (dx <= half.x || dy <= half.y) return true;

    const cornerX = dx - half.x;
    const cornerY = dy - half.y;
    return cornerX * cornerX + cornerY * cornerY <= radius * radius;
}

// ============================================
// Dispatch
// ============================================

/**
 * Test two geometries, dispatching on the pair of shape types.
 */
export function geometriesCollide(a: Geometry2D, b: Geometry2D): boolean {
    if (a.type === Shape2DType.Circle) {
        return b.type === Shape2DType.Circle
            ? circleCircle(a.center, a.radius, b.center, b.radius)
            : circleBox(a.center, a.radius, b.aabb);
    }

    return b.type === Shape2DType.Circle
        ? circleBox(b.center, b.radius, a.aabb)
        : aabb2DOverlap(a.aabb, b.aabb);
}

/**
 * Narrow-phase test between two shapes. Their rects are compared first.
 */
export function shapesCollide(a: Shape, b: Shape): boolean {
    if (!aabb2DOverlap(a.rect, b.rect)) return false;
    return geometriesCollide(a.geometry(), b.geometry());
}
