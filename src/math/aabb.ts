/**
 * Axis-Aligned Bounding Boxes
 *
 * Shared by shapes, bodies and the scene tree's screen rectangle.
 */

import { Vec2 } from './vec';

export interface AABB2D {
    minX: number;
    minY: number;
    maxX: number;
    maxY: number;
}

/**
 * Build an AABB from a top-left corner and a size.
 */
export function aabb2DFromRect(x: number, y: number, width: number, height: number): AABB2D {
    return { minX: x, minY: y, maxX: x + width, maxY: y + height };
}

/**
 * Check if two AABBs overlap. Touching edges count as overlap.
 */
export function aabb2DOverlap(a: AABB2D, b: AABB2D): boolean {
    return a.minX <= b.maxX && a.maxX >= b.minX &&
           a.minY <= b.maxY && a.maxY >= b.minY;
}

/**
 * Compute the union of two AABBs.
 */
export function aabb2DUnion(a: AABB2D, b: AABB2D): AABB2D {
    return {
        minX: Math.min(a.minX, b.minX),
        minY: Math.min(a.minY, b.minY),
        maxX: Math.max(a.maxX, b.maxX),
        maxY: Math.max(a.maxY, b.maxY),
    };
}

export function aabb2DCenter(aabb: AABB2D): Vec2 {
    return {
        x: (aabb.minX + aabb.maxX) / 2,
        y: (aabb.minY + aabb.maxY) / 2,
    };
}

/** Half width and half height */
export function aabb2DHalfExtents(aabb: AABB2D): Vec2 {
    return {
        x: (aabb.maxX - aabb.minX) / 2,
        y: (aabb.maxY - aabb.minY) / 2,
    };
}

export function aabb2DEquals(a: AABB2D, b: AABB2D): boolean {
    return a.minX === b.minX && a.minY === b.minY &&
           a.maxX === b.maxX && a.maxY === b.maxY;
}
