/**
 * 2D Vectors
 *
 * Plain floating-point vectors used for node transforms and shape geometry.
 */

// ============================================
// 2D Vector
// ============================================

export interface Vec2 {
    x: number;
    y: number;
}

export function vec2(x: number, y: number): Vec2 {
    return { x, y };
}

export function vec2Zero(): Vec2 {
    return { x: 0, y: 0 };
}

export function vec2One(): Vec2 {
    return { x: 1, y: 1 };
}

export function vec2Clone(v: Vec2): Vec2 {
    return { x: v.x, y: v.y };
}

export function vec2Add(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x + b.x, y: a.y + b.y };
}

export function vec2Sub(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x - b.x, y: a.y - b.y };
}

export function vec2Scale(v: Vec2, s: number): Vec2 {
    return { x: v.x * s, y: v.y * s };
}

/** Component-wise product (used for scale chains) */
export function vec2Mul(a: Vec2, b: Vec2): Vec2 {
    return { x: a.x * b.x, y: a.y * b.y };
}

export function vec2LengthSq(v: Vec2): number {
    return v.x * v.x + v.y * v.y;
}

export function vec2DistanceSq(a: Vec2, b: Vec2): number {
    return vec2LengthSq(vec2Sub(b, a));
}

// ============================================
// Anchors
// ============================================

export const Anchors = {
    TOP_LEFT: { x: 0, y: 0 },
    CENTER: { x: 0.5, y: 0.5 },
    CENTER_LEFT: { x: 0, y: 0.5 },
    BOTTOM_RIGHT: { x: 1, y: 1 },
} as const satisfies Record<string, Vec2>;
