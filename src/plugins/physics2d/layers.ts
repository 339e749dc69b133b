/**
 * Collision Layers
 *
 * Layer = "what am I", Mask = "what do I look for".
 * A body detects another when its mask shares a bit with the other's layer.
 * Detection is one-way: the layer side never learns about the mask side
 * unless its own mask matches too.
 */

// ============================================
// Collision Filter
// ============================================

export interface CollisionFilter {
    /** Bits this body presents */
    layer: number;
    /** Bits this body detects */
    mask: number;
}

// ============================================
// Default Layers
// ============================================

export const Layers = {
    NONE: 0,
    DEFAULT: 1 << 0,      // 1
    PLAYER: 1 << 1,       // 2
    ENEMY: 1 << 2,        // 4
    PROJECTILE: 1 << 3,   // 8
    ITEM: 1 << 4,         // 16
    TRIGGER: 1 << 5,      // 32
    WORLD: 1 << 6,        // 64
    PROP: 1 << 7,         // 128
    ALL: 0xFFFF           // All layers
} as const;

// ============================================
// Layer / Mask Tests
// ============================================

/**
 * Whether `detector` looks for something `presenter` presents.
 */
export function detects(detector: CollisionFilter, presenter: CollisionFilter): boolean {
    return (detector.mask & presenter.layer) !== 0;
}

/**
 * Decompose bit flags into the indexes of their set bits, ascending.
 * 0b101 -> [0, 2]
 */
export function bitIndices(flags: number): number[] {
    const indices: number[] = [];
    let remaining = flags >>> 0;

    for (let index = 0; remaining !== 0; index++, remaining >>>= 1) {
        if (remaining & 1) indices.push(index);
    }

    return indices;
}
