/**
 * 2D Collision Shapes
 *
 * Shapes are nodes added as children of a Body. Each keeps a world-space
 * bounding rectangle in sync with its global transform:
 *   size    = baseSize * |globalScale|
 *   topLeft = globalPosition - size * anchor
 * and emits `rectChanged` whenever that rectangle moves or resizes.
 */

import { AABB2D, Vec2, aabb2DCenter, aabb2DEquals, aabb2DFromRect, aabb2DOverlap, vec2, vec2Clone, vec2Zero } from '../../math';
import { Node, DrawTransform } from '../../core/node';
import { Signal } from '../../core/signal';

// ============================================
// Types
// ============================================

export enum Shape2DType {
    Circle = 0,
    Box = 1,
}

/**
 * What a shape is used for.
 */
export enum ShapeKind {
    /** Body-vs-body collision tests */
    Physics = 1,
    /** Zones and visibility only; ignored by bodies */
    Area = 2,
}

export interface CircleGeometry {
    type: Shape2DType.Circle;
    center: Vec2;
    radius: number;
}

export interface BoxGeometry {
    type: Shape2DType.Box;
    aabb: AABB2D;
}

/** World-space geometry used by the narrow phase */
export type Geometry2D = CircleGeometry | BoxGeometry;

// ============================================
// Shape
// ============================================

export abstract class Shape extends Node {
    abstract readonly type: Shape2DType;

    kind: ShapeKind = ShapeKind.Physics;

    /** Emitted with the shape after its rect moved or resized */
    readonly rectChanged: Signal<[Shape]>;

    private _baseSize: Vec2;
    private _rect: AABB2D;

    constructor(name: string, baseSize: Vec2, position: Vec2 = vec2Zero()) {
        super(name, position);
        this.rectChanged = new Signal(this, 'rectChanged');
        this._baseSize = vec2Clone(baseSize);
        this._rect = this.computeRect();
    }

    get baseSize(): Vec2 {
        return vec2Clone(this._baseSize);
    }

    set baseSize(value: Vec2) {
        this._baseSize = vec2Clone(value);
        this.refreshRect();
    }

    /** World-space bounding rectangle */
    get rect(): AABB2D {
        return { ...this._rect };
    }

    bounds(): AABB2D {
        return this.rect;
    }

    override getCell(): Vec2 {
        return this.baseSize;
    }

    abstract geometry(): Geometry2D;

    protected override globalTransformChanged(): void {
        this.refreshRect();
    }

    private refreshRect(): void {
        const next = this.computeRect();
        if (aabb2DEquals(next, this._rect)) return;

        this._rect = next;
        this.rectChanged.emit(this);
    }

    private computeRect(): AABB2D {
        const position = this.globalPosition;
        const scale = this.globalScale;
        const anchor = this.anchor;
        const width = this._baseSize.x * Math.abs(scale.x);
        const height = this._baseSize.y * Math.abs(scale.y);

        return aabb2DFromRect(
            position.x - width * anchor.x,
            position.y - height * anchor.y,
            width,
            height
        );
    }
}

// ============================================
// Concrete Shapes
// ============================================

export class RectangleShape extends Shape {
    readonly type = Shape2DType.Box;

    constructor(name: string = 'RectangleShape', size: Vec2 = vec2(1, 1), position: Vec2 = vec2Zero()) {
        super(name, size, position);
    }

    geometry(): BoxGeometry {
        return { type: Shape2DType.Box, aabb: this.rect };
    }
}

export class CircleShape extends Shape {
    readonly type = Shape2DType.Circle;

    private _radius: number;

    constructor(name: string = 'CircleShape', radius: number = 1, position: Vec2 = vec2Zero()) {
        super(name, vec2(radius * 2, radius * 2), position);
        this._radius = radius;
    }

    /** Unscaled radius */
    get radius(): number {
        return this._radius;
    }

    set radius(value: number) {
        this._radius = value;
        this.baseSize = vec2(value * 2, value * 2);
    }

    /**
     * Radius after global scale. With a non-uniform scale the smaller axis
     * wins, so the circle stays inside its rect.
     */
    get scaledRadius(): number {
        const scale = this.globalScale;
        return this._radius * Math.min(Math.abs(scale.x), Math.abs(scale.y));
    }

    geometry(): CircleGeometry {
        return {
            type: Shape2DType.Circle,
            center: aabb2DCenter(this.rect),
            radius: this.scaledRadius
        };
    }
}

// ============================================
// Visibility Notifier
// ============================================

/**
 * Area shape that reports when its rect enters or leaves the tree's screen
 * rectangle. Checked during the draw pass.
 */
export class VisibilityNotifier extends RectangleShape {
    readonly screenEntered: Signal<[]>;
    readonly screenExited: Signal<[]>;

    /** null until the first draw pass */
    private _isOnScreen: boolean | null = null;

    constructor(name: string = 'VisibilityNotifier', size: Vec2 = vec2(1, 1), position: Vec2 = vec2Zero()) {
        super(name, size, position);
        this.kind = ShapeKind.Area;
        this.screenEntered = new Signal(this, 'screenEntered');
        this.screenExited = new Signal(this, 'screenExited');
    }

    get isOnScreen(): boolean | null {
        return this._isOnScreen;
    }

    protected override draw(_transform: DrawTransform): void {
        const tree = this.tree;
        if (!tree) return;

        const onScreen = aabb2DOverlap(this.rect, tree.screenRect);
        if (onScreen === this._isOnScreen) return;

        const wasKnown = this._isOnScreen !== null;
        this._isOnScreen = onScreen;

        // The first check only records the initial state
        if (!wasKnown) return;

        if (onScreen) {
            this.screenEntered.emit();
        } else {
            this.screenExited.emit();
        }
    }
}
