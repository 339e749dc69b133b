/**
 * 2D Bodies
 *
 * Nodes that take part in collision detection. A body presents its
 * `collisionLayer` and looks for bodies whose layer matches its
 * `collisionMask`. Its Physics shapes (direct children) define where it is.
 *
 * Subclasses overriding onEnterTree/onExitTree must call super so the body
 * stays registered with the tree's physics server.
 */

import { AABB2D, Vec2, aabb2DOverlap, aabb2DUnion, vec2Clone, vec2Scale, vec2Sub, vec2Zero } from '../../math';
import { Node, PhysicsStep } from '../../core/node';
import { Signal } from '../../core/signal';
import { shapesCollide } from './collision';
import { CollisionFilter, Layers } from './layers';
import { Shape, ShapeKind } from './shapes';

// ============================================
// Types
// ============================================

export enum BodyKind {
    Static = 0,
    Kinematic = 1,
    Area = 2,
}

// ============================================
// Body
// ============================================

export abstract class Body extends Node implements PhysicsStep {
    abstract readonly kind: BodyKind;

    /** Emitted with a body this one started detecting */
    readonly bodyEntered: Signal<[Body]>;

    /** Emitted with a body this one stopped detecting */
    readonly bodyExited: Signal<[Body]>;

    private _collisionLayer: number = Layers.DEFAULT;
    private _collisionMask: number = Layers.DEFAULT;

    private _activeShapes: Shape[] = [];
    private cachedBounds: AABB2D | null = null;
    private boundsDirty: boolean = true;

    private collidingBodies: Set<Body> = new Set();
    private lastCollidingBodies: Set<Body> = new Set();

    constructor(name: string = 'Body', position: Vec2 = vec2Zero()) {
        super(name, position);
        this.bodyEntered = new Signal(this, 'bodyEntered');
        this.bodyExited = new Signal(this, 'bodyExited');
    }

    // ==========================================
    // Layer / Mask
    // ==========================================

    get collisionLayer(): number {
        return this._collisionLayer;
    }

    set collisionLayer(value: number) {
        this._collisionLayer = value;
        this.reindex();
    }

    get collisionMask(): number {
        return this._collisionMask;
    }

    set collisionMask(value: number) {
        this._collisionMask = value;
        this.reindex();
    }

    get filter(): CollisionFilter {
        return { layer: this._collisionLayer, mask: this._collisionMask };
    }

    set filter(value: CollisionFilter) {
        this._collisionLayer = value.layer;
        this._collisionMask = value.mask;
        this.reindex();
    }

    // ==========================================
    // Shapes
    // ==========================================

    get activeShapes(): readonly Shape[] {
        return this._activeShapes;
    }

    hasShape(): boolean {
        return this._activeShapes.length > 0;
    }

    /**
     * Union of the active shapes' rects, or null without shapes.
     * Recomputed lazily after any of them changes.
     */
    bounds(): AABB2D | null {
        if (!this.boundsDirty) return this.cachedBounds ? { ...this.cachedBounds } : null;

        let union: AABB2D | null = null;
        for (const shape of this._activeShapes) {
            union = union ? aabb2DUnion(union, shape.rect) : shape.rect;
        }

        this.cachedBounds = union;
        this.boundsDirty = false;
        return union ? { ...union } : null;
    }

    /**
     * Narrow-phase test: true if any pair of active shapes collides.
     */
    isColliding(other: Body): boolean {
        for (const a of this._activeShapes) {
            for (const b of other._activeShapes) {
                if (shapesCollide(a, b)) return true;
            }
        }
        return false;
    }

    protected override childAdded(node: Node): void {
        if (!(node instanceof Shape) || node.kind !== ShapeKind.Physics) return;

        this._activeShapes.push(node);
        node.connect(node.rectChanged, this, () => this.invalidateBounds());
        this.invalidateBounds();
    }

    protected override childRemoved(node: Node): void {
        if (!(node instanceof Shape)) return;

        const index = this._activeShapes.indexOf(node);
        if (index === -1) return;

        this._activeShapes.splice(index, 1);
        if (node.rectChanged.isConnected(this)) {
            node.disconnect(node.rectChanged, this);
        }
        this.invalidateBounds();
    }

    private invalidateBounds(): void {
        this.boundsDirty = true;
    }

    // ==========================================
    // Collision State
    // ==========================================

    /** Bodies detected so far this tick */
    get overlappingBodies(): ReadonlySet<Body> {
        return this.collidingBodies;
    }

    isDetecting(other: Body): boolean {
        return this.collidingBodies.has(other) || this.lastCollidingBodies.has(other);
    }

    /**
     * Record a confirmed collision with `other` (a body presenting a layer
     * this body's mask looks for).
     * @internal
     */
    _collide(other: Body): void {
        if (this.collidingBodies.has(other)) return;

        this.collidingBodies.add(other);
        if (!this.lastCollidingBodies.has(other)) {
            this.bodyEntered.emit(other);
        }
    }

    /**
     * End-of-tick bookkeeping: report lost contacts, then rotate the sets.
     * @internal
     */
    _flushCollisions(): void {
        const previous = this.lastCollidingBodies;
        const current = this.collidingBodies;

        for (const body of previous) {
            if (!current.has(body)) {
                this.bodyExited.emit(body);
            }
        }

        previous.clear();
        this.lastCollidingBodies = current;
        this.collidingBodies = previous;
    }

    // ==========================================
    // Tree Hooks
    // ==========================================

    protected override onEnterTree(): void {
        if (!this.hasShape()) {
            console.warn(`[Physics] Body '${this.name}' has no Physics shape; add one as a child to process collisions`);
        }
        this.tree?.physics.insertBody(this);
    }

    protected override onExitTree(): void {
        this.tree?.physics.removeBody(this);
        this.collidingBodies.clear();
        this.lastCollidingBodies.clear();
    }

    physicsProcess(_delta: number): void {}

    private reindex(): void {
        const physics = this.tree?.physics;
        if (physics?.has(this)) {
            physics.updateBody(this);
        }
    }
}

// ============================================
// Concrete Bodies
// ============================================

/**
 * Detection zone: looks for bodies of every kind.
 */
export class Area extends Body {
    readonly kind = BodyKind.Area;

    constructor(name: string = 'Area', position: Vec2 = vec2Zero()) {
        super(name, position);
    }
}

/**
 * Immovable body. Presents no layer by default; its mask only ever
 * matches Kinematic bodies.
 */
export class StaticBody extends Body {
    readonly kind = BodyKind.Static;

    constructor(name: string = 'StaticBody', position: Vec2 = vec2Zero()) {
        super(name, position);
        this.collisionLayer = Layers.NONE;
    }
}

/**
 * Body moved by code. Velocity queued with moveAndCollide() is applied
 * during its physics step, scaled by delta.
 */
export class KinematicBody extends Body {
    readonly kind = BodyKind.Kinematic;

    private pendingMotion: Vec2 = vec2Zero();
    private _lastMotion: Vec2 = vec2Zero();

    constructor(name: string = 'KinematicBody', position: Vec2 = vec2Zero()) {
        super(name, position);
    }

    /** Displacement applied by the last physics step */
    get lastMotion(): Vec2 {
        return vec2Clone(this._lastMotion);
    }

    moveAndCollide(velocity: Vec2): void {
        this.pendingMotion.x += velocity.x;
        this.pendingMotion.y += velocity.y;
    }

    override physicsProcess(delta: number): void {
        const motion = vec2Scale(this.pendingMotion, delta);

        if (motion.x !== 0 || motion.y !== 0) {
            this.translate(motion.x, motion.y);
        }

        this._lastMotion = motion;
        this.pendingMotion = vec2Sub(this.pendingMotion, motion);
    }
}

/**
 * Broad-phase check used by the physics server: both bodies need shapes
 * and their bounds must overlap.
 */
export function boundsOverlap(a: Body, b: Body): boolean {
    const boundsA = a.bounds();
    const boundsB = b.bounds();
    if (!boundsA || !boundsB) return false;
    return aabb2DOverlap(boundsA, boundsB);
}
