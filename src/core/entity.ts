/**
 * Entity
 *
 * Base spatial unit: local position, scale, anchor and a debug color.
 * Entities are not tree members; see Node.
 */

import { Vec2, vec2Clone, vec2One, vec2Zero, Anchors } from '../math';
import { Detachable, Signal } from './signal';

// ============================================
// Color
// ============================================

export interface Color {
    r: number;
    g: number;
    b: number;
    a: number;
}

export function rgba(r: number, g: number, b: number, a: number = 255): Color {
    return { r, g, b, a };
}

export const DEFAULT_COLOR: Color = rgba(0, 185, 225, 125);

// ============================================
// Entity
// ============================================

export class Entity {
    /** Signals this entity is observing (cleared when freed) */
    readonly subscriptions: Set<Detachable> = new Set();

    private _position: Vec2;
    private _scale: Vec2 = vec2One();
    private _anchor: Vec2 = vec2Clone(Anchors.CENTER);

    color: Color = { ...DEFAULT_COLOR };

    constructor(position: Vec2 = vec2Zero()) {
        this._position = vec2Clone(position);
    }

    /** Local position. Returns a copy; assign to move. */
    get position(): Vec2 {
        return vec2Clone(this._position);
    }

    set position(value: Vec2) {
        this._position = vec2Clone(value);
        this.transformChanged();
    }

    /** Local scale. Returns a copy; assign to rescale. */
    get scale(): Vec2 {
        return vec2Clone(this._scale);
    }

    set scale(value: Vec2) {
        this._scale = vec2Clone(value);
        this.transformChanged();
    }

    /** Fraction (0..1) of the cell that sits at the origin */
    get anchor(): Vec2 {
        return vec2Clone(this._anchor);
    }

    set anchor(value: Vec2) {
        this._anchor = vec2Clone(value);
        this.transformChanged();
    }

    translate(dx: number, dy: number): void {
        this.position = { x: this._position.x + dx, y: this._position.y + dy };
    }

    /**
     * Size of the box this entity occupies before scaling.
     */
    getCell(): Vec2 {
        return vec2Zero();
    }

    /**
     * Connect an observer to one of this entity's own signals.
     */
    connect<Args extends unknown[], Bound extends unknown[]>(
        signal: Signal<Args>,
        observer: object,
        callback: NoInfer<(...args: [...Bound, ...Args]) => void>,
        ...bound: Bound
    ): void {
        signal.connect(this, observer, callback, ...bound);
    }

    /**
     * Disconnect an observer from one of this entity's own signals.
     */
    disconnect<Args extends unknown[]>(signal: Signal<Args>, observer: object): void {
        signal.disconnect(this, observer);
    }

    /**
     * Drop every connection in which this entity is the observer.
     */
    protected dropSubscriptions(): void {
        for (const signal of [...this.subscriptions]) {
            signal.detachObserver(this);
        }
        this.subscriptions.clear();
    }

    /** Called after position, scale or anchor changes */
    protected transformChanged(): void {}
}
