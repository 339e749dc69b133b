/**
 * 2D Physics Server
 *
 * Collision space indexed by bit position. Each body kind has a sparse map
 * from bit index to a bucket holding the bodies that present that bit
 * (layers) and the bodies that look for it (masks).
 *
 * processCollisions() pairs masks with layers sharing a bit:
 * - Area and Kinematic masks are tested against layers of every kind
 * - Static masks are tested against Kinematic layers only
 * The detecting (mask) side records the contact and emits bodyEntered.
 */

import type { Node } from '../../core/node';
import { Body, BodyKind, boundsOverlap } from './body';
import { bitIndices, detects } from './layers';

// ============================================
// Types
// ============================================

interface Bucket {
    /** Bodies presenting this bit */
    layers: Body[];
    /** Bodies looking for this bit */
    masks: Body[];
}

type Space = Map<number, Bucket>;

const ALL_KINDS: readonly BodyKind[] = [BodyKind.Static, BodyKind.Kinematic, BodyKind.Area];

// ============================================
// Physics Server
// ============================================

export class PhysicsServer {
    /** Log every confirmed contact */
    debug: boolean;

    private spaces: Map<BodyKind, Space> = new Map();

    /** Registered bodies and the kind they were filed under */
    private registered: Map<Body, BodyKind> = new Map();

    constructor(debug: boolean = false) {
        this.debug = debug;
        for (const kind of ALL_KINDS) {
            this.spaces.set(kind, new Map());
        }
    }

    get bodyCount(): number {
        return this.registered.size;
    }

    enableCollisionDebug(flag: boolean): void {
        this.debug = flag;
    }

    has(body: Body): boolean {
        return this.registered.has(body);
    }

    /**
     * File `body` under every set bit of its layer and mask.
     * The body is removed automatically when freed.
     */
    insertBody(body: Body, kind: BodyKind = body.kind): void {
        if (this.registered.has(body)) return;

        this.registered.set(body, kind);
        this.fileBody(body, kind);
        body.connect(body.freed, this, (target: Body, _freed: Node) => this.removeBody(target), body);
    }

    /**
     * Remove `body` from every bucket. Unknown bodies are ignored.
     */
    removeBody(body: Body): void {
        const kind = this.registered.get(body);
        if (kind === undefined) return;

        this.registered.delete(body);
        this.unfileBody(body, kind);

        if (body.freed.isConnected(this)) {
            body.disconnect(body.freed, this);
        }
    }

    /**
     * Re-file a registered body after its layer or mask changed.
     */
    updateBody(body: Body): void {
        const kind = this.registered.get(body);
        if (kind === undefined) return;

        this.unfileBody(body, kind);
        this.fileBody(body, kind);
    }

    /**
     * Bodies filed under `bit` for `kind` (copies).
     */
    getBucket(kind: BodyKind, bit: number): { layers: Body[]; masks: Body[] } {
        const bucket = this.spaces.get(kind)?.get(bit);
        return {
            layers: bucket ? [...bucket.layers] : [],
            masks: bucket ? [...bucket.masks] : []
        };
    }

    /**
     * Run the broad and narrow phases for every bit, then let every body
     * report the contacts it lost.
     */
    processCollisions(): void {
        const tested: Map<Body, Set<Body>> = new Map();

        for (const [kind, space] of this.spaces) {
            const presenterKinds = kind === BodyKind.Static ? [BodyKind.Kinematic] : ALL_KINDS;

            for (const [bit, bucket] of space) {
                for (const detector of [...bucket.masks]) {
                    for (const presenterKind of presenterKinds) {
                        const presenters = this.spaces.get(presenterKind)?.get(bit)?.layers;
                        if (!presenters) continue;

                        for (const presenter of [...presenters]) {
                            this.testPair(detector, presenter, tested);
                        }
                    }
                }
            }
        }

        for (const body of [...this.registered.keys()]) {
            body._flushCollisions();
        }
    }

    private testPair(detector: Body, presenter: Body, tested: Map<Body, Set<Body>>): void {
        if (detector === presenter) return;

        // Freed or removed earlier in this scan
        if (!this.registered.has(detector) || !this.registered.has(presenter)) return;
        if (!detects(detector.filter, presenter.filter)) return;

        let seen = tested.get(detector);
        if (!seen) {
            seen = new Set();
            tested.set(detector, seen);
        }
        if (seen.has(presenter)) return;
        seen.add(presenter);

        if (!boundsOverlap(detector, presenter)) return;
        if (!detector.isColliding(presenter)) return;

        if (this.debug) {
            console.log(`[Physics] ${detector.name} detected ${presenter.name}`);
        }
        detector._collide(presenter);
    }

    private fileBody(body: Body, kind: BodyKind): void {
        const space = this.getSpace(kind);

        for (const bit of bitIndices(body.collisionLayer)) {
            this.getOrCreateBucket(space, bit).layers.push(body);
        }
        for (const bit of bitIndices(body.collisionMask)) {
            this.getOrCreateBucket(space, bit).masks.push(body);
        }
    }

    private unfileBody(body: Body, kind: BodyKind): void {
        const space = this.getSpace(kind);

        for (const [bit, bucket] of space) {
            bucket.layers = bucket.layers.filter(b => b !== body);
            bucket.masks = bucket.masks.filter(b => b !== body);
            if (bucket.layers.length === 0 && bucket.masks.length === 0) {
                space.delete(bit);
            }
        }
    }

    private getSpace(kind: BodyKind): Space {
        let space = this.spaces.get(kind);
        if (!space) {
            space = new Map();
            this.spaces.set(kind, space);
        }
        return space;
    }

    private getOrCreateBucket(space: Space, bit: number): Bucket {
        let bucket = space.get(bit);
        if (!bucket) {
            bucket = { layers: [], masks: [] };
            space.set(bit, bucket);
        }
        return bucket;
    }
}
