/**
 * Input Router
 *
 * Nodes register interest in (type, key) pairs. Raw events pushed by the
 * host are queued and dispatched synchronously at the start of the next
 * tick, before any node processes.
 *
 * @example
 * tree.input.registerEvent(player, 'keydown', 'Space', 'jump');
 * window.addEventListener('keydown', e => tree.input.push('keydown', e.code));
 */

import { Vec2, vec2Zero } from '../math';
import type { Node } from './node';

// ============================================
// Types
// ============================================

/** Raw event kinds the router tracks key state for */
export const KEY_DOWN = 'keydown';
export const KEY_UP = 'keyup';

export type InputKey = string | number;

/**
 * A registered interest, handed to the node when it fires.
 */
export interface InputEvent {
    type: string;
    key: InputKey;
    /** Free-form label chosen at registration */
    tag: string;
    target: Node;
}

interface RawInput {
    type: string;
    key: InputKey;
}

// ============================================
// Input Router
// ============================================

export class InputRouter {
    /** type -> key -> registrations */
    private events: Map<string, Map<InputKey, InputEvent[]>> = new Map();

    /** Raw events waiting for the next dispatch */
    private queue: RawInput[] = [];

    /** Keys currently held down */
    private keysDown: Set<InputKey> = new Set();

    /**
     * Register `node` for raw events of `type` with `key`.
     * The registration is dropped when the node is freed.
     */
    registerEvent(node: Node, type: string, key: InputKey, tag: string = ''): void {
        if (!this.isRegistered(node)) {
            node.connect(node.freed, this, (freed: Node) => this.unregisterNode(freed));
        }

        let byKey = this.events.get(type);
        if (!byKey) {
            byKey = new Map();
            this.events.set(type, byKey);
        }

        let registrations = byKey.get(key);
        if (!registrations) {
            registrations = [];
            byKey.set(key, registrations);
        }

        registrations.push({ type, key, tag, target: node });
    }

    /**
     * Remove every registration held by `node`.
     */
    unregisterNode(node: Node): void {
        for (const byKey of this.events.values()) {
            for (const [key, registrations] of byKey) {
                const kept = registrations.filter(r => r.target !== node);
                if (kept.length === 0) {
                    byKey.delete(key);
                } else {
                    byKey.set(key, kept);
                }
            }
        }

        if (node.freed.isConnected(this)) {
            node.disconnect(node.freed, this);
        }
    }

    isRegistered(node: Node): boolean {
        for (const byKey of this.events.values()) {
            for (const registrations of byKey.values()) {
                if (registrations.some(r => r.target === node)) return true;
            }
        }
        return false;
    }

    /**
     * Queue a raw event for the next dispatch.
     */
    push(type: string, key: InputKey): void {
        this.queue.push({ type, key });
    }

    /**
     * Deliver queued events to their registered nodes.
     * Returns true if any raw event was processed.
     */
    dispatch(): boolean {
        if (this.queue.length === 0) return false;

        const raw = this.queue;
        this.queue = [];

        for (const event of raw) {
            if (event.type === KEY_DOWN) this.keysDown.add(event.key);
            else if (event.type === KEY_UP) this.keysDown.delete(event.key);

            const registrations = this.events.get(event.type)?.get(event.key);
            if (!registrations) continue;

            for (const registration of [...registrations]) {
                if (!registration.target.isOnTree) continue;
                registration.target.inputEvent(registration);
            }
        }

        return true;
    }

    isPressed(key: InputKey): boolean {
        return this.keysDown.has(key);
    }

    /**
     * Normalized direction from four held keys (e.g. A/D/W/S).
     * Y grows downward, so `up` yields negative y.
     */
    getAxis(left: InputKey, right: InputKey, up: InputKey, down: InputKey): Vec2 {
        const axis = vec2Zero();
        axis.x = (this.isPressed(right) ? 1 : 0) - (this.isPressed(left) ? 1 : 0);
        axis.y = (this.isPressed(down) ? 1 : 0) - (this.isPressed(up) ? 1 : 0);

        const length = Math.hypot(axis.x, axis.y);
        if (length > 0) {
            axis.x /= length;
            axis.y /= length;
        }
        return axis;
    }

    /**
     * Drop queued events and held keys (registrations are kept).
     */
    reset(): void {
        this.queue = [];
        this.keysDown.clear();
    }
}
