/**
 * Signals
 *
 * Owner-scoped observer lists. Only the entity that declared a signal may
 * connect or disconnect observers on it. Disconnects requested while the
 * signal is emitting are queued and applied once the outermost emission
 * returns, so handlers can safely detach themselves.
 */

import { AlreadyConnectedError, NotConnectedError, SignalNotOwnerError } from './errors';

// ============================================
// Types
// ============================================

export type SignalCallback<Args extends unknown[]> = (...args: Args) => void;

/**
 * Anything a subscriber can be detached from without going through the
 * owner check (used when the subscriber itself is freed).
 */
export interface Detachable {
    detachObserver(observer: object): void;
}

/**
 * Observers that keep track of the signals they listen to. Entities do, so
 * freeing one drops all of its connections.
 */
export interface SubscriptionHolder {
    readonly subscriptions: Set<Detachable>;
}

interface Connection<Args extends unknown[]> {
    callback: SignalCallback<Args>;
}

function isSubscriptionHolder(observer: object): observer is SubscriptionHolder {
    return 'subscriptions' in observer && observer.subscriptions instanceof Set;
}

// ============================================
// Signal
// ============================================

export class Signal<Args extends unknown[] = []> implements Detachable {
    /** Observer identity -> connection, in insertion order */
    private observers: Map<object, Connection<Args>> = new Map();

    /** Disconnects requested during emission */
    private pending: Set<object> = new Set();

    /** Nesting depth of emit() calls currently on the stack */
    private emitDepth: number = 0;

    /**
     * @param owner - The only entity allowed to manage connections
     * @param name - Used in error messages
     */
    constructor(
        readonly owner: object,
        readonly name: string
    ) {}

    get isEmitting(): boolean {
        return this.emitDepth > 0;
    }

    /** Number of live connections (queued disconnects excluded) */
    get observerCount(): number {
        return this.observers.size - this.pending.size;
    }

    /**
     * Register `callback` for `observer`. The callback receives `bound`
     * followed by the arguments passed to emit(). Argument types come from
     * the signal and `bound`, never from the callback.
     */
    connect<Bound extends unknown[]>(
        owner: object,
        observer: object,
        callback: NoInfer<(...args: [...Bound, ...Args]) => void>,
        ...bound: Bound
    ): void {
        this.assertOwner(owner);

        if (this.observers.has(observer)) {
            if (!this.pending.has(observer)) {
                throw new AlreadyConnectedError(`Observer is already connected to '${this.name}'`);
            }
            // Reconnecting something queued for removal: apply the removal now.
            this.pending.delete(observer);
            this.remove(observer);
        }

        this.observers.set(observer, {
            callback: (...args: Args) => callback(...bound, ...args)
        });

        if (isSubscriptionHolder(observer)) {
            observer.subscriptions.add(this);
        }
    }

    /**
     * Remove the connection held by `observer`.
     */
    disconnect(owner: object, observer: object): void {
        this.assertOwner(owner);

        if (!this.isConnected(observer)) {
            throw new NotConnectedError(`Observer is not connected to '${this.name}'`);
        }

        this.detachObserver(observer);
    }

    /**
     * Disconnect every observer.
     */
    disconnectAll(owner: object): void {
        this.assertOwner(owner);

        for (const observer of [...this.observers.keys()]) {
            if (!this.pending.has(observer)) {
                this.detachObserver(observer);
            }
        }
    }

    isConnected(observer: object): boolean {
        return this.observers.has(observer) && !this.pending.has(observer);
    }

    /**
     * Invoke every observer connected at call time, in connection order.
     * Observers whose disconnect is queued are skipped by nested emissions.
     */
    emit(...args: Args): void {
        const snapshot: Connection<Args>[] = [];
        for (const [observer, connection] of this.observers) {
            if (!this.pending.has(observer)) snapshot.push(connection);
        }

        this.emitDepth++;
        try {
            for (const connection of snapshot) {
                connection.callback(...args);
            }
        } finally {
            this.emitDepth--;
            if (this.emitDepth === 0) {
                this.flushPending();
            }
        }
    }

    /**
     * Remove `observer` without an owner check. Queued while emitting.
     * Unknown observers are ignored.
     */
    detachObserver(observer: object): void {
        if (!this.observers.has(observer)) return;

        if (this.isEmitting) {
            this.pending.add(observer);
            return;
        }

        this.remove(observer);
    }

    private remove(observer: object): void {
        this.observers.delete(observer);

        if (isSubscriptionHolder(observer)) {
            observer.subscriptions.delete(this);
        }
    }

    private flushPending(): void {
        for (const observer of this.pending) {
            this.remove(observer);
        }
        this.pending.clear();
    }

    private assertOwner(owner: object): void {
        if (owner !== this.owner) {
            throw new SignalNotOwnerError(`Signal '${this.name}' does not belong to the caller`);
        }
    }
}
