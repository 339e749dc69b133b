/**
 * Game - Fixed-timestep driver for a SceneTree
 *
 * Provides the API games use:
 * - game.currentScene = scene
 * - game.start() / game.stop() → real-time loop on a Node timer
 * - game.advance(ms) → manual stepping (tests, custom hosts)
 * - game.tree → input, physics, groups, pause
 */

import { SceneTree, SceneTreeConfig } from './scene-tree';
import { Node } from './core/node';
import { ENGINE_VERSION } from './version';

// ==========================================
// Types
// ==========================================

export interface GameConfig extends SceneTreeConfig {
    /** Ticks per second (default: 60) */
    tickRate?: number;
    /** Most ticks a single advance() may run before dropping the backlog (default: 5) */
    maxStepsPerAdvance?: number;
}

/** Game callbacks for lifecycle events */
export interface GameCallbacks {
    /** Called after each tick with the new frame number */
    onTick?(frame: number): void;
}

const DEFAULT_TICK_RATE = 60;
const DEFAULT_MAX_STEPS = 5;

// ==========================================
// Game Class
// ==========================================

export class Game {
    readonly tree: SceneTree;

    readonly tickRate: number;

    callbacks: GameCallbacks = {};

    private tickIntervalMs: number;
    private maxStepsPerAdvance: number;
    private accumulatorMs: number = 0;

    private gameLoop: ReturnType<typeof setInterval> | null = null;
    private lastTickTime: number = 0;

    constructor(config: GameConfig = {}) {
        this.tickRate = config.tickRate ?? DEFAULT_TICK_RATE;
        if (!(this.tickRate > 0)) {
            throw new RangeError(`tickRate must be positive, got ${this.tickRate}`);
        }

        this.tickIntervalMs = 1000 / this.tickRate;
        this.maxStepsPerAdvance = config.maxStepsPerAdvance ?? DEFAULT_MAX_STEPS;
        this.tree = new SceneTree(config);
    }

    get currentScene(): Node | null {
        return this.tree.currentScene;
    }

    set currentScene(scene: Node | null) {
        this.tree.currentScene = scene;
    }

    get frame(): number {
        return this.tree.frame;
    }

    get isRunning(): boolean {
        return this.gameLoop !== null;
    }

    // ==========================================
    // Stepping
    // ==========================================

    /**
     * Add `elapsedMs` of wall time and run every whole tick it covers.
     * Returns the number of ticks run.
     */
    advance(elapsedMs: number): number {
        this.accumulatorMs += elapsedMs;

        const delta = 1 / this.tickRate;
        let steps = 0;

        while (this.accumulatorMs >= this.tickIntervalMs && steps < this.maxStepsPerAdvance) {
            const frame = this.tree.tick(delta);
            this.callbacks.onTick?.(frame);
            this.accumulatorMs -= this.tickIntervalMs;
            steps++;
        }

        if (this.accumulatorMs >= this.tickIntervalMs) {
            const dropped = Math.floor(this.accumulatorMs / this.tickIntervalMs);
            console.warn(`[Game] Too many ticks to catch up, dropping ${dropped}`);
            this.accumulatorMs -= dropped * this.tickIntervalMs;
        }

        return steps;
    }

    // ==========================================
    // Game Loop
    // ==========================================

    /**
     * Start ticking in real time. Needs a current scene.
     */
    start(): void {
        if (this.gameLoop) return;

        if (!this.tree.currentScene) {
            console.warn('[Game] No current scene set; assign game.currentScene before start()');
            return;
        }

        this.lastTickTime = Date.now();
        this.gameLoop = setInterval(() => {
            const now = Date.now();
            this.advance(now - this.lastTickTime);
            this.lastTickTime = now;
        }, this.tickIntervalMs);
    }

    /**
     * Stop the loop. Time not yet consumed is discarded.
     */
    stop(): void {
        if (this.gameLoop) {
            clearInterval(this.gameLoop);
            this.gameLoop = null;
        }
        this.accumulatorMs = 0;
    }
}

// ==========================================
// Factory Function
// ==========================================

/**
 * Initialize a new game instance.
 */
export function createGame(config: GameConfig = {}): Game {
    console.log(`[Scene] Engine version: ${ENGINE_VERSION}`);
    return new Game(config);
}
