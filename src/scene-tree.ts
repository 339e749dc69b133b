/**
 * Scene Tree
 *
 * The world context a game runs in. Owns the root node, the physics server,
 * the input router and the tree-wide pause state, and runs a tick:
 *
 *   1. input dispatch
 *   2. process pass (post-order)
 *   3. draw pass (pre-order)
 *   4. collision processing
 *
 * @example
 * const tree = new SceneTree({ screenSize: vec2(800, 600) });
 * tree.currentScene = new Node('Level');
 * tree.tick(1 / 60);
 */

import { AABB2D, Vec2, aabb2DFromRect, vec2 } from './math';
import { PauseMode } from './core/constants';
import { AlreadyInGroupError } from './core/errors';
import { InputRouter } from './core/input';
import { Node, DrawTransform } from './core/node';
import { Signal } from './core/signal';
import { PhysicsServer } from './plugins/physics2d/server';

// ============================================
// Types
// ============================================

/**
 * Draws nodes. Called once per node during the draw pass, parents first.
 */
export interface Renderer {
    drawNode(node: Node, transform: DrawTransform): void;
}

export interface SceneTreeConfig {
    /** Screen size in pixels (default: 640x480) */
    screenSize?: Vec2;
    /** Draw-pass collaborator (default: none) */
    renderer?: Renderer;
    /** Log confirmed physics contacts (default: false) */
    debug?: boolean;
}

const DEFAULT_SCREEN_SIZE: Vec2 = { x: 640, y: 480 };

// ============================================
// Scene Tree
// ============================================

export class SceneTree {
    readonly root: Node;
    readonly physics: PhysicsServer;
    readonly input: InputRouter;

    renderer: Renderer | null;

    /** Emitted with the new paused state when TREE_PAUSED flips */
    readonly pauseToggled: Signal<[boolean]>;

    private _screenSize: Vec2;
    private _screenRect: AABB2D;
    private _treePause: number = PauseMode.IGNORE;
    private _currentScene: Node | null = null;
    private _frame: number = 0;

    /** group -> members, in join order */
    private groups: Map<string, Node[]> = new Map();
    private nodeGroups: Map<Node, Set<string>> = new Map();

    constructor(config: SceneTreeConfig = {}) {
        const screenSize = config.screenSize ?? DEFAULT_SCREEN_SIZE;

        this._screenSize = vec2(screenSize.x, screenSize.y);
        this._screenRect = aabb2DFromRect(0, 0, screenSize.x, screenSize.y);
        this.renderer = config.renderer ?? null;
        this.physics = new PhysicsServer(config.debug ?? false);
        this.input = new InputRouter();
        this.pauseToggled = new Signal(this, 'pauseToggled');

        this.root = new Node('root');
        this.root._enterTree(this);
    }

    // ==========================================
    // Accessors
    // ==========================================

    get frame(): number {
        return this._frame;
    }

    get screenSize(): Vec2 {
        return vec2(this._screenSize.x, this._screenSize.y);
    }

    set screenSize(value: Vec2) {
        this._screenSize = vec2(value.x, value.y);
        this._screenRect = aabb2DFromRect(0, 0, value.x, value.y);
    }

    /** Visible area, from the origin to screenSize */
    get screenRect(): AABB2D {
        return { ...this._screenRect };
    }

    get treePause(): number {
        return this._treePause;
    }

    get isPaused(): boolean {
        return (this._treePause & PauseMode.TREE_PAUSED) !== 0;
    }

    // ==========================================
    // Scene
    // ==========================================

    get currentScene(): Node | null {
        return this._currentScene;
    }

    /**
     * Swap the scene attached under the root. The previous scene is removed,
     * not freed.
     */
    set currentScene(scene: Node | null) {
        const previous = this._currentScene;
        if (previous === scene) return;

        let detachedAt = -1;
        if (previous && previous.parent === this.root) {
            detachedAt = this.root.children.indexOf(previous);
            this.root.removeChild(previous);
        }

        if (scene) {
            try {
                this.root.addChild(scene);
            } catch (error) {
                // Rejected scene: put the previous one back where it was
                if (previous && detachedAt !== -1) {
                    this.root.addChild(previous, detachedAt);
                }
                throw error;
            }
        }
        this._currentScene = scene;
    }

    // ==========================================
    // Tick
    // ==========================================

    /**
     * Run one frame. Returns the new frame number.
     */
    tick(delta: number): number {
        this.input.dispatch();
        this.root._propagate(delta, this._treePause);
        this.root._drawPass();
        this.physics.processCollisions();
        return ++this._frame;
    }

    /**
     * Set the tree-wide pause flags. Pass PauseMode.IGNORE to resume.
     */
    pauseTree(mode: number = PauseMode.TREE_PAUSED): void {
        const wasPaused = this.isPaused;
        this._treePause = mode;

        if (wasPaused !== this.isPaused) {
            this.pauseToggled.emit(this.isPaused);
        }
    }

    connect<Bound extends unknown[]>(
        signal: Signal<[boolean]>,
        observer: object,
        callback: NoInfer<(...args: [...Bound, boolean]) => void>,
        ...bound: Bound
    ): void {
        signal.connect(this, observer, callback, ...bound);
    }

    disconnect(signal: Signal<[boolean]>, observer: object): void {
        signal.disconnect(this, observer);
    }

    // ==========================================
    // Groups
    // ==========================================

    /**
     * Add `node` to `group`, creating the group on first use.
     * Freed nodes leave all their groups.
     */
    addToGroup(node: Node, group: string): void {
        let memberOf = this.nodeGroups.get(node);
        if (memberOf?.has(group)) {
            throw new AlreadyInGroupError(`'${node.name}' is already in group '${group}'`);
        }

        if (!memberOf) {
            memberOf = new Set();
            this.nodeGroups.set(node, memberOf);
            node.connect(node.freed, this, (freed: Node) => this.leaveAllGroups(freed));
        }
        memberOf.add(group);

        const members = this.groups.get(group);
        if (members) {
            members.push(node);
        } else {
            this.groups.set(group, [node]);
        }
    }

    /**
     * Remove `node` from `group`. Does nothing if it is not a member.
     */
    removeFromGroup(node: Node, group: string): void {
        const memberOf = this.nodeGroups.get(node);
        if (!memberOf?.delete(group)) return;

        const members = this.groups.get(group);
        if (members) {
            const remaining = members.filter(member => member !== node);
            if (remaining.length === 0) {
                this.groups.delete(group);
            } else {
                this.groups.set(group, remaining);
            }
        }

        if (memberOf.size === 0) {
            this.nodeGroups.delete(node);
            if (node.freed.isConnected(this)) {
                node.disconnect(node.freed, this);
            }
        }
    }

    isInGroup(node: Node, group: string): boolean {
        return this.nodeGroups.get(node)?.has(group) ?? false;
    }

    /** Members of `group` in join order (copy) */
    getGroup(group: string): Node[] {
        return [...(this.groups.get(group) ?? [])];
    }

    /**
     * Call `fn` on every member of `group`, returning each node with its result.
     */
    callGroup<R>(group: string, fn: (node: Node) => R): Array<[Node, R]> {
        return this.getGroup(group).map((node): [Node, R] => [node, fn(node)]);
    }

    private leaveAllGroups(node: Node): void {
        const memberOf = this.nodeGroups.get(node);
        if (!memberOf) return;

        for (const group of [...memberOf]) {
            this.removeFromGroup(node, group);
        }
    }
}
