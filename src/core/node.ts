/**
 * Node
 *
 * Tree-capable entity. Owns an ordered list of children (the canonical
 * process and draw order), indexes them by name, and propagates enter/exit
 * tree notifications synchronously to the whole subtree.
 *
 * Each tick the scene tree runs two separate traversals:
 * - process: post-order (children before parent), honoring pause flags
 * - draw: pre-order (parent before children)
 */

import { Vec2, vec2, vec2Add, vec2Clone, vec2Mul, vec2One, vec2Zero } from '../math';
import { PauseMode, shouldProcess } from './constants';
import { Entity } from './entity';
import { DuplicatedChildError, EmptyNameError, InvalidChildError, NotAChildError } from './errors';
import { Signal } from './signal';
import type { InputEvent } from './input';
import type { SceneTree } from '../scene-tree';

// ============================================
// Types
// ============================================

/**
 * Transform handed to draw hooks and renderers.
 */
export interface DrawTransform {
    /** Global position of the node origin */
    position: Vec2;
    /** Global scale */
    scale: Vec2;
    /** Offset of the scaled cell from the origin (cell * scale * anchor) */
    offset: Vec2;
}

/**
 * Capability: nodes that integrate physics before their regular update.
 */
export interface PhysicsStep {
    physicsProcess(delta: number): void;
}

export function hasPhysicsStep(node: object): node is PhysicsStep {
    return 'physicsProcess' in node && typeof node.physicsProcess === 'function';
}

// ============================================
// Node
// ============================================

export class Node extends Entity {
    readonly name: string;

    /** Emitted last in free(), after the node has lost its parent and children */
    readonly freed: Signal<[Node]>;

    pauseMode: number = PauseMode.IGNORE;

    private _parent: Node | null = null;
    private _children: Node[] = [];
    private childrenByName: Map<string, Node> = new Map();

    private _tree: SceneTree | null = null;
    private _isOnTree: boolean = false;
    private _isFreed: boolean = false;

    private _globalPosition: Vec2 = vec2Zero();
    private _globalScale: Vec2 = vec2One();

    constructor(name: string = 'Node', position: Vec2 = vec2Zero()) {
        super(position);

        if (!name) {
            throw new EmptyNameError();
        }

        this.name = name;
        this.freed = new Signal(this, 'freed');
        this._globalPosition = vec2Clone(position);
    }

    // ==========================================
    // Accessors
    // ==========================================

    get parent(): Node | null {
        return this._parent;
    }

    get children(): readonly Node[] {
        return this._children;
    }

    get tree(): SceneTree | null {
        return this._tree;
    }

    get isOnTree(): boolean {
        return this._isOnTree;
    }

    get isFreed(): boolean {
        return this._isFreed;
    }

    /**
     * Position including every ancestor's offset. Cached while on the tree,
     * computed through the parent chain otherwise.
     */
    get globalPosition(): Vec2 {
        if (this._isOnTree) return vec2Clone(this._globalPosition);
        if (this._parent) return vec2Add(this._parent.globalPosition, this.position);
        return this.position;
    }

    /**
     * Scale multiplied through every ancestor.
     */
    get globalScale(): Vec2 {
        if (this._isOnTree) return vec2Clone(this._globalScale);
        if (this._parent) return vec2Mul(this._parent.globalScale, this.scale);
        return this.scale;
    }

    // ==========================================
    // Tree Structure
    // ==========================================

    /**
     * Attach `node` as a child, at the end or at index `at`.
     */
    addChild(node: Node, at: number = -1): void {
        if (node === this || node._parent) {
            throw new InvalidChildError(`Cannot add '${node.name}' to '${this.name}': node already has a parent or is the target`);
        }

        for (let ancestor = this._parent; ancestor; ancestor = ancestor._parent) {
            if (ancestor === node) {
                throw new InvalidChildError(`Cannot add '${node.name}' to its own descendant '${this.name}'`);
            }
        }

        if (node.isOnTree) {
            // Only the scene root is on the tree without a parent
            throw new InvalidChildError(`Cannot add the scene root '${node.name}' as a child`);
        }

        if (this.childrenByName.has(node.name)) {
            throw new DuplicatedChildError(`'${this.name}' already has a child named '${node.name}'`);
        }

        if (at === -1) {
            this._children.push(node);
        } else {
            this._children.splice(at, 0, node);
        }

        this.childrenByName.set(node.name, node);
        node._parent = this;

        if (this._isOnTree && this._tree) {
            node._enterTree(this._tree);
        } else {
            node.propagateTransform();
        }

        this.childAdded(node);
    }

    /**
     * Detach a child, by reference or by index (negative counts from the end).
     * Returns the removed node, or null when removing by index from a node
     * without children.
     */
    removeChild(node?: Node, at: number = -1): Node | null {
        let index: number;
        if (node) {
            index = this._children.indexOf(node);
            if (index === -1) {
                throw new NotAChildError(`'${node.name}' is not a child of '${this.name}'`);
            }
        } else {
            if (this._children.length === 0) return null;
            index = at < 0 ? this._children.length + at : at;
            if (index < 0 || index >= this._children.length) {
                throw new NotAChildError(`'${this.name}' has no child at index ${at}`);
            }
        }

        const [removed] = this._children.splice(index, 1);
        this.childrenByName.delete(removed.name);
        removed._parent = null;

        if (this._isOnTree) {
            removed._exitTree();
        }
        removed.propagateTransform();

        this.childRemoved(removed);
        return removed;
    }

    /**
     * Detach from the parent, free every child, then emit `freed`.
     * Also drops every connection this node holds as an observer.
     */
    free(): void {
        if (this._isFreed) return;

        this._parent?.removeChild(this);
        if (this._isOnTree) {
            // Scene root: on the tree without a parent
            this._exitTree();
        }

        // Children remove themselves from this list while being freed
        for (const child of [...this._children]) {
            child.free();
        }

        this._isFreed = true;
        this.freed.emit(this);
        this.dropSubscriptions();
    }

    getChild(name: string): Node | null {
        return this.childrenByName.get(name) ?? null;
    }

    /**
     * Child by index; negative indexes count from the end.
     */
    getChildAt(index: number): Node | null {
        const i = index < 0 ? this._children.length + index : index;
        return this._children[i] ?? null;
    }

    hasChild(name: string): boolean {
        return this.childrenByName.has(name);
    }

    getParent(): Node | null {
        return this._parent;
    }

    /**
     * Resolve a relative path such as `Player/Sprite` or `../Enemy`.
     */
    getNode(path: string): Node | null {
        let current: Node | null = this;

        for (const part of path.split('/')) {
            if (!current) return null;
            if (part === '' || part === '.') continue;
            current = part === '..' ? current._parent : current.getChild(part);
        }

        return current;
    }

    // ==========================================
    // Pause
    // ==========================================

    toggleProcess(): void {
        this.pauseMode ^= PauseMode.TREE_PAUSED;
    }

    pause(doPause: boolean = false): void {
        if (doPause) {
            this.pauseMode |= PauseMode.TREE_PAUSED;
        } else {
            this.pauseMode &= ~PauseMode.TREE_PAUSED;
        }
    }

    // ==========================================
    // Virtual Hooks
    // ==========================================

    /** Per-frame update */
    protected process(_delta: number): void {}

    /** Called during the draw pass with this node's global transform */
    protected draw(_transform: DrawTransform): void {}

    /** Called by the input router for events this node registered */
    inputEvent(_event: InputEvent): void {}

    /** Called after this node (or an ancestor) joins the tree, before its children */
    protected onEnterTree(): void {}

    /** Called after this node (or an ancestor) leaves the tree, before its children */
    protected onExitTree(): void {}

    /** Called after the global transform of this node changed */
    protected globalTransformChanged(): void {}

    protected childAdded(_node: Node): void {}

    protected childRemoved(_node: Node): void {}

    protected override transformChanged(): void {
        this.propagateTransform();
    }

    // ==========================================
    // Internal (driven by SceneTree)
    // ==========================================

    /** @internal */
    _enterTree(tree: SceneTree): void {
        this._tree = tree;
        this.cacheGlobalTransform();
        this._isOnTree = true;
        this.globalTransformChanged();
        this.onEnterTree();

        for (const child of this._children) {
            child._enterTree(tree);
        }
    }

    /** @internal */
    _exitTree(): void {
        this._isOnTree = false;
        this.onExitTree();
        this._tree = null;

        for (const child of this._children) {
            child._exitTree();
        }
    }

    /**
     * Post-order process pass.
     * @internal
     */
    _propagate(delta: number, inherited: number): void {
        const state = inherited | this.pauseMode;

        for (const child of [...this._children]) {
            // Skip children detached by an earlier sibling this tick
            if (child._parent !== this) continue;
            child._propagate(delta, state);
        }

        if (!this._isOnTree || !shouldProcess(state, this.pauseMode)) return;

        const self: Node = this;
        if (hasPhysicsStep(self)) {
            self.physicsProcess(delta);
        }
        this.process(delta);
    }

    /**
     * Pre-order draw pass.
     * @internal
     */
    _drawPass(): void {
        const scale = this.globalScale;
        const cell = this.getCell();
        const anchor = this.anchor;
        const transform: DrawTransform = {
            position: this.globalPosition,
            scale,
            offset: vec2(cell.x * scale.x * anchor.x, cell.y * scale.y * anchor.y)
        };

        this.draw(transform);
        this._tree?.renderer?.drawNode(this, transform);

        for (const child of [...this._children]) {
            if (child._parent !== this) continue;
            child._drawPass();
        }
    }

    private cacheGlobalTransform(): void {
        if (this._parent) {
            this._globalPosition = vec2Add(this._parent.globalPosition, this.position);
            this._globalScale = vec2Mul(this._parent.globalScale, this.scale);
        } else {
            this._globalPosition = this.position;
            this._globalScale = this.scale;
        }
    }

    private propagateTransform(): void {
        if (this._isOnTree) {
            this.cacheGlobalTransform();
        }
        this.globalTransformChanged();

        for (const child of this._children) {
            child.propagateTransform();
        }
    }

    toString(): string {
        return `${this.name}: ${this.constructor.name}`;
    }
}
