import { describe, test, expect, vi } from 'vitest';
import { Node, PhysicsStep, DrawTransform } from './node';
import { PauseMode } from './constants';
import { DuplicatedChildError, EmptyNameError, InvalidChildError, NotAChildError } from './errors';
import { SceneTree } from '../scene-tree';
import { vec2 } from '../math';

class Recorder extends Node {
  constructor(name: string, protected readonly log: string[]) {
    super(name);
  }

  protected override process(): void {
    this.log.push(`process:${this.name}`);
  }

  protected override draw(_transform: DrawTransform): void {
    this.log.push(`draw:${this.name}`);
  }

  protected override onEnterTree(): void {
    this.log.push(`enter:${this.name}`);
  }

  protected override onExitTree(): void {
    this.log.push(`exit:${this.name}`);
  }
}

class Stepper extends Recorder implements PhysicsStep {
  physicsProcess(): void {
    this.log.push(`physics:${this.name}`);
  }
}

function assertConsistent(node: Node): void {
  for (const child of node.children) {
    expect(child.parent).toBe(node);
    assertConsistent(child);
  }
}

describe('Node.addChild', () => {
  test('appends and links parent and children', () => {
    const parent = new Node('Parent');
    const a = new Node('A');
    const b = new Node('B');

    parent.addChild(a);
    parent.addChild(b);

    expect(parent.children).toEqual([a, b]);
    expect(a.parent).toBe(parent);
    expect(parent.getChild('B')).toBe(b);
    assertConsistent(parent);
  });

  test('inserts at a given index', () => {
    const parent = new Node('Parent');
    const a = new Node('A');
    const b = new Node('B');
    const c = new Node('C');

    parent.addChild(a);
    parent.addChild(c);
    parent.addChild(b, 1);

    expect(parent.children.map(n => n.name)).toEqual(['A', 'B', 'C']);
  });

  test('rejects self, attached nodes and ancestors', () => {
    const grandparent = new Node('Grandparent');
    const parent = new Node('Parent');
    const child = new Node('Child');
    grandparent.addChild(parent);
    parent.addChild(child);

    expect(() => parent.addChild(parent)).toThrow(InvalidChildError);
    expect(() => grandparent.addChild(child)).toThrow(InvalidChildError);
    expect(() => child.addChild(grandparent)).toThrow(InvalidChildError);
    assertConsistent(grandparent);
  });

  test('rejects duplicate sibling names', () => {
    const parent = new Node('Parent');
    parent.addChild(new Node('Same'));

    const duplicate = new Node('Same');
    expect(() => parent.addChild(duplicate)).toThrow(DuplicatedChildError);
    expect(() => parent.addChild(duplicate)).toThrow(InvalidChildError);
    expect(duplicate.parent).toBeNull();
  });

  test('rejects empty names', () => {
    expect(() => new Node('')).toThrow(EmptyNameError);
  });

  test('rejects the scene root', () => {
    const tree = new SceneTree();

    expect(() => new Node('Holder').addChild(tree.root)).toThrow(InvalidChildError);
  });
});

describe('Node.removeChild', () => {
  test('returns null when there are no children', () => {
    expect(new Node('Empty').removeChild()).toBeNull();
  });

  test('removes the last child by default', () => {
    const parent = new Node('Parent');
    const a = new Node('A');
    const b = new Node('B');
    parent.addChild(a);
    parent.addChild(b);

    expect(parent.removeChild()).toBe(b);
    expect(b.parent).toBeNull();
    expect(parent.children).toEqual([a]);
    expect(parent.hasChild('B')).toBe(false);
  });

  test('removes by index', () => {
    const parent = new Node('Parent');
    const a = new Node('A');
    parent.addChild(a);
    parent.addChild(new Node('B'));

    expect(parent.removeChild(undefined, 0)).toBe(a);
    expect(parent.children.map(n => n.name)).toEqual(['B']);
  });

  test('throws for nodes that are not children', () => {
    const parent = new Node('Parent');
    parent.addChild(new Node('A'));

    expect(() => parent.removeChild(new Node('Stranger'))).toThrow(NotAChildError);
    expect(() => parent.removeChild(undefined, 3)).toThrow(NotAChildError);
  });

  test('throws for a stranger even without children', () => {
    expect(() => new Node('Empty').removeChild(new Node('Stranger'))).toThrow(NotAChildError);
  });
});

describe('Node lookup', () => {
  test('getChildAt counts negative indexes from the end', () => {
    const parent = new Node('Parent');
    const a = new Node('A');
    const b = new Node('B');
    parent.addChild(a);
    parent.addChild(b);

    expect(parent.getChildAt(0)).toBe(a);
    expect(parent.getChildAt(-1)).toBe(b);
    expect(parent.getChildAt(5)).toBeNull();
  });

  test('getNode resolves relative paths', () => {
    const level = new Node('Level');
    const player = new Node('Player');
    const sprite = new Node('Sprite');
    const enemy = new Node('Enemy');
    level.addChild(player);
    level.addChild(enemy);
    player.addChild(sprite);

    expect(level.getNode('Player/Sprite')).toBe(sprite);
    expect(sprite.getNode('../../Enemy')).toBe(enemy);
    expect(player.getNode('.')).toBe(player);
    expect(level.getNode('Missing/Sprite')).toBeNull();
  });

  test('toString names the node and its class', () => {
    expect(new Node('Player').toString()).toBe('Player: Node');
  });
});

describe('Node tree membership', () => {
  test('enter-tree runs top-down over the attached subtree', () => {
    const log: string[] = [];
    const tree = new SceneTree();
    const scene = new Recorder('Scene', log);
    const child = new Recorder('Child', log);
    scene.addChild(child);

    expect(scene.isOnTree).toBe(false);

    tree.currentScene = scene;

    expect(log).toEqual(['enter:Scene', 'enter:Child']);
    expect(child.isOnTree).toBe(true);
    expect(child.tree).toBe(tree);
  });

  test('removing a subtree runs exit-tree on every node', () => {
    const log: string[] = [];
    const tree = new SceneTree();
    const scene = new Node('Scene');
    const branch = new Recorder('Branch', log);
    const leaf = new Recorder('Leaf', log);
    branch.addChild(leaf);
    scene.addChild(branch);
    tree.currentScene = scene;
    log.length = 0;

    scene.removeChild(branch);

    expect(log).toEqual(['exit:Branch', 'exit:Leaf']);
    expect(branch.isOnTree).toBe(false);
    expect(leaf.isOnTree).toBe(false);
    expect(leaf.tree).toBeNull();
  });

  test('replacing the current scene detaches the previous one', () => {
    const tree = new SceneTree();
    const first = new Node('First');
    const second = new Node('Second');

    tree.currentScene = first;
    tree.currentScene = second;

    expect(first.isOnTree).toBe(false);
    expect(first.parent).toBeNull();
    expect(tree.root.children).toEqual([second]);
  });
});

describe('Node.free', () => {
  test('detaches the node and frees its descendants', () => {
    const tree = new SceneTree();
    const scene = new Node('Scene');
    const a = new Node('A');
    const b = new Node('B');
    a.addChild(b);
    scene.addChild(a);
    tree.currentScene = scene;

    a.free();

    expect(a.parent).toBeNull();
    expect(scene.children).toEqual([]);
    expect(a.children).toEqual([]);
    expect(a.isOnTree).toBe(false);
    expect(b.isOnTree).toBe(false);
    expect(a.isFreed).toBe(true);
    expect(b.isFreed).toBe(true);
  });

  test('emits freed after the node lost its parent and children', () => {
    const parent = new Node('Parent');
    const node = new Node('Node');
    node.addChild(new Node('Child'));
    parent.addChild(node);

    const seen: Array<[Node | null, number]> = [];
    node.connect(node.freed, {}, (freed: Node) => seen.push([freed.parent, freed.children.length]));

    node.free();

    expect(seen).toEqual([[null, 0]]);
  });

  test('frees each node once', () => {
    const node = new Node('Node');
    const callback = vi.fn();
    node.connect(node.freed, {}, callback);

    node.free();
    node.free();

    expect(callback).toHaveBeenCalledTimes(1);
  });
});

describe('Node transforms', () => {
  test('global position adds every ancestor position', () => {
    const parent = new Node('Parent', vec2(10, 0));
    const child = new Node('Child', vec2(1, 1));
    parent.addChild(child);

    expect(child.globalPosition).toEqual({ x: 11, y: 1 });
  });

  test('cached globals follow ancestor changes while on the tree', () => {
    const tree = new SceneTree();
    const scene = new Node('Scene', vec2(10, 20));
    const child = new Node('Child', vec2(5, 5));
    scene.addChild(child);
    tree.currentScene = scene;

    expect(child.globalPosition).toEqual({ x: 15, y: 25 });

    scene.position = vec2(0, 0);
    expect(child.globalPosition).toEqual({ x: 5, y: 5 });

    scene.scale = vec2(2, 3);
    child.scale = vec2(2, 1);
    expect(child.globalScale).toEqual({ x: 4, y: 3 });
  });

  test('translate moves relative to the current position', () => {
    const node = new Node('Node', vec2(1, 2));
    node.translate(3, -2);

    expect(node.position).toEqual({ x: 4, y: 0 });
  });
});

describe('Node propagation', () => {
  test('process runs post-order and draw runs pre-order', () => {
    const log: string[] = [];
    const tree = new SceneTree();
    const scene = new Recorder('Scene', log);
    scene.addChild(new Recorder('A', log));
    scene.addChild(new Recorder('B', log));
    tree.currentScene = scene;
    log.length = 0;

    tree.tick(1 / 60);

    expect(log).toEqual([
      'process:A', 'process:B', 'process:Scene',
      'draw:Scene', 'draw:A', 'draw:B'
    ]);
  });

  test('physics step runs before process', () => {
    const log: string[] = [];
    const tree = new SceneTree();
    tree.currentScene = new Stepper('Mover', log);
    log.length = 0;

    tree.tick(1 / 60);

    expect(log.slice(0, 2)).toEqual(['physics:Mover', 'process:Mover']);
  });

  test('a paused tree only processes CONTINUE nodes', () => {
    const log: string[] = [];
    const tree = new SceneTree();
    const scene = new Recorder('Scene', log);
    const hud = new Recorder('Hud', log);
    hud.pauseMode = PauseMode.CONTINUE;
    scene.addChild(new Recorder('Player', log));
    scene.addChild(hud);
    tree.currentScene = scene;
    log.length = 0;

    tree.pauseTree();
    tree.tick(1 / 60);

    expect(log.filter(entry => entry.startsWith('process:'))).toEqual(['process:Hud']);
  });

  test('STOP blocks the node and its descendants', () => {
    const log: string[] = [];
    const tree = new SceneTree();
    const scene = new Recorder('Scene', log);
    const child = new Recorder('Child', log);
    scene.pauseMode = PauseMode.STOP;
    child.pauseMode = PauseMode.CONTINUE;
    scene.addChild(child);
    tree.currentScene = scene;
    log.length = 0;

    tree.tick(1 / 60);

    expect(log.filter(entry => entry.startsWith('process:'))).toEqual([]);
  });

  test('pause flags a single node and its children', () => {
    const log: string[] = [];
    const tree = new SceneTree();
    const scene = new Recorder('Scene', log);
    const enemy = new Recorder('Enemy', log);
    enemy.addChild(new Recorder('Gun', log));
    scene.addChild(enemy);
    tree.currentScene = scene;

    enemy.pause(true);
    log.length = 0;
    tree.tick(1 / 60);
    expect(log.filter(entry => entry.startsWith('process:'))).toEqual(['process:Scene']);

    enemy.toggleProcess();
    log.length = 0;
    tree.tick(1 / 60);
    expect(log.filter(entry => entry.startsWith('process:'))).toEqual([
      'process:Gun', 'process:Enemy', 'process:Scene'
    ]);
  });

  test('drawing still happens while paused', () => {
    const log: string[] = [];
    const tree = new SceneTree();
    tree.currentScene = new Recorder('Scene', log);
    tree.pauseTree();
    log.length = 0;

    tree.tick(1 / 60);

    expect(log).toEqual(['draw:Scene']);
  });
});
