import { describe, test, expect } from 'vitest';
import { InputRouter, InputEvent, KEY_DOWN, KEY_UP } from './input';
import { Node } from './node';
import { SceneTree } from '../scene-tree';

class Listener extends Node {
  readonly received: string[] = [];

  override inputEvent(event: InputEvent): void {
    this.received.push(`${event.type}:${String(event.key)}:${event.tag}`);
  }
}

function setup() {
  const tree = new SceneTree();
  const listener = new Listener('Listener');
  tree.currentScene = listener;
  return { tree, input: tree.input, listener };
}

describe('InputRouter.dispatch', () => {
  test('delivers queued events to registered nodes', () => {
    const { input, listener } = setup();
    input.registerEvent(listener, KEY_DOWN, 'Space', 'jump');

    input.push(KEY_DOWN, 'Space');
    input.push(KEY_DOWN, 'Enter');

    expect(listener.received).toEqual([]);
    expect(input.dispatch()).toBe(true);
    expect(listener.received).toEqual(['keydown:Space:jump']);
  });

  test('returns false when nothing was queued', () => {
    expect(new InputRouter().dispatch()).toBe(false);
  });

  test('skips nodes that are off the tree', () => {
    const input = new InputRouter();
    const detached = new Listener('Detached');
    input.registerEvent(detached, KEY_DOWN, 'Space');

    input.push(KEY_DOWN, 'Space');
    input.dispatch();

    expect(detached.received).toEqual([]);
  });

  test('runs at the start of a tick', () => {
    const { tree, input, listener } = setup();
    input.registerEvent(listener, KEY_UP, 1, 'release');

    input.push(KEY_UP, 1);
    tree.tick(1 / 60);

    expect(listener.received).toEqual(['keyup:1:release']);
  });
});

describe('InputRouter registrations', () => {
  test('freeing a node unregisters it', () => {
    const { input, listener } = setup();
    input.registerEvent(listener, KEY_DOWN, 'Space');
    expect(input.isRegistered(listener)).toBe(true);

    listener.free();

    expect(input.isRegistered(listener)).toBe(false);
    expect(listener.freed.observerCount).toBe(0);
  });

  test('unregisterNode drops every registration of the node', () => {
    const { input, listener } = setup();
    input.registerEvent(listener, KEY_DOWN, 'A');
    input.registerEvent(listener, KEY_UP, 'A');

    input.unregisterNode(listener);
    input.push(KEY_DOWN, 'A');
    input.dispatch();

    expect(listener.received).toEqual([]);
    expect(listener.freed.isConnected(input)).toBe(false);
  });
});

describe('InputRouter key state', () => {
  test('tracks held keys through keydown and keyup', () => {
    const input = new InputRouter();

    input.push(KEY_DOWN, 'A');
    input.dispatch();
    expect(input.isPressed('A')).toBe(true);

    input.push(KEY_UP, 'A');
    input.dispatch();
    expect(input.isPressed('A')).toBe(false);
  });

  test('getAxis normalizes diagonal input', () => {
    const input = new InputRouter();
    input.push(KEY_DOWN, 'D');
    input.push(KEY_DOWN, 'W');
    input.dispatch();

    const axis = input.getAxis('A', 'D', 'W', 'S');

    expect(axis.x).toBeCloseTo(Math.SQRT1_2);
    expect(axis.y).toBeCloseTo(-Math.SQRT1_2);
  });

  test('reset clears held keys and the queue', () => {
    const input = new InputRouter();
    input.push(KEY_DOWN, 'A');
    input.dispatch();
    input.push(KEY_DOWN, 'B');

    input.reset();

    expect(input.isPressed('A')).toBe(false);
    expect(input.dispatch()).toBe(false);
  });
});
