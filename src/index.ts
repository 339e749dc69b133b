/**
 * Scene Engine - Retained-mode 2D scene graph
 *
 * Features:
 * - Node tree with enter/exit hooks, pause modes and cached global transforms
 * - Owner-scoped signals with reentrancy-safe disconnects
 * - Layer/mask collision detection for rectangles and circles
 * - Fixed-timestep game driver
 */

// ============================================
// Math
// ============================================
export * from './math';

// ============================================
// Core (Scene graph primitives)
// ============================================
export * from './core';

// ============================================
// Scene Tree
// ============================================
export { SceneTree } from './scene-tree';
export type { SceneTreeConfig, Renderer } from './scene-tree';

// ============================================
// Game (High-level API)
// ============================================
export { Game, createGame } from './game';
export type { GameConfig, GameCallbacks } from './game';
export { ENGINE_VERSION } from './version';

// ============================================
// Physics (Collision detection)
// ============================================
export * from './plugins/physics2d';
