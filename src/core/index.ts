/**
 * Core - Scene graph primitives
 */

export * from './constants';
export * from './errors';
export * from './signal';
export * from './entity';
export * from './node';
export * from './input';
