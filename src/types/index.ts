/**
 * Testimony Engine - Type Barrel
 */

export type * from './world.js';
export type * from './claims.js';
export type * from './agent.js';
export type * from './provider.js';
export type * from './config.js';
export type * from './dialogue.js';
