/**
 * Pairing Module
 * 
 * Discovery, pairing and verification of the two glasses units.
 */

export * from './types.js';
export * from './store.js';
export * from './manager.js';
