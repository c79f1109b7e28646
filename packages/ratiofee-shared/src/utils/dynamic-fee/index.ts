/**
 * Dynamic fee engine
 */

export * from './constants.js';
export * from './bounds.js';
export * from './ema.js';
export * from './cooldown.js';
export * from './fees.js';
