/**
 * Utility functions for the dynamic fee controller
 */

// Math utilities
export * from './math.js';

// Dynamic fee engine
export * from './dynamic-fee/index.js';
