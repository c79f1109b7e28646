export * from './logging.js';
export * from './fee-controller.js';
