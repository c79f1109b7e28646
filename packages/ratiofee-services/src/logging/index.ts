export { logger, createServiceLogger } from './logger.js';
export type { ServiceLogger } from './logger.js';
export { LogPatterns, log, toError } from './patterns.js';
