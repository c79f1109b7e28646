/**
 * Logging patterns shared by all services
 */

import type { ServiceLogger } from './logger.js';

/**
 * Consistent method entry/exit/error logging
 */
export const LogPatterns = {
  /**
   * Log method entry
   */
  methodEntry(logger: ServiceLogger, method: string, params?: Record<string, unknown>): void {
    logger.debug({ method, ...params }, `→ ${method}`);
  },

  /**
   * Log method exit
   */
  methodExit(logger: ServiceLogger, method: string, result?: Record<string, unknown>): void {
    logger.debug({ method, ...result }, `← ${method}`);
  },

  /**
   * Log method error
   */
  methodError(
    logger: ServiceLogger,
    method: string,
    error: Error,
    context?: Record<string, unknown>
  ): void {
    logger.error(
      { method, error: error.message, errorName: error.name, ...context },
      `✗ ${method}`
    );
  },
};

/**
 * Short alias used inside services
 */
export const log = LogPatterns;

/**
 * Convert an unknown thrown value into an Error
 */
export function toError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  return new Error(String(error));
}
