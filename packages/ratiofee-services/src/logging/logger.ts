/**
 * Service Logger
 *
 * Structured JSON logging with pino. Every service gets a child logger
 * tagged with its name. The level comes from LOG_LEVEL.
 */

import { pino } from 'pino';
import type { Logger } from 'pino';
import { getLoggingConfig } from '../config/logging.js';

/**
 * Logger type handed to services
 */
export type ServiceLogger = Logger;

/**
 * Root logger instance
 */
export const logger: ServiceLogger = pino({
  name: 'ratiofee',
  level: getLoggingConfig().level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

/**
 * Create a child logger for a service
 *
 * @param serviceName - Name attached to every log line as `service`
 */
export function createServiceLogger(serviceName: string): ServiceLogger {
  return logger.child({ service: serviceName });
}
