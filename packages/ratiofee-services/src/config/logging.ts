/**
 * Logging Configuration
 *
 * Environment variables:
 * - LOG_LEVEL: pino level (default "info", "silent" under NODE_ENV=test)
 */

export interface LoggingConfig {
  level: string;
}

/**
 * Get logging configuration from environment
 */
export function getLoggingConfig(): LoggingConfig {
  const fallback = process.env.NODE_ENV === 'test' ? 'silent' : 'info';
  return {
    level: process.env.LOG_LEVEL || fallback,
  };
}
