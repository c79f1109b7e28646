/**
 * Ratio Fee - Services
 *
 * Cooldown-gated dynamic fee controller for AMM pools. Turns periodic
 * volume/liquidity ratio observations into committed pool fees.
 */

// Re-export fee math and shared types from @ratiofee/shared
export * from '@ratiofee/shared';

// Export utilities
export * from './utils/index.js';

// Export configuration
export * from './config/index.js';

// Export logging utilities
export * from './logging/index.js';

// Export services
export * from './services/pool-fee/index.js';

// Export service types
export * from './services/types/pool-fee/index.js';

export const version = '0.1.0';
