/**
 * @ratiofee/shared
 *
 * Fee math and shared types for the dynamic fee controller.
 * Used by the services layer and by anything that needs to preview fees.
 */

// Export all types
export * from './types/index.js';

// Export error taxonomy
export * from './errors/index.js';

// Export all utilities
export * from './utils/index.js';
