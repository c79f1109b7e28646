/**
 * Shared types for the dynamic fee controller
 */

// Parameter types
export type { FeeParams, PoolCategory } from './fee-params.js';
export { POOL_CATEGORIES } from './fee-params.js';

// Out-of-bounds streak
export type { OobState } from './oob-state.js';
export { INITIAL_OOB_STATE } from './oob-state.js';

// Pool fee state
export type { PoolFeeState, FeeUpdatePreview, FeeUpdateResult } from './pool-fee-state.js';
