export { PoolFeeControllerService } from './pool-fee-controller-service.js';
export type { PoolFeeControllerServiceDependencies } from './pool-fee-controller-service.js';
export {
  STATE_LAYOUT_VERSION,
  InMemoryPoolFeeStateStore,
} from './pool-fee-state-store.js';
export type { PoolFeeStateStore } from './pool-fee-state-store.js';
export {
  createFeeParamsSchema,
  validateFeeParams,
  validateAdjustmentRate,
} from './param-validation.js';
