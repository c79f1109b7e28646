export {
  FeeControllerError,
  InvalidFeeError,
  InvalidRatioError,
  InvalidParameterError,
  CooldownNotElapsedError,
  PoolNotActiveError,
  PoolAlreadyActiveError,
} from './fee-controller-errors.js';
export type { FeeControllerErrorCode } from './fee-controller-errors.js';
