/**
 * Pool Fee State Store
 *
 * The arena that holds one fee record per pool. The layout of a record is
 * versioned independently of the controller behavior so that the behavior
 * can be replaced without migrating stored state.
 */

import type { PoolFeeState } from '@ratiofee/shared';

/**
 * Layout version of {@link PoolFeeState} records written by this package
 */
export const STATE_LAYOUT_VERSION = 1;

/**
 * Storage contract for pool fee records
 *
 * Records are stored and returned by value: callers never hold a reference
 * into the arena, so a record changes only through {@link put}.
 */
export interface PoolFeeStateStore {
  /** Layout version of the records held by this store */
  readonly layoutVersion: number;

  get(poolId: string): PoolFeeState | undefined;

  /** Replace the record for `state.poolId` as a whole */
  put(state: PoolFeeState): void;

  delete(poolId: string): boolean;
}

function copyState(state: PoolFeeState): PoolFeeState {
  return { ...state, oobState: { ...state.oobState } };
}

/**
 * In-process arena keyed by pool identifier
 */
export class InMemoryPoolFeeStateStore implements PoolFeeStateStore {
  readonly layoutVersion = STATE_LAYOUT_VERSION;

  private readonly records = new Map<string, PoolFeeState>();

  get(poolId: string): PoolFeeState | undefined {
    const record = this.records.get(poolId);
    return record ? copyState(record) : undefined;
  }

  put(state: PoolFeeState): void {
    this.records.set(state.poolId, copyState(state));
  }

  delete(poolId: string): boolean {
    return this.records.delete(poolId);
  }
}
