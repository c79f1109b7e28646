/**
 * Out-of-bounds streak record
 *
 * Tracks which side of the tolerance band the most recent observation
 * fell on and how many consecutive observations landed on that side.
 */
export interface OobState {
  /** True when the last out-of-band observation was above the band */
  lastSideWasUpper: boolean;

  /** Consecutive out-of-band observations on the same side (0 = in band) */
  consecutiveHits: number;
}

/**
 * Streak record of a freshly activated pool
 */
export const INITIAL_OOB_STATE: Readonly<OobState> = Object.freeze({
  lastSideWasUpper: false,
  consecutiveHits: 0,
});
