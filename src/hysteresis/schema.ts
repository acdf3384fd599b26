/**
 * Hysteresis Module - Schemas and Types
 *
 * State and options of the over-power filter.
 */

/**
 * Persistent filter state, one per meter stream.
 * Initialised at process start and never reset afterwards.
 */
export type FilterState = Readonly<{
  /** Smoothed apparent power estimate (VA) */
  smoothedPower: number;
}>;

export const INITIAL_FILTER_STATE: FilterState = {
  smoothedPower: 0,
};

/**
 * Fixed per deployment.
 */
export type FilterOptions = Readonly<{
  /** Threshold T (VA); output is smoothedPower > T */
  threshold: number;
  /** Falling-edge time constant, in samples */
  timeConstant: number;
}>;

export const DEFAULT_TIME_CONSTANT = 60;

/**
 * Result of one filter step. A null output means no reading this cycle.
 */
export type FilterStep = Readonly<{
  state: FilterState;
  output: boolean | null;
}>;
