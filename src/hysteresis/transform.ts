/**
 * Hysteresis Module - Pure Transformations
 *
 * Debounces a noisy apparent power reading into an over-threshold flag.
 */
import type { FilterOptions, FilterState, FilterStep } from "./schema.js";

/**
 * Advance the filter by one reading.
 *
 * A reading above both the estimate and the threshold replaces the
 * estimate outright, so the rising edge has no lag. Any other reading
 * moves the estimate by 1/timeConstant of the difference, which delays
 * the falling edge by roughly timeConstant samples.
 *
 * @param state - Current filter state
 * @param va - Apparent power reading, or null when the frame has none
 * @param options - Threshold and time constant
 * @returns Next state and output; state is untouched when va is null
 *
 * @example
 * stepFilter({ smoothedPower: 0 }, 9001, { threshold: 9000, timeConstant: 60 })
 * // { state: { smoothedPower: 9001 }, output: true }
 */
export function stepFilter(
  state: FilterState,
  va: number | null,
  options: FilterOptions,
): FilterStep {
  if (va === null) {
    return { state, output: null };
  }

  const smoothedPower =
    va > Math.max(state.smoothedPower, options.threshold)
      ? va
      : state.smoothedPower -
        (state.smoothedPower - va) / options.timeConstant;

  return {
    state: { smoothedPower },
    output: smoothedPower > options.threshold,
  };
}
