/**
 * Throttle Module - Pure Transformations
 */
import type { ThrottleState, ThrottleTick } from "./schema.js";

/**
 * Advance the publish countdown by one valid record.
 *
 * Publishes once every skipCount + 1 records: a publishing record resets
 * the countdown to skipCount, every other record decrements it.
 *
 * @example
 * // skipCount = 3: records 1, 5, 9, ... publish
 * tickThrottle({ remaining: 0 }, 3) // { publish: true, state: { remaining: 3 } }
 */
export function tickThrottle(
  state: ThrottleState,
  skipCount: number,
): ThrottleTick {
  if (state.remaining <= 0) {
    return { publish: true, state: { remaining: skipCount } };
  }

  return { publish: false, state: { remaining: state.remaining - 1 } };
}
