/**
 * Throttle Transform Tests
 */
import { describe, expect, it } from "vitest";

import type { ThrottleState } from "../schema.js";
import { INITIAL_THROTTLE_STATE } from "../schema.js";
import { tickThrottle } from "../transform.js";

/**
 * Returns the 1-based positions of publishing records.
 */
function publishingRecords(count: number, skipCount: number): number[] {
  let state: ThrottleState = INITIAL_THROTTLE_STATE;
  const published: number[] = [];
  for (let i = 1; i <= count; i++) {
    const tick = tickThrottle(state, skipCount);
    state = tick.state;
    if (tick.publish) published.push(i);
  }
  return published;
}

describe("tickThrottle", () => {
  it("publishes on the first record", () => {
    expect(tickThrottle(INITIAL_THROTTLE_STATE, 8)).toEqual({
      publish: true,
      state: { remaining: 8 },
    });
  });

  it("decrements the countdown on skipped records", () => {
    expect(tickThrottle({ remaining: 3 }, 8)).toEqual({
      publish: false,
      state: { remaining: 2 },
    });
  });

  it("publishes at records 1, 5 and 9 of 10 with a skip count of 3", () => {
    expect(publishingRecords(10, 3)).toEqual([1, 5, 9]);
  });

  it("publishes every record with a skip count of 0", () => {
    expect(publishingRecords(4, 0)).toEqual([1, 2, 3, 4]);
  });

  it("publishes ceil(n / (skip + 1)) times", () => {
    expect(publishingRecords(100, 8)).toHaveLength(Math.ceil(100 / 9));
  });
});
