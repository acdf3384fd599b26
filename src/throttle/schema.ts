/**
 * Throttle Module - Schemas and Types
 */

/**
 * Countdown of valid records left to skip before the next publication.
 * Starts at 0 so that the first valid record publishes.
 */
export type ThrottleState = Readonly<{
  remaining: number;
}>;

export const INITIAL_THROTTLE_STATE: ThrottleState = {
  remaining: 0,
};

export type ThrottleTick = Readonly<{
  publish: boolean;
  state: ThrottleState;
}>;
