/**
 * Throttle Module - Public API
 */

export type { ThrottleState, ThrottleTick } from "./schema.js";

export { INITIAL_THROTTLE_STATE } from "./schema.js";

export { tickThrottle } from "./transform.js";
