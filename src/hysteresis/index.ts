/**
 * Hysteresis Module - Public API
 */

export type { FilterOptions, FilterState, FilterStep } from "./schema.js";

export { DEFAULT_TIME_CONSTANT, INITIAL_FILTER_STATE } from "./schema.js";

export { stepFilter } from "./transform.js";
