/**
 * Tempo Module - Public API
 */

// Types
export type {
  FetchWindow,
  ScheduleState,
  TempoCalendarEntry,
  TempoClientConfig,
} from "./schema.js";
export type { TempoError } from "./errors.js";
export type { TempoScheduler, TempoSchedulerOptions } from "./scheduler.js";

export { INITIAL_SCHEDULE_STATE } from "./schema.js";

// Error utilities
export { formatTempoError } from "./errors.js";

// Service functions (side effects)
export { clearTokenCache, fetchTempoCalendar } from "./service.js";
export { createTempoScheduler } from "./scheduler.js";

// Pure transformations
export {
  isFetchEligible,
  isInFetchWindow,
  rollOverDay,
  validateCalendarEntry,
} from "./transform.js";
