/**
 * Tempo Module - Fallback Scheduler
 *
 * Fills an unknown next-day color from the calendar service, at most once
 * per day, within a daily retry window. Fetches run in the background:
 * resolve() never waits on the network, and a fetch still in flight counts
 * as a miss for the current cycle.
 */
import type { Result } from "neverthrow";

import { createLogger } from "../logger.js";
import type { TempoColor } from "../signals/index.js";
import type { TempoError } from "./errors.js";
import { formatTempoError } from "./errors.js";
import type {
  FetchWindow,
  ScheduleState,
  TempoCalendarEntry,
} from "./schema.js";
import { INITIAL_SCHEDULE_STATE } from "./schema.js";
import {
  isFetchEligible,
  recordSuccess,
  rollOverDay,
  validateCalendarEntry,
} from "./transform.js";

const log = createLogger("tempo");

export type TempoSchedulerOptions = Readonly<{
  /** Calendar lookup; must not throw */
  fetchEntry: () => Promise<Result<TempoCalendarEntry, TempoError>>;
  window: FetchWindow;
  /** Time source used when a fetch completes */
  clock?: () => Date;
}>;

export type TempoScheduler = Readonly<{
  /**
   * Next-day color for this cycle. The local register wins; the cached
   * fallback only fills UNKNOWN. May start a background fetch.
   */
  resolve: (now: Date, localColor: TempoColor) => TempoColor;
  getState: () => ScheduleState;
  /** Resolves once no fetch is in flight */
  settle: () => Promise<void>;
}>;

/**
 * Create a scheduler owning its own ScheduleState.
 */
export function createTempoScheduler(
  options: TempoSchedulerOptions,
): TempoScheduler {
  const clock = options.clock ?? (() => new Date());
  let state: ScheduleState = INITIAL_SCHEDULE_STATE;
  let inFlight: Promise<void> | null = null;

  const applyResult = (
    result: Result<TempoCalendarEntry, TempoError>,
  ): void => {
    const completedAt = clock();
    state = rollOverDay(state, completedAt);

    result
      .andThen((entry) => validateCalendarEntry(entry, completedAt))
      .match(
        (color) => {
          state = recordSuccess(state, color, completedAt);
          log.info({ color }, "Tomorrow color cached from calendar");
        },
        (error) => {
          log.warn(
            { errorType: error.type },
            `Calendar fallback missed: ${formatTempoError(error)}`,
          );
        },
      );
  };

  const startFetch = (): void => {
    log.debug("Starting calendar fallback fetch");
    inFlight = options
      .fetchEntry()
      .then(applyResult, (error: unknown) => {
        log.error({ error }, "Calendar fetch rejected unexpectedly");
      })
      .finally(() => {
        inFlight = null;
      });
  };

  return {
    resolve(now, localColor) {
      state = rollOverDay(state, now);

      if (localColor !== "UNKNOWN") {
        return localColor;
      }

      if (state.cachedColor !== null) {
        return state.cachedColor;
      }

      if (inFlight === null && isFetchEligible(state, now, options.window)) {
        startFetch();
      }

      return "UNKNOWN";
    },

    getState() {
      return state;
    },

    settle() {
      return inFlight ?? Promise.resolve();
    },
  };
}
