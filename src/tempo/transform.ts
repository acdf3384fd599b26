/**
 * Tempo Module - Pure Transformations
 *
 * Day rollover, fetch eligibility and calendar freshness checks.
 * Times are read in the process's local time zone.
 */
import { type Result, err, ok } from "neverthrow";

import type { TempoColor } from "../signals/index.js";
import type { TempoError } from "./errors.js";
import { invalidResponse, noData, staleData } from "./errors.js";
import type {
  FetchWindow,
  ScheduleState,
  TempoCalendarEntry,
  TempoCalendarResponse,
} from "./schema.js";

/** Tokens are renewed this long before they expire */
export const TOKEN_EXPIRY_MARGIN_MS = 60_000;

/** Used when the token response carries no expires_in */
export const DEFAULT_TOKEN_LIFETIME_S = 3600;

// =============================================================================
// Token Handling
// =============================================================================

/**
 * Build the HTTP Basic header of a client-credentials request.
 */
export function buildBasicAuthHeader(
  clientId: string,
  clientSecret: string,
): string {
  const encoded = Buffer.from(`${clientId}:${clientSecret}`).toString("base64");
  return `Basic ${encoded}`;
}

/**
 * Absolute expiry of a token issued at `now`.
 */
export function calculateTokenExpiry(expiresInSeconds: number, now: number): number {
  return now + expiresInSeconds * 1000;
}

/**
 * Whether a cached token can still be used.
 */
export function isTokenValid(expiresAt: number, now: number): boolean {
  return now < expiresAt - TOKEN_EXPIRY_MARGIN_MS;
}

// =============================================================================
// Calendar Parsing
// =============================================================================

/**
 * Pick the latest-starting entry of a calendar response.
 */
export function selectLatestEntry(
  response: TempoCalendarResponse,
): Result<TempoCalendarEntry, TempoError> {
  const entries = response.tempo_like_calendars.values;

  let latest: TempoCalendarEntry | null = null;
  for (const entry of entries) {
    if (!latest || Date.parse(entry.start_date) > Date.parse(latest.start_date)) {
      latest = entry;
    }
  }

  if (!latest) {
    return err(noData("Calendar response holds no entry"));
  }
  return ok(latest);
}

/**
 * Accept an entry only if it was published today and describes a day
 * that has not started yet.
 *
 * @param entry - Calendar entry
 * @param now - Current time
 * @returns The color to cache, or why the entry was refused
 */
export function validateCalendarEntry(
  entry: TempoCalendarEntry,
  now: Date,
): Result<Exclude<TempoColor, "UNKNOWN">, TempoError> {
  const updated = new Date(entry.updated_date);
  const start = new Date(entry.start_date);

  if (Number.isNaN(updated.getTime()) || Number.isNaN(start.getTime())) {
    return err(invalidResponse("Unparseable calendar dates", entry));
  }

  if (!isSameLocalDay(updated, now)) {
    return err(staleData(`Calendar last updated ${entry.updated_date}`));
  }

  if (start.getTime() <= now.getTime()) {
    return err(staleData(`Calendar entry started ${entry.start_date}`));
  }

  return ok(entry.value);
}

/**
 * Whether two instants fall on the same local calendar day.
 */
export function isSameLocalDay(a: Date, b: Date): boolean {
  return (
    a.getFullYear() === b.getFullYear() &&
    a.getMonth() === b.getMonth() &&
    a.getDate() === b.getDate()
  );
}

// =============================================================================
// Schedule
// =============================================================================

/**
 * Clear the cached color when the day-of-month changed since the last call.
 */
export function rollOverDay(state: ScheduleState, now: Date): ScheduleState {
  const day = now.getDate();
  if (day === state.lastSeenDay) {
    return state;
  }

  return { ...state, lastSeenDay: day, cachedColor: null };
}

/**
 * Minutes elapsed since local midnight.
 */
export function minutesOfDay(now: Date): number {
  return now.getHours() * 60 + now.getMinutes();
}

/**
 * Whether `now` falls within [start, start + duration).
 */
export function isInFetchWindow(now: Date, window: FetchWindow): boolean {
  const start = window.hour * 60 + window.minute;
  const minutes = minutesOfDay(now);
  return minutes >= start && minutes < start + window.durationMinutes;
}

/**
 * A fetch is due when nothing is cached for today and the local time is
 * within the fetch window.
 */
export function isFetchEligible(
  state: ScheduleState,
  now: Date,
  window: FetchWindow,
): boolean {
  return state.cachedColor === null && isInFetchWindow(now, window);
}

/**
 * Cache a freshly fetched color.
 */
export function recordSuccess(
  state: ScheduleState,
  color: Exclude<TempoColor, "UNKNOWN">,
  now: Date,
): ScheduleState {
  return {
    ...state,
    lastSuccessDay: now.getDate(),
    lastSeenDay: now.getDate(),
    cachedColor: color,
  };
}
