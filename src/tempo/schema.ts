/**
 * Tempo Module - Schemas and Types
 *
 * Calendar service payloads and the state of the daily fallback fetch.
 * Schemas are the source of truth - types derived with z.infer<>.
 */
import { z } from "zod";

import type { TempoColor } from "../signals/index.js";

// =============================================================================
// Calendar API
// =============================================================================

/**
 * OAuth client-credentials token response.
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1).describe("Bearer token"),
  token_type: z.string().optional().describe("Token type, usually Bearer"),
  expires_in: z.number().optional().describe("Validity in seconds"),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;

/**
 * Cached bearer token.
 */
export type TokenCache = Readonly<{
  accessToken: string;
  expiresAt: number;
}>;

/**
 * One day of the tempo calendar. Dates carry their UTC offset.
 */
export const TempoCalendarEntrySchema = z.object({
  start_date: z.string().describe("Start of the colored day"),
  end_date: z.string().optional().describe("End of the colored day"),
  value: z.enum(["BLUE", "WHITE", "RED"]).describe("Day color"),
  updated_date: z.string().describe("Publication time of this entry"),
});

export type TempoCalendarEntry = z.infer<typeof TempoCalendarEntrySchema>;

export const TempoCalendarResponseSchema = z.object({
  tempo_like_calendars: z.object({
    start_date: z.string().optional(),
    end_date: z.string().optional(),
    values: z.array(TempoCalendarEntrySchema),
  }),
});

export type TempoCalendarResponse = z.infer<typeof TempoCalendarResponseSchema>;

/**
 * Calendar client settings.
 */
export type TempoClientConfig = Readonly<{
  clientId: string;
  clientSecret: string;
  tokenUrl: string;
  calendarUrl: string;
  timeoutMs: number;
}>;

// =============================================================================
// Fallback Schedule
// =============================================================================

/**
 * Local time window during which fetch attempts are made.
 */
export type FetchWindow = Readonly<{
  hour: number;
  minute: number;
  durationMinutes: number;
}>;

/**
 * Persistent scheduler state, one per meter stream.
 */
export type ScheduleState = Readonly<{
  /** Day-of-month of the last successful fetch, 0 = never */
  lastSuccessDay: number;
  /** Day-of-month of the last resolve call, 0 = never */
  lastSeenDay: number;
  /** Tomorrow's color, cleared at the start of each day */
  cachedColor: Exclude<TempoColor, "UNKNOWN"> | null;
}>;

export const INITIAL_SCHEDULE_STATE: ScheduleState = {
  lastSuccessDay: 0,
  lastSeenDay: 0,
  cachedColor: null,
};
