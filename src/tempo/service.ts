/**
 * Tempo Module - Service Layer
 *
 * HTTPS calls to the tempo calendar service with client-credentials
 * authentication. Every request is bounded by the configured timeout.
 * Uses Result types for explicit error handling; nothing here throws.
 */
import { type Result, err, ok } from "neverthrow";

import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import type { TempoError } from "./errors.js";
import {
  authFailed,
  formatTempoError,
  invalidResponse,
  networkError,
} from "./errors.js";
import type {
  TempoCalendarEntry,
  TempoClientConfig,
  TokenCache,
} from "./schema.js";
import { TempoCalendarResponseSchema, TokenResponseSchema } from "./schema.js";
import {
  DEFAULT_TOKEN_LIFETIME_S,
  buildBasicAuthHeader,
  calculateTokenExpiry,
  isTokenValid,
  selectLatestEntry,
} from "./transform.js";

const log = createLogger("tempo");

// =============================================================================
// Token Cache (Module-level state)
// =============================================================================

let tokenCache: TokenCache | null = null;

/**
 * Clear the token cache (useful for testing or forced refresh).
 */
export function clearTokenCache(): void {
  tokenCache = null;
  log.debug("Token cache cleared");
}

// =============================================================================
// Token Management
// =============================================================================

/**
 * Request a new access token with the client credentials.
 */
async function fetchAccessToken(
  clientConfig: TempoClientConfig,
): Promise<Result<TokenCache, TempoError>> {
  const now = Date.now();

  log.debug({ url: clientConfig.tokenUrl }, "Fetching calendar access token...");

  try {
    const response = await fetch(clientConfig.tokenUrl, {
      method: "POST",
      headers: {
        Accept: "application/json",
        Authorization: buildBasicAuthHeader(
          clientConfig.clientId,
          clientConfig.clientSecret,
        ),
        "Content-Type": "application/x-www-form-urlencoded",
      },
      body: "grant_type=client_credentials",
      signal: AbortSignal.timeout(clientConfig.timeoutMs),
    });

    if (!response.ok) {
      return err(
        authFailed(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
        ),
      );
    }

    const data: unknown = await response.json();
    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      return err(invalidResponse("Invalid token response format", data));
    }

    const expiresIn = parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_S;
    return ok({
      accessToken: parsed.data.access_token,
      expiresAt: calculateTokenExpiry(expiresIn, now),
    });
  } catch (error) {
    return err(toNetworkError(error, "Failed to fetch access token"));
  }
}

/**
 * Get a valid access token, fetching a new one if needed.
 */
async function ensureValidToken(
  clientConfig: TempoClientConfig,
): Promise<Result<string, TempoError>> {
  if (tokenCache && isTokenValid(tokenCache.expiresAt, Date.now())) {
    log.debug("Using cached access token");
    return ok(tokenCache.accessToken);
  }

  const result = await fetchAccessToken(clientConfig);
  if (result.isErr()) {
    return err(result.error);
  }

  tokenCache = result.value;
  return ok(tokenCache.accessToken);
}

// =============================================================================
// Calendar
// =============================================================================

/**
 * Fetch the most recent tempo calendar entry (normally tomorrow's).
 *
 * Freshness is not checked here; see validateCalendarEntry.
 *
 * @param clientConfig - Endpoints, credentials and timeout
 * @returns Result with the calendar entry or error
 */
export async function fetchTempoCalendar(
  clientConfig: TempoClientConfig,
): Promise<Result<TempoCalendarEntry, TempoError>> {
  const startTime = Date.now();
  logOperationStart(log, "fetchTempoCalendar");

  const result = await requestCalendar(clientConfig);

  if (result.isOk()) {
    logOperationComplete(log, "fetchTempoCalendar", startTime, {
      color: result.value.value,
      startDate: result.value.start_date,
    });
  } else {
    logOperationFailed(log, "fetchTempoCalendar", formatTempoError(result.error));
  }

  return result;
}

async function requestCalendar(
  clientConfig: TempoClientConfig,
): Promise<Result<TempoCalendarEntry, TempoError>> {
  const tokenResult = await ensureValidToken(clientConfig);
  if (tokenResult.isErr()) {
    return err(tokenResult.error);
  }

  try {
    const response = await fetch(clientConfig.calendarUrl, {
      method: "GET",
      headers: {
        Accept: "application/json",
        Authorization: `Bearer ${tokenResult.value}`,
      },
      signal: AbortSignal.timeout(clientConfig.timeoutMs),
    });

    if (response.status === 401 || response.status === 403) {
      clearTokenCache();
      return err(
        authFailed(
          `HTTP ${response.status}: ${response.statusText}`,
          response.status,
        ),
      );
    }

    if (!response.ok) {
      return err(
        networkError(`HTTP ${response.status}: ${response.statusText}`),
      );
    }

    const data: unknown = await response.json();
    const parsed = TempoCalendarResponseSchema.safeParse(data);
    if (!parsed.success) {
      return err(invalidResponse("Invalid calendar response format", data));
    }

    return selectLatestEntry(parsed.data);
  } catch (error) {
    return err(toNetworkError(error, "Failed to fetch tempo calendar"));
  }
}

function toNetworkError(error: unknown, message: string): TempoError {
  const cause = error instanceof Error ? error : new Error(String(error));

  if (cause.name === "TimeoutError" || cause.name === "AbortError") {
    return networkError("Request timed out", cause);
  }

  return networkError(message, cause);
}
