/**
 * Tempo Service Integration Tests
 *
 * Tests the calendar client with a mocked fetch.
 */
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";

// Mock logger to reduce noise in tests
vi.mock("../../logger.js", () => ({
  createLogger: () => ({
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
  }),
  logOperationStart: vi.fn(),
  logOperationComplete: vi.fn(),
  logOperationFailed: vi.fn(),
}));

// Import after mocks
import type { TempoClientConfig } from "../schema.js";
import { clearTokenCache, fetchTempoCalendar } from "../service.js";

const CLIENT_CONFIG: TempoClientConfig = {
  clientId: "test-id",
  clientSecret: "test-secret",
  tokenUrl: "https://calendar.test/token/oauth/",
  calendarUrl: "https://calendar.test/tempo_like_calendars",
  timeoutMs: 5000,
};

const ENTRY = {
  start_date: "2024-01-16T00:00:00+01:00",
  end_date: "2024-01-17T00:00:00+01:00",
  value: "WHITE",
  updated_date: "2024-01-15T10:20:00+01:00",
};

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? "OK" : "Error",
    json: () => Promise.resolve(body),
  };
}

const TOKEN_RESPONSE = jsonResponse({
  access_token: "test-token",
  token_type: "Bearer",
  expires_in: 7200,
});

const CALENDAR_RESPONSE = jsonResponse({
  tempo_like_calendars: {
    start_date: ENTRY.start_date,
    end_date: ENTRY.end_date,
    values: [ENTRY],
  },
});

describe("Tempo Service", () => {
  beforeEach(() => {
    vi.clearAllMocks();
    clearTokenCache();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("fetchTempoCalendar", () => {
    test("authenticates with client credentials then fetches the calendar", async () => {
      // Arrange
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockResolvedValueOnce(TOKEN_RESPONSE)
          .mockResolvedValueOnce(CALENDAR_RESPONSE),
      );

      // Act
      const result = await fetchTempoCalendar(CLIENT_CONFIG);

      // Assert
      expect(result._unsafeUnwrap()).toEqual(ENTRY);
      expect(fetch).toHaveBeenNthCalledWith(
        1,
        "https://calendar.test/token/oauth/",
        expect.objectContaining({
          method: "POST",
          body: "grant_type=client_credentials",
          headers: expect.objectContaining({
            Authorization: `Basic ${Buffer.from("test-id:test-secret").toString("base64")}`,
          }),
        }),
      );
      expect(fetch).toHaveBeenNthCalledWith(
        2,
        "https://calendar.test/tempo_like_calendars",
        expect.objectContaining({
          method: "GET",
          headers: expect.objectContaining({
            Authorization: "Bearer test-token",
          }),
        }),
      );
    });

    test("bounds every request with a timeout signal", async () => {
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockResolvedValueOnce(TOKEN_RESPONSE)
          .mockResolvedValueOnce(CALENDAR_RESPONSE),
      );

      await fetchTempoCalendar(CLIENT_CONFIG);

      for (const call of vi.mocked(fetch).mock.calls) {
        expect(call[1]?.signal).toBeInstanceOf(AbortSignal);
      }
    });

    test("reuses a cached token", async () => {
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockResolvedValueOnce(TOKEN_RESPONSE)
          .mockResolvedValueOnce(CALENDAR_RESPONSE)
          .mockResolvedValueOnce(CALENDAR_RESPONSE),
      );

      await fetchTempoCalendar(CLIENT_CONFIG);
      const second = await fetchTempoCalendar(CLIENT_CONFIG);

      expect(second.isOk()).toBe(true);
      expect(fetch).toHaveBeenCalledTimes(3);
      expect(vi.mocked(fetch).mock.calls[2]?.[0]).toBe(
        "https://calendar.test/tempo_like_calendars",
      );
    });

    test("returns AUTH_FAILED when the token request is refused", async () => {
      vi.stubGlobal("fetch", vi.fn().mockResolvedValue(jsonResponse({}, 401)));

      const result = await fetchTempoCalendar(CLIENT_CONFIG);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "AUTH_FAILED",
        message: "HTTP 401: Error",
        statusCode: 401,
      });
      expect(fetch).toHaveBeenCalledTimes(1);
    });

    test("drops the cached token when the calendar refuses it", async () => {
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockResolvedValueOnce(TOKEN_RESPONSE)
          .mockResolvedValueOnce(jsonResponse({}, 401))
          .mockResolvedValueOnce(TOKEN_RESPONSE)
          .mockResolvedValueOnce(CALENDAR_RESPONSE),
      );

      const first = await fetchTempoCalendar(CLIENT_CONFIG);
      const second = await fetchTempoCalendar(CLIENT_CONFIG);

      expect(first._unsafeUnwrapErr().type).toBe("AUTH_FAILED");
      expect(second.isOk()).toBe(true);
      expect(vi.mocked(fetch).mock.calls[2]?.[0]).toBe(
        "https://calendar.test/token/oauth/",
      );
    });

    test("returns INVALID_RESPONSE for an unexpected calendar payload", async () => {
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockResolvedValueOnce(TOKEN_RESPONSE)
          .mockResolvedValueOnce(
            jsonResponse({ tempo_like_calendars: { values: [{ value: "GREEN" }] } }),
          ),
      );

      const result = await fetchTempoCalendar(CLIENT_CONFIG);

      expect(result._unsafeUnwrapErr().type).toBe("INVALID_RESPONSE");
    });

    test("returns NO_DATA when the calendar is empty", async () => {
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockResolvedValueOnce(TOKEN_RESPONSE)
          .mockResolvedValueOnce(jsonResponse({ tempo_like_calendars: { values: [] } })),
      );

      const result = await fetchTempoCalendar(CLIENT_CONFIG);

      expect(result._unsafeUnwrapErr().type).toBe("NO_DATA");
    });

    test("returns NETWORK_ERROR for a server error", async () => {
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockResolvedValueOnce(TOKEN_RESPONSE)
          .mockResolvedValueOnce(jsonResponse({}, 503)),
      );

      const result = await fetchTempoCalendar(CLIENT_CONFIG);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "NETWORK_ERROR",
        message: "HTTP 503: Error",
      });
    });

    test("returns NETWORK_ERROR when fetch throws", async () => {
      vi.stubGlobal(
        "fetch",
        vi.fn().mockRejectedValue(new Error("getaddrinfo ENOTFOUND calendar.test")),
      );

      const result = await fetchTempoCalendar(CLIENT_CONFIG);

      expect(result._unsafeUnwrapErr().type).toBe("NETWORK_ERROR");
      expect(result._unsafeUnwrapErr().message).toBe(
        "Failed to fetch access token",
      );
    });

    test("reports a timeout", async () => {
      const timeout = new Error("The operation was aborted due to timeout");
      timeout.name = "TimeoutError";
      vi.stubGlobal(
        "fetch",
        vi
          .fn()
          .mockResolvedValueOnce(TOKEN_RESPONSE)
          .mockRejectedValueOnce(timeout),
      );

      const result = await fetchTempoCalendar(CLIENT_CONFIG);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "NETWORK_ERROR",
        message: "Request timed out",
        cause: timeout,
      });
    });
  });
});
