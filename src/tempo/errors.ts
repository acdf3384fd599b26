/**
 * Tempo Module - Error Types
 *
 * Every calendar failure is recoverable: the scheduler stays idle and
 * retries on a later eligible cycle.
 */

export type TempoError =
  | {
      readonly type: "AUTH_FAILED";
      readonly message: string;
      readonly statusCode?: number;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
      readonly responseData?: unknown;
    }
  | {
      readonly type: "NO_DATA";
      readonly message: string;
    }
  | {
      readonly type: "STALE_DATA";
      readonly message: string;
    };

/**
 * Create an AUTH_FAILED error.
 */
export function authFailed(message: string, statusCode?: number): TempoError {
  if (statusCode !== undefined) {
    return { type: "AUTH_FAILED", message, statusCode };
  }
  return { type: "AUTH_FAILED", message };
}

/**
 * Create a NETWORK_ERROR.
 */
export function networkError(message: string, cause?: Error): TempoError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

/**
 * Create an INVALID_RESPONSE error.
 */
export function invalidResponse(
  message: string,
  responseData?: unknown,
): TempoError {
  return { type: "INVALID_RESPONSE", message, responseData };
}

/**
 * Create a NO_DATA error.
 */
export function noData(message: string): TempoError {
  return { type: "NO_DATA", message };
}

/**
 * Create a STALE_DATA error.
 */
export function staleData(message: string): TempoError {
  return { type: "STALE_DATA", message };
}

/**
 * Format a TempoError for logging.
 */
export function formatTempoError(error: TempoError): string {
  switch (error.type) {
    case "AUTH_FAILED":
      return `Authentication failed: ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "NO_DATA":
      return `No data: ${error.message}`;
    case "STALE_DATA":
      return `Stale data: ${error.message}`;
  }
}
