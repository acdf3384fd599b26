/**
 * Relay Module - Error Types
 */

export type RelayError = {
  readonly type: "SEND_FAILED";
  readonly message: string;
  readonly cause?: Error;
};

/**
 * Create a SEND_FAILED error.
 */
export function sendFailed(message: string, cause?: Error): RelayError {
  if (cause) {
    return { type: "SEND_FAILED", message, cause };
  }
  return { type: "SEND_FAILED", message };
}

/**
 * Format a RelayError for logging.
 */
export function formatRelayError(error: RelayError): string {
  return `Relay send failed: ${error.message}`;
}
