/**
 * Record Module - Error Types
 *
 * Reasons a line is rejected before any signal is derived from it.
 */

export type RecordError =
  | {
      readonly type: "MALFORMED_LINE";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "NOT_A_FRAME";
      readonly message: string;
    }
  | {
      readonly type: "INVALID_FRAME";
      readonly message: string;
      readonly marker: unknown;
    };

/**
 * Create a MALFORMED_LINE error.
 */
export function malformedLine(message: string, cause?: Error): RecordError {
  if (cause) {
    return { type: "MALFORMED_LINE", message, cause };
  }
  return { type: "MALFORMED_LINE", message };
}

/**
 * Create a NOT_A_FRAME error.
 */
export function notAFrame(message: string): RecordError {
  return { type: "NOT_A_FRAME", message };
}

/**
 * Create an INVALID_FRAME error.
 */
export function invalidFrame(message: string, marker: unknown): RecordError {
  return { type: "INVALID_FRAME", message, marker };
}

/**
 * Format a RecordError for logging.
 */
export function formatRecordError(error: RecordError): string {
  switch (error.type) {
    case "MALFORMED_LINE":
      return `Malformed line: ${error.message}`;
    case "NOT_A_FRAME":
      return `Not a frame: ${error.message}`;
    case "INVALID_FRAME":
      return `Invalid frame: ${error.message}`;
  }
}
