/**
 * MQTT Module - Error Types
 *
 * A failed batch is reported, never queued: the next publishing cycle
 * sends fresh values instead.
 */

export type PublishError =
  | {
      readonly type: "NOT_CONNECTED";
      readonly message: string;
    }
  | {
      readonly type: "PUBLISH_FAILED";
      readonly message: string;
      readonly topics: ReadonlyArray<string>;
      readonly cause?: Error;
    };

/**
 * Create a NOT_CONNECTED error.
 */
export function notConnected(message: string): PublishError {
  return { type: "NOT_CONNECTED", message };
}

/**
 * Create a PUBLISH_FAILED error.
 */
export function publishFailed(
  message: string,
  topics: ReadonlyArray<string>,
  cause?: Error,
): PublishError {
  if (cause) {
    return { type: "PUBLISH_FAILED", message, topics, cause };
  }
  return { type: "PUBLISH_FAILED", message, topics };
}

/**
 * Format a PublishError for logging.
 */
export function formatPublishError(error: PublishError): string {
  switch (error.type) {
    case "NOT_CONNECTED":
      return `Not connected: ${error.message}`;
    case "PUBLISH_FAILED":
      return `Publish failed: ${error.message}`;
  }
}
