/**
 * MQTT Module - Public API
 */

// Types
export type { MqttClientOptions, SignalMessage, SignalTopics } from "./schema.js";
export type { PublishError } from "./errors.js";
export type { MqttEventHandlers } from "./service.js";

// Error utilities
export { formatPublishError } from "./errors.js";

// Service functions
export {
  disconnectMqttClient,
  initializeMqttClient,
  isConnected,
  publishBatch,
} from "./service.js";

// Pure transformations
export { buildSignalMessages, formatFlag } from "./transform.js";
