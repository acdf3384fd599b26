/**
 * Relay Module - Public API
 */

export type { LineRelay, RelayDestination } from "./schema.js";
export type { RelayError } from "./errors.js";

export { formatRelayError } from "./errors.js";

export { createUdpRelay } from "./service.js";
