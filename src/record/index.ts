/**
 * Record Module - Public API
 */

// Types
export type { FieldValue, TelemetryRecord } from "./schema.js";
export type { RecordError } from "./errors.js";

// Error utilities
export { formatRecordError } from "./errors.js";

// Pure transformations
export {
  decodeRecord,
  field,
  intField,
  isTruthyMarker,
  textField,
} from "./transform.js";
