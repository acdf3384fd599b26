/**
 * Record Module - Pure Transformations
 *
 * Decoding of one input line into a validated record, and typed
 * field lookup. No side effects, no I/O.
 */
import { type Result, err, ok } from "neverthrow";

import type { RecordError } from "./errors.js";
import { invalidFrame, malformedLine, notAFrame } from "./errors.js";
import type { FieldValue, TelemetryRecord } from "./schema.js";
import { RawFieldValueSchema, RawFrameSchema } from "./schema.js";

// =============================================================================
// Decoding
// =============================================================================

/**
 * Decode one line into a validated record.
 *
 * The line must hold a JSON object whose validity marker is truthy.
 * Entries that are not { data, horodate? } objects are left out: frames
 * are sparse and a missing field is not an error.
 *
 * @param line - Raw input line
 * @param validityCode - Key of the validity marker (e.g. "_tvalide")
 * @returns The record, or the reason it was rejected
 */
export function decodeRecord(
  line: string,
  validityCode: string,
): Result<TelemetryRecord, RecordError> {
  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(malformedLine("Line is not valid JSON", cause));
  }

  const parsed = RawFrameSchema.safeParse(json);
  if (!parsed.success) {
    return err(notAFrame("Line does not hold a JSON object"));
  }

  const frame = parsed.data;
  const marker = frame[validityCode];
  if (!isTruthyMarker(marker)) {
    return err(invalidFrame(`Validity marker "${validityCode}" not set`, marker));
  }

  const fields: Record<string, FieldValue> = {};
  for (const [code, value] of Object.entries(frame)) {
    if (code === validityCode) continue;

    const entry = RawFieldValueSchema.safeParse(value);
    if (!entry.success) continue;

    fields[code] = Object.freeze({
      data: entry.data.data,
      timestamp: entry.data.horodate ?? null,
    });
  }

  return ok(Object.freeze({ valid: true, fields: Object.freeze(fields) }));
}

/**
 * Whether a validity marker value means "valid frame".
 */
export function isTruthyMarker(marker: unknown): boolean {
  if (typeof marker === "boolean") return marker;
  if (typeof marker === "number") return marker !== 0 && !Number.isNaN(marker);
  if (typeof marker === "string") return marker !== "" && marker !== "0";
  return false;
}

// =============================================================================
// Field Access
// =============================================================================

/**
 * Look up a field by code.
 *
 * @returns The field, or null when this frame does not carry it
 */
export function field(record: TelemetryRecord, code: string): FieldValue | null {
  return Object.hasOwn(record.fields, code) ? (record.fields[code] ?? null) : null;
}

/**
 * Look up an integer field.
 * Decimal digit strings are accepted; anything else reads as absent.
 */
export function intField(record: TelemetryRecord, code: string): number | null {
  const value = field(record, code);
  if (!value) return null;

  if (typeof value.data === "number") {
    return Number.isInteger(value.data) ? value.data : null;
  }

  const trimmed = value.data.trim();
  return /^-?\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : null;
}

/**
 * Look up a text field.
 */
export function textField(record: TelemetryRecord, code: string): string | null {
  const value = field(record, code);
  if (!value) return null;

  return typeof value.data === "string" ? value.data : String(value.data);
}
