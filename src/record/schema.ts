/**
 * Record Module - Schemas and Types
 *
 * One decoded telemetry frame: a mapping from field label to
 * { data, horodate } plus a frame validity marker.
 */
import { z } from "zod";

// =============================================================================
// Field Value
// =============================================================================

/**
 * Raw field entry as emitted by the frame decoder.
 * Extra keys (desc, unit, id) are tolerated and dropped.
 */
export const RawFieldValueSchema = z.object({
  data: z.union([z.number(), z.string()]).describe("Field payload"),
  horodate: z.string().optional().describe("Field timestamp, when present"),
});

export type RawFieldValue = z.infer<typeof RawFieldValueSchema>;

/**
 * A field of a decoded record.
 */
export type FieldValue = Readonly<{
  data: number | string;
  timestamp: string | null;
}>;

// =============================================================================
// Record
// =============================================================================

/**
 * Top-level shape of a decoded line: any JSON object.
 */
export const RawFrameSchema = z.record(z.string(), z.unknown());

export type RawFrame = z.infer<typeof RawFrameSchema>;

/**
 * A validated telemetry record. Never mutated after decode.
 */
export type TelemetryRecord = Readonly<{
  valid: true;
  fields: Readonly<Record<string, FieldValue>>;
}>;
