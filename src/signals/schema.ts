/**
 * Signals Module - Schemas and Types
 *
 * Control signals derived from one telemetry record.
 */
import { z } from "zod";

// =============================================================================
// Enumerations
// =============================================================================

/**
 * Tempo day colors, ordered by their 2-bit register encoding.
 */
export const TEMPO_COLORS = ["UNKNOWN", "BLUE", "WHITE", "RED"] as const;

export const TempoColorSchema = z.enum(TEMPO_COLORS);

export type TempoColor = z.infer<typeof TempoColorSchema>;

export type PeakOffPeak = "PEAK" | "OFFPEAK" | "UNKNOWN";

// =============================================================================
// Extraction
// =============================================================================

/**
 * Field codes read by the extractor.
 */
export type SignalFieldCodes = Readonly<{
  power: string;
  tariff: string;
  relays: string;
  status: string;
}>;

export type ExtractOptions = Readonly<{
  /** Tariff index that forces load shedding, or null when disabled */
  redPeakTariffIndex: number | null;
}>;

/**
 * Stateless part of the derived signals, before the filter is combined in.
 */
export type ExtractedSignals = Readonly<{
  peakOffPeak: PeakOffPeak;
  /** Contractual override: shed regardless of measured power */
  overrideShed: boolean;
  hotWaterAllowed: boolean;
  dayColor: TempoColor;
  nextDayColor: TempoColor;
  power: number | null;
}>;

/**
 * Everything published for one sampling instant.
 * Null means unknown: the value is left out rather than guessed.
 */
export type DerivedSignals = Readonly<{
  loadShed: boolean | null;
  hotWaterAllowed: boolean;
  peakOffPeak: PeakOffPeak;
  dayColor: TempoColor;
  nextDayColor: TempoColor;
  power: number | null;
}>;

// =============================================================================
// Meter Message
// =============================================================================

export type MessageChange = Readonly<{
  lastMessage: string | null;
  /** The new message, when it differs from the previous one */
  changed: string | null;
}>;
