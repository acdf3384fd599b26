/**
 * Signals Module - Pure Transformations
 *
 * Tariff, relay and day-color signals read from single fields and
 * bit ranges of a record. No state, no I/O.
 */
import type { TelemetryRecord } from "../record/index.js";
import { field, intField, textField } from "../record/index.js";
import type {
  ExtractOptions,
  ExtractedSignals,
  MessageChange,
  PeakOffPeak,
  SignalFieldCodes,
  TempoColor,
} from "./schema.js";
import { TEMPO_COLORS } from "./schema.js";

/** Bit offset of today's color in the status register */
export const DAY_COLOR_OFFSET = 24;

/** Bit offset of tomorrow's color in the status register */
export const NEXT_DAY_COLOR_OFFSET = 26;

// =============================================================================
// Tariff Period
// =============================================================================

/**
 * Odd tariff indexes are off-peak, even ones peak.
 */
export function toPeakOffPeak(tariffIndex: number | null): PeakOffPeak {
  if (tariffIndex === null) return "UNKNOWN";
  return Math.abs(tariffIndex) % 2 === 1 ? "OFFPEAK" : "PEAK";
}

// =============================================================================
// Relays
// =============================================================================

/**
 * Hot water is allowed when relay 1 (bit 0) is closed.
 * An absent bitmask fails closed.
 */
export function isHotWaterAllowed(relayMask: number | null): boolean {
  if (relayMask === null) return false;
  return (relayMask & 0x01) === 0x01;
}

// =============================================================================
// Status Register
// =============================================================================

/**
 * Read the 32-bit status register as an unsigned integer.
 *
 * Numeric data may have been printed as a signed 32-bit value; string
 * data is read as hexadecimal.
 *
 * @returns The register, or null when absent or unreadable
 */
export function readStatusRegister(
  record: TelemetryRecord,
  code: string,
): number | null {
  const value = field(record, code);
  if (!value) return null;

  if (typeof value.data === "number") {
    return Number.isInteger(value.data) ? value.data >>> 0 : null;
  }

  const hex = value.data.trim();
  if (!/^[0-9a-fA-F]{1,8}$/.test(hex)) return null;

  return Number.parseInt(hex, 16) >>> 0;
}

/**
 * Decode a 2-bit color sub-field of the status register.
 *
 * @example
 * decodeTempoColor(0x06000000, 24) // "WHITE"  (bits 24-25 = 10)
 */
export function decodeTempoColor(
  register: number | null,
  offset: number,
): TempoColor {
  if (register === null) return "UNKNOWN";
  return TEMPO_COLORS[(register >>> offset) & 0x03] ?? "UNKNOWN";
}

// =============================================================================
// Extraction
// =============================================================================

/**
 * Derive the stateless signals of one record.
 *
 * @param record - Validated record
 * @param codes - Field codes to read
 * @param options - Override settings
 */
export function extractSignals(
  record: TelemetryRecord,
  codes: SignalFieldCodes,
  options: ExtractOptions,
): ExtractedSignals {
  const tariffIndex = intField(record, codes.tariff);
  const register = readStatusRegister(record, codes.status);

  return {
    peakOffPeak: toPeakOffPeak(tariffIndex),
    overrideShed:
      options.redPeakTariffIndex !== null &&
      tariffIndex === options.redPeakTariffIndex,
    hotWaterAllowed: isHotWaterAllowed(intField(record, codes.relays)),
    dayColor: decodeTempoColor(register, DAY_COLOR_OFFSET),
    nextDayColor: decodeTempoColor(register, NEXT_DAY_COLOR_OFFSET),
    power: intField(record, codes.power),
  };
}

/**
 * Combine the tariff override with the filter output.
 *
 * The override wins. Without it, an unknown filter output stays unknown.
 */
export function combineLoadShed(
  overrideShed: boolean,
  filterOutput: boolean | null,
): boolean | null {
  if (overrideShed) return true;
  return filterOutput;
}

// =============================================================================
// Meter Message
// =============================================================================

/**
 * Track the meter's free-text message.
 *
 * @param lastMessage - Previously seen message
 * @param record - Current record
 * @param code - Message field code
 * @returns The message to remember and, if it changed, the new message
 */
export function detectMessageChange(
  lastMessage: string | null,
  record: TelemetryRecord,
  code: string,
): MessageChange {
  const message = textField(record, code);

  if (message === null || message === lastMessage) {
    return { lastMessage, changed: null };
  }

  return { lastMessage: message, changed: message };
}
