/**
 * Signals Module - Public API
 */

// Types
export type {
  DerivedSignals,
  ExtractOptions,
  ExtractedSignals,
  MessageChange,
  PeakOffPeak,
  SignalFieldCodes,
  TempoColor,
} from "./schema.js";

export { TEMPO_COLORS, TempoColorSchema } from "./schema.js";

// Pure transformations
export {
  combineLoadShed,
  DAY_COLOR_OFFSET,
  decodeTempoColor,
  detectMessageChange,
  extractSignals,
  isHotWaterAllowed,
  NEXT_DAY_COLOR_OFFSET,
  readStatusRegister,
  toPeakOffPeak,
} from "./transform.js";
