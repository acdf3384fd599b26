/**
 * MQTT Module - Pure Transformations
 *
 * Turns one set of derived signals into the batch of broker messages.
 */
import type { DerivedSignals } from "../signals/index.js";
import type { SignalMessage, SignalTopics } from "./schema.js";

/**
 * Encode a boolean signal.
 */
export function formatFlag(value: boolean): string {
  return value ? "1" : "0";
}

/**
 * Build the publication batch for one sampling instant.
 *
 * Unknown (null) signals are left out of the batch.
 *
 * @param signals - Derived signals of this cycle
 * @param topics - Topic of each signal
 * @returns Messages in a fixed topic order
 *
 * @example
 * buildSignalMessages({ loadShed: true, power: null, ... }, topics)
 * // [{ topic: "sensors/switch/delest", payload: "1" }, ...]
 */
export function buildSignalMessages(
  signals: DerivedSignals,
  topics: SignalTopics,
): ReadonlyArray<SignalMessage> {
  const messages: SignalMessage[] = [];

  if (signals.loadShed !== null) {
    messages.push({ topic: topics.loadShed, payload: formatFlag(signals.loadShed) });
  }

  messages.push(
    { topic: topics.hotWater, payload: formatFlag(signals.hotWaterAllowed) },
    { topic: topics.peak, payload: signals.peakOffPeak },
    { topic: topics.dayColor, payload: signals.dayColor },
    { topic: topics.nextDayColor, payload: signals.nextDayColor },
  );

  if (signals.power !== null) {
    messages.push({ topic: topics.power, payload: String(signals.power) });
  }

  return messages;
}
