/**
 * Pipeline Module - Service Layer
 *
 * Per-record orchestration: relay, validate, filter, extract, throttle,
 * publish. Records are handled strictly one at a time so the filter sees
 * readings in arrival order.
 */
import { createLogger } from "../logger.js";
import { INITIAL_FILTER_STATE, stepFilter } from "../hysteresis/index.js";
import { buildSignalMessages, formatPublishError } from "../mqtt/index.js";
import { decodeRecord, formatRecordError } from "../record/index.js";
import { formatRelayError } from "../relay/index.js";
import type { DerivedSignals } from "../signals/index.js";
import {
  combineLoadShed,
  detectMessageChange,
  extractSignals,
} from "../signals/index.js";
import { INITIAL_THROTTLE_STATE, tickThrottle } from "../throttle/index.js";
import type {
  Pipeline,
  PipelineDeps,
  PipelineOutcome,
  PipelineState,
} from "./schema.js";

const log = createLogger("pipeline");
const meterLog = createLogger("meter");

export const INITIAL_PIPELINE_STATE: PipelineState = {
  filter: INITIAL_FILTER_STATE,
  throttle: INITIAL_THROTTLE_STATE,
  lastMessage: null,
};

// =============================================================================
// Pipeline
// =============================================================================

/**
 * Create a pipeline owning its own filter, throttle and message state.
 * Use one instance per meter stream.
 */
export function createPipeline(deps: PipelineDeps): Pipeline {
  const { options } = deps;
  let state: PipelineState = INITIAL_PIPELINE_STATE;

  const relayLine = async (line: string): Promise<void> => {
    if (!deps.relay) return;

    // readline strips the terminator; the observer gets the line as read
    const result = await deps.relay.send(`${line}\n`);
    if (result.isErr()) {
      log.warn(formatRelayError(result.error));
    }
  };

  const derive = async (line: string, now: Date): Promise<PipelineOutcome> => {
    const decoded = decodeRecord(line, options.codes.validity);
    if (decoded.isErr()) {
      log.debug(
        { reason: decoded.error.type },
        `Record dropped: ${formatRecordError(decoded.error)}`,
      );
      return { status: "rejected", error: decoded.error };
    }

    const record = decoded.value;

    const message = detectMessageChange(
      state.lastMessage,
      record,
      options.codes.message,
    );
    if (message.changed !== null) {
      meterLog.info({ message: message.changed }, "Meter message");
    }

    const extracted = extractSignals(record, options.codes, options.extract);
    const filtered = stepFilter(state.filter, extracted.power, options.filter);
    const tick = tickThrottle(state.throttle, options.skipCount);

    state = {
      filter: filtered.state,
      throttle: tick.state,
      lastMessage: message.lastMessage,
    };

    const localSignals: DerivedSignals = {
      loadShed: combineLoadShed(extracted.overrideShed, filtered.output),
      hotWaterAllowed: extracted.hotWaterAllowed,
      peakOffPeak: extracted.peakOffPeak,
      dayColor: extracted.dayColor,
      nextDayColor: extracted.nextDayColor,
      power: extracted.power,
    };

    if (!tick.publish) {
      return { status: "throttled", signals: localSignals };
    }

    const signals: DerivedSignals = deps.scheduler
      ? {
          ...localSignals,
          nextDayColor: deps.scheduler.resolve(now, localSignals.nextDayColor),
        }
      : localSignals;

    const result = await deps.publish(buildSignalMessages(signals, options.topics));
    if (result.isErr()) {
      log.warn(
        { errorType: result.error.type },
        `Signal batch not published: ${formatPublishError(result.error)}`,
      );
    } else {
      log.debug({ signals }, "Signals published");
    }

    return { status: "published", signals, result };
  };

  return {
    async processLine(line, now) {
      const [, outcome] = await Promise.all([relayLine(line), derive(line, now)]);
      return outcome;
    },

    getState() {
      return state;
    },

    settle() {
      return deps.scheduler?.settle() ?? Promise.resolve();
    },
  };
}

// =============================================================================
// Run Loop
// =============================================================================

/**
 * Feed lines through the pipeline in arrival order until the input ends.
 *
 * A line that throws is logged and skipped; ingestion continues.
 *
 * @param lines - Input lines
 * @param pipeline - Pipeline of this stream
 * @param clock - Time source for each line
 * @returns Number of lines read
 */
export async function runPipeline(
  lines: AsyncIterable<string>,
  pipeline: Pipeline,
  clock: () => Date = () => new Date(),
): Promise<number> {
  let count = 0;

  for await (const line of lines) {
    count++;
    try {
      await pipeline.processLine(line, clock());
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      log.error({ error: message, line: count }, "Error processing line");
    }
  }

  return count;
}
