/**
 * Pipeline Module - Schemas and Types
 *
 * Dependencies, state and per-line outcome of the record pipeline.
 */
import type { Result } from "neverthrow";

import type { FilterOptions, FilterState } from "../hysteresis/index.js";
import type { PublishError, SignalMessage, SignalTopics } from "../mqtt/index.js";
import type { RecordError } from "../record/index.js";
import type { LineRelay } from "../relay/index.js";
import type {
  DerivedSignals,
  ExtractOptions,
  SignalFieldCodes,
} from "../signals/index.js";
import type { TempoScheduler } from "../tempo/index.js";
import type { ThrottleState } from "../throttle/index.js";

// =============================================================================
// Configuration
// =============================================================================

export type FieldCodes = SignalFieldCodes &
  Readonly<{
    validity: string;
    message: string;
  }>;

export type PipelineOptions = Readonly<{
  codes: FieldCodes;
  filter: FilterOptions;
  extract: ExtractOptions;
  /** Valid records skipped between two publications */
  skipCount: number;
  topics: SignalTopics;
}>;

/**
 * Sends one batch to the broker.
 */
export type SignalPublisher = (
  messages: ReadonlyArray<SignalMessage>,
) => Promise<Result<void, PublishError>>;

export type PipelineDeps = Readonly<{
  options: PipelineOptions;
  publish: SignalPublisher;
  /** Null when relaying is disabled */
  relay: LineRelay | null;
  /** Null when the calendar fallback is disabled */
  scheduler: Pick<TempoScheduler, "resolve" | "settle"> | null;
}>;

// =============================================================================
// State
// =============================================================================

/**
 * State owned by one pipeline instance (one meter stream).
 */
export type PipelineState = Readonly<{
  filter: FilterState;
  throttle: ThrottleState;
  lastMessage: string | null;
}>;

// =============================================================================
// Outcome
// =============================================================================

export type PipelineOutcome =
  | {
      readonly status: "rejected";
      readonly error: RecordError;
    }
  | {
      readonly status: "throttled";
      readonly signals: DerivedSignals;
    }
  | {
      readonly status: "published";
      readonly signals: DerivedSignals;
      readonly result: Result<void, PublishError>;
    };

export type Pipeline = Readonly<{
  /**
   * Relay and process one line. Resolves once both the relay and the
   * derivation (including any publication) are done.
   */
  processLine: (line: string, now: Date) => Promise<PipelineOutcome>;
  getState: () => PipelineState;
  /** Resolves once no background calendar fetch is in flight */
  settle: () => Promise<void>;
}>;
