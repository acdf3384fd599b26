/**
 * Relay Module - Schemas and Types
 */
import type { Result } from "neverthrow";

import type { RelayError } from "./errors.js";

/**
 * Fixed destination of relayed lines.
 */
export type RelayDestination = Readonly<{
  host: string;
  port: number;
}>;

/**
 * Forwards raw lines to a passive observer.
 */
export type LineRelay = Readonly<{
  send: (line: string) => Promise<Result<void, RelayError>>;
  close: () => Promise<void>;
}>;
