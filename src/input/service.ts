/**
 * Input Module - Service Layer
 *
 * Splits a byte stream (normally stdin) into lines, one decoded frame each.
 */
import { createInterface } from "node:readline";

import { createLogger } from "../logger.js";

const log = createLogger("input");

export type LineReader = Readonly<{
  /** Lines without their terminator, in arrival order */
  lines: AsyncIterable<string>;
  /** Stop reading; iteration ends after the current line */
  close: () => void;
}>;

/**
 * Read lines from a stream. Both LF and CRLF terminate a line.
 */
export function openLineReader(input: NodeJS.ReadableStream): LineReader {
  const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });

  rl.on("close", () => {
    log.info("Input closed");
  });

  return {
    lines: rl,
    close: () => rl.close(),
  };
}
