/**
 * Input Module - Public API
 */

export type { LineReader } from "./service.js";

export { openLineReader } from "./service.js";
