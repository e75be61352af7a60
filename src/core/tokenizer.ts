import type { Token } from "./types.js";

export interface TokenizeOptions {
  /** If true, normalize case (lowercase). Defaults to true. */
  normalizeCase?: boolean;
}

/**
 * Turns text into a stream of tokens.
 *
 * Contract notes:
 * - must be deterministic for given input+options
 * - never yields an empty term
 * - returned iterables are restartable per call (call tokenize again to re-read)
 */
export interface Tokenizer {
  tokenize(text: string, options?: TokenizeOptions): Iterable<Token>;
}
