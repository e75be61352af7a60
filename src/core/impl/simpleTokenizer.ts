import type { Token } from "../types.js";
import type { TokenizeOptions, Tokenizer } from "../tokenizer.js";

// letters, combining marks (so "jícama" stays whole) and digits
const WORD_RUN = /[\p{L}\p{M}\p{N}]+/gu;

/**
 * Unicode word tokenizer:
 * - splits on anything that is not a letter, mark or digit
 * - optionally lowercases
 * - yields token positions (token index) and UTF-16 offsets
 */
export class SimpleTokenizer implements Tokenizer {
  *tokenize(text: string, options?: TokenizeOptions): Iterable<Token> {
    const normalizeCase = options?.normalizeCase ?? true;

    let position = 0;
    for (const m of text.matchAll(WORD_RUN)) {
      const start = m.index ?? 0;
      const raw = m[0] ?? "";
      const term = normalizeCase ? raw.toLowerCase() : raw;

      yield { term, position, startOffset: start, endOffset: start + raw.length };
      position++;
    }
  }
}

/** Convenience: the terms of `text` as an array. */
export function tokenizeToTerms(tokenizer: Tokenizer, text: string, options?: TokenizeOptions): string[] {
  const out: string[] = [];
  for (const tok of tokenizer.tokenize(text, options)) out.push(tok.term);
  return out;
}
