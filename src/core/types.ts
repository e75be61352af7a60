/** Shared core types used by module contracts. */

export type Label = string;
export type Term = string;

/** A token produced by a tokenizer. */
export interface Token {
  term: Term;
  /** 0-based position within the source text (token index, not byte offset). */
  position: number;
  /** UTF-16 offsets into the source text. */
  startOffset: number;
  endOffset: number;
}

/** A training example. */
export interface LabeledDocument {
  text: string;
  label: Label;
}

export type ModelPhase = "untrained" | "trained";

export interface LabelScore {
  label: Label;
  /** log-prior plus summed log-likelihoods of the known query terms */
  logScore: number;
  /** posterior normalized across all labels */
  probability: number;
}
