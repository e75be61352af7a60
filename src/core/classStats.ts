import type { Label, Term } from "./types.js";

/** Read-only view of one label's counters. */
export interface ClassStatsView {
  readonly label: Label;
  /** number of training documents carrying this label */
  readonly documentCount: number;
  /** total token occurrences across those documents */
  readonly tokenCount: number;
  /** raw occurrence count of `term` (0 when never seen under this label) */
  count(term: Term): number;
  terms(): IterableIterator<[Term, number]>;
}

/**
 * Per-label word accounting.
 *
 * Contract notes:
 * - `tokenCount` always equals the sum of all term counts
 * - only mutated while the owning model is untrained
 */
export interface ClassStats extends ClassStatsView {
  addTerm(term: Term, occurrences?: number): void;
  addDocument(): void;
}
