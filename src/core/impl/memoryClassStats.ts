import type { Label, Term } from "../types.js";
import type { ClassStats, ClassStatsView } from "../classStats.js";

/**
 * In-memory counters for one label.
 *
 * Data structure:
 * - term -> occurrences
 */
export class MemoryClassStats implements ClassStats {
  private readonly termCounts = new Map<Term, number>();
  private docs = 0;
  private tokens = 0;

  constructor(readonly label: Label) {}

  get documentCount(): number {
    return this.docs;
  }

  get tokenCount(): number {
    return this.tokens;
  }

  addTerm(term: Term, occurrences: number = 1): void {
    this.termCounts.set(term, (this.termCounts.get(term) ?? 0) + occurrences);
    this.tokens += occurrences;
  }

  addDocument(): void {
    this.docs++;
  }

  count(term: Term): number {
    return this.termCounts.get(term) ?? 0;
  }

  terms(): IterableIterator<[Term, number]> {
    return this.termCounts.entries();
  }
}

/** Read-only view over a MemoryClassStats; exposes no mutators. */
export class ClassStatsReader implements ClassStatsView {
  constructor(private readonly source: ClassStatsView) {}

  get label(): Label {
    return this.source.label;
  }

  get documentCount(): number {
    return this.source.documentCount;
  }

  get tokenCount(): number {
    return this.source.tokenCount;
  }

  count(term: Term): number {
    return this.source.count(term);
  }

  terms(): IterableIterator<[Term, number]> {
    return this.source.terms();
  }
}
