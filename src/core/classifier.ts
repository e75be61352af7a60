import type { Label, LabelScore, LabeledDocument, ModelPhase, Term } from "./types.js";
import type { ClassStatsView } from "./classStats.js";

/** Trained, immutable scoring table for a single label. */
export interface ProbabilityTable {
  readonly label: Label;
  /** ln(D_c / D) */
  readonly logPrior: number;
  /** ln P(t | c) for every vocabulary term */
  readonly logLikelihoods: ReadonlyMap<Term, number>;
}

/**
 * Text classifier lifecycle: accumulate documents, train once, then query.
 *
 * Contract notes:
 * - add* methods throw StateError once trained
 * - classify/score methods throw StateError until trained
 * - labels() is sorted ascending, so output never depends on insertion order
 */
export interface TextClassifier {
  readonly phase: ModelPhase;
  readonly documentCount: number;
  readonly vocabularySize: number;

  addDocument(text: string, label: Label): void;
  addTokenizedDocument(terms: Iterable<Term>, label: Label): void;
  addDocuments(docs: Iterable<LabeledDocument>): void;

  train(): void;

  classify(text: string): Label;
  classifyTokens(terms: Iterable<Term>): Label;
  /** All labels, best first. */
  scores(text: string): LabelScore[];
  scoreTokens(terms: Iterable<Term>): LabelScore[];

  labels(): Label[];
  classStats(label: Label): ClassStatsView | undefined;
  probabilityTable(label: Label): ProbabilityTable | undefined;
}
