import type { Label, LabelScore, LabeledDocument, ModelPhase, Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import type { ClassStatsView } from "../classStats.js";
import type { ProbabilityTable, TextClassifier } from "../classifier.js";
import { InvalidArgumentError, StateError } from "../errors.js";
import { ClassStatsReader, MemoryClassStats } from "./memoryClassStats.js";
import { SimpleTokenizer, tokenizeToTerms } from "./simpleTokenizer.js";

export const DEFAULT_SMOOTHING = 1;

export interface NaiveBayesOptions {
  tokenizer?: Tokenizer;
  /** Additive smoothing pseudo-count (1 = Laplace). */
  smoothing?: number;
}

type ModelState =
  | { phase: "untrained" }
  | { phase: "trained"; tables: Map<Label, ProbabilityTable> };

function isPositiveCount(n: number): boolean {
  return Number.isSafeInteger(n) && n >= 1;
}

function compareLabels(a: Label, b: Label): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Multinomial naive Bayes over bag-of-words counts.
 *
 * Training builds, for every label c and vocabulary term t:
 *   logPrior(c)  = ln(D_c / D)
 *   ln P(t | c)  = ln((n_tc + α) / (T_c + α·V))
 *
 * Scoring adds the log-prior and the log-likelihood of each query occurrence
 * whose term is in the vocabulary; unknown terms are skipped. Equal scores are
 * broken by ascending label order.
 */
export class NaiveBayesModel implements TextClassifier {
  readonly smoothing: number;

  private readonly tokenizer: Tokenizer;
  private readonly stats = new Map<Label, MemoryClassStats>();
  private readonly vocabulary = new Set<Term>();
  private state: ModelState = { phase: "untrained" };
  private docs = 0;

  constructor(opts: NaiveBayesOptions = {}) {
    const smoothing = opts.smoothing ?? DEFAULT_SMOOTHING;
    if (!Number.isFinite(smoothing) || smoothing <= 0) {
      throw new InvalidArgumentError("smoothing must be a positive number");
    }
    this.smoothing = smoothing;
    this.tokenizer = opts.tokenizer ?? new SimpleTokenizer();
  }

  get phase(): ModelPhase {
    return this.state.phase;
  }

  get documentCount(): number {
    return this.docs;
  }

  get vocabularySize(): number {
    return this.vocabulary.size;
  }

  addDocument(text: string, label: Label): void {
    this.addTokenizedDocument(tokenizeToTerms(this.tokenizer, text, { normalizeCase: true }), label);
  }

  addTokenizedDocument(terms: Iterable<Term>, label: Label): void {
    const cls = this.openClass(label);

    for (const term of terms) {
      if (!term) continue;
      cls.addTerm(term);
      this.vocabulary.add(term);
    }

    cls.addDocument();
    this.docs++;
  }

  addDocuments(docs: Iterable<LabeledDocument>): void {
    for (const d of docs) this.addDocument(d.text, d.label);
  }

  /**
   * Adds pre-aggregated counts for a label, as if `documentCount` documents
   * containing those term occurrences had been added. Used to restore snapshots.
   */
  addClassCounts(label: Label, termCounts: Iterable<[Term, number]>, documentCount: number): void {
    if (!isPositiveCount(documentCount)) {
      throw new InvalidArgumentError("documentCount must be a positive integer");
    }
    const entries = Array.from(termCounts);
    for (const [term, n] of entries) {
      if (!term || !isPositiveCount(n)) {
        throw new InvalidArgumentError(`count for term "${term}" must be a positive integer`);
      }
    }

    const cls = this.openClass(label);
    for (const [term, n] of entries) {
      cls.addTerm(term, n);
      this.vocabulary.add(term);
    }
    for (let i = 0; i < documentCount; i++) cls.addDocument();
    this.docs += documentCount;
  }

  train(): void {
    const total = this.docs;
    if (total === 0) {
      throw new StateError("NO_TRAINING_DATA", "cannot train without documents");
    }

    const alpha = this.smoothing;
    const vocabSize = this.vocabulary.size;
    const tables = new Map<Label, ProbabilityTable>();

    for (const label of this.labels()) {
      const cls = this.stats.get(label);
      if (!cls) continue;

      const denominator = cls.tokenCount + alpha * vocabSize;
      if (!Number.isFinite(denominator)) {
        throw new InvalidArgumentError(`smoothing ${alpha} is too large for a vocabulary of ${vocabSize} terms`);
      }
      const logLikelihoods = new Map<Term, number>();
      for (const term of this.vocabulary) {
        const logP = Math.log((cls.count(term) + alpha) / denominator);
        if (!Number.isFinite(logP)) {
          throw new InvalidArgumentError(`smoothing ${alpha} underflows the probability of "${term}" under "${label}"`);
        }
        logLikelihoods.set(term, logP);
      }

      tables.set(label, {
        label,
        logPrior: Math.log(cls.documentCount / total),
        logLikelihoods,
      });
    }

    this.state = { phase: "trained", tables };
  }

  classify(text: string): Label {
    return this.best(this.scores(text));
  }

  classifyTokens(terms: Iterable<Term>): Label {
    return this.best(this.scoreTokens(terms));
  }

  scores(text: string): LabelScore[] {
    return this.scoreTokens(tokenizeToTerms(this.tokenizer, text, { normalizeCase: true }));
  }

  scoreTokens(terms: Iterable<Term>): LabelScore[] {
    const tables = this.trainedTables();
    const query = Array.from(terms).filter((t) => this.vocabulary.has(t));

    const ranked: LabelScore[] = [];
    for (const table of tables.values()) {
      let logScore = table.logPrior;
      for (const term of query) {
        logScore += table.logLikelihoods.get(term) ?? 0;
      }
      ranked.push({ label: table.label, logScore, probability: 0 });
    }

    ranked.sort((a, b) => b.logScore - a.logScore || compareLabels(a.label, b.label));

    // log-sum-exp normalization
    const max = ranked[0]?.logScore ?? 0;
    if (!Number.isFinite(max)) {
      for (const r of ranked) r.probability = 1 / ranked.length;
      return ranked;
    }
    let sum = 0;
    for (const r of ranked) sum += Math.exp(r.logScore - max);
    for (const r of ranked) r.probability = Math.exp(r.logScore - max) / sum;

    return ranked;
  }

  labels(): Label[] {
    return Array.from(this.stats.keys()).sort(compareLabels);
  }

  classStats(label: Label): ClassStatsView | undefined {
    const cls = this.stats.get(label);
    return cls ? new ClassStatsReader(cls) : undefined;
  }

  /** Returns a copy; the model's own tables stay frozen. */
  probabilityTable(label: Label): ProbabilityTable | undefined {
    const table = this.trainedTables().get(label);
    if (!table) return undefined;
    return { label: table.label, logPrior: table.logPrior, logLikelihoods: new Map(table.logLikelihoods) };
  }

  private openClass(label: Label): MemoryClassStats {
    if (this.state.phase === "trained") {
      throw new StateError("ALREADY_TRAINED", "cannot add documents to a trained model");
    }
    if (typeof label !== "string" || label.length === 0) {
      throw new InvalidArgumentError("label must be a non-empty string");
    }

    let cls = this.stats.get(label);
    if (!cls) {
      cls = new MemoryClassStats(label);
      this.stats.set(label, cls);
    }
    return cls;
  }

  private trainedTables(): Map<Label, ProbabilityTable> {
    if (this.state.phase !== "trained") {
      throw new StateError("NOT_TRAINED", "model must be trained before it is queried");
    }
    return this.state.tables;
  }

  private best(ranked: LabelScore[]): Label {
    const top = ranked[0];
    if (!top) {
      throw new StateError("NO_TRAINING_DATA", "model has no labels");
    }
    return top.label;
  }
}
