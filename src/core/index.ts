export type { Label, Term, Token, LabeledDocument, LabelScore, ModelPhase } from "./types.js";
export type { Tokenizer, TokenizeOptions } from "./tokenizer.js";
export type { ClassStats, ClassStatsView } from "./classStats.js";
export type { ProbabilityTable, TextClassifier } from "./classifier.js";
export {
  ClassifierError,
  StateError,
  InvalidArgumentError,
  SnapshotError,
  type FieldError,
  type StateErrorCode,
} from "./errors.js";
export * from "./impl/index.js";
