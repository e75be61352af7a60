import {
  NaiveBayesModel,
  SimpleTokenizer,
  StateError,
  fromSnapshot,
  toSnapshot,
  type Label,
  type LabelScore,
  type ModelPhase,
  type ModelSnapshot,
} from "../core/index.js";

export interface EngineDocumentInput {
  text: string;
  label: Label;
}

export interface TrainSummary {
  labels: Label[];
  documentCount: number;
  vocabularySize: number;
}

export interface ClassifyResponse {
  label: Label;
  scores: LabelScore[];
}

export interface Engine {
  readonly phase: ModelPhase;
  addDocument(doc: EngineDocumentInput): void;
  train(): TrainSummary;
  classify(text: string): ClassifyResponse;
  labels(): Label[];
  exportModel(): ModelSnapshot;
  /** Replaces the current model; throws SnapshotError and keeps the old one on bad input. */
  importModel(snapshot: unknown): void;
}

export interface EngineOptions {
  smoothing?: number;
}

export function createInMemoryEngine(opts: EngineOptions = {}): Engine {
  const tokenizer = new SimpleTokenizer();
  let model = new NaiveBayesModel({ tokenizer, smoothing: opts.smoothing });

  return {
    get phase() {
      return model.phase;
    },
    addDocument(doc) {
      model.addDocument(doc.text, doc.label);
    },
    train() {
      model.train();
      return {
        labels: model.labels(),
        documentCount: model.documentCount,
        vocabularySize: model.vocabularySize,
      };
    },
    classify(text) {
      const scores = model.scores(text);
      const top = scores[0];
      if (!top) {
        throw new StateError("NO_TRAINING_DATA", "model has no labels");
      }
      return { label: top.label, scores };
    },
    labels() {
      return model.labels();
    },
    exportModel() {
      return toSnapshot(model);
    },
    importModel(snapshot) {
      model = fromSnapshot(snapshot, { tokenizer });
    },
  };
}
