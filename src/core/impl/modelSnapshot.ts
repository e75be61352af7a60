import type { Label, Term } from "../types.js";
import type { Tokenizer } from "../tokenizer.js";
import { SnapshotError, type FieldError } from "../errors.js";
import { asBoolean, asCount, asPositiveNumber, asString, isRecord, pushErr } from "../validation.js";
import { NaiveBayesModel } from "./naiveBayesModel.js";

export const SNAPSHOT_VERSION = 1;

export interface ClassSnapshot {
  label: Label;
  documentCount: number;
  tokenCount: number;
  terms: Record<Term, number>;
}

/** JSON-safe dump of accumulated counts; probabilities are recomputed on load. */
export interface ModelSnapshot {
  version: typeof SNAPSHOT_VERSION;
  smoothing: number;
  trained: boolean;
  classes: ClassSnapshot[];
}

export function toSnapshot(model: NaiveBayesModel): ModelSnapshot {
  const classes: ClassSnapshot[] = [];
  for (const label of model.labels()) {
    const stats = model.classStats(label);
    if (!stats) continue;
    classes.push({
      label,
      documentCount: stats.documentCount,
      tokenCount: stats.tokenCount,
      terms: Object.fromEntries(stats.terms()),
    });
  }

  return {
    version: SNAPSHOT_VERSION,
    smoothing: model.smoothing,
    trained: model.phase === "trained",
    classes,
  };
}

/**
 * Rebuilds a model from an untrusted value (typically parsed JSON).
 * Throws SnapshotError listing every invalid field.
 */
export function fromSnapshot(value: unknown, opts: { tokenizer?: Tokenizer } = {}): NaiveBayesModel {
  const snapshot = parseSnapshot(value);
  const model = new NaiveBayesModel({ tokenizer: opts.tokenizer, smoothing: snapshot.smoothing });

  for (const cls of snapshot.classes) {
    model.addClassCounts(cls.label, Object.entries(cls.terms), cls.documentCount);
  }

  if (snapshot.trained && model.documentCount > 0) model.train();
  return model;
}

export function parseSnapshot(value: unknown): ModelSnapshot {
  const errors: FieldError[] = [];
  if (!isRecord(value)) {
    throw new SnapshotError([{ path: "$", message: "must be an object" }]);
  }

  if (value.version !== SNAPSHOT_VERSION) pushErr(errors, "$.version", `must be ${SNAPSHOT_VERSION}`);

  const smoothing = asPositiveNumber(value.smoothing);
  if (smoothing === undefined) pushErr(errors, "$.smoothing", "must be a positive number");

  const trained = asBoolean(value.trained);
  if (trained === undefined) pushErr(errors, "$.trained", "must be a boolean");

  const classes: ClassSnapshot[] = [];
  if (!Array.isArray(value.classes)) {
    pushErr(errors, "$.classes", "must be an array");
  } else {
    const seen = new Set<Label>();
    value.classes.forEach((c: unknown, i: number) => {
      const parsed = parseClass(c, `$.classes[${i}]`, errors);
      if (!parsed) return;
      if (seen.has(parsed.label)) {
        pushErr(errors, `$.classes[${i}].label`, "duplicate label");
        return;
      }
      seen.add(parsed.label);
      classes.push(parsed);
    });
  }

  if (errors.length || smoothing === undefined || trained === undefined) {
    throw new SnapshotError(errors);
  }
  return { version: SNAPSHOT_VERSION, smoothing, trained, classes };
}

function parseClass(c: unknown, path: string, errors: FieldError[]): ClassSnapshot | undefined {
  if (!isRecord(c)) {
    pushErr(errors, path, "must be an object");
    return undefined;
  }

  const before = errors.length;
  const label = asString(c.label);
  if (!label) pushErr(errors, `${path}.label`, "must be a non-empty string");

  const documentCount = asCount(c.documentCount);
  if (documentCount === undefined || documentCount < 1) {
    pushErr(errors, `${path}.documentCount`, "must be a positive integer");
  }

  const tokenCount = asCount(c.tokenCount);
  if (tokenCount === undefined) pushErr(errors, `${path}.tokenCount`, "must be a non-negative integer");

  const entries: Array<[Term, number]> = [];
  let sum = 0;
  if (!isRecord(c.terms)) {
    pushErr(errors, `${path}.terms`, "must be an object");
  } else {
    for (const [term, raw] of Object.entries(c.terms)) {
      const n = asCount(raw);
      if (!term || n === undefined || n < 1) {
        pushErr(errors, `${path}.terms.${term}`, "must be a positive integer keyed by a non-empty term");
        continue;
      }
      entries.push([term, n]);
      sum += n;
    }
    if (tokenCount !== undefined && sum !== tokenCount) {
      pushErr(errors, `${path}.tokenCount`, "must equal the sum of term counts");
    }
  }

  if (errors.length > before || !label || documentCount === undefined || tokenCount === undefined) {
    return undefined;
  }
  return { label, documentCount, tokenCount, terms: Object.fromEntries(entries) };
}
