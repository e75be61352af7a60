import { describe, expect, it } from "vitest";
import { InvalidArgumentError, SnapshotError } from "../../errors.js";
import { NaiveBayesModel } from "../naiveBayesModel.js";
import { fromSnapshot, parseSnapshot, toSnapshot } from "../modelSnapshot.js";
import { FOOD_DOCUMENTS } from "./foodDocuments.js";

function snapshotErrors(value: unknown): unknown {
  try {
    parseSnapshot(value);
  } catch (e) {
    return e instanceof SnapshotError ? e.errors : e;
  }
  throw new Error("expected parseSnapshot to throw");
}

describe("model snapshots", () => {
  it("dumps counts per label in label order", () => {
    const model = new NaiveBayesModel({ smoothing: 0.5 });
    model.addDocument("c", "y");
    model.addDocument("a a b", "x");

    expect(toSnapshot(model)).toEqual({
      version: 1,
      smoothing: 0.5,
      trained: false,
      classes: [
        { label: "x", documentCount: 1, tokenCount: 3, terms: { a: 2, b: 1 } },
        { label: "y", documentCount: 1, tokenCount: 1, terms: { c: 1 } },
      ],
    });
  });

  it("restores a trained model that scores identically", () => {
    const model = new NaiveBayesModel();
    model.addDocuments(FOOD_DOCUMENTS);
    model.train();

    const restored = fromSnapshot(JSON.parse(JSON.stringify(toSnapshot(model))));
    expect(restored.phase).toBe("trained");
    expect(restored.vocabularySize).toBe(model.vocabularySize);
    expect(restored.classify("salami pancetta beef ribs")).toBe("meat");
    expect(restored.scores("salami pancetta beef ribs")).toEqual(model.scores("salami pancetta beef ribs"));
  });

  it("restores an untrained model that still accepts documents", () => {
    const model = new NaiveBayesModel();
    model.addDocument("a a b", "x");

    const restored = fromSnapshot(toSnapshot(model));
    expect(restored.phase).toBe("untrained");
    restored.addDocument("c", "y");
    restored.train();
    expect(restored.classify("c")).toBe("y");
  });

  it("refuses to train a restored model whose smoothing overflows", () => {
    const snapshot = {
      version: 1,
      smoothing: 1e308,
      trained: true,
      classes: [
        { label: "x", documentCount: 1, tokenCount: 1, terms: { a: 1 } },
        { label: "y", documentCount: 1, tokenCount: 1, terms: { b: 1 } },
      ],
    };
    expect(() => fromSnapshot(snapshot)).toThrow(InvalidArgumentError);
  });

  it("lists every invalid top-level field", () => {
    expect(snapshotErrors({ version: 2, smoothing: 0, trained: "yes", classes: {} })).toEqual([
      { path: "$.version", message: "must be 1" },
      { path: "$.smoothing", message: "must be a positive number" },
      { path: "$.trained", message: "must be a boolean" },
      { path: "$.classes", message: "must be an array" },
    ]);
    expect(snapshotErrors("nope")).toEqual([{ path: "$", message: "must be an object" }]);
  });

  it("checks class counts", () => {
    const base = { version: 1, smoothing: 1, trained: true };
    expect(
      snapshotErrors({ ...base, classes: [{ label: "x", documentCount: 1, tokenCount: 5, terms: { a: 2 } }] }),
    ).toEqual([{ path: "$.classes[0].tokenCount", message: "must equal the sum of term counts" }]);

    expect(
      snapshotErrors({
        ...base,
        classes: [
          { label: "x", documentCount: 1, tokenCount: 1, terms: { a: 1 } },
          { label: "x", documentCount: 2, tokenCount: 0, terms: {} },
        ],
      }),
    ).toEqual([{ path: "$.classes[1].label", message: "duplicate label" }]);

    expect(
      snapshotErrors({ ...base, classes: [{ label: "", documentCount: 0, tokenCount: 1, terms: { a: 1.5 } }] }),
    ).toEqual([
      { path: "$.classes[0].label", message: "must be a non-empty string" },
      { path: "$.classes[0].documentCount", message: "must be a positive integer" },
      { path: "$.classes[0].terms.a", message: "must be a positive integer keyed by a non-empty term" },
      { path: "$.classes[0].tokenCount", message: "must equal the sum of term counts" },
    ]);
  });
});
