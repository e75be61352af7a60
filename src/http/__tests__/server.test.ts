import type { Server } from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { startServer } from "../server.js";
import { FOOD_DOCUMENTS } from "../../core/impl/__tests__/foodDocuments.js";

const running: Server[] = [];

async function start(): Promise<string> {
  const { server, port } = await startServer({ port: 0, log: () => {} });
  running.push(server);
  return `http://127.0.0.1:${port}`;
}

function post(base: string, path: string, body?: unknown, method = "POST"): Promise<Response> {
  return fetch(`${base}${path}`, {
    method,
    headers: { "content-type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

async function trained(base: string): Promise<void> {
  await post(base, "/documents", { documents: FOOD_DOCUMENTS });
  await post(base, "/train");
}

afterEach(async () => {
  for (const server of running.splice(0)) {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  }
});

describe("http server", () => {
  it("reports health and phase", async () => {
    const base = await start();
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ status: "ok", service: "bayes_classifier", phase: "untrained" });
  });

  it("accepts documents, trains and classifies", async () => {
    const base = await start();

    const added = await post(base, "/documents", { documents: [...FOOD_DOCUMENTS, { text: 1, label: "meat" }] });
    expect(added.status).toBe(207);
    expect(await added.json()).toEqual({
      accepted: 4,
      failed: 1,
      failures: [{ index: 4, code: "INVALID_ARGUMENT", message: "text must be a string" }],
    });

    const train = await post(base, "/train");
    expect(train.status).toBe(200);
    expect(await train.json()).toMatchObject({ labels: ["meat", "veggie"], documentCount: 4 });

    const res = await post(base, "/classify", { text: "salami pancetta beef ribs" });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ label: "meat", scores: [{ label: "meat" }, { label: "veggie" }] });

    const labels = await fetch(`${base}/labels`);
    expect(await labels.json()).toEqual({ labels: ["meat", "veggie"] });
  });

  it("maps lifecycle errors to 409 problems", async () => {
    const base = await start();

    const early = await post(base, "/classify", { text: "beef" });
    expect(early.status).toBe(409);
    expect(early.headers.get("content-type")).toBe("application/problem+json");
    expect(await early.json()).toMatchObject({ code: "FAILED_PRECONDITION", status: 409 });

    const empty = await post(base, "/train");
    expect(empty.status).toBe(409);

    await trained(base);
    const late = await post(base, "/documents", { documents: [{ text: "okra", label: "veggie" }] });
    expect(late.status).toBe(409);
  });

  it("validates requests", async () => {
    const base = await start();

    const plain = await fetch(`${base}/classify`, { method: "POST", headers: { "content-type": "text/plain" }, body: "beef" });
    expect(plain.status).toBe(415);

    const noDocs = await post(base, "/documents", { documents: [] });
    expect(noDocs.status).toBe(400);
    expect(await noDocs.json()).toMatchObject({
      code: "INVALID_ARGUMENT",
      errors: [{ path: "$.documents", message: "must contain at least 1 item" }],
    });

    const malformed = await fetch(`${base}/classify`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "{",
    });
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toMatchObject({ detail: "malformed JSON body" });

    const missing = await fetch(`${base}/nope`);
    expect(missing.status).toBe(404);
  });

  it("exports a model and imports it into another server", async () => {
    const source = await start();
    await trained(source);
    const snapshot: unknown = await (await fetch(`${source}/model`)).json();

    const target = await start();
    const imported = await post(target, "/model", snapshot, "PUT");
    expect(imported.status).toBe(200);
    expect(await imported.json()).toEqual({ labels: ["meat", "veggie"], phase: "trained" });

    const res = await post(target, "/classify", { text: "salami pancetta beef ribs" });
    expect(await res.json()).toMatchObject({ label: "meat" });

    const bad = await post(target, "/model", { version: 1 }, "PUT");
    expect(bad.status).toBe(400);
    expect(await bad.json()).toMatchObject({ detail: "invalid snapshot" });
  });
});
