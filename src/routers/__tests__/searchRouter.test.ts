import { beforeEach, describe, expect, it } from "vitest";
import type express from "express";
import request from "supertest";
import { createApp } from "..";
import { RetrievalService } from "../../rag/services/RetrievalService";
import { VectorStore } from "../../rag/services/VectorStore";
import { FakeEmbedder, FakePineconeIndex, testConfig } from "../../rag/__tests__/fakes";

const ALLOWED_ORIGIN = "https://faq.example.test";

describe("search API", () => {
  let embedder: FakeEmbedder;
  let index: FakePineconeIndex;
  let app: express.Express;

  beforeEach(() => {
    const config = testConfig();
    embedder = new FakeEmbedder();
    index = new FakePineconeIndex();
    index.records.set("refunds-chunk-0", {
      id: "refunds-chunk-0",
      values: [0, 1, 0, 0],
      metadata: {
        source: "refunds.pdf",
        chunk_index: 0,
        total_chunks: 1,
        content_preview: "Refunds are issued within 14 days.",
        type: "policy",
        char_count: 34,
      },
    });
    const retrieval = new RetrievalService(
      embedder,
      new VectorStore(config.index, index),
      config.retrieval
    );
    app = createApp(retrieval, config.http);
  });

  it("GET /health reports liveness", async () => {
    const response = await request(app).get("/health").expect(200);

    expect(response.body).toEqual({ status: "healthy" });
  });

  it("GET / describes the service", async () => {
    const response = await request(app).get("/").expect(200);

    expect(response.body.service).toBe("policy-faq-search");
  });

  it("POST /search returns scored results", async () => {
    const response = await request(app)
      .post("/search")
      .send({ query: "refund", top_k: 1 })
      .expect(200);

    expect(response.body).toEqual([
      { score: 1, source: "refunds.pdf", content: "Refunds are issued within 14 days." },
    ]);
    expect(index.queries).toEqual([{ vector: [6, 1, 0, 1], topK: 1 }]);
  });

  it("POST /search uses the default top_k", async () => {
    await request(app).post("/search").send({ query: "refund" }).expect(200);

    expect(index.queries[0]?.topK).toBe(3);
  });

  it("rejects a blank query with 400", async () => {
    const response = await request(app).post("/search").send({ query: "  " }).expect(400);

    expect(response.body).toEqual({
      success: false,
      error: "query is required",
      code: "VALIDATION_ERROR",
    });
    expect(embedder.calls).toHaveLength(0);
  });

  it.each([
    [{}],
    [{ query: 42 }],
    [{ query: "refund", top_k: 0 }],
    [{ query: "refund", top_k: "3" }],
  ])("rejects body %j with 400", async (body) => {
    const response = await request(app).post("/search").send(body).expect(400);

    expect(response.body.code).toBe("VALIDATION_ERROR");
    expect(embedder.calls).toHaveLength(0);
  });

  it("rejects malformed JSON with 400", async () => {
    const response = await request(app)
      .post("/search")
      .set("Content-Type", "application/json")
      .send("{\"query\":")
      .expect(400);

    expect(response.body).toEqual({
      success: false,
      error: "Malformed JSON body",
      code: "VALIDATION_ERROR",
    });
  });

  it("passes through the 413 for an oversized body", async () => {
    const response = await request(app)
      .post("/search")
      .send({ query: "x".repeat(200 * 1024) })
      .expect(413);

    expect(response.body).toEqual({
      success: false,
      error: "request entity too large",
      code: "BAD_REQUEST",
    });
    expect(embedder.calls).toHaveLength(0);
  });

  it("maps an index failure to 502", async () => {
    index.failQuery = true;

    const response = await request(app).post("/search").send({ query: "refund" }).expect(502);

    expect(response.body).toEqual({
      success: false,
      error: "Index query failed: index unreachable",
      code: "INDEX_ERROR",
    });
  });

  it("maps an embedding failure to 502", async () => {
    embedder.failOn = () => true;

    const response = await request(app).post("/search").send({ query: "refund" }).expect(502);

    expect(response.body.code).toBe("EMBEDDING_ERROR");
  });

  describe("CORS", () => {
    it("allows a listed origin", async () => {
      const response = await request(app).get("/health").set("Origin", ALLOWED_ORIGIN).expect(200);

      expect(response.headers["access-control-allow-origin"]).toBe(ALLOWED_ORIGIN);
    });

    it("sends no CORS headers to an unlisted origin", async () => {
      const response = await request(app)
        .get("/health")
        .set("Origin", "https://elsewhere.example.test")
        .expect(200);

      expect(response.headers["access-control-allow-origin"]).toBeUndefined();
    });

    it("allows every origin when * is listed", async () => {
      const config = testConfig();
      const retrieval = new RetrievalService(
        embedder,
        new VectorStore(config.index, index),
        config.retrieval
      );
      const openApp = createApp(retrieval, { ...config.http, allowedOrigins: ["*"] });

      const response = await request(openApp)
        .get("/health")
        .set("Origin", "https://elsewhere.example.test")
        .expect(200);

      expect(response.headers["access-control-allow-origin"]).toBe("https://elsewhere.example.test");
    });
  });
});
