import { describe, it } from "mocha";
import { expect } from "chai";

import { EmbeddingError } from "../../../src/errors.js";
import { HashingEmbedder, OllamaEmbedder, tokenise } from "../../../src/semantic/embedders.js";
import { createFetchStub, createJsonResponse, requestBody, type FetchRecorder } from "../../helpers/fetchStub.js";

function norm(vector: readonly number[]): number {
  return Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
}

describe("semantic/embedders", () => {
  it("tokenises on letter and digit runs", () => {
    expect(tokenise("Hello, World! a 42 café")).to.deep.equal(["hello", "world", "42", "café"]);
  });

  describe("HashingEmbedder", () => {
    it("produces unit vectors of the configured size", async () => {
      const embedder = new HashingEmbedder(64);
      const vector = await embedder.embed("vector stores rank documents by similarity");

      expect(embedder.model).to.equal("hashing-64");
      expect(vector).to.have.length(64);
      expect(norm(vector)).to.be.closeTo(1, 1e-9);
    });

    it("is deterministic and case insensitive", async () => {
      const embedder = new HashingEmbedder(32);
      expect(await embedder.embed("Semantic Search")).to.deep.equal(await embedder.embed("semantic search"));
    });

    it("returns a zero vector for text without tokens", async () => {
      const vector = await new HashingEmbedder(8).embed("a !");
      expect(vector).to.deep.equal([0, 0, 0, 0, 0, 0, 0, 0]);
    });

    it("rejects non positive dimensions", () => {
      expect(() => new HashingEmbedder(0)).to.throw(EmbeddingError);
    });
  });

  describe("OllamaEmbedder", () => {
    it("posts the text to the embed endpoint", async () => {
      const recorder: FetchRecorder = [];
      const embedder = new OllamaEmbedder({
        baseUrl: "http://ollama.test",
        model: "nomic-embed-text",
        dimensions: 3,
        fetch: createFetchStub([createJsonResponse({ embeddings: [[0.1, 0.2, 0.3]] })], recorder),
      });

      expect(await embedder.embed("hello")).to.deep.equal([0.1, 0.2, 0.3]);
      expect(recorder).to.have.length(1);
      expect(recorder[0].url).to.equal("http://ollama.test/api/embed");
      expect(recorder[0].init?.method).to.equal("POST");
      expect(requestBody(recorder[0])).to.deep.equal({ model: "nomic-embed-text", input: "hello" });
    });

    it("rejects vectors of the wrong size", async () => {
      const embedder = new OllamaEmbedder({
        baseUrl: "http://ollama.test",
        model: "nomic-embed-text",
        dimensions: 4,
        fetch: createFetchStub([createJsonResponse({ embeddings: [[0.1, 0.2, 0.3]] })]),
      });

      try {
        await embedder.embed("hello");
        expect.fail("embed should have thrown");
      } catch (error) {
        expect(error).to.be.instanceOf(EmbeddingError);
        expect((error as EmbeddingError).message).to.equal(
          'model "nomic-embed-text" returned 3 dimensions, expected 4',
        );
      }
    });

    it("wraps transport failures", async () => {
      const embedder = new OllamaEmbedder({
        baseUrl: "http://ollama.test",
        model: "nomic-embed-text",
        dimensions: 3,
        fetch: createFetchStub([createJsonResponse({ error: "model not found" }, 404)]),
      });

      try {
        await embedder.embed("hello");
        expect.fail("embed should have thrown");
      } catch (error) {
        expect(error).to.be.instanceOf(EmbeddingError);
        expect((error as EmbeddingError).message).to.equal('model "nomic-embed-text" could not embed the text');
        expect((error as EmbeddingError).cause).to.be.instanceOf(Error);
      }
    });
  });
});
