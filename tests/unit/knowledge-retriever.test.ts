/**
 * Knowledge retriever tests
 */

import { describe, it, expect } from "vitest";
import {
  LexicalKnowledgeRetriever,
  createDefaultRetriever,
  loadTipCorpus,
  tokenize,
} from "../../src/tools/knowledge-retriever.js";
import { TEST_TIPS } from "../helpers/scripted-model.js";

describe("tokenize", () => {
  it("drops stop words and trailing plural s", () => {
    expect(tokenize("Drip lines for the wheat")).toEqual(["drip", "line", "wheat"]);
  });
});

describe("LexicalKnowledgeRetriever", () => {
  const retriever = new LexicalKnowledgeRetriever(TEST_TIPS);

  it("ranks tag matches above body matches", () => {
    // mulch: mulch tag (2) + drip in text (1); drip: drip tag (2)
    expect(retriever.retrieve("drip mulch", 3).map((t) => t.id)).toEqual(["mulch", "drip"]);
  });

  it("keeps corpus order on ties", () => {
    expect(retriever.retrieve("soil wheat", 3).map((t) => t.id)).toEqual(["mulch", "wheat"]);
  });

  it("honours topK", () => {
    expect(retriever.retrieve("drip mulch", 1).map((t) => t.id)).toEqual(["mulch"]);
    expect(retriever.retrieve("drip mulch", 0)).toEqual([]);
  });

  it("returns nothing for empty or stop-word-only queries", () => {
    expect(retriever.retrieve("", 3)).toEqual([]);
    expect(retriever.retrieve("the and of", 3)).toEqual([]);
  });

  it("returns copies that cannot change the index", () => {
    const [first] = retriever.retrieve("drip", 1);
    first?.tags.push("tampered");
    expect(retriever.retrieve("drip", 1)[0]?.tags).toEqual(["drip", "irrigation"]);
  });
});

describe("bundled corpus", () => {
  it("loads and answers irrigation queries", () => {
    const retriever = createDefaultRetriever();
    expect(retriever.size).toBeGreaterThan(10);
    expect(retriever.retrieve("drip irrigation", 3).map((t) => t.id)).toContain("drip-basics");
  });

  it("rejects a missing corpus file", () => {
    expect(() => loadTipCorpus("/nonexistent/tips.json")).toThrow(/Unable to load agronomy tip corpus/);
  });
});
