/**
 * Knowledge Retriever (mini-RAG)
 *
 * Deterministic lexical lookup over the agronomy tip corpus.
 *
 * Scoring, per distinct query token:
 * - 2 points when it matches one of the tip's tag tokens
 * - 1 point when it only matches the tip's title/text
 *
 * Only tips scoring above zero are returned; ties keep corpus order.
 * An empty (or stop-word-only) query returns no tips.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { TipCorpus, type TipCorpusT, type TipSnippetT } from "../schemas/tips.js";
import { log } from "../utils/telemetry.js";

export interface KnowledgeRetriever {
  retrieve(query: string, topK: number): TipSnippetT[] | Promise<TipSnippetT[]>;
}

const STOP_WORDS = new Set([
  "a", "an", "the", "and", "or", "of", "to", "in", "on", "for", "with", "is", "are", "was",
  "be", "i", "my", "me", "we", "our", "you", "your", "have", "has", "it", "its", "this",
  "that", "at", "as", "by", "from", "so", "but", "do", "how", "what", "can", "should", "there",
  "about", "am", "will", "would", "use", "using",
]);

/**
 * Lower-case, split on anything that is not a letter or digit, drop stop
 * words and strip a trailing plural "s" from tokens longer than 3 characters.
 */
export function tokenize(text: string): string[] {
  const tokens: string[] = [];
  for (const raw of text.toLowerCase().split(/[^\p{L}\p{N}]+/u)) {
    if (!raw || STOP_WORDS.has(raw)) continue;
    tokens.push(raw.length > 3 && raw.endsWith("s") ? raw.slice(0, -1) : raw);
  }
  return tokens;
}

interface IndexedTip {
  tip: TipSnippetT;
  tagTokens: ReadonlySet<string>;
  bodyTokens: ReadonlySet<string>;
}

export class LexicalKnowledgeRetriever implements KnowledgeRetriever {
  private readonly index: readonly IndexedTip[];

  constructor(tips: readonly TipSnippetT[]) {
    this.index = Object.freeze(
      tips.map((tip) => {
        return {
          tip: Object.freeze({ ...tip, tags: [...tip.tags] }),
          tagTokens: new Set(tip.tags.flatMap(tokenize)),
          bodyTokens: new Set(tokenize(`${tip.title} ${tip.text}`)),
        };
      }),
    );
  }

  get size(): number {
    return this.index.length;
  }

  score(query: string): Array<{ tip: TipSnippetT; score: number }> {
    const queryTokens = new Set(tokenize(query));
    return this.index.map(({ tip, tagTokens, bodyTokens }) => {
      let score = 0;
      for (const token of queryTokens) {
        if (tagTokens.has(token)) score += 2;
        else if (bodyTokens.has(token)) score += 1;
      }
      return { tip, score };
    });
  }

  retrieve(query: string, topK: number): TipSnippetT[] {
    if (!Number.isInteger(topK) || topK <= 0) return [];

    return this.score(query)
      .map((entry, position) => ({ ...entry, position }))
      .filter((entry) => entry.score > 0)
      .sort((a, b) => b.score - a.score || a.position - b.position)
      .slice(0, topK)
      .map(({ tip }) => ({ ...tip, tags: [...tip.tags] }));
  }
}

const CORPUS_CANDIDATES = [
  // src/tools/ → repo root
  "../../data/agronomy-tips.json",
  // dist/src/tools/ → repo root
  "../../../data/agronomy-tips.json",
];

/**
 * Load and validate the tip corpus. Without a path, looks for
 * data/agronomy-tips.json relative to this module (source or build layout).
 */
export function loadTipCorpus(path?: string): TipCorpusT {
  const candidates = path
    ? [path]
    : CORPUS_CANDIDATES.map((rel) => fileURLToPath(new URL(rel, import.meta.url)));

  let lastError: unknown;
  for (const candidate of candidates) {
    try {
      const raw: unknown = JSON.parse(readFileSync(candidate, "utf-8"));
      const corpus = TipCorpus.parse(raw);
      log.debug({ path: candidate, tips: corpus.tips.length }, "Loaded agronomy tip corpus");
      return corpus;
    } catch (error) {
      lastError = error;
    }
  }
  throw new Error(
    `Unable to load agronomy tip corpus: ${lastError instanceof Error ? lastError.message : String(lastError)}`,
  );
}

export function createDefaultRetriever(path?: string): LexicalKnowledgeRetriever {
  return new LexicalKnowledgeRetriever(loadTipCorpus(path).tips);
}
