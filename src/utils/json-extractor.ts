/**
 * JSON Extractor Utility
 *
 * Extracts JSON from model replies that may wrap it in conversational
 * preamble, suffix text or markdown code blocks.
 */

import { log } from "./telemetry.js";

export type ExtractionMethod = "fast_path" | "code_block" | "bracket_matching";

export interface JsonExtractionResult {
  /** The extracted and parsed JSON */
  json: unknown;
  /** Whether extraction was needed (true if raw content wasn't valid JSON) */
  wasExtracted: boolean;
  extractionMethod: ExtractionMethod;
}

export interface JsonExtractionOptions {
  /** Task name for logging (e.g., "profile_extraction") */
  task?: string;
  requestId?: string;
}

function tryParse(text: string): { ok: true; json: unknown } | { ok: false } {
  try {
    const json: unknown = JSON.parse(text);
    return { ok: true, json };
  } catch {
    return { ok: false };
  }
}

/**
 * Bracket-match from `startIndex` to the end of the enclosing structure,
 * skipping brackets inside strings.
 */
function extractWithBracketMatching(content: string, startIndex: number): { json: unknown } | null {
  const open = content[startIndex];
  if (open !== "{" && open !== "[") return null;

  let depth = 0;
  let inString = false;
  let escape = false;

  for (let i = startIndex; i < content.length; i++) {
    const char = content[i];

    if (escape) {
      escape = false;
      continue;
    }
    if (char === "\\") {
      escape = true;
      continue;
    }
    if (char === '"') {
      inString = !inString;
      continue;
    }
    if (inString) continue;

    if (char === "{" || char === "[") depth++;
    if (char === "}" || char === "]") depth--;

    if (depth === 0) {
      const parsed = tryParse(content.slice(startIndex, i + 1));
      return parsed.ok ? { json: parsed.json } : null;
    }
  }

  return null;
}

/**
 * Strategy, in order:
 * 1. parse the trimmed reply as-is
 * 2. the first markdown code block that parses
 * 3. bracket matching from each `{` or `[`
 *
 * @throws Error when no JSON can be found
 */
export function extractJsonFromResponse(
  content: string,
  options: JsonExtractionOptions = {},
): JsonExtractionResult {
  const trimmed = content.trim();

  const direct = tryParse(trimmed);
  if (direct.ok) {
    return { json: direct.json, wasExtracted: false, extractionMethod: "fast_path" };
  }

  const codeBlockRegex = /```(?:json)?\s*([\s\S]*?)```/g;
  for (const match of trimmed.matchAll(codeBlockRegex)) {
    const block = tryParse((match[1] ?? "").trim());
    if (block.ok) {
      log.debug({ task: options.task, request_id: options.requestId }, "JSON extracted from code block");
      return { json: block.json, wasExtracted: true, extractionMethod: "code_block" };
    }
  }

  for (let i = 0; i < trimmed.length; i++) {
    const char = trimmed[i];
    if (char !== "{" && char !== "[") continue;
    const result = extractWithBracketMatching(trimmed, i);
    if (result) {
      log.debug(
        { task: options.task, request_id: options.requestId, preamble_length: i },
        "JSON extracted via bracket matching",
      );
      return { json: result.json, wasExtracted: true, extractionMethod: "bracket_matching" };
    }
  }

  throw new Error(`No valid JSON found in model reply (${trimmed.length} chars)`);
}

/** Parsed JSON only, without extraction metadata. */
export function extractJson(content: string, options?: JsonExtractionOptions): unknown {
  return extractJsonFromResponse(content, options).json;
}
