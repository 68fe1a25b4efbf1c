/**
 * Deterministic keyword extraction of profile fields from a farmer message.
 * Runs before (and independently of) the language model.
 *
 * Only statements count: questions and hypotheticals ("Would drip help?",
 * "what if I grew barley") are skipped sentence by sentence. A crop mention
 * adds to the stored list; crops the farmer says they dropped are removed,
 * and "now only grow X" replaces the list.
 */

import { cropSurfaceForms } from "../reference/crops.js";
import type { IrrigationType, WaterLevel } from "../reference/irrigation.js";
import type { CropEntryT, ProfileUpdateT } from "../schemas/farmer.js";

export const HA_PER_ACRE = 0.404686;

const IRRIGATION_KEYWORDS: ReadonlyArray<{ pattern: RegExp; type: IrrigationType }> = [
  { pattern: /\b(?:drip|trickle)\b/, type: "drip" },
  { pattern: /\b(?:sprinklers?|centre pivot|center pivot)\b/, type: "sprinkler" },
  { pattern: /\bfurrows?\b/, type: "furrow" },
  { pattern: /\b(?:flood(?:ing|ed)?|basin irrigation)\b/, type: "flood" },
  { pattern: /\b(?:rain-?fed|no irrigation|do not irrigate|don't irrigate)\b/, type: "none" },
];

const WATER_LEVEL_KEYWORDS: ReadonlyArray<{ pattern: RegExp; level: WaterLevel }> = [
  {
    pattern: /\b(?:water is (?:very )?(?:limited|scarce|low)|limited water|low water|little water|water shortage|scarce water|drought)\b/,
    level: "low",
  },
  { pattern: /\b(?:enough water|plenty of water|abundant water|water is (?:plentiful|abundant|sufficient))\b/, level: "high" },
  { pattern: /\b(?:some water|moderate water|water is (?:moderate|ok|okay|average))\b/, level: "medium" },
];

const LAND_PATTERN = /(\d+(?:\.\d+)?)\s*(hectares?|ha|acres?)\b/i;

const REGION_PATTERNS: readonly RegExp[] = [
  /\b(?:live|living|farm|farming|located|based)\s+(?:in|near)\s+(?:the\s+)?(\p{Lu}[\p{L}-]+(?:\s+\p{Lu}[\p{L}-]+)?)/u,
  /\b(\p{Lu}[\p{L}-]+)\s+(?:region|province|district|valley)\b/u,
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

const CROP_MATCHERS = cropSurfaceForms().map(({ form, crop }) => ({
  crop,
  pattern: new RegExp(`\\b${escapeRegExp(form).replace(/ /g, "\\s+")}(?:es|s)?\\b`, "g"),
}));

// A crop right after one of these is one the farmer no longer grows
const DROPPED_BEFORE = /(?:instead of|no longer grow(?:ing)?|stopped growing|gave up|replaced|(?:switched|moved|changed) (?:over )?from)\s+(?:the\s+|my\s+|our\s+)?$/;

const EXCLUSIVE_CROPS = /\b(?:now only|only grow|just grow|switched (?:over )?to|changed to)\b/;

const INTERROGATIVE_START = /^(?:would|should|could|can|will|what|how|which|why|is|are|do|does|did)\b/;
const HYPOTHETICAL = /\b(?:what if|suppose|imagine|if (?:i|we))\b/;

interface CropMentions {
  grown: CropEntryT[];
  dropped: CropEntryT[];
  exclusive: boolean;
}

function uniqueCrops(found: ReadonlyArray<{ crop: CropEntryT["crop"]; index: number }>): CropEntryT[] {
  const seen = new Set<string>();
  return [...found]
    .sort((a, b) => a.index - b.index)
    .filter(({ crop }) => {
      if (seen.has(crop)) return false;
      seen.add(crop);
      return true;
    })
    .map(({ crop }) => ({ crop }));
}

function extractCrops(sentences: readonly string[]): CropMentions {
  const grown: Array<{ crop: CropEntryT["crop"]; index: number }> = [];
  const dropped: Array<{ crop: CropEntryT["crop"]; index: number }> = [];
  let exclusive = false;
  let offset = 0;

  for (const sentence of sentences) {
    const claimed: Array<[number, number]> = [];
    let droppedHere = false;
    const grownHere: typeof grown = [];

    // Longest surface forms first, so "chick pea" wins over shorter overlaps
    for (const { crop, pattern } of CROP_MATCHERS) {
      for (const match of sentence.matchAll(pattern)) {
        const start = match.index ?? 0;
        const end = start + match[0].length;
        if (claimed.some(([s, e]) => start < e && end > s)) continue;
        claimed.push([start, end]);
        if (DROPPED_BEFORE.test(sentence.slice(0, start))) {
          dropped.push({ crop, index: offset + start });
          droppedHere = true;
        } else {
          grownHere.push({ crop, index: offset + start });
        }
      }
    }

    grown.push(...grownHere);
    // "switched from wheat to barley" swaps one crop; it does not replace the list
    if (grownHere.length > 0 && !droppedHere && EXCLUSIVE_CROPS.test(sentence)) {
      exclusive = true;
    }
    offset += sentence.length + 1;
  }

  const droppedCrops = uniqueCrops(dropped);
  const droppedSet = new Set(droppedCrops.map((entry) => entry.crop));
  return {
    grown: uniqueCrops(grown).filter((entry) => !droppedSet.has(entry.crop)),
    dropped: droppedCrops,
    exclusive,
  };
}

/**
 * Sentences that state something. Questions and hypotheticals are dropped;
 * a sentence boundary is ., ! or ? followed by whitespace, or a line break,
 * so "2.5 ha" stays whole.
 */
export function statementSentences(text: string): string[] {
  return text
    .split(/(?<=[.!?])\s+|\n+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => {
      if (!sentence) return false;
      const lower = sentence.toLowerCase();
      return !lower.endsWith("?") && !INTERROGATIVE_START.test(lower) && !HYPOTHETICAL.test(lower);
    });
}

function extractLandSize(text: string): number | undefined {
  const match = LAND_PATTERN.exec(text);
  if (!match?.[1] || !match[2]) return undefined;
  const value = Number.parseFloat(match[1]);
  if (!Number.isFinite(value) || value < 0) return undefined;
  if (match[2].toLowerCase().startsWith("acre")) {
    return Math.round(value * HA_PER_ACRE * 10_000) / 10_000;
  }
  return value;
}

function firstKeyword<E extends { pattern: RegExp }>(lower: string, table: readonly E[]): E | undefined {
  let best: { index: number; entry: E } | undefined;
  for (const entry of table) {
    const match = entry.pattern.exec(lower);
    if (match && (best === undefined || match.index < best.index)) {
      best = { index: match.index, entry };
    }
  }
  return best?.entry;
}

function extractRegion(text: string): string | undefined {
  for (const pattern of REGION_PATTERNS) {
    const region = pattern.exec(text)?.[1];
    if (region) return region;
  }
  return undefined;
}

/**
 * Keyword pass over the message. Fields that are not mentioned are left out
 * of the update rather than set to "unknown".
 */
export function extractProfileHeuristically(text: string): ProfileUpdateT {
  const statements = statementSentences(text);
  const original = statements.join(" ");
  const lower = original.toLowerCase();
  const update: ProfileUpdateT = {};

  const crops = extractCrops(statements.map((sentence) => sentence.toLowerCase()));
  if (crops.grown.length > 0) update.mainCrops = crops.grown;
  if (crops.dropped.length > 0) update.droppedCrops = crops.dropped;
  if (crops.exclusive) update.replaceCrops = true;

  const landSizeHa = extractLandSize(original);
  if (landSizeHa !== undefined) update.landSizeHa = landSizeHa;

  const irrigation = firstKeyword(lower, IRRIGATION_KEYWORDS);
  if (irrigation) update.irrigationType = irrigation.type;

  const water = firstKeyword(lower, WATER_LEVEL_KEYWORDS);
  if (water) update.waterLevel = water.level;

  const region = extractRegion(original);
  if (region) update.region = region;

  return update;
}
