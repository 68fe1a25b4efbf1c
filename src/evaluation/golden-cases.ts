import type { IrrigationType, WaterLevel } from "../reference/irrigation.js";

export type GoldenAssertion =
  | { type: "profile_has_crops"; crops: string[] }
  | { type: "land_size"; hectares: number | "unknown"; tolerance?: number }
  | { type: "irrigation_type"; value: IrrigationType }
  | { type: "water_level"; value: WaterLevel }
  | { type: "region"; value: string }
  | { type: "footprint_positive" }
  | { type: "scenarios_decreasing" }
  | { type: "answer_non_empty" }
  | { type: "answer_mentions"; keywords: string[]; mode?: "any" | "all" };

export interface GoldenCase {
  id: string;
  description: string;
  /** Messages sent in order for the same farmer; assertions apply after the last. */
  turns: string[];
  assertions: GoldenAssertion[];
}

export const GOLDEN_CASES: readonly GoldenCase[] = [
  {
    id: "wheat-barley-limited-water",
    description: "Cereal farmer with limited water and known land size",
    turns: ["I have 5 hectares of wheat and barley, water is limited"],
    assertions: [
      { type: "profile_has_crops", crops: ["wheat", "barley"] },
      { type: "land_size", hectares: 5 },
      { type: "water_level", value: "low" },
      { type: "footprint_positive" },
      { type: "scenarios_decreasing" },
      { type: "answer_non_empty" },
    ],
  },
  {
    id: "rice-tomato-flood",
    description: "High-water crops under flood irrigation",
    turns: ["I have 3 hectares with rice and tomato. Water is low. Using flood irrigation."],
    assertions: [
      { type: "profile_has_crops", crops: ["rice", "tomato"] },
      { type: "land_size", hectares: 3 },
      { type: "irrigation_type", value: "flood" },
      { type: "water_level", value: "low" },
      { type: "footprint_positive" },
      { type: "scenarios_decreasing" },
      { type: "answer_mentions", keywords: ["rice", "tomato", "water"], mode: "any" },
    ],
  },
  {
    id: "pistachio-tomato-drip",
    description: "Orchard and vegetables on drip, land size not stated",
    turns: ["I farm in Isfahan. I grow pistachio and tomatoes with drip irrigation."],
    assertions: [
      { type: "profile_has_crops", crops: ["pistachio", "tomato"] },
      { type: "land_size", hectares: "unknown" },
      { type: "irrigation_type", value: "drip" },
      { type: "region", value: "Isfahan" },
      { type: "footprint_positive" },
      { type: "scenarios_decreasing" },
    ],
  },
  {
    id: "corn-multi-turn",
    description: "Profile built up over two messages without losing earlier facts",
    turns: ["I grow corn on 4 hectares.", "We switched to sprinkler irrigation and water is scarce."],
    assertions: [
      { type: "profile_has_crops", crops: ["corn"] },
      { type: "land_size", hectares: 4 },
      { type: "irrigation_type", value: "sprinkler" },
      { type: "water_level", value: "low" },
      { type: "scenarios_decreasing" },
      { type: "answer_non_empty" },
    ],
  },
  {
    id: "alfalfa-acres",
    description: "Land stated in acres",
    turns: ["My family has 10 acres of alfalfa, flood irrigated."],
    assertions: [
      { type: "profile_has_crops", crops: ["alfalfa"] },
      { type: "land_size", hectares: 4.0469, tolerance: 0.001 },
      { type: "irrigation_type", value: "flood" },
      { type: "footprint_positive" },
      { type: "scenarios_decreasing" },
    ],
  },
];
