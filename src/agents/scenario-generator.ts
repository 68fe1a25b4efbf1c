/**
 * Scenario Generator
 *
 * Builds alternative crop mixes that move area from the thirstiest crop to
 * lower-demand crops, and re-runs the footprint calculator for each one.
 *
 * Produces exactly two scenarios when the profile has crops:
 * - "conservative": 20% of the donor's area is shifted
 * - "water-saving-50": 50% of the donor's area is shifted
 */

import { CROP_REFERENCE, lowestDemandAlternative, resolveCrop } from "../reference/crops.js";
import { irrigationEfficiency } from "../reference/irrigation.js";
import { cropLabel, type FarmerProfileT } from "../schemas/farmer.js";
import {
  appliedDemandPerHa,
  computeWaterFootprint,
  type CropAllocation,
  type WaterFootprintResult,
} from "../tools/water-footprint.js";

export type ScenarioLabel = "conservative" | "water-saving-50";

export const SCENARIO_SHIFTS: ReadonlyArray<{ label: ScenarioLabel; fraction: number }> = [
  { label: "conservative", fraction: 0.2 },
  { label: "water-saving-50", fraction: 0.5 },
];

export interface Scenario {
  id: string;
  sequence: number;
  label: ScenarioLabel;
  /** crop → share of the land, summing to 1 */
  cropMix: Record<string, number>;
  areasHa: Record<string, number>;
  footprint: WaterFootprintResult;
  /** Relative to the current footprint of the same turn; 0 when that total is 0. */
  savingsPct: number;
  shiftedFrom: string;
  shiftedTo: string[];
  assumptions: string[];
  createdAt: string;
}

export interface BaselineAllocation {
  allocations: CropAllocation[];
  landHa: number;
  landAssumed: boolean;
}

/**
 * Equal split of the farmer's land across their crops. Unknown land size
 * falls back to `defaultLandHa`.
 */
export function baselineAllocation(profile: FarmerProfileT, defaultLandHa: number): BaselineAllocation {
  const landAssumed = profile.landSizeHa === "unknown";
  const landHa = profile.landSizeHa === "unknown" ? defaultLandHa : profile.landSizeHa;
  const crops = profile.mainCrops.map(cropLabel);
  const share = crops.length > 0 ? landHa / crops.length : 0;
  return {
    allocations: crops.map((crop) => ({ crop, areaHa: share })),
    landHa,
    landAssumed,
  };
}

export function landAssumptionLine(landHa: number): string {
  return `Land size unknown: assumed ${landHa} ha split equally across crops.`;
}

export interface GenerateOptions {
  defaultLandHa: number;
  /** Sequence number of the first scenario produced (history length + 1). */
  firstSequence?: number;
  now?: Date;
}

function savingsPct(current: WaterFootprintResult, scenario: WaterFootprintResult): number {
  const base = current.totalAppliedDemandM3;
  if (base <= 0) return 0;
  return ((base - scenario.totalAppliedDemandM3) / base) * 100;
}

function donorAndRecipients(
  crops: readonly string[],
  efficiency: number,
): { donor: string; recipients: string[] } | undefined {
  const first = crops[0];
  if (first === undefined) return undefined;

  let donor = first;
  let donorDemand = appliedDemandPerHa(first, efficiency);
  for (const crop of crops.slice(1)) {
    const demand = appliedDemandPerHa(crop, efficiency);
    if (demand > donorDemand) {
      donor = crop;
      donorDemand = demand;
    }
  }

  const recipients = crops.filter((crop) => appliedDemandPerHa(crop, efficiency) < donorDemand);
  if (recipients.length > 0) {
    return { donor, recipients };
  }

  const known = resolveCrop(donor);
  const season = known ? CROP_REFERENCE[known].season : undefined;
  const exclude = new Set(crops.map((crop) => resolveCrop(crop) ?? crop));
  // Same-season crop first; any season when that one is no lighter than the donor
  const alternative = [lowestDemandAlternative(season, exclude), lowestDemandAlternative(undefined, exclude)].find(
    (crop) => crop !== undefined && appliedDemandPerHa(crop, efficiency) < donorDemand,
  );
  return alternative === undefined ? undefined : { donor, recipients: [alternative] };
}

export function generateScenarios(
  profile: FarmerProfileT,
  currentFootprint: WaterFootprintResult,
  options: GenerateOptions,
): Scenario[] {
  const baseline = baselineAllocation(profile, options.defaultLandHa);
  const crops = baseline.allocations.map((a) => a.crop);
  const efficiency = irrigationEfficiency(profile.irrigationType);

  const pick = donorAndRecipients(crops, efficiency);
  if (!pick) return [];

  const { donor, recipients } = pick;
  const baseShare = 1 / crops.length;
  const createdAt = (options.now ?? new Date()).toISOString();
  const firstSequence = options.firstSequence ?? 1;

  return SCENARIO_SHIFTS.map(({ label, fraction }, index) => {
    const cropMix: Record<string, number> = {};
    for (const crop of crops) {
      cropMix[crop] = baseShare;
    }
    const moved = baseShare * fraction;
    cropMix[donor] = baseShare - moved;
    for (const recipient of recipients) {
      cropMix[recipient] = (cropMix[recipient] ?? 0) + moved / recipients.length;
    }

    const areasHa: Record<string, number> = {};
    for (const [crop, share] of Object.entries(cropMix)) {
      areasHa[crop] = share * baseline.landHa;
    }

    const footprint = computeWaterFootprint(
      Object.entries(areasHa).map(([crop, areaHa]) => ({ crop, areaHa })),
      profile.irrigationType,
    );

    const assumptions: string[] = [];
    if (baseline.landAssumed) {
      assumptions.push(landAssumptionLine(baseline.landHa));
    }
    assumptions.push(`Shifted ${Math.round(fraction * 100)}% of the ${donor} area to ${recipients.join(" and ")}.`);

    const sequence = firstSequence + index;
    return {
      id: `${label}-${sequence}`,
      sequence,
      label,
      cropMix,
      areasHa,
      footprint,
      savingsPct: savingsPct(currentFootprint, footprint),
      shiftedFrom: donor,
      shiftedTo: [...recipients],
      assumptions,
      createdAt,
    };
  });
}
