/**
 * Water Footprint Calculator
 *
 * Turns a crop allocation and irrigation method into per-crop and total water
 * demand. Pure function of its inputs and the reference tables.
 *
 *   ET demand (m³)      = ETc (mm) × area (ha) × 10
 *   applied demand (m³) = ET demand / irrigation efficiency
 *
 * Crops that do not resolve against the table use DEFAULT_ETC_MM and are
 * listed in `unresolvedCrops`; the rest of the mix is unaffected.
 */

import {
  CROP_REFERENCE,
  DEFAULT_ETC_MM,
  HIGH_WATER_ETC_MM,
  M3_PER_MM_HA,
  resolveCrop,
} from "../reference/crops.js";
import {
  IRRIGATION_EFFICIENCY,
  irrigationEfficiency,
  type IrrigationType,
} from "../reference/irrigation.js";

export interface CropAllocation {
  crop: string;
  areaHa: number;
}

export interface CropWaterDemand {
  /** Vocabulary token when resolved, otherwise the name as given. */
  crop: string;
  areaHa: number;
  etcMm: number;
  etDemandM3: number;
  appliedDemandM3: number;
  resolved: boolean;
}

export interface WaterFootprintResult {
  irrigationType: IrrigationType;
  efficiency: number;
  crops: CropWaterDemand[];
  totalEtDemandM3: number;
  totalAppliedDemandM3: number;
  unresolvedCrops: string[];
  recommendedSwitches: string[];
  assumptions: string[];
}

export function formatM3(value: number): string {
  return `${Math.round(value).toLocaleString("en-US")} m³`;
}

export function computeWaterFootprint(
  allocations: readonly CropAllocation[],
  irrigationType: IrrigationType,
): WaterFootprintResult {
  const efficiency = irrigationEfficiency(irrigationType);
  const assumptions: string[] = [];

  if (irrigationType === "unknown") {
    assumptions.push(
      `Irrigation method unknown: assumed the least efficient method (${Math.round(efficiency * 100)}% efficiency).`,
    );
  } else {
    assumptions.push(`Assumed ${irrigationType} irrigation efficiency of ${Math.round(efficiency * 100)}%.`);
  }
  assumptions.push("ETc values are seasonal averages for semi-arid conditions.");

  // Merge duplicate crops, keeping first-seen order
  const merged = new Map<string, CropWaterDemand>();
  for (const allocation of allocations) {
    let areaHa = allocation.areaHa;
    if (!Number.isFinite(areaHa) || areaHa < 0) {
      assumptions.push(`Invalid area for ${allocation.crop} treated as 0 ha.`);
      areaHa = 0;
    }

    const known = resolveCrop(allocation.crop);
    const key = known ?? allocation.crop.trim().toLowerCase();
    const etcMm = known ? CROP_REFERENCE[known].etcMm : DEFAULT_ETC_MM;

    const existing = merged.get(key);
    const totalArea = (existing?.areaHa ?? 0) + areaHa;
    const etDemandM3 = etcMm * totalArea * M3_PER_MM_HA;
    merged.set(key, {
      crop: key,
      areaHa: totalArea,
      etcMm,
      etDemandM3,
      appliedDemandM3: etDemandM3 / efficiency,
      resolved: known !== undefined,
    });
  }

  const crops = [...merged.values()];
  const unresolvedCrops = crops.filter((c) => !c.resolved).map((c) => c.crop);
  if (unresolvedCrops.length > 0) {
    assumptions.push(
      `No reference data for ${unresolvedCrops.join(", ")}: used a default of ${DEFAULT_ETC_MM} mm per season.`,
    );
  }

  const totalEtDemandM3 = crops.reduce((sum, c) => sum + c.etDemandM3, 0);
  const totalAppliedDemandM3 = crops.reduce((sum, c) => sum + c.appliedDemandM3, 0);

  const recommendedSwitches: string[] = [];
  for (const c of crops) {
    if (c.areaHa > 0 && c.etcMm >= HIGH_WATER_ETC_MM) {
      recommendedSwitches.push(
        `Reducing the ${c.crop} area would cut water use sharply; it needs about ${c.etcMm} mm per season.`,
      );
    }
  }
  if (
    (irrigationType === "flood" || irrigationType === "furrow" || irrigationType === "unknown") &&
    totalEtDemandM3 > 0
  ) {
    const dripApplied = totalEtDemandM3 / IRRIGATION_EFFICIENCY.drip;
    recommendedSwitches.push(
      `Switching to drip irrigation would lower applied water from ${formatM3(totalAppliedDemandM3)} to about ${formatM3(dripApplied)}.`,
    );
  }

  return {
    irrigationType,
    efficiency,
    crops,
    totalEtDemandM3,
    totalAppliedDemandM3,
    unresolvedCrops,
    recommendedSwitches,
    assumptions,
  };
}

/** Applied demand per hectare for a crop under a given efficiency. */
export function appliedDemandPerHa(crop: string, efficiency: number): number {
  const known = resolveCrop(crop);
  const etcMm = known ? CROP_REFERENCE[known].etcMm : DEFAULT_ETC_MM;
  return (etcMm * M3_PER_MM_HA) / efficiency;
}
