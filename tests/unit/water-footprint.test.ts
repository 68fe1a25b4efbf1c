/**
 * Water footprint calculator tests
 */

import { describe, it, expect } from "vitest";
import { appliedDemandPerHa, computeWaterFootprint, formatM3 } from "../../src/tools/water-footprint.js";

describe("computeWaterFootprint", () => {
  it("computes per-crop and total demand under drip", () => {
    const result = computeWaterFootprint(
      [
        { crop: "wheat", areaHa: 2 },
        { crop: "rice", areaHa: 1 },
      ],
      "drip",
    );

    expect(result.efficiency).toBe(0.9);
    expect(result.crops.map((c) => c.crop)).toEqual(["wheat", "rice"]);
    expect(result.crops[0]?.etDemandM3).toBe(7000);
    expect(result.crops[1]?.etDemandM3).toBe(12000);
    expect(result.totalEtDemandM3).toBe(19000);
    expect(result.totalAppliedDemandM3).toBeCloseTo(19000 / 0.9, 6);
    expect(result.unresolvedCrops).toEqual([]);
    expect(result.assumptions).toEqual([
      "Assumed drip irrigation efficiency of 90%.",
      "ETc values are seasonal averages for semi-arid conditions.",
    ]);
  });

  it("flags high-water crops but suggests no drip switch when already on drip", () => {
    const result = computeWaterFootprint([{ crop: "rice", areaHa: 1 }], "drip");
    expect(result.recommendedSwitches).toEqual([
      "Reducing the rice area would cut water use sharply; it needs about 1200 mm per season.",
    ]);
  });

  it("assumes the least efficient method when irrigation is unknown", () => {
    const result = computeWaterFootprint([{ crop: "wheat", areaHa: 1 }], "unknown");

    expect(result.efficiency).toBe(0.5);
    expect(result.totalAppliedDemandM3).toBe(7000);
    expect(result.assumptions[0]).toBe(
      "Irrigation method unknown: assumed the least efficient method (50% efficiency).",
    );
    expect(result.recommendedSwitches).toEqual([
      "Switching to drip irrigation would lower applied water from 7,000 m³ to about 3,889 m³.",
    ]);
  });

  it("uses no losses for rain-fed fields", () => {
    const result = computeWaterFootprint([{ crop: "barley", areaHa: 3 }], "none");
    expect(result.totalAppliedDemandM3).toBe(result.totalEtDemandM3);
    expect(result.totalEtDemandM3).toBe(9600);
  });

  it("uses the default coefficient for crops outside the table", () => {
    const result = computeWaterFootprint([{ crop: "Quinoa", areaHa: 1 }], "flood");

    expect(result.crops[0]).toMatchObject({ crop: "quinoa", etcMm: 600, resolved: false });
    expect(result.totalAppliedDemandM3).toBe(12000);
    expect(result.unresolvedCrops).toEqual(["quinoa"]);
    expect(result.assumptions).toContain("No reference data for quinoa: used a default of 600 mm per season.");
  });

  it("merges duplicate crops and resolves aliases", () => {
    const result = computeWaterFootprint(
      [
        { crop: "maize", areaHa: 1 },
        { crop: "Corn", areaHa: 2 },
      ],
      "sprinkler",
    );
    expect(result.crops).toHaveLength(1);
    expect(result.crops[0]).toMatchObject({ crop: "corn", areaHa: 3, etDemandM3: 21000 });
  });

  it("treats invalid areas as zero", () => {
    const result = computeWaterFootprint([{ crop: "wheat", areaHa: -4 }], "drip");
    expect(result.crops[0]?.areaHa).toBe(0);
    expect(result.totalAppliedDemandM3).toBe(0);
    expect(result.assumptions).toContain("Invalid area for wheat treated as 0 ha.");
  });

  it("returns zero totals and no drip advice for an empty allocation", () => {
    const result = computeWaterFootprint([], "flood");
    expect(result.crops).toEqual([]);
    expect(result.totalAppliedDemandM3).toBe(0);
    expect(result.recommendedSwitches).toEqual([]);
  });
});

describe("appliedDemandPerHa", () => {
  it("divides seasonal demand per hectare by efficiency", () => {
    expect(appliedDemandPerHa("wheat", 0.5)).toBe(7000);
    expect(appliedDemandPerHa("unknown-crop", 1)).toBe(6000);
  });
});

describe("formatM3", () => {
  it("rounds and groups thousands", () => {
    expect(formatM3(33499.6)).toBe("33,500 m³");
  });
});
