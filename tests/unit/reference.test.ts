import { describe, it, expect } from "vitest";
import { cropSurfaceForms, lowestDemandAlternative, resolveCrop } from "../../src/reference/crops.js";
import { irrigationEfficiency, isIrrigationType, isWaterLevel } from "../../src/reference/irrigation.js";

describe("resolveCrop", () => {
  it("resolves names, plurals and aliases", () => {
    expect(resolveCrop("Wheat")).toBe("wheat");
    expect(resolveCrop("tomatoes")).toBe("tomato");
    expect(resolveCrop("lentils")).toBe("lentil");
    expect(resolveCrop("maize")).toBe("corn");
    expect(resolveCrop("chick  pea")).toBe("chickpea");
  });

  it("returns undefined for unknown or blank names", () => {
    expect(resolveCrop("quinoa")).toBeUndefined();
    expect(resolveCrop("   ")).toBeUndefined();
  });
});

describe("cropSurfaceForms", () => {
  it("lists longer forms first", () => {
    const forms = cropSurfaceForms().map((f) => f.form);
    expect(forms.indexOf("chick pea")).toBeLessThan(forms.indexOf("chickpea"));
    expect(forms.indexOf("pistachio")).toBeLessThan(forms.indexOf("rice"));
  });
});

describe("lowestDemandAlternative", () => {
  it("prefers the same season", () => {
    expect(lowestDemandAlternative("summer", new Set(["rice"]))).toBe("millet");
    expect(lowestDemandAlternative("perennial", new Set(["alfalfa"]))).toBe("apple");
  });

  it("falls back to any season when the season is exhausted", () => {
    expect(lowestDemandAlternative("perennial", new Set(["alfalfa", "apple", "pistachio"]))).toBe("lentil");
  });
});

describe("irrigation reference", () => {
  it("maps unknown irrigation to flood efficiency", () => {
    expect(irrigationEfficiency("unknown")).toBe(0.5);
    expect(irrigationEfficiency("drip")).toBe(0.9);
  });

  it("checks vocabulary membership", () => {
    expect(isIrrigationType("furrow")).toBe(true);
    expect(isIrrigationType("pivot")).toBe(false);
    expect(isWaterLevel("medium")).toBe(true);
    expect(isWaterLevel("plenty")).toBe(false);
  });
});
