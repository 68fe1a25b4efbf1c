export const IRRIGATION_TYPES = ["none", "flood", "furrow", "sprinkler", "drip", "unknown"] as const;
export type IrrigationType = (typeof IRRIGATION_TYPES)[number];

export const WATER_LEVELS = ["low", "medium", "high", "unknown"] as const;
export type WaterLevel = (typeof WATER_LEVELS)[number];

export type DocumentedIrrigation = Exclude<IrrigationType, "unknown">;

/**
 * Share of applied water the crop actually uses, per method.
 * Rain-fed ("none") has no conveyance or application losses.
 */
export const IRRIGATION_EFFICIENCY: Readonly<Record<DocumentedIrrigation, number>> = {
  none: 1.0,
  flood: 0.5,
  furrow: 0.6,
  sprinkler: 0.75,
  drip: 0.9,
};

/** Least efficient documented method; used whenever the method is unknown. */
export const CONSERVATIVE_IRRIGATION: DocumentedIrrigation = "flood";

export function irrigationEfficiency(type: IrrigationType): number {
  return type === "unknown"
    ? IRRIGATION_EFFICIENCY[CONSERVATIVE_IRRIGATION]
    : IRRIGATION_EFFICIENCY[type];
}

export function isIrrigationType(value: string): value is IrrigationType {
  return IRRIGATION_TYPES.some((type) => type === value);
}

export function isWaterLevel(value: string): value is WaterLevel {
  return WATER_LEVELS.some((level) => level === value);
}
