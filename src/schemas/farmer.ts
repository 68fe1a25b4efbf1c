import { z } from "zod";
import { KNOWN_CROPS } from "../reference/crops.js";
import { IRRIGATION_TYPES, WATER_LEVELS } from "../reference/irrigation.js";

export const KnownCropSchema = z.enum(KNOWN_CROPS);
export const IrrigationTypeSchema = z.enum(IRRIGATION_TYPES);
export const WaterLevelSchema = z.enum(WATER_LEVELS);

/**
 * A crop the farmer grows. Crops outside the vocabulary are kept as
 * "other" with the farmer's own wording in `detail`.
 */
export const CropEntry = z.object({
  crop: z.union([KnownCropSchema, z.literal("other")]),
  detail: z.string().min(1).max(60).optional(),
});

export const LandSize = z.union([z.number().nonnegative().finite(), z.literal("unknown")]);

export const FarmerProfile = z.object({
  farmerId: z.string().min(1),
  mainCrops: z.array(CropEntry),
  landSizeHa: LandSize,
  irrigationType: IrrigationTypeSchema,
  waterLevel: WaterLevelSchema,
  region: z.string().min(1),
  notes: z.array(z.string()),
  revision: z.number().int().nonnegative(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

/**
 * Partial profile change produced by the profiler. "unknown" values are
 * accepted but never overwrite stored values. `mainCrops` adds to the stored
 * crops unless `replaceCrops` is set; `droppedCrops` are removed.
 */
export const ProfileUpdate = z.object({
  mainCrops: z.array(CropEntry).optional(),
  droppedCrops: z.array(CropEntry).optional(),
  replaceCrops: z.boolean().optional(),
  landSizeHa: LandSize.optional(),
  irrigationType: IrrigationTypeSchema.optional(),
  waterLevel: WaterLevelSchema.optional(),
  region: z.string().min(1).optional(),
  notes: z.array(z.string()).optional(),
});

/**
 * Raw model reply for profile extraction. Deliberately loose: values are
 * checked against the vocabularies field by field in the profiler.
 */
export const ModelProfileExtraction = z
  .object({
    crops: z.array(z.string()).nullable().optional(),
    land_size_ha: z.union([z.number(), z.string()]).nullable().optional(),
    irrigation_type: z.string().nullable().optional(),
    water_level: z.string().nullable().optional(),
    region: z.string().nullable().optional(),
    notes: z.string().nullable().optional(),
  })
  .passthrough();

export type CropEntryT = z.infer<typeof CropEntry>;
export type LandSizeT = z.infer<typeof LandSize>;
export type FarmerProfileT = z.infer<typeof FarmerProfile>;
export type ProfileUpdateT = z.infer<typeof ProfileUpdate>;
export type ModelProfileExtractionT = z.infer<typeof ModelProfileExtraction>;

/** Crop name used for computation: vocabulary token, or the farmer's wording. */
export function cropLabel(entry: CropEntryT): string {
  return entry.crop === "other" ? entry.detail ?? "other" : entry.crop;
}
