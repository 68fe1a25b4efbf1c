/**
 * Memory Bank
 *
 * Process-lifetime store of farmer profiles and generated scenario history,
 * keyed by farmer id. Every method is synchronous, so no two calls can
 * interleave; the planner holds the per-farmer lock across a whole turn.
 *
 * Callers always receive copies; stored state changes only through
 * updateProfile() and appendScenarios().
 */

import type { FarmerProfileT, ProfileUpdateT, CropEntryT } from "../schemas/farmer.js";
import type { Scenario } from "../agents/scenario-generator.js";

/** Stored notes are capped; the oldest go first. */
export const MAX_NOTES = 20;

export type Clock = () => Date;

function requireFarmerId(farmerId: string): string {
  const id = farmerId.trim();
  if (!id) {
    throw new Error("farmer_id_required");
  }
  return id;
}

export function createDefaultProfile(farmerId: string, now: Date): FarmerProfileT {
  const timestamp = now.toISOString();
  return {
    farmerId,
    mainCrops: [],
    landSizeHa: "unknown",
    irrigationType: "unknown",
    waterLevel: "unknown",
    region: "unknown",
    notes: [],
    revision: 0,
    createdAt: timestamp,
    updatedAt: timestamp,
  };
}

function cropKey(entry: CropEntryT): string {
  return entry.crop === "other" ? `other:${(entry.detail ?? "").toLowerCase()}` : entry.crop;
}

function dedupeCrops(crops: readonly CropEntryT[]): CropEntryT[] {
  const seen = new Set<string>();
  const result: CropEntryT[] = [];
  for (const entry of crops) {
    const key = cropKey(entry);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push({ ...entry });
  }
  return result;
}

function sameCrops(a: readonly CropEntryT[], b: readonly CropEntryT[]): boolean {
  return (
    a.length === b.length &&
    a.every((entry, i) => entry.crop === b[i]?.crop && entry.detail === b[i]?.detail)
  );
}

/**
 * Apply a partial update with merge semantics:
 * - "unknown" never overwrites a stored value
 * - any other explicit value overwrites
 * - stated crops join the stored set; a crop leaves it only when the update
 *   drops it, or when `replaceCrops` comes with a non-empty list
 * - notes are appended without duplicates, keeping the latest MAX_NOTES
 *
 * Returns a new profile; `revision` increases only when something changed.
 */
export function mergeProfile(profile: FarmerProfileT, update: ProfileUpdateT, now: Date): FarmerProfileT {
  const next: FarmerProfileT = structuredClone(profile);
  let changed = false;

  const dropped = new Set((update.droppedCrops ?? []).map(cropKey));
  const stated = dedupeCrops(update.mainCrops ?? []).filter((entry) => !dropped.has(cropKey(entry)));
  const crops =
    update.replaceCrops && stated.length > 0
      ? stated
      : dedupeCrops([...next.mainCrops.filter((entry) => !dropped.has(cropKey(entry))), ...stated]);
  if (!sameCrops(crops, next.mainCrops)) {
    next.mainCrops = crops;
    changed = true;
  }

  if (update.landSizeHa !== undefined && update.landSizeHa !== "unknown" && update.landSizeHa !== next.landSizeHa) {
    next.landSizeHa = update.landSizeHa;
    changed = true;
  }

  if (update.irrigationType && update.irrigationType !== "unknown" && update.irrigationType !== next.irrigationType) {
    next.irrigationType = update.irrigationType;
    changed = true;
  }

  if (update.waterLevel && update.waterLevel !== "unknown" && update.waterLevel !== next.waterLevel) {
    next.waterLevel = update.waterLevel;
    changed = true;
  }

  if (update.region && update.region !== "unknown" && update.region !== next.region) {
    next.region = update.region;
    changed = true;
  }

  for (const note of update.notes ?? []) {
    const trimmed = note.trim();
    if (trimmed && !next.notes.includes(trimmed)) {
      next.notes.push(trimmed);
      changed = true;
    }
  }
  if (next.notes.length > MAX_NOTES) {
    next.notes = next.notes.slice(-MAX_NOTES);
  }

  if (changed) {
    next.revision += 1;
    next.updatedAt = now.toISOString();
  }
  return next;
}

export class MemoryBank {
  private readonly profiles = new Map<string, FarmerProfileT>();
  private readonly scenarios = new Map<string, Scenario[]>();

  constructor(private readonly clock: Clock = () => new Date()) {}

  /**
   * Fetch a farmer's profile, creating an all-"unknown" profile on first access.
   */
  getOrCreateProfile(farmerId: string): FarmerProfileT {
    const id = requireFarmerId(farmerId);
    let profile = this.profiles.get(id);
    if (!profile) {
      profile = createDefaultProfile(id, this.clock());
      this.profiles.set(id, profile);
    }
    return structuredClone(profile);
  }

  getProfile(farmerId: string): FarmerProfileT | undefined {
    const profile = this.profiles.get(farmerId.trim());
    return profile ? structuredClone(profile) : undefined;
  }

  updateProfile(farmerId: string, update: ProfileUpdateT): FarmerProfileT {
    const id = requireFarmerId(farmerId);
    const current = this.profiles.get(id) ?? createDefaultProfile(id, this.clock());
    const next = mergeProfile(current, update, this.clock());
    this.profiles.set(id, next);
    return structuredClone(next);
  }

  /**
   * Append scenarios to the farmer's history. Returns the new history length.
   */
  appendScenarios(farmerId: string, scenarios: readonly Scenario[]): number {
    const id = requireFarmerId(farmerId);
    const history = this.scenarios.get(id) ?? [];
    for (const scenario of scenarios) {
      history.push(structuredClone(scenario));
    }
    this.scenarios.set(id, history);
    return history.length;
  }

  listScenarios(farmerId: string): Scenario[] {
    return structuredClone(this.scenarios.get(farmerId.trim()) ?? []);
  }

  /** Read-only enumeration for inspection. */
  listProfiles(): FarmerProfileT[] {
    return [...this.profiles.values()].map((profile) => structuredClone(profile));
  }

  get size(): number {
    return this.profiles.size;
  }
}
