/**
 * Crop reference table.
 *
 * ETc values are seasonal crop water use in millimetres under typical
 * semi-arid conditions. 1 mm over 1 ha is 10 m³.
 */

export const KNOWN_CROPS = [
  "wheat",
  "barley",
  "rice",
  "corn",
  "sorghum",
  "millet",
  "chickpea",
  "lentil",
  "alfalfa",
  "tomato",
  "cucumber",
  "eggplant",
  "pepper",
  "potato",
  "onion",
  "pistachio",
  "apple",
] as const;

export type KnownCrop = (typeof KNOWN_CROPS)[number];

export type CropSeason = "winter" | "summer" | "perennial";

export interface CropReference {
  etcMm: number;
  season: CropSeason;
}

export const CROP_REFERENCE: Readonly<Record<KnownCrop, CropReference>> = {
  wheat: { etcMm: 350, season: "winter" },
  barley: { etcMm: 320, season: "winter" },
  rice: { etcMm: 1200, season: "summer" },
  corn: { etcMm: 700, season: "summer" },
  sorghum: { etcMm: 450, season: "summer" },
  millet: { etcMm: 350, season: "summer" },
  chickpea: { etcMm: 300, season: "winter" },
  lentil: { etcMm: 280, season: "winter" },
  alfalfa: { etcMm: 1100, season: "perennial" },
  tomato: { etcMm: 600, season: "summer" },
  cucumber: { etcMm: 550, season: "summer" },
  eggplant: { etcMm: 580, season: "summer" },
  pepper: { etcMm: 520, season: "summer" },
  potato: { etcMm: 500, season: "summer" },
  onion: { etcMm: 450, season: "summer" },
  pistachio: { etcMm: 850, season: "perennial" },
  apple: { etcMm: 750, season: "perennial" },
};

/** Coefficient applied to crops that do not resolve against the table. */
export const DEFAULT_ETC_MM = 600;

/** Seasonal ETc at or above which a crop counts as water-hungry. */
export const HIGH_WATER_ETC_MM = 900;

export const M3_PER_MM_HA = 10;

const CROP_ALIASES: Readonly<Record<string, KnownCrop>> = {
  maize: "corn",
  paddy: "rice",
  lucerne: "alfalfa",
  aubergine: "eggplant",
  capsicum: "pepper",
  "chick pea": "chickpea",
  garbanzo: "chickpea",
};

function isKnownCrop(value: string): value is KnownCrop {
  return KNOWN_CROPS.some((crop) => crop === value);
}

/**
 * Resolve a free-text crop name to a vocabulary token.
 * Accepts aliases and simple English plurals ("tomatoes", "lentils").
 */
export function resolveCrop(name: string): KnownCrop | undefined {
  const normalised = name.trim().toLowerCase().replace(/\s+/g, " ");
  if (!normalised) return undefined;

  const candidates = [normalised];
  if (normalised.endsWith("es")) candidates.push(normalised.slice(0, -2));
  if (normalised.endsWith("s")) candidates.push(normalised.slice(0, -1));

  for (const candidate of candidates) {
    if (isKnownCrop(candidate)) return candidate;
    const alias = CROP_ALIASES[candidate];
    if (alias) return alias;
  }
  return undefined;
}

/** Every surface form the keyword extractor looks for, longest first. */
export function cropSurfaceForms(): Array<{ form: string; crop: KnownCrop }> {
  const forms: Array<{ form: string; crop: KnownCrop }> = [];
  for (const crop of KNOWN_CROPS) {
    forms.push({ form: crop, crop });
  }
  for (const [form, crop] of Object.entries(CROP_ALIASES)) {
    forms.push({ form, crop });
  }
  return forms.sort((a, b) => b.form.length - a.form.length);
}

/**
 * Lowest-demand vocabulary crop outside `exclude`, preferring the given season.
 * Ties keep table order.
 */
export function lowestDemandAlternative(
  season: CropSeason | undefined,
  exclude: ReadonlySet<string>,
): KnownCrop | undefined {
  const pick = (filter: (crop: KnownCrop) => boolean): KnownCrop | undefined => {
    let best: KnownCrop | undefined;
    for (const crop of KNOWN_CROPS) {
      if (exclude.has(crop) || !filter(crop)) continue;
      if (best === undefined || CROP_REFERENCE[crop].etcMm < CROP_REFERENCE[best].etcMm) {
        best = crop;
      }
    }
    return best;
  };

  return (season ? pick((crop) => CROP_REFERENCE[crop].season === season) : undefined)
    ?? pick(() => true);
}
