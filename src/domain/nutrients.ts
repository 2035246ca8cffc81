// src/domain/nutrients.ts
// Vitamin and mineral catalog. Every nutrient value in the system is keyed by
// one of these ids, in storage, in AI estimates and in backup files.

export type NutrientCategory = "vitamin" | "mineral";

export const VITAMIN_IDS = [
  "vitaminA",
  "vitaminC",
  "vitaminD",
  "vitaminE",
  "vitaminK",
  "vitaminB1",
  "vitaminB2",
  "vitaminB3",
  "vitaminB5",
  "vitaminB6",
  "vitaminB7",
  "vitaminB12",
  "folate",
] as const;

export const MINERAL_IDS = [
  "calcium",
  "iron",
  "zinc",
  "magnesium",
  "potassium",
  "phosphorus",
  "selenium",
  "copper",
  "manganese",
  "chromium",
  "molybdenum",
  "iodine",
  "chloride",
] as const;

export const NUTRIENT_IDS = [...VITAMIN_IDS, ...MINERAL_IDS] as const;

export type NutrientId = (typeof NUTRIENT_IDS)[number];

/** Sparse nutrient values; a missing key means "unknown", not zero. */
export type NutrientMap = Partial<Record<NutrientId, number>>;

export interface NutrientDefinition {
  id: NutrientId;
  name: string;
  shortName: string;
  unit: "mg" | "mcg";
  /** Recommended daily intake (RDA/AI). */
  target: number;
  /** Tolerable upper intake level, when one is set. */
  upperLimit: number | null;
  category: NutrientCategory;
  decimalPlaces: number;
}

function vitamin(
  id: NutrientId,
  name: string,
  shortName: string,
  unit: "mg" | "mcg",
  target: number,
  upperLimit: number | null,
  decimalPlaces: number
): NutrientDefinition {
  return { id, name, shortName, unit, target, upperLimit, category: "vitamin", decimalPlaces };
}

function mineral(
  id: NutrientId,
  name: string,
  shortName: string,
  unit: "mg" | "mcg",
  target: number,
  upperLimit: number | null,
  decimalPlaces: number
): NutrientDefinition {
  return { id, name, shortName, unit, target, upperLimit, category: "mineral", decimalPlaces };
}

export const VITAMINS: readonly NutrientDefinition[] = [
  vitamin("vitaminA", "Vitamin A", "A", "mcg", 800, 3000, 1),
  vitamin("vitaminC", "Vitamin C", "C", "mg", 80, 2000, 1),
  vitamin("vitaminD", "Vitamin D", "D", "mcg", 10, 100, 1),
  vitamin("vitaminE", "Vitamin E", "E", "mg", 12, 540, 2),
  vitamin("vitaminK", "Vitamin K", "K", "mcg", 75, null, 1),
  vitamin("vitaminB1", "Vitamin B1 (Thiamin)", "B1", "mg", 1.1, null, 3),
  vitamin("vitaminB2", "Vitamin B2 (Riboflavin)", "B2", "mg", 1.4, null, 3),
  vitamin("vitaminB3", "Vitamin B3 (Niacin)", "B3", "mg", 16, 35, 1),
  vitamin("vitaminB5", "Vitamin B5 (Pantothenic Acid)", "B5", "mg", 5, null, 2),
  vitamin("vitaminB6", "Vitamin B6", "B6", "mg", 1.4, 25, 2),
  vitamin("vitaminB7", "Vitamin B7 (Biotin)", "B7", "mcg", 30, null, 1),
  vitamin("vitaminB12", "Vitamin B12", "B12", "mcg", 2.5, null, 2),
  vitamin("folate", "Folate (B9)", "Folate", "mcg", 400, 1000, 1),
];

export const MINERALS: readonly NutrientDefinition[] = [
  mineral("calcium", "Calcium", "Calcium", "mg", 1000, 2500, 0),
  mineral("iron", "Iron", "Iron", "mg", 14, 45, 1),
  mineral("zinc", "Zinc", "Zinc", "mg", 10, 25, 1),
  mineral("magnesium", "Magnesium", "Magnes.", "mg", 375, 400, 0),
  mineral("potassium", "Potassium", "Potass.", "mg", 3500, 6000, 0),
  mineral("phosphorus", "Phosphorus", "Phosph.", "mg", 700, 4000, 0),
  mineral("selenium", "Selenium", "Selenium", "mcg", 55, 400, 1),
  mineral("copper", "Copper", "Copper", "mg", 1, 5, 2),
  mineral("manganese", "Manganese", "Mangan.", "mg", 2, 11, 2),
  mineral("chromium", "Chromium", "Chromium", "mcg", 35, null, 1),
  mineral("molybdenum", "Molybdenum", "Molyb.", "mcg", 45, 2000, 1),
  mineral("iodine", "Iodine", "Iodine", "mcg", 150, 1100, 1),
  mineral("chloride", "Chloride", "Chloride", "mg", 2300, 3600, 0),
];

export const NUTRIENTS: readonly NutrientDefinition[] = [...VITAMINS, ...MINERALS];

const NUTRIENT_INDEX = new Map<string, NutrientDefinition>(NUTRIENTS.map((n) => [n.id, n]));

export function isNutrientId(value: string): value is NutrientId {
  return NUTRIENT_INDEX.has(value);
}

export function getNutrient(id: string): NutrientDefinition | undefined {
  return NUTRIENT_INDEX.get(id);
}

export interface NutrientProgress {
  percentOfTarget: number;
  overUpperLimit: boolean;
}

export function nutrientProgress(id: NutrientId, amount: number): NutrientProgress {
  const def = NUTRIENT_INDEX.get(id);
  if (!def) {
    return { percentOfTarget: 0, overUpperLimit: false };
  }
  return {
    percentOfTarget: def.target > 0 ? (amount / def.target) * 100 : 0,
    overUpperLimit: def.upperLimit !== null && amount > def.upperLimit,
  };
}

/**
 * Display string at the nutrient's catalog precision, e.g. "1.25 mg".
 */
export function formatNutrientAmount(id: NutrientId, amount: number): string {
  const def = NUTRIENT_INDEX.get(id);
  const places = def ? def.decimalPlaces : 1;
  const unit = def ? def.unit : "";
  return `${amount.toFixed(places)} ${unit}`.trim();
}

/**
 * Iterate the present entries of a map in catalog order.
 */
export function nutrientEntries(map: NutrientMap): Array<[NutrientId, number]> {
  const out: Array<[NutrientId, number]> = [];
  for (const id of NUTRIENT_IDS) {
    const value = map[id];
    if (value !== undefined) out.push([id, value]);
  }
  return out;
}

/**
 * Sum two maps. A key present in either input is present in the output.
 */
export function addNutrientMaps(a: NutrientMap, b: NutrientMap): NutrientMap {
  const out: NutrientMap = { ...a };
  for (const [id, value] of nutrientEntries(b)) {
    out[id] = (out[id] ?? 0) + value;
  }
  return out;
}
