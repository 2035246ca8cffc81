import type { NutrientMap } from "./nutrients";

/**
 * Macro values held by a logged entry or an AI template. The four core macros
 * are always known; the rest are null when the source did not state them.
 */
export interface MacroSnapshot {
  calories: number;
  protein: number;
  carbohydrates: number;
  fat: number;
  sugar: number | null;
  naturalSugar: number | null;
  addedSugar: number | null;
  fibre: number | null;
  sodium: number | null; // mg
}

/** Amount-scaled, frozen copy of nutrition values. */
export interface FoodSnapshot extends MacroSnapshot {
  nutrients: NutrientMap;
}

/** Values normalised to a 100 g basis. */
export type Per100gNutrition = FoodSnapshot;

export interface Product extends Per100gNutrition {
  id: string;
  name: string;
  barcode: string | null;
  brand: string | null;
  emoji: string | null;
  servingSize: number;
  servingSizeUnit: string;
  portionSize: number | null; // grams per portion
  portionsPerPackage: number | null;
  saturatedFat: number | null;
  transFat: number | null;
  cholesterol: number | null;
  imageData: Buffer | null;
  mainImageData: Buffer | null;
  notes: string | null;
  isCustom: boolean;
  dateAdded: Date;
}

export interface FoodEntry extends FoodSnapshot {
  id: string;
  productId: string | null;
  productName: string | null; // name at time of entry
  customFoodName: string | null;
  dailyLogId: string | null;
  amount: number;
  unit: string;
  timestamp: Date;
  aiGenerated: boolean;
  aiPrompt: string | null;
}

export interface DailyLog {
  id: string;
  date: Date; // local midnight
  calorieTarget: number;
  proteinTarget: number;
  carbTarget: number;
  fatTarget: number;
}

export type DailyTargets = Pick<DailyLog, "calorieTarget" | "proteinTarget" | "carbTarget" | "fatTarget">;

export interface AIFoodTemplate extends FoodSnapshot {
  id: string;
  name: string;
  emoji: string | null;
  amount: number;
  unit: string;
  weightInGrams: number;
  aiPrompt: string | null;
  dateCreated: Date;
  lastUsed: Date;
  useCount: number;
}

export const DOSAGE_FORMS = ["tablet", "capsule", "softgel", "gummy", "liquid", "powder"] as const;

export type DosageForm = (typeof DOSAGE_FORMS)[number];

export interface Supplement {
  id: string;
  name: string;
  brand: string | null;
  dosageForm: DosageForm;
  servingSize: number; // units per serving
  servingSizeUnit: string;
  nutrients: NutrientMap; // per serving
  notes: string | null;
  imageData: Buffer | null;
  dateAdded: Date;
}

export interface SupplementEntry {
  id: string;
  supplementId: string | null;
  supplementName: string | null;
  dailyLogId: string | null;
  amount: number; // units taken
  unit: string;
  timestamp: Date;
  nutrients: NutrientMap;
}

/** Entity tables of the store, keyed by the name each has in backup files. */
export interface EntityTypes {
  products: Product;
  supplements: Supplement;
  dailyLogs: DailyLog;
  foodEntries: FoodEntry;
  supplementEntries: SupplementEntry;
  aiTemplates: AIFoodTemplate;
}

export type EntityKind = keyof EntityTypes;

export const ENTITY_KINDS: readonly EntityKind[] = [
  "products",
  "supplements",
  "dailyLogs",
  "foodEntries",
  "supplementEntries",
  "aiTemplates",
];

export type EntityGraph = { [K in EntityKind]: EntityTypes[K][] };
