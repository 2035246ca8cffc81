import { addNutrientMaps, NutrientMap } from "../domain/nutrients";
import type { DailyTargets, FoodEntry, SupplementEntry } from "../domain/types";

export interface DailyTotals {
  calories: number;
  protein: number;
  carbohydrates: number;
  fat: number;
  sugar: number | null;
  naturalSugar: number | null;
  addedSugar: number | null;
  fibre: number | null;
  sodium: number | null;
  nutrients: NutrientMap;
  caloriesRemaining: number;
  calorieProgress: number;
}

// Null when no entry states the field.
function sumKnown(values: Array<number | null>): number | null {
  let total: number | null = null;
  for (const v of values) {
    if (v !== null) total = (total ?? 0) + v;
  }
  return total;
}

export function computeDailyTotals(
  targets: Pick<DailyTargets, "calorieTarget">,
  entries: FoodEntry[],
  supplementEntries: SupplementEntry[] = []
): DailyTotals {
  const calories = entries.reduce((sum, e) => sum + e.calories, 0);

  let nutrients: NutrientMap = {};
  for (const e of entries) nutrients = addNutrientMaps(nutrients, e.nutrients);
  for (const s of supplementEntries) nutrients = addNutrientMaps(nutrients, s.nutrients);

  return {
    calories,
    protein: entries.reduce((sum, e) => sum + e.protein, 0),
    carbohydrates: entries.reduce((sum, e) => sum + e.carbohydrates, 0),
    fat: entries.reduce((sum, e) => sum + e.fat, 0),
    sugar: sumKnown(entries.map((e) => e.sugar)),
    naturalSugar: sumKnown(entries.map((e) => e.naturalSugar)),
    addedSugar: sumKnown(entries.map((e) => e.addedSugar)),
    fibre: sumKnown(entries.map((e) => e.fibre)),
    sodium: sumKnown(entries.map((e) => e.sodium)),
    nutrients,
    caloriesRemaining: targets.calorieTarget - calories,
    calorieProgress: targets.calorieTarget > 0 ? Math.min(calories / targets.calorieTarget, 1) : 0,
  };
}
