import type { DailyTargets } from "../domain/types";
import type { SugarSplitPolicy } from "./scalingEngine";

export interface NutritionSettings {
  /** Targets given to a newly created daily log. */
  defaultTargets: DailyTargets;
  /** Upper clamp for amounts typed in directly. */
  maxEntryAmount: number;
  sugarPolicy: SugarSplitPolicy;
}

export const DEFAULT_SETTINGS: NutritionSettings = {
  defaultTargets: {
    calorieTarget: 2000,
    proteinTarget: 50,
    carbTarget: 250,
    fatTarget: 65,
  },
  maxEntryAmount: 5000,
  sugarPolicy: "declared",
};
