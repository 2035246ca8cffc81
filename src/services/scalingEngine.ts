// src/services/scalingEngine.ts
// Amount-proportional scaling between per-100g / per-serving references and
// logged snapshots. No rounding happens here; display precision is applied by
// callers.

import { InvalidAmountError } from "../domain/errors";
import { nutrientEntries, NutrientMap } from "../domain/nutrients";
import type { FoodSnapshot, MacroSnapshot, Per100gNutrition, Supplement } from "../domain/types";

/**
 * How a snapshot splits sugar when the product does not.
 * - "declared": copy whatever the product states, absent stays absent.
 * - "undeclaredAsAdded": a product with total sugar but no natural/added split
 *   counts all of it as added sugar (natural becomes a present zero).
 */
export type SugarSplitPolicy = "declared" | "undeclaredAsAdded";

export interface ScaleOptions {
  sugarPolicy?: SugarSplitPolicy;
}

export interface RescaleOptions {
  /** Upper clamp for amounts typed in directly. */
  maxAmount?: number;
}

export interface RescaleResult {
  amount: number;
  snapshot: FoodSnapshot;
}

/** Smallest amount an entry may shrink to. */
export const MIN_ENTRY_AMOUNT = 1;

const OPTIONAL_MACROS = ["sugar", "naturalSugar", "addedSugar", "fibre", "sodium"] as const;

function assertPositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidAmountError(`${label} must be a positive number (got ${value})`);
  }
}

function scaleOptional(value: number | null, ratio: number): number | null {
  return value === null ? null : value * ratio;
}

export function scaleNutrients(map: NutrientMap, ratio: number): NutrientMap {
  const out: NutrientMap = {};
  for (const [id, value] of nutrientEntries(map)) {
    out[id] = value * ratio;
  }
  return out;
}

/**
 * Multiply every present field of a snapshot, zeros included.
 */
export function scaleSnapshot(source: FoodSnapshot, ratio: number): FoodSnapshot {
  const macros: MacroSnapshot = {
    calories: source.calories * ratio,
    protein: source.protein * ratio,
    carbohydrates: source.carbohydrates * ratio,
    fat: source.fat * ratio,
    sugar: null,
    naturalSugar: null,
    addedSugar: null,
    fibre: null,
    sodium: null,
  };
  for (const key of OPTIONAL_MACROS) {
    macros[key] = scaleOptional(source[key], ratio);
  }
  return { ...macros, nutrients: scaleNutrients(source.nutrients, ratio) };
}

function applySugarPolicy(snapshot: FoodSnapshot, policy: SugarSplitPolicy): FoodSnapshot {
  if (policy !== "undeclaredAsAdded") return snapshot;
  if (snapshot.sugar === null || snapshot.naturalSugar !== null || snapshot.addedSugar !== null) {
    return snapshot;
  }
  return { ...snapshot, addedSugar: snapshot.sugar, naturalSugar: 0 };
}

export function scaleFromPer100g(
  product: Per100gNutrition,
  grams: number,
  options: ScaleOptions = {}
): FoodSnapshot {
  assertPositive(grams, "grams");
  const snapshot = scaleSnapshot(product, grams / 100);
  return applySugarPolicy(snapshot, options.sugarPolicy ?? "declared");
}

export function scaleFromPortions(
  product: Per100gNutrition & { portionSize: number | null },
  portions: number,
  options: ScaleOptions = {}
): FoodSnapshot {
  if (product.portionSize === null) {
    throw new InvalidAmountError("Product has no portion size");
  }
  assertPositive(portions, "portions");
  return scaleFromPer100g(product, product.portionSize * portions, options);
}

export function scaleFromServings(
  supplement: Pick<Supplement, "servingSize" | "nutrients">,
  servings: number
): NutrientMap {
  assertPositive(servings, "servings");
  assertPositive(supplement.servingSize, "supplement serving size");
  return scaleNutrients(supplement.nutrients, servings / supplement.servingSize);
}

export function clampAmount(amount: number, maxAmount?: number): number {
  let clamped = Math.max(MIN_ENTRY_AMOUNT, amount);
  if (maxAmount !== undefined) {
    clamped = Math.min(clamped, maxAmount);
  }
  return clamped;
}

/**
 * Re-scale an existing snapshot from its current amount to a new one.
 * The ratio uses the entry's pre-change amount, so a zero amount cannot be
 * rescaled.
 */
export function rescale(
  entry: FoodSnapshot & { amount: number },
  newAmount: number,
  options: RescaleOptions = {}
): RescaleResult {
  if (!Number.isFinite(entry.amount) || entry.amount <= 0) {
    throw new InvalidAmountError(`Cannot rescale an entry with amount ${entry.amount}`);
  }
  if (!Number.isFinite(newAmount)) {
    throw new InvalidAmountError(`New amount must be a finite number (got ${newAmount})`);
  }
  const amount = clampAmount(newAmount, options.maxAmount);
  return { amount, snapshot: scaleSnapshot(entry, amount / entry.amount) };
}

/** Stepper-style change: no upper clamp. */
export function adjustAmount(entry: FoodSnapshot & { amount: number }, delta: number): RescaleResult {
  return rescale(entry, entry.amount + delta);
}

/**
 * Inverse of scaleFromPer100g: normalise a snapshot taken at weightGrams back
 * to a 100 g basis.
 */
export function derivePer100gFromWeight(snapshot: FoodSnapshot, weightGrams: number): Per100gNutrition {
  return scaleSnapshot(snapshot, 100 / Math.max(weightGrams, 1));
}

export function pickSnapshot(source: FoodSnapshot): FoodSnapshot {
  return scaleSnapshot(source, 1);
}
