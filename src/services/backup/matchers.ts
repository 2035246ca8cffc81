// src/services/backup/matchers.ts
// Identity rules used when importing a backup: one named function per entity
// type deciding whether an incoming entity "is" an existing one.
//
// These are heuristics. Known behaviour:
// - Products: a barcode match wins; a product whose barcode is new but whose
//   name and brand equal an existing one is still treated as the same product.
// - Daily logs: one per local calendar day, targets are ignored.
// - Food entries: two distinct entries logged within the same second with the
//   same calories are indistinguishable (false positive); an entry whose
//   calories were edited after export no longer matches (false negative).
// - Templates: names are compared case-insensitively, so "Apple" and "apple"
//   collapse into one template.

import type { AIFoodTemplate, DailyLog, FoodEntry, Product, Supplement, SupplementEntry } from "../../domain/types";
import { isSameLocalDay } from "../../utils/date";

/** ±1 s window for entry timestamps. */
export const ENTRY_TIMESTAMP_TOLERANCE_MS = 1000;

export function findMatchingProduct(
  incoming: Pick<Product, "barcode" | "name" | "brand">,
  candidates: Product[]
): Product | undefined {
  if (incoming.barcode) {
    const byBarcode = candidates.find((p) => p.barcode === incoming.barcode);
    if (byBarcode) return byBarcode;
  }
  return candidates.find((p) => p.name === incoming.name && p.brand === incoming.brand);
}

export function findMatchingSupplement(
  incoming: Pick<Supplement, "name" | "brand">,
  candidates: Supplement[]
): Supplement | undefined {
  return candidates.find((s) => s.name === incoming.name && s.brand === incoming.brand);
}

export function findMatchingDailyLog(incoming: Pick<DailyLog, "date">, candidates: DailyLog[]): DailyLog | undefined {
  return candidates.find((l) => isSameLocalDay(l.date, incoming.date));
}

function withinTolerance(a: Date, b: Date): boolean {
  return Math.abs(a.getTime() - b.getTime()) <= ENTRY_TIMESTAMP_TOLERANCE_MS;
}

export function findMatchingFoodEntry(
  incoming: Pick<FoodEntry, "timestamp" | "calories">,
  candidates: FoodEntry[]
): FoodEntry | undefined {
  return candidates.find((e) => withinTolerance(e.timestamp, incoming.timestamp) && e.calories === incoming.calories);
}

export function findMatchingSupplementEntry(
  incoming: Pick<SupplementEntry, "timestamp" | "amount" | "supplementName">,
  candidates: SupplementEntry[]
): SupplementEntry | undefined {
  return candidates.find(
    (e) =>
      withinTolerance(e.timestamp, incoming.timestamp) &&
      e.amount === incoming.amount &&
      e.supplementName === incoming.supplementName
  );
}

export function findMatchingTemplate(
  incoming: Pick<AIFoodTemplate, "name">,
  candidates: AIFoodTemplate[]
): AIFoodTemplate | undefined {
  const name = incoming.name.toLowerCase();
  return candidates.find((t) => t.name.toLowerCase() === name);
}
