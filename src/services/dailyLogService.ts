// src/services/dailyLogService.ts
// One DailyLog per local calendar day, the food and supplement entries logged
// into it, and amount edits on those entries.

import { v4 as uuid } from "uuid";
import { NotFoundError } from "../domain/errors";
import type { DailyLog, DailyTargets, FoodEntry, FoodSnapshot, SupplementEntry } from "../domain/types";
import { isSameLocalDay, startOfLocalDay, toLocalDateKey } from "../utils/date";
import { computeDailyTotals, DailyTotals } from "./dailyTotals";
import { adjustAmount, rescale, RescaleResult, scaleFromPer100g, scaleFromPortions, scaleFromServings } from "./scalingEngine";
import { DEFAULT_SETTINGS, NutritionSettings } from "./settings";
import type { NutritionStore, StoreTransaction } from "./store/types";

export interface DayView {
  date: Date;
  /** Null until something is logged or targets are set for the day. */
  log: DailyLog | null;
  targets: DailyTargets;
  entries: FoodEntry[];
  supplementEntries: SupplementEntry[];
  totals: DailyTotals;
}

/** Exactly one of grams / portions. */
export type ProductAmount = { grams: number } | { portions: number };

export interface CustomFoodInput extends FoodSnapshot {
  name: string;
  amount: number;
  unit: string;
  aiGenerated?: boolean;
  aiPrompt?: string | null;
  timestamp?: Date;
}

export interface DeleteLogResult {
  id: string;
  deletedEntries: number;
  deletedSupplementEntries: number;
}

/**
 * Find the log for the local day of `date`, creating it with the default
 * targets when missing. Runs inside the caller's transaction.
 */
export async function ensureDailyLog(tx: StoreTransaction, date: Date, defaults: DailyTargets): Promise<DailyLog> {
  const existing = (await tx.list("dailyLogs")).find((l) => isSameLocalDay(l.date, date));
  if (existing) return existing;

  const log: DailyLog = { id: uuid(), date: startOfLocalDay(date), ...defaults };
  await tx.insert("dailyLogs", log);
  return log;
}

function byTimestamp<T extends { timestamp: Date }>(a: T, b: T): number {
  return a.timestamp.getTime() - b.timestamp.getTime();
}

export class DailyLogService {
  private readonly settings: NutritionSettings;
  private readonly now: () => Date;

  constructor(
    private readonly store: NutritionStore,
    settings: Partial<NutritionSettings> = {},
    now: () => Date = () => new Date()
  ) {
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
    this.now = now;
  }

  getOrCreateLog(date: Date): Promise<DailyLog> {
    return this.store.transaction((tx) => ensureDailyLog(tx, date, this.settings.defaultTargets));
  }

  /** Read-only: a day nobody has logged into is shown with the default targets. */
  async getDay(date: Date): Promise<DayView> {
    const day = startOfLocalDay(date);
    const log = (await this.store.list("dailyLogs")).find((l) => isSameLocalDay(l.date, day)) ?? null;
    if (!log) {
      const targets = { ...this.settings.defaultTargets };
      return { date: day, log, targets, entries: [], supplementEntries: [], totals: computeDailyTotals(targets, []) };
    }

    const entries = (await this.store.list("foodEntries")).filter((e) => e.dailyLogId === log.id).sort(byTimestamp);
    const supplementEntries = (await this.store.list("supplementEntries"))
      .filter((e) => e.dailyLogId === log.id)
      .sort(byTimestamp);
    const targets: DailyTargets = {
      calorieTarget: log.calorieTarget,
      proteinTarget: log.proteinTarget,
      carbTarget: log.carbTarget,
      fatTarget: log.fatTarget,
    };
    return {
      date: log.date,
      log,
      targets,
      entries,
      supplementEntries,
      totals: computeDailyTotals(targets, entries, supplementEntries),
    };
  }

  updateTargets(date: Date, targets: Partial<DailyTargets>): Promise<DailyLog> {
    return this.store.transaction(async (tx) => {
      const log = await ensureDailyLog(tx, date, this.settings.defaultTargets);
      const updated: DailyLog = { ...log, ...targets };
      await tx.update("dailyLogs", updated);
      return updated;
    });
  }

  logProduct(productId: string, date: Date, quantity: ProductAmount, timestamp?: Date): Promise<FoodEntry> {
    return this.store.transaction(async (tx) => {
      const product = await tx.get("products", productId);
      if (!product) throw new NotFoundError("Product", productId);

      const options = { sugarPolicy: this.settings.sugarPolicy };
      const scaled =
        "grams" in quantity
          ? { amount: quantity.grams, unit: "g", snapshot: scaleFromPer100g(product, quantity.grams, options) }
          : { amount: quantity.portions, unit: "portion", snapshot: scaleFromPortions(product, quantity.portions, options) };

      const log = await ensureDailyLog(tx, date, this.settings.defaultTargets);
      const entry: FoodEntry = {
        id: uuid(),
        productId: product.id,
        productName: product.name,
        customFoodName: null,
        dailyLogId: log.id,
        amount: scaled.amount,
        unit: scaled.unit,
        timestamp: timestamp ?? this.now(),
        ...scaled.snapshot,
        aiGenerated: false,
        aiPrompt: null,
      };
      await tx.insert("foodEntries", entry);
      return entry;
    });
  }

  /** Log an estimate that is already scaled to the eaten amount. */
  logCustomFood(date: Date, input: CustomFoodInput): Promise<FoodEntry> {
    return this.store.transaction(async (tx) => {
      const log = await ensureDailyLog(tx, date, this.settings.defaultTargets);
      const entry: FoodEntry = {
        id: uuid(),
        productId: null,
        productName: null,
        customFoodName: input.name.trim(),
        dailyLogId: log.id,
        amount: input.amount,
        unit: input.unit,
        timestamp: input.timestamp ?? this.now(),
        calories: input.calories,
        protein: input.protein,
        carbohydrates: input.carbohydrates,
        fat: input.fat,
        sugar: input.sugar,
        naturalSugar: input.naturalSugar,
        addedSugar: input.addedSugar,
        fibre: input.fibre,
        sodium: input.sodium,
        nutrients: { ...input.nutrients },
        aiGenerated: input.aiGenerated ?? true,
        aiPrompt: input.aiPrompt ?? null,
      };
      await tx.insert("foodEntries", entry);
      return entry;
    });
  }

  logSupplement(supplementId: string, date: Date, servings: number, timestamp?: Date): Promise<SupplementEntry> {
    return this.store.transaction(async (tx) => {
      const supplement = await tx.get("supplements", supplementId);
      if (!supplement) throw new NotFoundError("Supplement", supplementId);

      const nutrients = scaleFromServings(supplement, servings);
      const log = await ensureDailyLog(tx, date, this.settings.defaultTargets);
      const entry: SupplementEntry = {
        id: uuid(),
        supplementId: supplement.id,
        supplementName: supplement.name,
        dailyLogId: log.id,
        amount: servings,
        unit: supplement.servingSizeUnit,
        timestamp: timestamp ?? this.now(),
        nutrients,
      };
      await tx.insert("supplementEntries", entry);
      return entry;
    });
  }

  /** Typed-in amount, clamped to [1, maxEntryAmount]. */
  setEntryAmount(entryId: string, amount: number): Promise<FoodEntry> {
    return this.updateEntry(entryId, (entry) => rescale(entry, amount, { maxAmount: this.settings.maxEntryAmount }));
  }

  /** Stepper change, only the lower clamp applies. */
  adjustEntryAmount(entryId: string, delta: number): Promise<FoodEntry> {
    return this.updateEntry(entryId, (entry) => adjustAmount(entry, delta));
  }

  private updateEntry(entryId: string, change: (entry: FoodEntry) => RescaleResult): Promise<FoodEntry> {
    return this.store.transaction(async (tx) => {
      const entry = await tx.get("foodEntries", entryId);
      if (!entry) throw new NotFoundError("Food entry", entryId);

      const { amount, snapshot } = change(entry);
      const updated: FoodEntry = { ...entry, ...snapshot, amount };
      await tx.update("foodEntries", updated);
      return updated;
    });
  }

  deleteEntry(entryId: string): Promise<void> {
    return this.store.transaction(async (tx) => {
      if (!(await tx.remove("foodEntries", entryId))) throw new NotFoundError("Food entry", entryId);
    });
  }

  deleteSupplementEntry(entryId: string): Promise<void> {
    return this.store.transaction(async (tx) => {
      if (!(await tx.remove("supplementEntries", entryId))) throw new NotFoundError("Supplement entry", entryId);
    });
  }

  /** Deletes the day and every entry logged into it. */
  deleteLog(date: Date): Promise<DeleteLogResult> {
    return this.store.transaction(async (tx) => {
      const log = (await tx.list("dailyLogs")).find((l) => isSameLocalDay(l.date, date));
      if (!log) throw new NotFoundError("Daily log", toLocalDateKey(date));

      const entries = (await tx.list("foodEntries")).filter((e) => e.dailyLogId === log.id);
      const supplementEntries = (await tx.list("supplementEntries")).filter((e) => e.dailyLogId === log.id);
      for (const e of entries) await tx.remove("foodEntries", e.id);
      for (const e of supplementEntries) await tx.remove("supplementEntries", e.id);
      await tx.remove("dailyLogs", log.id);

      return { id: log.id, deletedEntries: entries.length, deletedSupplementEntries: supplementEntries.length };
    });
  }
}
