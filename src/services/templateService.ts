// src/services/templateService.ts
// Reusable AI food estimates. The estimate itself comes from the AI layer as
// plain numbers; this service only stores, reuses and converts it.

import { v4 as uuid } from "uuid";
import { NotFoundError } from "../domain/errors";
import type { AIFoodTemplate, FoodEntry, FoodSnapshot, Product } from "../domain/types";
import { ensureDailyLog } from "./dailyLogService";
import { buildProduct } from "./productService";
import { derivePer100gFromWeight, pickSnapshot, rescale, scaleFromPer100g } from "./scalingEngine";
import { DEFAULT_SETTINGS, NutritionSettings } from "./settings";
import type { NutritionStore, StoreTransaction } from "./store/types";

export interface EstimateInput extends FoodSnapshot {
  name: string;
  emoji?: string | null;
  amount: number;
  unit: string;
  weightInGrams: number;
  aiPrompt?: string | null;
}

export interface SaveEstimateResult {
  template: AIFoodTemplate;
  /** False when an existing template with the same name was reused. */
  created: boolean;
}

export interface LogTemplateResult {
  template: AIFoodTemplate;
  entry: FoodEntry;
}

export interface DeriveProductResult {
  product: Product;
  entry: FoodEntry | null;
}

function findByName(templates: AIFoodTemplate[], name: string): AIFoodTemplate | undefined {
  const key = name.trim().toLowerCase();
  return templates.find((t) => t.name.toLowerCase() === key);
}

export class TemplateService {
  private readonly settings: NutritionSettings;

  constructor(
    private readonly store: NutritionStore,
    settings: Partial<NutritionSettings> = {},
    private readonly now: () => Date = () => new Date()
  ) {
    this.settings = { ...DEFAULT_SETTINGS, ...settings };
  }

  saveEstimate(input: EstimateInput): Promise<SaveEstimateResult> {
    return this.store.transaction(async (tx) => {
      const existing = findByName(await tx.list("aiTemplates"), input.name);
      if (existing) {
        return { template: await this.recordUse(tx, existing), created: false };
      }

      const now = this.now();
      const template: AIFoodTemplate = {
        id: uuid(),
        name: input.name.trim(),
        emoji: input.emoji ?? null,
        amount: input.amount,
        unit: input.unit,
        weightInGrams: input.weightInGrams,
        ...pickSnapshot(input),
        aiPrompt: input.aiPrompt ?? null,
        dateCreated: now,
        lastUsed: now,
        useCount: 1,
      };
      await tx.insert("aiTemplates", template);
      return { template, created: true };
    });
  }

  /** Most recently used first. */
  async listTemplates(): Promise<AIFoodTemplate[]> {
    const templates = await this.store.list("aiTemplates");
    return templates.sort((a, b) => b.lastUsed.getTime() - a.lastUsed.getTime());
  }

  /**
   * Log the template into the day's log, optionally at a different amount
   * (same unit as the template).
   */
  logTemplate(templateId: string, date: Date, amount?: number): Promise<LogTemplateResult> {
    return this.store.transaction(async (tx) => {
      const template = await this.requireTemplate(tx, templateId);
      const scaled =
        amount === undefined || amount === template.amount
          ? { amount: template.amount, snapshot: pickSnapshot(template) }
          : rescale(template, amount, { maxAmount: this.settings.maxEntryAmount });

      const log = await ensureDailyLog(tx, date, this.settings.defaultTargets);
      const entry: FoodEntry = {
        id: uuid(),
        productId: null,
        productName: null,
        customFoodName: template.name,
        dailyLogId: log.id,
        amount: scaled.amount,
        unit: template.unit,
        timestamp: this.now(),
        ...scaled.snapshot,
        aiGenerated: true,
        aiPrompt: template.aiPrompt,
      };
      await tx.insert("foodEntries", entry);
      return { template: await this.recordUse(tx, template), entry };
    });
  }

  /**
   * Turn an estimate into a custom per-100g product. When `logDate` is given
   * the estimated weight is also logged against the new product.
   */
  deriveProduct(templateId: string, logDate?: Date): Promise<DeriveProductResult> {
    return this.store.transaction(async (tx) => {
      const template = await this.requireTemplate(tx, templateId);
      const per100g = derivePer100gFromWeight(template, template.weightInGrams);
      const product = buildProduct(
        {
          ...per100g,
          name: template.name,
          emoji: template.emoji,
          portionSize: template.weightInGrams > 0 ? template.weightInGrams : null,
          notes: template.aiPrompt,
          isCustom: true,
        },
        uuid(),
        this.now()
      );
      await tx.insert("products", product);

      if (!logDate) return { product, entry: null };

      const grams = Math.max(template.weightInGrams, 1);
      const log = await ensureDailyLog(tx, logDate, this.settings.defaultTargets);
      const entry: FoodEntry = {
        id: uuid(),
        productId: product.id,
        productName: product.name,
        customFoodName: null,
        dailyLogId: log.id,
        amount: grams,
        unit: "g",
        timestamp: this.now(),
        ...scaleFromPer100g(product, grams, { sugarPolicy: this.settings.sugarPolicy }),
        aiGenerated: true,
        aiPrompt: template.aiPrompt,
      };
      await tx.insert("foodEntries", entry);
      return { product, entry };
    });
  }

  private async requireTemplate(tx: StoreTransaction, id: string): Promise<AIFoodTemplate> {
    const template = await tx.get("aiTemplates", id);
    if (!template) throw new NotFoundError("AI template", id);
    return template;
  }

  private async recordUse(tx: StoreTransaction, template: AIFoodTemplate): Promise<AIFoodTemplate> {
    const updated = { ...template, lastUsed: this.now(), useCount: template.useCount + 1 };
    await tx.update("aiTemplates", updated);
    return updated;
  }
}
