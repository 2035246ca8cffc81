// src/services/productService.ts
// Reference data: products (per-100g) and supplements (per-serving).
// Deleting either detaches the entries that point at it; their snapshots and
// name snapshots are kept.

import { v4 as uuid } from "uuid";
import { NotFoundError } from "../domain/errors";
import type { NutrientMap } from "../domain/nutrients";
import type { DosageForm, Product, Supplement } from "../domain/types";
import type { NutritionStore } from "./store/types";

export interface ProductInput {
  name: string;
  barcode?: string | null;
  brand?: string | null;
  emoji?: string | null;
  servingSize?: number;
  servingSizeUnit?: string;
  portionSize?: number | null;
  portionsPerPackage?: number | null;
  calories: number;
  protein: number;
  carbohydrates: number;
  fat: number;
  saturatedFat?: number | null;
  transFat?: number | null;
  fibre?: number | null;
  sugar?: number | null;
  naturalSugar?: number | null;
  addedSugar?: number | null;
  sodium?: number | null;
  cholesterol?: number | null;
  nutrients?: NutrientMap;
  notes?: string | null;
  isCustom?: boolean;
  imageData?: Buffer | null;
}

export interface SupplementInput {
  name: string;
  brand?: string | null;
  dosageForm?: DosageForm;
  servingSize?: number;
  servingSizeUnit?: string;
  nutrients?: NutrientMap;
  notes?: string | null;
  imageData?: Buffer | null;
}

export interface DeleteResult {
  id: string;
  /** Entries whose reference was cleared. */
  detachedEntries: number;
}

function byName<T extends { name: string }>(a: T, b: T): number {
  return a.name.localeCompare(b.name);
}

export function buildProduct(input: ProductInput, id: string, now: Date): Product {
  return {
    id,
    name: input.name.trim(),
    barcode: input.barcode || null,
    brand: input.brand ?? null,
    emoji: input.emoji ?? null,
    servingSize: input.servingSize ?? 100,
    servingSizeUnit: input.servingSizeUnit ?? "g",
    portionSize: input.portionSize ?? null,
    portionsPerPackage: input.portionsPerPackage ?? null,
    calories: input.calories,
    protein: input.protein,
    carbohydrates: input.carbohydrates,
    fat: input.fat,
    saturatedFat: input.saturatedFat ?? null,
    transFat: input.transFat ?? null,
    fibre: input.fibre ?? null,
    sugar: input.sugar ?? null,
    naturalSugar: input.naturalSugar ?? null,
    addedSugar: input.addedSugar ?? null,
    sodium: input.sodium ?? null,
    cholesterol: input.cholesterol ?? null,
    nutrients: { ...input.nutrients },
    imageData: input.imageData ?? null,
    mainImageData: null,
    notes: input.notes ?? null,
    isCustom: input.isCustom ?? false,
    dateAdded: now,
  };
}

export class ProductService {
  constructor(
    private readonly store: NutritionStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async createProduct(input: ProductInput): Promise<Product> {
    const product = buildProduct(input, uuid(), this.now());
    await this.store.transaction((tx) => tx.insert("products", product));
    return product;
  }

  async listProducts(): Promise<Product[]> {
    const products = await this.store.list("products");
    return products.sort(byName);
  }

  async getProduct(id: string): Promise<Product> {
    const product = await this.store.get("products", id);
    if (!product) throw new NotFoundError("Product", id);
    return product;
  }

  async deleteProduct(id: string): Promise<DeleteResult> {
    return this.store.transaction(async (tx) => {
      if (!(await tx.get("products", id))) throw new NotFoundError("Product", id);

      const entries = (await tx.list("foodEntries")).filter((e) => e.productId === id);
      for (const entry of entries) {
        await tx.update("foodEntries", { ...entry, productId: null });
      }
      await tx.remove("products", id);
      return { id, detachedEntries: entries.length };
    });
  }

  async createSupplement(input: SupplementInput): Promise<Supplement> {
    const supplement: Supplement = {
      id: uuid(),
      name: input.name.trim(),
      brand: input.brand ?? null,
      dosageForm: input.dosageForm ?? "tablet",
      servingSize: input.servingSize ?? 1,
      servingSizeUnit: input.servingSizeUnit ?? "tablet",
      nutrients: { ...input.nutrients },
      notes: input.notes ?? null,
      imageData: input.imageData ?? null,
      dateAdded: this.now(),
    };
    await this.store.transaction((tx) => tx.insert("supplements", supplement));
    return supplement;
  }

  async listSupplements(): Promise<Supplement[]> {
    const supplements = await this.store.list("supplements");
    return supplements.sort(byName);
  }

  async getSupplement(id: string): Promise<Supplement> {
    const supplement = await this.store.get("supplements", id);
    if (!supplement) throw new NotFoundError("Supplement", id);
    return supplement;
  }

  async deleteSupplement(id: string): Promise<DeleteResult> {
    return this.store.transaction(async (tx) => {
      if (!(await tx.get("supplements", id))) throw new NotFoundError("Supplement", id);

      const entries = (await tx.list("supplementEntries")).filter((e) => e.supplementId === id);
      for (const entry of entries) {
        await tx.update("supplementEntries", { ...entry, supplementId: null });
      }
      await tx.remove("supplements", id);
      return { id, detachedEntries: entries.length };
    });
  }
}
