import type {
  AIFoodTemplate,
  DailyLog,
  FoodEntry,
  Product,
  Supplement,
  SupplementEntry,
} from "../src/domain/types";

export function makeProduct(overrides: Partial<Product> = {}): Product {
  return {
    id: "product-1",
    name: "Greek Yogurt",
    barcode: null,
    brand: null,
    emoji: null,
    servingSize: 100,
    servingSizeUnit: "g",
    portionSize: null,
    portionsPerPackage: null,
    calories: 82,
    protein: 4.5,
    carbohydrates: 6,
    fat: 4,
    sugar: null,
    naturalSugar: null,
    addedSugar: null,
    fibre: null,
    sodium: null,
    saturatedFat: null,
    transFat: null,
    cholesterol: null,
    nutrients: {},
    imageData: null,
    mainImageData: null,
    notes: null,
    isCustom: false,
    dateAdded: new Date(2026, 0, 1, 12, 0, 0),
    ...overrides,
  };
}

export function makeDailyLog(overrides: Partial<DailyLog> = {}): DailyLog {
  return {
    id: "log-1",
    date: new Date(2026, 0, 15),
    calorieTarget: 2000,
    proteinTarget: 50,
    carbTarget: 250,
    fatTarget: 65,
    ...overrides,
  };
}

export function makeEntry(overrides: Partial<FoodEntry> = {}): FoodEntry {
  return {
    id: "entry-1",
    productId: null,
    productName: null,
    customFoodName: "Toast",
    dailyLogId: null,
    amount: 100,
    unit: "g",
    timestamp: new Date(2026, 0, 15, 8, 0, 0),
    calories: 250,
    protein: 8,
    carbohydrates: 45,
    fat: 3,
    sugar: null,
    naturalSugar: null,
    addedSugar: null,
    fibre: null,
    sodium: null,
    nutrients: {},
    aiGenerated: false,
    aiPrompt: null,
    ...overrides,
  };
}

export function makeTemplate(overrides: Partial<AIFoodTemplate> = {}): AIFoodTemplate {
  return {
    id: "template-1",
    name: "Chicken Salad",
    emoji: null,
    amount: 1,
    unit: "bowl",
    weightInGrams: 250,
    calories: 400,
    protein: 30,
    carbohydrates: 10,
    fat: 20,
    sugar: null,
    naturalSugar: null,
    addedSugar: null,
    fibre: null,
    sodium: null,
    nutrients: {},
    aiPrompt: null,
    dateCreated: new Date(2026, 0, 10, 12, 0, 0),
    lastUsed: new Date(2026, 0, 10, 12, 0, 0),
    useCount: 1,
    ...overrides,
  };
}

export function makeSupplement(overrides: Partial<Supplement> = {}): Supplement {
  return {
    id: "supplement-1",
    name: "Vitamin D3",
    brand: null,
    dosageForm: "softgel",
    servingSize: 1,
    servingSizeUnit: "softgel",
    nutrients: { vitaminD: 25 },
    notes: null,
    imageData: null,
    dateAdded: new Date(2026, 0, 1, 12, 0, 0),
    ...overrides,
  };
}

export function makeSupplementEntry(overrides: Partial<SupplementEntry> = {}): SupplementEntry {
  return {
    id: "supplement-entry-1",
    supplementId: null,
    supplementName: "Vitamin D3",
    dailyLogId: null,
    amount: 1,
    unit: "softgel",
    timestamp: new Date(2026, 0, 15, 9, 0, 0),
    nutrients: { vitaminD: 25 },
    ...overrides,
  };
}

/** Deterministic id source for import tests. */
export function sequentialIds(prefix = "generated"): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/** Fixed clock that advances one second per call. */
export function tickingClock(start: Date): () => Date {
  let ms = start.getTime();
  return () => {
    const now = new Date(ms);
    ms += 1000;
    return now;
  };
}
