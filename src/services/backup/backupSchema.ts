// src/services/backup/backupSchema.ts
// Wire schema of backup documents (version 1). Optional values may be missing
// or null; both decode to "absent".

import { z } from "zod";
import { DOSAGE_FORMS } from "../../domain/types";

export const BACKUP_VERSION = 1;
export const SUPPORTED_BACKUP_VERSIONS: readonly number[] = [BACKUP_VERSION];

const isoDate = z
  .string()
  .refine((s) => !Number.isNaN(Date.parse(s)), { message: "Invalid date" })
  .transform((s) => new Date(s));

const optionalNumber = z.number().finite().nullish();
const optionalString = z.string().nullish();

const nutrientFields = {
  vitaminA: optionalNumber,
  vitaminC: optionalNumber,
  vitaminD: optionalNumber,
  vitaminE: optionalNumber,
  vitaminK: optionalNumber,
  vitaminB1: optionalNumber,
  vitaminB2: optionalNumber,
  vitaminB3: optionalNumber,
  vitaminB5: optionalNumber,
  vitaminB6: optionalNumber,
  vitaminB7: optionalNumber,
  vitaminB12: optionalNumber,
  folate: optionalNumber,
  calcium: optionalNumber,
  iron: optionalNumber,
  zinc: optionalNumber,
  magnesium: optionalNumber,
  potassium: optionalNumber,
  phosphorus: optionalNumber,
  selenium: optionalNumber,
  copper: optionalNumber,
  manganese: optionalNumber,
  chromium: optionalNumber,
  molybdenum: optionalNumber,
  iodine: optionalNumber,
  chloride: optionalNumber,
};

const snapshotFields = {
  calories: z.number().finite(),
  protein: z.number().finite(),
  carbohydrates: z.number().finite(),
  fat: z.number().finite(),
  sugar: optionalNumber,
  naturalSugar: optionalNumber,
  addedSugar: optionalNumber,
  fibre: optionalNumber,
  sodium: optionalNumber,
};

export const productRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  barcode: optionalString,
  brand: optionalString,
  emoji: optionalString,
  servingSize: z.number().finite().positive().default(100),
  servingSizeUnit: z.string().default("g"),
  portionSize: z.number().finite().positive().nullish(),
  portionsPerPackage: z.number().int().positive().nullish(),
  ...snapshotFields,
  saturatedFat: optionalNumber,
  transFat: optionalNumber,
  cholesterol: optionalNumber,
  ...nutrientFields,
  dateAdded: isoDate,
  isCustom: z.boolean().default(false),
  imageDataBase64: optionalString,
  mainImageDataBase64: optionalString,
  notes: optionalString,
});

export const dailyLogRecordSchema = z.object({
  id: z.string().min(1),
  date: isoDate,
  calorieTarget: z.number().finite(),
  proteinTarget: z.number().finite(),
  carbTarget: z.number().finite(),
  fatTarget: z.number().finite(),
});

export const foodEntryRecordSchema = z.object({
  id: z.string().min(1),
  productId: optionalString,
  productName: optionalString,
  dailyLogId: optionalString,
  customFoodName: optionalString,
  amount: z.number().finite(),
  unit: z.string(),
  timestamp: isoDate,
  ...snapshotFields,
  nutrients: z.record(z.number().finite()).optional(),
  aiGenerated: z.boolean().default(false),
  aiPrompt: optionalString,
});

export const aiTemplateRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  emoji: optionalString,
  amount: z.number().finite(),
  unit: z.string(),
  weightInGrams: z.number().finite(),
  ...snapshotFields,
  ...nutrientFields,
  aiPrompt: optionalString,
  useCount: z.number().int().nonnegative(),
  lastUsed: isoDate,
  dateCreated: isoDate.optional(),
});

export const supplementRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  brand: optionalString,
  dosageForm: z.enum(DOSAGE_FORMS).catch("tablet"),
  servingSize: z.number().finite().positive().default(1),
  servingSizeUnit: z.string().default("tablet"),
  ...nutrientFields,
  notes: optionalString,
  imageDataBase64: optionalString,
  dateAdded: isoDate,
});

export const supplementEntryRecordSchema = z.object({
  id: z.string().min(1),
  supplementId: optionalString,
  supplementName: optionalString,
  dailyLogId: optionalString,
  amount: z.number().finite(),
  unit: z.string(),
  timestamp: isoDate,
  nutrients: z.record(z.number().finite()).optional(),
});

export const backupDocumentSchema = z.object({
  version: z.literal(BACKUP_VERSION),
  exportDate: isoDate,
  products: z.array(productRecordSchema).default([]),
  dailyLogs: z.array(dailyLogRecordSchema).default([]),
  foodEntries: z.array(foodEntryRecordSchema).default([]),
  aiTemplates: z.array(aiTemplateRecordSchema).default([]),
  supplements: z.array(supplementRecordSchema).default([]),
  supplementEntries: z.array(supplementEntryRecordSchema).default([]),
});

export type ProductRecord = z.input<typeof productRecordSchema>;
export type DailyLogRecord = z.input<typeof dailyLogRecordSchema>;
export type FoodEntryRecord = z.input<typeof foodEntryRecordSchema>;
export type AITemplateRecord = z.input<typeof aiTemplateRecordSchema>;
export type SupplementRecord = z.input<typeof supplementRecordSchema>;
export type SupplementEntryRecord = z.input<typeof supplementEntryRecordSchema>;

/** Document as written by the encoder. */
export interface BackupDocument {
  version: number;
  exportDate: string;
  products: ProductRecord[];
  dailyLogs: DailyLogRecord[];
  foodEntries: FoodEntryRecord[];
  aiTemplates: AITemplateRecord[];
  supplements: SupplementRecord[];
  supplementEntries: SupplementEntryRecord[];
}
