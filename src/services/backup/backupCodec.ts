// src/services/backup/backupCodec.ts
// Encodes the whole entity graph into one self-contained JSON document and
// decodes it back. Decoding is pure: foreign keys stay as the raw ids found in
// the document and are resolved by the import reconciler.

import { z } from "zod";
import { MalformedBackupError, UnsupportedVersionError } from "../../domain/errors";
import { isNutrientId, NUTRIENT_IDS, NutrientMap } from "../../domain/nutrients";
import type {
  AIFoodTemplate,
  DailyLog,
  EntityGraph,
  EntityKind,
  EntityTypes,
  FoodEntry,
  Product,
  Supplement,
  SupplementEntry,
} from "../../domain/types";
import {
  aiTemplateRecordSchema,
  AITemplateRecord,
  BACKUP_VERSION,
  BackupDocument,
  backupDocumentSchema,
  dailyLogRecordSchema,
  DailyLogRecord,
  foodEntryRecordSchema,
  FoodEntryRecord,
  productRecordSchema,
  ProductRecord,
  SUPPORTED_BACKUP_VERSIONS,
  supplementEntryRecordSchema,
  SupplementEntryRecord,
  supplementRecordSchema,
  SupplementRecord,
} from "./backupSchema";

export interface DecodedGraph extends EntityGraph {
  version: number;
  exportDate: Date;
}

// ==========================================================================
// Field helpers
// ==========================================================================

function omitNull<T>(value: T | null): T | undefined {
  return value === null ? undefined : value;
}

function orNull<T>(value: T | null | undefined): T | null {
  return value === undefined ? null : value;
}

function toBase64(data: Buffer | null): string | undefined {
  return data ? data.toString("base64") : undefined;
}

function fromBase64(text: string | null | undefined): Buffer | null {
  return text ? Buffer.from(text, "base64") : null;
}

/** Pick the catalog nutrient fields present on a flat record. */
function nutrientsFromFields(record: { [K in (typeof NUTRIENT_IDS)[number]]?: number | null }): NutrientMap {
  const map: NutrientMap = {};
  for (const id of NUTRIENT_IDS) {
    const value = record[id];
    if (typeof value === "number") map[id] = value;
  }
  return map;
}

/** Keys outside the catalog are dropped. */
function nutrientsFromRecord(record: Record<string, number> | undefined): NutrientMap {
  const map: NutrientMap = {};
  if (!record) return map;
  for (const [key, value] of Object.entries(record)) {
    if (isNutrientId(key)) map[key] = value;
  }
  return map;
}

// ==========================================================================
// Per-entity record codecs
// ==========================================================================

export function encodeProduct(p: Product): ProductRecord {
  return {
    id: p.id,
    name: p.name,
    barcode: omitNull(p.barcode),
    brand: omitNull(p.brand),
    emoji: omitNull(p.emoji),
    servingSize: p.servingSize,
    servingSizeUnit: p.servingSizeUnit,
    portionSize: omitNull(p.portionSize),
    portionsPerPackage: omitNull(p.portionsPerPackage),
    calories: p.calories,
    protein: p.protein,
    carbohydrates: p.carbohydrates,
    fat: p.fat,
    saturatedFat: omitNull(p.saturatedFat),
    transFat: omitNull(p.transFat),
    fibre: omitNull(p.fibre),
    sugar: omitNull(p.sugar),
    naturalSugar: omitNull(p.naturalSugar),
    addedSugar: omitNull(p.addedSugar),
    sodium: omitNull(p.sodium),
    cholesterol: omitNull(p.cholesterol),
    ...p.nutrients,
    dateAdded: p.dateAdded.toISOString(),
    isCustom: p.isCustom,
    imageDataBase64: toBase64(p.imageData),
    mainImageDataBase64: toBase64(p.mainImageData),
    notes: omitNull(p.notes),
  };
}

export function decodeProduct(r: z.output<typeof productRecordSchema>): Product {
  return {
    id: r.id,
    name: r.name,
    barcode: orNull(r.barcode),
    brand: orNull(r.brand),
    emoji: orNull(r.emoji),
    servingSize: r.servingSize,
    servingSizeUnit: r.servingSizeUnit,
    portionSize: orNull(r.portionSize),
    portionsPerPackage: orNull(r.portionsPerPackage),
    calories: r.calories,
    protein: r.protein,
    carbohydrates: r.carbohydrates,
    fat: r.fat,
    sugar: orNull(r.sugar),
    naturalSugar: orNull(r.naturalSugar),
    addedSugar: orNull(r.addedSugar),
    fibre: orNull(r.fibre),
    sodium: orNull(r.sodium),
    saturatedFat: orNull(r.saturatedFat),
    transFat: orNull(r.transFat),
    cholesterol: orNull(r.cholesterol),
    nutrients: nutrientsFromFields(r),
    imageData: fromBase64(r.imageDataBase64),
    mainImageData: fromBase64(r.mainImageDataBase64),
    notes: orNull(r.notes),
    isCustom: r.isCustom,
    dateAdded: r.dateAdded,
  };
}

export function encodeDailyLog(l: DailyLog): DailyLogRecord {
  return {
    id: l.id,
    date: l.date.toISOString(),
    calorieTarget: l.calorieTarget,
    proteinTarget: l.proteinTarget,
    carbTarget: l.carbTarget,
    fatTarget: l.fatTarget,
  };
}

export function decodeDailyLog(r: z.output<typeof dailyLogRecordSchema>): DailyLog {
  return {
    id: r.id,
    date: r.date,
    calorieTarget: r.calorieTarget,
    proteinTarget: r.proteinTarget,
    carbTarget: r.carbTarget,
    fatTarget: r.fatTarget,
  };
}

export function encodeFoodEntry(e: FoodEntry): FoodEntryRecord {
  return {
    id: e.id,
    productId: omitNull(e.productId),
    productName: omitNull(e.productName),
    dailyLogId: omitNull(e.dailyLogId),
    customFoodName: omitNull(e.customFoodName),
    amount: e.amount,
    unit: e.unit,
    timestamp: e.timestamp.toISOString(),
    calories: e.calories,
    protein: e.protein,
    carbohydrates: e.carbohydrates,
    fat: e.fat,
    // always written, null when unknown
    sugar: e.sugar,
    naturalSugar: e.naturalSugar,
    addedSugar: e.addedSugar,
    fibre: e.fibre,
    sodium: e.sodium,
    nutrients: { ...e.nutrients },
    aiGenerated: e.aiGenerated,
    aiPrompt: omitNull(e.aiPrompt),
  };
}

export function decodeFoodEntry(r: z.output<typeof foodEntryRecordSchema>): FoodEntry {
  return {
    id: r.id,
    productId: orNull(r.productId),
    productName: orNull(r.productName),
    dailyLogId: orNull(r.dailyLogId),
    customFoodName: orNull(r.customFoodName),
    amount: r.amount,
    unit: r.unit,
    timestamp: r.timestamp,
    calories: r.calories,
    protein: r.protein,
    carbohydrates: r.carbohydrates,
    fat: r.fat,
    sugar: orNull(r.sugar),
    naturalSugar: orNull(r.naturalSugar),
    addedSugar: orNull(r.addedSugar),
    fibre: orNull(r.fibre),
    sodium: orNull(r.sodium),
    nutrients: nutrientsFromRecord(r.nutrients),
    aiGenerated: r.aiGenerated,
    aiPrompt: orNull(r.aiPrompt),
  };
}

export function encodeAITemplate(t: AIFoodTemplate): AITemplateRecord {
  return {
    id: t.id,
    name: t.name,
    emoji: omitNull(t.emoji),
    amount: t.amount,
    unit: t.unit,
    weightInGrams: t.weightInGrams,
    calories: t.calories,
    protein: t.protein,
    carbohydrates: t.carbohydrates,
    fat: t.fat,
    sugar: t.sugar,
    naturalSugar: t.naturalSugar,
    addedSugar: t.addedSugar,
    fibre: t.fibre,
    sodium: t.sodium,
    ...t.nutrients,
    aiPrompt: omitNull(t.aiPrompt),
    useCount: t.useCount,
    lastUsed: t.lastUsed.toISOString(),
    dateCreated: t.dateCreated.toISOString(),
  };
}

export function decodeAITemplate(r: z.output<typeof aiTemplateRecordSchema>): AIFoodTemplate {
  return {
    id: r.id,
    name: r.name,
    emoji: orNull(r.emoji),
    amount: r.amount,
    unit: r.unit,
    weightInGrams: r.weightInGrams,
    calories: r.calories,
    protein: r.protein,
    carbohydrates: r.carbohydrates,
    fat: r.fat,
    sugar: orNull(r.sugar),
    naturalSugar: orNull(r.naturalSugar),
    addedSugar: orNull(r.addedSugar),
    fibre: orNull(r.fibre),
    sodium: orNull(r.sodium),
    nutrients: nutrientsFromFields(r),
    aiPrompt: orNull(r.aiPrompt),
    useCount: r.useCount,
    lastUsed: r.lastUsed,
    dateCreated: r.dateCreated ?? r.lastUsed,
  };
}

export function encodeSupplement(s: Supplement): SupplementRecord {
  return {
    id: s.id,
    name: s.name,
    brand: omitNull(s.brand),
    dosageForm: s.dosageForm,
    servingSize: s.servingSize,
    servingSizeUnit: s.servingSizeUnit,
    ...s.nutrients,
    notes: omitNull(s.notes),
    imageDataBase64: toBase64(s.imageData),
    dateAdded: s.dateAdded.toISOString(),
  };
}

export function decodeSupplement(r: z.output<typeof supplementRecordSchema>): Supplement {
  return {
    id: r.id,
    name: r.name,
    brand: orNull(r.brand),
    dosageForm: r.dosageForm,
    servingSize: r.servingSize,
    servingSizeUnit: r.servingSizeUnit,
    nutrients: nutrientsFromFields(r),
    notes: orNull(r.notes),
    imageData: fromBase64(r.imageDataBase64),
    dateAdded: r.dateAdded,
  };
}

export function encodeSupplementEntry(e: SupplementEntry): SupplementEntryRecord {
  return {
    id: e.id,
    supplementId: omitNull(e.supplementId),
    supplementName: omitNull(e.supplementName),
    dailyLogId: omitNull(e.dailyLogId),
    amount: e.amount,
    unit: e.unit,
    timestamp: e.timestamp.toISOString(),
    nutrients: { ...e.nutrients },
  };
}

export function decodeSupplementEntry(r: z.output<typeof supplementEntryRecordSchema>): SupplementEntry {
  return {
    id: r.id,
    supplementId: orNull(r.supplementId),
    supplementName: orNull(r.supplementName),
    dailyLogId: orNull(r.dailyLogId),
    amount: r.amount,
    unit: r.unit,
    timestamp: r.timestamp,
    nutrients: nutrientsFromRecord(r.nutrients),
  };
}

export interface RecordCodec<T> {
  encode(entity: T): object;
  /** Validate one stored record; throws MalformedBackupError. */
  decode(raw: unknown): T;
}

function recordCodec<S extends z.ZodTypeAny, T>(
  label: string,
  schema: S,
  encode: (entity: T) => object,
  decode: (record: z.output<S>) => T
): RecordCodec<T> {
  return {
    encode,
    decode(raw: unknown): T {
      const result = schema.safeParse(raw);
      if (!result.success) {
        throw new MalformedBackupError(`Invalid ${label} record`, formatIssues(result.error));
      }
      return decode(result.data);
    },
  };
}

export const RECORD_CODECS: { [K in EntityKind]: RecordCodec<EntityTypes[K]> } = {
  products: recordCodec("product", productRecordSchema, encodeProduct, decodeProduct),
  supplements: recordCodec("supplement", supplementRecordSchema, encodeSupplement, decodeSupplement),
  dailyLogs: recordCodec("daily log", dailyLogRecordSchema, encodeDailyLog, decodeDailyLog),
  foodEntries: recordCodec("food entry", foodEntryRecordSchema, encodeFoodEntry, decodeFoodEntry),
  supplementEntries: recordCodec(
    "supplement entry",
    supplementEntryRecordSchema,
    encodeSupplementEntry,
    decodeSupplementEntry
  ),
  aiTemplates: recordCodec("AI template", aiTemplateRecordSchema, encodeAITemplate, decodeAITemplate),
};

// ==========================================================================
// Document codec
// ==========================================================================

function byId<T extends { id: string }>(items: T[]): T[] {
  return [...items].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export function encodeBackup(graph: EntityGraph, exportDate: Date): BackupDocument {
  return {
    version: BACKUP_VERSION,
    exportDate: exportDate.toISOString(),
    products: byId(graph.products).map(encodeProduct),
    dailyLogs: byId(graph.dailyLogs).map(encodeDailyLog),
    foodEntries: byId(graph.foodEntries).map(encodeFoodEntry),
    aiTemplates: byId(graph.aiTemplates).map(encodeAITemplate),
    supplements: byId(graph.supplements).map(encodeSupplement),
    supplementEntries: byId(graph.supplementEntries).map(encodeSupplementEntry),
  };
}

function sortKeysDeep(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeysDeep);
  }
  if (value !== null && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    for (const [key, inner] of entries) {
      sorted[key] = sortKeysDeep(inner);
    }
    return sorted;
  }
  return value;
}

/**
 * Pretty-printed JSON with keys sorted at every level, so an unchanged store
 * exported at the same instant always yields the same bytes.
 */
export function serializeBackup(doc: BackupDocument): Buffer {
  return Buffer.from(JSON.stringify(sortKeysDeep(doc), null, 2), "utf8");
}

export function exportBackupBytes(graph: EntityGraph, exportDate: Date): Buffer {
  return serializeBackup(encodeBackup(graph, exportDate));
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function readVersion(root: unknown): number {
  if (root === null || typeof root !== "object" || Array.isArray(root)) {
    throw new MalformedBackupError("Backup root must be a JSON object");
  }
  const version: unknown = Reflect.get(root, "version");
  if (typeof version !== "number" || !Number.isInteger(version)) {
    throw new MalformedBackupError("Backup has no integer version");
  }
  return version;
}

export function decodeBackup(bytes: Buffer | string): DecodedGraph {
  const text = typeof bytes === "string" ? bytes : bytes.toString("utf8");

  let root: unknown;
  try {
    root = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedBackupError(`Backup is not valid JSON: ${reason}`);
  }

  const version = readVersion(root);
  if (!SUPPORTED_BACKUP_VERSIONS.includes(version)) {
    throw new UnsupportedVersionError(version);
  }

  const parsed = backupDocumentSchema.safeParse(root);
  if (!parsed.success) {
    throw new MalformedBackupError("Backup does not match the expected format", formatIssues(parsed.error));
  }

  const doc = parsed.data;
  return {
    version: doc.version,
    exportDate: doc.exportDate,
    products: doc.products.map(decodeProduct),
    supplements: doc.supplements.map(decodeSupplement),
    dailyLogs: doc.dailyLogs.map(decodeDailyLog),
    foodEntries: doc.foodEntries.map(decodeFoodEntry),
    supplementEntries: doc.supplementEntries.map(decodeSupplementEntry),
    aiTemplates: doc.aiTemplates.map(decodeAITemplate),
  };
}

/** e.g. NutritionLedger_Backup_2026-01-15_093000.json (local time). */
export function backupFileName(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `NutritionLedger_Backup_${day}_${time}.json`;
}
