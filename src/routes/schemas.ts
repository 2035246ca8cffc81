// src/routes/schemas.ts
// Shared request-body pieces for the nutrition routers.

import { z } from "zod";
import { NUTRIENT_IDS } from "../domain/nutrients";
import { DOSAGE_FORMS } from "../domain/types";
import { parseLocalDateKey, todayDateOnly } from "../utils/date";

/** YYYY-MM-DD, read as local midnight. */
export const dateKeySchema = z.string().transform((value, ctx) => {
  const date = parseLocalDateKey(value);
  if (!date) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a date as YYYY-MM-DD" });
    return z.NEVER;
  }
  return date;
});

export const optionalDateKeySchema = z
  .string()
  .optional()
  .transform((value) => value ?? todayDateOnly())
  .pipe(dateKeySchema);

export const nutrientMapSchema = z.record(z.enum(NUTRIENT_IDS), z.number().finite().nonnegative());

const amount = z.number().finite().nonnegative();
const optionalAmount = amount.nullable().default(null);

export const snapshotSchema = z.object({
  calories: amount,
  protein: amount,
  carbohydrates: amount,
  fat: amount,
  sugar: optionalAmount,
  naturalSugar: optionalAmount,
  addedSugar: optionalAmount,
  fibre: optionalAmount,
  sodium: optionalAmount,
  nutrients: nutrientMapSchema.default({}),
});

export const base64Schema = z
  .string()
  .regex(/^[A-Za-z0-9+/]*={0,2}$/, "Expected base64 data")
  .transform((value) => Buffer.from(value, "base64"));

export const productBodySchema = z.object({
  name: z.string().trim().min(1),
  barcode: z.string().nullish(),
  brand: z.string().nullish(),
  emoji: z.string().nullish(),
  servingSize: z.number().positive().optional(),
  servingSizeUnit: z.string().min(1).optional(),
  portionSize: z.number().positive().nullish(),
  portionsPerPackage: z.number().int().positive().nullish(),
  calories: amount,
  protein: amount,
  carbohydrates: amount,
  fat: amount,
  saturatedFat: amount.nullish(),
  transFat: amount.nullish(),
  fibre: amount.nullish(),
  sugar: amount.nullish(),
  naturalSugar: amount.nullish(),
  addedSugar: amount.nullish(),
  sodium: amount.nullish(),
  cholesterol: amount.nullish(),
  nutrients: nutrientMapSchema.optional(),
  notes: z.string().nullish(),
  isCustom: z.boolean().optional(),
  imageDataBase64: base64Schema.optional(),
});

export const supplementBodySchema = z.object({
  name: z.string().trim().min(1),
  brand: z.string().nullish(),
  dosageForm: z.enum(DOSAGE_FORMS).optional(),
  servingSize: z.number().positive().optional(),
  servingSizeUnit: z.string().min(1).optional(),
  nutrients: nutrientMapSchema.optional(),
  notes: z.string().nullish(),
  imageDataBase64: base64Schema.optional(),
});
