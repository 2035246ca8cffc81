// src/routes/logs.ts
// Daily logs: day view with totals, targets, custom (AI) entries and edits.

import { Router, Request, Response } from "express";
import { z } from "zod";
import { formatNutrientAmount, nutrientEntries, nutrientProgress } from "../domain/nutrients";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendCreated, sendSuccess } from "../middleware/responseHelper";
import type { Services } from "../services";
import type { DayView } from "../services/dailyLogService";
import { toLocalDateKey } from "../utils/date";
import { dateKeySchema, snapshotSchema } from "./schemas";

const targetsSchema = z
  .object({
    calorieTarget: z.number().nonnegative(),
    proteinTarget: z.number().nonnegative(),
    carbTarget: z.number().nonnegative(),
    fatTarget: z.number().nonnegative(),
  })
  .partial();

const customFoodSchema = snapshotSchema.extend({
  name: z.string().trim().min(1),
  amount: z.number().positive(),
  unit: z.string().min(1),
  aiGenerated: z.boolean().optional(),
  aiPrompt: z.string().nullish(),
  timestamp: z.string().datetime().optional(),
});

const amountChangeSchema = z.union([
  z.object({ amount: z.number().finite() }).strict(),
  z.object({ delta: z.number().finite() }).strict(),
]);

function presentDay(day: DayView) {
  return {
    ...day,
    date: toLocalDateKey(day.date),
    nutrientProgress: nutrientEntries(day.totals.nutrients).map(([id, amount]) => ({
      id,
      amount,
      display: formatNutrientAmount(id, amount),
      ...nutrientProgress(id, amount),
    })),
  };
}

export function createLogsRouter(services: Services): Router {
  const router = Router();

  // PATCH /api/v1/logs/entries/:id  { amount } | { delta }
  router.patch(
    "/entries/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const body = amountChangeSchema.parse(req.body);
      const entry =
        "amount" in body
          ? await services.dailyLogs.setEntryAmount(req.params.id, body.amount)
          : await services.dailyLogs.adjustEntryAmount(req.params.id, body.delta);
      return sendSuccess(res, entry);
    })
  );

  router.delete(
    "/entries/:id",
    asyncHandler(async (req: Request, res: Response) => {
      await services.dailyLogs.deleteEntry(req.params.id);
      return sendSuccess(res, { deleted: true });
    })
  );

  router.delete(
    "/supplement-entries/:id",
    asyncHandler(async (req: Request, res: Response) => {
      await services.dailyLogs.deleteSupplementEntry(req.params.id);
      return sendSuccess(res, { deleted: true });
    })
  );

  // GET /api/v1/logs/:date
  router.get(
    "/:date",
    asyncHandler(async (req: Request, res: Response) => {
      const date = dateKeySchema.parse(req.params.date);
      const day = await services.dailyLogs.getDay(date);
      return sendSuccess(res, presentDay(day));
    })
  );

  // PUT /api/v1/logs/:date/targets
  router.put(
    "/:date/targets",
    asyncHandler(async (req: Request, res: Response) => {
      const date = dateKeySchema.parse(req.params.date);
      const targets = targetsSchema.parse(req.body);
      const log = await services.dailyLogs.updateTargets(date, targets);
      return sendSuccess(res, log);
    })
  );

  // DELETE /api/v1/logs/:date (cascades to its entries)
  router.delete(
    "/:date",
    asyncHandler(async (req: Request, res: Response) => {
      const date = dateKeySchema.parse(req.params.date);
      const result = await services.dailyLogs.deleteLog(date);
      return sendSuccess(res, result);
    })
  );

  // POST /api/v1/logs/:date/entries  (estimate already scaled to the amount eaten)
  router.post(
    "/:date/entries",
    asyncHandler(async (req: Request, res: Response) => {
      const date = dateKeySchema.parse(req.params.date);
      const { timestamp, ...input } = customFoodSchema.parse(req.body);
      const entry = await services.dailyLogs.logCustomFood(date, {
        ...input,
        timestamp: timestamp ? new Date(timestamp) : undefined,
      });
      return sendCreated(res, entry);
    })
  );

  return router;
}
