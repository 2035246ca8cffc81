// src/routes/templates.ts
// AI food templates. Bodies carry numbers already parsed from the AI reply.

import { Router, Request, Response } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendCreated, sendSuccess } from "../middleware/responseHelper";
import { encodeProduct } from "../services/backup/backupCodec";
import type { Services } from "../services";
import { dateKeySchema, optionalDateKeySchema, snapshotSchema } from "./schemas";

const estimateSchema = snapshotSchema.extend({
  name: z.string().trim().min(1),
  emoji: z.string().nullish(),
  amount: z.number().positive(),
  unit: z.string().min(1),
  weightInGrams: z.number().nonnegative(),
  aiPrompt: z.string().nullish(),
});

const logTemplateSchema = z.object({
  date: optionalDateKeySchema,
  amount: z.number().positive().optional(),
});

const deriveProductSchema = z.object({
  logDate: dateKeySchema.optional(),
});

export function createTemplatesRouter(services: Services): Router {
  const router = Router();

  // GET /api/v1/templates (most recently used first)
  router.get(
    "/",
    asyncHandler(async (_req: Request, res: Response) => {
      return sendSuccess(res, await services.templates.listTemplates());
    })
  );

  // POST /api/v1/templates
  router.post(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const input = estimateSchema.parse(req.body);
      const result = await services.templates.saveEstimate(input);
      return result.created ? sendCreated(res, result) : sendSuccess(res, result);
    })
  );

  // POST /api/v1/templates/:id/log  { date?, amount? }
  router.post(
    "/:id/log",
    asyncHandler(async (req: Request, res: Response) => {
      const body = logTemplateSchema.parse(req.body);
      const result = await services.templates.logTemplate(req.params.id, body.date, body.amount);
      return sendCreated(res, result);
    })
  );

  // POST /api/v1/templates/:id/product  { logDate? }
  router.post(
    "/:id/product",
    asyncHandler(async (req: Request, res: Response) => {
      const body = deriveProductSchema.parse(req.body);
      const { product, entry } = await services.templates.deriveProduct(req.params.id, body.logDate);
      return sendCreated(res, { product: encodeProduct(product), entry });
    })
  );

  return router;
}
