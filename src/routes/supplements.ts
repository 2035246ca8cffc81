// src/routes/supplements.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendCreated, sendSuccess } from "../middleware/responseHelper";
import { encodeSupplement } from "../services/backup/backupCodec";
import type { Services } from "../services";
import { optionalDateKeySchema, supplementBodySchema } from "./schemas";

const logSupplementSchema = z.object({
  date: optionalDateKeySchema,
  servings: z.number().positive().default(1),
});

export function createSupplementsRouter(services: Services): Router {
  const router = Router();

  router.get(
    "/",
    asyncHandler(async (_req: Request, res: Response) => {
      const supplements = await services.products.listSupplements();
      return sendSuccess(res, supplements.map(encodeSupplement));
    })
  );

  router.post(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const { imageDataBase64, ...input } = supplementBodySchema.parse(req.body);
      const supplement = await services.products.createSupplement({ ...input, imageData: imageDataBase64 ?? null });
      return sendCreated(res, encodeSupplement(supplement));
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const supplement = await services.products.getSupplement(req.params.id);
      return sendSuccess(res, encodeSupplement(supplement));
    })
  );

  router.delete(
    "/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const result = await services.products.deleteSupplement(req.params.id);
      return sendSuccess(res, result);
    })
  );

  // POST /api/v1/supplements/:id/log  { date?, servings? }
  router.post(
    "/:id/log",
    asyncHandler(async (req: Request, res: Response) => {
      const body = logSupplementSchema.parse(req.body);
      const entry = await services.dailyLogs.logSupplement(req.params.id, body.date, body.servings);
      return sendCreated(res, entry);
    })
  );

  return router;
}
