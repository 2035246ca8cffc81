// src/routes/products.ts
// Products (per-100g reference data) and logging them into a day.

import { Router, Request, Response } from "express";
import { z } from "zod";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendCreated, sendSuccess } from "../middleware/responseHelper";
import { encodeProduct } from "../services/backup/backupCodec";
import type { ProductAmount } from "../services/dailyLogService";
import type { Services } from "../services";
import { optionalDateKeySchema, productBodySchema } from "./schemas";

const logProductSchema = z
  .object({
    date: optionalDateKeySchema,
    grams: z.number().positive().optional(),
    portions: z.number().positive().optional(),
  })
  .refine((body) => (body.grams === undefined) !== (body.portions === undefined), {
    message: "Provide exactly one of grams or portions",
  });

export function createProductsRouter(services: Services): Router {
  const router = Router();

  // GET /api/v1/products
  router.get(
    "/",
    asyncHandler(async (_req: Request, res: Response) => {
      const products = await services.products.listProducts();
      return sendSuccess(res, products.map(encodeProduct));
    })
  );

  // POST /api/v1/products
  router.post(
    "/",
    asyncHandler(async (req: Request, res: Response) => {
      const { imageDataBase64, ...input } = productBodySchema.parse(req.body);
      const product = await services.products.createProduct({ ...input, imageData: imageDataBase64 ?? null });
      return sendCreated(res, encodeProduct(product));
    })
  );

  // GET /api/v1/products/:id
  router.get(
    "/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const product = await services.products.getProduct(req.params.id);
      return sendSuccess(res, encodeProduct(product));
    })
  );

  // DELETE /api/v1/products/:id (entries keep their snapshot)
  router.delete(
    "/:id",
    asyncHandler(async (req: Request, res: Response) => {
      const result = await services.products.deleteProduct(req.params.id);
      return sendSuccess(res, result);
    })
  );

  // POST /api/v1/products/:id/log  { date?, grams | portions }
  router.post(
    "/:id/log",
    asyncHandler(async (req: Request, res: Response) => {
      const body = logProductSchema.parse(req.body);
      const quantity: ProductAmount =
        body.grams !== undefined ? { grams: body.grams } : { portions: body.portions ?? 0 };
      const entry = await services.dailyLogs.logProduct(req.params.id, body.date, quantity);
      return sendCreated(res, entry);
    })
  );

  return router;
}
