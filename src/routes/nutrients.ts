// src/routes/nutrients.ts
import { Router, Request, Response } from "express";
import { z } from "zod";
import { NotFoundError } from "../domain/errors";
import { getNutrient, MINERALS, NUTRIENTS, VITAMINS } from "../domain/nutrients";
import { sendSuccess } from "../middleware/responseHelper";

const listQuerySchema = z.object({
  category: z.enum(["vitamin", "mineral"]).optional(),
});

export function createNutrientsRouter(): Router {
  const router = Router();

  // GET /api/v1/nutrients?category=vitamin|mineral
  router.get("/", (req: Request, res: Response) => {
    const { category } = listQuerySchema.parse(req.query);
    const nutrients = category === "vitamin" ? VITAMINS : category === "mineral" ? MINERALS : NUTRIENTS;
    sendSuccess(res, nutrients);
  });

  // GET /api/v1/nutrients/:id
  router.get("/:id", (req: Request, res: Response) => {
    const nutrient = getNutrient(req.params.id);
    if (!nutrient) throw new NotFoundError("Nutrient", req.params.id);
    sendSuccess(res, nutrient);
  });

  return router;
}
