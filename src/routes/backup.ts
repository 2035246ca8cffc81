// src/routes/backup.ts
// Backup download and upload. Mounted ahead of the JSON body parser so the
// import receives the raw document bytes.

import express, { Router, Request, Response } from "express";
import { asyncHandler } from "../middleware/asyncHandler";
import { sendSuccess } from "../middleware/responseHelper";
import { describeImportSummary } from "../services/backup/importReconciler";
import type { Services } from "../services";

export interface BackupRouterOptions {
  /** body-parser size limit, e.g. "50mb". */
  maxBytes: string;
}

export function createBackupRouter(services: Services, options: BackupRouterOptions): Router {
  const router = Router();

  // GET /api/v1/backup/export
  router.get(
    "/export",
    asyncHandler(async (_req: Request, res: Response) => {
      const { fileName, bytes } = await services.backup.exportBackup();
      res.setHeader("Content-Type", "application/json; charset=utf-8");
      res.setHeader("Content-Disposition", `attachment; filename="${fileName}"`);
      return res.status(200).send(bytes);
    })
  );

  // POST /api/v1/backup/import  (body: the backup file as-is)
  router.post(
    "/import",
    express.raw({ type: () => true, limit: options.maxBytes }),
    asyncHandler(async (req: Request, res: Response) => {
      const bytes: Buffer = Buffer.isBuffer(req.body) ? req.body : Buffer.alloc(0);
      const summary = await services.backup.importBackup(bytes);
      return sendSuccess(res, { summary, message: describeImportSummary(summary) });
    })
  );

  return router;
}
