// src/app.ts
import express, { Express, Request, Response } from "express";
import cors from "cors";
import morgan from "morgan";
import { errorHandler, sendNotFound } from "./middleware";
import { createBackupRouter } from "./routes/backup";
import { createLogsRouter } from "./routes/logs";
import { createNutrientsRouter } from "./routes/nutrients";
import { createProductsRouter } from "./routes/products";
import { createSupplementsRouter } from "./routes/supplements";
import { createTemplatesRouter } from "./routes/templates";
import type { Services } from "./services";

export interface AppOptions {
  services: Services;
  /** body-parser size limit for backup uploads. */
  backupMaxBytes?: string;
  /** morgan request logging. */
  logRequests?: boolean;
}

export function createApp({ services, backupMaxBytes = "50mb", logRequests = true }: AppOptions): Express {
  const app = express();

  // ======================================================================
  //                     CORE MIDDLEWARE (CORS, LOGGING)
  // ======================================================================

  app.use(
    cors({
      methods: ["GET", "POST", "OPTIONS", "DELETE", "PUT", "PATCH"],
      allowedHeaders: ["Content-Type", "Accept"],
    })
  );

  if (logRequests) {
    app.use(morgan("dev"));
  }

  // ======================================================================
  //                       HEALTH CHECK + ROUTES
  // ======================================================================

  app.get("/health", (_req: Request, res: Response) => {
    res.status(200).json({ ok: true, service: "nutrition-ledger" });
  });

  // Raw body; must come before express.json()
  app.use("/api/v1/backup", createBackupRouter(services, { maxBytes: backupMaxBytes }));

  app.use(express.json({ limit: "2mb" }));

  app.use("/api/v1/nutrients", createNutrientsRouter());
  app.use("/api/v1/products", createProductsRouter(services));
  app.use("/api/v1/supplements", createSupplementsRouter(services));
  app.use("/api/v1/logs", createLogsRouter(services));
  app.use("/api/v1/templates", createTemplatesRouter(services));

  // 404 handler
  app.use((req: Request, res: Response) => {
    sendNotFound(res, `Route not found: ${req.method} ${req.path}`);
  });

  // Global error handler
  app.use(errorHandler);

  return app;
}
