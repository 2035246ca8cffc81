// src/middleware/errorHandler.ts
import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { isNutritionError, MalformedBackupError, NutritionErrorKind } from "../domain/errors";
import { sendError, sendServerError, sendValidationError } from "./responseHelper";

const STATUS_BY_KIND: Record<NutritionErrorKind, number> = {
  InvalidAmount: 400,
  MalformedBackup: 400,
  UnsupportedVersion: 422,
  StorageFailure: 500,
  NotFound: 404,
};

/** Errors raised by express body parsers carry an HTTP status. */
function httpStatusOf(err: unknown): number | undefined {
  if (err instanceof Error && "status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ZodError) {
    const issues = err.issues.map((issue) => `${issue.path.join(".") || "(body)"}: ${issue.message}`);
    sendValidationError(res, issues);
    return;
  }

  if (isNutritionError(err)) {
    const status = STATUS_BY_KIND[err.kind];
    if (status >= 500) {
      console.error(`[Server] ${err.name}:`, err);
    }
    const meta: Record<string, unknown> = { kind: err.kind };
    if (err instanceof MalformedBackupError && err.issues.length > 0) {
      meta.issues = err.issues;
    }
    sendError(res, err.message, status, meta);
    return;
  }

  const status = httpStatusOf(err);
  if (status !== undefined && status >= 400 && status < 500 && err instanceof Error) {
    sendError(res, err.message, status);
    return;
  }

  console.error("[Server] Unhandled error:", err);
  sendServerError(res, err instanceof Error ? err.message : "Server error");
}
