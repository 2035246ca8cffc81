// src/middleware/responseHelper.ts
import { Response } from "express";

/**
 * Standardized API response format.
 * All endpoints should use these helpers for consistent responses.
 */

export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  meta?: Record<string, unknown>;
}

/**
 * Send a successful response.
 */
export function sendSuccess<T>(res: Response, data: T, statusCode: number = 200): Response {
  const body: ApiResponse<T> = { ok: true, data };
  return res.status(statusCode).json(body);
}

/**
 * Send a created response.
 */
export function sendCreated<T>(res: Response, data: T): Response {
  return sendSuccess(res, data, 201);
}

/**
 * Send an error response.
 */
export function sendError(
  res: Response,
  error: string,
  statusCode: number = 400,
  meta?: Record<string, unknown>
): Response {
  const response: ApiResponse = {
    ok: false,
    error,
  };

  if (meta) {
    response.meta = meta;
  }

  return res.status(statusCode).json(response);
}

/**
 * Send a not found response.
 */
export function sendNotFound(res: Response, message: string = "Resource not found"): Response {
  return sendError(res, message, 404);
}

/**
 * Send a validation error response.
 */
export function sendValidationError(res: Response, errors: string | string[]): Response {
  const errorMessage = Array.isArray(errors) ? errors.join(", ") : errors;
  return sendError(res, errorMessage, 400, { type: "validation" });
}

/**
 * Send a server error response.
 */
export function sendServerError(res: Response, message: string = "Internal server error"): Response {
  return sendError(res, message, 500);
}
