// src/middleware/index.ts
export { asyncHandler } from "./asyncHandler";
export { errorHandler } from "./errorHandler";
export { validateEnvironment, getEnv, resetEnvironment, settingsFromEnv, type Env } from "./validateEnv";
export {
  sendSuccess,
  sendCreated,
  sendError,
  sendNotFound,
  sendValidationError,
  sendServerError,
  type ApiResponse,
} from "./responseHelper";
