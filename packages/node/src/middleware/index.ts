/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, levelForStatus } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { validateBody, validateQuery } from "./validate.js";
export {
  authMiddleware,
  unsecuredAuthMiddleware,
  requirePermission,
  requireCaller,
  API_KEY_HEADER,
  ACCOUNT_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
