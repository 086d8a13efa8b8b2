/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, handleNotFound, STATUS_MAP } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readBody, readParam, readQuery } from "./validate.js";
export {
  authMiddleware,
  callerHeaderMiddleware,
  API_KEY_HEADER,
  CALLER_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
