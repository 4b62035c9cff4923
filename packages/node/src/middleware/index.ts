/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, createErrorHandler } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER, MAX_REQUEST_ID_LENGTH } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { validateBody, formatZodErrors } from "./validate.js";
export type { ValidatedEnv, ValidateBodyOptions } from "./validate.js";
export {
  authMiddleware,
  callerAddressMiddleware,
  API_KEY_HEADER,
  CALLER_ADDRESS_HEADER,
} from "./auth.js";
export type { AuthConfig } from "./auth.js";
