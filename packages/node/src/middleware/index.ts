/**
 * Middleware barrel: re-exports all middleware.
 */

export { handleError, statusFor } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { readValidatedBody, readValidatedQuery } from "./validate.js";
export { readCaller, CALLER_HEADER } from "./caller.js";
