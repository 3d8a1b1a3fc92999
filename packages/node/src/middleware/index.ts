/**
 * Middleware barrel — re-exports all middleware.
 */

export { handleError, statusForCode } from "./error-handler.js";
export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware, levelForStatus } from "./logger.js";
export type { RequestLogEntry, RequestLogLevel } from "./logger.js";
export { requirePrincipal, PRINCIPAL_HEADER } from "./principal.js";
export { validateBody, validateQuery, formatZodErrors } from "./validate.js";
export type { ValidationIssue } from "./validate.js";
