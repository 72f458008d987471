/**
 * Observability: Sentry error tracking.
 */

export type { ErrorContext } from "./sentry.js";
export { captureError, initSentry } from "./sentry.js";
