import { loadConfig } from "./config/index.js";
import { logger } from "./config/logger.js";
import { captureError, initSentry } from "./observability/index.js";
import { EdgeProxy } from "./proxy/index.js";

// Handle unhandled promise rejections (async errors that weren't caught)
export const unhandledRejectionHandler = (reason: unknown, promise: Promise<unknown>) => {
  logger.error("Unhandled promise rejection", {
    reason: reason instanceof Error ? reason.message : String(reason),
    stack: reason instanceof Error ? reason.stack : undefined,
    promise: String(promise),
  });
  captureError(reason instanceof Error ? reason : new Error(String(reason)), {
    source: "unhandledRejection",
  });
  // Keep serving: one failed request must not take the listeners down
};

// Handle uncaught exceptions (synchronous errors that weren't caught)
export const uncaughtExceptionHandler = (err: Error, origin: string) => {
  logger.error("Uncaught exception", {
    error: err.message,
    stack: err.stack,
    origin,
  });
  captureError(err, { source: "uncaughtException", extra: { origin } });
  // Uncaught exceptions leave the process in an undefined state.
  // Exit immediately after logging (Winston Console transport is synchronous).
  process.exit(1);
};

process.on("unhandledRejection", unhandledRejectionHandler);
process.on("uncaughtException", uncaughtExceptionHandler);

/**
 * Load configuration, bind both listeners and stop gracefully on SIGTERM/SIGINT.
 * Any startup failure (bad config, unusable TLS material, port in use) exits with status 1.
 */
export async function main(env: NodeJS.ProcessEnv = process.env): Promise<EdgeProxy> {
  const config = loadConfig(env);
  logger.level = config.logLevel;
  initSentry(env.SENTRY_DSN, config.nodeEnv);

  const proxy = new EdgeProxy(config);
  await proxy.start();

  let stopping = false;
  const shutdown = (signal: NodeJS.Signals) => {
    if (stopping) return;
    stopping = true;
    logger.info(`Received ${signal}`);
    proxy.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error("Shutdown failed", { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      },
    );
  };
  process.once("SIGTERM", shutdown);
  process.once("SIGINT", shutdown);

  return proxy;
}

// Only start the listeners if not imported by tests
if (process.env.NODE_ENV !== "test") {
  main().catch((err: unknown) => {
    logger.error("Edge proxy failed to start", {
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    captureError(err, { source: "startup" });
    process.exit(1);
  });
}
