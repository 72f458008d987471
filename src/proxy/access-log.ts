import type { MiddlewareHandler } from "hono";
import { logger } from "../config/logger.js";
import { peerAddress } from "./client-ip.js";
import type { ListenerKind, ProxyEnv } from "./types.js";

/**
 * One info line per request once the response status is known.
 * Reads only the raw Node request, so it works for methods a fetch Request cannot represent.
 */
export function accessLog(listener: ListenerKind): MiddlewareHandler<ProxyEnv> {
  return async (c, next) => {
    const started = performance.now();
    await next();
    logger.info("request", {
      listener,
      method: c.req.method,
      uri: c.env.incoming.url,
      host: c.env.incoming.headers.host,
      status: c.res.status,
      durationMs: Math.round(performance.now() - started),
      clientIp: peerAddress(c),
    });
  };
}
