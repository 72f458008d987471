import type { Readable } from "node:stream";
import type { Context, ErrorHandler } from "hono";
import { Hono } from "hono";
import { bodyLimit } from "hono/body-limit";
import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import { accessLog } from "./access-log.js";
import { peerAddress } from "./client-ip.js";
import { ClientClosedError, formatTarget, ProxyError } from "./errors.js";
import { buildResponseHeaders, buildUpstreamHeaders } from "./forwarded-headers.js";
import { requestUri, statusResponse } from "./http-helpers.js";
import type { RouteTable } from "./route-table.js";
import type { ForwardedRequestContext, ProxyEnv, UpstreamTarget } from "./types.js";
import { isForwardableMethod, type UpstreamClient, type UpstreamResponse } from "./upstream-client.js";

/** Statuses whose responses never carry a body. */
const NULL_BODY_STATUSES = new Set([204, 205, 304]);

export interface ForwardAppDeps {
  routes: RouteTable;
  client: UpstreamClient;
  /** Largest request body accepted, in bytes. */
  maxBodySize: number;
}

/** Adapt the upstream body to a web stream; cancelling it destroys the upstream body. */
function toWebStream(body: Readable, target: UpstreamTarget): ReadableStream<Uint8Array> {
  const iterator = body[Symbol.asyncIterator]();
  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      try {
        const { value, done } = await iterator.next();
        if (done) {
          controller.close();
        } else {
          controller.enqueue(value instanceof Uint8Array ? value : Buffer.from(String(value)));
        }
      } catch (err) {
        logger.warn("Upstream body relay aborted", {
          target: formatTarget(target),
          error: err instanceof Error ? err.message : String(err),
        });
        controller.error(err);
      }
    },
    cancel(reason) {
      body.destroy(reason instanceof Error ? reason : undefined);
    },
  });
}

function relayResponse(upstream: UpstreamResponse, method: string, target: UpstreamTarget): Response {
  if (upstream.status < 200 || upstream.status > 599) {
    upstream.body.destroy();
    logger.warn("Upstream returned an unrelayable status", { target: formatTarget(target), status: upstream.status });
    return statusResponse(502, { close: true });
  }

  const headers = buildResponseHeaders(upstream.headers);
  if (method === "HEAD" || NULL_BODY_STATUSES.has(upstream.status)) {
    // Drain so the socket returns to the pool.
    upstream.body.resume();
    return new Response(null, { status: upstream.status, headers });
  }
  return new Response(toWebStream(upstream.body, target), { status: upstream.status, headers });
}

/** Log a failed forward and answer it. Gateway errors close the client connection. */
function failRequest(err: ProxyError, c: Context<ProxyEnv>): Response {
  const meta = { error: err.message, method: c.req.method, uri: c.env.incoming.url };
  if (err instanceof ClientClosedError) {
    logger.debug("Client went away before the response was sent", meta);
    return statusResponse(err.httpStatus);
  }
  logger.warn("Upstream request failed", { ...meta, status: err.httpStatus });
  return statusResponse(err.httpStatus, { close: true });
}

/** True once the client connection has failed or closed under the request. */
function clientGone(c: Context<ProxyEnv>): boolean {
  return c.req.raw.signal.aborted || c.env.incoming.errored !== null;
}

/** The request body, or undefined when it is empty. Throws ClientClosedError if the client drops mid-upload. */
async function readBody(c: Context<ProxyEnv>): Promise<Buffer | undefined> {
  let buffered: Buffer;
  try {
    buffered = Buffer.from(await c.req.arrayBuffer());
  } catch (err) {
    // A body over the size limit also lands here and must reach bodyLimit.
    if (clientGone(c)) throw new ClientClosedError();
    throw err;
  }
  return buffered.byteLength > 0 ? buffered : undefined;
}

export const internalErrorHandler: ErrorHandler<ProxyEnv> = (err, c) => {
  logger.error("Unhandled error in request", {
    error: err.message,
    stack: err.stack,
    method: c.req.method,
    path: c.req.path,
  });
  captureError(err, { route: c.req.path });
  return statusResponse(500);
};

/**
 * TLS listener app: route the request, forward it upstream with the
 * client-identifying headers, and relay the response back.
 */
export function createForwardApp(deps: ForwardAppDeps): Hono<ProxyEnv> {
  const app = new Hono<ProxyEnv>();

  app.use("*", accessLog("https"));
  // Must run before anything touches headers: TRACE cannot be turned into a fetch Request
  app.use("*", async (c, next) => {
    if (!isForwardableMethod(c.req.method)) return statusResponse(501);
    await next();
  });
  app.use("*", bodyLimit({ maxSize: deps.maxBodySize, onError: () => statusResponse(413) }));

  app.all("*", async (c) => {
    const host = c.req.header("host");
    const uri = requestUri(c);
    if (!host || !uri) return statusResponse(400);

    const route = deps.routes.match(host, uri);
    if (!route) return statusResponse(404);

    const method = c.req.method;
    if (!isForwardableMethod(method)) return statusResponse(501);

    const forwarded: ForwardedRequestContext = {
      host,
      clientIp: peerAddress(c),
      forwardedFor: c.req.header("x-forwarded-for"),
      scheme: "https",
    };
    const target = route.group.pick();

    let upstream: UpstreamResponse;
    try {
      const body = method === "GET" || method === "HEAD" ? undefined : await readBody(c);
      upstream = await deps.client.send({
        target,
        method,
        path: uri,
        headers: buildUpstreamHeaders(c.req.raw.headers, forwarded),
        body,
        signal: c.req.raw.signal,
      });
    } catch (err) {
      if (!(err instanceof ProxyError)) throw err;
      return failRequest(err, c);
    }

    return relayResponse(upstream, method, target);
  });

  app.onError(internalErrorHandler);

  return app;
}
