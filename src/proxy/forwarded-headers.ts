import type { ForwardedRequestContext } from "./types.js";

/**
 * Connection-scoped headers that never cross the proxy in either direction.
 * The upstream client manages its own connection, framing and expectations.
 */
export const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "proxy-authorization",
  "transfer-encoding",
  "te",
  "trailer",
  "upgrade",
  "expect",
]);

/** Header names listed in a Connection header are hop-by-hop for that message too. */
function connectionTokens(value: string | null | undefined): Set<string> {
  if (!value) return new Set();
  return new Set(
    value
      .split(",")
      .map((t) => t.trim().toLowerCase())
      .filter(Boolean),
  );
}

/** Append the client address to an existing X-Forwarded-For chain. */
export function appendForwardedFor(prior: string | undefined, clientIp: string): string {
  const chain = prior?.trim();
  return chain ? `${chain}, ${clientIp}` : clientIp;
}

/**
 * Build the header set sent upstream.
 *
 * Hop-by-hop headers and Content-Length are dropped (the body is re-framed),
 * then Host, X-Real-IP, X-Forwarded-For and X-Forwarded-Proto are set from
 * the forwarded request context, overriding anything the client sent.
 */
export function buildUpstreamHeaders(incoming: Headers, ctx: ForwardedRequestContext): Record<string, string> {
  const listed = connectionTokens(incoming.get("connection"));
  const headers: Record<string, string> = {};

  incoming.forEach((value, name) => {
    const key = name.toLowerCase();
    if (HOP_BY_HOP_HEADERS.has(key) || listed.has(key) || key === "content-length") return;
    headers[key] = value;
  });

  headers.host = ctx.host;
  headers["x-real-ip"] = ctx.clientIp;
  headers["x-forwarded-for"] = appendForwardedFor(ctx.forwardedFor, ctx.clientIp);
  headers["x-forwarded-proto"] = ctx.scheme;
  return headers;
}

/** Convert upstream response headers to a fetch Headers object, minus hop-by-hop headers. */
export function buildResponseHeaders(upstream: Record<string, string | string[] | undefined>): Headers {
  const connection = upstream.connection;
  const listed = connectionTokens(Array.isArray(connection) ? connection.join(",") : connection);
  const headers = new Headers();

  for (const [name, value] of Object.entries(upstream)) {
    const key = name.toLowerCase();
    if (value === undefined || HOP_BY_HOP_HEADERS.has(key) || listed.has(key)) continue;
    if (Array.isArray(value)) {
      for (const v of value) headers.append(key, v);
    } else {
      headers.set(key, value);
    }
  }
  return headers;
}
