import { STATUS_CODES } from "node:http";
import type { Context } from "hono";
import type { ProxyEnv } from "./types.js";

function statusBody(status: number): string {
  return `${status} ${STATUS_CODES[status] ?? "Error"}\n`;
}

/**
 * Locally generated response carrying only the status line text,
 * e.g. "502 Bad Gateway". Nothing about the failure itself is exposed.
 * With `close`, the client connection is closed once the response is written.
 */
export function statusResponse(status: number, options: { close?: boolean } = {}): Response {
  const headers: Record<string, string> = { "content-type": "text/plain; charset=utf-8" };
  if (options.close) headers.connection = "close";
  return new Response(statusBody(status), { status, headers });
}

/**
 * The request target exactly as received (path + query).
 * Absolute-form targets ("GET http://host/x") are reduced to their path.
 * Returns null for targets that have no path, such as "*".
 */
export function requestUri(c: Context<ProxyEnv>): string | null {
  const raw = c.env.incoming.url ?? "/";
  if (raw.startsWith("/")) return raw;
  if (!URL.canParse(raw)) return null;
  const url = new URL(raw);
  return `${url.pathname}${url.search}`;
}

/**
 * Serialized HTTP/1.1 error response for sockets the HTTP parser rejected,
 * where no Request or Response objects exist. Always closes the connection.
 */
export function rawStatusResponse(status: number): string {
  const body = statusBody(status);
  return [
    `HTTP/1.1 ${status} ${STATUS_CODES[status] ?? "Error"}`,
    "Content-Type: text/plain; charset=utf-8",
    `Content-Length: ${Buffer.byteLength(body)}`,
    "Connection: close",
    "",
    body,
  ].join("\r\n");
}
