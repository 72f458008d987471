import { getConnInfo } from "@hono/node-server/conninfo";
import type { Context } from "hono";

/** Strip the IPv4-mapped IPv6 prefix (::ffff:) so IPv4 clients read as plain dotted quads. */
export function normalizeIp(ip: string): string {
  return ip.toLowerCase().startsWith("::ffff:") && ip.includes(".") ? ip.slice(7) : ip;
}

/**
 * Immediate peer address of the client connection.
 *
 * X-Forwarded-For is never consulted here; the proxy only appends to it.
 * Falls back to `"unknown"` if the socket has no address (already closed).
 */
export function peerAddress(c: Context): string {
  const address = getConnInfo(c).remote.address;
  return address ? normalizeIp(address) : "unknown";
}
