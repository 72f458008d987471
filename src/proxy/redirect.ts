import { Hono } from "hono";
import { accessLog } from "./access-log.js";
import { requestUri, statusResponse } from "./http-helpers.js";
import { hostnameOf } from "./route-table.js";
import type { ProxyEnv } from "./types.js";

/**
 * A bracketed IPv6 literal or a URI reg-name (unreserved, sub-delims and
 * percent-encoded characters), already lower-cased. Excludes anything that
 * would change the meaning of the Location URL.
 */
const HOSTNAME_RE = /^(?:\[[0-9a-f:.]+\]|[a-z0-9\-._~!$&'()*+,;=%]+)$/;

export interface RedirectAppOptions {
  /** Public HTTPS port; appended to the Location host unless it is 443. */
  httpsPort: number;
}

/**
 * Build the HTTPS URL for a plaintext request.
 * Returns null when the Host header is not a usable hostname.
 */
export function buildHttpsLocation(host: string, uri: string, httpsPort: number): string | null {
  const hostname = hostnameOf(host);
  if (!HOSTNAME_RE.test(hostname)) return null;
  const authority = httpsPort === 443 ? hostname : `${hostname}:${httpsPort}`;
  return `https://${authority}${uri}`;
}

/**
 * Plaintext listener app: every request, whatever its method or path, gets a
 * 301 to the same URI over HTTPS. This app has no upstream client.
 */
export function createRedirectApp(options: RedirectAppOptions): Hono<ProxyEnv> {
  const app = new Hono<ProxyEnv>();

  app.use("*", accessLog("http"));

  app.all("*", (c) => {
    const host = c.env.incoming.headers.host;
    const uri = requestUri(c);
    const location = host && uri ? buildHttpsLocation(host, uri, options.httpsPort) : null;
    if (!location) return statusResponse(400);
    return c.redirect(location, 301);
  });

  return app;
}
