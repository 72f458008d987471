import { createServer as createHttpServer, type Server as HttpServer } from "node:http";
import { createServer as createHttpsServer, type Server as HttpsServer } from "node:https";
import type { AddressInfo, Server } from "node:net";
import type { Duplex } from "node:stream";
import type { TLSSocket } from "node:tls";
import { getRequestListener } from "@hono/node-server";
import type { ProxyConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { captureError } from "../observability/sentry.js";
import { errorCode } from "./errors.js";
import { createForwardApp } from "./forward.js";
import { rawStatusResponse, statusResponse } from "./http-helpers.js";
import { createRedirectApp } from "./redirect.js";
import { RouteTable } from "./route-table.js";
import { buildTlsServerOptions, loadTlsMaterial } from "./tls.js";
import type { ListenerConfig, ListenerKind } from "./types.js";
import { UpstreamClient } from "./upstream-client.js";

export interface ListenerAddresses {
  http: AddressInfo;
  https: AddressInfo;
}

type ProxyServer = HttpServer | HttpsServer;

/** Parser errors that get a more specific status than 400. */
const CLIENT_ERROR_STATUS: Record<string, number> = {
  HPE_HEADER_OVERFLOW: 431,
  ERR_HTTP_REQUEST_TIMEOUT: 408,
};

function listen(server: Server, listener: ListenerConfig): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(listener.port, listener.host, () => {
      server.off("error", reject);
      const address = server.address();
      if (address === null || typeof address === "string") {
        reject(new Error(`Listener on ${listener.host}:${listener.port} has no TCP address`));
        return;
      }
      resolve(address);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server.listening) {
      resolve();
      return;
    }
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** Answer requests the HTTP parser rejected, then close the connection. */
function handleClientError(listener: ListenerKind) {
  return (err: Error, socket: Duplex): void => {
    const code = errorCode(err);
    if (code === "ECONNRESET" || !socket.writable) {
      socket.destroy();
      return;
    }
    const status = (code && CLIENT_ERROR_STATUS[code]) || 400;
    logger.debug("Rejected malformed request", { listener, code, status });
    socket.end(rawStatusResponse(status));
  };
}

function requestListenerErrorHandler(listener: ListenerKind) {
  return (err: unknown): Response => {
    logger.error("Request listener failed", {
      listener,
      error: err instanceof Error ? err.message : String(err),
      stack: err instanceof Error ? err.stack : undefined,
    });
    captureError(err, { source: `${listener}-listener` });
    return statusResponse(500);
  };
}

/**
 * Two listeners in front of one upstream pool: plaintext HTTP answers every
 * request with a redirect to HTTPS, and the TLS listener forwards requests
 * to the upstream group its route selects.
 *
 * TLS material is loaded before anything binds; a bad certificate or key, or a
 * port that cannot be bound, fails `start()` and leaves nothing listening.
 */
export class EdgeProxy {
  private readonly routes: RouteTable;
  private readonly client: UpstreamClient;
  private httpServer: ProxyServer | null = null;
  private httpsServer: ProxyServer | null = null;
  private bound: ListenerAddresses | null = null;
  private stopped = false;

  constructor(private readonly config: ProxyConfig) {
    this.routes = new RouteTable(config.routes);
    this.client = new UpstreamClient(config.upstream);
  }

  async start(): Promise<ListenerAddresses> {
    if (this.bound) throw new Error("Edge proxy already started");
    // The upstream pool is closed on stop and cannot be reopened
    if (this.stopped) throw new Error("Edge proxy cannot be restarted");

    const material = loadTlsMaterial(this.config.https.certPath, this.config.https.keyPath);
    logger.info("Loaded TLS certificate", { subject: material.subject, validTo: material.validTo });

    const forwardApp = createForwardApp({
      routes: this.routes,
      client: this.client,
      maxBodySize: this.config.client.maxBodySize,
    });
    const redirectApp = createRedirectApp({ httpsPort: this.config.http.redirectPort });

    const httpsServer = createHttpsServer(
      buildTlsServerOptions(material, this.config.https),
      getRequestListener(forwardApp.fetch, { errorHandler: requestListenerErrorHandler("https") }),
    );
    httpsServer.keepAliveTimeout = this.config.client.keepAliveTimeoutMs;
    httpsServer.on("clientError", handleClientError("https"));
    httpsServer.on("tlsClientError", (err: Error, socket: TLSSocket) => {
      logger.debug("TLS handshake failed", { error: err.message, clientIp: socket.remoteAddress });
    });

    const httpServer = createHttpServer(
      getRequestListener(redirectApp.fetch, { errorHandler: requestListenerErrorHandler("http") }),
    );
    httpServer.keepAliveTimeout = this.config.client.keepAliveTimeoutMs;
    httpServer.on("clientError", handleClientError("http"));

    this.httpsServer = httpsServer;
    this.httpServer = httpServer;

    let bound: ListenerAddresses;
    try {
      const https = await listen(httpsServer, this.config.https);
      const http = await listen(httpServer, this.config.http);
      bound = { http, https };
    } catch (err) {
      this.stopped = true;
      await this.closeListeners();
      await this.client.close();
      throw err;
    }

    this.bound = bound;
    logger.info("Edge proxy listening", {
      http: `${bound.http.address}:${bound.http.port}`,
      https: `${bound.https.address}:${bound.https.port}`,
      routes: this.routes.routeNames,
    });
    return bound;
  }

  /** Bound listener addresses, or null before `start()` resolves. */
  get addresses(): ListenerAddresses | null {
    return this.bound;
  }

  /**
   * Stop accepting connections, let in-flight requests finish for up to
   * `shutdownGraceMs`, then drop whatever is left and close the upstream pool.
   */
  async stop(): Promise<void> {
    if (!this.httpServer && !this.httpsServer) return;
    this.stopped = true;
    logger.info("Edge proxy shutting down", { graceMs: this.config.shutdownGraceMs });
    await this.closeListeners();
    await this.client.close();
    this.bound = null;
    logger.info("Edge proxy stopped");
  }

  private async closeListeners(): Promise<void> {
    const servers = [this.httpsServer, this.httpServer].filter((s): s is ProxyServer => s !== null);
    this.httpsServer = null;
    this.httpServer = null;

    const force = setTimeout(() => {
      logger.warn("Shutdown grace period elapsed, closing remaining connections");
      for (const server of servers) server.closeAllConnections();
    }, this.config.shutdownGraceMs);
    force.unref();

    try {
      const closing = servers.map(closeServer);
      for (const server of servers) server.closeIdleConnections();
      await Promise.all(closing);
    } finally {
      clearTimeout(force);
    }
  }
}
