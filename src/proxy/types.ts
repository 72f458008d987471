import type { HttpBindings } from "@hono/node-server";

/** Upstream backend address. */
export interface UpstreamTarget {
  host: string;
  port: number;
}

export const SELECTION_STRATEGIES = ["round-robin", "random"] as const;
/** How a route picks one of its upstream targets per request. */
export type SelectionStrategyName = (typeof SELECTION_STRATEGIES)[number];

/** A configured route: host/path match mapped to an upstream group. */
export interface RouteDefinition {
  name: string;
  /** Exact hostnames or `*.suffix` wildcards. Empty matches any host. */
  hosts: string[];
  /** Matched on path segment boundaries. "/" matches everything. */
  pathPrefix: string;
  upstreams: UpstreamTarget[];
  strategy: SelectionStrategyName;
}

/** Address a listener binds to. */
export interface ListenerConfig {
  host: string;
  port: number;
}

/** TLS listener settings. Certificate and key are read once at startup. */
export interface TlsListenerConfig extends ListenerConfig {
  certPath: string;
  keyPath: string;
  ciphers: string;
  handshakeTimeoutMs: number;
}

/** Per-stage upstream timeouts and pool sizing. */
export interface UpstreamConfig {
  connectTimeoutMs: number;
  readTimeoutMs: number;
  keepAliveTimeoutMs: number;
  poolSize: number;
}

/**
 * Per-request data describing the original client, injected as outbound headers.
 * Lives only for the duration of one forwarded request.
 */
export interface ForwardedRequestContext {
  /** Host header exactly as the client sent it. */
  host: string;
  /** Immediate peer address of the client connection. */
  clientIp: string;
  /** Incoming X-Forwarded-For, if the client sent one. */
  forwardedFor?: string;
  /** Always "https": forwarding only happens after TLS termination. */
  scheme: "https";
}

/** Which listener a request arrived on. */
export type ListenerKind = "http" | "https";

/** Hono environment for apps served through the Node adapter. */
export type ProxyEnv = { Bindings: HttpBindings };
