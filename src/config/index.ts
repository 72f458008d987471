import { z } from "zod";
import { ConfigError } from "../proxy/errors.js";
import { SELECTION_STRATEGIES } from "../proxy/types.js";
import { loadRoutesFile } from "./routes-file.js";
import { parseUpstreamList } from "./upstreams.js";

/** Mozilla "intermediate" suites. Without a TLS_* entry the listener cannot negotiate TLS 1.3. */
export const DEFAULT_TLS_CIPHERS = [
  "TLS_AES_128_GCM_SHA256",
  "TLS_AES_256_GCM_SHA384",
  "TLS_CHACHA20_POLY1305_SHA256",
  "ECDHE-ECDSA-AES128-GCM-SHA256",
  "ECDHE-RSA-AES128-GCM-SHA256",
  "ECDHE-ECDSA-AES256-GCM-SHA384",
  "ECDHE-RSA-AES256-GCM-SHA384",
  "ECDHE-ECDSA-CHACHA20-POLY1305",
  "ECDHE-RSA-CHACHA20-POLY1305",
  "DHE-RSA-AES128-GCM-SHA256",
  "DHE-RSA-AES256-GCM-SHA384",
].join(":");

const BYTE_SIZE_RE = /^(\d+)\s*([kmg]?)$/i;
const SIZE_MULTIPLIERS: Record<string, number> = { "": 1, k: 1024, m: 1024 * 1024, g: 1024 * 1024 * 1024 };

/**
 * Parse an nginx-style size ("512", "64k", "1m", "2g") into bytes.
 * Returns null for anything else.
 */
export function parseByteSize(raw: string | number): number | null {
  if (typeof raw === "number") return Number.isInteger(raw) && raw >= 0 ? raw : null;
  const match = raw.trim().match(BYTE_SIZE_RE);
  if (!match) return null;
  return Number.parseInt(match[1], 10) * SIZE_MULTIPLIERS[match[2].toLowerCase()];
}

const portSchema = z.coerce.number().int().min(0).max(65535);
const timeoutSchema = z.coerce.number().int().positive();

const byteSizeSchema = z
  .union([z.string(), z.number()])
  .transform((value, ctx) => {
    const bytes = parseByteSize(value);
    if (bytes === null) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid size "${value}" (expected e.g. 512, 64k, 1m)` });
      return z.NEVER;
    }
    return bytes;
  });

export const upstreamTargetSchema = z.object({
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
});

export const routeDefinitionSchema = z.object({
  name: z.string().min(1),
  hosts: z.array(z.string().min(1)).default([]),
  pathPrefix: z.string().startsWith("/").default("/"),
  upstreams: z.array(upstreamTargetSchema).min(1),
  strategy: z.enum(SELECTION_STRATEGIES).default("round-robin"),
});

export const configSchema = z.object({
  nodeEnv: z.enum(["development", "production", "test"]).default("production"),
  logLevel: z.enum(["error", "warn", "info", "debug"]).default("info"),

  http: z.object({
    host: z.string().min(1).default("0.0.0.0"),
    port: portSchema.default(80),
    /** Public HTTPS port written into redirect Location headers. */
    redirectPort: portSchema.default(443),
  }),

  https: z.object({
    host: z.string().min(1).default("0.0.0.0"),
    port: portSchema.default(443),
    certPath: z.string().min(1).default("/etc/edge-proxy/certificates/fullchain.pem"),
    keyPath: z.string().min(1).default("/etc/edge-proxy/certificates/privkey.pem"),
    ciphers: z.string().min(1).default(DEFAULT_TLS_CIPHERS),
    handshakeTimeoutMs: timeoutSchema.default(60_000),
  }),

  upstream: z.object({
    connectTimeoutMs: timeoutSchema.default(60_000),
    readTimeoutMs: timeoutSchema.default(60_000),
    keepAliveTimeoutMs: timeoutSchema.default(60_000),
    poolSize: z.coerce.number().int().min(1).default(32),
  }),

  client: z.object({
    keepAliveTimeoutMs: timeoutSchema.default(75_000),
    maxBodySize: byteSizeSchema.default("1m"),
  }),

  shutdownGraceMs: z.coerce.number().int().min(0).default(10_000),

  routes: z.array(routeDefinitionSchema).min(1),
});

export type ProxyConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

/**
 * Build and validate the proxy configuration from environment variables.
 *
 * With ROUTES_FILE set, routes come from that YAML file; otherwise a single
 * catch-all route forwards to UPSTREAMS (default "app:8000").
 */
export function loadConfig(env: Env = process.env): ProxyConfig {
  const listenHost = env.LISTEN_HOST;
  const strategy = env.UPSTREAM_STRATEGY;

  const routes = env.ROUTES_FILE
    ? loadRoutesFile(env.ROUTES_FILE)
    : [
        {
          name: "default",
          hosts: [],
          pathPrefix: "/",
          upstreams: parseUpstreamList(env.UPSTREAMS ?? "app:8000"),
          strategy,
        },
      ];

  const result = configSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    logLevel: env.LOG_LEVEL,
    http: {
      host: listenHost,
      port: env.HTTP_PORT,
      redirectPort: env.HTTPS_REDIRECT_PORT,
    },
    https: {
      host: listenHost,
      port: env.HTTPS_PORT,
      certPath: env.TLS_CERT_PATH,
      keyPath: env.TLS_KEY_PATH,
      ciphers: env.TLS_CIPHERS,
      handshakeTimeoutMs: env.TLS_HANDSHAKE_TIMEOUT_MS,
    },
    upstream: {
      connectTimeoutMs: env.UPSTREAM_CONNECT_TIMEOUT_MS,
      readTimeoutMs: env.UPSTREAM_READ_TIMEOUT_MS,
      keepAliveTimeoutMs: env.UPSTREAM_KEEPALIVE_TIMEOUT_MS,
      poolSize: env.UPSTREAM_POOL_SIZE,
    },
    client: {
      keepAliveTimeoutMs: env.CLIENT_KEEPALIVE_TIMEOUT_MS,
      maxBodySize: env.CLIENT_MAX_BODY_SIZE,
    },
    shutdownGraceMs: env.SHUTDOWN_GRACE_MS,
    routes,
  });

  if (!result.success) {
    throw new ConfigError(`Invalid proxy configuration: ${result.error.message}`);
  }
  return result.data;
}
