import { errors as undiciErrors } from "undici";
import type { UpstreamTarget } from "./types.js";

/** Base class for failures that end a single proxied request. */
export abstract class ProxyError extends Error {
  abstract readonly httpStatus: number;
}

/** Upstream refused, unreachable, unresolvable or closed the connection early. */
export class UpstreamUnavailableError extends ProxyError {
  readonly httpStatus = 502;
  readonly target: string;

  constructor(target: UpstreamTarget, reason: string) {
    super(`Upstream ${formatTarget(target)} unavailable: ${reason}`);
    this.name = "UpstreamUnavailableError";
    this.target = formatTarget(target);
  }
}

/** Upstream accepted the request but did not answer within the read timeout. */
export class UpstreamTimeoutError extends ProxyError {
  readonly httpStatus = 504;
  readonly target: string;
  readonly timeoutMs: number;

  constructor(target: UpstreamTarget, timeoutMs: number) {
    super(`Upstream ${formatTarget(target)} did not respond within ${timeoutMs}ms`);
    this.name = "UpstreamTimeoutError";
    this.target = formatTarget(target);
    this.timeoutMs = timeoutMs;
  }
}

/** The client went away before the upstream answered. 499 follows the nginx convention. */
export class ClientClosedError extends ProxyError {
  readonly httpStatus = 499;

  constructor() {
    super("Client closed the connection before the upstream responded");
    this.name = "ClientClosedError";
  }
}

/** Certificate or key missing, unreadable, or not a matching pair. Fatal at startup. */
export class TlsMaterialError extends Error {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(`Invalid TLS material at ${path}: ${reason}`);
    this.name = "TlsMaterialError";
    this.path = path;
  }
}

/** Invalid proxy configuration. Fatal at startup. */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Node socket error codes that mean the upstream cannot be reached. */
const UNREACHABLE_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ENOTFOUND",
  "EAI_AGAIN",
  "ETIMEDOUT",
  "EPIPE",
]);

export function formatTarget(target: UpstreamTarget): string {
  return target.host.includes(":") ? `[${target.host}]:${target.port}` : `${target.host}:${target.port}`;
}

/** The `code` of a Node system error, if it has one. */
export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * Map an error thrown by the upstream client to a ProxyError.
 *
 * Returns `null` when the error is not a recognised transport failure, so the
 * caller can report it as an internal fault.
 */
export function classifyUpstreamError(
  err: unknown,
  target: UpstreamTarget,
  readTimeoutMs: number,
): ProxyError | null {
  if (err instanceof ProxyError) return err;

  if (err instanceof undiciErrors.HeadersTimeoutError || err instanceof undiciErrors.BodyTimeoutError) {
    return new UpstreamTimeoutError(target, readTimeoutMs);
  }
  if (err instanceof undiciErrors.RequestAbortedError) {
    return new ClientClosedError();
  }
  if (err instanceof undiciErrors.ConnectTimeoutError) {
    return new UpstreamUnavailableError(target, "connect timeout");
  }
  if (err instanceof undiciErrors.SocketError) {
    return new UpstreamUnavailableError(target, err.message);
  }

  // Happy-eyeballs connects fail with one error per address tried
  if (err instanceof AggregateError && err.errors.length > 0 && errorCode(err) === undefined) {
    return classifyUpstreamError(err.errors[0], target, readTimeoutMs);
  }

  const code = errorCode(err);
  if (code && UNREACHABLE_CODES.has(code)) {
    return new UpstreamUnavailableError(target, code);
  }
  return null;
}
