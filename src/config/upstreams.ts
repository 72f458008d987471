import { ConfigError } from "../proxy/errors.js";
import type { UpstreamTarget } from "../proxy/types.js";

const DEFAULT_UPSTREAM_PORT = 80;

/**
 * Parse a single "host:port" or "[v6addr]:port" upstream address.
 * The port defaults to 80 when omitted.
 */
export function parseUpstreamTarget(raw: string): UpstreamTarget {
  const addr = raw.trim();
  let host: string;
  let portStr: string | undefined;

  if (addr.startsWith("[")) {
    const close = addr.indexOf("]");
    if (close === -1) {
      throw new ConfigError(`Invalid upstream "${raw}": unterminated IPv6 literal`);
    }
    host = addr.slice(1, close);
    const rest = addr.slice(close + 1);
    if (rest && !rest.startsWith(":")) {
      throw new ConfigError(`Invalid upstream "${raw}": unexpected text after IPv6 literal`);
    }
    portStr = rest ? rest.slice(1) : undefined;
  } else {
    const parts = addr.split(":");
    if (parts.length > 2) {
      throw new ConfigError(`Invalid upstream "${raw}": IPv6 addresses must be bracketed`);
    }
    host = parts[0];
    portStr = parts[1];
  }

  if (!host) {
    throw new ConfigError(`Invalid upstream "${raw}": missing host`);
  }
  const port = portStr === undefined ? DEFAULT_UPSTREAM_PORT : Number(portStr);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Invalid upstream "${raw}": port must be 1-65535`);
  }
  return { host, port };
}

/** Parse a comma-separated upstream list, e.g. "app:8000,app-2:8000". */
export function parseUpstreamList(raw: string): UpstreamTarget[] {
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean)
    .map(parseUpstreamTarget);
}
