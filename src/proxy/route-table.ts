import { createStrategy, UpstreamGroup } from "./upstream-group.js";
import type { RouteDefinition } from "./types.js";

/** A route ready to serve traffic. */
export interface ResolvedRoute {
  name: string;
  group: UpstreamGroup;
}

type HostMatcher = { kind: "exact"; host: string } | { kind: "wildcard"; suffix: string } | { kind: "any" };

interface RouteEntry {
  route: ResolvedRoute;
  host: HostMatcher;
  pathPrefix: string;
  order: number;
}

const HOST_RANK: Record<HostMatcher["kind"], number> = { exact: 2, wildcard: 1, any: 0 };

/**
 * Strip the port from a Host header value and lower-case it.
 * Handles bracketed IPv6 literals ("[::1]:8443" -> "[::1]").
 */
export function hostnameOf(host: string): string {
  const value = host.trim().toLowerCase();
  if (value.startsWith("[")) {
    const close = value.indexOf("]");
    return close === -1 ? value : value.slice(0, close + 1);
  }
  const colon = value.indexOf(":");
  return colon === -1 ? value : value.slice(0, colon);
}

function compileHost(pattern: string): HostMatcher {
  const host = pattern.trim().toLowerCase();
  if (host === "*") return { kind: "any" };
  if (host.startsWith("*.")) return { kind: "wildcard", suffix: host.slice(1) };
  return { kind: "exact", host };
}

function hostMatches(matcher: HostMatcher, hostname: string): boolean {
  switch (matcher.kind) {
    case "exact":
      return matcher.host === hostname;
    case "wildcard":
      return hostname.endsWith(matcher.suffix) && hostname.length > matcher.suffix.length;
    case "any":
      return true;
  }
}

/** Prefix match on segment boundaries: "/api" matches "/api" and "/api/x", not "/apix". */
function pathMatches(prefix: string, path: string): boolean {
  if (prefix === "/" || path === prefix) return true;
  if (prefix.endsWith("/")) return path.startsWith(prefix);
  return path.startsWith(`${prefix}/`);
}

/**
 * Ordered route list. Entries are sorted by specificity (exact host, then
 * wildcard host, then any host; longer path prefix first) and the first
 * match wins. Ties keep declaration order.
 */
export class RouteTable {
  private readonly entries: RouteEntry[];

  constructor(definitions: readonly RouteDefinition[]) {
    const entries: RouteEntry[] = [];
    for (const def of definitions) {
      const route: ResolvedRoute = {
        name: def.name,
        group: new UpstreamGroup(def.upstreams, createStrategy(def.strategy)),
      };
      const hosts: HostMatcher[] = def.hosts.length > 0 ? def.hosts.map(compileHost) : [{ kind: "any" }];
      for (const host of hosts) {
        entries.push({ route, host, pathPrefix: def.pathPrefix, order: entries.length });
      }
    }

    this.entries = entries.sort(
      (a, b) =>
        HOST_RANK[b.host.kind] - HOST_RANK[a.host.kind] ||
        b.pathPrefix.length - a.pathPrefix.length ||
        a.order - b.order,
    );
  }

  /** Find the route for a Host header value and request URI (query string ignored). */
  match(host: string, uri: string): ResolvedRoute | null {
    const hostname = hostnameOf(host);
    const query = uri.indexOf("?");
    const path = query === -1 ? uri : uri.slice(0, query);

    for (const entry of this.entries) {
      if (hostMatches(entry.host, hostname) && pathMatches(entry.pathPrefix, path)) {
        return entry.route;
      }
    }
    return null;
  }

  get routeNames(): string[] {
    return [...new Set(this.entries.map((e) => e.route.name))];
  }
}
