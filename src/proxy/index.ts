/**
 * Edge proxy: HTTP-to-HTTPS redirect listener and TLS-terminating reverse proxy.
 */

export type { ListenerAddresses } from "./edge-proxy.js";
export { EdgeProxy } from "./edge-proxy.js";
export {
  ClientClosedError,
  ConfigError,
  ProxyError,
  TlsMaterialError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from "./errors.js";
export type { ResolvedRoute } from "./route-table.js";
export { RouteTable } from "./route-table.js";
export type {
  RouteDefinition,
  SelectionStrategyName,
  TlsListenerConfig,
  UpstreamConfig,
  UpstreamTarget,
} from "./types.js";
export { UpstreamGroup } from "./upstream-group.js";
