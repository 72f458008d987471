import fs from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { ConfigError, errorCode } from "../proxy/errors.js";
import { SELECTION_STRATEGIES, type RouteDefinition } from "../proxy/types.js";
import { parseUpstreamTarget } from "./upstreams.js";

const routesFileSchema = z.object({
  routes: z
    .array(
      z.object({
        name: z.string().min(1),
        hosts: z.array(z.string().min(1)).default([]),
        pathPrefix: z.string().startsWith("/").default("/"),
        upstreams: z.array(z.string().min(1)).min(1),
        strategy: z.enum(SELECTION_STRATEGIES).default("round-robin"),
      }),
    )
    .min(1),
});

/**
 * Parse a YAML route table.
 *
 * ```yaml
 * routes:
 *   - name: api
 *     hosts: ["api.example.com"]
 *     pathPrefix: /v1
 *     upstreams: ["api-1:8000", "api-2:8000"]
 *     strategy: round-robin
 *   - name: default
 *     upstreams: ["app:8000"]
 * ```
 */
export function parseRoutesFile(content: string, filename: string): RouteDefinition[] {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    throw new ConfigError(`Invalid routes file "${filename}": ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = routesFileSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid routes file "${filename}": ${result.error.message}`);
  }

  return result.data.routes.map((route) => ({
    ...route,
    upstreams: route.upstreams.map(parseUpstreamTarget),
  }));
}

/** Read and parse the route table at `path`. */
export function loadRoutesFile(path: string): RouteDefinition[] {
  let content: string;
  try {
    content = fs.readFileSync(path, "utf-8");
  } catch (err) {
    const code = errorCode(err) ?? "unknown error";
    throw new ConfigError(`Cannot read routes file "${path}": ${code}`);
  }
  return parseRoutesFile(content, path);
}
