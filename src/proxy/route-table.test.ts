import { describe, expect, it } from "vitest";
import { hostnameOf, RouteTable } from "./route-table.js";
import type { RouteDefinition } from "./types.js";

function makeRoute(overrides: Partial<RouteDefinition> = {}): RouteDefinition {
  return {
    name: "default",
    hosts: [],
    pathPrefix: "/",
    upstreams: [{ host: "app", port: 8000 }],
    strategy: "round-robin",
    ...overrides,
  };
}

describe("hostnameOf", () => {
  it.each([
    ["example.test", "example.test"],
    ["Example.TEST:8443", "example.test"],
    ["127.0.0.1:443", "127.0.0.1"],
    ["[::1]:8443", "[::1]"],
    ["[::1]", "[::1]"],
    [" host ", "host"],
  ])("%s -> %s", (host, expected) => {
    expect(hostnameOf(host)).toBe(expected);
  });
});

describe("RouteTable", () => {
  it("matches every request with a single catch-all route", () => {
    const table = new RouteTable([makeRoute()]);
    expect(table.match("anything.test", "/")?.name).toBe("default");
    expect(table.match("other.test:8443", "/deep/path?q=1")?.name).toBe("default");
  });

  it("returns null when nothing matches", () => {
    const table = new RouteTable([makeRoute({ name: "api", hosts: ["api.test"] })]);
    expect(table.match("www.test", "/")).toBeNull();
  });

  it("prefers an exact host over a wildcard over any host, whatever the declaration order", () => {
    const table = new RouteTable([
      makeRoute({ name: "any" }),
      makeRoute({ name: "wildcard", hosts: ["*.example.test"] }),
      makeRoute({ name: "exact", hosts: ["www.example.test"] }),
    ]);

    expect(table.match("www.example.test", "/")?.name).toBe("exact");
    expect(table.match("api.example.test", "/")?.name).toBe("wildcard");
    expect(table.match("other.test", "/")?.name).toBe("any");
  });

  it("ranks host specificity above path length", () => {
    const table = new RouteTable([
      makeRoute({ name: "any-api", pathPrefix: "/api/v1" }),
      makeRoute({ name: "exact-root", hosts: ["www.example.test"] }),
    ]);
    expect(table.match("www.example.test", "/api/v1/users")?.name).toBe("exact-root");
    expect(table.match("other.test", "/api/v1/users")?.name).toBe("any-api");
  });

  it("prefers the longer path prefix for the same host", () => {
    const table = new RouteTable([
      makeRoute({ name: "root" }),
      makeRoute({ name: "api", pathPrefix: "/api" }),
      makeRoute({ name: "api-v2", pathPrefix: "/api/v2" }),
    ]);

    expect(table.match("h.test", "/api/v2/items")?.name).toBe("api-v2");
    expect(table.match("h.test", "/api/v1/items")?.name).toBe("api");
    expect(table.match("h.test", "/about")?.name).toBe("root");
  });

  it("keeps declaration order between equally specific routes", () => {
    const table = new RouteTable([makeRoute({ name: "first" }), makeRoute({ name: "second" })]);
    expect(table.match("h.test", "/")?.name).toBe("first");
  });

  it("matches path prefixes on segment boundaries", () => {
    const table = new RouteTable([makeRoute({ name: "api", pathPrefix: "/api" })]);

    expect(table.match("h.test", "/api")?.name).toBe("api");
    expect(table.match("h.test", "/api/users")?.name).toBe("api");
    expect(table.match("h.test", "/api?debug=1")?.name).toBe("api");
    expect(table.match("h.test", "/apix")).toBeNull();
    expect(table.match("h.test", "/")).toBeNull();
  });

  it("treats a prefix ending in a slash as a directory", () => {
    const table = new RouteTable([makeRoute({ name: "static", pathPrefix: "/static/" })]);
    expect(table.match("h.test", "/static/app.js")?.name).toBe("static");
    expect(table.match("h.test", "/static")).toBeNull();
  });

  it("ignores the query string when matching paths", () => {
    const table = new RouteTable([makeRoute({ name: "api", pathPrefix: "/api" })]);
    expect(table.match("h.test", "/other?next=/api/x")).toBeNull();
  });

  it("matches hosts case-insensitively and without the port", () => {
    const table = new RouteTable([makeRoute({ name: "www", hosts: ["WWW.Example.test"] })]);
    expect(table.match("www.EXAMPLE.test:8443", "/")?.name).toBe("www");
  });

  it("does not let a wildcard match its bare suffix", () => {
    const table = new RouteTable([makeRoute({ name: "sub", hosts: ["*.example.test"] })]);
    expect(table.match("a.b.example.test", "/")?.name).toBe("sub");
    expect(table.match("example.test", "/")).toBeNull();
    expect(table.match("badexample.test", "/")).toBeNull();
  });

  it("treats a '*' host as any host", () => {
    const table = new RouteTable([
      makeRoute({ name: "star", hosts: ["*"] }),
      makeRoute({ name: "exact", hosts: ["a.test"] }),
    ]);
    expect(table.match("b.test", "/")?.name).toBe("star");
    expect(table.match("a.test", "/")?.name).toBe("exact");
  });

  it("shares one upstream group across the hosts of a route", () => {
    const table = new RouteTable([
      makeRoute({
        name: "multi",
        hosts: ["a.test", "b.test"],
        upstreams: [
          { host: "u1", port: 1 },
          { host: "u2", port: 2 },
        ],
      }),
    ]);

    const viaA = table.match("a.test", "/");
    const viaB = table.match("b.test", "/");
    expect(viaA?.group).toBe(viaB?.group);
    expect(viaA?.group.pick()).toEqual({ host: "u1", port: 1 });
    expect(viaB?.group.pick()).toEqual({ host: "u2", port: 2 });
  });

  it("lists route names once each", () => {
    const table = new RouteTable([
      makeRoute({ name: "multi", hosts: ["a.test", "b.test"] }),
      makeRoute({ name: "default" }),
    ]);
    expect(table.routeNames).toEqual(["multi", "default"]);
  });
});
