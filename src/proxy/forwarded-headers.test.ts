import { describe, expect, it } from "vitest";
import { appendForwardedFor, buildResponseHeaders, buildUpstreamHeaders } from "./forwarded-headers.js";
import type { ForwardedRequestContext } from "./types.js";

function makeContext(overrides: Partial<ForwardedRequestContext> = {}): ForwardedRequestContext {
  return { host: "www.example.test", clientIp: "203.0.113.7", scheme: "https", ...overrides };
}

describe("appendForwardedFor", () => {
  it("starts a chain when there is none", () => {
    expect(appendForwardedFor(undefined, "203.0.113.7")).toBe("203.0.113.7");
    expect(appendForwardedFor("  ", "203.0.113.7")).toBe("203.0.113.7");
  });

  it("appends to an existing chain", () => {
    expect(appendForwardedFor("198.51.100.1, 198.51.100.2", "203.0.113.7")).toBe(
      "198.51.100.1, 198.51.100.2, 203.0.113.7",
    );
  });
});

describe("buildUpstreamHeaders", () => {
  it("sets the client-identifying headers", () => {
    const headers = buildUpstreamHeaders(new Headers({ host: "www.example.test:8443" }), makeContext());
    expect(headers).toEqual({
      host: "www.example.test",
      "x-real-ip": "203.0.113.7",
      "x-forwarded-for": "203.0.113.7",
      "x-forwarded-proto": "https",
    });
  });

  it("passes the client's Host through verbatim, port included", () => {
    const headers = buildUpstreamHeaders(new Headers(), makeContext({ host: "WWW.Example.test:8443" }));
    expect(headers.host).toBe("WWW.Example.test:8443");
  });

  it("appends the client address to an incoming X-Forwarded-For", () => {
    const incoming = new Headers({ "x-forwarded-for": "198.51.100.1" });
    const headers = buildUpstreamHeaders(incoming, makeContext({ forwardedFor: "198.51.100.1" }));
    expect(headers["x-forwarded-for"]).toBe("198.51.100.1, 203.0.113.7");
  });

  it("overrides client-supplied X-Real-IP and X-Forwarded-Proto", () => {
    const incoming = new Headers({ "x-real-ip": "10.9.9.9", "x-forwarded-proto": "http" });
    const headers = buildUpstreamHeaders(incoming, makeContext());
    expect(headers["x-real-ip"]).toBe("203.0.113.7");
    expect(headers["x-forwarded-proto"]).toBe("https");
  });

  it("drops hop-by-hop headers and Content-Length", () => {
    const incoming = new Headers({
      connection: "keep-alive, x-session-hop",
      "keep-alive": "timeout=5",
      "x-session-hop": "1",
      "transfer-encoding": "chunked",
      te: "trailers",
      upgrade: "websocket",
      "proxy-authorization": "Basic dGVzdDp0ZXN0",
      "content-length": "12",
      "content-type": "application/json",
      cookie: "sid=test-session",
    });

    const headers = buildUpstreamHeaders(incoming, makeContext());

    expect(Object.keys(headers).sort()).toEqual([
      "content-type",
      "cookie",
      "host",
      "x-forwarded-for",
      "x-forwarded-proto",
      "x-real-ip",
    ]);
    expect(headers["content-type"]).toBe("application/json");
    expect(headers.cookie).toBe("sid=test-session");
  });
});

describe("buildResponseHeaders", () => {
  it("copies end-to-end headers and repeats multi-value ones", () => {
    const headers = buildResponseHeaders({
      "content-type": "text/html",
      "set-cookie": ["a=1", "b=2"],
      "x-empty": undefined,
    });

    expect(headers.get("content-type")).toBe("text/html");
    expect(headers.getSetCookie()).toEqual(["a=1", "b=2"]);
    expect(headers.has("x-empty")).toBe(false);
  });

  it("strips hop-by-hop headers and headers named in Connection", () => {
    const headers = buildResponseHeaders({
      connection: "keep-alive, x-upstream-hop",
      "keep-alive": "timeout=5",
      "transfer-encoding": "chunked",
      "x-upstream-hop": "1",
      "content-length": "5",
    });

    expect([...headers.keys()]).toEqual(["content-length"]);
  });
});
