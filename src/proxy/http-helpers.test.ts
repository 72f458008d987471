import { describe, expect, it } from "vitest";
import { rawStatusResponse, statusResponse } from "./http-helpers.js";

describe("statusResponse", () => {
  it("carries only the status line text", async () => {
    const res = statusResponse(502);
    expect(res.status).toBe(502);
    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(await res.text()).toBe("502 Bad Gateway\n");
    expect(res.headers.get("connection")).toBeNull();
  });

  it("asks for the connection to be closed when told to", () => {
    expect(statusResponse(504, { close: true }).headers.get("connection")).toBe("close");
  });

  it("falls back for statuses without a standard reason", async () => {
    expect(await statusResponse(499).text()).toBe("499 Error\n");
  });
});

describe("rawStatusResponse", () => {
  it("serializes a closing HTTP/1.1 response", () => {
    expect(rawStatusResponse(400)).toBe(
      "HTTP/1.1 400 Bad Request\r\n" +
        "Content-Type: text/plain; charset=utf-8\r\n" +
        "Content-Length: 16\r\n" +
        "Connection: close\r\n" +
        "\r\n" +
        "400 Bad Request\n",
    );
  });
});
