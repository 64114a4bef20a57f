import { afterEach, describe, expect, test, vi } from "vitest";
import { PanoramaClient } from "../client.js";
import { TransportError } from "../errors.js";
import { createLogger } from "../logger.js";

const logger = createLogger("silent");

describe("PanoramaClient", () => {
  describe("buildUrl", () => {
    test("defaults to https on the standard port", () => {
      const client = new PanoramaClient({ hostname: "pano.example.com", apiKey: "test-secret", logger });
      expect(client.buildUrl().toString()).toBe("https://pano.example.com/api/");
    });

    test("strips a scheme and trailing slashes from the hostname", () => {
      const client = new PanoramaClient({ hostname: "https://pano.example.com///", apiKey: "test-secret", logger });
      expect(client.buildUrl().toString()).toBe("https://pano.example.com/api/");
    });

    test("applies protocol and port", () => {
      const client = new PanoramaClient({
        hostname: "192.0.2.10",
        apiKey: "test-secret",
        protocol: "http",
        port: 8080,
        logger,
      });
      expect(client.buildUrl().toString()).toBe("http://192.0.2.10:8080/api/");
    });
  });

  describe("send", () => {
    const client = new PanoramaClient({ hostname: "192.0.2.10", apiKey: "test-secret", logger });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    test("POSTs a form body with the key in a header", async () => {
      const fetchMock = vi
        .spyOn(globalThis, "fetch")
        .mockResolvedValue(new Response('<response status="success"/>', { status: 200 }));

      const text = await client.send({ type: "op", cmd: "<show><clock/></show>" });

      expect(text).toBe('<response status="success"/>');
      expect(fetchMock).toHaveBeenCalledTimes(1);
      const [url, init] = fetchMock.mock.calls[0];
      expect(String(url)).toBe("https://192.0.2.10/api/");
      expect(init?.method).toBe("POST");
      const headers = new Headers(init?.headers);
      expect(headers.get("X-PAN-KEY")).toBe("test-secret");
      expect(headers.get("Content-Type")).toBe("application/x-www-form-urlencoded");
      const body = new URLSearchParams(String(init?.body));
      expect(body.get("type")).toBe("op");
      expect(body.get("cmd")).toBe("<show><clock/></show>");
    });

    test("returns error documents sent with an HTTP error status", async () => {
      const doc = '<response status="error" code="403"><result><msg>Invalid credentials.</msg></result></response>';
      vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response(doc, { status: 403 }));

      expect(await client.send({ type: "op", cmd: "<show><clock/></show>" })).toBe(doc);
    });

    test("other HTTP failures are TransportErrors", async () => {
      vi.spyOn(globalThis, "fetch").mockResolvedValue(new Response("Bad Gateway", { status: 502 }));

      const err = await client.send({ type: "op", cmd: "<x/>" }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect(err).toHaveProperty("message", "HTTP 502");
      expect(err).toHaveProperty("status", 502);
      expect(err).toHaveProperty("detail", { status: 502, body: "Bad Gateway" });
    });

    test("network failures are TransportErrors carrying the cause", async () => {
      const cause = new TypeError("fetch failed");
      vi.spyOn(globalThis, "fetch").mockRejectedValue(cause);

      const err = await client.send({ type: "op", cmd: "<x/>" }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect(err).toHaveProperty("message", "Request to 192.0.2.10 failed: fetch failed");
      expect(err).toHaveProperty("cause", cause);
    });

    test("a failure while reading the body is a TransportError", async () => {
      const cause = new DOMException("The operation was aborted due to timeout", "TimeoutError");
      const resp = new Response("<response status=", { status: 200 });
      vi.spyOn(resp, "text").mockRejectedValue(cause);
      vi.spyOn(globalThis, "fetch").mockResolvedValue(resp);

      const err = await client.send({ type: "op", cmd: "<x/>" }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(TransportError);
      expect(err).toHaveProperty(
        "message",
        "Reading reply from 192.0.2.10 failed: The operation was aborted due to timeout",
      );
      expect(err).toHaveProperty("status", 200);
      expect(err).toHaveProperty("cause", cause);
    });
  });
});
