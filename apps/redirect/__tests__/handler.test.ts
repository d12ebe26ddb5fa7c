/**
 * Redirect Handler Tests
 *
 * Tests the lookup handler and its per-source constructors.
 */

import { describe, it, expect, jest } from "@jest/globals";
import { InvalidRecordError, ParseError, StoreError } from "@waypost/shared";
import { SEED_ENTRY } from "@waypost/store";

import {
  createLookupHandler,
  jsonHandler,
  mapHandler,
  requestPath,
  storeHandler,
  yamlHandler,
} from "../src/handler.js";
import type { RedirectHandler } from "../src/types.js";
import { request, testHelpers } from "./setup.js";

describe("Redirect Handler", () => {
  const createFallback = () =>
    jest.fn<RedirectHandler>(async () => new Response("fallback", { status: 200 }));

  const source = {
    name: "static" as const,
    mapping: new Map([
      ["/a", "https://a.example"],
      ["/café", "https://example.com/cafe"],
    ]),
  };

  describe("createLookupHandler", () => {
    it("should return 302 with Location for a mapped path", async () => {
      const fallback = createFallback();
      const handler = createLookupHandler(source, fallback);

      const response = await handler(request("/a"));

      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe("https://a.example");
      expect(response.headers.get("Cache-Control")).toBe("no-store");
      expect(await response.text()).toBe("");
      expect(fallback).not.toHaveBeenCalled();
    });

    it("should delegate unmapped paths to the fallback unchanged", async () => {
      const fallbackResponse = new Response("from fallback", { status: 200 });
      const fallback = jest.fn<RedirectHandler>(async () => fallbackResponse);
      const handler = createLookupHandler(source, fallback);
      const req = request("/b");

      const response = await handler(req);

      expect(response).toBe(fallbackResponse);
      expect(fallback).toHaveBeenCalledTimes(1);
      expect(fallback).toHaveBeenCalledWith(req);
    });

    it("should ignore the query string", async () => {
      const handler = createLookupHandler(source, createFallback());

      const response = await handler(request("/a?utm_source=test"));

      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe("https://a.example");
    });

    it("should match paths case-sensitively", async () => {
      const fallback = createFallback();
      const handler = createLookupHandler(source, fallback);

      const response = await handler(request("/A"));

      expect(response.status).toBe(200);
      expect(fallback).toHaveBeenCalled();
    });

    it("should not treat a trailing slash as the same path", async () => {
      const fallback = createFallback();
      const handler = createLookupHandler(source, fallback);

      await handler(request("/a/"));

      expect(fallback).toHaveBeenCalled();
    });

    it("should match percent-encoded paths against decoded keys", async () => {
      const handler = createLookupHandler(source, createFallback());

      const response = await handler(request("/caf%C3%A9"));

      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe("https://example.com/cafe");
    });

    it("should redirect regardless of method", async () => {
      const handler = createLookupHandler(source, createFallback());

      const response = await handler(request("/a", { method: "POST" }));

      expect(response.status).toBe(302);
    });
  });

  describe("requestPath", () => {
    it("should drop the query and decode escapes", () => {
      expect(requestPath(request("/docs%20v2?page=1"))).toBe("/docs v2");
    });

    it("should decode reserved characters", () => {
      expect(requestPath(request("/what%3F"))).toBe("/what?");
      expect(requestPath(request("/a%2Fb"))).toBe("/a/b");
    });

    it("should keep a malformed escape as-is", () => {
      expect(requestPath(request("/bad%E0%A4%A"))).toBe("/bad%E0%A4%A");
    });
  });

  describe("mapHandler", () => {
    it("should reach a key containing an escaped question mark", async () => {
      const handler = mapHandler({ "/what?": "https://example.com/faq" }, createFallback());

      const response = await handler(request("/what%3F"));

      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe("https://example.com/faq");
    });

    it("should redirect from a static literal", async () => {
      const handler = mapHandler({ "/docs": "https://example.com/docs" }, createFallback());

      const response = await handler(request("/docs"));

      expect(response.headers.get("Location")).toBe("https://example.com/docs");
    });

    it("should reject an invalid literal at construction", () => {
      expect(() => mapHandler({ docs: "https://example.com/docs" }, createFallback())).toThrow(
        InvalidRecordError
      );
    });
  });

  describe("yamlHandler", () => {
    const yaml = "- path: /y\n  url: https://y.example\n";

    it("should redirect from YAML records", async () => {
      const handler = yamlHandler(yaml, createFallback());

      const response = await handler(request("/y"));

      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe("https://y.example");
    });

    it("should fail construction on malformed YAML", () => {
      expect(() => yamlHandler("- path: [/y\n", createFallback())).toThrow(ParseError);
    });

    it("should fail construction on a record without url", () => {
      expect(() => yamlHandler("- path: /y\n", createFallback())).toThrow(InvalidRecordError);
    });
  });

  describe("jsonHandler", () => {
    it("should redirect from JSON records", async () => {
      const handler = jsonHandler('[{"path": "/j", "url": "https://j.example"}]', createFallback());

      const response = await handler(request("/j"));

      expect(response.headers.get("Location")).toBe("https://j.example");
    });

    it("should fail construction on malformed JSON", () => {
      expect(() => jsonHandler('[{"path": "/j"', createFallback())).toThrow(ParseError);
    });
  });

  describe("storeHandler", () => {
    it("should redirect the seed entry of a new store", async () => {
      const file = `${testHelpers.tempDir()}/redirects.db`;
      const handler = storeHandler(file, createFallback(), { timeoutMs: 100 });

      const response = await handler(request(SEED_ENTRY.path));

      expect(response.status).toBe(302);
      expect(response.headers.get("Location")).toBe(SEED_ENTRY.url);
    });

    it("should fail construction when the store cannot be opened", () => {
      const file = `${testHelpers.tempDir()}/missing/redirects.db`;

      expect(() => storeHandler(file, createFallback())).toThrow(StoreError);
    });
  });
});
