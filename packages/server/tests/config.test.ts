import { test, expect, describe, beforeEach, afterEach, vi } from "vitest";
import { DEFAULT_CONFIG } from "@prdchat/core";
import {
  createApp,
  initializeOrchestrator,
  getOrchestrator,
  resetServerState,
} from "../src/index.ts";

describe("Config Routes", () => {
  let app: ReturnType<typeof createApp>;

  async function put(body: string): Promise<Response> {
    return app.fetch(
      new Request("http://localhost/api/config", {
        method: "PUT",
        headers: { "Content-Type": "application/json" },
        body,
      })
    );
  }

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    resetServerState();
    initializeOrchestrator();
    app = createApp();
  });

  afterEach(() => {
    resetServerState();
    vi.restoreAllMocks();
  });

  describe("GET /api/config", () => {
    test("returns current configuration", async () => {
      const res = await app.fetch(new Request("http://localhost/api/config"));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual(DEFAULT_CONFIG);
    });

    test("returns 503 when orchestrator is not initialized", async () => {
      resetServerState();

      const res = await app.fetch(new Request("http://localhost/api/config"));

      expect(res.status).toBe(503);
      expect(await res.json()).toMatchObject({ error: "SERVICE_UNAVAILABLE" });
    });
  });

  describe("PUT /api/config", () => {
    test("updates configuration with partial values", async () => {
      const res = await put(JSON.stringify({ maxMessageLength: 500 }));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ ...DEFAULT_CONFIG, maxMessageLength: 500 });
      expect(getOrchestrator()?.getConfig().maxMessageLength).toBe(500);
    });

    test("returns 400 for out of range values", async () => {
      const res = await put(JSON.stringify({ maxMessageLength: 0 }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: "VALIDATION_ERROR",
        message: "Validation failed: maxMessageLength: Number must be greater than or equal to 1",
      });
    });

    test("returns 400 for unknown fields", async () => {
      const res = await put(JSON.stringify({ theme: "dark" }));

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "VALIDATION_ERROR" });
    });

    test("returns 400 for an empty update", async () => {
      const res = await put("{}");

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: "EMPTY_UPDATE",
        message: "No configuration fields provided",
      });
    });

    test("returns 400 for invalid JSON", async () => {
      const res = await put("{ not json");

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "INVALID_JSON" });
    });
  });
});
