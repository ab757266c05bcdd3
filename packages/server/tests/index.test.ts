import { test, expect, describe, beforeEach, afterEach, vi } from "vitest";
import {
  InvalidMessageIndexError,
  ParseError,
  SessionNotFoundError,
  UnknownTaskIdError,
  ValidationError,
} from "@prdchat/core";
import {
  createApp,
  initializeOrchestrator,
  getOrchestrator,
  getServerState,
  resetServerState,
} from "../src/index.ts";
import { AppError, toAppError } from "../src/middleware/index.ts";

describe("@prdchat/server", () => {
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    resetServerState();
    app = createApp();
  });

  afterEach(() => {
    resetServerState();
    vi.restoreAllMocks();
  });

  describe("health endpoint", () => {
    test("GET /health returns ok status", async () => {
      const res = await app.fetch(new Request("http://localhost/health"));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        status: "ok",
        version: "0.1.0",
        orchestratorInitialized: false,
      });
    });
  });

  describe("API routes", () => {
    test("GET /api returns API info with endpoints list", async () => {
      const res = await app.fetch(new Request("http://localhost/api"));

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        name: "PRD Chat API",
        version: "0.1.0",
        endpoints: { health: "GET /health", config: "GET/PUT /api/config" },
      });
    });

    test("unknown routes return 404", async () => {
      const res = await app.fetch(new Request("http://localhost/nope"));

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({
        error: "NOT_FOUND",
        message: "Route not found: GET /nope",
        status: 404,
      });
    });
  });

  describe("server state", () => {
    test("initializeOrchestrator sets the orchestrator", () => {
      const orchestrator = initializeOrchestrator();

      expect(getOrchestrator()).toBe(orchestrator);
      expect(getServerState().orchestrator).toBe(orchestrator);
    });

    test("resetServerState clears everything", () => {
      initializeOrchestrator();
      resetServerState();

      expect(getServerState()).toEqual({
        orchestrator: null,
        server: null,
        sweepTimer: null,
        isShuttingDown: false,
      });
    });
  });

  describe("toAppError", () => {
    test.each([
      [new ParseError("bad", 2), 400, "PARSE_ERROR"],
      [new SessionNotFoundError("x"), 404, "SESSION_NOT_FOUND"],
      [new InvalidMessageIndexError(3), 400, "INVALID_MESSAGE_INDEX"],
      [new UnknownTaskIdError("CORE-001"), 400, "UNKNOWN_TASK_ID"],
      [new ValidationError("config", []), 400, "VALIDATION_ERROR"],
    ])("maps %s", (error, status, code) => {
      const appError = toAppError(error);
      expect(appError?.status).toBe(status);
      expect(appError?.code).toBe(code);
      expect(appError?.message).toBe(error.message);
    });

    test("passes AppError through", () => {
      const error = new AppError("Teapot", 418, "TEAPOT");
      expect(toAppError(error)).toBe(error);
    });

    test("returns null for other errors", () => {
      expect(toAppError(new Error("boom"))).toBeNull();
    });
  });
});
