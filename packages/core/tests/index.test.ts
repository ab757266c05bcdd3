import { test, expect, describe } from "vitest";
import {
  VERSION,
  DEFAULT_CONFIG,
  ConversationStep,
  Orchestrator,
  Priority,
  importPRD,
  exportPRD,
  type Config,
} from "../src/index.ts";

describe("@prdchat/core", () => {
  test("exports VERSION", () => {
    expect(VERSION).toBe("0.1.0");
  });

  test("DEFAULT_CONFIG has expected values", () => {
    expect(DEFAULT_CONFIG).toEqual({
      maxProjectNameLength: 100,
      maxDescriptionLength: 1000,
      maxMessageLength: 10000,
      sessionTtlMinutes: 60,
    });
  });

  test("Config type is exported", () => {
    const config: Config = { ...DEFAULT_CONFIG, sessionTtlMinutes: 5 };
    expect(config.sessionTtlMinutes).toBe(5);
  });

  test("enums use their wire values", () => {
    expect(Priority.High).toBe("High");
    expect(Priority.Medium).toBe("Medium");
    expect(Object.values(ConversationStep)).toEqual([
      "awaiting_vision",
      "awaiting_stack",
      "awaiting_features",
      "awaiting_priorities",
      "done",
    ]);
  });

  test("exposes the orchestrator and codec", () => {
    expect(typeof Orchestrator.create).toBe("function");
    expect(exportPRD(importPRD("pn: X\npd:\nts:\np:\n"))).toBe("pn: X\npd:\nts:\np:\n");
  });
});
