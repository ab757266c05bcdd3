import { test, expect, describe } from "vitest";
import {
  ConfigSchema,
  PRDJsonSchema,
  SessionRecordSchema,
  TaskIdSchema,
  TaxonomySchema,
} from "../src/services/schemas.ts";
import { ChatSession } from "../src/services/chat-session.ts";
import { DEFAULT_CONFIG } from "../src/types/index.ts";

describe("schemas", () => {
  test("ConfigSchema accepts the defaults", () => {
    expect(ConfigSchema.safeParse(DEFAULT_CONFIG).success).toBe(true);
    expect(ConfigSchema.safeParse({ ...DEFAULT_CONFIG, sessionTtlMinutes: 0 }).success).toBe(false);
  });

  test("TaskIdSchema requires CODE-NNN", () => {
    expect(TaskIdSchema.safeParse("CORE-001").success).toBe(true);
    expect(TaskIdSchema.safeParse("CORE-1").success).toBe(false);
    expect(TaskIdSchema.safeParse("core-001").success).toBe(false);
  });

  test("TaxonomySchema requires the default category to exist", () => {
    const result = TaxonomySchema.safeParse({
      version: 1,
      defaultCategory: "CORE",
      categories: [{ code: "SEC", name: "Security", order: 0, keywords: ["login"] }],
    });
    expect(result.success).toBe(false);
  });

  test("TaxonomySchema rejects duplicate codes", () => {
    const result = TaxonomySchema.safeParse({
      version: 1,
      defaultCategory: "CORE",
      categories: [
        { code: "CORE", name: "Core", order: 0, keywords: [] },
        { code: "CORE", name: "Core again", order: 1, keywords: [] },
      ],
    });
    expect(result.success).toBe(false);
  });

  test("PRDJsonSchema rejects unknown priorities", () => {
    const result = PRDJsonSchema.safeParse({
      pn: "X",
      pd: "",
      ts: [],
      p: { CORE: { t: [{ id: "CORE-001", ti: "a", pr: "Low" }] } },
    });
    expect(result.success).toBe(false);
  });

  test("SessionRecordSchema accepts a stored session", () => {
    const session = ChatSession.create("a");
    session.send("A todo app");
    session.send("go");
    session.send("login with password");

    expect(SessionRecordSchema.safeParse(session.toRecord()).success).toBe(true);
  });

  test("SessionRecordSchema rejects message limits below one", () => {
    const session = ChatSession.create("a");
    session.send("A todo app");
    const record = session.toRecord();
    const messages = record.messages.map((m) =>
      m.role === "user" ? { ...m, limits: { maxProjectNameLength: 0, maxDescriptionLength: 10 } } : m
    );

    expect(SessionRecordSchema.safeParse({ ...record, messages }).success).toBe(false);
  });
});
