import { test, expect, describe } from "vitest";
import { InMemorySessionStore } from "../src/services/session-store.ts";
import { ChatSession } from "../src/services/chat-session.ts";
import type { SessionRecord } from "../src/types/index.ts";

const MINUTE = 60_000;

function createRecord(id: string): SessionRecord {
  const session = ChatSession.create(id, { now: () => new Date("2026-01-15T10:00:00.000Z") });
  session.send("A todo app");
  return session.toRecord();
}

describe("InMemorySessionStore", () => {
  test("stores and returns records", async () => {
    const store = new InMemorySessionStore();
    const record = createRecord("a");

    await store.set("a", record);

    expect(await store.get("a")).toEqual(record);
    expect(await store.get("missing")).toBeUndefined();
    expect(await store.list()).toEqual(["a"]);
  });

  test("copies records in and out", async () => {
    const store = new InMemorySessionStore();
    const record = createRecord("a");
    await store.set("a", record);

    record.messages.length = 0;
    const loaded = await store.get("a");
    loaded?.messages.pop();

    expect((await store.get("a"))?.messages).toHaveLength(2);
  });

  test("deletes records", async () => {
    const store = new InMemorySessionStore();
    await store.set("a", createRecord("a"));

    expect(await store.delete("a")).toBe(true);
    expect(await store.delete("a")).toBe(false);
    expect(await store.get("a")).toBeUndefined();
  });

  test("expires records after the idle TTL", async () => {
    let clock = 0;
    const store = new InMemorySessionStore({ ttlMinutes: 1, now: () => clock });
    await store.set("a", createRecord("a"));

    clock = MINUTE - 1;
    expect(await store.get("a")).toBeDefined();

    // the read above counts as activity
    clock = 2 * MINUTE - 2;
    expect(await store.get("a")).toBeDefined();

    clock = 3 * MINUTE - 2;
    expect(await store.get("a")).toBeUndefined();
    expect(store.size).toBe(0);
  });

  test("sweep removes only expired records", async () => {
    let clock = 0;
    const store = new InMemorySessionStore({ ttlMinutes: 1, now: () => clock });
    await store.set("old", createRecord("old"));
    clock = 30_000;
    await store.set("new", createRecord("new"));

    clock = MINUTE;
    expect(store.sweep()).toBe(1);
    expect(await store.list()).toEqual(["new"]);
  });

  test("setTtlMinutes applies to existing records", async () => {
    let clock = 0;
    const store = new InMemorySessionStore({ ttlMinutes: 10, now: () => clock });
    await store.set("a", createRecord("a"));

    clock = 2 * MINUTE;
    store.setTtlMinutes(1);

    expect(store.sweep()).toBe(1);
  });
});
