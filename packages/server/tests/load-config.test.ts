import { test, expect, describe } from "vitest";
import { ValidationError } from "@prdchat/core";
import { loadConfigFromEnv } from "../src/config.ts";

describe("loadConfigFromEnv", () => {
  test("uses defaults when nothing is set", () => {
    expect(loadConfigFromEnv({})).toEqual({ port: 3456, core: {} });
  });

  test("reads port and core limits", () => {
    expect(
      loadConfigFromEnv({
        PORT: "8080",
        PRDCHAT_SESSION_TTL_MINUTES: "15",
        PRDCHAT_MAX_MESSAGE_LENGTH: "500",
      })
    ).toEqual({ port: 8080, core: { sessionTtlMinutes: 15, maxMessageLength: 500 } });
  });

  test("treats empty variables as unset", () => {
    expect(loadConfigFromEnv({ PORT: "", PRDCHAT_MAX_MESSAGE_LENGTH: "" })).toEqual({
      port: 3456,
      core: {},
    });
  });

  test("rejects values that are not integers in range", () => {
    expect(() => loadConfigFromEnv({ PORT: "abc" })).toThrow(ValidationError);
    expect(() => loadConfigFromEnv({ PRDCHAT_SESSION_TTL_MINUTES: "0" })).toThrow(
      "Invalid environment: PRDCHAT_SESSION_TTL_MINUTES: Number must be greater than or equal to 1"
    );
  });
});
