/**
 * Environment configuration for the PRD Chat server
 */

import { z } from "zod";
import { ValidationError, type Config } from "@prdchat/core";

const DEFAULT_PORT = 3456;

/** Unset and empty variables both fall back to the default */
const optionalInt = (min: number, max: number) =>
  z.preprocess(
    (value) => (value === "" ? undefined : value),
    z.coerce.number().int().min(min).max(max).optional()
  );

const EnvSchema = z.object({
  PORT: optionalInt(1, 65535),
  PRDCHAT_SESSION_TTL_MINUTES: optionalInt(1, 10080),
  PRDCHAT_MAX_MESSAGE_LENGTH: optionalInt(1, 1000000),
});

/**
 * Server settings read from the environment
 */
export interface ServerEnvConfig {
  port: number;
  /** Overrides for the core config; absent keys keep their defaults */
  core: Partial<Config>;
}

/**
 * Reads PORT, PRDCHAT_SESSION_TTL_MINUTES and PRDCHAT_MAX_MESSAGE_LENGTH
 *
 * @throws {ValidationError} If a variable is set to something other than an integer in range
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ServerEnvConfig {
  const parseResult = EnvSchema.safeParse(env);
  if (!parseResult.success) {
    const details = parseResult.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new ValidationError("environment", parseResult.error.errors, `Invalid environment: ${details}`);
  }

  const { PORT, PRDCHAT_SESSION_TTL_MINUTES, PRDCHAT_MAX_MESSAGE_LENGTH } = parseResult.data;
  const core: Partial<Config> = {};
  if (PRDCHAT_SESSION_TTL_MINUTES !== undefined) {
    core.sessionTtlMinutes = PRDCHAT_SESSION_TTL_MINUTES;
  }
  if (PRDCHAT_MAX_MESSAGE_LENGTH !== undefined) {
    core.maxMessageLength = PRDCHAT_MAX_MESSAGE_LENGTH;
  }

  return { port: PORT ?? DEFAULT_PORT, core };
}
