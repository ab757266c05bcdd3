/**
 * Configuration routes for the PRD Chat server
 *
 * Provides endpoints to read and update the runtime configuration.
 */

import { Hono } from "hono";
import { ConfigSchema } from "@prdchat/core";
import { getOrchestrator } from "../index.ts";
import { AppError } from "../middleware/error-handler.ts";
import { readJsonBody } from "./body.ts";

/**
 * Schema for validating partial config updates
 */
const PartialConfigSchema = ConfigSchema.partial().strict();

/**
 * Creates the config router with GET and PUT endpoints
 */
export function createConfigRoutes(): Hono {
  const router = new Hono();

  /**
   * GET /api/config
   *
   * @returns {Config} The current configuration
   * @throws {503} If orchestrator is not initialized
   */
  router.get("/", (c) => {
    const orchestrator = getOrchestrator();
    if (!orchestrator) {
      throw new AppError(
        "Orchestrator not initialized. Server may still be starting.",
        503,
        "SERVICE_UNAVAILABLE"
      );
    }

    return c.json(orchestrator.getConfig());
  });

  /**
   * PUT /api/config
   *
   * Updates the configuration with partial values.
   * Validates all provided fields against the Config schema.
   *
   * @param {Partial<Config>} body - Partial config to merge
   * @returns {Config} The updated configuration
   * @throws {400} If validation fails or no field is given
   * @throws {503} If orchestrator is not initialized
   */
  router.put("/", async (c) => {
    const orchestrator = getOrchestrator();
    if (!orchestrator) {
      throw new AppError(
        "Orchestrator not initialized. Server may still be starting.",
        503,
        "SERVICE_UNAVAILABLE"
      );
    }

    const partialConfig = await readJsonBody(c, PartialConfigSchema);
    if (Object.keys(partialConfig).length === 0) {
      throw new AppError("No configuration fields provided", 400, "EMPTY_UPDATE");
    }

    return c.json(orchestrator.updateConfig(partialConfig));
  });

  return router;
}
