/**
 * Routes index
 *
 * Groups all API routes for the PRD Chat server.
 */

import { Hono } from "hono";
import { VERSION } from "@prdchat/core";
import { createConfigRoutes } from "./config.ts";
import { createSessionRoutes } from "./sessions.ts";

/**
 * Creates the main API router with all routes grouped.
 */
export function createRoutes(): Hono {
  const api = new Hono();

  // Root API info
  api.get("/", (c) => {
    return c.json({
      name: "PRD Chat API",
      version: VERSION,
      endpoints: {
        health: "GET /health",
        config: "GET/PUT /api/config",
        sessions: "GET/POST /api/sessions; GET/DELETE /api/sessions/:id",
        messages: "POST /api/sessions/:id/messages; DELETE /api/sessions/:id/messages/:index",
        export: "GET /api/sessions/:id/export?format=compact|json|markdown&legend=true",
        restore: "POST /api/sessions/:id/restore",
        reset: "POST /api/sessions/:id/reset",
      },
    });
  });

  const configRoutes = createConfigRoutes();
  api.route("/config", configRoutes);

  const sessionRoutes = createSessionRoutes();
  api.route("/sessions", sessionRoutes);

  return api;
}
