/**
 * @prdchat/server
 *
 * HTTP server with the REST API for PRD Chat.
 * Uses Hono with the Node.js adapter.
 */

import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { serve, type ServerType } from "@hono/node-server";
import { VERSION, Orchestrator, type OrchestratorOptions } from "@prdchat/core";
import { createRoutes } from "./routes/index.ts";
import { globalErrorHandler, notFoundHandler } from "./middleware/index.ts";
import { loadConfigFromEnv } from "./config.ts";

/** How often expired sessions are swept */
const SWEEP_INTERVAL_MS = 60_000;

/**
 * Server configuration
 */
export interface ServerConfig {
  port: number;
  /** Passed to the Orchestrator */
  orchestrator: OrchestratorOptions;
}

/**
 * Server state and instance references
 */
export interface ServerState {
  orchestrator: Orchestrator | null;
  server: ServerType | null;
  sweepTimer: ReturnType<typeof setInterval> | null;
  isShuttingDown: boolean;
}

// Global state
const state: ServerState = {
  orchestrator: null,
  server: null,
  sweepTimer: null,
  isShuttingDown: false,
};

/**
 * Creates and configures the Hono app
 */
export function createApp(): Hono {
  const app = new Hono();

  // Global error handler - catches all thrown errors
  app.onError(globalErrorHandler);

  // Logging middleware
  app.use("*", logger());

  // CORS - allow localhost for development
  app.use(
    "*",
    cors({
      origin: ["http://localhost:5173", "http://localhost:3000"],
      allowMethods: ["GET", "POST", "PUT", "DELETE", "OPTIONS"],
      allowHeaders: ["Content-Type", "Authorization"],
    })
  );

  // Health check endpoint
  app.get("/health", (c) => {
    return c.json({
      status: "ok",
      version: VERSION,
      timestamp: new Date().toISOString(),
      orchestratorInitialized: state.orchestrator !== null,
    });
  });

  // Mount API routes under /api
  const apiRoutes = createRoutes();
  app.route("/api", apiRoutes);

  // Not found handler for unmatched routes
  app.notFound(notFoundHandler);

  return app;
}

/**
 * Initializes the Orchestrator from @prdchat/core
 */
export function initializeOrchestrator(options: OrchestratorOptions = {}): Orchestrator {
  console.log("[Server] Initializing Orchestrator");
  const orchestrator = Orchestrator.create(options);
  state.orchestrator = orchestrator;
  return orchestrator;
}

/**
 * Returns the current Orchestrator instance
 */
export function getOrchestrator(): Orchestrator | null {
  return state.orchestrator;
}

/**
 * Stops the sweep timer and the HTTP server
 */
function stopServer(): Promise<void> {
  if (state.sweepTimer) {
    clearInterval(state.sweepTimer);
    state.sweepTimer = null;
  }

  const server = state.server;
  state.server = null;
  if (!server) {
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

/**
 * Graceful shutdown handler
 */
async function shutdown(signal: string): Promise<void> {
  if (state.isShuttingDown) {
    console.log("[Server] Shutdown already in progress...");
    return;
  }

  state.isShuttingDown = true;
  console.log(`\n[Server] Received ${signal}, shutting down gracefully...`);

  try {
    console.log("[Server] Stopping server...");
    await stopServer();
  } catch (error) {
    console.error("[Server] Error while stopping server:", error);
    process.exitCode = 1;
  }

  state.orchestrator = null;
  console.log("[Server] Shutdown complete.");
  process.exit();
}

/**
 * Starts the HTTP server
 *
 * @remarks
 * Settings not given here are read from the environment through
 * `loadConfigFromEnv`.
 */
export function startServer(config: Partial<ServerConfig> = {}): ServerType {
  const env = loadConfigFromEnv();
  const port = config.port ?? env.port;

  // Initialize orchestrator
  const orchestrator = initializeOrchestrator(
    config.orchestrator ?? { config: env.core }
  );

  // Create app
  const app = createApp();

  // Drop idle sessions periodically
  state.sweepTimer = setInterval(() => orchestrator.sweepExpired(), SWEEP_INTERVAL_MS);
  state.sweepTimer.unref();

  // Register shutdown handlers
  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));

  console.log(`[Server] PRD Chat v${VERSION} starting...`);

  const server = serve({ fetch: app.fetch, port }, (info) => {
    console.log(`[Server] Listening on http://localhost:${info.port}`);
  });

  state.server = server;
  return server;
}

/**
 * Returns the current server state (for testing)
 */
export function getServerState(): Readonly<ServerState> {
  return { ...state };
}

/**
 * Resets server state (for testing)
 */
export function resetServerState(): void {
  if (state.sweepTimer) {
    clearInterval(state.sweepTimer);
  }
  state.orchestrator = null;
  state.server = null;
  state.sweepTimer = null;
  state.isShuttingDown = false;
}
