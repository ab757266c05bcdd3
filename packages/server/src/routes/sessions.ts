/**
 * Session routes for the PRD Chat server
 *
 * Provides endpoints for the chat itself: creating sessions, sending and
 * deleting messages, exporting, restoring and resetting.
 */

import { Hono } from "hono";
import { z } from "zod";
import { getOrchestrator } from "../index.ts";
import { AppError } from "../middleware/error-handler.ts";
import { formatIssues, readJsonBody } from "./body.ts";

/**
 * Schema for sending a message. Blank messages are accepted here and
 * answered with a re-prompt.
 */
const SendMessageSchema = z.object({
  message: z.string(),
});

/**
 * Schema for restoring from pasted export text
 */
const RestoreSchema = z.object({
  content: z.string().min(1, "Content is required"),
});

/**
 * Schema for export query parameters
 */
const ExportQuerySchema = z.object({
  format: z.enum(["compact", "json", "markdown"]).default("compact"),
  legend: z.enum(["true", "false"]).default("false"),
});

const CONTENT_TYPES = {
  compact: "text/plain; charset=utf-8",
  json: "application/json; charset=utf-8",
  markdown: "text/markdown; charset=utf-8",
} as const;

/**
 * Ensures orchestrator is available, throws 503 if not
 */
function requireOrchestrator() {
  const orchestrator = getOrchestrator();
  if (!orchestrator) {
    throw new AppError(
      "Orchestrator not initialized. Server may still be starting.",
      503,
      "SERVICE_UNAVAILABLE"
    );
  }
  return orchestrator;
}

/**
 * Creates the sessions router
 */
export function createSessionRoutes(): Hono {
  const router = new Hono();

  /**
   * POST /api/sessions
   *
   * Starts a new session.
   *
   * @returns {{ session: SessionView, greeting: string }}
   */
  router.post("/", async (c) => {
    const orchestrator = requireOrchestrator();
    const result = await orchestrator.createSession();
    return c.json(result, 201);
  });

  /**
   * GET /api/sessions
   *
   * Lists the ids of live sessions.
   */
  router.get("/", async (c) => {
    const orchestrator = requireOrchestrator();
    const sessions = await orchestrator.listSessions();
    return c.json({ sessions });
  });

  /**
   * GET /api/sessions/:id
   *
   * @returns {SessionView} Step, messages, document and preview
   * @throws {404} If the session does not exist
   */
  router.get("/:id", async (c) => {
    const orchestrator = requireOrchestrator();
    const view = await orchestrator.getSessionView(c.req.param("id"));
    return c.json(view);
  });

  /**
   * POST /api/sessions/:id/messages
   *
   * Sends one user message.
   *
   * @returns {{ accepted, reply, step, signals, effects, preview, taskCount }}
   * @throws {400} If the body is invalid
   * @throws {404} If the session does not exist
   */
  router.post("/:id/messages", async (c) => {
    const orchestrator = requireOrchestrator();
    const { message } = await readJsonBody(c, SendMessageSchema);
    const result = await orchestrator.sendMessage(c.req.param("id"), message);
    return c.json(result);
  });

  /**
   * DELETE /api/sessions/:id/messages/:index
   *
   * Deletes a user message and rebuilds the session from the remaining ones.
   *
   * @returns {SessionView} The rebuilt session
   * @throws {400} If the index is not a user message
   * @throws {404} If the session does not exist
   */
  router.delete("/:id/messages/:index", async (c) => {
    const orchestrator = requireOrchestrator();
    const rawIndex = c.req.param("index");
    if (!/^\d+$/.test(rawIndex)) {
      throw new AppError(
        `Message index must be a non-negative integer, got "${rawIndex}"`,
        400,
        "INVALID_MESSAGE_INDEX"
      );
    }
    const view = await orchestrator.deleteMessage(c.req.param("id"), Number(rawIndex));
    return c.json(view);
  });

  /**
   * GET /api/sessions/:id/export?format=compact|json|markdown&legend=true
   *
   * @returns The exported document as text
   * @throws {400} If the query is invalid
   * @throws {404} If the session does not exist
   */
  router.get("/:id/export", async (c) => {
    const orchestrator = requireOrchestrator();
    const parseResult = ExportQuerySchema.safeParse(c.req.query());
    if (!parseResult.success) {
      throw new AppError(
        `Validation failed: ${formatIssues(parseResult.error)}`,
        400,
        "VALIDATION_ERROR"
      );
    }

    const { format, legend } = parseResult.data;
    const content = await orchestrator.exportSession(c.req.param("id"), format, {
      legend: legend === "true",
    });
    return c.body(content, 200, { "Content-Type": CONTENT_TYPES[format] });
  });

  /**
   * POST /api/sessions/:id/restore
   *
   * Replaces the document with pasted export text. All or nothing.
   *
   * @returns {{ reply, taskCount, session: SessionView }}
   * @throws {400} PARSE_ERROR if the content cannot be imported
   * @throws {404} If the session does not exist
   */
  router.post("/:id/restore", async (c) => {
    const orchestrator = requireOrchestrator();
    const { content } = await readJsonBody(c, RestoreSchema);
    const result = await orchestrator.restore(c.req.param("id"), content);
    return c.json(result);
  });

  /**
   * POST /api/sessions/:id/reset
   *
   * @returns {SessionView} The emptied session
   * @throws {404} If the session does not exist
   */
  router.post("/:id/reset", async (c) => {
    const orchestrator = requireOrchestrator();
    const view = await orchestrator.resetSession(c.req.param("id"));
    return c.json(view);
  });

  /**
   * DELETE /api/sessions/:id
   *
   * @throws {404} If the session does not exist
   */
  router.delete("/:id", async (c) => {
    const orchestrator = requireOrchestrator();
    const id = c.req.param("id");
    await orchestrator.endSession(id);
    return c.json({ success: true, id });
  });

  return router;
}
