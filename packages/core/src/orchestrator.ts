/**
 * Main Orchestrator class for PRD Chat
 *
 * This is the facade the HTTP layer talks to. It owns the configuration,
 * the session store and the per-session lock, and runs every
 * load, mutate and save cycle of a session under that session's lock.
 *
 * @example
 * ```ts
 * import { Orchestrator } from "@prdchat/core";
 *
 * const orchestrator = Orchestrator.create();
 * const { session } = await orchestrator.createSession();
 *
 * await orchestrator.sendMessage(session.id, "A recipe box called Pantry");
 * await orchestrator.sendMessage(session.id, "react, sqlite");
 * await orchestrator.sendMessage(session.id, "login with email\nsave recipes");
 *
 * const prd = await orchestrator.exportSession(session.id, "compact", { legend: true });
 * ```
 */

import { v4 as uuidv4 } from "uuid";
import { ChatSession, type RestoreResult, type SendResult } from "./services/chat-session.ts";
import { InMemorySessionStore, type SessionStore } from "./services/session-store.ts";
import { SessionLock } from "./services/session-lock.ts";
import type { ExportOptions } from "./services/prd-codec.ts";
import { ConfigSchema, SessionRecordSchema } from "./services/schemas.ts";
import { SessionNotFoundError, ValidationError } from "./services/errors.ts";
import type { Config, ExportFormat, SessionView } from "./types/index.ts";
import { DEFAULT_CONFIG } from "./types/index.ts";

// Strategic logging helper
const log = (action: string, data?: unknown) => {
  console.log(`[PRDChat][Orchestrator] ${action}`, data ? JSON.stringify(data, null, 2) : "");
};

/**
 * Options for creating an Orchestrator
 */
export interface OrchestratorOptions {
  /** Overrides merged over DEFAULT_CONFIG */
  config?: Partial<Config>;
  /**
   * Where session records live
   * @default InMemorySessionStore with the configured TTL
   */
  store?: SessionStore;
  /**
   * Session id generator
   * @default uuid v4
   */
  generateId?: () => string;
  /** Clock for message timestamps */
  now?: () => Date;
}

/**
 * Result of creating a session
 */
export interface CreateSessionResult {
  session: SessionView;
  greeting: string;
}

/**
 * Result of sending a message
 */
export interface SendMessageResult extends SendResult {
  preview: string;
  taskCount: number;
}

/**
 * Result of restoring a session from export text
 */
export interface RestoreSessionResult extends RestoreResult {
  session: SessionView;
}

/**
 * Orchestrator - Main facade for PRD Chat
 *
 * This class provides a clean API for:
 * - Configuration management
 * - Session lifecycle (create, reset, end, expiry)
 * - Chat messages, deletion with rebuild, restore and export
 */
export class Orchestrator {
  private config: Config;
  private readonly store: SessionStore;
  private readonly lock = new SessionLock();
  private readonly generateId: () => string;
  private readonly now: () => Date;

  /**
   * Creates a new Orchestrator instance
   *
   * @throws {ValidationError} If the config overrides are invalid
   */
  constructor(options: OrchestratorOptions = {}) {
    this.config = validateConfig({ ...DEFAULT_CONFIG, ...options.config });
    this.store =
      options.store ?? new InMemorySessionStore({ ttlMinutes: this.config.sessionTtlMinutes });
    this.generateId = options.generateId ?? uuidv4;
    this.now = options.now ?? (() => new Date());
  }

  // ==========================================================================
  // Factory method
  // ==========================================================================

  /**
   * Creates an Orchestrator with the given options
   */
  static create(options: OrchestratorOptions = {}): Orchestrator {
    return new Orchestrator(options);
  }

  // ==========================================================================
  // Configuration
  // ==========================================================================

  /**
   * Gets the current configuration
   */
  getConfig(): Config {
    return { ...this.config };
  }

  /**
   * Updates the configuration with partial values
   *
   * @remarks
   * New limits apply to later messages and to every replay, including the
   * one that loads an existing session.
   *
   * @throws {ValidationError} If the merged config is invalid
   */
  updateConfig(partial: Partial<Config>): Config {
    this.config = validateConfig({ ...this.config, ...partial });
    if (this.store instanceof InMemorySessionStore) {
      this.store.setTtlMinutes(this.config.sessionTtlMinutes);
    }
    log("Config updated", this.config);
    return this.getConfig();
  }

  // ==========================================================================
  // Sessions
  // ==========================================================================

  /**
   * Starts a new session at the first step
   */
  async createSession(): Promise<CreateSessionResult> {
    const session = ChatSession.create(this.generateId(), { config: this.config, now: this.now });
    await this.store.set(session.id, session.toRecord());
    log("Session created", { sessionId: session.id });
    return { session: toView(session), greeting: ChatSession.greeting() };
  }

  /**
   * @throws {SessionNotFoundError} If the session does not exist
   */
  async getSessionView(id: string): Promise<SessionView> {
    return this.lock.run(id, async () => toView(await this.load(id)));
  }

  /**
   * Sends one user message and returns the reply with the updated preview
   *
   * @throws {SessionNotFoundError} If the session does not exist
   */
  async sendMessage(id: string, message: string): Promise<SendMessageResult> {
    return this.mutate(id, (session) => {
      const result = session.send(message);
      if (result.signals.length > 0) {
        log("Message signals", { sessionId: id, signals: result.signals });
      }
      return {
        ...result,
        preview: session.preview(),
        taskCount: session.getDocument().taskCount(),
      };
    });
  }

  /**
   * Deletes a user message and rebuilds the session from the rest
   *
   * @throws {SessionNotFoundError} If the session does not exist
   * @throws {InvalidMessageIndexError} If the index is not a user message
   */
  async deleteMessage(id: string, index: number): Promise<SessionView> {
    return this.mutate(id, (session) => {
      session.deleteMessage(index);
      log("Message deleted, session rebuilt", { sessionId: id, index });
      return toView(session);
    });
  }

  /**
   * Replaces the session document with pasted export text
   *
   * @throws {SessionNotFoundError} If the session does not exist
   * @throws {ParseError} If the text cannot be imported; the session is unchanged
   */
  async restore(id: string, text: string): Promise<RestoreSessionResult> {
    return this.mutate(id, (session) => {
      const result = session.restore(text);
      log("Session restored", { sessionId: id, taskCount: result.taskCount });
      return { ...result, session: toView(session) };
    });
  }

  /**
   * Exports the session document
   *
   * @throws {SessionNotFoundError} If the session does not exist
   */
  async exportSession(
    id: string,
    format: ExportFormat = "compact",
    options: ExportOptions = {}
  ): Promise<string> {
    return this.lock.run(id, async () => (await this.load(id)).export(format, options));
  }

  /**
   * Starts the session over with an empty document
   *
   * @throws {SessionNotFoundError} If the session does not exist
   */
  async resetSession(id: string): Promise<SessionView> {
    return this.mutate(id, (session) => {
      session.reset();
      log("Session reset", { sessionId: id });
      return toView(session);
    });
  }

  /**
   * Discards a session
   *
   * @throws {SessionNotFoundError} If the session does not exist
   */
  async endSession(id: string): Promise<void> {
    await this.lock.run(id, async () => {
      const removed = await this.store.delete(id);
      if (!removed) {
        throw new SessionNotFoundError(id);
      }
      log("Session ended", { sessionId: id });
    });
  }

  /**
   * Ids of all live sessions
   */
  async listSessions(): Promise<string[]> {
    return this.store.list();
  }

  /**
   * Drops expired sessions from the default store
   *
   * @returns Number of sessions removed
   */
  sweepExpired(): number {
    if (!(this.store instanceof InMemorySessionStore)) {
      return 0;
    }
    const removed = this.store.sweep();
    if (removed > 0) {
      log("Expired sessions removed", { removed });
    }
    return removed;
  }

  // ==========================================================================
  // Private helpers
  // ==========================================================================

  /**
   * Loads a session and rebuilds its document
   *
   * @throws {SessionNotFoundError} If the store has no record
   * @throws {ValidationError} If the stored record is malformed
   */
  private async load(id: string): Promise<ChatSession> {
    const record = await this.store.get(id);
    if (!record) {
      throw new SessionNotFoundError(id);
    }

    const parsed = SessionRecordSchema.safeParse(record);
    if (!parsed.success) {
      throw new ValidationError(`session ${id}`, parsed.error.issues);
    }

    return ChatSession.fromRecord(parsed.data, { config: this.config, now: this.now });
  }

  /**
   * Runs one mutate-and-respond cycle under the session lock
   *
   * @remarks
   * The record is saved only when `fn` returns; a throw leaves the stored
   * session as it was.
   */
  private mutate<T>(id: string, fn: (session: ChatSession) => T): Promise<T> {
    return this.lock.run(id, async () => {
      const session = await this.load(id);
      const result = fn(session);
      await this.store.set(id, session.toRecord());
      return result;
    });
  }
}

/**
 * @throws {ValidationError} If the config does not match ConfigSchema
 */
function validateConfig(config: Config): Config {
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ValidationError("config", result.error.issues, `Validation failed: ${details}`);
  }
  return result.data;
}

function toView(session: ChatSession): SessionView {
  const document = session.getDocument();
  return {
    id: session.id,
    step: session.getStep(),
    messages: session.getMessages(),
    document: document.toSnapshot(),
    preview: session.preview(),
    taskCount: document.taskCount(),
    createdAt: session.getCreatedAt(),
    updatedAt: session.getUpdatedAt(),
  };
}
