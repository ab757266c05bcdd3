/**
 * ChatSession for PRD Chat
 *
 * Holds one conversation: its message log, the current step and the
 * document built from it. The document is never patched backwards: deleting
 * a message rebuilds it by replaying the remaining user messages from the
 * session baseline.
 */

import type {
  ChatMessage,
  ClipLimits,
  Config,
  ExportFormat,
  MessageEffect,
  PRDSnapshot,
  SessionRecord,
  Signal,
} from "../types/index.ts";
import { ConversationStep, DEFAULT_CONFIG } from "../types/index.ts";
import { advance, applyMutation, greeting } from "./conversation-driver.ts";
import { PRDDocument } from "./prd-document.ts";
import { exportPRD, formatPRD, importPRD, type ExportOptions } from "./prd-codec.ts";
import { InvalidMessageIndexError } from "./errors.ts";

/**
 * Options for creating or loading a ChatSession
 */
export interface ChatSessionOptions {
  /**
   * Limits used by the driver
   * @default DEFAULT_CONFIG
   */
  config?: Config;

  /**
   * Clock used for message and session timestamps
   * @default () => new Date()
   */
  now?: () => Date;
}

/**
 * Result of sending one message
 */
export interface SendResult {
  /** False when the message was rejected and not logged */
  accepted: boolean;
  reply: string;
  step: ConversationStep;
  signals: Signal[];
  /** What the message changed in the document */
  effects: MessageEffect[];
}

/**
 * Result of a successful restore
 */
export interface RestoreResult {
  reply: string;
  taskCount: number;
}

/**
 * State produced by replaying a log
 */
interface ReplayState {
  step: ConversationStep;
  document: PRDDocument;
  messages: ChatMessage[];
}

/**
 * ChatSession - one conversation and its PRD document
 *
 * @example
 * ```ts
 * const session = ChatSession.create("abc");
 * session.send("A todo app for small teams");
 * session.send("TypeScript, Hono");
 * session.send("users can add tasks");
 * session.preview(); // compact export of the document so far
 * ```
 */
export class ChatSession {
  readonly id: string;
  private readonly config: Config;
  private readonly now: () => Date;

  private step: ConversationStep = ConversationStep.AwaitingVision;
  private document = new PRDDocument();
  private messages: ChatMessage[] = [];
  private baseline: PRDSnapshot | null = null;
  private baselineStep: ConversationStep = ConversationStep.AwaitingVision;
  private readonly createdAt: string;
  private updatedAt: string;

  private constructor(id: string, options: ChatSessionOptions, createdAt?: string) {
    this.id = id;
    this.config = options.config ?? DEFAULT_CONFIG;
    this.now = options.now ?? (() => new Date());
    this.createdAt = createdAt ?? this.timestamp();
    this.updatedAt = this.createdAt;
  }

  // ==========================================================================
  // Factory methods
  // ==========================================================================

  /**
   * Creates an empty session at the first step
   */
  static create(id: string, options: ChatSessionOptions = {}): ChatSession {
    return new ChatSession(id, options);
  }

  /**
   * Rebuilds a session from a stored record by replaying its user messages
   *
   * @remarks
   * The stored step is informational: the step reached by the replay wins.
   */
  static fromRecord(record: SessionRecord, options: ChatSessionOptions = {}): ChatSession {
    const session = new ChatSession(record.id, options, record.createdAt);
    session.baseline = record.baseline;
    session.baselineStep = record.baselineStep;
    session.commit(session.replay(record.messages));
    session.updatedAt = record.updatedAt;
    return session;
  }

  /**
   * The first assistant prompt
   */
  static greeting(): string {
    return greeting();
  }

  // ==========================================================================
  // Conversation
  // ==========================================================================

  /**
   * Sends one user message through the driver
   *
   * @remarks
   * Rejected messages (blank, too long) are not logged and change nothing.
   * Accepted ones append the user message, with its effects, and the reply.
   */
  send(message: string): SendResult {
    const outcome = advance(
      { step: this.step, document: this.document, config: this.config },
      message
    );

    if (!outcome.accepted) {
      return {
        accepted: false,
        reply: outcome.reply,
        step: this.step,
        signals: outcome.signals,
        effects: [],
      };
    }

    // Mutations go to a copy so a failure leaves the session as it was
    const next = this.document.clone();
    const effects = outcome.mutations.flatMap((mutation) => applyMutation(next, mutation));
    const timestamp = this.timestamp();

    this.document = next;
    this.step = outcome.step;
    this.messages.push(
      { role: "user", content: message, timestamp, effects, limits: clipLimits(this.config) },
      { role: "assistant", content: outcome.reply, timestamp }
    );
    this.updatedAt = timestamp;

    return {
      accepted: true,
      reply: outcome.reply,
      step: outcome.step,
      signals: outcome.signals,
      effects,
    };
  }

  /**
   * Deletes a user message and rebuilds the session from the rest
   *
   * @param index - Position in the full log; must be a user message
   * @throws {InvalidMessageIndexError} If the index does not name a user message
   */
  deleteMessage(index: number): void {
    const target = Number.isInteger(index) ? this.messages[index] : undefined;
    if (!target || target.role !== "user") {
      throw new InvalidMessageIndexError(index);
    }

    const remaining = this.messages.filter((_, i) => i !== index);
    this.commit(this.replay(remaining));
    this.updatedAt = this.timestamp();
  }

  /**
   * Replaces the document with pasted export text
   *
   * @remarks
   * All or nothing: the text is parsed before anything changes. On success
   * the imported document becomes the new baseline, the log is cleared and
   * the conversation continues at feature collection.
   *
   * @throws {ParseError} If the text cannot be imported
   */
  restore(text: string): RestoreResult {
    const imported = importPRD(text);

    this.baseline = imported.toSnapshot();
    this.baselineStep = ConversationStep.AwaitingFeatures;
    this.commit({ step: this.baselineStep, document: imported, messages: [] });
    this.updatedAt = this.timestamp();

    const taskCount = imported.taskCount();
    return {
      reply: `Restored **${imported.getProject().name || "Untitled project"}** with ${taskCount} task${taskCount === 1 ? "" : "s"}. Add more features, or say "done".`,
      taskCount,
    };
  }

  /**
   * Starts over with an empty document
   */
  reset(): void {
    this.baseline = null;
    this.baselineStep = ConversationStep.AwaitingVision;
    this.commit({ step: this.baselineStep, document: new PRDDocument(), messages: [] });
    this.updatedAt = this.timestamp();
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getStep(): ConversationStep {
    return this.step;
  }

  /**
   * Returns a copy of the document
   */
  getDocument(): PRDDocument {
    return this.document.clone();
  }

  getMessages(): ChatMessage[] {
    return this.messages.map(copyMessage);
  }

  getCreatedAt(): string {
    return this.createdAt;
  }

  getUpdatedAt(): string {
    return this.updatedAt;
  }

  /**
   * Compact export of the current document
   */
  preview(options: ExportOptions = {}): string {
    return exportPRD(this.document, options);
  }

  export(format: ExportFormat, options: ExportOptions = {}): string {
    return formatPRD(this.document, format, options);
  }

  /**
   * Plain data for a session store
   */
  toRecord(): SessionRecord {
    return {
      id: this.id,
      step: this.step,
      messages: this.getMessages(),
      baseline: this.baseline,
      baselineStep: this.baselineStep,
      createdAt: this.createdAt,
      updatedAt: this.updatedAt,
    };
  }

  // ==========================================================================
  // Private helpers
  // ==========================================================================

  /**
   * Replays the user messages of a log from the baseline
   *
   * @remarks
   * Messages keep their original timestamps and are read under the limits
   * they were accepted with, so a config change never alters a stored
   * session.
   */
  private replay(log: readonly ChatMessage[]): ReplayState {
    let step = this.baselineStep;
    const document = this.baseline ? PRDDocument.fromSnapshot(this.baseline) : new PRDDocument();
    const messages: ChatMessage[] = [];

    for (const message of log) {
      if (message.role !== "user") {
        continue;
      }
      const limits = message.limits ?? clipLimits(this.config);
      const outcome = advance(
        { step, document, config: { ...this.config, ...limits }, replaying: true },
        message.content
      );
      if (!outcome.accepted) {
        continue;
      }
      const effects = outcome.mutations.flatMap((mutation) => applyMutation(document, mutation));
      step = outcome.step;
      messages.push(
        { role: "user", content: message.content, timestamp: message.timestamp, effects, limits },
        { role: "assistant", content: outcome.reply, timestamp: message.timestamp }
      );
    }

    return { step, document, messages };
  }

  private commit(state: ReplayState): void {
    this.step = state.step;
    this.document = state.document;
    this.messages = state.messages;
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}

function copyMessage(message: ChatMessage): ChatMessage {
  const copy: ChatMessage = { ...message };
  if (message.effects) {
    copy.effects = message.effects.map((effect) => ({ ...effect }));
  }
  if (message.limits) {
    copy.limits = { ...message.limits };
  }
  return copy;
}

function clipLimits(config: Config): ClipLimits {
  return {
    maxProjectNameLength: config.maxProjectNameLength,
    maxDescriptionLength: config.maxDescriptionLength,
  };
}
