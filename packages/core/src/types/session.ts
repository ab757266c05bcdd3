/**
 * Session types for PRD Chat
 */

import type { ChatMessage, ConversationStep } from "./conversation.ts";
import type { PRDSnapshot } from "./prd.ts";

/**
 * What a session store keeps for one session
 *
 * @remarks
 * The document itself is not stored. It is rebuilt on load by replaying
 * the user messages from the baseline.
 */
export interface SessionRecord {
  /**
   * Opaque session identifier
   */
  id: string;

  /**
   * Step reached after the last message
   */
  step: ConversationStep;

  /**
   * Full message log, user and assistant
   */
  messages: ChatMessage[];

  /**
   * Document the replay starts from; null means the empty document
   */
  baseline: PRDSnapshot | null;

  /**
   * Step the replay starts from
   */
  baselineStep: ConversationStep;

  /**
   * ISO timestamp when the session was created
   */
  createdAt: string;

  /**
   * ISO timestamp of the last change
   */
  updatedAt: string;
}

/**
 * Read model of a session returned to callers
 */
export interface SessionView {
  id: string;
  step: ConversationStep;
  messages: ChatMessage[];
  document: PRDSnapshot;
  /**
   * Compact export of the current document
   */
  preview: string;
  taskCount: number;
  createdAt: string;
  updatedAt: string;
}
