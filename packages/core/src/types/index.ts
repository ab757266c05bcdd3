/**
 * Core types for PRD Chat
 *
 * This module re-exports all types from the types directory.
 *
 * @example
 * ```ts
 * import { Priority, ConversationStep, type Config } from "@prdchat/core";
 * ```
 */

// Configuration types
export { type Config, type ClipLimits, DEFAULT_CONFIG } from "./config.ts";

// PRD types
export {
  Priority,
  type ProjectField,
  type ProjectInfo,
  type TaskItem,
  type CategorySnapshot,
  type PRDSnapshot,
  type ExportFormat,
} from "./prd.ts";

// Conversation types
export {
  ConversationStep,
  type Mutation,
  type MessageEffect,
  type SignalKind,
  type Signal,
  type ChatMessage,
} from "./conversation.ts";

// Session types
export { type SessionRecord, type SessionView } from "./session.ts";
