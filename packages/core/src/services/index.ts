/**
 * Services module for @prdchat/core
 *
 * This module exports all services used by the PRD Chat orchestrator.
 */

// PRDDocument - project, categories and tasks of one session
export { PRDDocument, normalizeText, formatTaskId, parseTaskId } from "./prd-document.ts";

// Taxonomy - fixed category list and feature classification
export {
  TAXONOMY,
  DEFAULT_CATEGORY_CODE,
  findCategory,
  isCategoryCode,
  categoryOrder,
  classifyFeature,
  type TaxonomyEntry,
  type Classification,
} from "./taxonomy.ts";

// PRD codec - compact text, JSON and markdown export; import
export {
  exportPRD,
  exportPRDJson,
  renderPRDMarkdown,
  formatPRD,
  importPRD,
  importPRDJson,
  PRD_LEGEND,
  type ExportOptions,
} from "./prd-codec.ts";

// Conversation driver - message to mutations
export {
  advance,
  applyMutation,
  greeting,
  promptFor,
  type DriverState,
  type DriverOutcome,
} from "./conversation-driver.ts";

// ChatSession - message log, replay, restore
export {
  ChatSession,
  type ChatSessionOptions,
  type SendResult,
  type RestoreResult,
} from "./chat-session.ts";

// Session storage and locking
export {
  InMemorySessionStore,
  type SessionStore,
  type InMemorySessionStoreOptions,
} from "./session-store.ts";
export { SessionLock } from "./session-lock.ts";

// Errors
export {
  ParseError,
  UnknownTaskIdError,
  UnknownCategoryError,
  InvalidMessageIndexError,
  SessionNotFoundError,
  ValidationError,
} from "./errors.ts";

// Zod schemas for validation
export {
  ConfigSchema,
  CategoryCodeSchema,
  TaxonomyEntrySchema,
  TaxonomySchema,
  PrioritySchema,
  TaskIdSchema,
  TaskItemSchema,
  PRDSnapshotSchema,
  PRDJsonSchema,
  ConversationStepSchema,
  MessageEffectSchema,
  ChatMessageSchema,
  SessionRecordSchema,
} from "./schemas.ts";
