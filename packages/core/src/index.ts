/**
 * @prdchat/core
 *
 * Core logic for PRD Chat: the document model, the conversation driver,
 * PRD export and import, session replay and the orchestrator facade.
 * It has no HTTP dependency.
 */

// Version export for debugging
export const VERSION = "0.1.0";

// Re-export the orchestrator
export {
  Orchestrator,
  type OrchestratorOptions,
  type CreateSessionResult,
  type SendMessageResult,
  type RestoreSessionResult,
} from "./orchestrator.ts";

// Re-export services
export {
  // Document model
  PRDDocument,
  normalizeText,
  formatTaskId,
  parseTaskId,
  // Taxonomy
  TAXONOMY,
  DEFAULT_CATEGORY_CODE,
  findCategory,
  isCategoryCode,
  categoryOrder,
  classifyFeature,
  type TaxonomyEntry,
  type Classification,
  // Codec
  exportPRD,
  exportPRDJson,
  renderPRDMarkdown,
  formatPRD,
  importPRD,
  importPRDJson,
  PRD_LEGEND,
  type ExportOptions,
  // Conversation driver
  advance,
  applyMutation,
  greeting,
  promptFor,
  type DriverState,
  type DriverOutcome,
  // Sessions
  ChatSession,
  type ChatSessionOptions,
  type SendResult,
  type RestoreResult,
  InMemorySessionStore,
  type SessionStore,
  type InMemorySessionStoreOptions,
  SessionLock,
  // Errors
  ParseError,
  UnknownTaskIdError,
  UnknownCategoryError,
  InvalidMessageIndexError,
  SessionNotFoundError,
  ValidationError,
  // Zod schemas
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
} from "./services/index.ts";

// Re-export all types
export {
  // Configuration
  type Config,
  type ClipLimits,
  DEFAULT_CONFIG,
  // PRD
  Priority,
  type ProjectField,
  type ProjectInfo,
  type TaskItem,
  type CategorySnapshot,
  type PRDSnapshot,
  type ExportFormat,
  // Conversation
  ConversationStep,
  type Mutation,
  type MessageEffect,
  type SignalKind,
  type Signal,
  type ChatMessage,
  // Sessions
  type SessionRecord,
  type SessionView,
} from "./types/index.ts";
