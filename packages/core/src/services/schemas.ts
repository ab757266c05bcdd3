/**
 * Zod validation schemas for PRD Chat
 *
 * These schemas validate data that crosses a trust boundary: the taxonomy
 * file, configuration updates, pasted JSON exports and stored sessions.
 */

import { z } from "zod";
import { Priority } from "../types/prd.ts";
import { ConversationStep } from "../types/conversation.ts";

// ============================================================================
// Config Schema
// ============================================================================

export const ConfigSchema = z.object({
  maxProjectNameLength: z.number().int().min(1).max(1000),
  maxDescriptionLength: z.number().int().min(1).max(100000),
  maxMessageLength: z.number().int().min(1).max(1000000),
  sessionTtlMinutes: z.number().int().min(1).max(10080),
});

// ============================================================================
// Taxonomy Schema
// ============================================================================

export const CategoryCodeSchema = z
  .string()
  .regex(/^[A-Z][A-Z0-9]*$/, "Category code must be uppercase letters and digits");

export const TaxonomyEntrySchema = z.object({
  code: CategoryCodeSchema,
  name: z.string().min(1),
  order: z.number().int().nonnegative(),
  keywords: z.array(z.string().min(1)),
});

export const TaxonomySchema = z
  .object({
    version: z.number().int().positive(),
    defaultCategory: CategoryCodeSchema,
    categories: z.array(TaxonomyEntrySchema).min(1),
  })
  .refine((t) => t.categories.some((c) => c.code === t.defaultCategory), {
    message: "defaultCategory must be one of the categories",
  })
  .refine((t) => new Set(t.categories.map((c) => c.code)).size === t.categories.length, {
    message: "Category codes must be unique",
  });

// ============================================================================
// PRD Schemas
// ============================================================================

export const PrioritySchema = z.nativeEnum(Priority);

/**
 * Task ID format: {CODE}-{NNN}
 */
export const TaskIdSchema = z
  .string()
  .regex(/^[A-Z][A-Z0-9]*-\d{3,}$/, "Task ID must match format {CODE}-{NNN}");

export const TaskItemSchema = z.object({
  id: TaskIdSchema,
  text: z.string().min(1),
  priority: PrioritySchema,
});

export const PRDSnapshotSchema = z.object({
  project: z.object({
    name: z.string(),
    description: z.string(),
    techStack: z.array(z.string()),
  }),
  categories: z.array(
    z.object({
      code: CategoryCodeSchema,
      name: z.string(),
      nextSequence: z.number().int().positive(),
      tasks: z.array(TaskItemSchema),
    })
  ),
});

/**
 * JSON export: the compressed keys of the text format as an object
 */
export const PRDJsonSchema = z.object({
  pn: z.string(),
  pd: z.string(),
  ts: z.array(z.string()),
  p: z.record(
    CategoryCodeSchema,
    z.object({
      n: z.string().optional(),
      next: z.number().int().positive().optional(),
      t: z.array(
        z.object({
          id: TaskIdSchema,
          ti: z.string().min(1),
          pr: PrioritySchema,
        })
      ),
    })
  ),
});

// ============================================================================
// Session Schema
// ============================================================================

export const ConversationStepSchema = z.nativeEnum(ConversationStep);

export const MessageEffectSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("project_field"), field: z.enum(["name", "description", "techStack"]) }),
  z.object({ kind: z.literal("category_created"), code: z.string() }),
  z.object({ kind: z.literal("task_added"), taskId: z.string() }),
  z.object({ kind: z.literal("task_updated"), taskId: z.string() }),
  z.object({ kind: z.literal("task_removed"), taskId: z.string() }),
]);

export const ChatMessageSchema = z.object({
  role: z.enum(["user", "assistant"]),
  content: z.string(),
  timestamp: z.string().datetime(),
  effects: z.array(MessageEffectSchema).optional(),
  limits: ConfigSchema.pick({ maxProjectNameLength: true, maxDescriptionLength: true }).optional(),
});

export const SessionRecordSchema = z.object({
  id: z.string().min(1),
  step: ConversationStepSchema,
  messages: z.array(ChatMessageSchema),
  baseline: PRDSnapshotSchema.nullable(),
  baselineStep: ConversationStepSchema,
  createdAt: z.string().datetime(),
  updatedAt: z.string().datetime(),
});

// ============================================================================
// Type exports (inferred from schemas)
// ============================================================================

export type ConfigSchema = z.infer<typeof ConfigSchema>;
export type TaxonomySchema = z.infer<typeof TaxonomySchema>;
export type TaxonomyEntrySchema = z.infer<typeof TaxonomyEntrySchema>;
export type PRDJsonSchema = z.infer<typeof PRDJsonSchema>;
export type SessionRecordSchema = z.infer<typeof SessionRecordSchema>;
