/**
 * Conversation types for PRD Chat
 *
 * A session walks a fixed script of steps. Each accepted user message
 * yields a list of mutations that are applied to the PRD document.
 */

import type { ClipLimits } from "./config.ts";
import type { Priority, ProjectField } from "./prd.ts";

/**
 * Step of the conversation script
 *
 * @remarks
 * - `awaiting_vision` - waiting for the project idea
 * - `awaiting_stack` - waiting for the tech stack
 * - `awaiting_features` - collecting features until the user says done
 * - `awaiting_priorities` - adjusting priorities and removing tasks
 * - `done` - terminal; only a reset leaves it
 */
export enum ConversationStep {
  /** Waiting for the project idea */
  AwaitingVision = "awaiting_vision",
  /** Waiting for the tech stack */
  AwaitingStack = "awaiting_stack",
  /** Collecting features, repeats until a completion utterance */
  AwaitingFeatures = "awaiting_features",
  /** Adjusting priorities */
  AwaitingPriorities = "awaiting_priorities",
  /** Script finished */
  Done = "done",
}

/**
 * A change to the PRD document produced by the conversation driver
 */
export type Mutation =
  | { kind: "SetProjectName"; name: string }
  | { kind: "SetDescription"; description: string }
  | { kind: "AddTechStackTag"; tag: string }
  | { kind: "AddTask"; categoryCode: string; text: string; priority: Priority }
  | { kind: "SetPriority"; taskId: string; priority: Priority }
  | { kind: "RemoveTask"; taskId: string };

/**
 * What a mutation touched, recorded on the user message that caused it
 */
export type MessageEffect =
  | { kind: "project_field"; field: ProjectField | "techStack" }
  | { kind: "category_created"; code: string }
  | { kind: "task_added"; taskId: string }
  | { kind: "task_updated"; taskId: string }
  | { kind: "task_removed"; taskId: string };

/**
 * Non-fatal conditions reported alongside a driver outcome
 *
 * @remarks
 * - `EmptyInput` - blank message, nothing changed
 * - `MessageTooLong` - message above the configured limit, nothing changed
 * - `UnclassifiedFeature` - no taxonomy rule matched; task went to the default category
 * - `UnknownTaskId` - a referenced task does not exist; that reference was skipped
 * - `Unrecognized` - the message meant nothing at the current step
 */
export type SignalKind =
  | "EmptyInput"
  | "MessageTooLong"
  | "UnclassifiedFeature"
  | "UnknownTaskId"
  | "Unrecognized";

export interface Signal {
  kind: SignalKind;
  /** The feature text or task id the signal refers to */
  detail?: string;
}

/**
 * A message in the session log
 */
export interface ChatMessage {
  role: "user" | "assistant";

  content: string;

  /**
   * ISO timestamp when the message was added.
   * An assistant reply carries the timestamp of the message it answers.
   */
  timestamp: string;

  /**
   * What the message changed in the document (user messages only)
   */
  effects?: MessageEffect[];

  /**
   * Limits in force when the message was accepted (user messages only).
   * Replay clips with these, not with the current config.
   */
  limits?: ClipLimits;
}
