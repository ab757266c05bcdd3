/**
 * Conversation driver for PRD Chat
 *
 * Maps the next user message to document mutations, given the current step
 * and document. The driver never touches the document itself: it returns
 * mutations, and `applyMutation` applies them. Both are deterministic, which
 * is what lets a session be rebuilt by replaying its messages.
 */

import type { Config, MessageEffect, Mutation, Signal } from "../types/index.ts";
import { ConversationStep, Priority } from "../types/index.ts";
import { normalizeText, type PRDDocument } from "./prd-document.ts";
import { classifyFeature } from "./taxonomy.ts";

/**
 * Read-only input of the driver
 */
export interface DriverState {
  step: ConversationStep;
  document: PRDDocument;
  config: Config;
  /**
   * Set when replaying logged messages. They passed the length check when
   * they were accepted, so it is not applied again.
   */
  replaying?: boolean;
}

/**
 * Result of one driver step
 */
export interface DriverOutcome {
  /** False when the message was rejected; nothing changes then */
  accepted: boolean;
  /** Step after the message */
  step: ConversationStep;
  mutations: Mutation[];
  /** Assistant reply */
  reply: string;
  signals: Signal[];
}

/** Utterances that close an open-ended step */
const COMPLETION_UTTERANCES = new Set([
  "done",
  "finished",
  "next",
  "ready",
  "thats all",
  "thats it",
  "no more",
  "nothing else",
]);

/** Extra utterances that finish the priorities step */
const EXPORT_UTTERANCES = new Set(["export", "generate", "ship it"]);

const SKIP_UTTERANCES = new Set(["skip", "none", "no preference", "n a"]);

const URGENCY_PATTERN = /\b(critical|urgent|asap|must have|high priority)\b/i;
const TASK_ID_PATTERN = /\b([A-Za-z][A-Za-z0-9]*-\d{3,})\b/g;
const PRIORITY_WORD_PATTERN = /\b(high|medium|med|normal)\b/i;
const REMOVE_PATTERN = /\b(delete|remove|drop)\b/i;
/** "called X" / "named X" only when X is capitalised or quoted; "project: X" always */
const EXPLICIT_NAME_PATTERN =
  /(?:\b(?:[Cc]alled|[Nn]amed)\s+(?=["'“]|[A-Z0-9])|\b[Pp]roject:\s*)["'“]?([^"'”.,!?\n]+)/;
/** "+" and "/" separate only between spaces: "c++" and "ci/cd" are single tags */
const STACK_SEPARATORS = /[,;&\n]|\s[+/]\s|\band\b|\bwith\b/i;
const BULLET_PREFIX = /^(?:[-*•]|\d+[.)])\s+/;

/**
 * The first assistant prompt of a session
 */
export function greeting(): string {
  return "What are we building today? Describe the project in a sentence or two.";
}

/**
 * The prompt repeated when a message is rejected at the given step
 */
export function promptFor(step: ConversationStep): string {
  switch (step) {
    case ConversationStep.AwaitingVision:
      return greeting();
    case ConversationStep.AwaitingStack:
      return 'Tech stack? List it comma-separated, or say "skip".';
    case ConversationStep.AwaitingFeatures:
      return 'Describe a feature, one per line. Say "done" when finished.';
    case ConversationStep.AwaitingPriorities:
      return 'Set priorities like "CORE-001 high", remove with "delete CORE-002", or say "done".';
    case ConversationStep.Done:
      return "The PRD is ready. Export it, or reset to start over.";
  }
}

/**
 * Maps one user message to the next step and the mutations it causes
 *
 * @remarks
 * Pure: the same state and message always give the same outcome.
 * Rejected messages (`accepted: false`) carry a re-prompt and no mutations.
 *
 * @example
 * ```ts
 * const outcome = advance(
 *   { step: ConversationStep.AwaitingStack, document, config },
 *   "Python, Flask"
 * );
 * outcome.mutations; // two AddTechStackTag mutations
 * outcome.step;      // ConversationStep.AwaitingFeatures
 * ```
 */
export function advance(state: DriverState, message: string): DriverOutcome {
  const trimmed = message.trim();
  if (!trimmed) {
    return reject(state.step, { kind: "EmptyInput" });
  }
  if (!state.replaying && message.length > state.config.maxMessageLength) {
    return reject(
      state.step,
      { kind: "MessageTooLong" },
      `That message is too long (max ${state.config.maxMessageLength} characters). ${promptFor(state.step)}`
    );
  }

  switch (state.step) {
    case ConversationStep.AwaitingVision:
      return handleVision(state, trimmed);
    case ConversationStep.AwaitingStack:
      return handleStack(state, trimmed);
    case ConversationStep.AwaitingFeatures:
      return handleFeatures(state, trimmed);
    case ConversationStep.AwaitingPriorities:
      return handlePriorities(state, trimmed);
    case ConversationStep.Done:
      return {
        accepted: true,
        step: ConversationStep.Done,
        mutations: [],
        reply: promptFor(ConversationStep.Done),
        signals: [],
      };
  }
}

/**
 * Applies one mutation to a document and reports what it touched
 *
 * @throws {UnknownTaskIdError} If a priority change or removal names a missing task
 * @throws {UnknownCategoryError} If a task is added to a category outside the taxonomy
 */
export function applyMutation(document: PRDDocument, mutation: Mutation): MessageEffect[] {
  switch (mutation.kind) {
    case "SetProjectName":
      document.setProjectField("name", mutation.name);
      return [{ kind: "project_field", field: "name" }];
    case "SetDescription":
      document.setProjectField("description", mutation.description);
      return [{ kind: "project_field", field: "description" }];
    case "AddTechStackTag":
      return document.addTechStackTag(mutation.tag)
        ? [{ kind: "project_field", field: "techStack" }]
        : [];
    case "AddTask": {
      const effects: MessageEffect[] = [];
      if (!document.hasCategory(mutation.categoryCode)) {
        effects.push({ kind: "category_created", code: mutation.categoryCode });
      }
      const task = document.addTask(mutation.categoryCode, mutation.text, mutation.priority);
      effects.push({ kind: "task_added", taskId: task.id });
      return effects;
    }
    case "SetPriority":
      document.setTaskPriority(mutation.taskId, mutation.priority);
      return [{ kind: "task_updated", taskId: mutation.taskId }];
    case "RemoveTask":
      document.removeTask(mutation.taskId);
      return [{ kind: "task_removed", taskId: mutation.taskId }];
  }
}

// ============================================================================
// Step handlers
// ============================================================================

function handleVision(state: DriverState, message: string): DriverOutcome {
  const { maxDescriptionLength, maxProjectNameLength } = state.config;
  const description = clip(normalizeText(message), maxDescriptionLength);
  const name = clip(extractProjectName(description), maxProjectNameLength);

  return {
    accepted: true,
    step: ConversationStep.AwaitingStack,
    mutations: [
      { kind: "SetProjectName", name },
      { kind: "SetDescription", description },
    ],
    reply: `Got it. **${name}**.\n\n${promptFor(ConversationStep.AwaitingStack)}`,
    signals: [],
  };
}

function handleStack(state: DriverState, message: string): DriverOutcome {
  if (SKIP_UTTERANCES.has(utterance(message))) {
    return {
      accepted: true,
      step: ConversationStep.AwaitingFeatures,
      mutations: [],
      reply: `No stack recorded.\n\n${promptFor(ConversationStep.AwaitingFeatures)}`,
      signals: [],
    };
  }

  const existing = state.document.getProject().techStack;
  const tags: string[] = [];
  for (const part of message.split(STACK_SEPARATORS)) {
    const tag = normalizeText(part).toLowerCase();
    if (tag && !tags.includes(tag) && !existing.includes(tag)) {
      tags.push(tag);
    }
  }

  if (tags.length === 0) {
    return reject(state.step, { kind: "EmptyInput" });
  }

  return {
    accepted: true,
    step: ConversationStep.AwaitingFeatures,
    mutations: tags.map((tag): Mutation => ({ kind: "AddTechStackTag", tag })),
    reply: `Stack: ${tags.join(", ")}.\n\n${promptFor(ConversationStep.AwaitingFeatures)}`,
    signals: [],
  };
}

function handleFeatures(state: DriverState, message: string): DriverOutcome {
  if (COMPLETION_UTTERANCES.has(utterance(message))) {
    return {
      accepted: true,
      step: ConversationStep.AwaitingPriorities,
      mutations: [],
      reply: `${describeTasks(state.document)}\n\n${promptFor(ConversationStep.AwaitingPriorities)}`,
      signals: [],
    };
  }

  const mutations: Mutation[] = [];
  const signals: Signal[] = [];
  for (const item of splitFeatures(message)) {
    const urgent = item.startsWith("!") || item.endsWith("!") || URGENCY_PATTERN.test(item);
    const text = normalizeText(item.replace(/^!+|!+$/g, ""));
    if (!text) {
      continue;
    }
    const classification = classifyFeature(text);
    if (!classification.matched) {
      signals.push({ kind: "UnclassifiedFeature", detail: text });
    }
    mutations.push({
      kind: "AddTask",
      categoryCode: classification.code,
      text,
      priority: urgent ? Priority.High : Priority.Medium,
    });
  }

  if (mutations.length === 0) {
    return reject(state.step, { kind: "EmptyInput" });
  }

  const total = state.document.taskCount() + mutations.length;
  return {
    accepted: true,
    step: ConversationStep.AwaitingFeatures,
    mutations,
    reply: `Added ${plural(mutations.length, "feature")}. Total tasks: ${total}.\n\nMore? Say "done" when finished.`,
    signals,
  };
}

function handlePriorities(state: DriverState, message: string): DriverOutcome {
  const said = utterance(message);
  if (COMPLETION_UTTERANCES.has(said) || EXPORT_UTTERANCES.has(said)) {
    return {
      accepted: true,
      step: ConversationStep.Done,
      mutations: [],
      reply: `PRD ready with ${plural(state.document.taskCount(), "task")}. Export it, or reset to start over.`,
      signals: [],
    };
  }

  const document = state.document;
  const priority = parsePriorityWord(message);
  const removing = REMOVE_PATTERN.test(message);
  const assigned = priorityPerTask(message);
  let ids = [...assigned.keys()];

  if (ids.length === 0 && !removing && priority && /\ball\b/i.test(message)) {
    ids = document.listTasks().map((task) => task.id);
  }

  if (ids.length === 0 || (!removing && !priority)) {
    return {
      accepted: true,
      step: ConversationStep.AwaitingPriorities,
      mutations: [],
      reply: `Not sure what to change. ${promptFor(ConversationStep.AwaitingPriorities)}`,
      signals: [{ kind: "Unrecognized" }],
    };
  }

  const mutations: Mutation[] = [];
  const signals: Signal[] = [];
  const changed: string[] = [];
  for (const taskId of ids) {
    if (!document.getTask(taskId)) {
      signals.push({ kind: "UnknownTaskId", detail: taskId });
      continue;
    }
    if (removing) {
      mutations.push({ kind: "RemoveTask", taskId });
      changed.push(`removed ${taskId}`);
    } else {
      const target = assigned.get(taskId) ?? priority;
      if (target) {
        mutations.push({ kind: "SetPriority", taskId, priority: target });
        changed.push(`${taskId} set to ${target}`);
      }
    }
  }

  const lines: string[] = [];
  if (changed.length > 0) {
    lines.push(`Updated: ${changed.join(", ")}.`);
  }
  const unknown = signals.map((s) => s.detail).filter((d): d is string => Boolean(d));
  if (unknown.length > 0) {
    lines.push(`Unknown task id${unknown.length === 1 ? "" : "s"}: ${unknown.join(", ")}.`);
  }
  lines.push('Anything else? Say "done" to finish.');

  return {
    accepted: true,
    step: ConversationStep.AwaitingPriorities,
    mutations,
    reply: lines.join("\n\n"),
    signals,
  };
}

// ============================================================================
// Private helpers
// ============================================================================

function reject(step: ConversationStep, signal: Signal, reply?: string): DriverOutcome {
  return {
    accepted: false,
    step,
    mutations: [],
    reply: reply ?? promptFor(step),
    signals: [signal],
  };
}

/**
 * Lowercase letters and spaces only, for matching short commands
 */
function utterance(message: string): string {
  return normalizeText(message.toLowerCase().replace(/'/g, "").replace(/[^a-z ]/g, " "));
}

function clip(value: string, max: number): string {
  return value.length > max ? value.slice(0, max).trim() : value;
}

/**
 * Uses an explicit "called X" / "named X" / "project: X" when present,
 * otherwise the letters of the first three words, capitalised
 */
function extractProjectName(description: string): string {
  const explicit = EXPLICIT_NAME_PATTERN.exec(description)?.[1];
  if (explicit && normalizeText(explicit)) {
    return normalizeText(explicit);
  }

  const words = description
    .split(" ")
    .slice(0, 3)
    .map((word) => word.replace(/[^A-Za-z]/g, ""))
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase());
  return words.join(" ") || "My Project";
}

function splitFeatures(message: string): string[] {
  return message
    .split(/\r?\n|;/)
    .map((line) => line.trim().replace(BULLET_PREFIX, ""))
    .filter((line) => line.length > 0);
}

function parsePriorityWord(message: string): Priority | undefined {
  const word = PRIORITY_WORD_PATTERN.exec(message)?.[1]?.toLowerCase();
  if (word === "high") {
    return Priority.High;
  }
  if (word === "medium" || word === "med" || word === "normal") {
    return Priority.Medium;
  }
  return undefined;
}

/**
 * Task ids in message order, each with the priority word that follows it
 * before the next id, if any
 */
function priorityPerTask(message: string): Map<string, Priority | undefined> {
  const matches = [...message.matchAll(TASK_ID_PATTERN)];
  const assigned = new Map<string, Priority | undefined>();
  matches.forEach((match, i) => {
    const taskId = (match[1] ?? "").toUpperCase();
    const start = (match.index ?? 0) + match[0].length;
    const end = matches[i + 1]?.index ?? message.length;
    const priority = parsePriorityWord(message.slice(start, end));
    if (priority || !assigned.has(taskId)) {
      assigned.set(taskId, priority);
    }
  });
  return assigned;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function describeTasks(document: PRDDocument): string {
  const tasks = document.listTasks();
  if (tasks.length === 0) {
    return "No tasks yet.";
  }
  return [
    `Priorities. ${plural(tasks.length, "task")}:`,
    ...tasks.map((task) => `- ${task.id} ${task.text} [${task.priority}]`),
  ].join("\n");
}
