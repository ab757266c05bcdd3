/**
 * PRDDocument for PRD Chat
 *
 * In-memory document model: project metadata, categories from the taxonomy
 * and their tasks. Provides the mutation primitives used by the
 * conversation driver and the importer.
 */

import type {
  CategorySnapshot,
  PRDSnapshot,
  ProjectField,
  ProjectInfo,
  TaskItem,
} from "../types/index.ts";
import { Priority } from "../types/index.ts";
import { categoryOrder, findCategory } from "./taxonomy.ts";
import { UnknownCategoryError, UnknownTaskIdError } from "./errors.ts";

/**
 * Mutable state of one category
 */
interface CategoryState {
  code: string;
  name: string;
  nextSequence: number;
  tasks: TaskItem[];
}

/**
 * Collapses whitespace runs to single spaces and trims.
 * Keeps every stored string on one line of the compact export.
 */
export function normalizeText(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/**
 * Builds a task id from a category code and a sequence number
 *
 * @example
 * ```ts
 * formatTaskId("SEC", 1); // "SEC-001"
 * ```
 */
export function formatTaskId(code: string, sequence: number): string {
  return `${code}-${String(sequence).padStart(3, "0")}`;
}

/**
 * Splits a task id into category code and sequence number
 *
 * @returns null when the id is not of the form {CODE}-{NNN}
 */
export function parseTaskId(taskId: string): { code: string; sequence: number } | null {
  const match = /^([A-Z][A-Z0-9]*)-(\d{3,})$/.exec(taskId);
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { code: match[1], sequence: Number.parseInt(match[2], 10) };
}

/**
 * PRDDocument - the project, category and task tree of one session
 *
 * @remarks
 * - Categories are created on first use and never removed, so their codes
 *   and sequence counters stay stable.
 * - Task sequences only grow: a removed task's id is never reused.
 *
 * @example
 * ```ts
 * const doc = new PRDDocument();
 * doc.setProjectField("name", "Todo");
 * const task = doc.addTask("CORE", "users can add tasks");
 * task.id; // "CORE-001"
 * doc.setTaskPriority(task.id, Priority.High);
 * ```
 */
export class PRDDocument {
  private readonly project: ProjectInfo = { name: "", description: "", techStack: [] };
  private readonly categories = new Map<string, CategoryState>();

  // ==========================================================================
  // Project
  // ==========================================================================

  /**
   * Sets the project name or description
   */
  setProjectField(field: ProjectField, value: string): void {
    this.project[field] = normalizeText(value);
  }

  /**
   * Appends a tech stack tag unless it is already present
   *
   * @returns true when the tag was added
   */
  addTechStackTag(tag: string): boolean {
    const normalized = normalizeText(tag.replace(/,/g, " ")).toLowerCase();
    if (!normalized || this.project.techStack.includes(normalized)) {
      return false;
    }
    this.project.techStack.push(normalized);
    return true;
  }

  getProject(): ProjectInfo {
    return { ...this.project, techStack: [...this.project.techStack] };
  }

  // ==========================================================================
  // Categories
  // ==========================================================================

  /**
   * Checks whether a category has been created
   */
  hasCategory(code: string): boolean {
    return this.categories.has(code);
  }

  /**
   * Returns the category with the given code, creating it if needed
   *
   * @throws {UnknownCategoryError} If the code is not in the taxonomy
   */
  addOrGetCategory(code: string): CategorySnapshot {
    return toCategorySnapshot(this.requireCategory(code));
  }

  /**
   * Lists created categories in taxonomy order
   */
  listCategories(): CategorySnapshot[] {
    return [...this.categories.values()]
      .sort((a, b) => categoryOrder(a.code) - categoryOrder(b.code))
      .map(toCategorySnapshot);
  }

  // ==========================================================================
  // Tasks
  // ==========================================================================

  /**
   * Adds a task to a category, creating the category if needed
   *
   * @throws {UnknownCategoryError} If the code is not in the taxonomy
   * @throws {Error} If the text is blank
   */
  addTask(code: string, text: string, priority: Priority = Priority.Medium): TaskItem {
    const normalized = requireTaskText(text);
    const category = this.requireCategory(code);
    const task: TaskItem = {
      id: formatTaskId(category.code, category.nextSequence),
      text: normalized,
      priority,
    };
    category.nextSequence += 1;
    category.tasks.push(task);
    return { ...task };
  }

  /**
   * Returns a task by id, or undefined
   */
  getTask(taskId: string): TaskItem | undefined {
    const found = this.locateTask(taskId);
    const task = found?.category.tasks[found.index];
    return task ? { ...task } : undefined;
  }

  /**
   * @throws {UnknownTaskIdError} If the task does not exist
   */
  setTaskPriority(taskId: string, priority: Priority): TaskItem {
    const found = this.locateTask(taskId);
    const task = found?.category.tasks[found.index];
    if (!task) {
      throw new UnknownTaskIdError(taskId);
    }
    task.priority = priority;
    return { ...task };
  }

  /**
   * Removes a task. Its category and sequence counter stay.
   *
   * @throws {UnknownTaskIdError} If the task does not exist
   */
  removeTask(taskId: string): TaskItem {
    const found = this.locateTask(taskId);
    if (!found) {
      throw new UnknownTaskIdError(taskId);
    }
    const [removed] = found.category.tasks.splice(found.index, 1);
    if (!removed) {
      throw new UnknownTaskIdError(taskId);
    }
    return removed;
  }

  /**
   * All tasks, in export order
   */
  listTasks(): TaskItem[] {
    return this.listCategories().flatMap((category) => category.tasks);
  }

  taskCount(): number {
    let count = 0;
    for (const category of this.categories.values()) {
      count += category.tasks.length;
    }
    return count;
  }

  // ==========================================================================
  // Snapshots
  // ==========================================================================

  /**
   * Returns a plain-data copy of the document
   */
  toSnapshot(): PRDSnapshot {
    return {
      project: this.getProject(),
      categories: this.listCategories(),
    };
  }

  /**
   * Builds a document from a snapshot
   *
   * @remarks
   * Sequence counters are raised to at least one past the highest task
   * sequence in each category.
   *
   * @throws {UnknownCategoryError} If a category code is not in the taxonomy
   * @throws {Error} If a task id does not belong to its category or repeats, or a task text is blank
   */
  static fromSnapshot(snapshot: PRDSnapshot): PRDDocument {
    const doc = new PRDDocument();
    doc.setProjectField("name", snapshot.project.name);
    doc.setProjectField("description", snapshot.project.description);
    for (const tag of snapshot.project.techStack) {
      doc.addTechStackTag(tag);
    }

    const seen = new Set<string>();
    for (const category of snapshot.categories) {
      const state = doc.requireCategory(category.code);
      let highest = 0;
      for (const task of category.tasks) {
        const parsed = parseTaskId(task.id);
        if (!parsed || parsed.code !== state.code) {
          throw new Error(`Task ${task.id} does not belong to category ${state.code}`);
        }
        if (seen.has(task.id)) {
          throw new Error(`Duplicate task id: ${task.id}`);
        }
        seen.add(task.id);
        highest = Math.max(highest, parsed.sequence);
        state.tasks.push({ id: task.id, text: requireTaskText(task.text), priority: task.priority });
      }
      state.tasks.sort((a, b) => sequenceOf(a.id) - sequenceOf(b.id));
      state.nextSequence = Math.max(category.nextSequence, highest + 1, state.nextSequence);
    }
    return doc;
  }

  clone(): PRDDocument {
    return PRDDocument.fromSnapshot(this.toSnapshot());
  }

  /**
   * Compares every observable field, including sequence counters
   */
  equals(other: PRDDocument): boolean {
    return JSON.stringify(this.toSnapshot()) === JSON.stringify(other.toSnapshot());
  }

  // ==========================================================================
  // Private helpers
  // ==========================================================================

  private requireCategory(code: string): CategoryState {
    const existing = this.categories.get(code);
    if (existing) {
      return existing;
    }

    const entry = findCategory(code);
    if (!entry) {
      throw new UnknownCategoryError(code);
    }

    const created: CategoryState = {
      code: entry.code,
      name: entry.name,
      nextSequence: 1,
      tasks: [],
    };
    this.categories.set(code, created);
    return created;
  }

  private locateTask(taskId: string): { category: CategoryState; index: number } | null {
    const parsed = parseTaskId(taskId);
    const category = parsed ? this.categories.get(parsed.code) : undefined;
    if (!category) {
      return null;
    }
    const index = category.tasks.findIndex((t) => t.id === taskId);
    return index === -1 ? null : { category, index };
  }
}

function requireTaskText(text: string): string {
  const normalized = normalizeText(text);
  if (!normalized) {
    throw new Error("Task text must not be empty");
  }
  return normalized;
}

function sequenceOf(taskId: string): number {
  return parseTaskId(taskId)?.sequence ?? 0;
}

function toCategorySnapshot(state: CategoryState): CategorySnapshot {
  return {
    code: state.code,
    name: state.name,
    nextSequence: state.nextSequence,
    tasks: state.tasks.map((t) => ({ ...t })),
  };
}
