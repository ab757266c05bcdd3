/**
 * PRD (Product Requirements Document) types for PRD Chat
 *
 * The PRD is the document the conversation builds: project metadata plus
 * tasks grouped into categories from a fixed taxonomy.
 */

/**
 * Priority of a task
 *
 * @remarks
 * Two levels only. New tasks start at `Medium` unless the feature text
 * carries an urgency marker.
 */
export enum Priority {
  Medium = "Medium",
  High = "High",
}

/**
 * Project fields that hold a single string
 */
export type ProjectField = "name" | "description";

/**
 * Project metadata, one per session
 */
export interface ProjectInfo {
  /**
   * Project name, empty until set
   * @example "Building A Todo"
   */
  name: string;

  /**
   * Project description, empty until set
   */
  description: string;

  /**
   * Lowercase tech stack tags in insertion order, without duplicates
   * @example ["python", "flask"]
   */
  techStack: string[];
}

/**
 * A unit of work inside a category
 */
export interface TaskItem {
  /**
   * Category code plus zero-padded sequence
   * @example "CORE-001"
   */
  id: string;

  /**
   * Free-form description of the work
   */
  text: string;

  priority: Priority;
}

/**
 * Plain-data view of a category
 */
export interface CategorySnapshot {
  /**
   * Code from the taxonomy
   * @example "SEC"
   */
  code: string;

  /**
   * Display name from the taxonomy
   * @example "Security"
   */
  name: string;

  /**
   * Sequence number the next task in this category receives.
   * Never decreases, so ids of removed tasks are not handed out again.
   */
  nextSequence: number;

  tasks: TaskItem[];
}

/**
 * Plain-data view of a whole document
 *
 * @remarks
 * Categories are listed in taxonomy order and tasks in sequence order,
 * which makes two snapshots of equal documents serialize identically.
 */
export interface PRDSnapshot {
  project: ProjectInfo;
  categories: CategorySnapshot[];
}

/**
 * Output formats of the exporter
 *
 * - `compact` - the key-abbreviated text format (importable)
 * - `json` - the same keys as a JSON object (importable)
 * - `markdown` - a readable rendering (export only)
 */
export type ExportFormat = "compact" | "json" | "markdown";
