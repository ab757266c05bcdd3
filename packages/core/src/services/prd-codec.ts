/**
 * PRD export and import for PRD Chat
 *
 * The compact format uses abbreviated keys so the whole PRD fits in a
 * coding agent's prompt:
 *
 * ```
 * pn: <project name>
 * pd: <project description>
 * ts: <tag>,<tag>,...
 * p:
 *   <CODE> <Category name> next:<n>
 *     t: <TASK-ID> <task text> pr:<Medium|High>
 * ```
 *
 * Previously exported text must keep importing, so this layout only ever
 * gains optional parts.
 */

import type { PRDSnapshot, TaskItem, ExportFormat } from "../types/index.ts";
import { Priority } from "../types/index.ts";
import { PRDDocument, parseTaskId } from "./prd-document.ts";
import { PRDJsonSchema } from "./schemas.ts";
import { findCategory, isCategoryCode } from "./taxonomy.ts";
import { ParseError } from "./errors.ts";

/**
 * Options for exportPRD
 */
export interface ExportOptions {
  /**
   * Prepend the key legend as `#` comment lines
   * @default false
   */
  legend?: boolean;
}

/**
 * Legend printed above the compact format. Comment lines are skipped on import.
 */
export const PRD_LEGEND: readonly string[] = [
  "# PRD legend: pn=project name, pd=project description, ts=tech stack",
  "#   p=task categories, t=task, pr=priority (Medium|High), next=next task number",
  "# Build loop: pick the highest priority open task, implement it, test it,",
  "#   commit with the task id (e.g. \"SEC-001: add input validation\"), repeat.",
];

const HEADER_KEYS = ["pn", "pd", "ts"] as const;
type HeaderKey = (typeof HEADER_KEYS)[number];

const CATEGORY_LINE = /^([A-Z][A-Z0-9]*)\s+(.+?)(?:\s+next:(\d+))?$/;
const TASK_LINE = /^t:\s+(\S+)\s+(.+?)\s+pr:(\S+)$/;

// ============================================================================
// Export
// ============================================================================

/**
 * Serializes a document to the compact text format
 *
 * @remarks
 * Categories come in taxonomy order, tasks in sequence order. The output
 * depends only on the document, so equal documents export identically.
 */
export function exportPRD(document: PRDDocument, options: ExportOptions = {}): string {
  const project = document.getProject();
  const lines: string[] = [];

  if (options.legend) {
    lines.push(...PRD_LEGEND, "");
  }

  lines.push(keyLine("pn", project.name));
  lines.push(keyLine("pd", project.description));
  lines.push(keyLine("ts", project.techStack.join(",")));
  lines.push("p:");

  for (const category of document.listCategories()) {
    lines.push(`  ${category.code} ${category.name} next:${category.nextSequence}`);
    for (const task of category.tasks) {
      lines.push(`    t: ${task.id} ${task.text} pr:${task.priority}`);
    }
  }

  return `${lines.join("\n")}\n`;
}

/**
 * Serializes a document to the JSON form of the compact keys
 */
export function exportPRDJson(document: PRDDocument): string {
  const project = document.getProject();
  const p: PRDJsonSchema["p"] = {};
  for (const category of document.listCategories()) {
    p[category.code] = {
      n: category.name,
      next: category.nextSequence,
      t: category.tasks.map((task) => ({ id: task.id, ti: task.text, pr: task.priority })),
    };
  }

  const json: PRDJsonSchema = {
    pn: project.name,
    pd: project.description,
    ts: project.techStack,
    p,
  };
  return JSON.stringify(json, null, 2);
}

/**
 * Renders a document as readable markdown. Not importable.
 */
export function renderPRDMarkdown(document: PRDDocument): string {
  const project = document.getProject();
  const lines: string[] = [`# ${project.name || "Untitled project"}`, ""];

  lines.push(project.description || "_No description yet._", "");

  lines.push("## Tech stack", "");
  if (project.techStack.length === 0) {
    lines.push("_None_", "");
  } else {
    lines.push(...project.techStack.map((tag) => `- ${tag}`), "");
  }

  lines.push("## Tasks", "");
  const categories = document.listCategories();
  if (categories.length === 0) {
    lines.push("_None_", "");
  }
  for (const category of categories) {
    lines.push(`### ${category.name} (${category.code})`, "");
    if (category.tasks.length === 0) {
      lines.push("_Empty_", "");
      continue;
    }
    lines.push(
      ...category.tasks.map(
        (task) => `- [${task.priority.toUpperCase()}] ${task.id} ${task.text}`
      ),
      ""
    );
  }

  return lines.join("\n");
}

/**
 * Serializes a document in the requested format
 */
export function formatPRD(
  document: PRDDocument,
  format: ExportFormat,
  options: ExportOptions = {}
): string {
  switch (format) {
    case "compact":
      return exportPRD(document, options);
    case "json":
      return exportPRDJson(document);
    case "markdown":
      return renderPRDMarkdown(document);
  }
}

// ============================================================================
// Import
// ============================================================================

/**
 * Parses exported PRD text back into a document
 *
 * @remarks
 * Text that starts with `{` is read as the JSON export. Blank lines and
 * `#` comment lines are skipped. Category names in the text are ignored in
 * favour of the taxonomy names. Unknown category codes are rejected rather
 * than mapped to a synthetic category.
 *
 * @throws {ParseError} If a required key is missing or any line is malformed
 */
export function importPRD(text: string): PRDDocument {
  if (text.trimStart().startsWith("{")) {
    return importPRDJson(text);
  }

  const header = new Map<HeaderKey, string>();
  let inCategories = false;
  const categories: PRDSnapshot["categories"] = [];

  const lines = text.split(/\r?\n/);
  lines.forEach((raw, index) => {
    const lineNo = index + 1;
    const line = raw.trim();
    if (!line || line.startsWith("#")) {
      return;
    }

    const headerKey = HEADER_KEYS.find((key) => line === `${key}:` || line.startsWith(`${key}: `));
    if (headerKey) {
      if (inCategories) {
        throw new ParseError(`Key "${headerKey}:" must come before "p:"`, lineNo);
      }
      if (header.has(headerKey)) {
        throw new ParseError(`Duplicate key "${headerKey}:"`, lineNo);
      }
      header.set(headerKey, line.slice(headerKey.length + 1).trim());
      return;
    }

    if (line === "p:") {
      if (inCategories) {
        throw new ParseError('Duplicate key "p:"', lineNo);
      }
      inCategories = true;
      return;
    }

    if (!inCategories) {
      throw new ParseError(`Unexpected line: ${line}`, lineNo);
    }

    if (line.startsWith("t:")) {
      const current = categories[categories.length - 1];
      if (!current) {
        throw new ParseError("Task listed before any category", lineNo);
      }
      current.tasks.push(parseTaskLine(line, current.code, lineNo));
      return;
    }

    const match = CATEGORY_LINE.exec(line);
    if (!match?.[1]) {
      throw new ParseError(`Unexpected line: ${line}`, lineNo);
    }
    const code = match[1];
    const entry = findCategory(code);
    if (!entry) {
      throw new ParseError(`Unknown category code "${code}"`, lineNo);
    }
    if (categories.some((c) => c.code === code)) {
      throw new ParseError(`Duplicate category "${code}"`, lineNo);
    }
    categories.push({
      code,
      name: entry.name,
      nextSequence: match[3] ? Number.parseInt(match[3], 10) : 1,
      tasks: [],
    });
  });

  for (const key of HEADER_KEYS) {
    if (!header.has(key)) {
      throw new ParseError(`Missing required key "${key}:"`);
    }
  }
  if (!inCategories) {
    throw new ParseError('Missing required key "p:"');
  }

  const seen = new Set<string>();
  for (const category of categories) {
    for (const task of category.tasks) {
      if (seen.has(task.id)) {
        throw new ParseError(`Duplicate task id "${task.id}"`);
      }
      seen.add(task.id);
    }
  }

  return buildDocument({
    project: {
      name: header.get("pn") ?? "",
      description: header.get("pd") ?? "",
      techStack: splitTags(header.get("ts") ?? ""),
    },
    categories,
  });
}

/**
 * Parses the JSON export back into a document
 *
 * @throws {ParseError} If the JSON is invalid or does not match the export shape
 */
export function importPRDJson(text: string): PRDDocument {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch {
    throw new ParseError("Invalid JSON");
  }

  const result = PRDJsonSchema.safeParse(data);
  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ParseError(`Invalid PRD JSON: ${message}`);
  }

  const seen = new Set<string>();
  const categories: PRDSnapshot["categories"] = [];
  for (const [code, category] of Object.entries(result.data.p)) {
    const entry = findCategory(code);
    if (!entry) {
      throw new ParseError(`Unknown category code "${code}"`);
    }
    const tasks: TaskItem[] = [];
    for (const task of category.t) {
      if (parseTaskId(task.id)?.code !== code) {
        throw new ParseError(`Task ${task.id} does not belong to category ${code}`);
      }
      if (seen.has(task.id)) {
        throw new ParseError(`Duplicate task id "${task.id}"`);
      }
      seen.add(task.id);
      tasks.push({ id: task.id, text: task.ti, priority: task.pr });
    }
    categories.push({ code, name: entry.name, nextSequence: category.next ?? 1, tasks });
  }

  return buildDocument({
    project: {
      name: result.data.pn,
      description: result.data.pd,
      techStack: result.data.ts,
    },
    categories,
  });
}

// ============================================================================
// Private helpers
// ============================================================================

/**
 * Builds the document, reporting model-level rejections as parse errors
 */
function buildDocument(snapshot: PRDSnapshot): PRDDocument {
  try {
    return PRDDocument.fromSnapshot(snapshot);
  } catch (error) {
    throw new ParseError(error instanceof Error ? error.message : String(error));
  }
}

function keyLine(key: HeaderKey, value: string): string {
  return value ? `${key}: ${value}` : `${key}:`;
}

function splitTags(value: string): string[] {
  return value
    .split(",")
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

function parseTaskLine(line: string, categoryCode: string, lineNo: number): TaskItem {
  const match = TASK_LINE.exec(line);
  if (!match?.[1] || !match[2] || !match[3]) {
    throw new ParseError(`Malformed task line: ${line}`, lineNo);
  }

  const id = match[1];
  const parsedId = parseTaskId(id);
  if (!parsedId) {
    throw new ParseError(`Malformed task id "${id}"`, lineNo);
  }
  if (!isCategoryCode(parsedId.code) || parsedId.code !== categoryCode) {
    throw new ParseError(`Task ${id} does not belong to category ${categoryCode}`, lineNo);
  }

  const priority = parsePriority(match[3]);
  if (!priority) {
    throw new ParseError(`Unknown priority "${match[3]}"`, lineNo);
  }

  return { id, text: match[2], priority };
}

function parsePriority(value: string): Priority | undefined {
  switch (value.toLowerCase()) {
    case "high":
      return Priority.High;
    case "medium":
      return Priority.Medium;
    default:
      return undefined;
  }
}
