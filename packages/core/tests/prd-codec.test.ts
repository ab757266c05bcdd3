import { test, expect, describe } from "vitest";
import {
  PRD_LEGEND,
  exportPRD,
  exportPRDJson,
  formatPRD,
  importPRD,
  importPRDJson,
  renderPRDMarkdown,
} from "../src/services/prd-codec.ts";
import { PRDDocument } from "../src/services/prd-document.ts";
import { ParseError } from "../src/services/errors.ts";
import { Priority } from "../src/types/index.ts";

function createTodoDocument(): PRDDocument {
  const doc = new PRDDocument();
  doc.setProjectField("name", "Todo");
  doc.setProjectField("description", "A todo app");
  doc.addTechStackTag("python");
  doc.addTechStackTag("flask");
  doc.addTask("SEC", "login with email", Priority.High);
  doc.addTask("CORE", "users can add tasks");
  return doc;
}

const TODO_EXPORT = [
  "pn: Todo",
  "pd: A todo app",
  "ts: python,flask",
  "p:",
  "  SEC Security next:2",
  "    t: SEC-001 login with email pr:High",
  "  CORE Core next:2",
  "    t: CORE-001 users can add tasks pr:Medium",
  "",
].join("\n");

/**
 * Captures the ParseError thrown by fn
 */
function catchParseError(fn: () => unknown): ParseError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ParseError) {
      return error;
    }
    throw error;
  }
  throw new Error("Expected a ParseError");
}

describe("exportPRD", () => {
  test("writes the compact format", () => {
    expect(exportPRD(createTodoDocument())).toBe(TODO_EXPORT);
  });

  test("writes empty keys for an empty document", () => {
    expect(exportPRD(new PRDDocument())).toBe("pn:\npd:\nts:\np:\n");
  });

  test("prepends the legend when asked", () => {
    const text = exportPRD(createTodoDocument(), { legend: true });
    expect(text).toBe(`${PRD_LEGEND.join("\n")}\n\n${TODO_EXPORT}`);
  });

  test("formatPRD dispatches by format", () => {
    const doc = createTodoDocument();
    expect(formatPRD(doc, "compact")).toBe(exportPRD(doc));
    expect(formatPRD(doc, "json")).toBe(exportPRDJson(doc));
    expect(formatPRD(doc, "markdown")).toBe(renderPRDMarkdown(doc));
  });
});

describe("exportPRDJson", () => {
  test("uses the compact keys", () => {
    expect(JSON.parse(exportPRDJson(createTodoDocument()))).toEqual({
      pn: "Todo",
      pd: "A todo app",
      ts: ["python", "flask"],
      p: {
        SEC: { n: "Security", next: 2, t: [{ id: "SEC-001", ti: "login with email", pr: "High" }] },
        CORE: { n: "Core", next: 2, t: [{ id: "CORE-001", ti: "users can add tasks", pr: "Medium" }] },
      },
    });
  });
});

describe("renderPRDMarkdown", () => {
  test("renders sections and priority markers", () => {
    expect(renderPRDMarkdown(createTodoDocument())).toBe(
      [
        "# Todo",
        "",
        "A todo app",
        "",
        "## Tech stack",
        "",
        "- python",
        "- flask",
        "",
        "## Tasks",
        "",
        "### Security (SEC)",
        "",
        "- [HIGH] SEC-001 login with email",
        "",
        "### Core (CORE)",
        "",
        "- [MEDIUM] CORE-001 users can add tasks",
        "",
      ].join("\n")
    );
  });

  test("renders placeholders for an empty document", () => {
    expect(renderPRDMarkdown(new PRDDocument())).toBe(
      [
        "# Untitled project",
        "",
        "_No description yet._",
        "",
        "## Tech stack",
        "",
        "_None_",
        "",
        "## Tasks",
        "",
        "_None_",
        "",
      ].join("\n")
    );
  });
});

describe("importPRD", () => {
  test("round-trips the compact format", () => {
    const doc = createTodoDocument();
    expect(importPRD(exportPRD(doc)).equals(doc)).toBe(true);
  });

  test("round-trips with the legend", () => {
    const doc = createTodoDocument();
    expect(importPRD(exportPRD(doc, { legend: true })).equals(doc)).toBe(true);
  });

  test("round-trips the JSON export", () => {
    const doc = createTodoDocument();
    expect(importPRD(exportPRDJson(doc)).equals(doc)).toBe(true);
  });

  test("round-trips an empty document", () => {
    expect(importPRD(exportPRD(new PRDDocument())).equals(new PRDDocument())).toBe(true);
  });

  test("round-trips a removed task's reserved sequence", () => {
    const doc = createTodoDocument();
    doc.addTask("CORE", "temporary");
    doc.removeTask("CORE-002");

    const restored = importPRD(exportPRD(doc));
    expect(restored.equals(doc)).toBe(true);
    expect(restored.addTask("CORE", "share lists").id).toBe("CORE-003");
  });

  test("keeps task text that contains the priority marker", () => {
    const doc = new PRDDocument();
    doc.addTask("CORE", "show pr:High badge");

    expect(importPRD(exportPRD(doc)).getTask("CORE-001")?.text).toBe("show pr:High badge");
  });

  test("uses taxonomy names instead of the pasted names", () => {
    const doc = importPRD("pn: X\npd:\nts:\np:\n  CORE Whatever next:1\n");
    expect(doc.listCategories()[0]?.name).toBe("Core");
  });

  test("derives the sequence when next: is absent", () => {
    const doc = importPRD("pn: X\npd:\nts:\np:\n  CORE Core\n    t: CORE-002 share lists pr:medium\n");

    expect(doc.getTask("CORE-002")?.priority).toBe(Priority.Medium);
    expect(doc.addTask("CORE", "next one").id).toBe("CORE-003");
  });

  test("rejects text without pn:", () => {
    expect(() => importPRD("pd: A todo app\nts:\np:\n")).toThrow(ParseError);
    expect(() => importPRD("pd: A todo app\nts:\np:\n")).toThrow('Missing required key "pn:"');
  });

  test("rejects text without p:", () => {
    expect(() => importPRD("pn: X\npd:\nts:\n")).toThrow('Missing required key "p:"');
  });

  test("reports the line of an unknown category", () => {
    const error = catchParseError(() => importPRD("pn: X\npd: Y\nts:\np:\n  XYZ Misc\n"));

    expect(error.line).toBe(5);
    expect(error.message).toBe('Line 5: Unknown category code "XYZ"');
  });

  test("rejects a task outside its category", () => {
    expect(() =>
      importPRD("pn: X\npd:\nts:\np:\n  CORE Core\n    t: SEC-001 login pr:High\n")
    ).toThrow("Line 6: Task SEC-001 does not belong to category CORE");
  });

  test("rejects an unknown priority", () => {
    expect(() =>
      importPRD("pn: X\npd:\nts:\np:\n  CORE Core\n    t: CORE-001 add tasks pr:Low\n")
    ).toThrow('Line 6: Unknown priority "Low"');
  });

  test("rejects duplicate task ids", () => {
    expect(() =>
      importPRD(
        "pn: X\npd:\nts:\np:\n  CORE Core\n    t: CORE-001 a pr:High\n    t: CORE-001 b pr:High\n"
      )
    ).toThrow('Duplicate task id "CORE-001"');
  });

  test("rejects a task before any category", () => {
    expect(() => importPRD("pn: X\npd:\nts:\np:\n    t: CORE-001 a pr:High\n")).toThrow(
      "Line 5: Task listed before any category"
    );
  });

  test("rejects header keys after p:", () => {
    expect(() => importPRD("pn: X\npd:\np:\nts: python\n")).toThrow(
      'Line 4: Key "ts:" must come before "p:"'
    );
  });

  test("rejects stray lines", () => {
    expect(() => importPRD("hello\npn: X\npd:\nts:\np:\n")).toThrow("Line 1: Unexpected line: hello");
  });
});

describe("importPRDJson", () => {
  test("rejects invalid JSON", () => {
    expect(() => importPRD("{ nope")).toThrow("Invalid JSON");
  });

  test("rejects JSON of the wrong shape", () => {
    expect(() => importPRDJson(JSON.stringify({ pn: "X", pd: "", ts: [] }))).toThrow(
      "Invalid PRD JSON: p: Required"
    );
  });

  test("rejects unknown category codes", () => {
    expect(() =>
      importPRDJson(JSON.stringify({ pn: "X", pd: "", ts: [], p: { MISC: { t: [] } } }))
    ).toThrow('Unknown category code "MISC"');
  });
});
