/**
 * Category taxonomy for PRD Chat
 *
 * The taxonomy is the fixed, ordered set of categories a task can land in.
 * It is read from `data/taxonomy.json` once, validated with Zod, and then
 * used in two ways:
 * - classification walks the categories in file order, first match wins
 * - export lists categories by their `order` field
 */

import { readFileSync } from "node:fs";
import { TaxonomySchema } from "./schemas.ts";
import { ValidationError } from "./errors.ts";

/**
 * One category of the taxonomy
 */
export interface TaxonomyEntry {
  /** Short stable code, used as task id prefix */
  readonly code: string;
  /** Display name */
  readonly name: string;
  /** Position in exports (lower = first) */
  readonly order: number;
  /** Lowercase words or phrases that route a feature here */
  readonly keywords: readonly string[];
}

/**
 * Result of classifying a feature description
 */
export interface Classification {
  code: string;
  /** False when no rule matched and the default category was used */
  matched: boolean;
  /** The keyword that decided the match */
  keyword?: string;
}

const TAXONOMY_URL = new URL("../../data/taxonomy.json", import.meta.url);

function loadTaxonomy(): { entries: TaxonomyEntry[]; defaultCode: string } {
  let data: unknown;
  try {
    data = JSON.parse(readFileSync(TAXONOMY_URL, "utf-8"));
  } catch (error) {
    throw new ValidationError(TAXONOMY_URL.pathname, error, "Failed to read taxonomy.json");
  }

  const result = TaxonomySchema.safeParse(data);
  if (!result.success) {
    throw new ValidationError(TAXONOMY_URL.pathname, result.error.issues);
  }

  return {
    entries: result.data.categories.map((c) => ({
      code: c.code,
      name: c.name,
      order: c.order,
      keywords: c.keywords.map((k) => normalizeWords(k)),
    })),
    defaultCode: result.data.defaultCategory,
  };
}

const loaded = loadTaxonomy();

/**
 * Categories in rule order (the order of the taxonomy file)
 */
export const TAXONOMY: readonly TaxonomyEntry[] = loaded.entries;

/**
 * Category that receives features no rule matched
 */
export const DEFAULT_CATEGORY_CODE: string = loaded.defaultCode;

const byCode = new Map(TAXONOMY.map((entry) => [entry.code, entry]));

/**
 * Lowercases text and reduces it to single-space separated words
 */
function normalizeWords(text: string): string {
  return (text.toLowerCase().match(/[a-z0-9]+/g) ?? []).join(" ");
}

/**
 * Finds a category by its code
 */
export function findCategory(code: string): TaxonomyEntry | undefined {
  return byCode.get(code);
}

/**
 * Checks whether a code belongs to the taxonomy
 */
export function isCategoryCode(code: string): boolean {
  return byCode.has(code);
}

/**
 * Sort key for exports
 */
export function categoryOrder(code: string): number {
  return byCode.get(code)?.order ?? Number.MAX_SAFE_INTEGER;
}

/**
 * Classifies a feature description by ordered keyword rules
 *
 * @remarks
 * Keywords match on whole words, so "api" matches "REST API" but not
 * "rapid". The first category with a matching keyword wins.
 *
 * @example
 * ```ts
 * classifyFeature("Login with a password"); // { code: "SEC", matched: true, keyword: "login" }
 * classifyFeature("users can add tasks");   // { code: "CORE", matched: false }
 * ```
 */
export function classifyFeature(text: string): Classification {
  const haystack = ` ${normalizeWords(text)} `;

  for (const entry of TAXONOMY) {
    for (const keyword of entry.keywords) {
      if (keyword && haystack.includes(` ${keyword} `)) {
        return { code: entry.code, matched: true, keyword };
      }
    }
  }

  return { code: DEFAULT_CATEGORY_CODE, matched: false };
}
