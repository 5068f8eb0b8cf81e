/**
 * Backend label -> canonical smell category lookup table.
 *
 * The table is loaded once at startup and is read-only afterwards, so
 * concurrent requests share it without coordination.
 */

import * as fs from "fs";
import * as yaml from "js-yaml";
import { minimatch } from "minimatch";
import { ConfigurationError } from "../errors";
import { SMELL_CATEGORIES, SmellCategory, isSmellCategory } from "../analysis/types";

/**
 * Shape of the lookup table file.
 *
 * ```yaml
 * labels:
 *   LongMethod: [long-method, function-too-long]
 * patterns:
 *   LongMethod: ["*long*method*"]
 * ```
 */
export interface CategoryTableDefinition {
  labels?: Partial<Record<SmellCategory, string[]>>;
  patterns?: Partial<Record<SmellCategory, string[]>>;
}

interface PatternEntry {
  pattern: string;
  category: SmellCategory;
}

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase();
}

export class CategoryTable {
  private readonly exact: ReadonlyMap<string, SmellCategory>;
  private readonly patterns: readonly PatternEntry[];

  constructor(definition: CategoryTableDefinition, source = "<inline>") {
    const exact = new Map<string, SmellCategory>();

    // Canonical names always resolve to themselves
    for (const category of SMELL_CATEGORIES) {
      exact.set(normalizeLabel(category), category);
    }

    for (const [category, labels] of entriesOf(definition.labels, "labels", source)) {
      for (const label of labels) {
        const key = normalizeLabel(label);
        const existing = exact.get(key);
        if (existing && existing !== category) {
          throw new ConfigurationError(
            `Label "${label}" maps to both ${existing} and ${category}`,
            source
          );
        }
        exact.set(key, category);
      }
    }

    const patterns: PatternEntry[] = [];
    for (const [category, globs] of entriesOf(definition.patterns, "patterns", source)) {
      for (const pattern of globs) {
        patterns.push({ pattern: normalizeLabel(pattern), category });
      }
    }

    this.exact = exact;
    this.patterns = Object.freeze(patterns);
    Object.freeze(this);
  }

  /**
   * Map a backend label to its canonical category.
   * Exact labels win over patterns; patterns are tried in file order.
   * Labels the table does not know map to "Unknown".
   */
  resolve(label: string): SmellCategory {
    const key = normalizeLabel(label);
    const exact = this.exact.get(key);
    if (exact) {
      return exact;
    }
    for (const entry of this.patterns) {
      if (minimatch(key, entry.pattern, { nocase: true, dot: true })) {
        return entry.category;
      }
    }
    return "Unknown";
  }

  get labelCount(): number {
    return this.exact.size;
  }

  get patternCount(): number {
    return this.patterns.length;
  }
}

function entriesOf(
  section: Partial<Record<SmellCategory, string[]>> | undefined,
  name: string,
  source: string
): Array<[SmellCategory, string[]]> {
  if (section === undefined || section === null) {
    return [];
  }
  if (typeof section !== "object" || Array.isArray(section)) {
    throw new ConfigurationError(`"${name}" must be a mapping of category to list`, source);
  }

  const result: Array<[SmellCategory, string[]]> = [];
  for (const [category, values] of Object.entries(section)) {
    if (!isSmellCategory(category)) {
      throw new ConfigurationError(`Unknown category "${category}" in ${name}`, source);
    }
    if (!Array.isArray(values) || !values.every((v) => typeof v === "string" && v.trim() !== "")) {
      throw new ConfigurationError(`${name}.${category} must be a list of non-empty strings`, source);
    }
    result.push([category, values]);
  }
  return result;
}

/**
 * Parse a lookup table from YAML text.
 */
export function parseCategoryTable(yamlContent: string, source = "<string>"): CategoryTable {
  let parsed: unknown;
  try {
    parsed = yaml.load(yamlContent);
  } catch (err) {
    throw new ConfigurationError(
      `Failed to parse category table: ${err instanceof Error ? err.message : "unknown"}`,
      source
    );
  }

  if (parsed === undefined || parsed === null) {
    return new CategoryTable({}, source);
  }
  if (typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new ConfigurationError("Category table must be a mapping", source);
  }

  return new CategoryTable(parsed as CategoryTableDefinition, source);
}

/**
 * Load the lookup table from disk.
 */
export function loadCategoryTable(filePath: string): CategoryTable {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError("Category table not found", filePath);
  }
  return parseCategoryTable(fs.readFileSync(filePath, "utf-8"), filePath);
}
