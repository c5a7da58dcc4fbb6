/**
 * Rubric builder: flat rubric rows to a weighted
 * Type → Category → SubCategory tree.
 *
 * Rows carry the Type and Category weights (0–100). Sub-categories of one
 * category split the category weight equally unless a row gives an explicit
 * "Sub-Category Weight". Every leaf gets a template code of the form
 * CATEGORY_SUBCATEGORY used to look up its scoring prompt.
 */

import { readTable } from "../documents/tables";
import { ParseError, ValidationError } from "./errors";
import type {
  CriteriaDescriptions,
  Rubric,
  RubricNode,
  RubricRow,
  ScoringLevels,
} from "./types";

// ---------------------------------------------------------------------------
// Column names
// ---------------------------------------------------------------------------

export const RUBRIC_COLUMNS = {
  type: "Type",
  typeWeight: "Type Weight",
  category: "Category",
  categoryWeight: "Category Weight",
  subCategory: "Sub-Category",
  subCategoryWeight: "Sub-Category Weight",
  unsatisfactory: "Unsatisfactory",
  marginal: "Marginal",
  satisfactory: "Satisfactory",
  superior: "Superior",
} as const;

const REQUIRED_RUBRIC_COLUMNS: readonly string[] = [
  RUBRIC_COLUMNS.type,
  RUBRIC_COLUMNS.typeWeight,
  RUBRIC_COLUMNS.category,
  RUBRIC_COLUMNS.categoryWeight,
  RUBRIC_COLUMNS.subCategory,
  RUBRIC_COLUMNS.unsatisfactory,
  RUBRIC_COLUMNS.marginal,
  RUBRIC_COLUMNS.satisfactory,
  RUBRIC_COLUMNS.superior,
];

const REQUIRED_CRITERIA_COLUMNS: readonly string[] = [
  "Type",
  "Category",
  "Sub-Category",
  "Definition",
];

export const DEFAULT_RUBRIC_METADATA = {
  version: "1.0",
  description: "Proposal evaluation rubric",
  totalWeight: 100,
};

// ---------------------------------------------------------------------------
// Record parsing
// ---------------------------------------------------------------------------

type TableRecord = Record<string, unknown>;

function columnsOf(records: TableRecord[]): string[] {
  const seen = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) seen.add(key);
  }
  return [...seen];
}

function assertColumns(
  table: string,
  columns: readonly string[],
  required: readonly string[]
): void {
  const missing = required.filter((c) => !columns.includes(c));
  if (missing.length > 0) {
    throw new ParseError(
      `${table} is missing required column(s): ${missing.join(", ")}`
    );
  }
}

function cellText(value: unknown): string {
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

function parseWeight(value: unknown, column: string, row: number): number {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  const text = cellText(value);
  const parsed = text === "" ? NaN : Number(text);
  if (!Number.isFinite(parsed)) {
    throw new ParseError(`"${column}" is not a number: "${text}"`, row);
  }
  return parsed;
}

/**
 * Convert raw table records (CSV/XLSX rows keyed by header) into RubricRows.
 *
 * Missing required columns fail before any row is read; a non-numeric weight
 * fails with the offending 1-based row number.
 */
export function parseRubricRecords(
  records: TableRecord[],
  columns: readonly string[] = columnsOf(records)
): RubricRow[] {
  assertColumns("Rubric table", columns, REQUIRED_RUBRIC_COLUMNS);

  return records.map((record, index) => {
    const row = index + 1;
    const overrideCell = cellText(record[RUBRIC_COLUMNS.subCategoryWeight]);

    return {
      type: cellText(record[RUBRIC_COLUMNS.type]),
      typeWeight: parseWeight(record[RUBRIC_COLUMNS.typeWeight], RUBRIC_COLUMNS.typeWeight, row),
      category: cellText(record[RUBRIC_COLUMNS.category]),
      categoryWeight: parseWeight(
        record[RUBRIC_COLUMNS.categoryWeight],
        RUBRIC_COLUMNS.categoryWeight,
        row
      ),
      subCategory: cellText(record[RUBRIC_COLUMNS.subCategory]),
      subCategoryWeight:
        overrideCell === ""
          ? undefined
          : parseWeight(overrideCell, RUBRIC_COLUMNS.subCategoryWeight, row),
      unsatisfactory: cellText(record[RUBRIC_COLUMNS.unsatisfactory]),
      marginal: cellText(record[RUBRIC_COLUMNS.marginal]),
      satisfactory: cellText(record[RUBRIC_COLUMNS.satisfactory]),
      superior: cellText(record[RUBRIC_COLUMNS.superior]),
    };
  });
}

/**
 * Key used by the criteria-description table. JSON encoding keeps names that
 * contain separators distinct.
 */
export function criteriaKey(type: string, category: string, subCategory: string): string {
  return JSON.stringify([type, category, subCategory]);
}

export function parseCriteriaRecords(
  records: TableRecord[],
  columns: readonly string[] = columnsOf(records)
): CriteriaDescriptions {
  assertColumns("Criteria table", columns, REQUIRED_CRITERIA_COLUMNS);

  const descriptions: CriteriaDescriptions = new Map();
  for (const record of records) {
    descriptions.set(
      criteriaKey(
        cellText(record["Type"]),
        cellText(record["Category"]),
        cellText(record["Sub-Category"])
      ),
      cellText(record["Definition"])
    );
  }
  return descriptions;
}

// ---------------------------------------------------------------------------
// Tree construction
// ---------------------------------------------------------------------------

/**
 * Build the weighted rubric tree.
 *
 * Pass 1 counts distinct sub-categories per (type, category). Pass 2 creates
 * nodes in row order. When rows disagree on a category's weight the last row
 * wins; a repeated (type, category, subCategory) row replaces the earlier leaf.
 */
export function buildRubric(
  rows: readonly RubricRow[],
  descriptions: CriteriaDescriptions = new Map()
): Rubric {
  const subCategoryNames = new Map<string, Set<string>>();
  for (const row of rows) {
    const key = JSON.stringify([row.type, row.category]);
    const names = subCategoryNames.get(key) ?? new Set<string>();
    names.add(row.subCategory);
    subCategoryNames.set(key, names);
  }

  const types: RubricNode[] = [];
  const typeNodes = new Map<string, RubricNode>();
  const categoryNodes = new Map<string, RubricNode>();

  for (const row of rows) {
    let typeNode = typeNodes.get(row.type);
    if (!typeNode) {
      typeNode = { kind: "Type", name: row.type, weight: row.typeWeight, children: [] };
      typeNodes.set(row.type, typeNode);
      types.push(typeNode);
    }

    const categoryKey = JSON.stringify([row.type, row.category]);
    let categoryNode = categoryNodes.get(categoryKey);
    if (!categoryNode) {
      categoryNode = {
        kind: "Category",
        name: row.category,
        weight: row.categoryWeight,
        children: [],
      };
      categoryNodes.set(categoryKey, categoryNode);
      typeNode.children.push(categoryNode);
    } else {
      categoryNode.weight = row.categoryWeight;
    }

    const count = subCategoryNames.get(categoryKey)?.size ?? 0;
    const splitWeight = count > 0 ? row.categoryWeight / count : row.categoryWeight;

    const leaf: RubricNode = {
      kind: "SubCategory",
      name: row.subCategory,
      weight: row.subCategoryWeight ?? splitWeight,
      children: [],
      description: descriptions.get(criteriaKey(row.type, row.category, row.subCategory)) ?? "",
      scoringLevels: {
        unsatisfactory: row.unsatisfactory,
        marginal: row.marginal,
        satisfactory: row.satisfactory,
        superior: row.superior,
      },
    };

    const existing = categoryNode.children.findIndex((c) => c.name === row.subCategory);
    if (existing === -1) {
      categoryNode.children.push(leaf);
    } else {
      categoryNode.children[existing] = leaf;
    }
  }

  return { metadata: { ...DEFAULT_RUBRIC_METADATA }, types };
}

/**
 * Read the rubric table (and optional criteria-description table) from
 * CSV/XLSX files and build the tree.
 */
export async function loadRubricFromFiles(
  rubricPath: string,
  criteriaPath?: string
): Promise<Rubric> {
  const rubricTable = await readTable(rubricPath);
  const rows = parseRubricRecords(rubricTable.records, rubricTable.columns);

  let descriptions: CriteriaDescriptions = new Map();
  if (criteriaPath) {
    const criteriaTable = await readTable(criteriaPath);
    descriptions = parseCriteriaRecords(criteriaTable.records, criteriaTable.columns);
  }

  return buildRubric(rows, descriptions);
}

// ---------------------------------------------------------------------------
// Codes & per-code templates
// ---------------------------------------------------------------------------

function codePart(name: string): string {
  return name.toUpperCase().replace(/[ /]/g, "_");
}

/**
 * Template code for a leaf: "Risk" / "Schedule" → "RISK_SCHEDULE".
 */
export function rubricCode(category: string, subCategory: string): string {
  return `${codePart(category)}_${codePart(subCategory)}`;
}

export interface RubricLeafRef {
  type: RubricNode;
  category: RubricNode;
  leaf: RubricNode;
}

/** Walk every leaf in source order. */
export function rubricLeaves(rubric: Rubric): RubricLeafRef[] {
  const refs: RubricLeafRef[] = [];
  for (const type of rubric.types) {
    for (const category of type.children) {
      for (const leaf of category.children) {
        refs.push({ type, category, leaf });
      }
    }
  }
  return refs;
}

export function rubricCodes(rubric: Rubric): string[] {
  return rubricLeaves(rubric).map(({ category, leaf }) => rubricCode(category.name, leaf.name));
}

/**
 * Codes carried by more than one leaf. Codes leave out the Type, so the same
 * category and sub-category under two types collide.
 */
export function duplicateRubricCodes(rubric: Rubric): string[] {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const code of rubricCodes(rubric)) {
    if (seen.has(code)) duplicates.add(code);
    seen.add(code);
  }
  return [...duplicates];
}

const EMPTY_LEVELS: ScoringLevels = {
  unsatisfactory: "",
  marginal: "",
  satisfactory: "",
  superior: "",
};

/**
 * Render a markdown scoring template for every leaf, keyed by code. Each
 * template has a `{section_text}` slot for the proposal text. Throws
 * ValidationError when two leaves share a code.
 */
export function buildScoringTemplates(rubric: Rubric): Record<string, string> {
  const duplicates = duplicateRubricCodes(rubric);
  if (duplicates.length > 0) {
    throw new ValidationError(
      `Template codes shared by more than one criterion: ${duplicates.join(", ")}`
    );
  }

  const templates: Record<string, string> = {};

  for (const { category, leaf } of rubricLeaves(rubric)) {
    const levels = leaf.scoringLevels ?? EMPTY_LEVELS;
    templates[rubricCode(category.name, leaf.name)] = `# ${category.name} - ${leaf.name} Evaluation

**Weight**: ${leaf.weight.toFixed(2)}%

**Description**: ${leaf.description ?? ""}

**Scoring Criteria (1-4 scale):**

**1 (Unsatisfactory)**: ${levels.unsatisfactory}

**2 (Marginal)**: ${levels.marginal}

**3 (Satisfactory)**: ${levels.satisfactory}

**4 (Superior)**: ${levels.superior}

**Instructions**: Evaluate the proposal's ${leaf.name.toLowerCase()} based on the above criteria.

**Proposal Text**:
{section_text}

**Evaluation**:
Please provide a JSON response with:
- "score": score from 1 to 4, in 0.5 increments only
- "evidence": specific evidence from the proposal text
- "reasoning": brief explanation of the score based on the scoring criteria
- "improvements": what the proposal would need to score higher

**Response**:`;
  }

  return templates;
}

// ---------------------------------------------------------------------------
// Per-type split
// ---------------------------------------------------------------------------

export interface RubricDimension {
  name: string;
  code: string;
  /** Fraction 0–1 */
  weight: number;
  description: string;
  scoringCriteria: ScoringLevels;
}

export interface TypeRubric {
  rubricId: string;
  /** Fraction 0–1 */
  weight: number;
  dimensions: RubricDimension[];
}

/**
 * One summary rubric per Type, keyed by the lower-cased type name.
 */
export function splitRubricByType(rubric: Rubric): Record<string, TypeRubric> {
  const split: Record<string, TypeRubric> = {};

  for (const type of rubric.types) {
    const dimensions: RubricDimension[] = [];
    for (const category of type.children) {
      for (const leaf of category.children) {
        dimensions.push({
          name: `${category.name} - ${leaf.name}`,
          code: rubricCode(category.name, leaf.name),
          weight: leaf.weight / 100,
          description: leaf.description ?? "",
          scoringCriteria: leaf.scoringLevels ?? EMPTY_LEVELS,
        });
      }
    }

    split[type.name.toLowerCase()] = {
      rubricId: `${type.name.toUpperCase()}_EVALUATION`,
      weight: type.weight / 100,
      dimensions,
    };
  }

  return split;
}
