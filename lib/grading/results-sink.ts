/**
 * Incremental CSV results sink.
 *
 * One row is appended per unit as soon as the scheduler finishes it. The
 * summary block is appended once aggregation is done.
 */

import { appendFile, mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import * as XLSX from "xlsx";
import type { AggregateResult, UnitResult } from "./types";

export const RESULTS_CSV_HEADER = [
  "section",
  "category",
  "sub_category",
  "score",
  "weight",
  "weighted_score",
  "evidence",
  "reasoning",
  "improvements",
] as const;

type CsvCell = string | number | null;

function formatCell(value: CsvCell): string {
  if (value === null) return "";
  return typeof value === "number" ? String(value) : value;
}

/** One CSV line (no trailing newline), quoted where needed. */
export function toCsvLine(cells: readonly CsvCell[]): string {
  const sheet = XLSX.utils.aoa_to_sheet([cells.map(formatCell)]);
  return XLSX.utils.sheet_to_csv(sheet).replace(/\n$/, "");
}

export function resultRow(result: UnitResult): CsvCell[] {
  const { unit, score } = result;
  return [
    unit.type,
    unit.category,
    unit.subCategory,
    score,
    unit.weight,
    score === null ? null : score * unit.weight,
    result.evidence,
    result.reasoning,
    result.improvements,
  ];
}

/**
 * Rows of the trailing summary block: a blank separator, one row per
 * section, then the overall row.
 */
export function summaryRows(aggregate: AggregateResult): CsvCell[][] {
  const rows: CsvCell[][] = [[]];
  for (const section of aggregate.sections) {
    rows.push([
      `SECTION: ${section.sectionName}`,
      "",
      "",
      section.score,
      section.typeWeight,
      section.score * section.typeWeight,
      "",
      `${section.scoredUnits} scored, ${section.failedUnits} failed`,
      "",
    ]);
  }
  rows.push(["OVERALL", "", "", aggregate.overall, "", "", "", aggregate.label, ""]);
  return rows;
}

export class CsvResultsSink {
  private pending: Promise<void> = Promise.resolve();

  constructor(readonly filePath: string) {}

  /** Create (or truncate) the file and write the header. */
  async open(): Promise<void> {
    await mkdir(path.dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, `${toCsvLine(RESULTS_CSV_HEADER)}\n`, "utf-8");
  }

  append(result: UnitResult): Promise<void> {
    return this.write([resultRow(result)]);
  }

  appendSummary(aggregate: AggregateResult): Promise<void> {
    return this.write(summaryRows(aggregate));
  }

  /**
   * Appends run one after another so rows from one batch never interleave.
   * A failed append is reported to its own caller only.
   */
  private write(rows: CsvCell[][]): Promise<void> {
    const text = rows.map((row) => `${toCsvLine(row)}\n`).join("");
    const append = () => appendFile(this.filePath, text, "utf-8");
    this.pending = this.pending.then(append, append);
    return this.pending;
  }
}
