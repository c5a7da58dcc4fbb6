/**
 * Bundle compliance: submission limits checked before any scoring.
 *
 *   pages        main proposal page count (PDF only) ≤ proposalPageLimit
 *   budget       budget total ≤ maxBudget
 *   subcontract  subcontract total / budget total ≤ maxSubcontractRatio
 *
 * Totals come from fixed cells of the first sheet of the budget workbook.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import * as XLSX from "xlsx";
import type { ComplianceConfig } from "../grading/config";
import { ComplianceError, DocumentError, errorMessage } from "../grading/errors";
import type { ProcessedDocument } from "../grading/types";
import { readWorkbook } from "./tables";

export interface BudgetTotals {
  total: number;
  subcontractTotal: number;
}

export interface ComplianceReport extends BudgetTotals {
  /** Null when the proposal format has no pages */
  pageCount: number | null;
  /** Null when either total is zero */
  subcontractRatio: number | null;
}

function cellNumber(sheet: XLSX.WorkSheet, address: string, filePath: string): number {
  const value: unknown = sheet[address]?.v;
  if (value === undefined || value === null || value === "") return 0;

  const parsed = typeof value === "number" ? value : Number(String(value).replace(/[$,\s]/g, ""));
  if (!Number.isFinite(parsed)) {
    throw new DocumentError(`Budget cell ${address} is not a number: "${String(value)}"`, filePath);
  }
  return parsed;
}

/**
 * Read the budget and subcontract totals. Empty cells count as 0.
 */
export async function readBudgetTotals(
  filePath: string,
  config: Pick<ComplianceConfig, "budgetTotalCell" | "subcontractTotalCell">
): Promise<BudgetTotals> {
  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new DocumentError(`Cannot read budget ${filePath}: ${errorMessage(error)}`, filePath);
  }

  const extension = path.extname(filePath).toLowerCase().replace(".", "");
  const workbook = readWorkbook(buffer, extension);
  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  if (!sheet) {
    throw new DocumentError(`No sheets found in ${filePath}`, filePath);
  }

  return {
    total: cellNumber(sheet, config.budgetTotalCell, filePath),
    subcontractTotal: cellNumber(sheet, config.subcontractTotalCell, filePath),
  };
}

/**
 * Check the bundle against its limits. Throws ComplianceError on the first
 * limit broken.
 */
export async function checkCompliance(
  bundleDir: string,
  proposal: ProcessedDocument,
  config: ComplianceConfig
): Promise<ComplianceReport> {
  const pageCount = proposal.pageCount ?? null;
  if (pageCount === null) {
    console.warn(`[compliance] ${proposal.fileName} has no page count; page limit not checked`);
  } else if (pageCount > config.proposalPageLimit) {
    throw new ComplianceError(
      `${proposal.fileName} has ${pageCount} pages; the limit is ${config.proposalPageLimit}`
    );
  }

  const budgetPath = path.join(bundleDir, config.budgetFile);
  const { total, subcontractTotal } = await readBudgetTotals(budgetPath, config);
  if (total > config.maxBudget) {
    throw new ComplianceError(`Budget total ${total} exceeds the limit of ${config.maxBudget}`);
  }

  const subcontractRatio = total !== 0 && subcontractTotal !== 0 ? subcontractTotal / total : null;
  if (subcontractRatio !== null && subcontractRatio > config.maxSubcontractRatio) {
    throw new ComplianceError(
      `Subcontract ratio ${subcontractRatio.toFixed(2)} exceeds ${config.maxSubcontractRatio}`
    );
  }

  console.log(
    `[compliance] ${proposal.fileName}: ${pageCount ?? "?"} page(s), budget ${total}, ` +
      `subcontract ${subcontractTotal}`
  );
  return { pageCount, total, subcontractTotal, subcontractRatio };
}
