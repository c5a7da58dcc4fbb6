/**
 * Tabular file reader (CSV, XLSX, XLS) built on SheetJS.
 *
 * Returns the first sheet as header-keyed records plus the header row, so
 * callers can check for required columns even when the table has no data.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import * as XLSX from "xlsx";
import { DocumentError, errorMessage } from "../grading/errors";

export interface TableData {
  columns: string[];
  records: Record<string, unknown>[];
}

export function readWorkbook(buffer: Buffer, extension: string): XLSX.WorkBook {
  if (extension === "csv") {
    return XLSX.read(buffer.toString("utf-8"), { type: "string" });
  }
  return XLSX.read(buffer, { type: "buffer" });
}

function headerName(cell: unknown): string {
  return typeof cell === "string" || typeof cell === "number" ? String(cell).trim() : "";
}

function isBlankRow(row: readonly unknown[]): boolean {
  return row.every((cell) => cell === "" || cell === null || cell === undefined);
}

/**
 * Header-keyed records from a sheet. Header names are trimmed, and the
 * trimmed names are the record keys; columns with an empty header are dropped.
 */
export function sheetToTable(sheet: XLSX.WorkSheet): TableData {
  const rows = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: "" });
  const [header = [], ...body] = rows;
  const keys = header.map(headerName);

  const records = body
    .filter((row) => !isBlankRow(row))
    .map((row) => {
      const record: Record<string, unknown> = {};
      keys.forEach((key, index) => {
        if (key) record[key] = row[index] ?? "";
      });
      return record;
    });

  return { columns: keys.filter(Boolean), records };
}

/**
 * Read the first sheet of a CSV/XLSX file.
 */
export async function readTable(filePath: string): Promise<TableData> {
  const extension = path.extname(filePath).toLowerCase().replace(".", "");
  if (!["csv", "xlsx", "xls"].includes(extension)) {
    throw new DocumentError(`Unsupported table format: ${extension || "(none)"}`, filePath);
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new DocumentError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath);
  }

  const workbook = readWorkbook(buffer, extension);
  const firstSheet = workbook.SheetNames[0];
  const sheet = firstSheet === undefined ? undefined : workbook.Sheets[firstSheet];
  if (!sheet) {
    throw new DocumentError(`No sheets found in ${filePath}`, filePath);
  }

  return sheetToTable(sheet);
}
