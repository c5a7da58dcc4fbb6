/**
 * Document processor. Extracts text (and heading structure where the
 * format has one) from proposal bundle files.
 *
 * Supported: .txt, .md, .csv, .xlsx/.xls, .docx, .pdf. A file that yields no
 * text is an input error. PDFs come back one section per page.
 */

import { readFile } from "node:fs/promises";
import path from "node:path";
import mammoth from "mammoth";
import PDFParser from "pdf2json";
import * as XLSX from "xlsx";
import { z } from "zod";
import { DocumentError, errorMessage } from "../grading/errors";
import type { DocumentFormat, DocumentSection, ProcessedDocument } from "../grading/types";
import { readWorkbook } from "./tables";

const FORMAT_BY_EXTENSION: Record<string, DocumentFormat> = {
  txt: "text",
  md: "markdown",
  markdown: "markdown",
  csv: "csv",
  xlsx: "xlsx",
  xls: "xlsx",
  docx: "docx",
  pdf: "pdf",
};

export const SUPPORTED_EXTENSIONS = Object.keys(FORMAT_BY_EXTENSION);

export function documentFormat(filePath: string): DocumentFormat | null {
  const extension = path.extname(filePath).toLowerCase().replace(".", "");
  return FORMAT_BY_EXTENSION[extension] ?? null;
}

// ---------------------------------------------------------------------------
// Section splitting
// ---------------------------------------------------------------------------

/**
 * Split markdown on ATX headings. Text before the first heading becomes an
 * untitled level-0 section.
 */
export function splitMarkdownSections(text: string): DocumentSection[] {
  const sections: DocumentSection[] = [];
  let current: DocumentSection = { title: "", content: "", level: 0 };

  const flush = () => {
    const content = current.content.trim();
    if (current.title || content) {
      sections.push({ ...current, content });
    }
  };

  for (const line of text.split("\n")) {
    const heading = line.match(/^(#{1,6})\s+(.+?)\s*#*\s*$/);
    if (heading) {
      flush();
      current = { title: heading[2], content: "", level: heading[1].length };
    } else {
      current.content += `${line}\n`;
    }
  }
  flush();

  return sections;
}

// ---------------------------------------------------------------------------
// Per-format extraction
// ---------------------------------------------------------------------------

function spreadsheetText(buffer: Buffer, extension: string): DocumentSection[] {
  const workbook = readWorkbook(buffer, extension);
  return workbook.SheetNames.flatMap((name) => {
    const sheet = workbook.Sheets[name];
    if (!sheet) return [];
    const content = XLSX.utils.sheet_to_csv(sheet).trim();
    return content ? [{ title: name, content, level: 1 }] : [];
  });
}

async function docxText(buffer: Buffer): Promise<string> {
  const result = await mammoth.extractRawText({ buffer });
  return result.value;
}

const PdfDataSchema = z.object({
  Pages: z.array(
    z.object({
      Texts: z
        .array(z.object({ R: z.array(z.object({ T: z.string() })).default([]) }))
        .default([]),
    })
  ),
});

function decodePdfRun(text: string): string {
  try {
    return decodeURIComponent(text);
  } catch {
    return text;
  }
}

function pdfErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "object" && error !== null && "parserError" in error) {
    return errorMessage(error.parserError);
  }
  return "PDF parsing failed";
}

/** Text of each page, runs joined by spaces. */
function pdfPages(buffer: Buffer): Promise<string[]> {
  return new Promise((resolve, reject) => {
    const parser = new PDFParser();

    parser.on("pdfParser_dataReady", (data: unknown) => {
      const parsed = PdfDataSchema.safeParse(data);
      if (!parsed.success) {
        reject(new Error("Unexpected PDF parser output"));
        return;
      }
      resolve(
        parsed.data.Pages.map((page) =>
          page.Texts.flatMap((text) => text.R.map((run) => decodePdfRun(run.T)))
            .join(" ")
            .trim()
        )
      );
    });
    parser.on("pdfParser_dataError", (error: unknown) => {
      reject(new Error(pdfErrorMessage(error)));
    });

    parser.parseBuffer(buffer);
  });
}

interface Extraction {
  sections: DocumentSection[];
  pageCount?: number;
}

async function extractSections(
  format: DocumentFormat,
  buffer: Buffer,
  filePath: string
): Promise<Extraction> {
  const fileName = path.basename(filePath);
  switch (format) {
    case "markdown":
      return { sections: splitMarkdownSections(buffer.toString("utf-8")) };
    case "csv":
    case "xlsx":
      return {
        sections: spreadsheetText(buffer, path.extname(filePath).toLowerCase().replace(".", "")),
      };
    case "docx":
      return { sections: [{ title: fileName, content: (await docxText(buffer)).trim(), level: 1 }] };
    case "pdf": {
      const pages = await pdfPages(buffer);
      return {
        sections: pages.flatMap((content, index) =>
          content ? [{ title: `Page ${index + 1}`, content, level: 1 }] : []
        ),
        pageCount: pages.length,
      };
    }
    case "text":
      return { sections: [{ title: fileName, content: buffer.toString("utf-8").trim(), level: 1 }] };
  }
}

/**
 * Extract text and sections from one file.
 */
export async function processDocument(filePath: string): Promise<ProcessedDocument> {
  const fileName = path.basename(filePath);
  const format = documentFormat(filePath);
  if (!format) {
    throw new DocumentError(
      `Unsupported document type: ${fileName} (expected ${SUPPORTED_EXTENSIONS.join(", ")})`,
      filePath
    );
  }

  let buffer: Buffer;
  try {
    buffer = await readFile(filePath);
  } catch (error) {
    throw new DocumentError(`Cannot read ${filePath}: ${errorMessage(error)}`, filePath);
  }

  let extraction: Extraction;
  try {
    extraction = await extractSections(format, buffer, filePath);
  } catch (error) {
    throw new DocumentError(`Failed to parse ${fileName}: ${errorMessage(error)}`, filePath);
  }

  const { sections, pageCount } = extraction;
  const fullText =
    format === "markdown"
      ? buffer.toString("utf-8").trim()
      : sections.map((s) => s.content).filter(Boolean).join("\n\n");

  if (!fullText) {
    throw new DocumentError(`No text could be extracted from ${fileName}`, filePath);
  }

  console.log(`[documents] Extracted ${fullText.length} characters from ${fileName}`);
  return { fullText, sections, format, fileName, pageCount };
}

/**
 * Join supporting documents into one block, each under a `--- name ---`
 * marker.
 */
export function formatSupportingDocs(docs: readonly ProcessedDocument[]): string {
  return docs.map((doc) => `--- ${doc.fileName} ---\n${doc.fullText}`).join("\n\n");
}

/** Main proposal followed by every supporting document. */
export function combineDocumentText(
  proposalText: string,
  supportingDocs: readonly ProcessedDocument[]
): string {
  if (supportingDocs.length === 0) return proposalText;
  return `${proposalText}\n\n${formatSupportingDocs(supportingDocs)}`;
}
