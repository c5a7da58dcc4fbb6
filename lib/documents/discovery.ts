/**
 * File discovery for proposal bundles.
 *
 * A bundle is a directory holding the main proposal plus any supporting
 * documents (budget spreadsheets, team bios, ...), possibly in sub-folders.
 */

import { readdir, stat } from "node:fs/promises";
import path from "node:path";
import { DocumentError } from "../grading/errors";
import { documentFormat } from "./processor";

/** Main-proposal extensions in preference order. */
const MAIN_PROPOSAL_EXTENSIONS = ["docx", "pdf", "md", "txt"];

/** Name patterns tried in order for each extension. */
const MAIN_PROPOSAL_PATTERNS: ReadonlyArray<(stem: string) => boolean> = [
  (stem) => stem === "main_proposal",
  (stem) => stem.includes("proposal"),
  (stem) => stem.includes("main"),
  (stem) => stem.includes("submission"),
  () => true,
];

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/** Every file under `dir`, as sorted relative paths. */
export async function listFiles(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { recursive: true });
  const files: string[] = [];
  for (const entry of entries) {
    if ((await stat(path.join(dir, entry))).isFile()) files.push(entry);
  }
  return files.sort();
}

/**
 * Locate the main proposal: docx, then pdf, markdown and text; within an
 * extension `main_proposal.*`, then `*proposal*`, `*main*`, `*submission*`,
 * then any file. Returns null when nothing matches.
 */
export async function findMainProposal(bundleDir: string): Promise<string | null> {
  if (!(await isDirectory(bundleDir))) {
    console.error(`[discovery] Proposal directory not found: ${bundleDir}`);
    return null;
  }

  const files = await listFiles(bundleDir);
  for (const extension of MAIN_PROPOSAL_EXTENSIONS) {
    const candidates = files.filter((f) => path.extname(f).toLowerCase() === `.${extension}`);
    for (const matches of MAIN_PROPOSAL_PATTERNS) {
      const found = candidates.find((f) =>
        matches(path.basename(f, path.extname(f)).toLowerCase())
      );
      if (found) {
        console.log(`[discovery] Found main proposal: ${found}`);
        return path.join(bundleDir, found);
      }
    }
  }

  console.error(`[discovery] No main proposal found in ${bundleDir}`);
  return null;
}

/**
 * Every readable document under `dir` except `exclude` (usually the main
 * proposal). A missing directory yields an empty list.
 */
export async function findSupportingDocs(dir: string, exclude: string[] = []): Promise<string[]> {
  if (!(await isDirectory(dir))) {
    console.warn(`[discovery] Supporting docs directory not found: ${dir}`);
    return [];
  }

  const excluded = new Set(exclude.map((p) => path.resolve(p)));
  const files = (await listFiles(dir))
    .map((f) => path.join(dir, f))
    .filter((f) => documentFormat(f) !== null && !excluded.has(path.resolve(f)));

  console.log(`[discovery] Found ${files.length} supporting document(s)`);
  return files;
}

/** Required file names missing from the bundle root. */
export async function checkRequiredFiles(
  bundleDir: string,
  requiredFiles: readonly string[]
): Promise<string[]> {
  const missing: string[] = [];
  for (const file of requiredFiles) {
    try {
      await stat(path.join(bundleDir, file));
    } catch {
      missing.push(file);
    }
  }
  return missing;
}

export async function assertRequiredFiles(
  bundleDir: string,
  requiredFiles: readonly string[]
): Promise<void> {
  const missing = await checkRequiredFiles(bundleDir, requiredFiles);
  if (missing.length > 0) {
    throw new DocumentError(`Missing required files: ${missing.join(", ")}`, bundleDir);
  }
}
