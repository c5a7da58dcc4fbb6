/**
 * Prompt templates for per-criterion scoring.
 *
 * A unit is scored either with its per-code template (loaded from the prompts
 * directory, `{section_text}` filled with the document context) or, when no
 * template exists for its code, with the generic prompt built here.
 */

import { mkdir, readdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { unitKey } from "./criteria-flattener";
import { ValidationError } from "./errors";
import type { ScoringUnit } from "./types";

// ---------------------------------------------------------------------------
// Template rendering
// ---------------------------------------------------------------------------

/**
 * Replace `{name}` placeholders with `variables[name]`. Placeholders without a
 * matching variable are left as they are.
 */
export function renderTemplate(template: string, variables: Record<string, string>): string {
  return template.replace(/\{(\w+)\}/g, (placeholder, name: string) =>
    Object.prototype.hasOwnProperty.call(variables, name) ? variables[name] : placeholder
  );
}

// ---------------------------------------------------------------------------
// Generic scoring prompt
// ---------------------------------------------------------------------------

/**
 * Build the prompt that asks the oracle to score one rubric leaf against the
 * full document context.
 */
export function buildScoringPrompt(unit: ScoringUnit, documentText: string): string {
  const levels = unit.scoringLevels;

  return `You are an expert proposal reviewer scoring one evaluation criterion.

Criterion: ${unit.type} / ${unit.category} / ${unit.subCategory}
Weight within its section: ${(unit.weight * 100).toFixed(2)}%

Description:
${unit.description || "(no description provided)"}

Scoring levels (1-4 scale):
1 (Unsatisfactory): ${levels.unsatisfactory}
2 (Marginal): ${levels.marginal}
3 (Satisfactory): ${levels.satisfactory}
4 (Superior): ${levels.superior}

PROPOSAL DOCUMENTS:
${documentText}

Respond with ONE JSON object and nothing else, in this exact shape:
{"score": <1-4 in 0.5 increments>, "evidence": "<quotes or facts from the documents>", "reasoning": "<why this score, referencing the levels above>", "improvements": "<what would raise the score>"}`;
}

export type PromptRenderer = (unit: ScoringUnit, documentText: string) => string;

/**
 * Prompt renderer that prefers the per-code template and falls back to
 * buildScoringPrompt.
 */
export function createPromptRenderer(templates: Record<string, string> = {}): PromptRenderer {
  return (unit, documentText) => {
    const template = templates[unit.code];
    if (template === undefined) return buildScoringPrompt(unit, documentText);
    return renderTemplate(template, { section_text: documentText });
  };
}

/**
 * Throws ValidationError when a template's code belongs to more than one
 * unit, since the template would score both against the same levels.
 */
export function assertTemplatesUnambiguous(
  templates: Record<string, string>,
  units: readonly ScoringUnit[]
): void {
  const owners = new Map<string, string[]>();
  for (const unit of units) {
    if (templates[unit.code] === undefined) continue;
    owners.set(unit.code, [...(owners.get(unit.code) ?? []), unitKey(unit)]);
  }

  for (const [code, keys] of owners) {
    if (keys.length > 1) {
      throw new ValidationError(`Template ${code} matches more than one criterion: ${keys.join(", ")}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Template files
// ---------------------------------------------------------------------------

/**
 * Load `<code>.md` files from a directory; the upper-cased file stem is the
 * code. A missing directory yields no templates.
 */
export async function loadPromptTemplates(dir: string): Promise<Record<string, string>> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      console.warn(`[prompts] Template directory not found: ${dir}`);
      return {};
    }
    throw error;
  }

  const templates: Record<string, string> = {};
  for (const entry of entries.filter((e) => e.toLowerCase().endsWith(".md")).sort()) {
    const code = path.basename(entry, path.extname(entry)).toUpperCase();
    templates[code] = await readFile(path.join(dir, entry), "utf-8");
  }
  return templates;
}

export async function savePromptTemplates(
  dir: string,
  templates: Record<string, string>
): Promise<string[]> {
  await mkdir(dir, { recursive: true });

  const written: string[] = [];
  for (const [code, template] of Object.entries(templates)) {
    const filePath = path.join(dir, `${code.toLowerCase()}.md`);
    await writeFile(filePath, template, "utf-8");
    written.push(filePath);
  }
  return written;
}
