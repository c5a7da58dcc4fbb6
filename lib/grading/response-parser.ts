/**
 * Extracts structured data from oracle and reviewer text.
 *
 * Scoring responses are expected to contain one JSON object
 * `{score, evidence, reasoning, improvements}`, possibly wrapped in prose.
 * Lone backslashes that are not valid JSON escapes (LaTeX, Windows paths
 * echoed from the proposal) are doubled before decoding.
 *
 * Free-text reviewers are scored with lightweight pattern matching instead.
 */

import { z } from "zod";
import { ParseError, errorMessage } from "./errors";
import type { ScoringResponse } from "./types";

export const MIN_SCORE = 1.0;
export const MAX_SCORE = 4.0;

// ---------------------------------------------------------------------------
// JSON location & repair
// ---------------------------------------------------------------------------

function balancedObjectAt(text: string, start: number): string | null {
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];

    if (inString) {
      if (ch === "\\") {
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }

    if (ch === '"') {
      inString = true;
    } else if (ch === "{") {
      depth++;
    } else if (ch === "}") {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }

  return null;
}

/**
 * Find the first balanced `{...}` substring. Braces inside JSON strings are
 * ignored. Returns null when no opening brace ever closes.
 */
export function findFirstJsonObject(text: string): string | null {
  let start = text.indexOf("{");
  while (start !== -1) {
    const candidate = balancedObjectAt(text, start);
    if (candidate !== null) return candidate;
    start = text.indexOf("{", start + 1);
  }
  return null;
}

const SIMPLE_ESCAPES = new Set(['"', "\\", "/", "b", "f", "n", "r", "t"]);

/**
 * Double every backslash that does not start a valid JSON escape sequence.
 * Valid input comes back unchanged.
 */
export function repairInvalidEscapes(json: string): string {
  let out = "";

  for (let i = 0; i < json.length; i++) {
    const ch = json[i];
    if (ch !== "\\") {
      out += ch;
      continue;
    }

    const next = json[i + 1];
    if (next !== undefined && SIMPLE_ESCAPES.has(next)) {
      out += ch + next;
      i++;
    } else if (next === "u" && /^[0-9a-fA-F]{4}$/.test(json.slice(i + 2, i + 6))) {
      out += json.slice(i, i + 6);
      i += 5;
    } else {
      out += "\\\\";
    }
  }

  return out;
}

/**
 * Locate, repair and decode the first JSON object in `text`.
 */
export function decodeJsonObject(text: string): unknown {
  const candidate = findFirstJsonObject(text);
  if (candidate === null) {
    throw new ParseError("No JSON object found in response");
  }

  try {
    return JSON.parse(repairInvalidEscapes(candidate));
  } catch (error) {
    throw new ParseError(`Response JSON could not be decoded: ${errorMessage(error)}`);
  }
}

// ---------------------------------------------------------------------------
// Scoring responses
// ---------------------------------------------------------------------------

const TextOrList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => (Array.isArray(value) ? value.join("; ") : value));

export const ScoringResponseSchema = z.object({
  score: z.number().finite(),
  evidence: TextOrList.optional(),
  reasoning: TextOrList.optional(),
  improvements: TextOrList.optional(),
});

/** Round to the nearest 0.5 (halves round up). */
export function roundToHalf(value: number): number {
  return Math.round(value * 2) / 2;
}

export function isInScoreRange(value: number): boolean {
  return value >= MIN_SCORE && value <= MAX_SCORE;
}

/**
 * Parse one oracle scoring response. Throws ParseError when no object is
 * found, decoding fails, `score` is missing or not numeric, or the rounded
 * score falls outside 1–4.
 */
export function parseScoringResponse(text: string): ScoringResponse {
  const decoded = decodeJsonObject(text);
  const parsed = ScoringResponseSchema.safeParse(decoded);
  if (!parsed.success) {
    throw new ParseError("Response JSON has no numeric score");
  }

  const score = roundToHalf(parsed.data.score);
  if (!isInScoreRange(score)) {
    throw new ParseError(`Score ${parsed.data.score} is outside ${MIN_SCORE}-${MAX_SCORE}`);
  }

  return {
    score,
    evidence: parsed.data.evidence ?? "",
    reasoning: parsed.data.reasoning ?? "",
    improvements: parsed.data.improvements ?? "",
  };
}

// ---------------------------------------------------------------------------
// Free-text reviewers
// ---------------------------------------------------------------------------

const PROSE_SCORE_PATTERNS: readonly RegExp[] = [
  /(\d+(?:\.\d+)?)\/4/,
  /score.*?(\d+(?:\.\d+)?)/,
  /(\d+(?:\.\d+)?)\s*out\s*of\s*4/,
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** JSON scores are rounded first, then range-checked. */
function roundedJsonScore(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) return null;
  const score = roundToHalf(value);
  return isInScoreRange(score) ? score : null;
}

function scoresFromJson(feedback: string, agentId: string): Record<string, number> {
  const scores: Record<string, number> = {};
  let decoded: unknown;
  try {
    decoded = decodeJsonObject(feedback);
  } catch {
    return scores;
  }
  if (!isRecord(decoded)) return scores;

  if (typeof decoded.score === "number") {
    const score = roundedJsonScore(decoded.score);
    if (score !== null) scores[`${agentId}_score`] = score;
    return scores;
  }

  for (const [criterion, value] of Object.entries(decoded)) {
    const score = isRecord(value) ? roundedJsonScore(value.score) : null;
    if (score !== null) scores[criterion] = score;
  }
  return scores;
}

/**
 * Pull scores out of a reviewer's prose.
 *
 * A JSON object in the text wins: either `{score}` (stored as
 * `<agentId>_score`) or a `criterion → {score}` map, each value rounded to
 * the nearest 0.5 and then range-checked. Otherwise the patterns `x/4`,
 * `score … x` and `x out of 4` are tried in that order; the first raw match
 * inside 1–4 is rounded to the nearest 0.5.
 */
export function extractProseScores(feedback: string, agentId: string): Record<string, number> {
  const fromJson = scoresFromJson(feedback, agentId);
  if (Object.keys(fromJson).length > 0) return fromJson;

  const lowered = feedback.toLowerCase();
  for (const pattern of PROSE_SCORE_PATTERNS) {
    const match = lowered.match(pattern);
    if (!match) continue;

    const value = Number(match[1]);
    if (Number.isFinite(value) && isInScoreRange(value)) {
      return { [`${agentId}_score`]: roundToHalf(value) };
    }
  }

  return {};
}

const ACTION_ITEM_PREFIXES = ["•", "-", "*", "1.", "2.", "3."];
const MIN_ACTION_ITEM_LENGTH = 10;

/**
 * Bulleted or numbered lines longer than 10 characters, markers stripped.
 */
export function extractActionItems(feedback: string): string[] {
  const items: string[] = [];

  for (const rawLine of feedback.split("\n")) {
    const line = rawLine.trim();
    if (!ACTION_ITEM_PREFIXES.some((prefix) => line.startsWith(prefix))) continue;

    const cleaned = line.replace(/^[•\-*0-9. ]+/, "");
    if (cleaned.length > MIN_ACTION_ITEM_LENGTH) {
      items.push(cleaned);
    }
  }

  return items;
}
