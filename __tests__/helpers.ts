import { mkdtemp, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { ScoringOracle } from "@/lib/grading/oracle";
import type { RubricRow, ScoringUnit, UnitResult } from "@/lib/grading/types";

export function makeRow(overrides: Partial<RubricRow> = {}): RubricRow {
  return {
    type: "Technical",
    typeWeight: 70,
    category: "Risk",
    categoryWeight: 100,
    subCategory: "Schedule",
    unsatisfactory: "No plan",
    marginal: "Vague plan",
    satisfactory: "Credible plan",
    superior: "Credible plan with margin",
    ...overrides,
  };
}

export function makeUnit(overrides: Partial<ScoringUnit> = {}): ScoringUnit {
  return {
    type: "Technical",
    category: "Risk",
    subCategory: "Schedule",
    code: "RISK_SCHEDULE",
    description: "Schedule risk is identified and mitigated",
    scoringLevels: {
      unsatisfactory: "No plan",
      marginal: "Vague plan",
      satisfactory: "Credible plan",
      superior: "Credible plan with margin",
    },
    weight: 0.5,
    typeWeight: 0.7,
    ...overrides,
  };
}

export function makeResult(
  score: number | null,
  unitOverrides: Partial<ScoringUnit> = {}
): UnitResult {
  return {
    unit: makeUnit(unitOverrides),
    score,
    evidence: "",
    reasoning: score === null ? "Could not parse response" : "ok",
    improvements: "",
    attempts: 1,
  };
}

/** Oracle whose `complete` is a vi.fn answering from a list, then repeating the last. */
export function scriptedOracle(...responses: Array<string | Error>) {
  let call = 0;
  const complete = vi.fn(async (_prompt: string): Promise<string> => {
    const response = responses[Math.min(call, responses.length - 1)];
    call++;
    if (response instanceof Error) throw response;
    return response;
  });
  const oracle: ScoringOracle = { complete };
  return { oracle, complete };
}

export function scoreJson(score: number, extra: Record<string, string> = {}): string {
  return JSON.stringify({ score, evidence: "e", reasoning: "r", improvements: "i", ...extra });
}

export async function withTempDir<T>(run: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "grader-test-"));
  try {
    return await run(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}
