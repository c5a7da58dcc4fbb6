/**
 * Score aggregator: unit results to section scores, one overall score and a
 * qualitative label.
 *
 * Null scores are excluded from every sum, so a failed unit counts the same
 * as a unit that was never in the rubric.
 */

import type { AggregateResult, ScoreLabel, SectionScore, UnitResult } from "./types";

/** Scores are rounded to this many decimal places before labelling. */
const SCORE_DECIMALS = 6;

/** Lower bounds, highest first. */
const LABEL_THRESHOLDS: ReadonlyArray<{ min: number; label: ScoreLabel }> = [
  { min: 3.5, label: "superior" },
  { min: 3.0, label: "satisfactory" },
  { min: 2.0, label: "marginal" },
];

function roundScore(score: number): number {
  const factor = 10 ** SCORE_DECIMALS;
  return Math.round(score * factor) / factor;
}

export function scoreLabel(score: number): ScoreLabel {
  for (const { min, label } of LABEL_THRESHOLDS) {
    if (score >= min) return label;
  }
  return "unsatisfactory";
}

/**
 * Group by Type (first-seen order) and compute weighted section and overall
 * scores. Sections with no scored unit keep score 0 and are left out of the
 * overall.
 */
export function aggregateScores(results: readonly UnitResult[]): AggregateResult {
  const sections = new Map<string, SectionScore>();

  for (const result of results) {
    const { type, typeWeight, weight } = result.unit;
    let section = sections.get(type);
    if (!section) {
      section = {
        sectionName: type,
        weightedScore: 0,
        weightSum: 0,
        score: 0,
        typeWeight,
        scoredUnits: 0,
        failedUnits: 0,
      };
      sections.set(type, section);
    }

    if (result.score === null) {
      section.failedUnits++;
      continue;
    }
    section.weightedScore += result.score * weight;
    section.weightSum += weight;
    section.scoredUnits++;
  }

  let weightedTotal = 0;
  let typeWeightSum = 0;
  let typeWeightTotal = 0;

  for (const section of sections.values()) {
    section.score = section.weightSum > 0 ? roundScore(section.weightedScore / section.weightSum) : 0;
    typeWeightTotal += section.typeWeight;

    if (section.scoredUnits > 0) {
      weightedTotal += section.score * section.typeWeight;
      typeWeightSum += section.typeWeight;
    }
  }

  const overall = typeWeightSum > 0 ? roundScore(weightedTotal / typeWeightSum) : 0;

  return {
    sections: [...sections.values()],
    overall,
    label: scoreLabel(overall),
    typeWeightTotal,
  };
}
