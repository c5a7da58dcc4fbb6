/**
 * Walks the rubric tree back into the flat list of ScoringUnits the
 * scheduler consumes.
 *
 * Order is types → categories → sub-categories in source order. Weights leave
 * here as fractions (0–1).
 */

import { ValidationError } from "./errors";
import { rubricCode } from "./rubric-builder";
import type { Rubric, ScoringUnit } from "./types";

/** Reserved root key carried by some snapshots; never a real Type. */
export const METADATA_TYPE_KEY = "metadata";

export function unitKey(unit: Pick<ScoringUnit, "type" | "category" | "subCategory">): string {
  return `${unit.type}|${unit.category}|${unit.subCategory}`;
}

export function flattenRubric(rubric: Rubric): ScoringUnit[] {
  const units: ScoringUnit[] = [];
  const seen = new Set<string>();

  for (const type of rubric.types) {
    if (type.name === METADATA_TYPE_KEY) continue;

    for (const category of type.children) {
      for (const leaf of category.children) {
        const unit: ScoringUnit = Object.freeze({
          type: type.name,
          category: category.name,
          subCategory: leaf.name,
          code: rubricCode(category.name, leaf.name),
          description: leaf.description ?? "",
          scoringLevels: Object.freeze({
            unsatisfactory: leaf.scoringLevels?.unsatisfactory ?? "",
            marginal: leaf.scoringLevels?.marginal ?? "",
            satisfactory: leaf.scoringLevels?.satisfactory ?? "",
            superior: leaf.scoringLevels?.superior ?? "",
          }),
          weight: leaf.weight / 100,
          typeWeight: type.weight / 100,
        });

        const key = unitKey(unit);
        if (seen.has(key)) {
          throw new ValidationError(`Duplicate scoring unit: ${key}`);
        }
        seen.add(key);
        units.push(unit);
      }
    }
  }

  return units;
}
