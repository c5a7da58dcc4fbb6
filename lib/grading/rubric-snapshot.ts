/**
 * Rubric snapshot persistence.
 *
 * The snapshot is the JSON form of the rubric tree, keyed
 * types → categories → sub_categories, with weights as 0–100 percentages.
 * Older snapshots put the type map directly at the root next to a
 * "metadata" entry; both layouts load.
 *
 * Alongside the snapshot, each Type can be written as its own summary rubric
 * (`<type>_rubric.json`) with fractional weights and a flat dimension list.
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { ValidationError, errorMessage } from "./errors";
import { splitRubricByType } from "./rubric-builder";
import type { Rubric, RubricNode } from "./types";

// ---------------------------------------------------------------------------
// Schema
// ---------------------------------------------------------------------------

const ScoringLevelsSchema = z.object({
  unsatisfactory: z.string().default(""),
  marginal: z.string().default(""),
  satisfactory: z.string().default(""),
  superior: z.string().default(""),
});

const SubCategorySchema = z.object({
  description: z.string().default(""),
  scoring: ScoringLevelsSchema,
  weight: z.number().finite(),
});

const CategorySchema = z.object({
  weight: z.number().finite(),
  sub_categories: z.record(z.string(), SubCategorySchema),
});

const TypeSchema = z.object({
  weight: z.number().finite(),
  categories: z.record(z.string(), CategorySchema),
});

const MetadataSchema = z.object({
  version: z.string(),
  description: z.string().default(""),
  total_weight: z.number().default(100),
});

export const RubricSnapshotSchema = z.object({
  metadata: MetadataSchema.optional(),
  types: z.record(z.string(), TypeSchema),
});

export type RubricSnapshot = z.infer<typeof RubricSnapshotSchema>;

// ---------------------------------------------------------------------------
// Conversion
// ---------------------------------------------------------------------------

export function toSnapshot(rubric: Rubric): RubricSnapshot {
  const types: RubricSnapshot["types"] = {};

  for (const type of rubric.types) {
    const categories: RubricSnapshot["types"][string]["categories"] = {};
    for (const category of type.children) {
      const subCategories: Record<string, z.infer<typeof SubCategorySchema>> = {};
      for (const leaf of category.children) {
        subCategories[leaf.name] = {
          description: leaf.description ?? "",
          scoring: leaf.scoringLevels ?? {
            unsatisfactory: "",
            marginal: "",
            satisfactory: "",
            superior: "",
          },
          weight: leaf.weight,
        };
      }
      categories[category.name] = { weight: category.weight, sub_categories: subCategories };
    }
    types[type.name] = { weight: type.weight, categories };
  }

  return {
    metadata: rubric.metadata
      ? {
          version: rubric.metadata.version,
          description: rubric.metadata.description,
          total_weight: rubric.metadata.totalWeight,
        }
      : undefined,
    types,
  };
}

export function fromSnapshot(snapshot: RubricSnapshot): Rubric {
  const types: RubricNode[] = Object.entries(snapshot.types).map(([typeName, type]): RubricNode => ({
    kind: "Type",
    name: typeName,
    weight: type.weight,
    children: Object.entries(type.categories).map(([categoryName, category]): RubricNode => ({
      kind: "Category",
      name: categoryName,
      weight: category.weight,
      children: Object.entries(category.sub_categories).map(([leafName, leaf]): RubricNode => ({
        kind: "SubCategory",
        name: leafName,
        weight: leaf.weight,
        children: [],
        description: leaf.description,
        scoringLevels: leaf.scoring,
      })),
    })),
  }));

  return {
    metadata: snapshot.metadata
      ? {
          version: snapshot.metadata.version,
          description: snapshot.metadata.description,
          totalWeight: snapshot.metadata.total_weight,
        }
      : undefined,
    types,
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed snapshot JSON in either layout and convert it to a Rubric.
 */
export function parseRubricSnapshot(json: unknown): Rubric {
  let candidate: unknown = json;
  if (isPlainObject(json) && !("types" in json)) {
    const { metadata, ...types } = json;
    candidate = { metadata, types };
  }

  const parsed = RubricSnapshotSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? issue.path.join(".") : "";
    throw new ValidationError(
      `Invalid rubric snapshot${where ? ` at ${where}` : ""}: ${issue?.message ?? "unknown error"}`
    );
  }

  return fromSnapshot(parsed.data);
}

// ---------------------------------------------------------------------------
// File I/O
// ---------------------------------------------------------------------------

export async function loadRubricSnapshot(filePath: string): Promise<Rubric> {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf-8");
  } catch (error) {
    throw new ValidationError(`Cannot read rubric snapshot ${filePath}: ${errorMessage(error)}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`Rubric snapshot ${filePath} is not valid JSON: ${errorMessage(error)}`);
  }

  return parseRubricSnapshot(json);
}

export async function saveRubricSnapshot(filePath: string, rubric: Rubric): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeFile(filePath, JSON.stringify(toSnapshot(rubric), null, 2), "utf-8");
}

/**
 * Write one `<type>_rubric.json` per Type into `dir`. Returns the written paths.
 */
export async function saveTypeRubrics(dir: string, rubric: Rubric): Promise<string[]> {
  await mkdir(dir, { recursive: true });

  const written: string[] = [];
  for (const [typeKey, typeRubric] of Object.entries(splitRubricByType(rubric))) {
    const filePath = path.join(dir, `${typeKey.replace(/[ /]/g, "_")}_rubric.json`);
    const json = {
      rubric_id: typeRubric.rubricId,
      weight: typeRubric.weight,
      dimensions: typeRubric.dimensions.map((dimension) => ({
        name: dimension.name,
        code: dimension.code,
        weight: dimension.weight,
        description: dimension.description,
        scoring_criteria: dimension.scoringCriteria,
      })),
    };
    await writeFile(filePath, JSON.stringify(json, null, 2), "utf-8");
    written.push(filePath);
  }
  return written;
}
