/**
 * Grader configuration.
 *
 * Resolution order: DEFAULT_GRADER_CONFIG, then an optional JSON file, then
 * environment overrides (GRADER_MODEL, GRADER_MAX_CONCURRENT). Components
 * receive their slice of the result; nothing reads configuration globally.
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import { DEFAULT_COORDINATOR_CONFIG } from "./coordinator";
import { ConfigError, errorMessage } from "./errors";
import { SchedulerConfigSchema } from "./scheduler";
import { DEFAULT_SCHEDULER_CONFIG } from "./types";

const CELL_ADDRESS = /^[A-Z]+[1-9][0-9]*$/;

export const ComplianceConfigSchema = z.object({
  /** Maximum main-proposal pages; checked for PDFs only */
  proposalPageLimit: z.number().int().positive(),
  maxBudget: z.number().positive(),
  /** Subcontract total over budget total */
  maxSubcontractRatio: z.number().min(0).max(1),
  /** Budget workbook, relative to the bundle directory */
  budgetFile: z.string().min(1),
  budgetTotalCell: z.string().regex(CELL_ADDRESS),
  subcontractTotalCell: z.string().regex(CELL_ADDRESS),
});

export type ComplianceConfig = z.infer<typeof ComplianceConfigSchema>;

export const DEFAULT_COMPLIANCE_CONFIG: ComplianceConfig = {
  proposalPageLimit: 15,
  maxBudget: 150_000,
  maxSubcontractRatio: 0.33,
  budgetFile: "budget.xlsx",
  budgetTotalCell: "C17",
  subcontractTotalCell: "C12",
};

export const GraderConfigSchema = z.object({
  /** OpenRouter model identifier */
  model: z.string().min(1),
  temperature: z.number().min(0).max(2),
  timeoutMs: z.number().int().positive(),
  scheduler: SchedulerConfigSchema,
  agents: z.array(z.string().min(1)).min(1),
  mergeStrategy: z.enum(["overwrite", "namespaced", "mean"]),
  actionItemLimit: z.number().int().min(0),
  /** File names that must exist at the bundle root */
  requiredFiles: z.array(z.string()),
  /** Bundle limits; null skips the compliance check */
  compliance: ComplianceConfigSchema.nullable(),
});

export type GraderConfig = z.infer<typeof GraderConfigSchema>;

export const DEFAULT_GRADER_CONFIG: GraderConfig = {
  model: "openai/gpt-4o-mini",
  temperature: 0.1,
  timeoutMs: 120_000,
  scheduler: DEFAULT_SCHEDULER_CONFIG,
  agents: ["tech_lead", "business_strategist", "detail_checker", "panel_scorer", "storyteller"],
  mergeStrategy: DEFAULT_COORDINATOR_CONFIG.mergeStrategy,
  actionItemLimit: DEFAULT_COORDINATOR_CONFIG.actionItemLimit,
  requiredFiles: [],
  compliance: null,
};

const PartialGraderConfigSchema = GraderConfigSchema.extend({
  scheduler: SchedulerConfigSchema.partial(),
  compliance: ComplianceConfigSchema.partial().nullable(),
}).partial();

type Env = Record<string, string | undefined>;
export type GraderConfigLayer = z.infer<typeof PartialGraderConfigSchema>;

function envOverrides(env: Env): GraderConfigLayer {
  const overrides: GraderConfigLayer = {};

  if (env.GRADER_MODEL) {
    overrides.model = env.GRADER_MODEL;
  }
  if (env.GRADER_MAX_CONCURRENT) {
    const maxConcurrent = Number(env.GRADER_MAX_CONCURRENT);
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new ConfigError(
        `GRADER_MAX_CONCURRENT must be a positive integer, got "${env.GRADER_MAX_CONCURRENT}"`
      );
    }
    overrides.scheduler = { maxConcurrent };
  }

  return overrides;
}

function formatIssue(error: z.ZodError): string {
  const issue = error.issues[0];
  if (!issue) return "unknown error";
  return issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message;
}

/**
 * A compliance layer fills in from the defaults the first time it appears;
 * an explicit null turns the check off again.
 */
function mergeCompliance(
  current: GraderConfigLayer["compliance"],
  layer: GraderConfigLayer["compliance"]
): GraderConfigLayer["compliance"] {
  if (layer === undefined) return current;
  if (layer === null) return null;
  return { ...DEFAULT_COMPLIANCE_CONFIG, ...current, ...layer };
}

/**
 * Merge partial configuration layers over the defaults and validate.
 */
export function resolveGraderConfig(
  ...layers: Array<GraderConfigLayer>
): GraderConfig {
  let merged: GraderConfigLayer = DEFAULT_GRADER_CONFIG;
  for (const layer of layers) {
    merged = {
      ...merged,
      ...layer,
      scheduler: { ...merged.scheduler, ...layer.scheduler },
      compliance: mergeCompliance(merged.compliance, layer.compliance),
    };
  }

  const parsed = GraderConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new ConfigError(`Invalid grader config: ${formatIssue(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Load configuration from an optional JSON file plus the environment.
 */
export async function loadGraderConfig(
  configPath?: string,
  env: Env = process.env
): Promise<GraderConfig> {
  let fileLayer: GraderConfigLayer = {};

  if (configPath) {
    let raw: string;
    try {
      raw = await readFile(configPath, "utf-8");
    } catch (error) {
      throw new ConfigError(`Cannot read config file ${configPath}: ${errorMessage(error)}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new ConfigError(`Config file ${configPath} is not valid JSON: ${errorMessage(error)}`);
    }

    const parsed = PartialGraderConfigSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigError(`Invalid config file ${configPath}: ${formatIssue(parsed.error)}`);
    }
    fileLayer = parsed.data;
  }

  return resolveGraderConfig(fileLayer, envOverrides(env));
}
