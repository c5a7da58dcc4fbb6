/**
 * Command-line entry point.
 *
 *   grade      score a proposal against a rubric (one oracle call per criterion)
 *   review     run the multi-agent review
 *   snapshot   convert a CSV/XLSX rubric into a JSON snapshot plus one
 *              summary rubric per type
 *   templates  write one scoring prompt template per rubric criterion
 *   agents     list available reviewer agents
 *   required   list the files a bundle must contain
 */

import path from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { config as loadEnv } from "dotenv";
import { getAvailableAgentIds } from "./grading/agents";
import type { GraderConfig } from "./grading/config";
import { loadGraderConfig, resolveGraderConfig } from "./grading/config";
import { ConfigError, GraderError, errorMessage } from "./grading/errors";
import { loadRubric, runGradingPipeline, runMultiAgentReview } from "./grading/pipeline";
import { savePromptTemplates } from "./grading/prompts";
import { buildScoringTemplates } from "./grading/rubric-builder";
import { saveRubricSnapshot, saveTypeRubrics } from "./grading/rubric-snapshot";
import type { ReviewEvent } from "./grading/types";

export const USAGE = `Usage: grader <command> [options]

Commands:
  grade      --rubric <file> [--criteria <file>] (--bundle <dir> | --proposal <file>)
             [--supporting <file>]... [--prompts <dir>] [--output <dir>] [--config <file>]
  review     same options as grade, plus [--solicitation <file>] [--agents a,b,...]
  snapshot   --rubric <table> [--criteria <table>] --output <file.json>
             (also writes <type>_rubric.json beside the snapshot)
  templates  --rubric <file> [--criteria <table>] --output <dir>
  agents     list available reviewer agents
  required   list required bundle files (from --config)`;

const OPTIONS = {
  rubric: { type: "string" },
  criteria: { type: "string" },
  bundle: { type: "string" },
  proposal: { type: "string" },
  supporting: { type: "string", multiple: true },
  solicitation: { type: "string" },
  prompts: { type: "string" },
  output: { type: "string" },
  config: { type: "string" },
  agents: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

export function parseCliArgs(argv: string[]) {
  const { values, positionals } = parseArgs({ args: argv, options: OPTIONS, allowPositionals: true });
  return { command: positionals[0], values };
}

type CliValues = ReturnType<typeof parseCliArgs>["values"];

function requireOption(values: CliValues, name: "rubric" | "output"): string {
  const value = values[name];
  if (!value) {
    throw new ConfigError(`--${name} is required`);
  }
  return value;
}

async function resolveConfig(values: CliValues): Promise<GraderConfig> {
  const loaded = await loadGraderConfig(values.config);
  if (!values.agents) return loaded;
  return resolveGraderConfig(loaded, {
    agents: values.agents.split(",").map((id) => id.trim()).filter(Boolean),
  });
}

function logEvent(event: ReviewEvent): void {
  const subject = event.agentId ? ` ${event.agentId}` : "";
  const detail = event.message ? `: ${event.message}` : "";
  console.log(`[review] ${event.type}${subject}${detail}`);
}

export async function main(argv: string[]): Promise<number> {
  const { command, values } = parseCliArgs(argv);
  if (!command || values.help) {
    console.log(USAGE);
    return command || values.help ? 0 : 1;
  }

  switch (command) {
    case "grade": {
      const result = await runGradingPipeline({
        rubric: { rubricPath: requireOption(values, "rubric"), criteriaPath: values.criteria },
        documents: {
          bundleDir: values.bundle,
          proposalPath: values.proposal,
          supportingPaths: values.supporting,
        },
        outputDir: values.output ?? "output",
        config: await resolveConfig(values),
        promptsDir: values.prompts,
      });
      console.log(
        `Overall score: ${result.aggregate.overall.toFixed(2)} (${result.aggregate.label})`
      );
      for (const section of result.aggregate.sections) {
        console.log(`  ${section.sectionName}: ${section.score.toFixed(2)}`);
      }
      console.log(`Report: ${result.reportPath}`);
      return 0;
    }

    case "review": {
      const { state, writtenFiles } = await runMultiAgentReview({
        rubric: { rubricPath: requireOption(values, "rubric"), criteriaPath: values.criteria },
        documents: {
          bundleDir: values.bundle,
          proposalPath: values.proposal,
          supportingPaths: values.supporting,
        },
        solicitationPath: values.solicitation,
        outputDir: values.output ?? "output",
        config: await resolveConfig(values),
        promptsDir: values.prompts,
        onEvent: logEvent,
      });
      const failed = Object.entries(state.agentStatus).filter(([, s]) => s === "failed");
      console.log(`Review written (${writtenFiles.length} files)`);
      if (failed.length > 0) {
        console.warn(`Failed agents: ${failed.map(([id]) => id).join(", ")}`);
      }
      return 0;
    }

    case "snapshot": {
      const rubric = await loadRubric({
        rubricPath: requireOption(values, "rubric"),
        criteriaPath: values.criteria,
      });
      const output = requireOption(values, "output");
      await saveRubricSnapshot(output, rubric);
      const typeRubrics = await saveTypeRubrics(path.dirname(output), rubric);
      console.log(`Rubric snapshot written to ${output}`);
      for (const file of typeRubrics) console.log(`  ${file}`);
      return 0;
    }

    case "templates": {
      const rubric = await loadRubric({
        rubricPath: requireOption(values, "rubric"),
        criteriaPath: values.criteria,
      });
      const written = await savePromptTemplates(
        requireOption(values, "output"),
        buildScoringTemplates(rubric)
      );
      console.log(`Wrote ${written.length} prompt template(s)`);
      return 0;
    }

    case "agents":
      for (const id of getAvailableAgentIds()) console.log(id);
      return 0;

    case "required": {
      const { requiredFiles } = await resolveConfig(values);
      console.log(requiredFiles.length > 0 ? requiredFiles.join("\n") : "(none)");
      return 0;
    }

    default:
      console.error(`Unknown command: ${command}\n\n${USAGE}`);
      return 1;
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

if (isEntryPoint()) {
  loadEnv({ path: ".env.local" });
  loadEnv();

  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      const prefix = error instanceof GraderError ? `${error.name}: ` : "";
      console.error(`${prefix}${errorMessage(error)}`);
      process.exitCode = 1;
    });
}
