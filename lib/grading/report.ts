/**
 * Report rendering and run output files.
 *
 * Grading run:  results.json, evaluation_report.md (the CSV is written
 *               incrementally by the results sink)
 * Review run:   feedback/<agent>.md, scorecard.json, summary.md,
 *               action_items.md
 */

import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import type { AgentOutput, AggregateResult, ReviewState, UnitResult } from "./types";

// ---------------------------------------------------------------------------
// Grading report
// ---------------------------------------------------------------------------

export interface GradingReportInput {
  aggregate: AggregateResult;
  results: readonly UnitResult[];
  proposalName?: string;
  generatedAt?: Date;
}

function fmt(value: number): string {
  return value.toFixed(2);
}

export function buildGradingReport(input: GradingReportInput): string {
  const { aggregate, results } = input;
  const generatedAt = (input.generatedAt ?? new Date()).toISOString();

  const lines: string[] = [
    "# Proposal Evaluation Report",
    "",
    ...(input.proposalName ? [`**Proposal**: ${input.proposalName}`] : []),
    `**Generated**: ${generatedAt}`,
    "",
    `## Overall Score: ${fmt(aggregate.overall)} / 4.00 (${aggregate.label})`,
    "",
  ];

  if (Math.abs(aggregate.typeWeightTotal - 1) > 1e-6) {
    lines.push(
      `> Section weights sum to ${fmt(aggregate.typeWeightTotal * 100)}%, not 100%.`,
      ""
    );
  }

  lines.push("## Section Scores", "", "| Section | Score | Weight | Scored | Failed |", "|---|---:|---:|---:|---:|");
  for (const section of aggregate.sections) {
    lines.push(
      `| ${section.sectionName} | ${fmt(section.score)} | ${fmt(section.typeWeight * 100)}% | ${section.scoredUnits} | ${section.failedUnits} |`
    );
  }
  lines.push("");

  lines.push("## Criterion Details", "");
  for (const result of results) {
    const { unit } = result;
    lines.push(
      `### ${unit.type} / ${unit.category} / ${unit.subCategory}`,
      "",
      `**Score**: ${result.score === null ? "not scored" : result.score} (weight ${fmt(unit.weight * 100)}%)`,
      ""
    );
    if (result.evidence) lines.push(`**Evidence**: ${result.evidence}`, "");
    if (result.reasoning) lines.push(`**Reasoning**: ${result.reasoning}`, "");
    if (result.improvements) lines.push(`**Improvements**: ${result.improvements}`, "");
  }

  return lines.join("\n");
}

export interface GradingOutputs {
  resultsJsonPath: string;
  reportPath: string;
}

export async function writeGradingOutputs(
  outputDir: string,
  input: GradingReportInput
): Promise<GradingOutputs> {
  await mkdir(outputDir, { recursive: true });

  const resultsJsonPath = path.join(outputDir, "results.json");
  const reportPath = path.join(outputDir, "evaluation_report.md");

  await writeFile(
    resultsJsonPath,
    JSON.stringify({ aggregate: input.aggregate, results: input.results }, null, 2),
    "utf-8"
  );
  await writeFile(reportPath, buildGradingReport(input), "utf-8");

  console.log(`[report] Wrote ${resultsJsonPath} and ${reportPath}`);
  return { resultsJsonPath, reportPath };
}

// ---------------------------------------------------------------------------
// Review outputs
// ---------------------------------------------------------------------------

/** "business_strategist" → "Business Strategist" */
export function agentTitle(agentId: string): string {
  return agentId
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

export function buildAgentFeedback(output: AgentOutput): string {
  let text = `# ${agentTitle(output.agentId)} Review\n\n${output.feedback}`;

  const scores = Object.entries(output.scores);
  if (scores.length > 0) {
    text += "\n## Scores\n\n";
    for (const [criterion, score] of scores) {
      text += `- **${criterion}**: ${score}\n`;
    }
  }

  if (output.actionItems.length > 0) {
    text += "\n## Action Items\n\n";
    output.actionItems.forEach((item, i) => {
      text += `${i + 1}. ${item}\n`;
    });
  }

  return text;
}

export function buildActionItemsMarkdown(actionItems: readonly string[]): string {
  return `# Action Items\n\n${actionItems.map((item, i) => `${i + 1}. ${item}\n`).join("")}`;
}

/**
 * Persist every review artifact under `outputDir`. Returns the written
 * paths.
 */
export async function writeReviewOutputs(outputDir: string, state: ReviewState): Promise<string[]> {
  const feedbackDir = path.join(outputDir, "feedback");
  await mkdir(feedbackDir, { recursive: true });

  const written: string[] = [];
  const write = async (filePath: string, content: string) => {
    await writeFile(filePath, content, "utf-8");
    written.push(filePath);
  };

  for (const output of Object.values(state.agentOutputs)) {
    await write(path.join(feedbackDir, `${output.agentId.toLowerCase()}.md`), buildAgentFeedback(output));
  }
  await write(path.join(outputDir, "scorecard.json"), JSON.stringify(state.consolidatedScores, null, 2));
  await write(path.join(outputDir, "summary.md"), state.summary);
  await write(path.join(outputDir, "action_items.md"), buildActionItemsMarkdown(state.actionItems));

  console.log(`[report] Wrote ${written.length} review file(s) to ${outputDir}`);
  return written;
}
