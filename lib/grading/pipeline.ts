/**
 * End-to-end runs.
 *
 *   Grade:  rubric → units → documents → scheduler (+ CSV sink) → aggregate
 *           → results.json / evaluation_report.md
 *   Review: rubric → units → documents → coordinator over the configured
 *           agents → feedback files, scorecard, summary, action items
 *
 * Every input is loaded and validated before the first oracle call.
 */

import path from "node:path";
import {
  assertRequiredFiles,
  findMainProposal,
  findSupportingDocs,
} from "../documents/discovery";
import type { ComplianceReport } from "../documents/compliance";
import { checkCompliance } from "../documents/compliance";
import { combineDocumentText, processDocument } from "../documents/processor";
import { createAgentsFromConfig, validateAgentConfig } from "./agents";
import { aggregateScores } from "./aggregator";
import type { ComplianceConfig, GraderConfig } from "./config";
import { MultiAgentReviewCoordinator } from "./coordinator";
import { flattenRubric } from "./criteria-flattener";
import { DocumentError, ValidationError } from "./errors";
import type { ScoringOracle } from "./oracle";
import { createOpenRouterOracle } from "./oracle";
import type { PromptRenderer } from "./prompts";
import { assertTemplatesUnambiguous, createPromptRenderer, loadPromptTemplates } from "./prompts";
import { writeGradingOutputs, writeReviewOutputs } from "./report";
import { CsvResultsSink } from "./results-sink";
import { loadRubricFromFiles } from "./rubric-builder";
import { loadRubricSnapshot } from "./rubric-snapshot";
import { ConcurrentScoreScheduler } from "./scheduler";
import type {
  AggregateResult,
  ProcessedDocument,
  ReviewEvent,
  ReviewState,
  Rubric,
  ScoringUnit,
  UnitResult,
} from "./types";

// ---------------------------------------------------------------------------
// Inputs
// ---------------------------------------------------------------------------

export interface RubricSource {
  /** JSON snapshot, or a CSV/XLSX rubric table */
  rubricPath: string;
  /** Criteria-description table; tables only */
  criteriaPath?: string;
}

export async function loadRubric(source: RubricSource): Promise<Rubric> {
  if (path.extname(source.rubricPath).toLowerCase() === ".json") {
    return loadRubricSnapshot(source.rubricPath);
  }
  return loadRubricFromFiles(source.rubricPath, source.criteriaPath);
}

export async function loadScoringUnits(source: RubricSource): Promise<ScoringUnit[]> {
  const units = flattenRubric(await loadRubric(source));
  if (units.length === 0) {
    throw new ValidationError(`Rubric ${source.rubricPath} has no scoring units`);
  }
  return units;
}

export interface DocumentSource {
  /** Bundle directory; the main proposal is discovered inside it */
  bundleDir?: string;
  /** Explicit main proposal; takes precedence over discovery */
  proposalPath?: string;
  /** Extra supporting documents beyond those found in the bundle */
  supportingPaths?: string[];
  requiredFiles?: readonly string[];
  /** Limits checked against the bundle; null or absent skips the check */
  compliance?: ComplianceConfig | null;
}

export interface ProposalBundle {
  proposal: ProcessedDocument;
  supportingDocs: ProcessedDocument[];
  compliance: ComplianceReport | null;
}

export async function loadProposalBundle(source: DocumentSource): Promise<ProposalBundle> {
  const { bundleDir } = source;

  if (bundleDir && source.requiredFiles && source.requiredFiles.length > 0) {
    await assertRequiredFiles(bundleDir, source.requiredFiles);
  }

  const proposalPath = source.proposalPath ?? (bundleDir ? await findMainProposal(bundleDir) : null);
  if (!proposalPath) {
    throw new DocumentError(
      bundleDir ? `No main proposal found in ${bundleDir}` : "No proposal document given"
    );
  }

  const supportingPaths = [
    ...(bundleDir ? await findSupportingDocs(bundleDir, [proposalPath]) : []),
    ...(source.supportingPaths ?? []),
  ];

  const proposal = await processDocument(proposalPath);
  const compliance = source.compliance
    ? await checkCompliance(bundleDir ?? path.dirname(proposalPath), proposal, source.compliance)
    : null;

  const supportingDocs: ProcessedDocument[] = [];
  for (const docPath of supportingPaths) {
    supportingDocs.push(await processDocument(docPath));
  }

  return { proposal, supportingDocs, compliance };
}

async function loadRenderer(
  promptsDir: string | undefined,
  units: readonly ScoringUnit[]
): Promise<PromptRenderer> {
  const templates = promptsDir ? await loadPromptTemplates(promptsDir) : {};
  assertTemplatesUnambiguous(templates, units);
  return createPromptRenderer(templates);
}

function resolveOracle(config: GraderConfig, oracle: ScoringOracle | undefined): ScoringOracle {
  return (
    oracle ??
    createOpenRouterOracle({
      model: config.model,
      temperature: config.temperature,
      timeoutMs: config.timeoutMs,
    })
  );
}

// ---------------------------------------------------------------------------
// Grade
// ---------------------------------------------------------------------------

export interface GradeOptions {
  rubric: RubricSource;
  documents: DocumentSource;
  outputDir: string;
  config: GraderConfig;
  promptsDir?: string;
  /** Defaults to the OpenRouter oracle built from `config` */
  oracle?: ScoringOracle;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export interface GradeResult {
  results: UnitResult[];
  aggregate: AggregateResult;
  csvPath: string;
  resultsJsonPath: string;
  reportPath: string;
}

export async function runGradingPipeline(options: GradeOptions): Promise<GradeResult> {
  const units = await loadScoringUnits(options.rubric);
  const bundle = await loadProposalBundle({
    requiredFiles: options.config.requiredFiles,
    compliance: options.config.compliance,
    ...options.documents,
  });
  const renderPrompt = await loadRenderer(options.promptsDir, units);
  const oracle = resolveOracle(options.config, options.oracle);

  console.log(
    `[grade] Scoring ${units.length} criteria for ${bundle.proposal.fileName} ` +
      `(+${bundle.supportingDocs.length} supporting document(s))`
  );

  const csvPath = path.join(options.outputDir, "results.csv");
  const sink = new CsvResultsSink(csvPath);
  await sink.open();

  const scheduler = new ConcurrentScoreScheduler(oracle, {
    config: options.config.scheduler,
    renderPrompt,
    onResult: (result) => sink.append(result),
    sleep: options.sleep,
    random: options.random,
  });

  const documentText = combineDocumentText(bundle.proposal.fullText, bundle.supportingDocs);
  const results = await scheduler.run(units, documentText);
  const aggregate = aggregateScores(results);
  await sink.appendSummary(aggregate);

  const outputs = await writeGradingOutputs(options.outputDir, {
    aggregate,
    results,
    proposalName: bundle.proposal.fileName,
  });

  console.log(`[grade] Overall ${aggregate.overall.toFixed(2)} (${aggregate.label})`);
  return { results, aggregate, csvPath, ...outputs };
}

// ---------------------------------------------------------------------------
// Review
// ---------------------------------------------------------------------------

export interface ReviewOptions extends GradeOptions {
  /** Solicitation text given to the critique agents */
  solicitationPath?: string;
  onEvent?: (event: ReviewEvent) => void;
}

export interface ReviewResult {
  state: ReviewState;
  writtenFiles: string[];
}

export async function runMultiAgentReview(options: ReviewOptions): Promise<ReviewResult> {
  const { config } = options;
  validateAgentConfig(config.agents);

  const units = await loadScoringUnits(options.rubric);
  const bundle = await loadProposalBundle({
    requiredFiles: config.requiredFiles,
    compliance: config.compliance,
    ...options.documents,
  });
  const solicitation = options.solicitationPath
    ? await processDocument(options.solicitationPath)
    : null;
  const renderPrompt = await loadRenderer(options.promptsDir, units);
  const oracle = resolveOracle(config, options.oracle);

  const agents = createAgentsFromConfig(config.agents, oracle, {
    config: config.scheduler,
    renderPrompt,
    sleep: options.sleep,
    random: options.random,
  });
  const coordinator = new MultiAgentReviewCoordinator(agents, {
    config: { mergeStrategy: config.mergeStrategy, actionItemLimit: config.actionItemLimit },
    onEvent: options.onEvent,
  });

  console.log(`[review] Running ${agents.length} agent(s): ${config.agents.join(", ")}`);
  const state = await coordinator.review({
    proposalText: bundle.proposal.fullText,
    supportingDocs: bundle.supportingDocs,
    criteria: units,
    solicitationText: solicitation?.fullText ?? "",
  });

  const writtenFiles = await writeReviewOutputs(options.outputDir, state);
  return { state, writtenFiles };
}
