/**
 * Core type definitions for the proposal grader.
 *
 * Grading Pipeline:
 *   Rubric:    flat rubric rows → weighted Type/Category/SubCategory tree
 *   Flatten:   tree → ScoringUnit[] (one per leaf, weights as fractions)
 *   Schedule:  each unit scored by the oracle (warm-up, batches, backoff)
 *   Aggregate: UnitResult[] → section scores → overall score + label
 *
 * Multi-agent review fans the same documents out to several reviewer agents
 * and merges their outputs after a join barrier.
 */

// ---------------------------------------------------------------------------
// Rubric
// ---------------------------------------------------------------------------

export type RubricNodeKind = "Type" | "Category" | "SubCategory";

export interface ScoringLevels {
  unsatisfactory: string;
  marginal: string;
  satisfactory: string;
  superior: string;
}

export interface RubricNode {
  kind: RubricNodeKind;
  name: string;
  /** Percentage of the parent, 0–100 */
  weight: number;
  children: RubricNode[];
  /** Leaf only */
  description?: string;
  /** Leaf only */
  scoringLevels?: ScoringLevels;
}

export interface RubricMetadata {
  version: string;
  description: string;
  totalWeight: number;
}

export interface Rubric {
  metadata?: RubricMetadata;
  types: RubricNode[];
}

/** One row of the evaluation rubric table. */
export interface RubricRow {
  type: string;
  typeWeight: number;
  category: string;
  categoryWeight: number;
  subCategory: string;
  /** Explicit leaf weight; overrides the equal split when present */
  subCategoryWeight?: number;
  unsatisfactory: string;
  marginal: string;
  satisfactory: string;
  superior: string;
}

/** (type, category, subCategory) → definition text */
export type CriteriaDescriptions = Map<string, string>;

// ---------------------------------------------------------------------------
// Scoring units & results
// ---------------------------------------------------------------------------

export interface ScoringUnit {
  type: string;
  category: string;
  subCategory: string;
  /** Template lookup code, e.g. "RISK_SCHEDULE" */
  code: string;
  description: string;
  scoringLevels: ScoringLevels;
  /** Fraction 0–1 */
  weight: number;
  /** Fraction 0–1 of the owning Type */
  typeWeight: number;
}

export interface UnitResult {
  unit: ScoringUnit;
  /** 1.0–4.0 in 0.5 steps; null once retries are exhausted */
  score: number | null;
  evidence: string;
  reasoning: string;
  improvements: string;
  attempts: number;
}

export interface ScoringResponse {
  score: number;
  evidence: string;
  reasoning: string;
  improvements: string;
}

// ---------------------------------------------------------------------------
// Aggregation
// ---------------------------------------------------------------------------

export type ScoreLabel = "unsatisfactory" | "marginal" | "satisfactory" | "superior";

export interface SectionScore {
  sectionName: string;
  /** Σ score × weight over scored units */
  weightedScore: number;
  /** Σ weight over scored units */
  weightSum: number;
  /** weightedScore / weightSum, or 0 when nothing was scored */
  score: number;
  typeWeight: number;
  scoredUnits: number;
  failedUnits: number;
}

export interface AggregateResult {
  sections: SectionScore[];
  overall: number;
  label: ScoreLabel;
  /** Σ typeWeight across all sections; 1.0 for a well-formed rubric */
  typeWeightTotal: number;
}

// ---------------------------------------------------------------------------
// Scheduler
// ---------------------------------------------------------------------------

export interface SchedulerConfig {
  maxConcurrent: number;
  batchSize: number;
  warmupCount: number;
  warmupDelayMs: number;
  baseDelayMs: number;
  maxRetries: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  maxConcurrent: 5,
  batchSize: 5,
  warmupCount: 2,
  warmupDelayMs: 1_000,
  baseDelayMs: 2_000,
  maxRetries: 3,
};

// ---------------------------------------------------------------------------
// Documents
// ---------------------------------------------------------------------------

export type DocumentFormat = "text" | "markdown" | "csv" | "xlsx" | "docx" | "pdf";

export interface DocumentSection {
  title: string;
  content: string;
  level: number;
}

export interface ProcessedDocument {
  fullText: string;
  sections: DocumentSection[];
  format: DocumentFormat;
  fileName: string;
  /** PDF only */
  pageCount?: number;
}

// ---------------------------------------------------------------------------
// Multi-agent review
// ---------------------------------------------------------------------------

export interface AgentOutput {
  agentId: string;
  feedback: string;
  scores: Record<string, number>;
  actionItems: string[];
  confidence: number;
}

export interface AgentReviewInput {
  proposalText: string;
  supportingDocs: ProcessedDocument[];
  criteria: readonly ScoringUnit[];
  solicitationText: string;
}

export type ReviewPhase =
  | "pending"
  | "documents_processed"
  | "agents_joined"
  | "aggregated";

export type AgentStatus = "running" | "complete" | "failed";

export type ScoreMergeStrategy = "overwrite" | "namespaced" | "mean";

export interface ReviewState {
  phase: ReviewPhase;
  proposalText: string;
  supportingDocs: ProcessedDocument[];
  criteria: readonly ScoringUnit[];
  solicitationText: string;
  agentStatus: Record<string, AgentStatus>;
  agentOutputs: Record<string, AgentOutput>;
  consolidatedScores: Record<string, number>;
  /** Deduplicated, first-seen order */
  actionItems: string[];
  /** actionItems capped for the executive summary */
  topActionItems: string[];
  summary: string;
}

export type ReviewEventType =
  | "documents_processed"
  | "agent_start"
  | "agent_complete"
  | "agent_failed"
  | "agents_joined"
  | "aggregated";

export interface ReviewEvent {
  type: ReviewEventType;
  agentId?: string;
  message?: string;
}
