/**
 * Reviewer agents for multi-agent review.
 *
 * Two kinds:
 *   Critique agents: one persona, one oracle call, free-text feedback from
 *                    which scores and action items are pattern-matched.
 *   Panel scorer:    the per-criterion scheduler + aggregator run over the
 *                    rubric units, reported as an agent.
 */

import { combineDocumentText, formatSupportingDocs } from "../documents/processor";
import { aggregateScores } from "./aggregator";
import { unitKey } from "./criteria-flattener";
import { ValidationError } from "./errors";
import type { ScoringOracle } from "./oracle";
import { extractActionItems, extractProseScores } from "./response-parser";
import type { SchedulerOptions } from "./scheduler";
import { ConcurrentScoreScheduler } from "./scheduler";
import type { AgentOutput, AgentReviewInput, ScoringUnit } from "./types";

export interface ReviewAgent {
  id: string;
  review(input: AgentReviewInput): Promise<AgentOutput>;
}

/** Confidence reported by every free-text critique. */
export const CRITIQUE_CONFIDENCE = 0.8;

export const PANEL_SCORER_ID = "panel_scorer";

// ---------------------------------------------------------------------------
// Persona Library
// ---------------------------------------------------------------------------

export interface ReviewerPersona {
  id: string;
  title: string;
  focus: string;
  hates: string;
  expertiseAreas: string[];
  criticalFocusAreas: string[];
  outputFormat: string;
  reviewStyle: string;
}

const SCORED_REVIEW_FORMAT = `## Summary
[2-3 sentences on the proposal from your perspective]

## Strengths
- [Strength, citing the document]

## Weaknesses
- [Weakness, citing the document]

## Action Items
- [Concrete change the applicants should make]

## Score
Give one overall score as "Score: X/4" (1-4, 0.5 increments).`;

export const REVIEWER_PERSONA_LIBRARY: Record<string, ReviewerPersona> = {
  tech_lead: {
    id: "tech_lead",
    title: "Technical Lead",
    focus: "Technical feasibility, architecture and engineering risk",
    hates: "Hand-waving about hard problems, missing validation plans, buzzwords in place of design",
    expertiseAreas: [
      "System architecture and integration",
      "Technology readiness and maturation",
      "Test and validation planning",
    ],
    criticalFocusAreas: [
      "Is the technical approach credible and specific?",
      "Are the key technical risks named and mitigated?",
      "Do milestones produce measurable technical evidence?",
    ],
    outputFormat: SCORED_REVIEW_FORMAT,
    reviewStyle: "Direct and evidence-driven. Quote the proposal when you criticize it.",
  },
  business_strategist: {
    id: "business_strategist",
    title: "Business Strategist",
    focus: "Market opportunity, commercialization path and value to the sponsor",
    hates: "Unsized markets, vague customers, commercialization left for later",
    expertiseAreas: [
      "Market sizing and competitive analysis",
      "Go-to-market and transition planning",
      "Business models and pricing",
    ],
    criticalFocusAreas: [
      "Who pays, and why now?",
      "Is the transition or commercialization path concrete?",
      "Does the budget support the business plan?",
    ],
    outputFormat: SCORED_REVIEW_FORMAT,
    reviewStyle: "Pragmatic. Weigh upside against execution risk.",
  },
  detail_checker: {
    id: "detail_checker",
    title: "Detail Checker",
    focus: "Compliance, internal consistency and completeness",
    hates: "Numbers that disagree between sections, missing required content, formatting violations",
    expertiseAreas: [
      "Solicitation compliance",
      "Budget and schedule consistency",
      "Document completeness",
    ],
    criticalFocusAreas: [
      "Does every section the solicitation requires exist?",
      "Do budget, schedule and staffing figures agree across documents?",
      "Are claims backed by references or data?",
    ],
    outputFormat: SCORED_REVIEW_FORMAT,
    reviewStyle: "Meticulous. List every inconsistency with its location.",
  },
  storyteller: {
    id: "storyteller",
    title: "Storyteller",
    focus: "Clarity, narrative and persuasiveness",
    hates: "Walls of jargon, buried key messages, proposals that never say why it matters",
    expertiseAreas: [
      "Narrative structure",
      "Executive communication",
      "Reviewer psychology",
    ],
    criticalFocusAreas: [
      "Can a busy reviewer state the core idea after one page?",
      "Is there a clear problem → solution → impact arc?",
      "Are figures and headings doing work?",
    ],
    outputFormat: SCORED_REVIEW_FORMAT,
    reviewStyle: "Constructive. Suggest rewrites, not just problems.",
  },
};

/**
 * Every agent id the factory can build, personas first.
 */
export function getAvailableAgentIds(): string[] {
  return [...Object.keys(REVIEWER_PERSONA_LIBRARY), PANEL_SCORER_ID];
}

// ---------------------------------------------------------------------------
// Critique Agent
// ---------------------------------------------------------------------------

function criteriaSummary(criteria: readonly ScoringUnit[]): string {
  if (criteria.length === 0) return "";

  const lines = criteria.map(
    (unit) =>
      `**${unit.category} / ${unit.subCategory}** (${unit.type}, Weight: ${(unit.weight * 100).toFixed(2)}%)\n${unit.description}`
  );
  return `## Evaluation Criteria\n\n${lines.join("\n\n")}`;
}

export function buildCritiquePrompt(persona: ReviewerPersona, input: AgentReviewInput): string {
  const bullets = (items: string[]) => items.map((item) => `- ${item}`).join("\n");

  return `# ${persona.title} Review

## Your Role
**Focus**: ${persona.focus}
**What you hate**: ${persona.hates}

## Your Expertise
${bullets(persona.expertiseAreas)}

## Critical Focus Areas
${bullets(persona.criticalFocusAreas)}

## Solicitation Context
${input.solicitationText}

${criteriaSummary(input.criteria)}

## Main Proposal
${input.proposalText}

## Supporting Documents
${formatSupportingDocs(input.supportingDocs)}

## Your Review
${persona.outputFormat}

## Review Style
${persona.reviewStyle}

Provide a comprehensive review based on your role focus. Be specific, actionable, and cite evidence from the documents.`;
}

export function createCritiqueAgent(persona: ReviewerPersona, oracle: ScoringOracle): ReviewAgent {
  return {
    id: persona.id,
    async review(input) {
      const feedback = await oracle.complete(buildCritiquePrompt(persona, input));
      if (!feedback.trim()) {
        throw new Error("Model returned an empty review");
      }

      return {
        agentId: persona.id,
        feedback,
        scores: extractProseScores(feedback, persona.id),
        actionItems: extractActionItems(feedback),
        confidence: CRITIQUE_CONFIDENCE,
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Panel Scorer
// ---------------------------------------------------------------------------

/**
 * Agent that scores every criterion through the scheduler. Scores are keyed
 * by unit identity plus `<id>_overall`; confidence is the fraction of units
 * that produced a score.
 */
export function createPanelScorerAgent(
  oracle: ScoringOracle,
  options: SchedulerOptions = {},
  id: string = PANEL_SCORER_ID
): ReviewAgent {
  const scheduler = new ConcurrentScoreScheduler(oracle, options);

  return {
    id,
    async review(input) {
      if (input.criteria.length === 0) {
        throw new Error("No criteria to score");
      }

      const documentText = combineDocumentText(input.proposalText, input.supportingDocs);
      const results = await scheduler.run(input.criteria, documentText);
      const aggregate = aggregateScores(results);

      const scores: Record<string, number> = {};
      const actionItems: string[] = [];
      const lines: string[] = [];

      for (const result of results) {
        const key = unitKey(result.unit);
        if (result.score === null) {
          lines.push(`- ${key}: not scored (${result.reasoning})`);
          continue;
        }
        scores[key] = result.score;
        lines.push(`- ${key}: ${result.score}/4. ${result.reasoning}`.trimEnd());
        if (result.improvements.trim()) {
          actionItems.push(result.improvements.trim());
        }
      }
      scores[`${id}_overall`] = aggregate.overall;

      const sectionLines = aggregate.sections.map(
        (s) => `- ${s.sectionName}: ${s.score.toFixed(2)} (${s.scoredUnits} scored, ${s.failedUnits} failed)`
      );
      const feedback = [
        `Overall: ${aggregate.overall.toFixed(2)}/4 (${aggregate.label})`,
        "",
        "Sections:",
        ...sectionLines,
        "",
        "Criteria:",
        ...lines,
      ].join("\n");

      const scored = results.filter((r) => r.score !== null).length;
      return {
        agentId: id,
        feedback,
        scores,
        actionItems,
        confidence: scored / results.length,
      };
    },
  };
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Reject empty, duplicate or unknown agent ids before any work starts.
 */
export function validateAgentConfig(agentIds: readonly string[]): void {
  if (agentIds.length === 0) {
    throw new ValidationError("No agents specified");
  }

  const available = new Set(getAvailableAgentIds());
  const unknown = agentIds.filter((id) => !available.has(id));
  if (unknown.length > 0) {
    throw new ValidationError(
      `Unknown agent(s): ${unknown.join(", ")}. Available: ${[...available].join(", ")}`
    );
  }

  const duplicates = agentIds.filter((id, i) => agentIds.indexOf(id) !== i);
  if (duplicates.length > 0) {
    throw new ValidationError(`Duplicate agent(s): ${[...new Set(duplicates)].join(", ")}`);
  }
}

export function createAgentsFromConfig(
  agentIds: readonly string[],
  oracle: ScoringOracle,
  schedulerOptions: SchedulerOptions = {}
): ReviewAgent[] {
  validateAgentConfig(agentIds);

  return agentIds.map((id) => {
    if (id === PANEL_SCORER_ID) {
      return createPanelScorerAgent(oracle, schedulerOptions);
    }
    const persona = REVIEWER_PERSONA_LIBRARY[id];
    if (!persona) {
      throw new ValidationError(`Unknown agent: ${id}`);
    }
    return createCritiqueAgent(persona, oracle);
  });
}
