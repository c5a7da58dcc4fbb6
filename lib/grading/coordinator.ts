/**
 * Multi-agent review coordinator.
 *
 *   pending → documents_processed → agents running → agents_joined → aggregated
 *
 * Every configured agent runs concurrently and returns its own AgentOutput;
 * a failing agent is turned into an error output, and the join has one slot
 * per agent. After the join a single reducer merges scores and action
 * items and writes the summary. Agents never touch the shared state.
 */

import type { ReviewAgent } from "./agents";
import { ValidationError, errorMessage } from "./errors";
import { agentTitle } from "./report";
import type {
  AgentOutput,
  AgentReviewInput,
  ReviewEvent,
  ReviewState,
  ScoreMergeStrategy,
} from "./types";

export interface CoordinatorConfig {
  mergeStrategy: ScoreMergeStrategy;
  /** Cap on action items in the executive summary */
  actionItemLimit: number;
}

export const DEFAULT_COORDINATOR_CONFIG: CoordinatorConfig = {
  mergeStrategy: "overwrite",
  actionItemLimit: 10,
};

export interface CoordinatorOptions {
  config?: Partial<CoordinatorConfig>;
  onEvent?: (event: ReviewEvent) => void;
}

// ---------------------------------------------------------------------------
// Reducer helpers
// ---------------------------------------------------------------------------

export function errorOutput(agentId: string, error: unknown): AgentOutput {
  return {
    agentId,
    feedback: `Error: ${errorMessage(error)}`,
    scores: {},
    actionItems: [],
    confidence: 0,
  };
}

/**
 * Merge per-agent score maps. `outputs` must be in configuration order.
 *
 *   overwrite:  union by key, later agents win
 *   namespaced: every key prefixed with `<agentId>:`
 *   mean:       union by key, values averaged across the agents reporting it
 */
export function mergeScores(
  outputs: readonly AgentOutput[],
  strategy: ScoreMergeStrategy
): Record<string, number> {
  const merged: Record<string, number> = {};

  switch (strategy) {
    case "overwrite":
      for (const output of outputs) {
        Object.assign(merged, output.scores);
      }
      return merged;

    case "namespaced":
      for (const output of outputs) {
        for (const [criterion, score] of Object.entries(output.scores)) {
          merged[`${output.agentId}:${criterion}`] = score;
        }
      }
      return merged;

    case "mean": {
      const totals = new Map<string, { sum: number; count: number }>();
      for (const output of outputs) {
        for (const [criterion, score] of Object.entries(output.scores)) {
          const total = totals.get(criterion) ?? { sum: 0, count: 0 };
          total.sum += score;
          total.count++;
          totals.set(criterion, total);
        }
      }
      for (const [criterion, { sum, count }] of totals) {
        merged[criterion] = sum / count;
      }
      return merged;
    }
  }
}

/** Concatenate action items, dropping exact repeats (first one wins). */
export function mergeActionItems(outputs: readonly AgentOutput[]): string[] {
  return [...new Set(outputs.flatMap((output) => output.actionItems))];
}

export function buildReviewSummary(
  outputs: readonly AgentOutput[],
  consolidatedScores: Record<string, number>,
  actionItems: readonly string[]
): string {
  let summary = "# Multi-Agent Review Summary\n\n";

  for (const output of outputs) {
    summary += `## ${agentTitle(output.agentId)}\n\n${output.feedback}\n\n`;

    const scores = Object.entries(output.scores);
    if (scores.length > 0) {
      summary += "**Scores:**\n";
      for (const [criterion, score] of scores) {
        summary += `- ${criterion}: ${score}\n`;
      }
      summary += "\n";
    }
  }

  const consolidated = Object.entries(consolidatedScores);
  if (consolidated.length > 0) {
    summary += "## Consolidated Scores\n\n";
    for (const [criterion, score] of consolidated) {
      summary += `- **${criterion}**: ${score}\n`;
    }
    summary += "\n";
  }

  if (actionItems.length > 0) {
    summary += "## Action Items\n\n";
    actionItems.forEach((item, i) => {
      summary += `${i + 1}. ${item}\n`;
    });
  }

  return summary;
}

// ---------------------------------------------------------------------------
// Coordinator
// ---------------------------------------------------------------------------

export class MultiAgentReviewCoordinator {
  readonly config: CoordinatorConfig;

  private readonly agents: readonly ReviewAgent[];
  private readonly onEvent?: (event: ReviewEvent) => void;

  constructor(agents: readonly ReviewAgent[], options: CoordinatorOptions = {}) {
    if (agents.length === 0) {
      throw new ValidationError("No agents specified");
    }
    const ids = agents.map((a) => a.id);
    const duplicate = ids.find((id, i) => ids.indexOf(id) !== i);
    if (duplicate !== undefined) {
      throw new ValidationError(`Duplicate agent: ${duplicate}`);
    }

    const config = { ...DEFAULT_COORDINATOR_CONFIG, ...options.config };
    if (!Number.isInteger(config.actionItemLimit) || config.actionItemLimit < 0) {
      throw new ValidationError(
        `actionItemLimit must be a non-negative integer, got ${config.actionItemLimit}`
      );
    }

    this.agents = agents;
    this.config = config;
    this.onEvent = options.onEvent;
  }

  get agentIds(): string[] {
    return this.agents.map((a) => a.id);
  }

  private emit(event: ReviewEvent): void {
    if (!this.onEvent) return;
    try {
      this.onEvent(event);
    } catch (error) {
      console.error(`[coordinator] Event handler failed on ${event.type}: ${errorMessage(error)}`);
    }
  }

  /**
   * Run every agent against the same input and reduce their outputs.
   */
  async review(input: AgentReviewInput): Promise<ReviewState> {
    const state: ReviewState = {
      phase: "pending",
      proposalText: input.proposalText,
      supportingDocs: input.supportingDocs,
      criteria: input.criteria,
      solicitationText: input.solicitationText,
      agentStatus: {},
      agentOutputs: {},
      consolidatedScores: {},
      actionItems: [],
      topActionItems: [],
      summary: "",
    };

    if (!input.proposalText.trim()) {
      throw new ValidationError("Proposal text is empty");
    }

    state.phase = "documents_processed";
    this.emit({
      type: "documents_processed",
      message: `${input.supportingDocs.length} supporting document(s)`,
    });

    // Fan out
    for (const agent of this.agents) {
      state.agentStatus[agent.id] = "running";
      this.emit({ type: "agent_start", agentId: agent.id });
    }

    const settled = await Promise.allSettled(
      this.agents.map((agent) => agent.review(input))
    );

    // Join: one slot per configured agent, in configuration order
    const outputs: AgentOutput[] = settled.map((result, i) => {
      const agentId = this.agents[i].id;
      if (result.status === "fulfilled") {
        state.agentStatus[agentId] = "complete";
        this.emit({ type: "agent_complete", agentId });
        return { ...result.value, agentId };
      }

      console.error(`[coordinator] Agent ${agentId} failed:`, result.reason);
      state.agentStatus[agentId] = "failed";
      this.emit({ type: "agent_failed", agentId, message: errorMessage(result.reason) });
      return errorOutput(agentId, result.reason);
    });

    state.phase = "agents_joined";
    this.emit({ type: "agents_joined" });

    // Reduce
    for (const output of outputs) {
      state.agentOutputs[output.agentId] = output;
    }
    state.consolidatedScores = mergeScores(outputs, this.config.mergeStrategy);
    state.actionItems = mergeActionItems(outputs);
    state.topActionItems = state.actionItems.slice(0, this.config.actionItemLimit);
    state.summary = buildReviewSummary(outputs, state.consolidatedScores, state.topActionItems);

    state.phase = "aggregated";
    const failed = outputs.filter((o) => state.agentStatus[o.agentId] === "failed").length;
    console.log(
      `[coordinator] Review complete: ${outputs.length - failed}/${outputs.length} agent(s) succeeded`
    );
    this.emit({ type: "aggregated" });

    return state;
  }
}
