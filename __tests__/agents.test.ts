import { describe, it, expect, vi, beforeEach } from "vitest";
import {
  CRITIQUE_CONFIDENCE,
  REVIEWER_PERSONA_LIBRARY,
  buildCritiquePrompt,
  createAgentsFromConfig,
  createCritiqueAgent,
  createPanelScorerAgent,
  getAvailableAgentIds,
  validateAgentConfig,
} from "@/lib/grading/agents";
import { ValidationError } from "@/lib/grading/errors";
import type { SchedulerOptions } from "@/lib/grading/scheduler";
import type { AgentReviewInput, ProcessedDocument } from "@/lib/grading/types";
import { makeUnit, scoreJson, scriptedOracle } from "./helpers";

const BUDGET_DOC: ProcessedDocument = {
  fileName: "budget.md",
  fullText: "Total request: 250k",
  sections: [],
  format: "markdown",
};

function makeInput(overrides: Partial<AgentReviewInput> = {}): AgentReviewInput {
  return {
    proposalText: "We will build a sensor network in 12 months.",
    supportingDocs: [BUDGET_DOC],
    criteria: [makeUnit(), makeUnit({ subCategory: "Technical", code: "RISK_TECHNICAL" })],
    solicitationText: "Topic 7: distributed sensing",
    ...overrides,
  };
}

const NO_WAIT: SchedulerOptions = {
  config: { warmupDelayMs: 0, baseDelayMs: 0 },
  sleep: async () => {},
};

beforeEach(() => {
  vi.restoreAllMocks();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

// ---------------------------------------------------------------------------
// Persona Library
// ---------------------------------------------------------------------------

describe("persona library", () => {
  it("lists personas then the panel scorer", () => {
    expect(getAvailableAgentIds()).toEqual([
      "tech_lead",
      "business_strategist",
      "detail_checker",
      "storyteller",
      "panel_scorer",
    ]);
  });

  it("keys every persona by its own id", () => {
    for (const [key, persona] of Object.entries(REVIEWER_PERSONA_LIBRARY)) {
      expect(persona.id).toBe(key);
      expect(persona.criticalFocusAreas.length).toBeGreaterThan(0);
    }
  });
});

describe("buildCritiquePrompt", () => {
  it("includes role, criteria and every document", () => {
    const prompt = buildCritiquePrompt(REVIEWER_PERSONA_LIBRARY.tech_lead, makeInput());

    expect(prompt.startsWith("# Technical Lead Review\n")).toBe(true);
    expect(prompt).toContain("**Focus**: Technical feasibility, architecture and engineering risk");
    expect(prompt).toContain("## Solicitation Context\nTopic 7: distributed sensing");
    expect(prompt).toContain(
      "**Risk / Schedule** (Technical, Weight: 50.00%)\nSchedule risk is identified and mitigated"
    );
    expect(prompt).toContain("## Main Proposal\nWe will build a sensor network in 12 months.");
    expect(prompt).toContain("## Supporting Documents\n--- budget.md ---\nTotal request: 250k");
  });

  it("omits the criteria block without criteria", () => {
    const prompt = buildCritiquePrompt(REVIEWER_PERSONA_LIBRARY.storyteller, makeInput({ criteria: [] }));
    expect(prompt).not.toContain("## Evaluation Criteria");
  });
});

// ---------------------------------------------------------------------------
// Critique Agent
// ---------------------------------------------------------------------------

describe("createCritiqueAgent", () => {
  it("extracts a score and action items from the review", async () => {
    const { oracle, complete } = scriptedOracle(
      "## Action Items\n- Add a risk register to section 3\n\n## Score\nScore: 3/4"
    );
    const agent = createCritiqueAgent(REVIEWER_PERSONA_LIBRARY.tech_lead, oracle);

    const output = await agent.review(makeInput());

    expect(agent.id).toBe("tech_lead");
    expect(complete).toHaveBeenCalledTimes(1);
    expect(output).toEqual({
      agentId: "tech_lead",
      feedback: "## Action Items\n- Add a risk register to section 3\n\n## Score\nScore: 3/4",
      scores: { tech_lead_score: 3 },
      actionItems: ["Add a risk register to section 3"],
      confidence: CRITIQUE_CONFIDENCE,
    });
  });

  it("rejects an empty review", async () => {
    const { oracle } = scriptedOracle("   ");
    const agent = createCritiqueAgent(REVIEWER_PERSONA_LIBRARY.storyteller, oracle);

    await expect(agent.review(makeInput())).rejects.toThrow("Model returned an empty review");
  });

  it("propagates oracle failures", async () => {
    const { oracle } = scriptedOracle(new Error("upstream unavailable"));
    const agent = createCritiqueAgent(REVIEWER_PERSONA_LIBRARY.storyteller, oracle);

    await expect(agent.review(makeInput())).rejects.toThrow("upstream unavailable");
  });
});

// ---------------------------------------------------------------------------
// Panel Scorer
// ---------------------------------------------------------------------------

describe("createPanelScorerAgent", () => {
  it("scores every criterion and reports the overall", async () => {
    const { oracle } = scriptedOracle(
      scoreJson(4, { improvements: "Add schedule float" }),
      scoreJson(2, { improvements: "Name a technical risk owner" })
    );
    const agent = createPanelScorerAgent(oracle, NO_WAIT);

    const output = await agent.review(makeInput());

    expect(output.agentId).toBe("panel_scorer");
    expect(output.scores).toEqual({
      "Technical|Risk|Schedule": 4,
      "Technical|Risk|Technical": 2,
      panel_scorer_overall: 3,
    });
    expect(output.actionItems).toEqual(["Add schedule float", "Name a technical risk owner"]);
    expect(output.confidence).toBe(1);
    expect(output.feedback.split("\n")[0]).toBe("Overall: 3.00/4 (satisfactory)");
  });

  it("scores against the proposal and supporting documents together", async () => {
    const { oracle, complete } = scriptedOracle(scoreJson(3));
    const agent = createPanelScorerAgent(oracle, {
      ...NO_WAIT,
      renderPrompt: (_unit, text) => text,
    });

    await agent.review(makeInput({ criteria: [makeUnit()] }));

    expect(complete).toHaveBeenCalledWith(
      "We will build a sensor network in 12 months.\n\n--- budget.md ---\nTotal request: 250k"
    );
  });

  it("lowers confidence for units that could not be scored", async () => {
    const { oracle } = scriptedOracle(scoreJson(4), new Error("timeout"));
    const agent = createPanelScorerAgent(oracle, NO_WAIT);

    const output = await agent.review(makeInput());

    expect(output.confidence).toBe(0.5);
    expect(output.scores).toEqual({ "Technical|Risk|Schedule": 4, panel_scorer_overall: 4 });
    expect(output.feedback).toContain("- Technical|Risk|Technical: not scored (Could not parse response)");
  });

  it("fails without criteria", async () => {
    const agent = createPanelScorerAgent(scriptedOracle(scoreJson(3)).oracle, NO_WAIT);
    await expect(agent.review(makeInput({ criteria: [] }))).rejects.toThrow("No criteria to score");
  });
});

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

describe("validateAgentConfig", () => {
  it("rejects an empty list", () => {
    expect(() => validateAgentConfig([])).toThrow("No agents specified");
  });

  it("names unknown agents and the available ones", () => {
    expect(() => validateAgentConfig(["tech_lead", "ghost"])).toThrow(ValidationError);
    expect(() => validateAgentConfig(["tech_lead", "ghost"])).toThrow(
      "Unknown agent(s): ghost. Available: tech_lead, business_strategist, detail_checker, storyteller, panel_scorer"
    );
  });

  it("rejects duplicates", () => {
    expect(() => validateAgentConfig(["storyteller", "storyteller"])).toThrow(
      "Duplicate agent(s): storyteller"
    );
  });
});

describe("createAgentsFromConfig", () => {
  it("builds agents in configuration order", () => {
    const agents = createAgentsFromConfig(["storyteller", "panel_scorer"], scriptedOracle("").oracle);
    expect(agents.map((a) => a.id)).toEqual(["storyteller", "panel_scorer"]);
  });

  it("validates before building", () => {
    expect(() => createAgentsFromConfig(["ghost"], scriptedOracle("").oracle)).toThrow(ValidationError);
  });
});
