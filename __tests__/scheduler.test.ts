import { describe, it, expect, vi, beforeEach } from "vitest";
import { ValidationError } from "@/lib/grading/errors";
import type { ScoringOracle } from "@/lib/grading/oracle";
import { Semaphore } from "@/lib/grading/semaphore";
import {
  ConcurrentScoreScheduler,
  FAILED_UNIT_REASONING,
  validateSchedulerConfig,
} from "@/lib/grading/scheduler";
import type { SchedulerConfig, ScoringUnit, UnitResult } from "@/lib/grading/types";
import { makeUnit, scoreJson, scriptedOracle } from "./helpers";

const FAST_CONFIG: SchedulerConfig = {
  maxConcurrent: 2,
  batchSize: 2,
  warmupCount: 2,
  warmupDelayMs: 100,
  baseDelayMs: 500,
  maxRetries: 3,
};

function units(count: number): ScoringUnit[] {
  return Array.from({ length: count }, (_, i) =>
    makeUnit({ subCategory: `S${i}`, code: `RISK_S${i}` })
  );
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Oracle that tracks how many calls are in flight at once. */
function concurrencyProbe(durationFor: (prompt: string) => number = () => 5) {
  let inFlight = 0;
  let maxInFlight = 0;
  const oracle: ScoringOracle = {
    async complete(prompt) {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await delay(durationFor(prompt));
      inFlight--;
      return scoreJson(3);
    },
  };
  return { oracle, maxInFlight: () => maxInFlight };
}

beforeEach(() => {
  vi.restoreAllMocks();
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

// ---------------------------------------------------------------------------
// Configuration
// ---------------------------------------------------------------------------

describe("validateSchedulerConfig", () => {
  it("fills defaults", () => {
    expect(validateSchedulerConfig({ maxConcurrent: 3 })).toEqual({
      maxConcurrent: 3,
      batchSize: 5,
      warmupCount: 2,
      warmupDelayMs: 1000,
      baseDelayMs: 2000,
      maxRetries: 3,
    });
  });

  it("rejects a zero batch size or retry count", () => {
    expect(() => validateSchedulerConfig({ batchSize: 0 })).toThrow(ValidationError);
    expect(() => validateSchedulerConfig({ maxRetries: 0 })).toThrow(/maxRetries/);
  });

  it("rejects non-integer values", () => {
    expect(() => validateSchedulerConfig({ maxConcurrent: 1.5 })).toThrow(ValidationError);
  });
});

// ---------------------------------------------------------------------------
// scoreUnit
// ---------------------------------------------------------------------------

describe("scoreUnit", () => {
  it("returns the parsed score on the first attempt", async () => {
    const { oracle, complete } = scriptedOracle(scoreJson(3.5, { evidence: "p.4" }));
    const scheduler = new ConcurrentScoreScheduler(oracle, { config: FAST_CONFIG });
    const unit = makeUnit();

    const result = await scheduler.scoreUnit(unit, "doc");

    expect(result).toEqual({
      unit,
      score: 3.5,
      evidence: "p.4",
      reasoning: "r",
      improvements: "i",
      attempts: 1,
    });
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it("makes exactly maxRetries attempts against an always-failing oracle", async () => {
    const { oracle, complete } = scriptedOracle(new Error("connection reset"));
    const sleep = vi.fn(async (_ms: number) => {});
    const scheduler = new ConcurrentScoreScheduler(oracle, {
      config: { ...FAST_CONFIG, baseDelayMs: 2000 },
      sleep,
      random: () => 0.5,
    });

    const result = await scheduler.scoreUnit(makeUnit(), "doc");

    expect(complete).toHaveBeenCalledTimes(3);
    expect(result.score).toBeNull();
    expect(result.attempts).toBe(3);
    expect(result.reasoning).toBe(FAILED_UNIT_REASONING);
    // Backoff after attempts 1 and 2 only
    expect(sleep.mock.calls).toEqual([[2500], [4500]]);
  });

  it("retries after a rate-limit error", async () => {
    const { oracle, complete } = scriptedOracle(new Error("429 Too Many Requests"), scoreJson(2));
    const sleep = vi.fn(async (_ms: number) => {});
    const scheduler = new ConcurrentScoreScheduler(oracle, {
      config: { ...FAST_CONFIG, baseDelayMs: 1000 },
      sleep,
      random: () => 0,
    });

    const result = await scheduler.scoreUnit(makeUnit(), "doc");

    expect(result.score).toBe(2);
    expect(result.attempts).toBe(2);
    expect(complete).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(1000);
    expect(console.warn).toHaveBeenCalledWith("[scheduler] Rate limited on RISK_SCHEDULE (attempt 1/3)");
  });

  it("treats unparseable and out-of-range responses as failed attempts", async () => {
    const { oracle } = scriptedOracle("I think it deserves a 3", '{"score": 6}', scoreJson(4));
    const scheduler = new ConcurrentScoreScheduler(oracle, {
      config: FAST_CONFIG,
      sleep: async () => {},
    });

    const result = await scheduler.scoreUnit(makeUnit(), "doc");

    expect(result.score).toBe(4);
    expect(result.attempts).toBe(3);
  });

  it("renders the prompt once with the document text", async () => {
    const { oracle, complete } = scriptedOracle(scoreJson(3));
    const renderPrompt = vi.fn((unit: ScoringUnit, text: string) => `${unit.code}:${text}`);
    const scheduler = new ConcurrentScoreScheduler(oracle, { config: FAST_CONFIG, renderPrompt });

    await scheduler.scoreUnit(makeUnit(), "the proposal");

    expect(renderPrompt).toHaveBeenCalledTimes(1);
    expect(complete).toHaveBeenCalledWith("RISK_SCHEDULE:the proposal");
  });

  it("holds no permit while backing off", async () => {
    const semaphore = new Semaphore(1);
    const { oracle } = scriptedOracle(new Error("boom"), scoreJson(3));
    const permitsDuringSleep: number[] = [];
    const scheduler = new ConcurrentScoreScheduler(oracle, {
      config: FAST_CONFIG,
      sleep: async () => {
        permitsDuringSleep.push(semaphore.inUse);
      },
    });

    await scheduler.scoreUnit(makeUnit(), "doc", semaphore);

    expect(permitsDuringSleep).toEqual([0]);
    expect(semaphore.inUse).toBe(0);
  });
});

describe("backoffDelay", () => {
  it("doubles per attempt and adds up to one second of jitter", () => {
    const scheduler = new ConcurrentScoreScheduler(scriptedOracle("").oracle, {
      config: { ...FAST_CONFIG, baseDelayMs: 1000 },
      random: () => 0.25,
    });
    expect(scheduler.backoffDelay(0)).toBe(1250);
    expect(scheduler.backoffDelay(2)).toBe(4250);
  });
});

// ---------------------------------------------------------------------------
// run
// ---------------------------------------------------------------------------

describe("run", () => {
  it("sleeps after warm-up units and between batches, not after the last", async () => {
    const { oracle, complete } = scriptedOracle(scoreJson(3));
    const sleep = vi.fn(async (_ms: number) => {});
    const scheduler = new ConcurrentScoreScheduler(oracle, { config: FAST_CONFIG, sleep });

    const results = await scheduler.run(units(5), "doc");

    expect(results).toHaveLength(5);
    expect(complete).toHaveBeenCalledTimes(5);
    // 2 warm-up units, then batches [2, 1]
    expect(sleep.mock.calls).toEqual([[100], [100], [500]]);
  });

  it("skips the trailing warm-up delay when nothing follows", async () => {
    const { oracle } = scriptedOracle(scoreJson(3));
    const sleep = vi.fn(async (_ms: number) => {});
    const scheduler = new ConcurrentScoreScheduler(oracle, { config: FAST_CONFIG, sleep });

    await scheduler.run(units(2), "doc");

    expect(sleep.mock.calls).toEqual([[100]]);
  });

  it("runs warm-up units strictly one at a time", async () => {
    const probe = concurrencyProbe();
    const scheduler = new ConcurrentScoreScheduler(probe.oracle, {
      config: { ...FAST_CONFIG, warmupCount: 3, maxConcurrent: 5 },
      sleep: async () => {},
    });

    await scheduler.run(units(3), "doc");

    expect(probe.maxInFlight()).toBe(1);
  });

  it("bounds in-flight calls by maxConcurrent", async () => {
    const probe = concurrencyProbe();
    const scheduler = new ConcurrentScoreScheduler(probe.oracle, {
      config: { ...FAST_CONFIG, warmupCount: 0, batchSize: 6, maxConcurrent: 2 },
      sleep: async () => {},
    });

    await scheduler.run(units(6), "doc");

    expect(probe.maxInFlight()).toBe(2);
  });

  it("dispatches a whole batch together", async () => {
    const probe = concurrencyProbe();
    const scheduler = new ConcurrentScoreScheduler(probe.oracle, {
      config: { ...FAST_CONFIG, warmupCount: 0, batchSize: 4, maxConcurrent: 10 },
      sleep: async () => {},
    });

    await scheduler.run(units(4), "doc");

    expect(probe.maxInFlight()).toBe(4);
  });

  it("starts the next batch only after every retry in the current one finishes", async () => {
    const events: string[] = [];
    const calls = new Map<string, number>();
    const oracle: ScoringOracle = {
      async complete(prompt) {
        const call = (calls.get(prompt) ?? 0) + 1;
        calls.set(prompt, call);
        events.push(`${prompt} start`);
        await delay(5);
        if (prompt === "RISK_S0" && call === 1) {
          events.push(`${prompt} failed`);
          throw new Error("connection reset");
        }
        events.push(`${prompt} done`);
        return scoreJson(3);
      },
    };
    const scheduler = new ConcurrentScoreScheduler(oracle, {
      config: { ...FAST_CONFIG, warmupCount: 0, batchSize: 2, maxConcurrent: 2, baseDelayMs: 0 },
      renderPrompt: (unit) => unit.code,
      sleep: () => delay(20),
      random: () => 0,
    });

    const results = await scheduler.run(units(4), "doc");

    expect(results[0].attempts).toBe(2);
    expect(events.filter((e) => e === "RISK_S0 start")).toHaveLength(2);
    expect(events.indexOf("RISK_S2 start")).toBeGreaterThan(events.indexOf("RISK_S0 done"));
    expect(events.indexOf("RISK_S3 start")).toBeGreaterThan(events.indexOf("RISK_S0 done"));
    expect(events.indexOf("RISK_S1 done")).toBeLessThan(events.indexOf("RISK_S0 done"));
  });

  it("returns results in unit order regardless of completion order", async () => {
    const probe = concurrencyProbe((prompt) => (prompt === "RISK_S0" ? 30 : 1));
    const scheduler = new ConcurrentScoreScheduler(probe.oracle, {
      config: { ...FAST_CONFIG, warmupCount: 0, batchSize: 3, maxConcurrent: 3 },
      renderPrompt: (unit) => unit.code,
      sleep: async () => {},
    });

    const results = await scheduler.run(units(3), "doc");

    expect(results.map((r) => r.unit.code)).toEqual(["RISK_S0", "RISK_S1", "RISK_S2"]);
  });

  it("reports every result to onResult", async () => {
    const { oracle } = scriptedOracle(scoreJson(3));
    const seen: string[] = [];
    const scheduler = new ConcurrentScoreScheduler(oracle, {
      config: FAST_CONFIG,
      sleep: async () => {},
      onResult: (result: UnitResult) => {
        seen.push(result.unit.code);
      },
    });

    await scheduler.run(units(3), "doc");

    expect([...seen].sort()).toEqual(["RISK_S0", "RISK_S1", "RISK_S2"]);
  });

  it("logs a failing onResult hook and keeps going", async () => {
    const { oracle } = scriptedOracle(scoreJson(3));
    const scheduler = new ConcurrentScoreScheduler(oracle, {
      config: FAST_CONFIG,
      sleep: async () => {},
      onResult: async () => {
        throw new Error("disk full");
      },
    });

    const results = await scheduler.run(units(2), "doc");

    expect(results.map((r) => r.score)).toEqual([3, 3]);
    expect(console.error).toHaveBeenCalledWith(
      "[scheduler] Result hook failed for RISK_S0: disk full"
    );
  });

  it("never throws when every call fails", async () => {
    const { oracle } = scriptedOracle(new Error("rate limit exceeded"));
    const scheduler = new ConcurrentScoreScheduler(oracle, {
      config: FAST_CONFIG,
      sleep: async () => {},
    });

    const results = await scheduler.run(units(3), "doc");

    expect(results.map((r) => [r.score, r.attempts])).toEqual([
      [null, 3],
      [null, 3],
      [null, 3],
    ]);
  });

  it("returns an empty list for no units", async () => {
    const { oracle, complete } = scriptedOracle(scoreJson(3));
    const scheduler = new ConcurrentScoreScheduler(oracle, { config: FAST_CONFIG });

    expect(await scheduler.run([], "doc")).toEqual([]);
    expect(complete).not.toHaveBeenCalled();
  });
});
