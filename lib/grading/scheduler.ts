/**
 * Concurrent score scheduler. Scores every unit against the oracle under
 * concurrency and rate-limit constraints.
 *
 *   Warm-up:  the first `warmupCount` units run one at a time, with
 *             `warmupDelayMs` between them.
 *   Batches:  the rest run in batches of `batchSize`, each batch dispatched
 *             at once behind a `maxConcurrent` semaphore, `baseDelayMs`
 *             between batches.
 *   Retries:  every failure (rate limit, transport, unparseable response)
 *             backs off `baseDelayMs · 2^attempt` plus up to 1 s of jitter.
 *
 * The scheduler never throws for oracle trouble: a unit that exhausts its
 * attempts comes back with a null score.
 */

import { z } from "zod";
import { ValidationError, errorMessage } from "./errors";
import type { ScoringOracle } from "./oracle";
import { isRateLimitError } from "./oracle";
import type { PromptRenderer } from "./prompts";
import { buildScoringPrompt } from "./prompts";
import { parseScoringResponse } from "./response-parser";
import { Semaphore } from "./semaphore";
import type { SchedulerConfig, ScoringUnit, UnitResult } from "./types";
import { DEFAULT_SCHEDULER_CONFIG } from "./types";

export const FAILED_UNIT_REASONING = "Could not parse response";

const JITTER_MS = 1_000;

export const SchedulerConfigSchema = z.object({
  maxConcurrent: z.number().int().min(1),
  batchSize: z.number().int().min(1),
  warmupCount: z.number().int().min(0),
  warmupDelayMs: z.number().int().min(0),
  baseDelayMs: z.number().int().min(0),
  maxRetries: z.number().int().min(1),
});

export interface SchedulerOptions {
  config?: Partial<SchedulerConfig>;
  /** Defaults to the generic prompt */
  renderPrompt?: PromptRenderer;
  /** Called once per unit as soon as its result is final */
  onResult?: (result: UnitResult) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
  /** Uniform [0, 1) source for backoff jitter */
  random?: () => number;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function validateSchedulerConfig(config: Partial<SchedulerConfig> = {}): SchedulerConfig {
  const parsed = SchedulerConfigSchema.safeParse({ ...DEFAULT_SCHEDULER_CONFIG, ...config });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(
      `Invalid scheduler config: ${issue ? `${issue.path.join(".")} ${issue.message}` : "unknown error"}`
    );
  }
  return parsed.data;
}

export class ConcurrentScoreScheduler {
  readonly config: SchedulerConfig;

  private readonly oracle: ScoringOracle;
  private readonly renderPrompt: PromptRenderer;
  private readonly onResult?: SchedulerOptions["onResult"];
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;

  constructor(oracle: ScoringOracle, options: SchedulerOptions = {}) {
    this.config = validateSchedulerConfig(options.config);
    this.oracle = oracle;
    this.renderPrompt = options.renderPrompt ?? buildScoringPrompt;
    this.onResult = options.onResult;
    this.sleep = options.sleep ?? defaultSleep;
    this.random = options.random ?? Math.random;
  }

  /** Delay before the retry that follows failed attempt `attempt` (0-based). */
  backoffDelay(attempt: number): number {
    return this.config.baseDelayMs * 2 ** attempt + this.random() * JITTER_MS;
  }

  // -------------------------------------------------------------------------
  // Single unit
  // -------------------------------------------------------------------------

  /**
   * Score one unit with up to `maxRetries` attempts. The semaphore, when
   * given, is held only around the oracle call.
   */
  async scoreUnit(
    unit: ScoringUnit,
    documentText: string,
    semaphore?: Semaphore
  ): Promise<UnitResult> {
    const { maxRetries } = this.config;
    const prompt = this.renderPrompt(unit, documentText);

    for (let attempt = 0; attempt < maxRetries; attempt++) {
      try {
        const text = semaphore
          ? await semaphore.runExclusive(() => this.oracle.complete(prompt))
          : await this.oracle.complete(prompt);
        const response = parseScoringResponse(text);

        return {
          unit,
          score: response.score,
          evidence: response.evidence,
          reasoning: response.reasoning,
          improvements: response.improvements,
          attempts: attempt + 1,
        };
      } catch (error) {
        const isLast = attempt === maxRetries - 1;
        if (isRateLimitError(error)) {
          console.warn(
            `[scheduler] Rate limited on ${unit.code} (attempt ${attempt + 1}/${maxRetries})`
          );
        } else {
          console.error(
            `[scheduler] Attempt ${attempt + 1}/${maxRetries} failed for ${unit.code}: ${errorMessage(error)}`
          );
        }

        if (!isLast) {
          await this.sleep(this.backoffDelay(attempt));
        }
      }
    }

    return {
      unit,
      score: null,
      evidence: "",
      reasoning: FAILED_UNIT_REASONING,
      improvements: "",
      attempts: maxRetries,
    };
  }

  // -------------------------------------------------------------------------
  // Full run
  // -------------------------------------------------------------------------

  /**
   * Score every unit. Results come back in unit order whatever order they
   * completed in.
   */
  async run(units: readonly ScoringUnit[], documentText: string): Promise<UnitResult[]> {
    const { warmupCount, warmupDelayMs, batchSize, baseDelayMs, maxConcurrent } = this.config;
    const results = new Array<UnitResult>(units.length);
    const semaphore = new Semaphore(maxConcurrent);

    const warmup = units.slice(0, warmupCount);
    const remainder = units.slice(warmupCount);

    for (let i = 0; i < warmup.length; i++) {
      results[i] = await this.complete(await this.scoreUnit(warmup[i], documentText, semaphore));

      const moreToScore = i < warmup.length - 1 || remainder.length > 0;
      if (moreToScore && warmupDelayMs > 0) {
        await this.sleep(warmupDelayMs);
      }
    }

    const batchCount = Math.ceil(remainder.length / batchSize);
    for (let b = 0; b < batchCount; b++) {
      const offset = b * batchSize;
      const batch = remainder.slice(offset, offset + batchSize);
      console.log(
        `[scheduler] Batch ${b + 1}/${batchCount}: scoring ${batch.length} unit(s)`
      );

      const batchResults = await Promise.all(
        batch.map(async (unit) =>
          this.complete(await this.scoreUnit(unit, documentText, semaphore))
        )
      );
      batchResults.forEach((result, index) => {
        results[warmup.length + offset + index] = result;
      });

      if (b < batchCount - 1 && baseDelayMs > 0) {
        await this.sleep(baseDelayMs);
      }
    }

    const failed = results.filter((r) => r.score === null).length;
    console.log(
      `[scheduler] Scored ${units.length - failed}/${units.length} unit(s)` +
        (failed > 0 ? `, ${failed} failed` : "")
    );

    return results;
  }

  private async complete(result: UnitResult): Promise<UnitResult> {
    if (this.onResult) {
      try {
        await this.onResult(result);
      } catch (error) {
        console.error(
          `[scheduler] Result hook failed for ${result.unit.code}: ${errorMessage(error)}`
        );
      }
    }
    return result;
  }
}
