/**
 * Scoring oracle: the language model behind every score.
 *
 * The grader only depends on the ScoringOracle interface. The default
 * implementation uses the Vercel AI SDK pointed at the OpenRouter endpoint.
 */

import { createOpenAI } from "@ai-sdk/openai";
import { APICallError, generateText } from "ai";
import { ConfigError, errorMessage } from "./errors";

const OPENROUTER_BASE_URL = "https://openrouter.ai/api/v1";

export interface ScoringOracle {
  complete(prompt: string): Promise<string>;
}

export interface OpenRouterOracleOptions {
  /** OpenRouter model identifier (e.g. "openai/gpt-4o") */
  model: string;
  temperature?: number;
  timeoutMs?: number;
  /** Falls back to OPENROUTER_API_KEY */
  apiKey?: string;
}

/**
 * Create a Vercel AI SDK provider configured for OpenRouter.
 */
function getOpenRouterProvider(apiKey: string | undefined) {
  const key = apiKey ?? process.env.OPENROUTER_API_KEY;
  if (!key) {
    throw new ConfigError("OPENROUTER_API_KEY environment variable is not set");
  }

  return createOpenAI({
    baseURL: OPENROUTER_BASE_URL,
    apiKey: key,
  });
}

/**
 * Oracle backed by OpenRouter. One call is one HTTP request: the SDK's own
 * retries are off, and errors propagate to the scheduler.
 */
export function createOpenRouterOracle(options: OpenRouterOracleOptions): ScoringOracle {
  const provider = getOpenRouterProvider(options.apiKey);
  const timeoutMs = options.timeoutMs ?? 120_000;

  return {
    async complete(prompt: string): Promise<string> {
      const result = await generateText({
        model: provider(options.model),
        prompt,
        temperature: options.temperature,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(timeoutMs),
      });
      return result.text;
    },
  };
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

const RATE_LIMIT_PATTERNS = [
  "429",
  "rate limit",
  "too many requests",
  "quota",
  "rate_limit_exceeded",
];

/**
 * True for HTTP 429 responses and for errors whose message reads like a
 * provider throttle.
 */
export function isRateLimitError(error: unknown): boolean {
  if (APICallError.isInstance(error) && error.statusCode === 429) {
    return true;
  }
  const message = errorMessage(error).toLowerCase();
  return RATE_LIMIT_PATTERNS.some((pattern) => message.includes(pattern));
}
