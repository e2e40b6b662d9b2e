/**
 * LLM Review Oracle
 *
 * Classifies and scores reviews through an OpenRouter chat completion.
 * The primary model is tried first, then each fallback model in order.
 * Each model request is bounded by `timeoutMs` and retries on rate limits,
 * timeouts and network errors via fetchWithRetry.
 *
 * This component does NOT:
 * - Fall back to a default label or score (callers decide)
 * - Cache responses
 */

import { z } from "zod";
import type { ReviewLabel } from "../../schemas/index.js";
import { ConfigError, OracleRequestError, errorMessage } from "../errors.js";
import { fetchWithRetry } from "../llm_utils.js";
import { buildPrompt, type PromptName } from "./prompts.js";
import { parseClassification, parseQuantification } from "./response_parsers.js";
import { ORACLE_MODELS, type OracleClientConfig, type ReviewOracle } from "./types.js";

const DEFAULT_CONFIG: Required<Omit<OracleClientConfig, "apiKey">> = {
  model: ORACLE_MODELS.GEMINI_FLASH,
  fallbackModels: [],
  apiUrl: "https://openrouter.ai/api/v1/chat/completions",
  siteUrl: "https://localhost/review-bandits",
  appName: "Review Bandits",
  timeoutMs: 30000,
  retry: {},
};

const CompletionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string() }),
      })
    )
    .min(1),
});

export class LLMReviewOracle implements ReviewOracle {
  private readonly config: Required<OracleClientConfig>;
  private _callCount = 0;

  constructor(config: OracleClientConfig) {
    if (!config.apiKey) {
      throw new ConfigError("API key cannot be empty.");
    }
    this.config = {
      ...DEFAULT_CONFIG,
      ...config,
      retry: { ...DEFAULT_CONFIG.retry, ...config.retry },
    };
  }

  /** Number of completion requests made, across all models */
  get callCount(): number {
    return this._callCount;
  }

  async classify(reviewText: string): Promise<ReviewLabel> {
    const response = await this.complete("classify_review", reviewText);
    return parseClassification(response);
  }

  async quantify(reviewText: string): Promise<number> {
    const response = await this.complete("quantify_review", reviewText);
    return parseQuantification(response);
  }

  private async complete(promptName: PromptName, reviewText: string): Promise<string> {
    const prompt = await buildPrompt(promptName, reviewText);
    const models = [this.config.model, ...this.config.fallbackModels];

    let lastError: OracleRequestError | null = null;
    for (const model of models) {
      try {
        return await this.callModel(model, prompt);
      } catch (error) {
        if (!(error instanceof OracleRequestError)) throw error;
        lastError = error;
        if (model !== models[models.length - 1]) {
          console.warn(`[Oracle] ${model} failed (${error.message}); trying next model`);
        }
      }
    }

    throw new OracleRequestError(
      `All models failed for ${promptName}: ${lastError?.message ?? "no models configured"}`,
      { status: lastError?.status, cause: lastError }
    );
  }

  private async callModel(model: string, prompt: string): Promise<string> {
    this._callCount++;

    let response: Response;
    try {
      response = await fetchWithRetry(
        this.config.apiUrl,
        {
          method: "POST",
          headers: {
            Authorization: `Bearer ${this.config.apiKey}`,
            "HTTP-Referer": this.config.siteUrl,
            "X-Title": this.config.appName,
            "Content-Type": "application/json",
          },
          body: JSON.stringify({
            model,
            messages: [{ role: "user", content: prompt }],
          }),
        },
        { ...this.config.retry, timeoutMs: this.config.timeoutMs }
      );
    } catch (error) {
      throw new OracleRequestError(`Request to ${model} failed: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new OracleRequestError(
        `${model} returned ${response.status} - ${errorText.substring(0, 200)}`,
        { status: response.status }
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new OracleRequestError(`${model} returned invalid JSON: ${errorMessage(error)}`, {
        cause: error,
      });
    }

    const parsed = CompletionSchema.safeParse(body);
    if (!parsed.success) {
      throw new OracleRequestError(`${model} returned an unexpected completion shape`, {
        cause: parsed.error,
      });
    }

    return parsed.data.choices[0].message.content.trim();
  }
}

// =============================================================================
// Factory Functions
// =============================================================================

export function createReviewOracle(config: OracleClientConfig): LLMReviewOracle {
  return new LLMReviewOracle(config);
}
