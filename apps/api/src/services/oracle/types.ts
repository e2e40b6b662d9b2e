/**
 * Oracle Types
 *
 * The oracle turns review text into feedback. Both operations may be slow
 * and may fail.
 */

import type { ReviewLabel } from "../../schemas/index.js";
import type { RetryConfig } from "../llm_utils.js";

export interface ReviewClassifier {
  /** @throws ClassificationError when the label is not exactly Good or Bad */
  classify(reviewText: string): Promise<ReviewLabel>;
}

export interface ReviewQuantifier {
  /** @throws QuantificationError when the score is not an integer in [1, 100] */
  quantify(reviewText: string): Promise<number>;
}

export interface ReviewOracle extends ReviewClassifier, ReviewQuantifier {}

/** Models available on OpenRouter */
export const ORACLE_MODELS = {
  GEMINI_FLASH: "google/gemini-flash-1.5",
  GEMINI_PRO: "google/gemini-pro-1.5",
  GPT_4O: "openai/gpt-4o",
  GPT_4O_MINI: "openai/gpt-4o-mini",
  CLAUDE_3_HAIKU: "anthropic/claude-3-haiku",
} as const;

export interface OracleClientConfig {
  apiKey: string;
  /** Primary model (default: google/gemini-flash-1.5) */
  model?: string;
  /** Models tried in order when the primary request fails */
  fallbackModels?: string[];
  /** Chat completions endpoint */
  apiUrl?: string;
  /** Sent as HTTP-Referer */
  siteUrl?: string;
  /** Sent as X-Title */
  appName?: string;
  /** Per-request timeout in ms; a timed-out request is retried (default: 30000) */
  timeoutMs?: number;
  retry?: Omit<RetryConfig, "timeoutMs">;
}
