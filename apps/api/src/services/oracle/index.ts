/**
 * Oracle Layer - Main Export
 *
 * Turns review text into feedback: a Good/Bad label or a 1-100 score.
 */

export { LLMReviewOracle, createReviewOracle } from "./llm_oracle.js";
export { MockReviewOracle, createMockOracle, sentiment } from "./mock_oracle.js";
export { parseClassification, parseQuantification } from "./response_parsers.js";
export { buildPrompt, loadPromptTemplate } from "./prompts.js";
export { ORACLE_MODELS } from "./types.js";

export type { PromptName } from "./prompts.js";
export type {
  ReviewClassifier,
  ReviewQuantifier,
  ReviewOracle,
  OracleClientConfig,
} from "./types.js";
