/**
 * Oracle Response Parsers
 *
 * Enforce the oracle contract on raw model output.
 */

import {
  MAX_REVIEW_SCORE,
  MIN_REVIEW_SCORE,
  ReviewLabelSchema,
  type ReviewLabel,
} from "../../schemas/index.js";
import { ClassificationError, QuantificationError } from "../errors.js";

/**
 * Accepts exactly "Good" or "Bad" after trimming whitespace.
 */
export function parseClassification(raw: string): ReviewLabel {
  const parsed = ReviewLabelSchema.safeParse(raw.trim());
  if (!parsed.success) {
    throw new ClassificationError(raw);
  }
  return parsed.data;
}

/**
 * Accepts a bare integer in [1, 100] after trimming whitespace.
 */
export function parseQuantification(raw: string): number {
  const text = raw.trim();
  if (!/^[+-]?\d+$/.test(text)) {
    throw new QuantificationError(raw, "not an integer");
  }
  const score = parseInt(text, 10);
  if (score < MIN_REVIEW_SCORE || score > MAX_REVIEW_SCORE) {
    throw new QuantificationError(
      raw,
      `score ${score} is outside the valid range of ${MIN_REVIEW_SCORE}-${MAX_REVIEW_SCORE}`
    );
  }
  return score;
}
