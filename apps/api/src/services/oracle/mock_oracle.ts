/**
 * Mock Review Oracle
 *
 * Deterministic keyword scoring for offline runs and tests. No network calls.
 *
 * - classify: "Good" when positive words outnumber negative ones
 * - quantify: 50 + 15 per net positive word, clamped to [1, 100]
 */

import { MAX_REVIEW_SCORE, MIN_REVIEW_SCORE, type ReviewLabel } from "../../schemas/index.js";
import type { ReviewOracle } from "./types.js";

const POSITIVE_WORDS = new Set([
  "amazing",
  "delicious",
  "excellent",
  "fantastic",
  "fresh",
  "friendly",
  "good",
  "great",
  "love",
  "loved",
  "perfect",
  "tasty",
  "wonderful",
]);

const NEGATIVE_WORDS = new Set([
  "awful",
  "bad",
  "bland",
  "cold",
  "dirty",
  "disappointing",
  "horrible",
  "overpriced",
  "rude",
  "slow",
  "stale",
  "terrible",
  "worst",
]);

const NEUTRAL_SCORE = 50;
const WORD_WEIGHT = 15;

export class MockReviewOracle implements ReviewOracle {
  private _callCount = 0;

  get callCount(): number {
    return this._callCount;
  }

  async classify(reviewText: string): Promise<ReviewLabel> {
    this._callCount++;
    return sentiment(reviewText) > 0 ? "Good" : "Bad";
  }

  async quantify(reviewText: string): Promise<number> {
    this._callCount++;
    const score = NEUTRAL_SCORE + WORD_WEIGHT * sentiment(reviewText);
    return Math.max(MIN_REVIEW_SCORE, Math.min(MAX_REVIEW_SCORE, score));
  }
}

/** Positive minus negative keyword hits. */
export function sentiment(text: string): number {
  let net = 0;
  for (const word of text.toLowerCase().split(/[^a-z]+/)) {
    if (POSITIVE_WORDS.has(word)) net++;
    else if (NEGATIVE_WORDS.has(word)) net--;
  }
  return net;
}

export function createMockOracle(): MockReviewOracle {
  return new MockReviewOracle();
}
