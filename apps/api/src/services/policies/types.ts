/**
 * Policy Types
 *
 * A policy declares which feedback it learns from. The simulation runner
 * branches on `feedbackKind`, never on the concrete class.
 */

import type { RandomSource } from "../random.js";

/**
 * - score: a numeric score per observation (oracle quantification)
 * - review_text: the raw review text, classified by the policy itself
 */
export type FeedbackKind = "score" | "review_text";

interface PolicyBase {
  /** Identity used to tag experiment history */
  readonly name: string;
  readonly arms: readonly string[];
  select(): Promise<string>;
}

export interface ScorePolicy extends PolicyBase {
  readonly feedbackKind: "score";
  update(arm: string, score: number): Promise<void>;
}

export interface ReviewTextPolicy extends PolicyBase {
  readonly feedbackKind: "review_text";
  update(arm: string, reviewText: string): Promise<void>;
}

export type BanditPolicy = ScorePolicy | ReviewTextPolicy;

/** Builds a fresh policy with no learned state. */
export type PolicyFactory = () => BanditPolicy;

export interface PolicyOptions {
  /** Label used in experiment history (default: the class name) */
  name?: string;
  /** Source of randomness (default: Math.random) */
  random?: RandomSource;
}

export interface EpsilonGreedyOptions extends PolicyOptions {
  /** Probability of exploring (default: 0.1) */
  epsilon?: number;
}

export interface ScoreEpsilonGreedyOptions extends EpsilonGreedyOptions {
  /** Mean assumed for an arm with no observations (default: 50) */
  unobservedScore?: number;
}

export interface LabelCounts {
  good: number;
  bad: number;
}
