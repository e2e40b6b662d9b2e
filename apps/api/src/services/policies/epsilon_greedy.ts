/**
 * Epsilon-Greedy (score-based)
 *
 * Learns from every numeric score observed for each arm.
 * - Warm-up: the first |arms| selections visit each arm once, in order.
 * - With probability epsilon, explore: pick any arm uniformly.
 * - Otherwise exploit: pick uniformly among the arms tied for the highest
 *   mean score. An arm with no scores counts as `unobservedScore`.
 */

import { PolicyConfigError } from "../errors.js";
import { BasePolicy, validateEpsilon } from "./base_policy.js";
import type { ScoreEpsilonGreedyOptions, ScorePolicy } from "./types.js";

const DEFAULT_EPSILON = 0.1;

/** Midpoint of the 1-100 quantification scale. */
export const DEFAULT_UNOBSERVED_SCORE = 50;

export class EpsilonGreedy extends BasePolicy implements ScorePolicy {
  readonly feedbackKind = "score";
  readonly epsilon: number;
  readonly unobservedScore: number;
  private readonly scores = new Map<string, number[]>();
  private readonly warmUpQueue: string[];

  constructor(arms: readonly string[], options: ScoreEpsilonGreedyOptions = {}) {
    super(arms, "EpsilonGreedy", options);
    this.epsilon = validateEpsilon(options.epsilon ?? DEFAULT_EPSILON);
    this.unobservedScore = options.unobservedScore ?? DEFAULT_UNOBSERVED_SCORE;
    if (!Number.isFinite(this.unobservedScore)) {
      throw new PolicyConfigError("unobservedScore must be a finite number.");
    }
    for (const arm of this.arms) {
      this.scores.set(arm, []);
    }
    this.warmUpQueue = [...this.arms];
  }

  async select(): Promise<string> {
    const next = this.warmUpQueue.shift();
    if (next !== undefined) {
      return next;
    }

    if (this.random() < this.epsilon) {
      return this.randomArm();
    }

    let bestMean = -Infinity;
    let best: string[] = [];
    for (const [arm, mean] of this.means()) {
      if (mean > bestMean) {
        bestMean = mean;
        best = [arm];
      } else if (mean === bestMean) {
        best.push(arm);
      }
    }
    return this.randomArm(best);
  }

  async update(arm: string, score: number): Promise<void> {
    this.assertArm(arm);
    this.scores.get(arm)?.push(score);
  }

  /** Running mean per arm, in arm order. */
  means(): Map<string, number> {
    const result = new Map<string, number>();
    for (const arm of this.arms) {
      const observed = this.scores.get(arm) ?? [];
      result.set(
        arm,
        observed.length === 0
          ? this.unobservedScore
          : observed.reduce((sum, s) => sum + s, 0) / observed.length
      );
    }
    return result;
  }

  observationCount(arm: string): number {
    this.assertArm(arm);
    return this.scores.get(arm)?.length ?? 0;
  }
}
