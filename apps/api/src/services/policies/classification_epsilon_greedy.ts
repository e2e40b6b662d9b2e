/**
 * Epsilon-Greedy (classification-based)
 *
 * Same warm-up and exploration as the score-based variant, but learns from
 * Good/Bad labels: each update classifies the review text first and counts
 * the label. Exploitation picks among the arms tied for the highest share of
 * Good reviews. An arm with no reviews counts as 1.0.
 *
 * Classification errors propagate out of update().
 */

import type { ReviewClassifier } from "../oracle/types.js";
import { BasePolicy, validateEpsilon } from "./base_policy.js";
import type { EpsilonGreedyOptions, LabelCounts, ReviewTextPolicy } from "./types.js";

const DEFAULT_EPSILON = 0.1;

export const UNOBSERVED_PROPORTION = 1.0;

export class ClassificationEpsilonGreedy extends BasePolicy implements ReviewTextPolicy {
  readonly feedbackKind = "review_text";
  readonly epsilon: number;
  private readonly classifier: ReviewClassifier;
  private readonly labelCounts = new Map<string, LabelCounts>();
  private readonly warmUpQueue: string[];

  constructor(
    arms: readonly string[],
    classifier: ReviewClassifier,
    options: EpsilonGreedyOptions = {}
  ) {
    super(arms, "ClassificationEpsilonGreedy", options);
    this.epsilon = validateEpsilon(options.epsilon ?? DEFAULT_EPSILON);
    this.classifier = classifier;
    for (const arm of this.arms) {
      this.labelCounts.set(arm, { good: 0, bad: 0 });
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

    let bestProportion = -Infinity;
    let best: string[] = [];
    for (const arm of this.arms) {
      const proportion = this.goodProportion(arm);
      if (proportion > bestProportion) {
        bestProportion = proportion;
        best = [arm];
      } else if (proportion === bestProportion) {
        best.push(arm);
      }
    }
    return this.randomArm(best);
  }

  async update(arm: string, reviewText: string): Promise<void> {
    this.assertArm(arm);
    const label = await this.classifier.classify(reviewText);
    const counts = this.labelCounts.get(arm);
    if (!counts) return;
    if (label === "Good") {
      counts.good += 1;
    } else {
      counts.bad += 1;
    }
  }

  /** Snapshot of Good/Bad counts per arm. */
  counts(): Map<string, LabelCounts> {
    const snapshot = new Map<string, LabelCounts>();
    for (const [arm, c] of this.labelCounts) {
      snapshot.set(arm, { ...c });
    }
    return snapshot;
  }

  goodProportion(arm: string): number {
    this.assertArm(arm);
    const counts = this.labelCounts.get(arm) ?? { good: 0, bad: 0 };
    const total = counts.good + counts.bad;
    return total === 0 ? UNOBSERVED_PROPORTION : counts.good / total;
  }
}
