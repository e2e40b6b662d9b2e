/**
 * Fairweather Friend
 *
 * Remembers only the last arm and its review. On select, the previous review
 * is classified: Good means go back; Bad (or no previous turn) means pick at
 * random among the other arms. With a single arm there is nowhere else to go.
 *
 * Classification happens lazily in select(), not in update().
 */

import type { ReviewClassifier } from "../oracle/types.js";
import { BasePolicy } from "./base_policy.js";
import type { PolicyOptions, ReviewTextPolicy } from "./types.js";

export class FairweatherFriend extends BasePolicy implements ReviewTextPolicy {
  readonly feedbackKind = "review_text";
  private readonly classifier: ReviewClassifier;
  private lastChoice: string | null = null;
  private lastReviewText: string | null = null;

  constructor(arms: readonly string[], classifier: ReviewClassifier, options: PolicyOptions = {}) {
    super(arms, "FairweatherFriend", options);
    this.classifier = classifier;
  }

  async select(): Promise<string> {
    // An empty previous review counts as a first turn.
    if (this.lastChoice !== null && this.lastReviewText) {
      const label = await this.classifier.classify(this.lastReviewText);
      if (label === "Good") {
        return this.lastChoice;
      }
    }

    const options = this.arms.filter((arm) => arm !== this.lastChoice);
    return this.randomArm(options.length > 0 ? options : this.arms);
  }

  async update(arm: string, reviewText: string): Promise<void> {
    this.assertArm(arm);
    this.lastChoice = arm;
    this.lastReviewText = reviewText;
  }

  get lastTurn(): { arm: string; reviewText: string } | null {
    if (this.lastChoice === null || this.lastReviewText === null) return null;
    return { arm: this.lastChoice, reviewText: this.lastReviewText };
  }
}
