/**
 * Random Choice
 *
 * Baseline policy: picks an arm uniformly at random and never learns.
 */

import { BasePolicy } from "./base_policy.js";
import type { PolicyOptions, ScorePolicy } from "./types.js";

export class RandomChoice extends BasePolicy implements ScorePolicy {
  readonly feedbackKind = "score";

  constructor(arms: readonly string[], options: PolicyOptions = {}) {
    super(arms, "RandomChoice", options);
  }

  async select(): Promise<string> {
    return this.randomArm();
  }

  async update(arm: string, _score: number): Promise<void> {
    this.assertArm(arm);
  }
}
