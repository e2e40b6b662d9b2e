/**
 * Base Policy
 *
 * Holds the arm list shared by every policy and the checks that go with it.
 * Subclasses own their belief state and decide how to select and update.
 */

import { InvalidArmError, PolicyConfigError, UnknownArmError } from "../errors.js";
import { defaultRandom, pickRandom, type RandomSource } from "../random.js";
import type { FeedbackKind, PolicyOptions } from "./types.js";

export abstract class BasePolicy {
  readonly name: string;
  abstract readonly feedbackKind: FeedbackKind;
  readonly arms: readonly string[];
  protected readonly random: RandomSource;
  private readonly armSet: ReadonlySet<string>;

  constructor(arms: readonly string[], defaultName: string, options: PolicyOptions = {}) {
    if (arms.length === 0) {
      throw new InvalidArmError("Arm list cannot be empty.");
    }
    const unique = new Set(arms);
    if (unique.size !== arms.length) {
      throw new InvalidArmError("Arm list contains duplicates.");
    }
    this.arms = [...arms];
    this.armSet = unique;
    this.random = options.random ?? defaultRandom;
    this.name = options.name ?? defaultName;
  }

  abstract select(): Promise<string>;

  protected randomArm(candidates: readonly string[] = this.arms): string {
    return pickRandom(candidates, this.random);
  }

  protected assertArm(arm: string): void {
    if (!this.armSet.has(arm)) {
      throw new UnknownArmError(arm);
    }
  }
}

export function validateEpsilon(epsilon: number): number {
  if (!Number.isFinite(epsilon) || epsilon < 0 || epsilon > 1) {
    throw new PolicyConfigError(`Epsilon must be between 0.0 and 1.0, got ${epsilon}.`);
  }
  return epsilon;
}
