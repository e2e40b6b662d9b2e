/**
 * Review Sampler
 *
 * Dispenses review records per arm without replacement.
 *
 * On the first request for an arm in an epoch, the arm's record indices are
 * shuffled into a working list; each request pops one index off the tail.
 * When the list is empty the epoch is over and requests raise ExhaustedError
 * until the arm is reset.
 *
 * This component does NOT:
 * - Score or classify reviews
 * - Recover from exhaustion on its own
 */

import { DEFAULT_ARM_FIELD, type FeedbackRecord } from "../../schemas/index.js";
import { ExhaustedError, InvalidArmError, UnknownArmError } from "../errors.js";
import { defaultRandom, shuffleInPlace, type RandomSource } from "../random.js";

export interface ReviewSamplerOptions {
  /** Column holding the arm name (default: "Restaurant") */
  armField?: string;
  /** Arms to include; each must have records. Omitted: every arm present in the records. */
  arms?: readonly string[];
  /** Source of randomness for shuffling (default: Math.random) */
  random?: RandomSource;
}

export class ReviewSampler {
  readonly armField: string;
  protected readonly random: RandomSource;
  private readonly armList: readonly string[];
  private readonly armSet: ReadonlySet<string>;
  private readonly data: readonly FeedbackRecord[];
  private readonly recordIndices = new Map<string, readonly number[]>();
  private readonly workingLists = new Map<string, number[]>();

  constructor(records: readonly FeedbackRecord[], options: ReviewSamplerOptions = {}) {
    this.armField = options.armField ?? DEFAULT_ARM_FIELD;
    this.random = options.random ?? defaultRandom;

    const tagged = records.map((record, index) => ({
      record,
      arm: readArm(record, this.armField, index),
    }));

    if (options.arms) {
      const requested = new Set(options.arms);
      if (requested.size === 0) {
        throw new InvalidArmError("Arm list cannot be empty.");
      }
      if (requested.size !== options.arms.length) {
        throw new InvalidArmError("Arm list contains duplicates.");
      }
      this.armList = [...options.arms];
      this.data = tagged.filter((t) => requested.has(t.arm)).map((t) => t.record);
    } else {
      this.armList = [...new Set(tagged.map((t) => t.arm))];
      if (this.armList.length === 0) {
        throw new InvalidArmError("No arms found in the review records.");
      }
      this.data = tagged.map((t) => t.record);
    }

    this.armSet = new Set(this.armList);

    const grouped = new Map<string, number[]>();
    this.data.forEach((record, index) => {
      const arm = readArm(record, this.armField, index);
      const bucket = grouped.get(arm);
      if (bucket) {
        bucket.push(index);
      } else {
        grouped.set(arm, [index]);
      }
    });
    for (const [arm, indices] of grouped) {
      this.recordIndices.set(arm, indices);
    }

    const empty = this.armList.filter((arm) => !this.recordIndices.has(arm));
    if (empty.length > 0) {
      throw new InvalidArmError(`No reviews for arm(s): ${empty.join(", ")}`);
    }
  }

  /** Configured arms, in first-seen (or requested) order. */
  get arms(): readonly string[] {
    return this.armList;
  }

  /** Records belonging to the configured arms. */
  get records(): readonly FeedbackRecord[] {
    return this.data;
  }

  get randomSource(): RandomSource {
    return this.random;
  }

  hasArm(arm: string): boolean {
    return this.armSet.has(arm);
  }

  recordCount(arm: string): number {
    this.assertArm(arm);
    return this.recordIndices.get(arm)?.length ?? 0;
  }

  /**
   * Records still available for the arm in the current epoch.
   * Before the epoch starts this is the full count.
   */
  remaining(arm: string): number {
    this.assertArm(arm);
    const working = this.workingLists.get(arm);
    return working ? working.length : this.recordCount(arm);
  }

  /**
   * Return a random, not-yet-seen record for the arm.
   *
   * @throws UnknownArmError if the arm is not configured
   * @throws ExhaustedError if the arm's epoch is complete
   */
  getRandomReview(arm: string): FeedbackRecord {
    this.assertArm(arm);

    const indices = this.recordIndices.get(arm) ?? [];

    let working = this.workingLists.get(arm);
    if (!working) {
      working = shuffleInPlace([...indices], this.random);
      this.workingLists.set(arm, working);
    }

    const index = working.pop();
    if (index === undefined) {
      throw new ExhaustedError(arm);
    }
    return this.data[index];
  }

  /**
   * Start a new epoch for one arm. The next draw reshuffles the full pool.
   */
  reset(arm: string): void {
    this.assertArm(arm);
    this.workingLists.delete(arm);
  }

  /** Start a new epoch for every arm. */
  resetPools(): void {
    this.workingLists.clear();
  }

  /** Restore identical starting conditions before an independent run. */
  resetAll(): void {
    this.resetPools();
  }

  protected assertArm(arm: string): void {
    if (!this.armSet.has(arm)) {
      throw new UnknownArmError(arm);
    }
  }
}

function readArm(record: FeedbackRecord, armField: string, index: number): string {
  const value = record[armField];
  if (typeof value !== "string" || value.length === 0) {
    throw new InvalidArmError(`Record ${index} has no "${armField}" value.`);
  }
  return value;
}

export function createReviewSampler(
  records: readonly FeedbackRecord[],
  options?: ReviewSamplerOptions
): ReviewSampler {
  return new ReviewSampler(records, options);
}
