/**
 * Synchronized Review Sampler
 *
 * A ReviewSampler that caches draws by (timestep, arm). When several policies
 * choose the same arm at the same timestep they receive the identical record,
 * so differences between policies are not confounded by sampling luck.
 *
 * The cache lives until resetSynchronization() or resetAll(); call one of
 * them between independent experiments.
 */

import type { FeedbackRecord } from "../../schemas/index.js";
import { ExhaustedError } from "../errors.js";
import { ReviewSampler, type ReviewSamplerOptions } from "./review_sampler.js";

export class SynchronizedReviewSampler extends ReviewSampler {
  private readonly timestepCache = new Map<string, FeedbackRecord>();
  private timestep = 0;

  constructor(records: readonly FeedbackRecord[], options: ReviewSamplerOptions = {}) {
    super(records, options);
  }

  /**
   * Build a synchronized sampler over the same records, arms and random
   * source. A sampler that is already synchronized is returned as-is.
   */
  static wrap(sampler: ReviewSampler): SynchronizedReviewSampler {
    if (sampler instanceof SynchronizedReviewSampler) {
      return sampler;
    }
    return new SynchronizedReviewSampler(sampler.records, {
      armField: sampler.armField,
      arms: sampler.arms,
      random: sampler.randomSource,
    });
  }

  get currentTimestep(): number {
    return this.timestep;
  }

  get cacheSize(): number {
    return this.timestepCache.size;
  }

  setTimestep(timestep: number): void {
    this.timestep = timestep;
  }

  /**
   * Return the record for (timestep, arm), drawing and caching it on a miss.
   * A drained pool is reset and drawn from once more.
   */
  getSynchronizedReview(arm: string, timestep: number = this.timestep): FeedbackRecord {
    this.assertArm(arm);

    const key = cacheKey(timestep, arm);
    const cached = this.timestepCache.get(key);
    if (cached) {
      return cached;
    }

    let record: FeedbackRecord;
    try {
      record = this.getRandomReview(arm);
    } catch (error) {
      if (!(error instanceof ExhaustedError)) throw error;
      this.reset(arm);
      record = this.getRandomReview(arm);
    }

    this.timestepCache.set(key, record);
    return record;
  }

  /** Clear the cache and rewind the timestep counter. */
  resetSynchronization(): void {
    this.timestepCache.clear();
    this.timestep = 0;
  }

  /** Reset the per-arm pools and the synchronization state. */
  override resetAll(): void {
    super.resetAll();
    this.resetSynchronization();
  }
}

function cacheKey(timestep: number, arm: string): string {
  return JSON.stringify([timestep, arm]);
}

export function createSynchronizedReviewSampler(
  records: readonly FeedbackRecord[],
  options?: ReviewSamplerOptions
): SynchronizedReviewSampler {
  return new SynchronizedReviewSampler(records, options);
}
