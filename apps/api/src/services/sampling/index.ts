/**
 * Sampling Layer - Main Export
 *
 * Non-repeating review delivery per arm, with an optional
 * timestep-synchronized mode for fair multi-policy comparison.
 */

export {
  ReviewSampler,
  createReviewSampler,
} from "./review_sampler.js";

export type { ReviewSamplerOptions } from "./review_sampler.js";

export {
  SynchronizedReviewSampler,
  createSynchronizedReviewSampler,
} from "./synchronized_review_sampler.js";
