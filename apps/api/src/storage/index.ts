/**
 * Storage Layer - Main Export
 *
 * Loads review rows and persists experiment results as JSON files.
 *
 * No sampling, policy, or simulation logic lives here.
 */

// Base utilities
export { BaseRepository, getDataDir, getCollectionPath } from "./base.js";
export type { RepositoryConfig } from "./base.js";

export {
  ExperimentRepository,
  getExperimentRepository,
} from "./experiments.js";

export { loadReviews, getDefaultReviewsPath } from "./reviews.js";
