/**
 * Policy Layer - Main Export
 *
 * Bandit policies select an arm from their belief state and update that
 * state from feedback.
 *
 * This layer does NOT:
 * - Fetch reviews
 * - Call the quantification oracle
 */

export { BasePolicy, validateEpsilon } from "./base_policy.js";
export { RandomChoice } from "./random_choice.js";
export { EpsilonGreedy, DEFAULT_UNOBSERVED_SCORE } from "./epsilon_greedy.js";
export {
  ClassificationEpsilonGreedy,
  UNOBSERVED_PROPORTION,
} from "./classification_epsilon_greedy.js";
export { FairweatherFriend } from "./fairweather_friend.js";
export {
  POLICY_KINDS,
  createPolicyFactory,
  isPolicyKind,
} from "./policy_factory.js";

export type { PolicyKind, PolicyFactoryDeps } from "./policy_factory.js";

export type {
  FeedbackKind,
  ScorePolicy,
  ReviewTextPolicy,
  BanditPolicy,
  PolicyFactory,
  PolicyOptions,
  EpsilonGreedyOptions,
  ScoreEpsilonGreedyOptions,
  LabelCounts,
} from "./types.js";
