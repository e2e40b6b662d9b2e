/**
 * Policy Factories
 *
 * Synchronized experiments need a fresh, untrained policy per run. Callers
 * hand over factories instead of instances; these helpers build factories for
 * the built-in policies by name.
 */

import { PolicyConfigError } from "../errors.js";
import type { ReviewClassifier } from "../oracle/types.js";
import { ClassificationEpsilonGreedy } from "./classification_epsilon_greedy.js";
import { EpsilonGreedy } from "./epsilon_greedy.js";
import { FairweatherFriend } from "./fairweather_friend.js";
import { RandomChoice } from "./random_choice.js";
import type { PolicyFactory, ScoreEpsilonGreedyOptions } from "./types.js";

export const POLICY_KINDS = [
  "random",
  "epsilon-greedy",
  "classification-epsilon-greedy",
  "fairweather-friend",
] as const;

export type PolicyKind = (typeof POLICY_KINDS)[number];

export interface PolicyFactoryDeps extends ScoreEpsilonGreedyOptions {
  /** Required by the classification-based policies */
  classifier?: ReviewClassifier;
}

export function isPolicyKind(value: string): value is PolicyKind {
  return (POLICY_KINDS as readonly string[]).includes(value);
}

export function createPolicyFactory(
  kind: PolicyKind,
  arms: readonly string[],
  deps: PolicyFactoryDeps = {}
): PolicyFactory {
  const { classifier, ...options } = deps;
  const common = { name: options.name, random: options.random };

  switch (kind) {
    case "random":
      return () => new RandomChoice(arms, common);
    case "epsilon-greedy":
      return () => new EpsilonGreedy(arms, options);
    case "classification-epsilon-greedy": {
      const required = requireClassifier(kind, classifier);
      return () =>
        new ClassificationEpsilonGreedy(arms, required, {
          ...common,
          epsilon: options.epsilon,
        });
    }
    case "fairweather-friend": {
      const required = requireClassifier(kind, classifier);
      return () => new FairweatherFriend(arms, required, common);
    }
  }
}

function requireClassifier(
  kind: PolicyKind,
  classifier: ReviewClassifier | undefined
): ReviewClassifier {
  if (!classifier) {
    throw new PolicyConfigError(`Policy "${kind}" requires a review classifier.`);
  }
  return classifier;
}
