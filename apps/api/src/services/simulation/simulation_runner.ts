/**
 * Simulation Runner
 *
 * Drives the select -> sample -> score -> update loop.
 *
 * One step:
 * 1. The policy selects an arm
 * 2. The sampler supplies an unseen review for it (one reset on exhaustion)
 * 3. Feedback goes to the policy: raw text for review_text policies, an
 *    oracle score for score policies (falling back to the record's rating
 *    when quantification fails)
 * 4. The record's own rating is recorded as the step's evaluation score
 *
 * Runs are SEQUENTIAL. A synchronized experiment shares one cache across
 * its policies and must not be parallelized.
 */

import type {
  ExperimentStep,
  FeedbackRecord,
  SimulationStep,
} from "../../schemas/index.js";
import {
  ExhaustedError,
  OracleRequestError,
  PolicyConfigError,
  QuantificationError,
} from "../errors.js";
import type { ReviewQuantifier } from "../oracle/types.js";
import type { BanditPolicy, PolicyFactory } from "../policies/types.js";
import { ReviewSampler, SynchronizedReviewSampler } from "../sampling/index.js";

export interface SimulationConfig {
  /** Log progress every N steps; 0 disables (default: 100) */
  progressEvery?: number;
}

const DEFAULT_CONFIG: Required<SimulationConfig> = {
  progressEvery: 100,
};

type DrawReview = (arm: string, step: number) => FeedbackRecord;

/**
 * Run one policy for `numSteps` steps on a freshly reset sampler.
 */
export async function runSimulation(
  policy: BanditPolicy,
  sampler: ReviewSampler,
  oracle: ReviewQuantifier,
  numSteps: number,
  config: SimulationConfig = {}
): Promise<SimulationStep[]> {
  assertStepCount(numSteps);
  sampler.resetAll();
  return simulate(policy, oracle, numSteps, { ...DEFAULT_CONFIG, ...config }, (arm) =>
    drawWithReset(sampler, arm)
  );
}

/**
 * Run each policy in turn on the shared sampler (reset before each run) and
 * concatenate the histories, tagged with the policy name. Names must be
 * unique within an experiment.
 */
export async function runExperiment(
  policies: readonly BanditPolicy[],
  sampler: ReviewSampler,
  oracle: ReviewQuantifier,
  numSteps: number,
  config: SimulationConfig = {}
): Promise<ExperimentStep[]> {
  assertStepCount(numSteps);
  assertUniqueNames(policies);
  const results: ExperimentStep[] = [];

  for (const [i, policy] of policies.entries()) {
    console.log(`[Simulation] Experiment ${i + 1}/${policies.length}: ${policy.name}`);
    const history = await runSimulation(policy, sampler, oracle, numSteps, config);
    results.push(...tagHistory(history, policy.name));
  }

  return results;
}

/**
 * Run a fresh policy from each factory against timestep-synchronized
 * reviews: whenever two policies choose the same arm at the same step they
 * see the same record.
 *
 * Every factory is called once up front so duplicate names are rejected
 * before any step runs. Pools and the synchronization cache are reset once,
 * before the first policy. Cache misses keep drawing from the shared epoch.
 */
export async function runSynchronizedExperiment(
  factories: readonly PolicyFactory[],
  sampler: ReviewSampler,
  oracle: ReviewQuantifier,
  numSteps: number,
  config: SimulationConfig = {}
): Promise<ExperimentStep[]> {
  assertStepCount(numSteps);
  const opts = { ...DEFAULT_CONFIG, ...config };
  const policies = factories.map((factory) => factory());
  assertUniqueNames(policies);

  const synchronized = SynchronizedReviewSampler.wrap(sampler);
  synchronized.resetAll();

  const results: ExperimentStep[] = [];

  for (const [i, policy] of policies.entries()) {
    console.log(
      `[Simulation] Synchronized experiment ${i + 1}/${policies.length}: ${policy.name}`
    );
    const history = await simulate(policy, oracle, numSteps, opts, (arm, step) => {
      synchronized.setTimestep(step);
      return synchronized.getSynchronizedReview(arm, step);
    });
    results.push(...tagHistory(history, policy.name));
  }

  return results;
}

// =============================================================================
// Step Loop
// =============================================================================

async function simulate(
  policy: BanditPolicy,
  oracle: ReviewQuantifier,
  numSteps: number,
  config: Required<SimulationConfig>,
  draw: DrawReview
): Promise<SimulationStep[]> {
  const history: SimulationStep[] = [];
  let fallbackCount = 0;

  for (let step = 0; step < numSteps; step++) {
    const arm = await policy.select();
    const record = draw(arm, step);

    const usedFallback = await applyFeedback(policy, arm, record, oracle, step);
    if (usedFallback) fallbackCount++;

    history.push({ step, choice: arm, score: record.Rating });

    if (config.progressEvery > 0 && (step + 1) % config.progressEvery === 0) {
      console.log(`[Simulation] ${policy.name}: step ${step + 1}/${numSteps}`);
    }
  }

  console.log(
    `[Simulation] ${policy.name} finished ${numSteps} steps` +
    (fallbackCount > 0 ? ` (${fallbackCount} rating fallbacks)` : "")
  );

  return history;
}

/**
 * Feed one observation to the policy.
 * Returns true when the record's rating stood in for a failed quantification.
 */
async function applyFeedback(
  policy: BanditPolicy,
  arm: string,
  record: FeedbackRecord,
  oracle: ReviewQuantifier,
  step: number
): Promise<boolean> {
  if (policy.feedbackKind === "review_text") {
    await policy.update(arm, record.Review);
    return false;
  }

  let score: number;
  let usedFallback = false;
  try {
    score = await oracle.quantify(record.Review);
  } catch (error) {
    if (!(error instanceof QuantificationError || error instanceof OracleRequestError)) {
      throw error;
    }
    console.warn(
      `[Simulation] Step ${step}: quantify failed, using original rating. Error: ${error.message}`
    );
    score = record.Rating;
    usedFallback = true;
  }

  await policy.update(arm, score);
  return usedFallback;
}

function drawWithReset(sampler: ReviewSampler, arm: string): FeedbackRecord {
  try {
    return sampler.getRandomReview(arm);
  } catch (error) {
    if (!(error instanceof ExhaustedError)) throw error;
    sampler.reset(arm);
    return sampler.getRandomReview(arm);
  }
}

function tagHistory(history: SimulationStep[], policy: string): ExperimentStep[] {
  return history.map((entry) => ({ ...entry, policy }));
}

function assertUniqueNames(policies: readonly BanditPolicy[]): void {
  const seen = new Set<string>();
  for (const policy of policies) {
    if (seen.has(policy.name)) {
      throw new PolicyConfigError(
        `Duplicate policy name "${policy.name}"; give each policy a distinct name.`
      );
    }
    seen.add(policy.name);
  }
}

function assertStepCount(numSteps: number): void {
  if (!Number.isInteger(numSteps) || numSteps < 0) {
    throw new RangeError(`numSteps must be a non-negative integer, got ${numSteps}`);
  }
}
