/**
 * Review Bandits Experiment
 *
 * Compares every built-in policy on the same review corpus and saves the
 * result to data/experiments.json.
 *
 * Usage:
 * - npm run build
 * - OPENROUTER_API_KEY=your-key npm run experiment -- --sync --steps 300
 * - npm run experiment -- --mock          (offline keyword oracle)
 *
 * Flags:
 *   --mock        Use the keyword oracle instead of OpenRouter
 *   --sync        Synchronized experiment (same review per step and arm)
 *   --steps N     Steps per policy (default: SIM_STEPS or 200)
 *   --seed N      Seed for reproducible sampling and policies
 *   --reviews P   Path to a reviews JSON file
 */

import { config } from "dotenv";
config(); // Load .env file if present

import { parseArgs } from "./cli_args.js";
import { loadConfig } from "./services/config.js";
import { getLogDir, initLogger } from "./services/logger.js";
import { createRandomSource } from "./services/random.js";
import {
  createMockOracle,
  createReviewOracle,
  type ReviewOracle,
} from "./services/oracle/index.js";
import { POLICY_KINDS, createPolicyFactory } from "./services/policies/index.js";
import { createReviewSampler } from "./services/sampling/index.js";
import {
  buildExperimentResult,
  formatSummaryTable,
  runExperiment,
  runSynchronizedExperiment,
  summarizeExperiment,
} from "./services/simulation/index.js";
import {
  ExperimentRepository,
  getCollectionPath,
  loadReviews,
} from "./storage/index.js";

async function main() {
  const cli = parseArgs(process.argv.slice(2));
  const appConfig = loadConfig();
  const logPath = initLogger(getLogDir(appConfig.dataDir));

  console.log("═══════════════════════════════════════════════════════════════");
  console.log("  Review Bandits: Policy Comparison");
  console.log("═══════════════════════════════════════════════════════════════\n");
  console.log(`Logging to ${logPath}`);

  const steps = cli.steps ?? appConfig.simulation.steps;
  const seed = cli.seed ?? appConfig.simulation.seed;
  const random = seed === undefined ? undefined : createRandomSource(seed);

  let oracle: ReviewOracle;
  if (cli.mock) {
    console.log("⚠ Running in MOCK MODE (no LLM calls)\n");
    oracle = createMockOracle();
  } else {
    if (!appConfig.oracle.apiKey) {
      console.error("❌ OPENROUTER_API_KEY not set");
      console.error("   Run: OPENROUTER_API_KEY=your-key npm run experiment");
      console.error("   Or:  npm run experiment -- --mock (for mock mode)\n");
      process.exitCode = 1;
      return;
    }
    oracle = createReviewOracle({
      apiKey: appConfig.oracle.apiKey,
      model: appConfig.oracle.model,
      fallbackModels: appConfig.oracle.fallbackModels,
      retry: appConfig.oracle.retry,
      timeoutMs: appConfig.oracle.timeoutMs,
    });
    console.log(`✓ Oracle model: ${appConfig.oracle.model}\n`);
  }

  const reviewsPath =
    cli.reviews ?? appConfig.reviewsPath ?? getCollectionPath("reviews", appConfig.dataDir);
  const records = await loadReviews(reviewsPath);
  const sampler = createReviewSampler(records, { random });
  console.log(`Arms: ${sampler.arms.join(", ")}`);
  console.log(`Steps per policy: ${steps}${seed === undefined ? "" : `, seed ${seed}`}\n`);

  const factories = POLICY_KINDS.map((kind) =>
    createPolicyFactory(kind, sampler.arms, {
      classifier: oracle,
      epsilon: appConfig.simulation.epsilon,
      random,
    })
  );

  const history = cli.sync
    ? await runSynchronizedExperiment(factories, sampler, oracle, steps)
    : await runExperiment(
        factories.map((create) => create()),
        sampler,
        oracle,
        steps
      );

  const summaries = summarizeExperiment(history);
  console.log("\n" + formatSummaryTable(summaries) + "\n");

  const result = buildExperimentResult(
    cli.sync ? "synchronized" : "independent",
    steps,
    summaries.map((s) => s.policy),
    history
  );
  const repository = new ExperimentRepository(
    getCollectionPath("experiments", appConfig.dataDir)
  );
  await repository.save(result);
  console.log(`✓ Saved experiment ${result.experiment_id} to ${repository.filePath}`);
}

main().catch((error) => {
  console.error("Experiment failed:", error);
  process.exitCode = 1;
});
