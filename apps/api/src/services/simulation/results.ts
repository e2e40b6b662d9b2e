/**
 * Experiment Results
 *
 * Aggregates experiment history into per-policy series for reporting:
 * cumulative score, rolling average, and how often each arm was chosen.
 */

import { v4 as uuidv4 } from "uuid";
import type {
  ExperimentMode,
  ExperimentResult,
  ExperimentStep,
  PolicySummary,
} from "../../schemas/index.js";

export interface SummaryOptions {
  /** Window for the rolling average (default: 25) */
  windowSize?: number;
}

const DEFAULT_WINDOW_SIZE = 25;

/**
 * One summary per policy, in the order policies first appear.
 * Steps are ordered by step index before aggregating.
 */
export function summarizeExperiment(
  history: readonly ExperimentStep[],
  options: SummaryOptions = {}
): PolicySummary[] {
  const windowSize = options.windowSize ?? DEFAULT_WINDOW_SIZE;
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new RangeError(`windowSize must be a positive integer, got ${windowSize}`);
  }

  const byPolicy = new Map<string, ExperimentStep[]>();
  for (const entry of history) {
    const steps = byPolicy.get(entry.policy);
    if (steps) {
      steps.push(entry);
    } else {
      byPolicy.set(entry.policy, [entry]);
    }
  }

  return [...byPolicy.entries()].map(([policy, steps]) => {
    const ordered = [...steps].sort((a, b) => a.step - b.step);
    const scores = ordered.map((s) => s.score);

    const cumulative: number[] = [];
    let running = 0;
    for (const score of scores) {
      running += score;
      cumulative.push(running);
    }

    const choiceCounts: Record<string, number> = {};
    for (const s of ordered) {
      choiceCounts[s.choice] = (choiceCounts[s.choice] ?? 0) + 1;
    }

    return {
      policy,
      steps: ordered.length,
      total_score: running,
      mean_score: ordered.length === 0 ? 0 : running / ordered.length,
      choice_counts: choiceCounts,
      cumulative_scores: cumulative,
      rolling_average: rollingAverage(scores, windowSize),
    };
  });
}

/**
 * Trailing mean over `windowSize` values; null until the window fills.
 */
export function rollingAverage(values: readonly number[], windowSize: number): (number | null)[] {
  const result: (number | null)[] = [];
  let windowSum = 0;
  values.forEach((value, i) => {
    windowSum += value;
    if (i >= windowSize) {
      windowSum -= values[i - windowSize];
    }
    result.push(i + 1 >= windowSize ? windowSum / windowSize : null);
  });
  return result;
}

/**
 * Plain-text table of totals and means, one row per policy.
 */
export function formatSummaryTable(summaries: readonly PolicySummary[]): string {
  const header = ["Policy", "Steps", "Total", "Mean", "Most chosen"];
  const rows = summaries.map((s) => [
    s.policy,
    String(s.steps),
    s.total_score.toFixed(1),
    s.mean_score.toFixed(3),
    mostChosen(s.choice_counts),
  ]);

  const widths = header.map((h, col) =>
    Math.max(h.length, ...rows.map((row) => row[col].length))
  );
  const formatRow = (row: string[]) =>
    row.map((cell, col) => cell.padEnd(widths[col])).join("  ").trimEnd();

  return [
    formatRow(header),
    widths.map((w) => "-".repeat(w)).join("  "),
    ...rows.map(formatRow),
  ].join("\n");
}

function mostChosen(counts: Record<string, number>): string {
  let best: string | null = null;
  let bestCount = 0;
  for (const [arm, count] of Object.entries(counts)) {
    if (count > bestCount) {
      best = arm;
      bestCount = count;
    }
  }
  return best === null ? "-" : `${best} (${bestCount})`;
}

export function buildExperimentResult(
  mode: ExperimentMode,
  numSteps: number,
  policies: readonly string[],
  history: ExperimentStep[]
): ExperimentResult {
  return {
    experiment_id: uuidv4(),
    mode,
    num_steps: numSteps,
    policies: [...policies],
    created_at: new Date().toISOString(),
    history,
  };
}
