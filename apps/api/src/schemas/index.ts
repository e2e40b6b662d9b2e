/**
 * Review Bandits Data Schemas
 *
 * These schemas define the records that enter and leave the simulation:
 * review rows loaded from disk, per-step history, and saved experiments.
 * Data read from or written to disk is validated against them at runtime.
 */

import { z } from "zod";

// =============================================================================
// 1. Feedback Record (one review row)
// =============================================================================

export const DEFAULT_ARM_FIELD = "Restaurant";

export const FeedbackRecordSchema = z
  .object({
    Review: z.string(),
    Rating: z.coerce.number().finite(),
  })
  .passthrough();

export type FeedbackRecord = z.infer<typeof FeedbackRecordSchema>;

// =============================================================================
// 2. Oracle Labels
// =============================================================================

export const ReviewLabelSchema = z.enum(["Good", "Bad"]);

export type ReviewLabel = z.infer<typeof ReviewLabelSchema>;

export const MIN_REVIEW_SCORE = 1;
export const MAX_REVIEW_SCORE = 100;

// =============================================================================
// 3. Simulation History
// =============================================================================

export const SimulationStepSchema = z.object({
  step: z.number().int().min(0),
  choice: z.string(),
  score: z.number(),
});

export const ExperimentStepSchema = SimulationStepSchema.extend({
  policy: z.string(),
});

export type SimulationStep = z.infer<typeof SimulationStepSchema>;
export type ExperimentStep = z.infer<typeof ExperimentStepSchema>;

// =============================================================================
// 4. Experiment Result
// =============================================================================

export const ExperimentModeSchema = z.enum(["independent", "synchronized"]);

export const ExperimentResultSchema = z.object({
  experiment_id: z.string().uuid(),
  mode: ExperimentModeSchema,
  num_steps: z.number().int().min(0),
  policies: z.array(z.string()),
  created_at: z.string().datetime(),
  history: z.array(ExperimentStepSchema),
});

export type ExperimentMode = z.infer<typeof ExperimentModeSchema>;
export type ExperimentResult = z.infer<typeof ExperimentResultSchema>;

// =============================================================================
// 5. Policy Summary
// =============================================================================

export const PolicySummarySchema = z.object({
  policy: z.string(),
  steps: z.number().int().min(0),
  total_score: z.number(),
  mean_score: z.number(),
  choice_counts: z.record(z.string(), z.number().int().min(0)),
  cumulative_scores: z.array(z.number()),
  rolling_average: z.array(z.number().nullable()),
});

export type PolicySummary = z.infer<typeof PolicySummarySchema>;
