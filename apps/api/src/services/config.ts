/**
 * Application Configuration
 *
 * Reads settings from the environment (load .env with dotenv first) and
 * validates them. Components receive explicit config objects built from
 * this; nothing else reads process.env.
 */

import { z } from "zod";
import { ConfigError } from "./errors.js";
import { ORACLE_MODELS } from "./oracle/types.js";

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const EnvSchema = z.object({
  OPENROUTER_API_KEY: optionalString,
  ORACLE_MODEL: z.string().min(1).default(ORACLE_MODELS.GEMINI_FLASH),
  ORACLE_FALLBACK_MODELS: z
    .string()
    .default("")
    .transform((value) =>
      value
        .split(",")
        .map((m) => m.trim())
        .filter(Boolean)
    ),
  ORACLE_MAX_RETRIES: z.coerce.number().int().min(0).default(4),
  ORACLE_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().min(0).default(30000),
  DATA_DIR: optionalString,
  REVIEWS_PATH: optionalString,
  SIM_STEPS: z.coerce.number().int().min(0).default(200),
  SIM_EPSILON: z.coerce.number().min(0).max(1).default(0.1),
  SIM_SEED: z.coerce.number().int().optional(),
});

export interface AppConfig {
  oracle: {
    apiKey?: string;
    model: string;
    fallbackModels: string[];
    retry: { maxRetries: number; baseDelay: number };
    timeoutMs: number;
  };
  dataDir?: string;
  reviewsPath?: string;
  simulation: {
    steps: number;
    epsilon: number;
    seed?: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const e = parsed.data;
  return {
    oracle: {
      apiKey: e.OPENROUTER_API_KEY,
      model: e.ORACLE_MODEL,
      fallbackModels: e.ORACLE_FALLBACK_MODELS,
      retry: { maxRetries: e.ORACLE_MAX_RETRIES, baseDelay: e.ORACLE_BASE_DELAY_MS },
      timeoutMs: e.ORACLE_TIMEOUT_MS,
    },
    dataDir: e.DATA_DIR,
    reviewsPath: e.REVIEWS_PATH,
    simulation: {
      steps: e.SIM_STEPS,
      epsilon: e.SIM_EPSILON,
      seed: e.SIM_SEED,
    },
  };
}
