/**
 * Review Bandits API - Main Entry Point
 *
 * This module exports:
 * - All data schemas (Zod validated)
 * - Storage (review loading, experiment persistence)
 * - Error taxonomy, configuration, logging and random sources
 * - Oracle layer (review classification and scoring)
 * - Sampling layer (non-repeating and synchronized review delivery)
 * - Policy layer (bandit policies and factories)
 * - Simulation layer (runs, experiments, summaries)
 */

export * from "./schemas/index.js";
export * from "./storage/index.js";
export * from "./services/errors.js";
export * from "./services/random.js";
export { loadConfig, type AppConfig } from "./services/config.js";
export { initLogger, restoreConsole, getLogFilePath, getLogDir } from "./services/logger.js";

// Services, namespaced to avoid conflicts
export * from "./services/index.js";
