/**
 * Review Bandits Services - Main Export
 */

// Oracle - Review classification and quantification (namespaced to avoid conflicts)
export * as oracle from "./oracle/index.js";

// Sampling - Non-repeating review delivery per arm
export * as sampling from "./sampling/index.js";

// Policies - Bandit selection and learning
export * as policies from "./policies/index.js";

// Simulation - Runs, experiments and summaries
export * as simulation from "./simulation/index.js";
