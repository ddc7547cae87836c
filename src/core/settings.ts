// PURITY: CORE
// INVARIANT: mergeSettings never mutates its inputs
// COMPLEXITY: O(k) where k = |overrides|

import type { RunnerSettings } from "./types/index.js";

/**
 * Settings used when no config file overrides them.
 */
export const DEFAULT_SETTINGS: RunnerSettings = {
	testDir: "test",
	testSuffixes: ["_test\\.[^/]+"],
	defaultCommand: "npm test --",
	verboseCommand: "npm test -- --reporter=verbose",
	seedEnvVar: "SEED",
	parallelEnvVar: "PARALLEL_WORKERS",
	envVars: "",
};

/**
 * Applies validated overrides on top of a base settings record.
 *
 * @pure true
 * @postcondition ∀k ∉ keys(overrides): result[k] = base[k]
 */
export const mergeSettings = (
	base: RunnerSettings,
	overrides: Partial<RunnerSettings>,
): RunnerSettings => ({ ...base, ...overrides });
