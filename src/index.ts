// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are pure functions, typed interfaces, or APP effects

// ═══════════════════════════════════════════════════════════════════════════════
// APP (Programmatic Entry Points)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runs the selection pipeline for a ready configuration.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { createDefaultDependencies, DEFAULT_SETTINGS, runSelection } from "testpick";
 *
 * const code = await Effect.runPromise(
 *   runSelection(
 *     {
 *       settings: DEFAULT_SETTINGS,
 *       options: {
 *         paths: ["test/models"],
 *         seed: 1234,
 *         changedOnly: false,
 *         changedRef: "",
 *         parallelWorkers: null,
 *         verbose: false,
 *         dryRun: true,
 *         list: false,
 *         debug: false,
 *       },
 *     },
 *     createDefaultDependencies(),
 *   ),
 * );
 * ```
 */
export {
	createDefaultDependencies,
	type RunDependencies,
	runCli,
	runSelection,
} from "./app/runSelection.js";
export { main } from "./main.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	ChangeQuery,
	ClassifiedPath,
	CLIOptions,
	CommandSpec,
	Configuration,
	DispatchPlan,
	PathKind,
	PathSpec,
	RunnerSettings,
	RunOptions,
	SuffixMatchers,
} from "./core/types/index.js";
export type { ExitCode } from "./core/models.js";
export {
	type AppError,
	ConfigError,
	ExecError,
	UsageError,
} from "./core/errors.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export {
	buildCommand,
	buildCommandSpec,
	renderCommand,
} from "./core/command/build.js";
export { decideDispatch, describePlan } from "./core/decision.js";
export {
	classifyPathSpec,
	compileSuffixes,
	isTestFile,
	parsePathSpec,
} from "./core/paths/classify.js";
export { DEFAULT_SETTINGS, mergeSettings } from "./core/settings.js";

// ═══════════════════════════════════════════════════════════════════════════════
// SHELL SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

export { globTestFiles } from "./shell/fs/glob.js";
export {
	createGitRunner,
	detectChanges,
	type GitRunner,
} from "./shell/git/changes.js";
export { resolveTestFiles } from "./shell/selection/resolver.js";
