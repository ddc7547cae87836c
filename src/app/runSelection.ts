// PURITY: APP (no process.exit; composition only)
// EFFECT: Effect<ExitCode, ConfigError | ExecError>
// INVARIANT: Pipeline runs resolution → build → dispatch sequentially; configuration is read-only
// COMPLEXITY: O(n log n) where n = candidate test files

import { Effect } from "effect";

import { buildCommand } from "../core/command/build.js";
import { decideDispatch, describePlan } from "../core/decision.js";
import type { ConfigError, ExecError } from "../core/errors.js";
import { EXIT_FAILURE, type ExitCode } from "../core/models.js";
import { compileSuffixes } from "../core/paths/classify.js";
import type { Configuration } from "../core/types/index.js";
import { loadConfiguration, parseCLIArgs, USAGE } from "../shell/config/index.js";
import { dispatch, type ShellRunner } from "../shell/dispatch/index.js";
import { createGitRunner, type GitRunner } from "../shell/git/changes.js";
import { createDebugLog, elapsedSince } from "../shell/output/debug.js";
import { resolveTestFiles } from "../shell/selection/resolver.js";
import { runShellCommand } from "../shell/utils/exec.js";

/**
 * Everything the pipeline touches outside its own process state.
 */
export interface RunDependencies {
	readonly cwd: string;
	readonly git: GitRunner;
	readonly shell: ShellRunner;
	readonly print: (line: string) => void;
	readonly printError: (line: string) => void;
}

/**
 * Real git, a real shell, and the console.
 *
 * @pure false
 */
export function createDefaultDependencies(
	cwd: string = process.cwd(),
): RunDependencies {
	return {
		cwd,
		git: createGitRunner(cwd),
		shell: (command) => runShellCommand(command, { cwd }),
		print: (line) => console.log(line),
		printError: (line) => console.error(line),
	};
}

/**
 * Resolves the test files, builds the command and dispatches it.
 *
 * @returns Exit status of the test command, or 0 when nothing was executed
 *
 * @pure false
 * @effect Effect<ExitCode, ConfigError | ExecError>
 */
export function runSelection(
	configuration: Configuration,
	deps: RunDependencies,
): Effect.Effect<ExitCode, ConfigError | ExecError> {
	return Effect.gen(function* () {
		const { settings, options } = configuration;
		const debug = createDebugLog(options.debug, deps.printError);
		const started = performance.now();

		const matchers = yield* compileSuffixes(settings.testSuffixes);
		const files = yield* resolveTestFiles(options, {
			settings,
			matchers,
			cwd: deps.cwd,
			git: deps.git,
			debug,
		});
		debug.log(`resolved ${files.length} file(s) in ${elapsedSince(started)}ms`);

		const command = buildCommand(settings, options, files);
		debug.log(`command: ${command}`);
		debug.log(`action: ${describePlan(decideDispatch(options, files))}`);

		const code = yield* dispatch(options, files, command, {
			run: deps.shell,
			print: deps.print,
		});
		debug.log(`exit ${code} after ${elapsedSince(started)}ms`);
		return code;
	});
}

/**
 * Full command-line run: parse flags, load configuration, run the pipeline.
 *
 * Usage, configuration and spawn errors are reported on stderr and become
 * exit code 1.
 *
 * @pure false
 * @effect Effect<ExitCode, never>
 */
export function runCli(
	args: ReadonlyArray<string>,
	deps: RunDependencies = createDefaultDependencies(),
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const cli = yield* parseCLIArgs(args);
		const configuration = yield* loadConfiguration(cli, deps.cwd);
		return yield* runSelection(configuration, deps);
	}).pipe(
		Effect.catchTags({
			UsageError: (error) =>
				Effect.sync(() => {
					deps.printError(error.message);
					deps.printError(USAGE);
					return EXIT_FAILURE;
				}),
			ConfigError: (error) =>
				Effect.sync(() => {
					deps.printError(error.message);
					return EXIT_FAILURE;
				}),
			ExecError: (error) =>
				Effect.sync(() => {
					deps.printError(`Cannot run ${error.command}: ${error.detail}`);
					return EXIT_FAILURE;
				}),
		}),
	);
}
