// PURITY: CORE
// INVARIANT: render(build(...)) contains no double spaces and no leading/trailing space
// COMPLEXITY: O(n) where n = |files|

import type {
	CommandSpec,
	RunnerSettings,
	RunOptions,
} from "../types/index.js";

type CommandOptions = Pick<RunOptions, "seed" | "parallelWorkers" | "verbose">;

const nonEmpty = (part: string): boolean => part.length > 0;

/**
 * Collects the environment assignments, base command and file list.
 *
 * @pure true
 * @postcondition parallelWorkers = null ⇒ no parallel assignment in env
 */
export function buildCommandSpec(
	settings: RunnerSettings,
	options: CommandOptions,
	files: ReadonlyArray<string>,
): CommandSpec {
	const env = [
		settings.envVars.trim(),
		`${settings.seedEnvVar}=${options.seed}`,
	];
	if (options.parallelWorkers !== null) {
		env.push(`${settings.parallelEnvVar}=${options.parallelWorkers}`);
	}
	return {
		env: env.filter(nonEmpty),
		base: options.verbose ? settings.verboseCommand : settings.defaultCommand,
		files,
	};
}

/**
 * Joins the segments with single spaces. Paths are not quoted.
 *
 * @pure true
 *
 * @example
 * ```ts
 * renderCommand({ env: ["FOO=1", "SEED=42"], base: "run", files: ["a_test.x"] });
 * // "FOO=1 SEED=42 run a_test.x"
 * ```
 */
export const renderCommand = (spec: CommandSpec): string =>
	[spec.env.join(" "), spec.base.trim(), spec.files.join(" ")]
		.filter(nonEmpty)
		.join(" ");

/**
 * @pure true
 */
export const buildCommand = (
	settings: RunnerSettings,
	options: CommandOptions,
	files: ReadonlyArray<string>,
): string => renderCommand(buildCommandSpec(settings, options, files));
