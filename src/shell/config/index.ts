// PURITY: SHELL (filesystem read, random seed)
// INVARIANT: The returned Configuration is not mutated afterwards

import { Either } from "effect";

import type { ConfigError } from "../../core/errors.js";
import type {
	CLIOptions,
	Configuration,
	RunOptions,
} from "../../core/types/index.js";
import { loadSettings } from "./loader.js";

export { parseCLIArgs, USAGE } from "./cli.js";
export { CONFIG_FILE_NAME, loadSettings } from "./loader.js";

export const MAX_SEED = 0xffff;

/**
 * Random seed in [0, MAX_SEED].
 *
 * @pure false
 */
export const randomSeed = (): number =>
	Math.floor(Math.random() * (MAX_SEED + 1));

/**
 * Fills in the seed when the command line left it out.
 *
 * @pure true when `pickSeed` is
 */
export function toRunOptions(
	cli: CLIOptions,
	pickSeed: () => number = randomSeed,
): RunOptions {
	return {
		paths: cli.paths,
		seed: cli.seed ?? pickSeed(),
		changedOnly: cli.changedOnly,
		changedRef: cli.changedRef,
		parallelWorkers: cli.parallelWorkers,
		verbose: cli.verbose,
		dryRun: cli.dryRun,
		list: cli.list,
		debug: cli.debug,
	};
}

/**
 * Builds the invocation's configuration from parsed flags and the config file.
 *
 * @pure false
 */
export function loadConfiguration(
	cli: CLIOptions,
	cwd: string = process.cwd(),
	pickSeed: () => number = randomSeed,
): Either.Either<Configuration, ConfigError> {
	return Either.map(loadSettings(cli.configPath, cwd), (settings) => ({
		settings,
		options: toRunOptions(cli, pickSeed),
	}));
}
