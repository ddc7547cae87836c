// PURITY: CORE
// INVARIANT: Configuration records are immutable for the whole invocation
// COMPLEXITY: O(1)

/**
 * Project-level settings, loaded once from defaults and `testpick.config.json`.
 *
 * @property testDir Input used when no paths are given
 * @property testSuffixes Regular-expression sources matched at the end of a path,
 *           compiled without flags (legacy escapes such as `\-` are accepted)
 * @property defaultCommand Base command receiving the file list
 * @property verboseCommand Base command used when verbose output is requested
 * @property seedEnvVar Name of the variable carrying the seed
 * @property parallelEnvVar Name of the variable carrying the worker count
 * @property envVars Static `NAME=value` assignments prepended to the command
 */
export interface RunnerSettings {
	readonly testDir: string;
	readonly testSuffixes: ReadonlyArray<string>;
	readonly defaultCommand: string;
	readonly verboseCommand: string;
	readonly seedEnvVar: string;
	readonly parallelEnvVar: string;
	readonly envVars: string;
}

/**
 * Values selected for a single run.
 *
 * @property changedRef Git revision to diff against; `""` uses git's default
 * @property parallelWorkers Worker count, or null to leave the variable unset
 */
export interface RunOptions {
	readonly paths: ReadonlyArray<string>;
	readonly seed: number;
	readonly changedOnly: boolean;
	readonly changedRef: string;
	readonly parallelWorkers: number | null;
	readonly verbose: boolean;
	readonly dryRun: boolean;
	readonly list: boolean;
	readonly debug: boolean;
}

export interface Configuration {
	readonly settings: RunnerSettings;
	readonly options: RunOptions;
}

/**
 * Flags as parsed from argv, before defaults and the config file are applied.
 *
 * `seed` stays undefined until the shell picks a random one.
 */
export interface CLIOptions {
	readonly paths: ReadonlyArray<string>;
	readonly seed?: number;
	readonly changedOnly: boolean;
	readonly changedRef: string;
	readonly parallelWorkers: number | null;
	readonly verbose: boolean;
	readonly dryRun: boolean;
	readonly list: boolean;
	readonly debug: boolean;
	readonly configPath?: string;
}
