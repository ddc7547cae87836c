// PURITY: SHELL (reads process.argv by default; parsing itself is pure)
// INVARIANT: Every argument is either consumed by a flag or kept as a path, in order
// COMPLEXITY: O(n) where n = |args|

import { Either } from "effect";

import { UsageError } from "../../core/errors.js";
import type { CLIOptions } from "../../core/types/index.js";

export const USAGE =
	"Usage: testpick [-c] [--changed-ref REF] [-s SEED] [-j N] [-v] [-n] [-l] [-d] [--config FILE] [path[:line] ...]";

interface ParseState {
	readonly paths: ReadonlyArray<string>;
	readonly seed: number | undefined;
	readonly changedOnly: boolean;
	readonly changedRef: string;
	readonly parallelWorkers: number | null;
	readonly verbose: boolean;
	readonly dryRun: boolean;
	readonly list: boolean;
	readonly debug: boolean;
	readonly configPath: string | undefined;
}

interface ArgProcessResult {
	readonly state: ParseState;
	readonly skipNext: boolean;
}

type BooleanFlagHandler = (current: ParseState) => ParseState;

type ValueFlagHandler = (
	flag: string,
	value: string,
	current: ParseState,
) => Either.Either<ParseState, UsageError>;

const INITIAL_STATE: ParseState = {
	paths: [],
	seed: undefined,
	changedOnly: false,
	changedRef: "",
	parallelWorkers: null,
	verbose: false,
	dryRun: false,
	list: false,
	debug: false,
	configPath: undefined,
};

function parseNonNegativeInteger(
	flag: string,
	value: string,
): Either.Either<number, UsageError> {
	if (!/^\d+$/u.test(value)) {
		return Either.left(
			new UsageError({
				message: `${flag} expects a non-negative integer, got "${value}"`,
			}),
		);
	}
	const parsed = Number.parseInt(value, 10);
	if (!Number.isSafeInteger(parsed)) {
		return Either.left(
			new UsageError({
				message: `${flag} is too large, got "${value}" (maximum ${Number.MAX_SAFE_INTEGER})`,
			}),
		);
	}
	return Either.right(parsed);
}

function createIntegerFlagHandler(
	apply: (current: ParseState, value: number) => ParseState,
): ValueFlagHandler {
	return (flag, value, current) =>
		Either.map(parseNonNegativeInteger(flag, value), (parsed) =>
			apply(current, parsed),
		);
}

const seedHandler = createIntegerFlagHandler((s, seed) => ({ ...s, seed }));
const parallelHandler = createIntegerFlagHandler((s, parallelWorkers) => ({
	...s,
	parallelWorkers,
}));

const valueHandlers: Partial<Record<string, ValueFlagHandler>> = {
	"--seed": seedHandler,
	"-s": seedHandler,
	"--parallel": parallelHandler,
	"-j": parallelHandler,
	"--changed-ref": (_flag, value, current) =>
		Either.right({ ...current, changedRef: value, changedOnly: true }),
	"--config": (_flag, value, current) =>
		Either.right({ ...current, configPath: value }),
};

const changedFlag: BooleanFlagHandler = (s) => ({ ...s, changedOnly: true });
const verboseFlag: BooleanFlagHandler = (s) => ({ ...s, verbose: true });
const dryRunFlag: BooleanFlagHandler = (s) => ({ ...s, dryRun: true });
const listFlag: BooleanFlagHandler = (s) => ({ ...s, list: true });
const debugFlag: BooleanFlagHandler = (s) => ({ ...s, debug: true });

const booleanHandlers: Partial<Record<string, BooleanFlagHandler>> = {
	"--changed": changedFlag,
	"-c": changedFlag,
	"--verbose": verboseFlag,
	"-v": verboseFlag,
	"--dry-run": dryRunFlag,
	"-n": dryRunFlag,
	"--list": listFlag,
	"-l": listFlag,
	"--debug": debugFlag,
	"-d": debugFlag,
};

/**
 * Splits `--name=value` into its parts; other arguments have no inline value.
 */
function splitInlineValue(arg: string): {
	readonly flag: string;
	readonly inline: string | undefined;
} {
	const eq = arg.indexOf("=");
	if (!arg.startsWith("--") || eq < 0) return { flag: arg, inline: undefined };
	return { flag: arg.slice(0, eq), inline: arg.slice(eq + 1) };
}

function processFlag(
	arg: string,
	next: string | undefined,
	current: ParseState,
): Either.Either<ArgProcessResult, UsageError> {
	const { flag, inline } = splitInlineValue(arg);

	const booleanHandler = booleanHandlers[flag];
	if (booleanHandler !== undefined) {
		if (inline !== undefined) {
			return Either.left(
				new UsageError({ message: `${flag} does not take a value` }),
			);
		}
		return Either.right({ state: booleanHandler(current), skipNext: false });
	}

	const valueHandler = valueHandlers[flag];
	if (valueHandler === undefined) {
		return Either.left(new UsageError({ message: `Unknown option: ${flag}` }));
	}
	const value = inline ?? next;
	if (value === undefined) {
		return Either.left(
			new UsageError({ message: `${flag} requires a value` }),
		);
	}
	return Either.map(valueHandler(flag, value, current), (state) => ({
		state,
		skipNext: inline === undefined,
	}));
}

function toOptions(state: ParseState): CLIOptions {
	const { seed, configPath, ...rest } = state;
	return {
		...rest,
		...(seed === undefined ? {} : { seed }),
		...(configPath === undefined ? {} : { configPath }),
	};
}

/**
 * Parses command-line arguments.
 *
 * Arguments not starting with `-` are paths (a lone `-` too); everything
 * after `--` is a path.
 *
 * @param args Arguments without the node and script entries
 * @returns Parsed options, or UsageError for unknown flags and bad values
 *
 * @example
 * ```ts
 * parseCLIArgs(["-c", "--seed", "7", "test/models"]);
 * // Either.right({ paths: ["test/models"], seed: 7, changedOnly: true, ... })
 * ```
 */
export function parseCLIArgs(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Either.Either<CLIOptions, UsageError> {
	let state = INITIAL_STATE;
	let pathsOnly = false;

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		if (!pathsOnly && arg === "--") {
			pathsOnly = true;
			continue;
		}
		if (pathsOnly || !arg.startsWith("-") || arg === "-") {
			state = { ...state, paths: [...state.paths, arg] };
			continue;
		}

		const result = processFlag(arg, args.at(i + 1), state);
		if (Either.isLeft(result)) return Either.left(result.left);
		state = result.right.state;
		if (result.right.skipNext) {
			i++;
		}
	}

	return Either.right(toOptions(state));
}
