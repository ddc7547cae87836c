// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Malformed command-line flags.
 *
 * @invariant message.length > 0
 */
export class UsageError extends Data.TaggedError("UsageError")<{
	readonly message: string;
}> {}

/**
 * Unreadable or invalid configuration: a broken config file or a suffix
 * pattern that is not a valid regular expression.
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly message: string;
	readonly path?: string;
}> {}

/**
 * A process could not be spawned or exited unsuccessfully.
 *
 * @invariant command.length > 0
 */
export class ExecError extends Data.TaggedError("ExecError")<{
	readonly command: string;
	readonly detail: string;
	readonly exitCode: number | null;
}> {}

export type AppError = UsageError | ConfigError | ExecError;
