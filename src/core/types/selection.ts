// PURITY: CORE
// INVARIANT: Values are created per invocation and never mutated
// COMPLEXITY: O(1)

/**
 * A raw path argument split into its file part and optional line locator.
 *
 * @invariant line === null ⇔ raw has no trailing `:<digits>`
 */
export interface PathSpec {
	readonly raw: string;
	readonly file: string;
	readonly line: number | null;
}

export type PathKind = "single-test" | "prefix";

export interface ClassifiedPath {
	readonly spec: PathSpec;
	readonly kind: PathKind;
}

/**
 * Compiled form of `RunnerSettings.testSuffixes`.
 */
export type SuffixMatchers = ReadonlyArray<RegExp>;

/**
 * Result of asking git which files changed under the given paths.
 *
 * @property command Displayable form of the queries that were run
 * @property paths Changed paths followed by untracked ones, not deduplicated
 * @property failure Reason the queries produced nothing, if they failed
 */
export interface ChangeQuery {
	readonly command: string;
	readonly paths: ReadonlyArray<string>;
	readonly failure: string | null;
}

/**
 * The three segments of the final invocation.
 */
export interface CommandSpec {
	readonly env: ReadonlyArray<string>;
	readonly base: string;
	readonly files: ReadonlyArray<string>;
}

/**
 * What the dispatcher will do with a resolved file set.
 *
 * @invariant execute ⇒ ¬list ∧ ¬dryRun
 */
export interface DispatchPlan {
	readonly list: boolean;
	readonly dryRun: boolean;
	readonly execute: boolean;
}
