// FORMAT THEOREM: detectChanges(ref, scope) = changed(ref, scope) ++ untracked(scope), or [] on any failure
// PURITY: SHELL
// EFFECT: Effect<ChangeQuery, never>
// INVARIANT: Queries are scoped to the given paths; failures are values, not exceptions
// COMPLEXITY: O(n) where n = number of reported paths

import { Effect } from "effect";

import type { ExecError } from "../../core/errors.js";
import type { ChangeQuery } from "../../core/types/index.js";
import { execFileCommand, splitNonEmptyLines } from "../utils/exec.js";

/**
 * Runs git with the given arguments and yields its stdout.
 */
export type GitRunner = (
	args: ReadonlyArray<string>,
) => Effect.Effect<string, ExecError>;

/**
 * Git runner bound to a working directory.
 *
 * @pure false
 */
export const createGitRunner =
	(cwd: string): GitRunner =>
	(args) =>
		execFileCommand("git", args, { cwd });

/**
 * @pure true
 */
export const diffArgs = (
	ref: string,
	scope: ReadonlyArray<string>,
): ReadonlyArray<string> => [
	"diff",
	"--no-ext-diff",
	"--name-only",
	...(ref.length > 0 ? [ref] : []),
	"--",
	...scope,
];

/**
 * @pure true
 */
export const untrackedArgs = (
	scope: ReadonlyArray<string>,
): ReadonlyArray<string> => [
	"ls-files",
	"--others",
	"--exclude-standard",
	"--",
	...scope,
];

/**
 * Displayable form of both queries, as a shell would chain them.
 *
 * @pure true
 *
 * @example
 * ```ts
 * formatChangeCommand("main", ["test"]);
 * // "git diff --no-ext-diff --name-only main -- test && git ls-files --others --exclude-standard -- test"
 * ```
 */
export const formatChangeCommand = (
	ref: string,
	scope: ReadonlyArray<string>,
): string =>
	[diffArgs(ref, scope), untrackedArgs(scope)]
		.map((args) => ["git", ...args].join(" "))
		.join(" && ");

/**
 * Lists files changed against `ref` followed by untracked files, under `scope`.
 *
 * The untracked query only runs once the diff query succeeded. Either one
 * failing leaves `paths` empty and records the reason in `failure`.
 *
 * @param ref Revision to diff against; `""` compares the worktree with the index
 * @param scope Paths limiting both queries
 * @param runGit Process runner, replaced in tests
 *
 * @pure false
 * @effect Effect<ChangeQuery, never>
 */
export function detectChanges(
	ref: string,
	scope: ReadonlyArray<string>,
	runGit: GitRunner,
): Effect.Effect<ChangeQuery> {
	const command = formatChangeCommand(ref, scope);
	return Effect.gen(function* () {
		const changed = yield* runGit(diffArgs(ref, scope));
		const added = yield* runGit(untrackedArgs(scope));
		const query: ChangeQuery = {
			command,
			paths: [...splitNonEmptyLines(changed), ...splitNonEmptyLines(added)],
			failure: null,
		};
		return query;
	}).pipe(
		Effect.catchAll((error) =>
			Effect.succeed<ChangeQuery>({
				command,
				paths: [],
				failure: error.detail,
			}),
		),
	);
}
