// PURITY: SHELL (filesystem and git)
// EFFECT: Effect<ReadonlyArray<string>, never>
// INVARIANT: Output is sorted ascending and duplicate-free; discovery failures yield []
// COMPLEXITY: O(n log n) where n = number of candidate files

import { Effect } from "effect";

import {
	filterChangedTests,
	inputsOrDefault,
	intersectWithChanged,
	partitionInputs,
	queryScope,
	sortUnique,
} from "../../core/selection/resolve.js";
import type {
	RunnerSettings,
	RunOptions,
	SuffixMatchers,
} from "../../core/types/index.js";
import { globTestFiles } from "../fs/glob.js";
import { detectChanges, type GitRunner } from "../git/changes.js";
import type { DebugLog } from "../output/debug.js";

/**
 * Collaborators the resolver reads from.
 */
export interface ResolveContext {
	readonly settings: RunnerSettings;
	readonly matchers: SuffixMatchers;
	readonly cwd: string;
	readonly git: GitRunner;
	readonly debug: DebugLog;
}

export type ResolveRequest = Pick<
	RunOptions,
	"paths" | "changedOnly" | "changedRef"
>;

/**
 * Single tests verbatim plus every test file under each prefix.
 *
 * @pure false (filesystem reads)
 */
export function resolveFromFilesystem(
	inputs: ReadonlyArray<string>,
	context: Pick<ResolveContext, "matchers" | "cwd">,
): ReadonlyArray<string> {
	const { singleTests, prefixes } = partitionInputs(inputs, context.matchers);
	const globbed = prefixes.flatMap((prefix) =>
		globTestFiles(prefix, context.matchers, context.cwd),
	);
	return sortUnique([...singleTests, ...globbed]);
}

/**
 * Resolves path arguments into the test files to run.
 *
 * In changed-only mode the filesystem resolution is narrowed to entries
 * git reports as changed or untracked; git output is matched as files and
 * never expanded as directories.
 *
 * @pure false
 * @effect Effect<ReadonlyArray<string>, never>
 * @postcondition changedOnly ⇒ result ⊆ resolve({ ...request, changedOnly: false })
 */
export function resolveTestFiles(
	request: ResolveRequest,
	context: ResolveContext,
): Effect.Effect<ReadonlyArray<string>> {
	return Effect.gen(function* () {
		const inputs = inputsOrDefault(request.paths, context.settings.testDir);
		context.debug.log(`inputs: ${inputs.join(" ")}`);

		const resolved = resolveFromFilesystem(inputs, context);
		context.debug.log(`found ${resolved.length} test file(s)`);
		if (!request.changedOnly) return resolved;

		const query = yield* detectChanges(
			request.changedRef,
			queryScope(inputs),
			context.git,
		);
		context.debug.log(`changes: ${query.command}`);
		if (query.failure !== null) {
			context.debug.log(`change detection failed: ${query.failure}`);
		}

		const changedTests = filterChangedTests(query.paths, context.matchers);
		const changed = intersectWithChanged(resolved, changedTests);
		context.debug.log(
			`${query.paths.length} changed path(s), ${changed.length} changed test file(s)`,
		);
		return changed;
	});
}
