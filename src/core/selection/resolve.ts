// PURITY: CORE
// INVARIANT: Every list returned here is sorted ascending and duplicate-free,
//            except inputsOrDefault/queryScope which preserve caller order
// COMPLEXITY: O(n log n) where n = number of candidate paths

import { classifyPathSpec, isTestFile, parsePathSpec } from "../paths/classify.js";
import type { SuffixMatchers } from "../types/index.js";

/**
 * Inputs split by classification.
 *
 * @property singleTests Arguments kept verbatim, locator included
 * @property prefixes Arguments to expand on the filesystem
 */
export interface PartitionedInputs {
	readonly singleTests: ReadonlyArray<string>;
	readonly prefixes: ReadonlyArray<string>;
}

/**
 * Sorts by UTF-16 code unit order and drops duplicates.
 *
 * @pure true
 * @postcondition ∀i: result[i] < result[i + 1]
 */
export const sortUnique = (paths: Iterable<string>): ReadonlyArray<string> =>
	[...new Set(paths)].sort();

/**
 * Substitutes the test directory for an empty argument list.
 *
 * @pure true
 */
export const inputsOrDefault = (
	paths: ReadonlyArray<string>,
	testDir: string,
): ReadonlyArray<string> => (paths.length === 0 ? [testDir] : paths);

/**
 * @pure true
 */
export function partitionInputs(
	paths: ReadonlyArray<string>,
	matchers: SuffixMatchers,
): PartitionedInputs {
	const singleTests: string[] = [];
	const prefixes: string[] = [];
	for (const raw of paths) {
		const { kind } = classifyPathSpec(raw, matchers);
		if (kind === "single-test") {
			singleTests.push(raw);
		} else {
			prefixes.push(raw);
		}
	}
	return { singleTests, prefixes };
}

/**
 * Paths handed to git: line locators are stripped, a `file:line`
 * argument scopes the query to `file`.
 *
 * @pure true
 */
export const queryScope = (
	paths: ReadonlyArray<string>,
): ReadonlyArray<string> => [
	...new Set(paths.map((raw) => parsePathSpec(raw).file)),
];

/**
 * Keeps the VCS-reported paths that are test files.
 *
 * Git reports files, so nothing here is expanded as a directory.
 *
 * @pure true
 */
export const filterChangedTests = (
	changed: ReadonlyArray<string>,
	matchers: SuffixMatchers,
): ReadonlySet<string> =>
	new Set(changed.filter((path) => isTestFile(path, matchers)));

/**
 * Restricts a resolved set to entries whose file part changed.
 *
 * @pure true
 * @postcondition result ⊆ resolved, order preserved
 */
export const intersectWithChanged = (
	resolved: ReadonlyArray<string>,
	changedTests: ReadonlySet<string>,
): ReadonlyArray<string> =>
	resolved.filter((entry) => changedTests.has(parsePathSpec(entry).file));
