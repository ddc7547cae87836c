// PURITY: CORE
// INVARIANT: Classification depends only on the raw string and the compiled suffixes
// COMPLEXITY: O(|raw| · |suffixes|)

import { Either } from "effect";

import { ConfigError } from "../errors.js";
import type {
	ClassifiedPath,
	PathSpec,
	SuffixMatchers,
} from "../types/index.js";

const LINE_LOCATOR = /^(.*):(\d+)$/u;

/**
 * Compiles suffix patterns once, each anchored at the end of the path.
 *
 * @returns Matchers, or a ConfigError naming the first invalid pattern
 *
 * @pure true
 * @postcondition result.length = suffixes.length on success
 *
 * @example
 * ```ts
 * const matchers = compileSuffixes(["_test\\.[^/]+"]);
 * // Either.right([/(?:_test\.[^/]+)$/])
 * ```
 */
export function compileSuffixes(
	suffixes: ReadonlyArray<string>,
): Either.Either<SuffixMatchers, ConfigError> {
	const matchers: RegExp[] = [];
	for (const suffix of suffixes) {
		try {
			matchers.push(new RegExp(`(?:${suffix})$`));
		} catch (error) {
			const reason = error instanceof Error ? error.message : String(error);
			return Either.left(
				new ConfigError({
					message: `Invalid test suffix pattern "${suffix}": ${reason}`,
				}),
			);
		}
	}
	return Either.right(matchers);
}

/**
 * True when any configured suffix matches the end of the path.
 *
 * @pure true
 */
export const isTestFile = (path: string, matchers: SuffixMatchers): boolean =>
	matchers.some((matcher) => matcher.test(path));

/**
 * Splits an optional trailing `:<line>` off a raw argument.
 *
 * An empty or non-numeric trailing segment is not a locator, so `a_test.x:`
 * and `a_test.x:abc` keep the whole string as the file part.
 *
 * @pure true
 */
export function parsePathSpec(raw: string): PathSpec {
	const located = LINE_LOCATOR.exec(raw);
	if (located === null) {
		return { raw, file: raw, line: null };
	}
	const [, file = "", line = ""] = located;
	if (file.length === 0) {
		return { raw, file: raw, line: null };
	}
	return { raw, file, line: Number.parseInt(line, 10) };
}

/**
 * Decides whether an argument names one test (`file:line` on a test file)
 * or a prefix to expand.
 *
 * @pure true
 * @postcondition kind = "single-test" ⇔ spec.line ≠ null ∧ isTestFile(spec.file)
 */
export function classifyPathSpec(
	raw: string,
	matchers: SuffixMatchers,
): ClassifiedPath {
	const spec = parsePathSpec(raw);
	const kind =
		spec.line !== null && isTestFile(spec.file, matchers)
			? "single-test"
			: "prefix";
	return { spec, kind };
}
