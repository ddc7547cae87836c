// FORMAT THEOREM: ∀p ∈ globTestFiles(prefix): isTestFile(p) ∧ abs(p) starts with abs(prefix)
// PURITY: SHELL (reads the filesystem synchronously)
// INVARIANT: Never throws; missing or unreadable directories contribute nothing
// COMPLEXITY: O(n) where n = entries beneath the prefix

import type { Dirent } from "node:fs";

import { isTestFile } from "../../core/paths/classify.js";
import type { SuffixMatchers } from "../../core/types/index.js";
import { fs, path } from "../../utils/node-mods.js";

interface Entry {
	readonly absolute: string;
	readonly kind: "file" | "directory" | "other";
}

const isHidden = (name: string): boolean => name.startsWith(".");

/**
 * Prefixes that can only mean a directory: a trailing separator, or a
 * last segment of `.` / `..`.
 */
function namesDirectory(prefix: string): boolean {
	if (/[\\/]$/u.test(prefix)) return true;
	const last = prefix.split(/[\\/]/u).at(-1) ?? "";
	return last === "." || last === "..";
}

function entryKind(dirent: Dirent, absolute: string): Entry["kind"] {
	if (dirent.isDirectory()) return "directory";
	if (dirent.isFile()) return "file";
	if (dirent.isSymbolicLink()) {
		// Linked files count; linked directories are not descended into
		try {
			return fs.statSync(absolute).isFile() ? "file" : "other";
		} catch {
			return "other";
		}
	}
	return "other";
}

function listEntries(directory: string): ReadonlyArray<Entry> {
	try {
		return fs
			.readdirSync(directory, { withFileTypes: true })
			.map((dirent) => {
				const absolute = path.join(directory, dirent.name);
				return { absolute, kind: entryKind(dirent, absolute) };
			});
	} catch {
		return [];
	}
}

function collectNestedFiles(directory: string, into: string[]): void {
	for (const entry of listEntries(directory)) {
		if (isHidden(path.basename(entry.absolute))) continue;
		if (entry.kind === "file") {
			into.push(entry.absolute);
		} else if (entry.kind === "directory") {
			collectNestedFiles(entry.absolute, into);
		}
	}
}

function collectPrefixed(absolutePrefix: string, into: string[]): void {
	for (const entry of listEntries(path.dirname(absolutePrefix))) {
		if (!entry.absolute.startsWith(absolutePrefix)) continue;
		if (entry.kind === "file") {
			into.push(entry.absolute);
		} else if (entry.kind === "directory") {
			collectNestedFiles(entry.absolute, into);
		}
	}
}

/**
 * Strips the working directory so results are relative; paths outside it
 * stay absolute.
 *
 * @pure true
 */
export function relativeToCwd(absolute: string, cwd: string): string {
	const root = cwd.endsWith(path.sep) ? cwd : `${cwd}${path.sep}`;
	return absolute.startsWith(root) ? absolute.slice(root.length) : absolute;
}

/**
 * Expands a prefix into the test files it names.
 *
 * `test/a` matches `test/a_test.x` and everything under `test/abc/`;
 * `test/` matches only what is under `test`.
 *
 * @param prefix Path or filename stem, relative to `cwd` or absolute
 * @param matchers Compiled test-file suffixes
 * @param cwd Directory relative paths are resolved against
 * @returns Unordered test file paths, relative to `cwd` where possible
 *
 * @pure false (filesystem reads)
 * @invariant result may be empty; no error is raised
 *
 * @example
 * ```ts
 * globTestFiles("test", matchers, "/repo");
 * // ["test/a_test.x", "test/sub/b_test.x"] (in filesystem order)
 * ```
 */
export function globTestFiles(
	prefix: string,
	matchers: SuffixMatchers,
	cwd: string = process.cwd(),
): ReadonlyArray<string> {
	const root = path.resolve(cwd);
	const absolutePrefix = path.resolve(root, prefix);
	const found: string[] = [];
	if (namesDirectory(prefix)) {
		collectNestedFiles(absolutePrefix, found);
	} else {
		collectPrefixed(absolutePrefix, found);
	}
	return found
		.map((absolute) => relativeToCwd(absolute, root))
		.filter((relative) => isTestFile(relative, matchers));
}
