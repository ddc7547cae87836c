// PURITY: SHELL (temporary directories under os.tmpdir())
// INVARIANT: Results are test files under the prefix, relative to cwd

import * as path from "node:path";
import { Either } from "effect";
import { describe, expect, it } from "vitest";

import { compileSuffixes } from "../../../src/core/paths/classify.js";
import { globTestFiles, relativeToCwd } from "../../../src/shell/fs/glob.js";
import { withTempProject } from "../../utils/tempProject.js";

const matchers = Either.getOrThrow(compileSuffixes(["_test\\.[^/]+"]));

const TREE = [
	"test/a_test.x",
	"test/c.x",
	"test/sub/b_test.x",
	"test/abc/d_test.x",
	"test/.hidden/f_test.x",
	"test/sub/.g_test.x",
	"test/empty/",
	"testing/e_test.x",
];

const globSorted = (prefix: string, cwd: string): readonly string[] =>
	[...globTestFiles(prefix, matchers, cwd)].sort();

describe("globTestFiles", () => {
	it("finds test files nested under a directory and skips non-matching files", () => {
		withTempProject(
			["test/a_test.x", "test/sub/b_test.x", "test/c.x"],
			(cwd) => {
				expect(globSorted("test", cwd)).toEqual([
					"test/a_test.x",
					"test/sub/b_test.x",
				]);
			},
		);
	});

	it("matches every entry starting with the prefix, siblings included", () => {
		withTempProject(TREE, (cwd) => {
			expect(globSorted("test", cwd)).toEqual([
				"test/a_test.x",
				"test/abc/d_test.x",
				"test/sub/b_test.x",
				"testing/e_test.x",
			]);
		});
	});

	it("expands a filename stem to files and directories sharing it", () => {
		withTempProject(TREE, (cwd) => {
			expect(globSorted("test/a", cwd)).toEqual([
				"test/a_test.x",
				"test/abc/d_test.x",
			]);
		});
	});

	it("limits a prefix with a trailing slash to that directory", () => {
		withTempProject(TREE, (cwd) => {
			expect(globSorted("test/", cwd)).toEqual([
				"test/a_test.x",
				"test/abc/d_test.x",
				"test/sub/b_test.x",
			]);
		});
	});

	it("treats . as the working directory only", () => {
		withTempProject(TREE, (cwd) => {
			expect(globSorted(".", cwd)).toEqual([
				"test/a_test.x",
				"test/abc/d_test.x",
				"test/sub/b_test.x",
				"testing/e_test.x",
			]);
		});
	});

	it("returns an exact test file path", () => {
		withTempProject(TREE, (cwd) => {
			expect(globSorted("test/a_test.x", cwd)).toEqual(["test/a_test.x"]);
		});
	});

	it("accepts an absolute prefix and returns relative paths", () => {
		withTempProject(TREE, (cwd) => {
			expect(globSorted(path.join(cwd, "test", "sub"), cwd)).toEqual([
				"test/sub/b_test.x",
			]);
		});
	});

	it("returns an empty list when nothing matches", () => {
		withTempProject(TREE, (cwd) => {
			expect(globTestFiles("missing", matchers, cwd)).toEqual([]);
			expect(globTestFiles("test/empty", matchers, cwd)).toEqual([]);
			expect(globTestFiles("no/such/dir/", matchers, cwd)).toEqual([]);
		});
	});
});

describe("relativeToCwd", () => {
	it("strips the working directory", () => {
		expect(relativeToCwd("/repo/test/a_test.x", "/repo")).toBe("test/a_test.x");
	});

	it("accepts a working directory with a trailing separator", () => {
		expect(relativeToCwd("/repo/test/a_test.x", "/repo/")).toBe("test/a_test.x");
	});

	it("leaves paths outside the working directory absolute", () => {
		expect(relativeToCwd("/repository/a_test.x", "/repo")).toBe(
			"/repository/a_test.x",
		);
	});
});
