// PURITY: CORE
// INVARIANT: kind = "single-test" ⇔ line present ∧ file part matches a suffix

import { Either } from "effect";
import { describe, expect, it } from "vitest";

import {
	classifyPathSpec,
	compileSuffixes,
	isTestFile,
	parsePathSpec,
} from "../../../src/core/paths/classify.js";
import type { SuffixMatchers } from "../../../src/core/types/index.js";

const compiled = (suffixes: readonly string[]): SuffixMatchers => {
	const result = compileSuffixes(suffixes);
	if (Either.isLeft(result)) throw new Error(result.left.message);
	return result.right;
};

const matchers = compiled(["_test\\.[^/]+"]);

describe("compileSuffixes", () => {
	it("compiles one anchored matcher per suffix", () => {
		const result = compiled(["_test\\.x", "_spec\\.x"]);
		expect(result).toHaveLength(2);
		expect(result[0]?.source).toBe("(?:_test\\.x)$");
	});

	it("accepts identity escapes such as \\- and \\_", () => {
		const escaped = compiled(["\\-test\\.x", "\\_spec\\.x"]);
		expect(isTestFile("a-test.x", escaped)).toBe(true);
		expect(isTestFile("a_spec.x", escaped)).toBe(true);
		expect(isTestFile("atest.x", escaped)).toBe(false);
	});

	it("reports an invalid pattern as ConfigError", () => {
		const result = compileSuffixes(["_test\\.x", "("]);
		expect(Either.isLeft(result)).toBe(true);
		if (Either.isLeft(result)) {
			expect(result.left._tag).toBe("ConfigError");
			expect(result.left.message).toMatch(/^Invalid test suffix pattern "\(":/u);
		}
	});
});

describe("isTestFile", () => {
	it("matches a file ending with the suffix", () => {
		expect(isTestFile("test/a_test.x", matchers)).toBe(true);
	});

	it("rejects files without the suffix", () => {
		expect(isTestFile("test/c.x", matchers)).toBe(false);
	});

	it("only matches at the end of the path", () => {
		expect(isTestFile("my_test/x.y", matchers)).toBe(false);
		expect(isTestFile("a_test.x.orig/readme", matchers)).toBe(false);
	});

	it("accepts a path when any of several suffixes matches", () => {
		const several = compiled(["_test\\.x", "_spec\\.x"]);
		expect(isTestFile("models/user_spec.x", several)).toBe(true);
	});
});

describe("parsePathSpec", () => {
	it("splits a numeric line locator", () => {
		expect(parsePathSpec("test/a_test.x:12")).toEqual({
			raw: "test/a_test.x:12",
			file: "test/a_test.x",
			line: 12,
		});
	});

	it("keeps a path without a locator whole", () => {
		expect(parsePathSpec("test/models")).toEqual({
			raw: "test/models",
			file: "test/models",
			line: null,
		});
	});

	it("treats an empty trailing segment as part of the path", () => {
		expect(parsePathSpec("a_test.x:")).toEqual({
			raw: "a_test.x:",
			file: "a_test.x:",
			line: null,
		});
	});

	it("treats a non-numeric trailing segment as part of the path", () => {
		expect(parsePathSpec("a_test.x:abc").line).toBeNull();
	});

	it("requires a file part before the locator", () => {
		expect(parsePathSpec(":12")).toEqual({ raw: ":12", file: ":12", line: null });
	});

	it("takes only the last colon-separated number as the line", () => {
		expect(parsePathSpec("odd:name_test.x:7")).toEqual({
			raw: "odd:name_test.x:7",
			file: "odd:name_test.x",
			line: 7,
		});
	});
});

describe("classifyPathSpec", () => {
	it("classifies file:line on a test file as a single test", () => {
		expect(classifyPathSpec("test/a_test.x:3", matchers).kind).toBe(
			"single-test",
		);
	});

	it("classifies a test file without a line as a prefix", () => {
		expect(classifyPathSpec("test/a_test.x", matchers).kind).toBe("prefix");
	});

	it("classifies dir:line as a prefix when the file part is not a test file", () => {
		expect(classifyPathSpec("test/models:3", matchers).kind).toBe("prefix");
	});

	it("classifies an empty locator as a prefix", () => {
		expect(classifyPathSpec("test/a_test.x:", matchers).kind).toBe("prefix");
	});
});
