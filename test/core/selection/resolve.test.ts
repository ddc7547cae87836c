// PURITY: CORE
// INVARIANT: sortUnique output is strictly ascending and covers exactly its input set

import { Either } from "effect";
import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { compileSuffixes } from "../../../src/core/paths/classify.js";
import {
	filterChangedTests,
	inputsOrDefault,
	intersectWithChanged,
	partitionInputs,
	queryScope,
	sortUnique,
} from "../../../src/core/selection/resolve.js";
import type { SuffixMatchers } from "../../../src/core/types/index.js";

const matchers: SuffixMatchers = Either.getOrThrow(
	compileSuffixes(["_test\\.[^/]+"]),
);

describe("sortUnique", () => {
	it("drops duplicates and sorts ascending", () => {
		expect(sortUnique(["b_test.x", "a_test.x", "b_test.x"])).toEqual([
			"a_test.x",
			"b_test.x",
		]);
	});

	it("sorts by code unit, so uppercase precedes lowercase", () => {
		expect(sortUnique(["b", "B", "a"])).toEqual(["B", "a", "b"]);
	});

	it("returns strictly ascending output containing exactly the input set", () => {
		fc.assert(
			fc.property(fc.array(fc.string()), (paths) => {
				const result = sortUnique(paths);
				for (let i = 1; i < result.length; i++) {
					expect((result[i - 1] ?? "") < (result[i] ?? "")).toBe(true);
				}
				expect(new Set(result)).toEqual(new Set(paths));
			}),
		);
	});
});

describe("inputsOrDefault", () => {
	it("substitutes the test directory for an empty list", () => {
		expect(inputsOrDefault([], "test")).toEqual(["test"]);
	});

	it("keeps given inputs in order", () => {
		expect(inputsOrDefault(["b", "a"], "test")).toEqual(["b", "a"]);
	});
});

describe("partitionInputs", () => {
	it("separates single tests from prefixes, keeping locators", () => {
		expect(
			partitionInputs(
				["test/a_test.x:4", "test/models", "test/b_test.x", "x_test.x:"],
				matchers,
			),
		).toEqual({
			singleTests: ["test/a_test.x:4"],
			prefixes: ["test/models", "test/b_test.x", "x_test.x:"],
		});
	});
});

describe("queryScope", () => {
	it("strips line locators and duplicate files", () => {
		expect(
			queryScope(["test/a_test.x:4", "test/a_test.x:9", "test/models"]),
		).toEqual(["test/a_test.x", "test/models"]);
	});
});

describe("filterChangedTests", () => {
	it("keeps only reported paths that are test files", () => {
		expect(
			filterChangedTests(["test/a_test.x", "lib/a.x", "test/b_test.x"], matchers),
		).toEqual(new Set(["test/a_test.x", "test/b_test.x"]));
	});

	it("does not expand a reported directory", () => {
		expect(filterChangedTests(["test/sub"], matchers).size).toBe(0);
	});
});

describe("intersectWithChanged", () => {
	it("keeps resolved entries whose file part changed", () => {
		expect(
			intersectWithChanged(
				["test/a_test.x", "test/b_test.x:3", "test/c_test.x"],
				new Set(["test/b_test.x", "test/c_test.x", "test/gone_test.x"]),
			),
		).toEqual(["test/b_test.x:3", "test/c_test.x"]);
	});

	it("returns a subset of the resolved list for any change set", () => {
		fc.assert(
			fc.property(
				fc.uniqueArray(fc.string()).map((xs) => [...xs].sort()),
				fc.array(fc.string()),
				(resolved, changed) => {
					const result = intersectWithChanged(resolved, new Set(changed));
					expect(result.every((entry) => resolved.includes(entry))).toBe(true);
				},
			),
		);
	});
});
