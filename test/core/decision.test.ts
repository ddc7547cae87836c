// FORMAT THEOREM: execute ↔ (|files| > 0 ∧ ¬dryRun ∧ ¬list)
// PURITY: CORE

import fc from "fast-check";
import { describe, expect, it } from "vitest";

import { decideDispatch, describePlan } from "../../src/core/decision.js";

describe("decideDispatch", () => {
	it("executes a non-empty set when neither list nor dry-run is set", () => {
		expect(decideDispatch({ list: false, dryRun: false }, ["a_test.x"])).toEqual({
			list: false,
			dryRun: false,
			execute: true,
		});
	});

	it("never executes an empty set", () => {
		expect(decideDispatch({ list: false, dryRun: false }, [])).toEqual({
			list: false,
			dryRun: false,
			execute: false,
		});
	});

	it("keeps list and dry-run for an empty set", () => {
		expect(decideDispatch({ list: true, dryRun: true }, [])).toEqual({
			list: true,
			dryRun: true,
			execute: false,
		});
	});

	it("lists and dry-runs together without executing", () => {
		expect(decideDispatch({ list: true, dryRun: true }, ["a_test.x"])).toEqual({
			list: true,
			dryRun: true,
			execute: false,
		});
	});

	it("never executes together with list or dry-run", () => {
		fc.assert(
			fc.property(
				fc.boolean(),
				fc.boolean(),
				fc.array(fc.string()),
				(list, dryRun, files) => {
					const plan = decideDispatch({ list, dryRun }, files);
					expect(plan.execute).toBe(files.length > 0 && !list && !dryRun);
					expect(plan.execute && (plan.list || plan.dryRun)).toBe(false);
				},
			),
		);
	});
});

describe("describePlan", () => {
	it.each([
		[{ list: false, dryRun: false, execute: true }, "execute"],
		[{ list: true, dryRun: true, execute: false }, "list+dry-run"],
		[{ list: true, dryRun: false, execute: false }, "list"],
		[{ list: false, dryRun: true, execute: false }, "dry-run"],
		[{ list: false, dryRun: false, execute: false }, "skip"],
	] as const)("labels %o as %s", (plan, label) => {
		expect(describePlan(plan)).toBe(label);
	});
});
