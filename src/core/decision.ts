// FORMAT THEOREM: ∀o, f: decideDispatch(o, f).execute ↔ (|f| > 0 ∧ ¬o.dryRun ∧ ¬o.list)
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping (flags, files) → plan
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { DispatchPlan, RunOptions } from "./types/index.js";

/**
 * Decides what to do with a resolved file set.
 *
 * An empty set is never executed; list and dry-run are independent and
 * both still apply to an empty set.
 *
 * @pure true
 * @invariant execute ⇒ ¬list ∧ ¬dryRun
 *
 * @example
 * ```ts
 * decideDispatch({ list: true, dryRun: true }, ["a_test.x"]);
 * // { list: true, dryRun: true, execute: false }
 * ```
 */
export const decideDispatch = (
	options: Pick<RunOptions, "list" | "dryRun">,
	files: ReadonlyArray<string>,
): DispatchPlan => ({
	list: options.list,
	dryRun: options.dryRun,
	execute: files.length > 0 && !options.dryRun && !options.list,
});

export type PlanLabel = "execute" | "list" | "dry-run" | "list+dry-run" | "skip";

/**
 * Short name of a plan for debug output.
 *
 * @pure true
 */
export const describePlan = (plan: DispatchPlan): PlanLabel =>
	match(plan)
		.returnType<PlanLabel>()
		.with({ execute: true }, () => "execute")
		.with({ list: true, dryRun: true }, () => "list+dry-run")
		.with({ list: true }, () => "list")
		.with({ dryRun: true }, () => "dry-run")
		.otherwise(() => "skip");
