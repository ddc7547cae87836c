// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process

import { Effect } from "effect";

import { runCli } from "./app/runSelection.js";
import type { ExitCode } from "./core/models.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param args Command-line arguments, node and script entries excluded
 */
export async function main(
	args: ReadonlyArray<string> = process.argv.slice(2),
): Promise<ExitCode> {
	return Effect.runPromise(runCli(args));
}
