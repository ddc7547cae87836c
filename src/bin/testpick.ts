#!/usr/bin/env node

// PURITY: SHELL (BIN layer)
// INVARIANT: Single point of termination; no process.exit in APP or CORE
// COMPLEXITY: O(1) (delegates to APP)

import { Effect } from "effect";

import { runCli } from "../app/runSelection.js";

/**
 * CLI entry point for testpick.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process exits exactly once with the run's exit code
 */
void (async (): Promise<void> => {
	try {
		const code = await Effect.runPromise(runCli(process.argv.slice(2)));
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
