// PURITY: SHELL (console output, process execution)
// EFFECT: Effect<ExitCode, ExecError>
// INVARIANT: The command runs only when decideDispatch says so; otherwise exit code is 0
// COMPLEXITY: O(n) where n = |files|

import { Effect } from "effect";

import { decideDispatch } from "../../core/decision.js";
import type { ExecError } from "../../core/errors.js";
import { EXIT_SUCCESS, type ExitCode } from "../../core/models.js";
import type { DispatchPlan, RunOptions } from "../../core/types/index.js";

/**
 * Runs a command string through a shell and yields its exit status.
 */
export type ShellRunner = (command: string) => Effect.Effect<ExitCode, ExecError>;

export interface DispatchIO {
	readonly run: ShellRunner;
	readonly print: (line: string) => void;
}

/**
 * Prints the file list and/or the command, or executes the command.
 *
 * @param options Flags selecting list / dry-run
 * @param files Resolved test files
 * @param command Rendered command for these files
 * @returns The command's exit status when executed, 0 otherwise
 *
 * @pure false
 * @effect Effect<ExitCode, ExecError>
 * @postcondition plan.execute = false ⇒ io.run is never called
 */
export function dispatch(
	options: Pick<RunOptions, "list" | "dryRun">,
	files: ReadonlyArray<string>,
	command: string,
	io: DispatchIO,
): Effect.Effect<ExitCode, ExecError> {
	const plan: DispatchPlan = decideDispatch(options, files);
	return Effect.gen(function* () {
		if (plan.list) {
			for (const file of files) io.print(file);
		}
		if (plan.dryRun) io.print(command);
		if (!plan.execute) return EXIT_SUCCESS;
		return yield* io.run(command);
	});
}
