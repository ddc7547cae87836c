// PURITY: SHELL (spawns external processes)
// EFFECT: Effect<string | ExitCode, ExecError, never>
// INVARIANT: Processes run to completion before the effect resumes; no timeout, no retry
// COMPLEXITY: O(n) space where n = captured stdout length

import { Effect } from "effect";

import { ExecError } from "../../core/errors.js";
import type { ExitCode } from "../../core/models.js";
import { execFile, promisify, spawn } from "../../utils/node-mods.js";

const execFileAsync = promisify(execFile);

interface FailureInfo {
	readonly detail: string;
	readonly exitCode: number | null;
}

/**
 * Pulls the exit code and the most useful message out of a child_process error.
 *
 * @pure true
 */
export function describeExecFailure(error: unknown): FailureInfo {
	if (!(error instanceof Error)) {
		return { detail: String(error), exitCode: null };
	}
	const exitCode =
		"code" in error && typeof error.code === "number" ? error.code : null;
	const stderr =
		"stderr" in error && typeof error.stderr === "string"
			? error.stderr.trim()
			: "";
	return {
		detail: stderr.length > 0 ? stderr : error.message,
		exitCode,
	};
}

/**
 * Runs a program with discrete arguments (no shell) and captures stdout.
 *
 * @returns Effect with stdout, or ExecError on spawn failure or nonzero exit
 *
 * @pure false
 * @effect Effect<string, ExecError>
 */
export function execFileCommand(
	file: string,
	args: ReadonlyArray<string>,
	options: { readonly cwd?: string; readonly maxBuffer?: number } = {},
): Effect.Effect<string, ExecError> {
	const command = [file, ...args].join(" ");
	return Effect.tryPromise({
		try: () =>
			execFileAsync(file, [...args], {
				cwd: options.cwd,
				maxBuffer: options.maxBuffer ?? 10 * 1024 * 1024,
				encoding: "utf8",
			}),
		catch: (error) =>
			new ExecError({ command, ...describeExecFailure(error) }),
	}).pipe(Effect.map(({ stdout }) => stdout));
}

/**
 * Runs a command string through the system shell with inherited stdio.
 *
 * @returns Effect with the command's exit status; a signal-terminated
 *          child yields 1
 *
 * @pure false
 * @effect Effect<ExitCode, ExecError>
 */
export function runShellCommand(
	command: string,
	options: { readonly cwd?: string } = {},
): Effect.Effect<ExitCode, ExecError> {
	return Effect.async<ExitCode, ExecError>((resume) => {
		// "close" may still fire after "error"; only the first outcome counts
		let settled = false;
		const settle = (outcome: Effect.Effect<ExitCode, ExecError>): void => {
			if (settled) return;
			settled = true;
			resume(outcome);
		};
		const child = spawn(command, {
			cwd: options.cwd,
			shell: true,
			stdio: "inherit",
		});
		child.once("error", (error) => {
			settle(
				Effect.fail(
					new ExecError({ command, detail: error.message, exitCode: null }),
				),
			);
		});
		child.once("close", (code) => {
			settle(Effect.succeed(code ?? 1));
		});
	});
}

/**
 * Splits command output into trimmed, non-empty lines.
 *
 * @pure true
 */
export function splitNonEmptyLines(raw: string): ReadonlyArray<string> {
	return raw
		.split(/\r?\n/u)
		.map((line) => line.trim())
		.filter((line) => line.length > 0);
}
