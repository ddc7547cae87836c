// PURITY: SHELL (console output)
// INVARIANT: Nothing is written unless debug mode is enabled

/**
 * Sink for `--debug` diagnostics.
 */
export interface DebugLog {
	readonly enabled: boolean;
	readonly log: (message: string) => void;
}

/**
 * Debug sink writing `[debug] …` lines, to stderr by default.
 *
 * @pure false
 */
export function createDebugLog(
	enabled: boolean,
	write: (line: string) => void = (line) => console.error(line),
): DebugLog {
	return {
		enabled,
		log: (message) => {
			if (enabled) write(`[debug] ${message}`);
		},
	};
}

export const silentDebugLog: DebugLog = createDebugLog(false);

/**
 * Milliseconds since `start`, rounded to two decimals.
 *
 * @pure false (reads the clock)
 */
export const elapsedSince = (start: number): string =>
	(performance.now() - start).toFixed(2);
