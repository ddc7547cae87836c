// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

/**
 * Exit status of a run.
 *
 * @remarks
 * - 0 when nothing was executed or the test command passed
 * - the test command's own status on the execute path
 * - 1 for usage, configuration and fatal errors
 */
export type ExitCode = number;

export const EXIT_SUCCESS: ExitCode = 0;
export const EXIT_FAILURE: ExitCode = 1;
