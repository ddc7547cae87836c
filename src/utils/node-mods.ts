/**
 * Node built-ins shared by the shell modules.
 *
 * Invariant: re-exported as constants, since node:fs and node:path use
 * `export =` and cannot go through `export *`.
 */
import * as fsNS from "node:fs";
import * as pathNS from "node:path";

export { execFile, spawn } from "node:child_process";
export { promisify } from "node:util";

export const fs = fsNS;
export const path = pathNS;
