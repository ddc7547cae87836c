// PURITY: SHELL (reads the config file)
// INVARIANT: Returned settings always carry every field; unknown keys are ignored
// COMPLEXITY: O(k) where k = number of keys in the config file

import { Either } from "effect";

import { ConfigError } from "../../core/errors.js";
import { DEFAULT_SETTINGS, mergeSettings } from "../../core/settings.js";
import type { RunnerSettings } from "../../core/types/index.js";
import { fs, path } from "../../utils/node-mods.js";

export const CONFIG_FILE_NAME = "testpick.config.json";

/**
 * Any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

type StringSettingKey = Exclude<keyof RunnerSettings, "testSuffixes">;

const STRING_KEYS: ReadonlyArray<StringSettingKey> = [
	"testDir",
	"defaultCommand",
	"verboseCommand",
	"seedEnvVar",
	"parallelEnvVar",
	"envVars",
];

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return (
		Array.isArray(value) &&
		value.every((item: JSONValue) => typeof item === "string")
	);
}

/**
 * Validates a parsed config object into settings overrides.
 *
 * @pure true
 */
export function parseSettingsOverrides(
	value: JSONValue,
	source: string,
): Either.Either<Partial<RunnerSettings>, ConfigError> {
	const invalid = (detail: string): Either.Either<never, ConfigError> =>
		Either.left(
			new ConfigError({ message: `${source}: ${detail}`, path: source }),
		);

	if (!isJSONObject(value)) return invalid("expected a JSON object");

	const overrides: { -readonly [K in keyof RunnerSettings]?: RunnerSettings[K] } =
		{};
	for (const key of STRING_KEYS) {
		const field = value[key];
		if (field === undefined) continue;
		if (typeof field !== "string") return invalid(`"${key}" must be a string`);
		overrides[key] = field;
	}

	const suffixes = value["testSuffixes"];
	if (suffixes !== undefined) {
		if (!isStringArray(suffixes) || suffixes.length === 0) {
			return invalid(`"testSuffixes" must be a non-empty array of strings`);
		}
		overrides.testSuffixes = suffixes;
	}

	return Either.right(overrides);
}

/**
 * Loads settings from defaults plus the config file.
 *
 * A missing default config file means defaults; a missing explicit file,
 * unreadable file or invalid content is a ConfigError.
 *
 * @param configPath File named by `--config`, if any
 * @param cwd Directory holding `testpick.config.json`
 *
 * @pure false (filesystem read)
 */
export function loadSettings(
	configPath: string | undefined,
	cwd: string = process.cwd(),
): Either.Either<RunnerSettings, ConfigError> {
	const file = path.resolve(cwd, configPath ?? CONFIG_FILE_NAME);
	if (configPath === undefined && !fs.existsSync(file)) {
		return Either.right(DEFAULT_SETTINGS);
	}

	let parsed: JSONValue;
	try {
		parsed = JSON.parse(fs.readFileSync(file, "utf8")) as JSONValue;
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		return Either.left(
			new ConfigError({
				message: `Cannot read config ${file}: ${reason}`,
				path: file,
			}),
		);
	}

	return Either.map(parseSettingsOverrides(parsed, file), (overrides) =>
		mergeSettings(DEFAULT_SETTINGS, overrides),
	);
}
