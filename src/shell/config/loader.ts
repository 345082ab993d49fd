// CHANGE: Load section labels, visibility flags and branding from check-result.config.json
// WHY: A suite of plugins shares one set of headers without repeating flags
// PURITY: SHELL (reads the filesystem)
// EFFECT: Effect<OutputConfig, ConfigLoadError>
// INVARIANT: a key with the wrong JSON type is ignored, the rest of the file still applies
// COMPLEXITY: O(n) where n = file size

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect, Option } from "effect";

import { ConfigLoadError } from "../../core/errors.js";
import type { OutputConfig } from "../../core/types/index.js";

export const DEFAULT_CONFIG_FILE = "check-result.config.json";

/**
 * Type representing any valid JSON value.
 */
type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

const stringKey = (
	json: JSONObject,
	key: string,
): Option.Option<string> => {
	const value = json[key];
	return typeof value === "string" ? Option.some(value) : Option.none();
};

const booleanKey = (
	json: JSONObject,
	key: string,
): Option.Option<boolean> => {
	const value = json[key];
	return typeof value === "boolean" ? Option.some(value) : Option.none();
};

/**
 * Keeps the recognised keys of a parsed config file.
 *
 * @pure true
 * @invariant keys absent from the result were absent or mistyped in the input
 */
export function toOutputConfig(json: JSONValue): OutputConfig {
	if (!isJSONObject(json)) return {};

	const errorsLabel = stringKey(json, "errorsLabel");
	const thresholdsLabel = stringKey(json, "thresholdsLabel");
	const detailedInfoLabel = stringKey(json, "detailedInfoLabel");
	const branding = stringKey(json, "branding");
	const hideErrorsSection = booleanKey(json, "hideErrorsSection");
	const hideThresholdsSection = booleanKey(json, "hideThresholdsSection");

	return {
		...(Option.isSome(errorsLabel) ? { errorsLabel: errorsLabel.value } : {}),
		...(Option.isSome(thresholdsLabel)
			? { thresholdsLabel: thresholdsLabel.value }
			: {}),
		...(Option.isSome(detailedInfoLabel)
			? { detailedInfoLabel: detailedInfoLabel.value }
			: {}),
		...(Option.isSome(branding) ? { branding: branding.value } : {}),
		...(Option.isSome(hideErrorsSection)
			? { hideErrorsSection: hideErrorsSection.value }
			: {}),
		...(Option.isSome(hideThresholdsSection)
			? { hideThresholdsSection: hideThresholdsSection.value }
			: {}),
	};
}

const errorText = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Reads and validates an output config file.
 *
 * @param configPath - Path to the JSON file
 * @effect Effect<OutputConfig, ConfigLoadError>
 */
export const loadOutputConfig = (
	configPath: string,
): Effect.Effect<OutputConfig, ConfigLoadError> =>
	Effect.try({
		try: () => fs.readFileSync(configPath, "utf8"),
		catch: (error) =>
			new ConfigLoadError({ path: configPath, detail: errorText(error) }),
	}).pipe(
		Effect.flatMap((raw) =>
			Effect.try({
				try: (): JSONValue => JSON.parse(raw) as JSONValue,
				catch: (error) =>
					new ConfigLoadError({ path: configPath, detail: errorText(error) }),
			}),
		),
		Effect.map(toOutputConfig),
	);

/**
 * Config file to load: the explicit path, else the default file in `cwd`
 * when it exists.
 *
 * @pure false (checks the filesystem)
 */
export const resolveConfigPath = (
	explicit: string | undefined,
	cwd: string = process.cwd(),
): Option.Option<string> => {
	if (explicit !== undefined) return Option.some(explicit);
	const candidate = path.resolve(cwd, DEFAULT_CONFIG_FILE);
	return fs.existsSync(candidate) ? Option.some(candidate) : Option.none();
};
