// CHANGE: Load optional settings from iching.config.json
// WHY: Read/parse failures are typed ConfigError values; APP decides how to degrade
// PURITY: SHELL (filesystem)
// EFFECT: Effect<TableConfig, ConfigError>
// INVARIANT: Missing file → {}; ill-typed fields are dropped one by one
// COMPLEXITY: O(n) where n = file size

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import type { TableConfig } from "../../core/types/index.js";
import { errorMessage } from "../utils/errors.js";
import { fs, path } from "../utils/node-mods.js";
import {
	isBoolean,
	isJSONObject,
	isNumber,
	isString,
	type JSONValue,
	parseJSON,
} from "./json.js";

export const CONFIG_FILE_NAME = "iching.config.json";

/** Default config location in the working directory. */
export const defaultConfigPath = (): string =>
	path.resolve(process.cwd(), CONFIG_FILE_NAME);

/**
 * Keep only the well-typed known fields of a parsed config.
 *
 * @pure true
 * @invariant Result has no key whose value failed its guard
 */
export function validateTableConfig(value: JSONValue): TableConfig | null {
	if (!isJSONObject(value)) return null;
	const { color, corpusPath, seed } = value;
	return {
		...(color !== undefined && isBoolean(color) ? { color } : {}),
		...(corpusPath !== undefined && isString(corpusPath) && corpusPath.length > 0
			? { corpusPath }
			: {}),
		...(seed !== undefined && isNumber(seed) && Number.isInteger(seed)
			? { seed }
			: {}),
	};
}

/**
 * Load the table configuration.
 *
 * @param configPath - Path to the JSON file
 * @returns Effect with the validated config
 *
 * @pure false (reads the filesystem)
 * @effect Effect<TableConfig, ConfigError>
 * @complexity O(n)
 */
export function loadTableConfig(
	configPath: string = defaultConfigPath(),
): Effect.Effect<TableConfig, ConfigError> {
	if (!fs.existsSync(configPath)) return Effect.succeed({});

	return Effect.try({
		try: () => parseJSON(fs.readFileSync(configPath, "utf8")),
		catch: (error) =>
			new ConfigError({
				path: configPath,
				detail: errorMessage(error),
			}),
	}).pipe(
		Effect.flatMap((parsed) => {
			const config = validateTableConfig(parsed);
			return config === null
				? Effect.fail(
						new ConfigError({
							path: configPath,
							detail: "expected a JSON object",
						}),
					)
				: Effect.succeed(config);
		}),
	);
}
