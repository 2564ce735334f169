// CHANGE: Pure merge of CLI flags, environment, config file and defaults
// FORMAT THEOREM: setting = first defined of (cli, env, file, default)
// PURITY: CORE
// INVARIANT: Deterministic; reads nothing outside its arguments
// COMPLEXITY: O(1)

import type {
	CLIOptions,
	SessionSettings,
	TableConfig,
} from "./types/index.js";

/** Environment facts that influence settings. */
export interface SettingsEnv {
	readonly noColor: boolean;
}

/**
 * Resolve the settings a session runs with.
 *
 * @param cli - Parsed command-line options
 * @param file - Values from the config file (possibly empty)
 * @param env - NO_COLOR presence
 * @param defaultCorpusPath - Bundled corpus location
 *
 * @pure true
 * @invariant cli.noColor ∨ env.noColor → ¬colored
 *
 * @example
 * ```ts
 * resolveSettings({ noColor: false }, { color: false }, { noColor: false }, "data/hexagrams.json").colored; // false
 * ```
 */
export function resolveSettings(
	cli: CLIOptions,
	file: TableConfig,
	env: SettingsEnv,
	defaultCorpusPath: string,
): SessionSettings {
	const colored = cli.noColor || env.noColor ? false : (file.color ?? true);
	return {
		colored,
		corpusPath: cli.corpusPath ?? file.corpusPath ?? defaultCorpusPath,
		seed: cli.seed ?? file.seed,
		question: cli.question,
	};
}
