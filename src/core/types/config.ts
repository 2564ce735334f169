// CHANGE: Configuration and CLI option types for the divination table
// PURITY: CORE
// INVARIANT: Every field is readonly; optional fields are absent, never undefined

/**
 * Command-line options.
 *
 * @property noColor Disable ANSI colors
 * @property question Question printed before the session starts
 * @property seed Seed for reproducible casts
 * @property corpusPath Interpretation corpus file
 * @property configPath Configuration file (default: ./iching.config.json)
 */
export interface CLIOptions {
	readonly noColor: boolean;
	readonly question?: string;
	readonly seed?: number;
	readonly corpusPath?: string;
	readonly configPath?: string;
}

/**
 * Optional settings read from iching.config.json.
 */
export interface TableConfig {
	readonly color?: boolean;
	readonly corpusPath?: string;
	readonly seed?: number;
}

/**
 * Settings after merging CLI, environment, file and defaults.
 *
 * @invariant corpusPath.length > 0
 */
export interface SessionSettings {
	readonly colored: boolean;
	readonly corpusPath: string;
	readonly seed: number | undefined;
	readonly question: string | undefined;
}
