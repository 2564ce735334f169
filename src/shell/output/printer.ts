// CHANGE: Output sinks for the divination table
// WHY: CORE returns lines of text; only this module writes them
// PURITY: SHELL (stream and console IO)
// INVARIANT: Every written line ends with exactly one "\n"
// COMPLEXITY: O(n) where n = |lines|

import type { ConfigError, CorpusError } from "../../core/errors.js";

/**
 * Write lines to a stream.
 *
 * @pure false (writes to output)
 */
export function writeLines(
	output: NodeJS.WritableStream,
	lines: readonly string[],
): void {
	for (const line of lines) {
		output.write(`${line}\n`);
	}
}

/** Write text without a trailing newline (prompts). */
export function writeRaw(output: NodeJS.WritableStream, text: string): void {
	output.write(text);
}

/**
 * Report a config file that could not be used; the session continues with defaults.
 *
 * @pure false (console.warn)
 */
export function reportConfigError(error: ConfigError): void {
	console.warn(
		`⚠️  Ignoring config ${error.path}: ${error.detail}. Using defaults.`,
	);
}

/**
 * Report a corpus that could not be loaded; lookups fall back to placeholders.
 *
 * @pure false (console.warn)
 */
export function reportCorpusError(error: CorpusError): void {
	console.warn(
		`⚠️  Unable to load interpretations from ${error.path}: ${error.detail}`,
	);
}
