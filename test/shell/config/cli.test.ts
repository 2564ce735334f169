// CHANGE: Unit tests for CLI argument parsing
// WHY: Flags map deterministically onto CLIOptions; absent flags leave fields absent

import { describe, expect, it } from "vitest";

import type { CLIOptions } from "../../../src/core/types/index.js";
import { parseCLIArgs } from "../../../src/shell/config/index.js";

/**
 * Set process.argv for the duration of a test and restore afterwards.
 *
 * Invariants:
 * - Always restore original argv to avoid cross-test contamination.
 */
function withArgv<T>(args: readonly string[], fn: () => T): T {
	const original = process.argv.slice();
	try {
		// First two entries are node and script placeholders
		process.argv = [original[0] ?? "node", original[1] ?? "script.js", ...args];
		return fn();
	} finally {
		process.argv = original;
	}
}

describe("parseCLIArgs", () => {
	it("returns defaults when no args provided", (): void => {
		const opts = withArgv([], () => parseCLIArgs());
		expect(opts).toStrictEqual<CLIOptions>({ noColor: false });
	});

	it("parses every flag", (): void => {
		const opts = withArgv(
			[
				"--no-color",
				"-q",
				"Should I move?",
				"--seed",
				"42",
				"--corpus",
				"custom.json",
				"--config",
				"table.json",
			],
			() => parseCLIArgs(),
		);
		expect(opts).toStrictEqual<CLIOptions>({
			noColor: true,
			question: "Should I move?",
			seed: 42,
			corpusPath: "custom.json",
			configPath: "table.json",
		});
	});

	it("accepts the long question flag", (): void => {
		const opts = withArgv(["--question", "What now?"], () => parseCLIArgs());
		expect(opts.question).toBe("What now?");
	});

	it("ignores a seed that is not a number", (): void => {
		const opts = withArgv(["--seed", "abc"], () => parseCLIArgs());
		expect(opts).toStrictEqual<CLIOptions>({ noColor: false });
	});

	it.each(["12abc", "1.5", "", " "])(
		"ignores the partial or fractional seed %j",
		(value): void => {
			const opts = withArgv(["--seed", value], () => parseCLIArgs());
			expect(opts).toStrictEqual<CLIOptions>({ noColor: false });
		},
	);

	it("accepts a negative integer seed", (): void => {
		const opts = withArgv(["--seed", "-3"], () => parseCLIArgs());
		expect(opts.seed).toBe(-3);
	});

	it("ignores a value flag at the end of argv", (): void => {
		const opts = withArgv(["--no-color", "--corpus"], () => parseCLIArgs());
		expect(opts).toStrictEqual<CLIOptions>({ noColor: true });
	});

	it("ignores empty strings, unknown flags and positionals", (): void => {
		const opts = withArgv(["", "--verbose", "extra"], () => parseCLIArgs());
		expect(opts).toStrictEqual<CLIOptions>({ noColor: false });
	});

	it("lets a later flag override an earlier one", (): void => {
		const opts = withArgv(["--seed", "1", "--seed", "2"], () => parseCLIArgs());
		expect(opts.seed).toBe(2);
	});
});
