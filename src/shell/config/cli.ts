// CHANGE: CLI argument parsing for the divination table
// WHY: Flag table instead of a branch per flag keeps processArgument flat
// PURITY: SHELL (reads process.argv)
// INVARIANT: Unknown flags and positionals are ignored; a value flag with no value is ignored
// COMPLEXITY: O(n) where n = |argv|

import type { CLIOptions } from "../../core/types/index.js";

interface ArgState {
	readonly noColor: boolean;
	readonly question: string | undefined;
	readonly seed: number | undefined;
	readonly corpusPath: string | undefined;
	readonly configPath: string | undefined;
}

interface ArgProcessResult {
	readonly state: ArgState;
	readonly skipNext: boolean;
}

// CHANGE: Handlers for flags that take a value
// WHY: Eliminates branching in processArgument
type ValueFlagHandler = (value: string, current: ArgState) => ArgState;

function createStringFlagHandler(
	key: "question" | "corpusPath" | "configPath",
): ValueFlagHandler {
	return (value, current) => ({ ...current, [key]: value });
}

// INVARIANT: only a whole integer literal sets the seed; "12abc", "1.5" and "" leave the state unchanged
const seedHandler: ValueFlagHandler = (value, current) => {
	const seed = Number(value);
	return value.trim().length === 0 || !Number.isInteger(seed)
		? current
		: { ...current, seed };
};

const valueHandlers: Readonly<Record<string, ValueFlagHandler | undefined>> = {
	"--question": createStringFlagHandler("question"),
	"-q": createStringFlagHandler("question"),
	"--corpus": createStringFlagHandler("corpusPath"),
	"--config": createStringFlagHandler("configPath"),
	"--seed": seedHandler,
};

function processArgument(
	arg: string,
	next: string | undefined,
	current: ArgState,
): ArgProcessResult {
	const handler = valueHandlers[arg];
	if (handler !== undefined) {
		return next === undefined
			? { state: current, skipNext: false }
			: { state: handler(next, current), skipNext: true };
	}

	if (arg === "--no-color") {
		return { state: { ...current, noColor: true }, skipNext: false };
	}

	return { state: current, skipNext: false };
}

// exactOptionalPropertyTypes: absent fields are omitted, never set to undefined
function toOptions(state: ArgState): CLIOptions {
	return {
		noColor: state.noColor,
		...(state.question === undefined ? {} : { question: state.question }),
		...(state.seed === undefined ? {} : { seed: state.seed }),
		...(state.corpusPath === undefined ? {} : { corpusPath: state.corpusPath }),
		...(state.configPath === undefined ? {} : { configPath: state.configPath }),
	};
}

/**
 * Parse command-line arguments.
 *
 * @returns CLI options
 *
 * @example
 * ```ts
 * // Command: yijing-table --no-color -q "Should I move?" --seed 42
 * const options = parseCLIArgs();
 * // Returns: { noColor: true, question: "Should I move?", seed: 42 }
 * ```
 */
export function parseCLIArgs(): CLIOptions {
	const args = process.argv.slice(2);
	let state: ArgState = {
		noColor: false,
		question: undefined,
		seed: undefined,
		corpusPath: undefined,
		configPath: undefined,
	};

	for (let i = 0; i < args.length; i++) {
		const arg: string = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const result = processArgument(arg, args.at(i + 1), state);
		state = result.state;
		if (result.skipNext) {
			i++;
		}
	}

	return toOptions(state);
}
