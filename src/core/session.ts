// CHANGE: Session controller as a pure state machine
// WHY: The readline loop in APP only feeds lines in and writes lines out; every decision lives here
// FORMAT THEOREM: step(state, command) = Effect.succeed({ state', output }): the only effect is Random (get)
// PURITY: CORE
// EFFECT: Effect<Transition, never, never>
// INVARIANT: state holds at most one original and one changed hexagram; changed ≠ null → original ≠ null
// COMPLEXITY: O(1) per command

import { Effect, Either } from "effect";
import { match } from "ts-pattern";

import type { PositionError } from "./errors.js";
import {
	CHANGE_USAGE,
	CLEARED,
	GOODBYE,
	HELP_MESSAGE,
	NO_CHANGEABLE,
	NO_HEXAGRAM,
	NO_NUMBERS,
	NO_ORIGINAL,
	UNKNOWN_HINT,
} from "./format/messages.js";
import { generateHexagram } from "./generator.js";
import {
	deriveChangingHexagram,
	lineAt,
	partitionPositions,
	toBinaryString,
} from "./hexagram.js";
import type { Hexagram, Position, YaoValue } from "./models.js";
import { parsePositions } from "./positions.js";

/**
 * Parsed user command.
 *
 * @invariant `_tag` discriminates; only Change carries an argument
 */
export type Command =
	| { readonly _tag: "Get" }
	| { readonly _tag: "Change"; readonly argument: string }
	| { readonly _tag: "Show" }
	| { readonly _tag: "Reset" }
	| { readonly _tag: "Help" }
	| { readonly _tag: "Quit" }
	| { readonly _tag: "Empty" }
	| { readonly _tag: "Unknown"; readonly input: string };

export interface SessionState {
	readonly original: Hexagram | null;
	readonly changed: Hexagram | null;
	readonly running: boolean;
}

export interface Transition {
	readonly state: SessionState;
	readonly output: readonly string[];
}

/**
 * Collaborators the controller calls but does not own.
 *
 * @remarks
 * Structural, so CORE never imports SHELL.
 */
export interface SessionDeps {
	readonly render: (hexagram: Hexagram) => readonly string[];
	readonly interpret: (hexagram: Hexagram) => string;
}

export const initialState: SessionState = {
	original: null,
	changed: null,
	running: true,
};

/**
 * Parse one input line. The first word, case-insensitive, picks the command.
 *
 * @pure true
 * @complexity O(n) where n = |input|
 *
 * @example
 * ```ts
 * parseCommand("C 1,6"); // { _tag: "Change", argument: "1,6" }
 * ```
 */
export function parseCommand(input: string): Command {
	const trimmed = input.trim();
	if (trimmed.length === 0) return { _tag: "Empty" };

	const [word = ""] = trimmed.split(/\s+/);
	const argument = trimmed.slice(word.length).trim();
	return match<string, Command>(word.toLowerCase())
		.with("g", "get", () => ({ _tag: "Get" }))
		.with("c", "change", () => ({ _tag: "Change", argument }))
		.with("s", "show", () => ({ _tag: "Show" }))
		.with("clear", "reset", () => ({ _tag: "Reset" }))
		.with("h", "help", () => ({ _tag: "Help" }))
		.with("q", "quit", "exit", "system", () => ({ _tag: "Quit" }))
		.otherwise(() => ({ _tag: "Unknown", input: trimmed }));
}

const label = (value: YaoValue): string => (value === "yang" ? "Yang" : "Yin");

/** Rendered rows, binary summary and interpretation for one hexagram. */
function describe(hexagram: Hexagram, deps: SessionDeps): readonly string[] {
	return [
		...deps.render(hexagram),
		`Identity: ${hexagram.identity} (${toBinaryString(hexagram)})`,
		"",
		deps.interpret(hexagram),
	];
}

const positionErrorLines = (error: PositionError): readonly string[] =>
	match<PositionError, readonly string[]>(error)
		.with({ _tag: "InvalidPosition" }, (invalid) => [
			`Error: The yao position must be between 1-6, given ${invalid.position}.`,
		])
		.with({ _tag: "MissingPositions", reason: "no-argument" }, () => CHANGE_USAGE)
		.with({ _tag: "MissingPositions", reason: "no-numbers" }, () => [NO_NUMBERS])
		.exhaustive();

function applyChange(
	state: SessionState,
	original: Hexagram,
	positions: readonly Position[],
	deps: SessionDeps,
): Transition {
	const { changing, unchanging } = partitionPositions(original, positions);
	const warnings = unchanging.map((position) => {
		const value = label(lineAt(original, position).value);
		return `Warning: The Yao ${position} (${value}) is not changing (young ${value}).`;
	});
	if (changing.length === 0) {
		return { state, output: [...warnings, NO_CHANGEABLE] };
	}

	const changed = deriveChangingHexagram(original, changing);
	return {
		state: { ...state, changed },
		output: [
			...warnings,
			`Changing positions: ${changing.join(", ")}`,
			"",
			"Changing Hexagram:",
			...describe(changed, deps),
		],
	};
}

function change(
	state: SessionState,
	argument: string,
	deps: SessionDeps,
): Transition {
	const original = state.original;
	if (original === null) return { state, output: [NO_ORIGINAL] };

	return Either.match(parsePositions(argument), {
		onLeft: (error) => ({ state, output: positionErrorLines(error) }),
		onRight: (positions) => applyChange(state, original, positions, deps),
	});
}

function show(state: SessionState, deps: SessionDeps): Transition {
	if (state.original === null) return { state, output: [NO_HEXAGRAM] };
	const changed =
		state.changed === null
			? []
			: ["", "Changing Hexagram:", ...deps.render(state.changed)];
	return {
		state,
		output: [
			"Current Hexagrams:",
			"",
			"Original Hexagram:",
			...deps.render(state.original),
			...changed,
		],
	};
}

/**
 * Cast a new original hexagram and drop any changed one.
 *
 * @effect Effect<Transition>: draws from Random
 */
const get = (
	state: SessionState,
	deps: SessionDeps,
): Effect.Effect<Transition> =>
	generateHexagram.pipe(
		Effect.map((original) => ({
			state: { ...state, original, changed: null },
			output: ["Original Hexagram:", ...describe(original, deps)],
		})),
	);

/**
 * Apply one command to the session.
 *
 * @param state - Current session state
 * @param command - Parsed command
 * @param deps - Rendering and interpretation collaborators
 * @returns Next state and the lines to print
 *
 * @effect Effect<Transition, never, never>
 * @invariant Quit → result.state.running = false; every other command keeps running
 * @complexity O(1)
 */
export function step(
	state: SessionState,
	command: Command,
	deps: SessionDeps,
): Effect.Effect<Transition> {
	return match<Command, Effect.Effect<Transition>>(command)
		.with({ _tag: "Get" }, () => get(state, deps))
		.with({ _tag: "Change" }, ({ argument }) =>
			Effect.succeed(change(state, argument, deps)),
		)
		.with({ _tag: "Show" }, () => Effect.succeed(show(state, deps)))
		.with({ _tag: "Reset" }, () =>
			Effect.succeed({ state: initialState, output: [CLEARED] }),
		)
		.with({ _tag: "Help" }, () =>
			Effect.succeed({ state, output: [HELP_MESSAGE] }),
		)
		.with({ _tag: "Quit" }, () =>
			Effect.succeed({ state: { ...state, running: false }, output: [GOODBYE] }),
		)
		.with({ _tag: "Empty" }, () => Effect.succeed({ state, output: [] }))
		.with({ _tag: "Unknown" }, ({ input }) =>
			Effect.succeed({
				state,
				output: [`Unknown command: ${input}.`, UNKNOWN_HINT],
			}),
		)
		.exhaustive();
}
