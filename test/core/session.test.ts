// CHANGE: State-machine tests for the session controller with stub collaborators
// PURITY: CORE (seeded Random for get)
// INVARIANT: changed ≠ null → original ≠ null; quit is the only command that stops the session

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

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
} from "../../src/core/format/messages.js";
import { generateHexagram, withSeed } from "../../src/core/generator.js";
import type { Hexagram } from "../../src/core/models.js";
import {
	type Command,
	initialState,
	parseCommand,
	type SessionDeps,
	type SessionState,
	step,
	type Transition,
} from "../../src/core/session.js";
import { scenarioHexagram } from "../utils/builders.js";

const deps: SessionDeps = {
	render: (hexagram) => [`rows(${hexagram.identity})`],
	interpret: (hexagram) => `meaning(${hexagram.identity})`,
};

const run = (state: SessionState, input: string): Transition =>
	Effect.runSync(step(state, parseCommand(input), deps));

const withOriginal = (original: Hexagram = scenarioHexagram()): SessionState => ({
	...initialState,
	original,
});

describe("parseCommand", () => {
	it.each<[string, Command]>([
		["g", { _tag: "Get" }],
		["GET", { _tag: "Get" }],
		["c 1,6", { _tag: "Change", argument: "1,6" }],
		["Change   2 4 6 ", { _tag: "Change", argument: "2 4 6" }],
		["c", { _tag: "Change", argument: "" }],
		["s", { _tag: "Show" }],
		["show", { _tag: "Show" }],
		["clear", { _tag: "Reset" }],
		["reset", { _tag: "Reset" }],
		["h", { _tag: "Help" }],
		["help", { _tag: "Help" }],
		["q", { _tag: "Quit" }],
		["quit", { _tag: "Quit" }],
		["exit", { _tag: "Quit" }],
		["system", { _tag: "Quit" }],
		["   ", { _tag: "Empty" }],
		["  divine now ", { _tag: "Unknown", input: "divine now" }],
	])("parses %j", (input, expected) => {
		expect(parseCommand(input)).toEqual(expected);
	});
});

describe("get", () => {
	it("casts an original hexagram and reports it", () => {
		const expected = Effect.runSync(generateHexagram.pipe(withSeed(21)));
		const transition = Effect.runSync(
			step(initialState, { _tag: "Get" }, deps).pipe(withSeed(21)),
		);
		expect(transition.state.original).toEqual(expected);
		expect(transition.state.changed).toBeNull();
		expect(transition.output).toEqual([
			"Original Hexagram:",
			`rows(${expected.identity})`,
			`Identity: ${expected.identity} (${expected.identity.toString(2).padStart(6, "0")})`,
			"",
			`meaning(${expected.identity})`,
		]);
	});

	it("drops a previously changed hexagram", () => {
		const state: SessionState = {
			original: scenarioHexagram(),
			changed: scenarioHexagram(),
			running: true,
		};
		expect(run(state, "g").state.changed).toBeNull();
	});
});

describe("change", () => {
	it("asks for an original hexagram first", () => {
		const transition = run(initialState, "c 1");
		expect(transition.output).toEqual([NO_ORIGINAL]);
		expect(transition.state).toBe(initialState);
	});

	it("derives the changing hexagram from the mutable positions", () => {
		const transition = run(withOriginal(), "c 1,6");
		expect(transition.state.changed?.identity).toBe(11);
		expect(transition.output).toEqual([
			"Changing positions: 1, 6",
			"",
			"Changing Hexagram:",
			"rows(11)",
			"Identity: 11 (001011)",
			"",
			"meaning(11)",
		]);
	});

	it("warns about young lines and changes the rest", () => {
		const transition = run(withOriginal(), "change 2 6");
		expect(transition.state.changed?.identity).toBe(10);
		expect(transition.output.slice(0, 2)).toEqual([
			"Warning: The Yao 2 (Yang) is not changing (young Yang).",
			"Changing positions: 6",
		]);
	});

	it("keeps the original when nothing selected can change", () => {
		const state = withOriginal();
		const transition = run(state, "c 3");
		expect(transition.state).toBe(state);
		expect(transition.output).toEqual([
			"Warning: The Yao 3 (Yin) is not changing (young Yin).",
			NO_CHANGEABLE,
		]);
	});

	it("rejects an out-of-range position", () => {
		const transition = run(withOriginal(), "c 1 7");
		expect(transition.output).toEqual([
			"Error: The yao position must be between 1-6, given 7.",
		]);
		expect(transition.state.changed).toBeNull();
	});

	it("prints usage when no argument is given", () => {
		expect(run(withOriginal(), "c").output).toEqual(CHANGE_USAGE);
	});

	it("reports an argument without numbers", () => {
		expect(run(withOriginal(), "c top").output).toEqual([NO_NUMBERS]);
	});
});

describe("show", () => {
	it("needs a hexagram", () => {
		expect(run(initialState, "s").output).toEqual([NO_HEXAGRAM]);
	});

	it("shows the original alone", () => {
		expect(run(withOriginal(), "show").output).toEqual([
			"Current Hexagrams:",
			"",
			"Original Hexagram:",
			"rows(42)",
		]);
	});

	it("shows both hexagrams after a change", () => {
		const changed = run(withOriginal(), "c 1,6").state;
		expect(run(changed, "s").output).toEqual([
			"Current Hexagrams:",
			"",
			"Original Hexagram:",
			"rows(42)",
			"",
			"Changing Hexagram:",
			"rows(11)",
		]);
	});
});

describe("other commands", () => {
	it("reset clears the table", () => {
		const changed = run(withOriginal(), "c 1").state;
		const transition = run(changed, "clear");
		expect(transition.state).toEqual(initialState);
		expect(transition.output).toEqual([CLEARED]);
	});

	it("help prints the command list", () => {
		expect(run(initialState, "h").output).toEqual([HELP_MESSAGE]);
	});

	it("quit stops the session and keeps the hexagrams", () => {
		const state = withOriginal();
		const transition = run(state, "q");
		expect(transition.state).toEqual({ ...state, running: false });
		expect(transition.output).toEqual([GOODBYE]);
	});

	it("empty input prints nothing", () => {
		expect(run(initialState, "").output).toEqual([]);
	});

	it("unknown input points at help", () => {
		expect(run(initialState, "divine").output).toEqual([
			"Unknown command: divine.",
			UNKNOWN_HINT,
		]);
	});
});
