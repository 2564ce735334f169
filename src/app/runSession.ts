// CHANGE: Application layer orchestration of the divination table
// WHY: APP composes CORE (session state machine) with SHELL (config, corpus, readline, output)
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Returns ExitCode as value; config/corpus failures degrade with a warning, never abort
// COMPLEXITY: O(k) where k = commands entered

import { Effect, Option } from "effect";

import { EMPTY_CORPUS, interpret } from "../core/interpretation.js";
import { PROMPT, WELCOME_MESSAGE, END_OF_INPUT } from "../core/format/messages.js";
import { makePalette, renderHexagram } from "../core/format/render.js";
import { withSeed } from "../core/generator.js";
import type { ExitCode } from "../core/models.js";
import {
	initialState,
	parseCommand,
	type SessionDeps,
	step,
} from "../core/session.js";
import { resolveSettings } from "../core/settings.js";
import type { CLIOptions, SessionSettings } from "../core/types/index.js";
import { defaultConfigPath, loadTableConfig, parseCLIArgs } from "../shell/config/index.js";
import { DEFAULT_CORPUS_PATH, loadCorpus } from "../shell/corpus/loader.js";
import {
	reportConfigError,
	reportCorpusError,
	writeLines,
	writeRaw,
} from "../shell/output/index.js";
import { type LineReader, openLineReader } from "../shell/session/reader.js";

/**
 * Streams and environment the session talks to.
 *
 * @remarks
 * Defaults to the process; tests pass in-memory streams.
 */
export interface SessionIO {
	readonly input: NodeJS.ReadableStream;
	readonly output: NodeJS.WritableStream;
	readonly env: NodeJS.ProcessEnv;
}

const processIO = (): SessionIO => ({
	input: process.stdin,
	output: process.stdout,
	env: process.env,
});

/**
 * Merge CLI, environment and config file into session settings.
 *
 * @pure false (reads config file; warns on failure)
 * @effect Effect<SessionSettings, never>
 */
function loadSettings(
	cliOptions: CLIOptions,
	env: NodeJS.ProcessEnv,
): Effect.Effect<SessionSettings> {
	return loadTableConfig(cliOptions.configPath ?? defaultConfigPath()).pipe(
		Effect.catchAll((error) => {
			reportConfigError(error);
			return Effect.succeed({});
		}),
		Effect.map((fileConfig) =>
			resolveSettings(
				cliOptions,
				fileConfig,
				{ noColor: env["NO_COLOR"] !== undefined },
				DEFAULT_CORPUS_PATH,
			),
		),
	);
}

/**
 * Build the rendering and interpretation collaborators.
 *
 * @pure false (reads corpus file; warns on failure)
 * @effect Effect<SessionDeps, never>
 */
function loadDeps(settings: SessionSettings): Effect.Effect<SessionDeps> {
	const palette = makePalette(settings.colored);
	return loadCorpus(settings.corpusPath).pipe(
		Effect.catchAll((error) => {
			reportCorpusError(error);
			return Effect.succeed(EMPTY_CORPUS);
		}),
		Effect.map(
			(corpus): SessionDeps => ({
				render: (hexagram) => renderHexagram(hexagram, palette),
				interpret: (hexagram) => interpret(corpus, hexagram),
			}),
		),
	);
}

/**
 * Prompt, read, step, print until quit or end of input.
 *
 * @effect Effect<ExitCode, Error>: fails only when reading input fails
 * @invariant Exactly one prompt per line read
 */
function commandLoop(
	reader: LineReader,
	output: NodeJS.WritableStream,
	deps: SessionDeps,
): Effect.Effect<ExitCode, Error> {
	return Effect.gen(function* () {
		let state = initialState;
		while (state.running) {
			writeRaw(output, PROMPT);
			const line = yield* reader.next;
			if (Option.isNone(line)) {
				writeLines(output, [END_OF_INPUT]);
				break;
			}
			const transition = yield* step(state, parseCommand(line.value), deps);
			writeLines(output, transition.output);
			state = transition.state;
		}
		const done: ExitCode = 0;
		return done;
	});
}

/**
 * Run one interactive divination session.
 *
 * CHANGE: Use Effect.gen for orchestration; reader lifetime via acquireUseRelease
 * WHY: The readline interface is closed on every exit path
 *
 * @param cliOptions - Parsed CLI options
 * @param io - Streams and environment (default: the process)
 * @returns Effect<ExitCode, never>
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @invariant ExitCode = 1 only when input cannot be read
 * @postcondition --seed n → every cast in the session is reproducible
 */
export function runSession(
	cliOptions: CLIOptions,
	io: SessionIO = processIO(),
): Effect.Effect<ExitCode> {
	return Effect.gen(function* () {
		const settings = yield* loadSettings(cliOptions, io.env);
		const deps = yield* loadDeps(settings);

		writeLines(io.output, [WELCOME_MESSAGE]);
		if (settings.question !== undefined) {
			writeLines(io.output, [`Question: ${settings.question}`, "-".repeat(40)]);
		}

		const session = Effect.acquireUseRelease(
			Effect.sync(() => openLineReader(io.input)),
			(reader) => commandLoop(reader, io.output, deps),
			(reader) => Effect.sync(reader.close),
		);
		const seeded =
			settings.seed === undefined ? session : session.pipe(withSeed(settings.seed));

		return yield* seeded.pipe(
			Effect.catchAll((error) => {
				console.error("Unable to read input:", error.message);
				const failed: ExitCode = 1;
				return Effect.succeed(failed);
			}),
		);
	});
}

/**
 * Main entry point for the application.
 *
 * @returns Effect<ExitCode, never>
 * @pure false (coordinates effects)
 * @complexity O(1) - orchestration only
 */
export function main(): Effect.Effect<ExitCode> {
	return runSession(parseCLIArgs());
}
