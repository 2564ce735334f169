// CHANGE: Line reader over node:readline for the command loop
// WHY: The loop pulls one line per prompt; end of input and Ctrl-C both end the stream
// PURITY: SHELL (stdin)
// EFFECT: Effect<Option<string>, Error>
// INVARIANT: After close(), next yields Option.none()
// COMPLEXITY: O(1) per line

import { Effect, Option } from "effect";

import { errorMessage } from "../utils/errors.js";
import { readline, TTYReadStream } from "../utils/node-mods.js";

export interface LineReader {
	readonly next: Effect.Effect<Option.Option<string>, Error>;
	readonly close: () => void;
}

/**
 * Open a reader on an input stream.
 *
 * @param input - stdin, or any readable text stream in tests
 * @returns Reader whose `next` waits for the following line
 *
 * @pure false (attaches to the stream)
 */
export function openLineReader(input: NodeJS.ReadableStream): LineReader {
	const terminal = input instanceof TTYReadStream && input.isTTY;
	const rl = readline.createInterface({ input, terminal });
	// Ctrl-C in a terminal ends input the same way EOF does
	rl.on("SIGINT", () => {
		rl.close();
	});
	const lines = rl[Symbol.asyncIterator]();

	return {
		next: Effect.tryPromise({
			try: () => lines.next(),
			catch: (error) => new Error(errorMessage(error)),
		}).pipe(
			Effect.map((result) =>
				result.done === true ? Option.none() : Option.some(result.value),
			),
		),
		close: () => {
			rl.close();
		},
	};
}
