// CHANGE: Read the interpretation corpus from data/hexagrams.json
// WHY: Keep IO in SHELL; validation and indexing are pure and delegate to CORE
// FORMAT THEOREM: loadCorpus(p) = makeCorpus(validEntries(parse(read(p))))
// PURITY: SHELL
// EFFECT: Effect<Corpus, CorpusError>
// INVARIANT: Invalid entries are skipped; only an unreadable file or a non-array fails
// COMPLEXITY: O(n) where n = |entries|

import { Effect } from "effect";

import { CorpusError } from "../../core/errors.js";
import {
	type Corpus,
	type HexagramEntry,
	makeCorpus,
} from "../../core/interpretation.js";
import type { YaoValue } from "../../core/models.js";
import {
	isArray,
	isJSONObject,
	isNumber,
	isString,
	type JSONObject,
	type JSONValue,
	parseJSON,
} from "../config/json.js";
import { errorMessage } from "../utils/errors.js";
import { fileURLToPath, fs } from "../utils/node-mods.js";

/** Bundled corpus, resolved from this module (src/ or dist/ alike). */
export const DEFAULT_CORPUS_PATH = fileURLToPath(
	new URL("../../../data/hexagrams.json", import.meta.url),
);

const bitToValue = (bit: JSONValue): YaoValue | null =>
	bit === 1 ? "yang" : bit === 0 ? "yin" : null;

/**
 * Six 0/1 bits, bottom → top, as line values.
 *
 * @pure true
 */
function validateLines(value: JSONValue | undefined): readonly YaoValue[] | null {
	if (value === undefined || !isArray(value) || value.length !== 6) return null;
	const values = value
		.map(bitToValue)
		.filter((v): v is YaoValue => v !== null);
	return values.length === 6 ? values : null;
}

/**
 * Validate one corpus entry.
 *
 * @pure true
 * @invariant Right shape ∧ 1 ≤ number ≤ 64 ∧ six bits → entry; otherwise null
 */
export function validateEntry(value: JSONValue): HexagramEntry | null {
	if (!isJSONObject(value)) return null;
	const fields: JSONObject = value;
	const number = fields["number"];
	if (
		number === undefined ||
		!isNumber(number) ||
		!Number.isInteger(number) ||
		number < 1 ||
		number > 64
	) {
		return null;
	}
	const lines = validateLines(fields["lines"]);
	if (lines === null) return null;

	const text = (key: string): string | null => {
		const field = fields[key];
		return field !== undefined && isString(field) ? field : null;
	};
	const symbol = text("symbol");
	const name = text("name");
	const pinyin = text("pinyin");
	const title = text("title");
	const judgment = text("judgment");
	const image = text("image");
	if (
		symbol === null ||
		name === null ||
		pinyin === null ||
		title === null ||
		judgment === null ||
		image === null
	) {
		return null;
	}
	return { number, symbol, name, pinyin, title, judgment, image, lines };
}

/**
 * Build a corpus from parsed JSON.
 *
 * @pure true
 * @returns null when the document is not an array
 */
export function corpusFromJSON(document: JSONValue): Corpus | null {
	if (!isArray(document)) return null;
	const entries = document
		.map(validateEntry)
		.filter((entry): entry is HexagramEntry => entry !== null);
	return makeCorpus(entries);
}

/**
 * Load the corpus file.
 *
 * @param corpusPath - JSON file with an array of entries
 * @returns Effect with the indexed corpus
 *
 * @pure false (reads the filesystem)
 * @effect Effect<Corpus, CorpusError>
 * @complexity O(n)
 */
export function loadCorpus(
	corpusPath: string = DEFAULT_CORPUS_PATH,
): Effect.Effect<Corpus, CorpusError> {
	return Effect.tryPromise({
		try: () => fs.promises.readFile(corpusPath, "utf8"),
		catch: (error) =>
			new CorpusError({ path: corpusPath, detail: errorMessage(error) }),
	}).pipe(
		Effect.flatMap((text) =>
			Effect.try({
				try: () => parseJSON(text),
				catch: (error) =>
					new CorpusError({ path: corpusPath, detail: errorMessage(error) }),
			}),
		),
		Effect.flatMap((document) => {
			const corpus = corpusFromJSON(document);
			return corpus === null
				? Effect.fail(
						new CorpusError({
							path: corpusPath,
							detail: "expected a JSON array of hexagram entries",
						}),
					)
				: Effect.succeed(corpus);
		}),
	);
}
