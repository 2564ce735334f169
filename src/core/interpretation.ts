// CHANGE: Pure interpretation lookup keyed by King Wen number
// WHY: The corpus is ordered by the King Wen sequence; identity → number comes from each entry's own lines
// FORMAT THEOREM: key(identity) = entry.number where computeIdentity(entry.lines) = identity
// PURITY: CORE
// INVARIANT: Lookup never fails; a missing entry yields a placeholder string
// COMPLEXITY: O(1) per lookup, O(n) to build

import { computeIdentity } from "./hexagram.js";
import type { Hexagram, YaoValue } from "./models.js";

/**
 * One interpretation entry.
 *
 * @remarks
 * - @invariant 1 ≤ number ≤ 64
 * - @invariant lines.length = 6, bottom → top
 */
export interface HexagramEntry {
	readonly number: number;
	readonly symbol: string;
	readonly name: string;
	readonly pinyin: string;
	readonly title: string;
	readonly judgment: string;
	readonly image: string;
	readonly lines: readonly YaoValue[];
}

/** Entries indexed by hexagram identity. */
export interface Corpus {
	readonly byIdentity: ReadonlyMap<number, HexagramEntry>;
}

export const EMPTY_CORPUS: Corpus = { byIdentity: new Map() };

/**
 * Index entries by the identity of their line pattern.
 *
 * @pure true
 * @invariant later entries win when two share a pattern
 */
export function makeCorpus(entries: readonly HexagramEntry[]): Corpus {
	return {
		byIdentity: new Map(
			entries.map((entry) => [
				computeIdentity(entry.lines.map((value) => ({ value }))),
				entry,
			]),
		),
	};
}

/** King Wen number for an identity, when the corpus knows it. */
export const corpusKey = (
	corpus: Corpus,
	identity: number,
): number | undefined => corpus.byIdentity.get(identity)?.number;

/** Two-digit identity used in the placeholder. */
const pad2 = (n: number): string => n.toString().padStart(2, "0");

/**
 * Text block for one entry.
 *
 * @pure true
 */
export function formatEntry(entry: HexagramEntry): string {
	return [
		`${entry.number}. ${entry.symbol} ${entry.name} (${entry.pinyin}): ${entry.title}`,
		`Judgment: ${entry.judgment}`,
		`Image: ${entry.image}`,
	].join("\n");
}

/**
 * Interpretation text for a hexagram.
 *
 * @param corpus - Loaded corpus (possibly empty)
 * @param hexagram - Hexagram to interpret
 * @returns Entry text, or a "not found" placeholder
 *
 * @pure true
 * @complexity O(1)
 */
export function interpret(corpus: Corpus, hexagram: Hexagram): string {
	const entry = corpus.byIdentity.get(hexagram.identity);
	return entry === undefined
		? `Hexagram interpretation for identity ${pad2(hexagram.identity)} not found.`
		: formatEntry(entry);
}
