// CHANGE: Single classification rule for three-coin lines
// WHY: Generator and renderer must agree on how a coin triple maps to a line
// FORMAT THEOREM: ∀c ∈ Coins: lineFromCoins(c) = (traits(classify(c)), c)
// PURITY: CORE
// INVARIANT: value and mutable are never set apart from a coin triple
// COMPLEXITY: O(1)

import { match } from "ts-pattern";

import type { Coin, Coins, Line, LineKind, YaoValue } from "./models.js";

interface LineTraits {
	readonly value: YaoValue;
	readonly mutable: boolean;
}

const TRAITS: Readonly<Record<LineKind, LineTraits>> = {
	"old-yin": { value: "yin", mutable: true },
	"young-yang": { value: "yang", mutable: false },
	"young-yin": { value: "yin", mutable: false },
	"old-yang": { value: "yang", mutable: true },
};

// Coin triples for a line that has just changed: new yang → sum 1, new yin → sum 2.
const SETTLED_COINS: Readonly<Record<YaoValue, Coins>> = {
	yang: [1, 0, 0],
	yin: [0, 1, 1],
};

/**
 * Number of yang-side coins in a triple.
 *
 * @pure true
 * @invariant result ∈ [0, 3]
 */
export const countHeads = (coins: Coins): number =>
	coins[0] + coins[1] + coins[2];

/**
 * Classify a coin triple by its sum.
 *
 * @param coins - Three coin outcomes
 * @returns old-yin (0), young-yang (1), young-yin (2), old-yang (3)
 *
 * @pure true
 * @invariant |coins| = 3 → heads ∈ [0, 3], so the fallback arm is heads = 3
 * @complexity O(1)
 *
 * @example
 * ```ts
 * classifyCoins([0, 0, 1]); // "young-yang"
 * ```
 */
export function classifyCoins(coins: Coins): LineKind {
	return match<number, LineKind>(countHeads(coins))
		.with(0, () => "old-yin")
		.with(1, () => "young-yang")
		.with(2, () => "young-yin")
		.otherwise(() => "old-yang");
}

/**
 * Build a line from its coin triple.
 *
 * @pure true
 * @postcondition classifyCoins(result.coins) agrees with result.value/mutable
 * @complexity O(1)
 */
export function lineFromCoins(coins: Coins): Line {
	const traits = TRAITS[classifyCoins(coins)];
	return { value: traits.value, mutable: traits.mutable, coins };
}

/** Classification of an existing line. */
export const lineKind = (line: Line): LineKind => classifyCoins(line.coins);

/** Yin ↔ Yang. */
export const oppositeValue = (value: YaoValue): YaoValue =>
	value === "yin" ? "yang" : "yin";

/** Yang = 1, Yin = 0. */
export const valueBit = (value: YaoValue): Coin => (value === "yang" ? 1 : 0);

/**
 * The line a mutable line turns into.
 *
 * CHANGE: Synthesize a young coin triple for the flipped value
 * INVARIANT: result.value = ¬line.value ∧ result.mutable = false
 *
 * @pure true
 * @complexity O(1)
 */
export function changeLine(line: Line): Line {
	return lineFromCoins(SETTLED_COINS[oppositeValue(line.value)]);
}
