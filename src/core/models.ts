// CHANGE: Functional Core domain models for lines (yao) and hexagrams
// WHY: CORE contains only immutable data and pure functions; SHELL renders and reads input
// PURITY: CORE
// INVARIANT: CORE defines no effects; every model is readonly
// COMPLEXITY: O(1)

/**
 * Exit code for the divination table process.
 *
 * @remarks
 * - @pure true
 * - @invariant exitCode ∈ {0, 1}
 */
export type ExitCode = 0 | 1;

/** One coin outcome: 0 = yin side, 1 = yang side. */
export type Coin = 0 | 1;

/** Three coin outcomes in toss order. */
export type Coins = readonly [Coin, Coin, Coin];

/** Binary state of a line. */
export type YaoValue = "yin" | "yang";

/**
 * Traditional classification of a cast line.
 *
 * @remarks
 * "old" lines are the mutable ones (heads ∈ {0, 3}).
 */
export type LineKind = "old-yin" | "young-yang" | "young-yin" | "old-yang";

/**
 * One line of a hexagram.
 *
 * @remarks
 * - @pure true
 * - @invariant (value, mutable) = classify(coins)
 * - @invariant never edited in place; a changed line is a new value
 */
export interface Line {
	readonly value: YaoValue;
	readonly mutable: boolean;
	readonly coins: Coins;
}

/** Line position, 1 = bottom, 6 = top. */
export type Position = 1 | 2 | 3 | 4 | 5 | 6;

export const POSITIONS: readonly Position[] = [1, 2, 3, 4, 5, 6];

/** Exactly six lines, index 0 = position 1. */
export type SixLines = readonly [Line, Line, Line, Line, Line, Line];

/**
 * Six stacked lines with their numeric identity.
 *
 * @remarks
 * - @pure true
 * - @invariant identity = Σ 2^(i-1)·bit(lines[i-1]), identity ∈ [0, 63]
 * - @invariant identity is computed once, at construction
 */
export interface Hexagram {
	readonly lines: SixLines;
	readonly identity: number;
}
