// CHANGE: Hexagram construction, identity encoding and changing-hexagram derivation
// WHY: Identity must always agree with the lines, so it is computed once at construction
// FORMAT THEOREM: identity(h) = Σ_{i=1..6} 2^(i-1) · bit(line_i)
// PURITY: CORE
// INVARIANT: |lines| = 6 ∧ ∀l: l = lineFromCoins(l.coins); derivation returns a new hexagram, the source is untouched
// COMPLEXITY: O(1) (six lines)

import { InvariantViolation } from "./errors.js";
import { changeLine, lineFromCoins, valueBit } from "./line.js";
import {
	type Hexagram,
	type Line,
	POSITIONS,
	type Position,
	type SixLines,
} from "./models.js";

const isSixLines = (lines: readonly Line[]): lines is SixLines =>
	lines.length === 6;

// INVARIANT: value and mutable are exactly what the coins classify as
const agreesWithCoins = (line: Line): boolean => {
	const settled = lineFromCoins(line.coins);
	return settled.value === line.value && settled.mutable === line.mutable;
};

/**
 * Encode line values as an integer, line 1 as the least-significant bit.
 *
 * @param lines - Lines (or bare values) bottom → top
 * @returns Σ 2^(i-1) for every yang line i
 *
 * @pure true
 * @invariant |lines| = 6 → result ∈ [0, 63]
 * @complexity O(n)
 */
export function computeIdentity(
	lines: readonly Pick<Line, "value">[],
): number {
	return lines.reduce(
		(identity, line, index) => identity + valueBit(line.value) * 2 ** index,
		0,
	);
}

/**
 * Build a hexagram from six lines.
 *
 * @param lines - Exactly six lines, bottom → top
 * @returns Hexagram with its identity computed eagerly
 * @throws InvariantViolation when the line count is not six or a line disagrees
 * with its coins (programming error)
 *
 * @pure true
 * @complexity O(1)
 */
export function makeHexagram(lines: readonly Line[]): Hexagram {
	const copy: readonly Line[] = lines.slice();
	if (!isSixLines(copy)) {
		throw new InvariantViolation({
			where: "makeHexagram",
			detail: `a hexagram has exactly 6 lines, got ${copy.length}`,
		});
	}
	const stray = copy.findIndex((line) => !agreesWithCoins(line));
	if (stray !== -1) {
		throw new InvariantViolation({
			where: "makeHexagram",
			detail: `line ${stray + 1} does not match its coins`,
		});
	}
	return { lines: copy, identity: computeIdentity(copy) };
}

/**
 * Line at a 1-based position.
 *
 * @pure true
 * @complexity O(1)
 */
export function lineAt(hexagram: Hexagram, position: Position): Line {
	const [l1, l2, l3, l4, l5, l6] = hexagram.lines;
	const byPosition: Readonly<Record<Position, Line>> = {
		1: l1,
		2: l2,
		3: l3,
		4: l4,
		5: l5,
		6: l6,
	};
	return byPosition[position];
}

/**
 * Positions of the old (mutable) lines, ascending.
 *
 * @pure true
 */
export const mutablePositions = (hexagram: Hexagram): readonly Position[] =>
	POSITIONS.filter((position) => lineAt(hexagram, position).mutable);

/**
 * Split a selection into positions that will change and those that cannot.
 *
 * @param hexagram - Source hexagram
 * @param positions - User selection (duplicates allowed)
 * @returns Both groups ascending and de-duplicated
 *
 * @pure true
 * @invariant changing ∪ unchanging = set(positions) ∧ changing ∩ unchanging = ∅
 * @complexity O(1)
 */
export function partitionPositions(
	hexagram: Hexagram,
	positions: Iterable<Position>,
): {
	readonly changing: readonly Position[];
	readonly unchanging: readonly Position[];
} {
	const selected: ReadonlySet<Position> = new Set(positions);
	const chosen = POSITIONS.filter((position) => selected.has(position));
	return {
		changing: chosen.filter((position) => lineAt(hexagram, position).mutable),
		unchanging: chosen.filter(
			(position) => !lineAt(hexagram, position).mutable,
		),
	};
}

/**
 * Derive the changing hexagram.
 *
 * Every line that is both selected and mutable flips and settles into a young
 * line; every other line is carried over as the same value.
 *
 * @param hexagram - Source hexagram (not modified)
 * @param positions - Selected positions; non-mutable ones are ignored
 * @returns New hexagram with recomputed identity
 *
 * @pure true
 * @postcondition ∀i ∉ positions ∨ ¬mutable(i): result.lines[i] = hexagram.lines[i]
 * @postcondition ∀i ∈ positions ∧ mutable(i): ¬mutable(result.lines[i])
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const changed = deriveChangingHexagram(original, [1, 6]);
 * ```
 */
export function deriveChangingHexagram(
	hexagram: Hexagram,
	positions: Iterable<Position>,
): Hexagram {
	const selected: ReadonlySet<number> = new Set<number>(positions);
	return makeHexagram(
		hexagram.lines.map((line, index) =>
			selected.has(index + 1) && line.mutable ? changeLine(line) : line,
		),
	);
}

/**
 * Six-character binary form, top line first.
 *
 * @pure true
 * @example
 * ```ts
 * toBinaryString(h); // "101010" when identity = 42
 * ```
 */
export const toBinaryString = (hexagram: Hexagram): string =>
	hexagram.identity.toString(2).padStart(6, "0");
