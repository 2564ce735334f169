// CHANGE: Parse user-supplied changing-line positions
// WHY: Out-of-range input is a rejected request, never clamped or wrapped
// FORMAT THEOREM: parsePositions(s) = Right(ps) → ∀p ∈ ps: 1 ≤ p ≤ 6
// PURITY: CORE
// INVARIANT: Result is ascending and de-duplicated
// COMPLEXITY: O(n) where n = |argument|

import { Either } from "effect";

import {
	InvalidPosition,
	MissingPositions,
	type PositionError,
} from "./errors.js";
import { POSITIONS, type Position } from "./models.js";

/**
 * Narrow a number to a line position.
 *
 * @pure true
 * @invariant Right(p) ⇔ n ∈ {1..6}
 */
export function toPosition(n: number): Either.Either<Position, InvalidPosition> {
	const position = POSITIONS.find((candidate) => candidate === n);
	return position === undefined
		? Either.left(new InvalidPosition({ position: n }))
		: Either.right(position);
}

/**
 * Extract positions from the argument of a change command.
 *
 * Every run of digits counts, so "1,3,5", "2 4 6" and "1;6" all work.
 *
 * @param argument - Text after the command word
 * @returns Positions, or the first error found
 *
 * @pure true
 * @complexity O(n)
 *
 * @example
 * ```ts
 * parsePositions("6, 1, 1"); // Right([1, 6])
 * parsePositions("0 3");     // Left(InvalidPosition { position: 0 })
 * ```
 */
export function parsePositions(
	argument: string,
): Either.Either<readonly Position[], PositionError> {
	if (argument.trim().length === 0) {
		return Either.left(new MissingPositions({ reason: "no-argument" }));
	}
	const digits = argument.match(/\d+/g) ?? [];
	if (digits.length === 0) {
		return Either.left(new MissingPositions({ reason: "no-numbers" }));
	}
	const numbers = [
		...new Set(digits.map((run) => Number.parseInt(run, 10))),
	].sort((a, b) => a - b);
	return Either.all(numbers.map(toPosition));
}
