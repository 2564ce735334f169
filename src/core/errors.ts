// CHANGE: Typed domain error ADT for the divination core using Effect.Data
// WHY: Errors are explicit values in signatures instead of untyped exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values, discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Invariant violation - a programming error, not recoverable at runtime.
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 * @complexity O(1)
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * User asked for a line position outside 1..6.
 *
 * @pure true (Data class)
 * @invariant position < 1 ∨ position > 6
 */
export class InvalidPosition extends Data.TaggedError("InvalidPosition")<{
	readonly position: number;
}> {}

/**
 * A change request carried no usable position numbers.
 *
 * @pure true (Data class)
 */
export class MissingPositions extends Data.TaggedError("MissingPositions")<{
	readonly reason: "no-argument" | "no-numbers";
}> {}

/**
 * Interpretation corpus could not be read or parsed.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class CorpusError extends Data.TaggedError("CorpusError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/**
 * Configuration file could not be read or parsed.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly path: string;
	readonly detail: string;
}> {}

/** Errors produced while parsing a change request. */
export type PositionError = InvalidPosition | MissingPositions;

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError =
	| InvariantViolation
	| InvalidPosition
	| MissingPositions
	| CorpusError
	| ConfigError;
