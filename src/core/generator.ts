// CHANGE: Three-coin hexagram generator on top of Effect's Random service
// WHY: The random source is a service in the context, so tests and --seed swap it without touching this module
// SOURCE: https://effect.website/docs/scheduling/random (Random service)
// PURITY: CORE (randomness only through the Random service)
// EFFECT: Effect<Hexagram, never, never>
// INVARIANT: 6 lines × 3 independent fair coins; no state carried between runs
// COMPLEXITY: O(1): 18 draws

import { Effect, Random } from "effect";

import { makeHexagram } from "./hexagram.js";
import { lineFromCoins } from "./line.js";
import type { Coin, Hexagram, Line } from "./models.js";

/**
 * One fair coin: yang side = 1.
 *
 * @effect Effect<Coin>: consumes one draw from Random
 */
export const tossCoin: Effect.Effect<Coin> = Random.nextBoolean.pipe(
	Effect.map((yangSide): Coin => (yangSide ? 1 : 0)),
);

/**
 * One line from three coin tosses.
 *
 * @effect Effect<Line>: consumes three draws from Random
 * @postcondition result = lineFromCoins(result.coins)
 */
export const castLine: Effect.Effect<Line> = Effect.all([
	tossCoin,
	tossCoin,
	tossCoin,
]).pipe(Effect.map(lineFromCoins));

/**
 * Fresh hexagram, positions 1..6 cast bottom → top.
 *
 * @effect Effect<Hexagram>: a failing Random surfaces as a defect, never a fixed value
 * @invariant result.lines.length = 6
 * @complexity O(1)
 *
 * @example
 * ```ts
 * const hexagram = Effect.runSync(generateHexagram.pipe(withSeed(7)));
 * ```
 */
export const generateHexagram: Effect.Effect<Hexagram> =
	Effect.replicateEffect(castLine, 6).pipe(Effect.map(makeHexagram));

/**
 * Run an effect against a deterministic Random seeded with `seed`.
 *
 * @pure true (returns a transformer)
 * @invariant same seed → same sequence of casts
 */
export const withSeed =
	(seed: number) =>
	<A, E, R>(effect: Effect.Effect<A, E, R>): Effect.Effect<A, E, R> =>
		Effect.withRandom(effect, Random.make(seed));
