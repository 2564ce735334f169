// CHANGE: Centralize line/hexagram builders used across tests
// WHY: Builders are pure and reusable; tests stay focused on assertions

import { makeHexagram } from "../../src/core/hexagram.js";
import { lineFromCoins } from "../../src/core/line.js";
import type { Coins, Hexagram, Line } from "../../src/core/models.js";

/** Old yin: sum 0. */
export const oldYin = (): Line => lineFromCoins([0, 0, 0]);
/** Young yang: sum 1. */
export const youngYang = (): Line => lineFromCoins([0, 0, 1]);
/** Young yin: sum 2. */
export const youngYin = (): Line => lineFromCoins([1, 1, 0]);
/** Old yang: sum 3. */
export const oldYang = (): Line => lineFromCoins([1, 1, 1]);

/** Hexagram from six coin triples, bottom → top. */
export const hexagramOf = (triples: readonly Coins[]): Hexagram =>
	makeHexagram(triples.map(lineFromCoins));

/**
 * Bottom → top: Yin(000), Yang(001), Yin(110), Yang(001), Yin(110), Yang(111).
 * Mutable at positions 1 and 6; identity 42.
 */
export const scenarioHexagram = (): Hexagram =>
	hexagramOf([
		[0, 0, 0],
		[0, 0, 1],
		[1, 1, 0],
		[0, 0, 1],
		[1, 1, 0],
		[1, 1, 1],
	]);

/** The eight possible coin triples. */
export const ALL_TRIPLES: readonly Coins[] = [
	[0, 0, 0],
	[0, 0, 1],
	[0, 1, 0],
	[1, 0, 0],
	[0, 1, 1],
	[1, 0, 1],
	[1, 1, 0],
	[1, 1, 1],
];
