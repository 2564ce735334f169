// CHANGE: Pure line/hexagram rendering, colored or plain
// WHY: Presentation reads a Line's public fields and returns text; Line holds no renderer reference
// PURITY: CORE (chalk only builds strings)
// INVARIANT: Plain palette output contains no ANSI escapes
// COMPLEXITY: O(1): six lines

import { Chalk } from "chalk";
import { match } from "ts-pattern";

import { lineAt } from "../hexagram.js";
import { lineKind } from "../line.js";
import type { Hexagram, Line, Position } from "../models.js";

export const YANG_GLYPH = "#######";
export const YIN_GLYPH = "### ###";

/**
 * Colors for old (changing) and young (settled) lines.
 *
 * @remarks
 * Structural type so tests can pass identity functions.
 */
export interface Palette {
	readonly old: (text: string) => string;
	readonly young: (text: string) => string;
}

/**
 * Build a palette; `colored = false` yields plain text.
 *
 * @pure true
 * @invariant colored = false → ∀t: old(t) = young(t) = t
 */
export function makePalette(colored: boolean): Palette {
	const chalk = new Chalk({ level: colored ? 1 : 0 });
	return {
		old: (text) => chalk.blueBright(text),
		young: (text) => chalk.redBright(text),
	};
}

/**
 * Render one line: glyph, color by age, marker for old lines.
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * renderLine(lineFromCoins([0, 0, 0]), makePalette(false)); // "### ### x"
 * ```
 */
export function renderLine(line: Line, palette: Palette): string {
	const glyph = line.value === "yang" ? YANG_GLYPH : YIN_GLYPH;
	return match(lineKind(line))
		.with("old-yin", () => `${palette.old(glyph)} x`)
		.with("old-yang", () => `${palette.old(glyph)} o`)
		.with("young-yin", "young-yang", () => palette.young(glyph))
		.exhaustive();
}

const TOP_DOWN: readonly Position[] = [6, 5, 4, 3, 2, 1];

/**
 * Render a hexagram top → bottom, each row prefixed with its position.
 *
 * @pure true
 * @postcondition result.length = 6 ∧ result[0] starts with "6 "
 */
export const renderHexagram = (
	hexagram: Hexagram,
	palette: Palette,
): readonly string[] =>
	TOP_DOWN.map(
		(position) =>
			`${position} ${renderLine(lineAt(hexagram, position), palette)}`,
	);
