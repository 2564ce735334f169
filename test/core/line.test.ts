// CHANGE: Unit tests for the single coin classification rule
// INVARIANT: ∀c ∈ Coins: (value, mutable) of lineFromCoins(c) follows the sum table

import { describe, expect, it } from "vitest";

import {
	changeLine,
	classifyCoins,
	countHeads,
	lineFromCoins,
	lineKind,
	oppositeValue,
	valueBit,
} from "../../src/core/line.js";
import type { LineKind, YaoValue } from "../../src/core/models.js";
import { ALL_TRIPLES, oldYang, oldYin, youngYang, youngYin } from "../utils/builders.js";

const EXPECTED: Readonly<
	Record<number, { kind: LineKind; value: YaoValue; mutable: boolean }>
> = {
	0: { kind: "old-yin", value: "yin", mutable: true },
	1: { kind: "young-yang", value: "yang", mutable: false },
	2: { kind: "young-yin", value: "yin", mutable: false },
	3: { kind: "old-yang", value: "yang", mutable: true },
};

describe("classifyCoins", () => {
	it("classifies all eight triples by their sum", () => {
		for (const coins of ALL_TRIPLES) {
			const expected = EXPECTED[countHeads(coins)];
			const line = lineFromCoins(coins);
			expect(classifyCoins(coins)).toBe(expected?.kind);
			expect(line.value).toBe(expected?.value);
			expect(line.mutable).toBe(expected?.mutable);
			expect(line.coins).toEqual(coins);
		}
	});

	it("maps each sum to exactly one kind", () => {
		expect(classifyCoins([0, 0, 0])).toBe("old-yin");
		expect(classifyCoins([0, 0, 1])).toBe("young-yang");
		expect(classifyCoins([0, 1, 1])).toBe("young-yin");
		expect(classifyCoins([1, 1, 1])).toBe("old-yang");
	});

	it("ignores coin order", () => {
		expect(classifyCoins([1, 0, 0])).toBe("young-yang");
		expect(classifyCoins([0, 1, 0])).toBe("young-yang");
		expect(classifyCoins([1, 0, 1])).toBe("young-yin");
	});
});

describe("lineKind", () => {
	it("reads the classification back from a line", () => {
		expect(lineKind(oldYin())).toBe("old-yin");
		expect(lineKind(youngYang())).toBe("young-yang");
		expect(lineKind(youngYin())).toBe("young-yin");
		expect(lineKind(oldYang())).toBe("old-yang");
	});
});

describe("changeLine", () => {
	it("turns old yin into young yang with coins summing to 1", () => {
		const changed = changeLine(oldYin());
		expect(changed).toEqual({ value: "yang", mutable: false, coins: [1, 0, 0] });
		expect(classifyCoins(changed.coins)).toBe("young-yang");
	});

	it("turns old yang into young yin with coins summing to 2", () => {
		const changed = changeLine(oldYang());
		expect(changed).toEqual({ value: "yin", mutable: false, coins: [0, 1, 1] });
		expect(classifyCoins(changed.coins)).toBe("young-yin");
	});

	it("returns a new line and leaves the source untouched", () => {
		const source = oldYin();
		const changed = changeLine(source);
		expect(changed).not.toBe(source);
		expect(source).toEqual({ value: "yin", mutable: true, coins: [0, 0, 0] });
	});
});

describe("value helpers", () => {
	it("oppositeValue swaps yin and yang", () => {
		expect(oppositeValue("yin")).toBe("yang");
		expect(oppositeValue("yang")).toBe("yin");
	});

	it("valueBit maps yang to 1 and yin to 0", () => {
		expect(valueBit("yang")).toBe(1);
		expect(valueBit("yin")).toBe(0);
	});
});
