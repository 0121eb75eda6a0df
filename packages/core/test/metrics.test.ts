import { describe, expect, it } from "vitest";
import { DEFAULT_LEGEND_CONFIG, toLayoutMetrics } from "../src/config";
import { maxEntryHeight, maxEntryWidth, measureLabel } from "../src/layout";
import { fixedWidthMeasurer, square, stackedSquare } from "./fixtures";

const metrics = toLayoutMetrics(DEFAULT_LEGEND_CONFIG);
const measurer = fixedWidthMeasurer();

describe("Entry metrics", () => {
	it("should add the largest form and form-to-text space to the widest label", () => {
		const entries = [square("ab"), stackedSquare(20), square("abcd")];

		// 24 (abcd) + 20 (stacked override) + 5
		expect(maxEntryWidth(entries, measurer, metrics)).toBe(49);
	});

	it("should return only the form-to-text space for no entries", () => {
		expect(maxEntryWidth([], measurer, metrics)).toBe(5);
	});

	it("should take the tallest labeled entry", () => {
		const tall = fixedWidthMeasurer({ measureHeight: (text) => text.length });

		expect(maxEntryHeight([square("ab"), square("abcde"), stackedSquare()], tall)).toBe(5);
	});

	it("should be zero high when no entry is labeled", () => {
		expect(maxEntryHeight([stackedSquare(), stackedSquare()], measurer)).toBe(0);
		expect(maxEntryHeight([], measurer)).toBe(0);
	});

	it("should count degenerate measurements as zero", () => {
		const broken = fixedWidthMeasurer({ measureWidth: () => Number.NaN, measureHeight: () => -1 });

		expect(measureLabel(broken, "abc")).toEqual({ width: 0, height: 0 });
		expect(maxEntryWidth([square("abc")], broken, metrics)).toBe(13);
	});
});
