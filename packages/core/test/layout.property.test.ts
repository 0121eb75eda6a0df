import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { LegendForm, LegendOrientation } from "@legend-layout/constants";
import { labeledEntry, stackedEntry, type LegendEntry } from "../src/entries";
import { LegendLayoutEngine } from "../src/layout";
import { DEFAULT_LEGEND_CONFIG } from "../src/config";
import { CHAR_WIDTH, fixedWidthMeasurer, viewport } from "./fixtures";

const { formSize: FORM_SIZE, formToTextSpace: FORM_TO_TEXT_SPACE, stackSpace: STACK_SPACE } = DEFAULT_LEGEND_CONFIG;

const measurer = fixedWidthMeasurer();

const formArb = fc.constantFrom(
	LegendForm.NONE,
	LegendForm.EMPTY,
	LegendForm.DEFAULT,
	LegendForm.SQUARE,
	LegendForm.CIRCLE,
	LegendForm.LINE,
);

const entryArb: fc.Arbitrary<LegendEntry> = fc.oneof(
	fc
		.record({ text: fc.string({ maxLength: 20 }), form: formArb, formSize: fc.option(fc.integer({ min: 0, max: 30 }), { nil: undefined }) })
		.map(({ text, form, formSize }) => labeledEntry(text, { form, formSize })),
	fc
		.record({ form: formArb, formSize: fc.option(fc.integer({ min: 0, max: 30 }), { nil: undefined }) })
		.map(({ form, formSize }) => stackedEntry({ form, formSize })),
);

const entriesArb = fc.array(entryArb, { maxLength: 25 });
const widthArb = fc.integer({ min: 0, max: 600 });

/**
 * First and last index of every group, as the flow groups entries.
 */
function groups(entries: LegendEntry[]): Array<{ start: number; end: number }> {
	const result: Array<{ start: number; end: number }> = [];
	let start = 0;
	entries.forEach((entry, i) => {
		if (entry.label.kind === "labeled" || i === entries.length - 1) {
			result.push({ start, end: i });
			start = i + 1;
		}
	});
	return result;
}

/**
 * Width a group needs on its line under the default config.
 */
function groupWidth(entries: LegendEntry[], group: { start: number; end: number }): number {
	let width = STACK_SPACE * (group.end - group.start);
	for (let i = group.start; i <= group.end; i++) {
		const entry = entries[i];
		const form = entry.form === LegendForm.NONE ? 0 : (entry.formSize ?? FORM_SIZE);
		width += form;
		if (entry.label.kind === "labeled") {
			width += entry.label.text.length * CHAR_WIDTH + (entry.form === LegendForm.NONE ? 0 : FORM_TO_TEXT_SPACE);
		}
	}
	return width;
}

function wrappingEngine(): LegendLayoutEngine {
	return new LegendLayoutEngine({ wordWrapEnabled: true, maxSizePercent: 1, xOffset: 0, yOffset: 0 });
}

describe("LegendLayoutEngine - Property Tests", () => {
	it("should be deterministic", () => {
		fc.assert(
			fc.property(entriesArb, widthArb, fc.boolean(), (entries, width, wrap) => {
				const engine = new LegendLayoutEngine({ wordWrapEnabled: wrap });
				const first = engine.calculateDimensions(entries, measurer, viewport(width));
				const second = engine.calculateDimensions(entries, measurer, viewport(width));
				expect(second).toEqual(first);
			}),
		);
	});

	it("should align label sizes and break points with the entries", () => {
		fc.assert(
			fc.property(entriesArb, widthArb, (entries, width) => {
				const result = wrappingEngine().calculateDimensions(entries, measurer, viewport(width));
				expect(result.labelSizes).toHaveLength(entries.length);
				expect(result.labelBreakPoints).toHaveLength(entries.length);
				expect(result.lineSizes.length >= 1).toBe(entries.length >= 1);
			}),
		);
	});

	it("should never need negative space in either orientation", () => {
		fc.assert(
			fc.property(
				entriesArb,
				widthArb,
				fc.constantFrom(LegendOrientation.HORIZONTAL, LegendOrientation.VERTICAL),
				(entries, width, orientation) => {
					const engine = new LegendLayoutEngine({ orientation, wordWrapEnabled: true });
					const result = engine.calculateDimensions(entries, measurer, viewport(width));
					expect(result.neededWidth).toBeGreaterThanOrEqual(5);
					expect(result.neededHeight).toBeGreaterThanOrEqual(3);
				},
			),
		);
	});

	it("should only break at the first entry of a group", () => {
		fc.assert(
			fc.property(entriesArb, widthArb, (entries, width) => {
				const result = wrappingEngine().calculateDimensions(entries, measurer, viewport(width));
				for (const group of groups(entries)) {
					for (let i = group.start + 1; i <= group.end; i++) {
						expect(result.labelBreakPoints[i]).toBe(false);
					}
				}
			}),
		);
	});

	it("should produce one line more than the number of break points", () => {
		fc.assert(
			fc.property(entriesArb.filter((e) => e.length > 0), widthArb, (entries, width) => {
				const result = wrappingEngine().calculateDimensions(entries, measurer, viewport(width));
				const breaks = result.labelBreakPoints.filter(Boolean).length;
				expect(result.lineSizes).toHaveLength(breaks + 1);
			}),
		);
	});

	it("should keep lines within the content width when every group fits", () => {
		fc.assert(
			fc.property(entriesArb, widthArb, (entries, width) => {
				const widest = Math.max(0, ...groups(entries).map((group) => groupWidth(entries, group)));
				fc.pre(widest <= width);

				const result = wrappingEngine().calculateDimensions(entries, measurer, viewport(width));
				for (const line of result.lineSizes) {
					expect(line.width).toBeLessThanOrEqual(width);
				}
			}),
		);
	});

	it("should produce exactly one line with word wrap disabled", () => {
		fc.assert(
			fc.property(entriesArb.filter((e) => e.length > 0), widthArb, (entries, width) => {
				const engine = new LegendLayoutEngine({ wordWrapEnabled: false });
				const result = engine.calculateDimensions(entries, measurer, viewport(width));
				expect(result.lineSizes).toHaveLength(1);
				expect(result.labelBreakPoints.some(Boolean)).toBe(false);
			}),
		);
	});
});
