import { LegendForm } from "@legend-layout/constants";
import { labeledEntry, stackedEntry } from "../src/entries";
import type { LegendEntry } from "../src/entries";
import type { TextMeasurer, Viewport } from "../src/layout";

export const CHAR_WIDTH = 6;
export const TEXT_HEIGHT = 10;
export const LINE_HEIGHT = 12;
export const LINE_SPACING = 2;

/**
 * Measurer where every character is CHAR_WIDTH wide.
 */
export function fixedWidthMeasurer(overrides: Partial<TextMeasurer> = {}): TextMeasurer {
	return {
		measureWidth: (text) => text.length * CHAR_WIDTH,
		measureHeight: () => TEXT_HEIGHT,
		lineHeight: () => LINE_HEIGHT,
		lineSpacing: () => LINE_SPACING,
		...overrides,
	};
}

export function viewport(width: number): Viewport {
	return { availableWidth: () => width };
}

export function square(text: string, formSize?: number): LegendEntry {
	return labeledEntry(text, { form: LegendForm.SQUARE, formSize });
}

export function stackedSquare(formSize?: number): LegendEntry {
	return stackedEntry({ form: LegendForm.SQUARE, formSize });
}
