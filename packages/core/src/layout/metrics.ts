import type { LayoutMetrics } from "../config/types";
import { labelText, nonNegative, resolvedFormSize } from "../entries/entry";
import type { LegendEntry } from "../entries/types";
import type { Size, TextMeasurer } from "./types";

/**
 * Width of the widest entry: widest label + largest form + form-to-text space.
 * Stacked entries contribute to the form maximum only.
 */
export function maxEntryWidth(
	entries: readonly LegendEntry[],
	measurer: TextMeasurer,
	metrics: LayoutMetrics,
): number {
	let maxWidth = 0;
	let maxFormSize = 0;

	for (const entry of entries) {
		maxFormSize = Math.max(maxFormSize, resolvedFormSize(entry, metrics.formSize, metrics.density));

		const text = labelText(entry);
		if (text === undefined) continue;

		maxWidth = Math.max(maxWidth, nonNegative(measurer.measureWidth(text)));
	}

	return maxWidth + maxFormSize + metrics.formToTextSpace;
}

/**
 * Tallest label, 0 when no entry is labeled.
 */
export function maxEntryHeight(entries: readonly LegendEntry[], measurer: TextMeasurer): number {
	let maxHeight = 0;

	for (const entry of entries) {
		const text = labelText(entry);
		if (text === undefined) continue;

		maxHeight = Math.max(maxHeight, nonNegative(measurer.measureHeight(text)));
	}

	return maxHeight;
}

export function measureLabel(measurer: TextMeasurer, text: string): Size {
	return {
		width: nonNegative(measurer.measureWidth(text)),
		height: nonNegative(measurer.measureHeight(text)),
	};
}
