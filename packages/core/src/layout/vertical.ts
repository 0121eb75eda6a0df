import type { LayoutMetrics } from "../config/types";
import { hasForm, labelText, nonNegative, resolvedFormSize } from "../entries/entry";
import type { LegendEntry } from "../entries/types";
import type { Dimensions, TextMeasurer } from "./types";

/**
 * Stack entries top to bottom, one row per labeled entry. Unlabeled entries
 * accumulate their forms on the current row until a label closes them.
 *
 * A list without any label never closes a row and needs no height.
 */
export function calculateVerticalDimensions(
	entries: readonly LegendEntry[],
	measurer: TextMeasurer,
	metrics: LayoutMetrics,
): Dimensions {
	const { stackSpace, formToTextSpace, yEntrySpace } = metrics;
	const rowHeight = nonNegative(measurer.lineHeight()) + yEntrySpace;

	let maxWidth = 0;
	let totalHeight = 0;
	let lineWidth = 0;
	let wasStacked = false;

	for (let i = 0; i < entries.length; i++) {
		const entry = entries[i];
		const drawsForm = hasForm(entry);
		const formSize = resolvedFormSize(entry, metrics.formSize, metrics.density);
		const text = labelText(entry);

		if (!wasStacked) lineWidth = 0;

		if (drawsForm) {
			if (wasStacked) lineWidth += stackSpace;
			lineWidth += formSize;
		}

		if (text !== undefined) {
			if (drawsForm && !wasStacked) {
				lineWidth += formToTextSpace;
			} else if (wasStacked) {
				// the label closes the stack: commit its row first
				maxWidth = Math.max(maxWidth, lineWidth);
				totalHeight += rowHeight;
				lineWidth = 0;
				wasStacked = false;
			}

			lineWidth += nonNegative(measurer.measureWidth(text));
			if (i < entries.length - 1) totalHeight += rowHeight;
		} else {
			wasStacked = true;
			lineWidth += formSize + stackSpace;
		}

		maxWidth = Math.max(maxWidth, lineWidth);
	}

	return { neededWidth: maxWidth, neededHeight: totalHeight };
}
