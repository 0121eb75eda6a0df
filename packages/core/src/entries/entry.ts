import { LegendColors, LegendForm } from "@legend-layout/constants";
import type { LegendEntry, LegendEntryOptions } from "./types";

/**
 * Create an entry that draws its form followed by `text`.
 */
export function labeledEntry(text: string, options: LegendEntryOptions = {}): LegendEntry {
	return {
		form: LegendForm.DEFAULT,
		...options,
		label: { kind: "labeled", text },
	};
}

/**
 * Create an unlabeled entry whose form stacks with the next labeled entry.
 */
export function stackedEntry(options: LegendEntryOptions = {}): LegendEntry {
	return {
		form: LegendForm.DEFAULT,
		...options,
		label: { kind: "stacked" },
	};
}

export function isLabeled(entry: LegendEntry): boolean {
	return entry.label.kind === "labeled";
}

/**
 * Label text, or undefined for stacked entries.
 */
export function labelText(entry: LegendEntry): string | undefined {
	return entry.label.kind === "labeled" ? entry.label.text : undefined;
}

/**
 * Whether the entry draws (or reserves space for) a form.
 */
export function hasForm(entry: LegendEntry): boolean {
	return entry.form !== LegendForm.NONE;
}

/**
 * Form size for the entry in the engine's linear unit. The entry's own
 * override is scaled by `density`; a missing or NaN override falls back to
 * `defaultSize`, which is already converted.
 */
export function resolvedFormSize(entry: LegendEntry, defaultSize: number, density: number): number {
	const override = entry.formSize;
	const size = override === undefined || Number.isNaN(override) ? defaultSize : override * density;
	return nonNegative(size);
}

/**
 * Clamp a measured or configured length: NaN, infinities and negatives count as 0.
 */
export function nonNegative(value: number): number {
	return Number.isFinite(value) && value > 0 ? value : 0;
}

/**
 * Build labeled entries from parallel color and label lists, pairing up to
 * the shorter list. A SKIP (or empty) color hides the form, NONE keeps
 * its space empty.
 */
export function entriesFromColors(colors: readonly string[], labels: readonly string[]): LegendEntry[] {
	const count = Math.min(colors.length, labels.length);
	const entries: LegendEntry[] = [];

	for (let i = 0; i < count; i++) {
		const color = colors[i];
		let form: LegendForm = LegendForm.DEFAULT;
		if (color === LegendColors.SKIP || color === "") {
			form = LegendForm.NONE;
		} else if (color === LegendColors.NONE) {
			form = LegendForm.EMPTY;
		}
		entries.push(labeledEntry(labels[i], { form, formColor: color }));
	}

	return entries;
}
