import type { LegendForm } from "@legend-layout/constants";

/**
 * Text of an entry, or the marker of a stacked form that groups with
 * the next labeled entry.
 */
export type LegendLabel =
	| { readonly kind: "labeled"; readonly text: string }
	| { readonly kind: "stacked" };

/**
 * One visual legend item. Read-only for the layout engine.
 */
export interface LegendEntry {
	readonly label: LegendLabel;
	readonly form: LegendForm;
	readonly formColor?: string;
	/** Overrides the legend-wide form size, in unconverted units */
	readonly formSize?: number;
	/** Stroke width for LINE forms */
	readonly formLineWidth?: number;
	/** Dash intervals for LINE forms */
	readonly formLineDash?: readonly number[];
}

/**
 * Optional visual fields accepted by the entry factories.
 */
export type LegendEntryOptions = Partial<Omit<LegendEntry, "label">>;
