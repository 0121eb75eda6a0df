import type {
	LegendDirection,
	LegendHorizontalAlignment,
	LegendOrientation,
	LegendVerticalAlignment,
} from "@legend-layout/constants";

export interface Size {
	readonly width: number;
	readonly height: number;
}

/**
 * Font measurement supplied by the renderer.
 */
export interface TextMeasurer {
	measureWidth(text: string): number;
	measureHeight(text: string): number;
	lineHeight(): number;
	lineSpacing(): number;
}

/**
 * Space the legend may occupy.
 */
export interface Viewport {
	availableWidth(): number;
}

/**
 * Totals produced by one orientation calculator, before offsets.
 */
export interface Dimensions {
	neededWidth: number;
	neededHeight: number;
}

/**
 * Horizontal flow output: totals plus per-entry and per-line metadata.
 */
export interface FlowDimensions extends Dimensions {
	/** One per entry; (0, 0) for stacked entries */
	labelSizes: Size[];
	/** One per entry; true where an entry starts a new line */
	labelBreakPoints: boolean[];
	/** One per produced line */
	lineSizes: Size[];
}

/**
 * Geometry of the legend, consumed by a renderer. Produced fresh on every pass.
 */
export interface LayoutResult {
	readonly orientation: LegendOrientation;
	readonly direction: LegendDirection;
	readonly horizontalAlignment: LegendHorizontalAlignment;
	readonly verticalAlignment: LegendVerticalAlignment;
	readonly drawInside: boolean;
	/** Total width, including xOffset */
	readonly neededWidth: number;
	/** Total height, including yOffset */
	readonly neededHeight: number;
	/** Widest label plus largest form plus form-to-text space */
	readonly maxLabelWidth: number;
	readonly maxLabelHeight: number;
	/** Horizontal orientation only; empty otherwise */
	readonly labelSizes: readonly Size[];
	readonly labelBreakPoints: readonly boolean[];
	readonly lineSizes: readonly Size[];
}
