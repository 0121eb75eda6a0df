/**
 * Shape drawn in front of a legend label.
 */
export enum LegendForm {
	/** No form is drawn and no space is reserved */
	NONE = "none",
	/** No form is drawn but its space is reserved */
	EMPTY = "empty",
	/** Use the legend-wide form */
	DEFAULT = "default",
	SQUARE = "square",
	CIRCLE = "circle",
	LINE = "line",
}

export enum LegendOrientation {
	HORIZONTAL = "horizontal",
	VERTICAL = "vertical",
}

export enum LegendHorizontalAlignment {
	LEFT = "left",
	CENTER = "center",
	RIGHT = "right",
}

export enum LegendVerticalAlignment {
	TOP = "top",
	CENTER = "center",
	BOTTOM = "bottom",
}

export enum LegendDirection {
	LEFT_TO_RIGHT = "ltr",
	RIGHT_TO_LEFT = "rtl",
}

/**
 * Sentinel colors accepted when building entries from color/label pairs.
 * SKIP hides the form entirely, NONE keeps its space empty.
 */
export const LegendColors = {
	SKIP: "skip",
	NONE: "none",
} as const;
