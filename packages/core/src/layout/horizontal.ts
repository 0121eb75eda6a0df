import type { LayoutMetrics } from "../config/types";
import { hasForm, labelText, nonNegative, resolvedFormSize } from "../entries/entry";
import type { LegendEntry } from "../entries/types";
import { measureLabel } from "./metrics";
import type { FlowDimensions, Size, TextMeasurer } from "./types";

/**
 * Settings fixed for the duration of one flow pass.
 */
export interface FlowOptions {
	availableWidth: number;
	maxSizePercent: number;
	wordWrapEnabled: boolean;
}

// ---- Internal state during layout ----

interface FlowState {
	readonly contentWidth: number;
	readonly wordWrapEnabled: boolean;
	readonly lineHeight: number;
	readonly metrics: LayoutMetrics;
	maxLineWidth: number;
	currentLineWidth: number;
	/** Width of the open group: a stacked run and, once closed, its label */
	requiredWidth: number;
	/** First index of the open stacked run */
	stackedStartIndex: number | undefined;
	labelSizes: Size[];
	labelBreakPoints: boolean[];
	lineSizes: Size[];
}

/**
 * Flow entries left to right into lines. A stacked run and the labeled entry
 * that follows it form one group that is never split across lines; with word
 * wrap enabled a group that does not fit moves to a new line, where it is
 * placed even if it alone exceeds the content width.
 */
export function calculateHorizontalDimensions(
	entries: readonly LegendEntry[],
	measurer: TextMeasurer,
	metrics: LayoutMetrics,
	options: FlowOptions,
): FlowDimensions {
	const lineHeight = nonNegative(measurer.lineHeight());
	const lineSpacing = nonNegative(measurer.lineSpacing()) + metrics.yEntrySpace;

	const state: FlowState = {
		contentWidth: nonNegative(options.availableWidth) * options.maxSizePercent,
		wordWrapEnabled: options.wordWrapEnabled,
		lineHeight,
		metrics,
		maxLineWidth: 0,
		currentLineWidth: 0,
		requiredWidth: 0,
		stackedStartIndex: undefined,
		labelSizes: [],
		labelBreakPoints: [],
		lineSizes: [],
	};

	for (let i = 0; i < entries.length; i++) {
		onEntry(state, entries[i], i, measurer);
	}
	onSequenceEnd(state, entries.length);

	const lineCount = state.lineSizes.length;
	const neededHeight = lineCount === 0 ? 0 : lineHeight * lineCount + lineSpacing * (lineCount - 1);

	return {
		neededWidth: state.maxLineWidth,
		neededHeight,
		labelSizes: state.labelSizes,
		labelBreakPoints: state.labelBreakPoints,
		lineSizes: state.lineSizes,
	};
}

// ---- Fold steps ----

function onEntry(state: FlowState, entry: LegendEntry, index: number, measurer: TextMeasurer): void {
	const { metrics } = state;
	const drawsForm = hasForm(entry);
	const formSize = resolvedFormSize(entry, metrics.formSize, metrics.density);
	const text = labelText(entry);

	state.labelBreakPoints.push(false);
	state.requiredWidth = state.stackedStartIndex === undefined ? 0 : state.requiredWidth + metrics.stackSpace;

	if (text === undefined) {
		state.labelSizes.push({ width: 0, height: 0 });
		state.requiredWidth += drawsForm ? formSize : 0;
		if (state.stackedStartIndex === undefined) state.stackedStartIndex = index;
		return;
	}

	const size = measureLabel(measurer, text);
	state.labelSizes.push(size);
	state.requiredWidth += (drawsForm ? metrics.formToTextSpace + formSize : 0) + size.width;

	closeGroup(state, index);
	state.stackedStartIndex = undefined;
}

/**
 * A stacked run still open at the end forms a group of its own; the last
 * line is always flushed.
 */
function onSequenceEnd(state: FlowState, entryCount: number): void {
	if (entryCount === 0) return;

	if (state.stackedStartIndex !== undefined) {
		closeGroup(state, entryCount - 1);
	}
	pushLine(state);
}

function closeGroup(state: FlowState, index: number): void {
	const { currentLineWidth, requiredWidth } = state;
	const requiredSpacing = currentLineWidth === 0 ? 0 : state.metrics.xEntrySpace;

	const fits = state.contentWidth - currentLineWidth >= requiredSpacing + requiredWidth;
	if (!state.wordWrapEnabled || currentLineWidth === 0 || fits) {
		state.currentLineWidth += requiredSpacing + requiredWidth;
		return;
	}

	pushLine(state);
	state.labelBreakPoints[state.stackedStartIndex ?? index] = true;
	state.currentLineWidth = requiredWidth;
}

function pushLine(state: FlowState): void {
	state.lineSizes.push({ width: state.currentLineWidth, height: state.lineHeight });
	state.maxLineWidth = Math.max(state.maxLineWidth, state.currentLineWidth);
}
