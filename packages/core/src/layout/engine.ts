import {
	LayoutErrors,
	LayoutPhase,
	LegendEvent,
	LegendOrientation,
	PhaseEvent,
} from "@legend-layout/constants";
import type { LegendEventBus } from "@legend-layout/event-bus";
import { DEFAULT_LEGEND_CONFIG, createLegendConfig, toLayoutMetrics } from "../config/defaults";
import type { LegendConfig } from "../config/types";
import type { LegendEntry } from "../entries/types";
import { LayoutErrorCode, LegendConfigError, LegendPreconditionError } from "../errors";
import { calculateHorizontalDimensions } from "./horizontal";
import { maxEntryHeight, maxEntryWidth } from "./metrics";
import type { FlowDimensions, LayoutResult, TextMeasurer, Viewport } from "./types";
import { calculateVerticalDimensions } from "./vertical";

/**
 * Empty flow sequences for a vertical pass, allocated per pass.
 */
function noFlow(): Pick<FlowDimensions, "labelSizes" | "labelBreakPoints" | "lineSizes"> {
	return { labelSizes: [], labelBreakPoints: [], lineSizes: [] };
}

/**
 * Computes legend geometry for a renderer: the space the legend needs and,
 * for horizontal legends, how entries break into lines.
 *
 * Each pass is a pure function of its inputs; the previous result is kept
 * only for inspection and is replaced wholesale by the next pass.
 */
export class LegendLayoutEngine {
	private config: LegendConfig;
	private result: LayoutResult | undefined;

	constructor(
		config: Partial<LegendConfig> = {},
		private readonly bus?: LegendEventBus,
	) {
		this.config = this.validated(config, DEFAULT_LEGEND_CONFIG);
	}

	getConfig(): LegendConfig {
		return this.config;
	}

	/**
	 * Replace the configuration with `overrides` merged over the current one.
	 * @throws LegendConfigError and leaves the current configuration in place
	 */
	setConfig(overrides: Partial<LegendConfig>): void {
		this.config = this.validated(overrides, this.config);
		this.bus?.emitDebug(LegendEvent.CONFIG_CHANGED, LayoutPhase.CONFIGURE, "Legend configuration updated", {
			fields: Object.keys(overrides),
		});
	}

	/**
	 * Result of the most recent pass, if any.
	 */
	get lastResult(): LayoutResult | undefined {
		return this.result;
	}

	/**
	 * Run one layout pass over `entries`.
	 * @throws LegendPreconditionError if `entries` is null or undefined
	 */
	calculateDimensions(
		entries: readonly LegendEntry[] | null | undefined,
		measurer: TextMeasurer,
		viewport: Viewport,
	): LayoutResult {
		if (entries === null || entries === undefined) {
			const message = "calculateDimensions requires an entry array";
			this.bus?.emitError(LayoutPhase.MEASURE, {
				event: LegendEvent.PRECONDITION_FAILED,
				message,
				code: LayoutErrorCode.NULL_ENTRIES,
				userMessage: LayoutErrors.NULL_ENTRIES,
			});
			throw new LegendPreconditionError(message);
		}

		const snapshot = Object.freeze([...entries]);
		const config = this.config;
		const metrics = toLayoutMetrics(config);
		const vertical = config.orientation === LegendOrientation.VERTICAL;
		const phase = vertical ? LayoutPhase.VERTICAL : LayoutPhase.HORIZONTAL;

		this.bus?.emitPhase(PhaseEvent.PHASE_START, phase, { entries: snapshot.length });

		const maxLabelWidth = maxEntryWidth(snapshot, measurer, metrics);
		const maxLabelHeight = maxEntryHeight(snapshot, measurer);

		const dimensions = vertical
			? { ...calculateVerticalDimensions(snapshot, measurer, metrics), ...noFlow() }
			: calculateHorizontalDimensions(snapshot, measurer, metrics, {
					availableWidth: viewport.availableWidth(),
					maxSizePercent: config.maxSizePercent,
					wordWrapEnabled: config.wordWrapEnabled,
				});

		const result: LayoutResult = Object.freeze({
			orientation: config.orientation,
			direction: config.direction,
			horizontalAlignment: config.horizontalAlignment,
			verticalAlignment: config.verticalAlignment,
			drawInside: config.drawInside,
			neededWidth: dimensions.neededWidth + metrics.xOffset,
			neededHeight: dimensions.neededHeight + metrics.yOffset,
			maxLabelWidth,
			maxLabelHeight,
			labelSizes: Object.freeze(dimensions.labelSizes),
			labelBreakPoints: Object.freeze(dimensions.labelBreakPoints),
			lineSizes: Object.freeze(dimensions.lineSizes),
		});
		this.result = result;

		this.bus?.emitDebug(LegendEvent.LAYOUT_COMPUTED, phase, "Legend layout computed", {
			neededWidth: result.neededWidth,
			neededHeight: result.neededHeight,
		});
		this.bus?.emitPhase(PhaseEvent.PHASE_END, phase, {
			entries: snapshot.length,
			lines: result.lineSizes.length,
		});

		return result;
	}

	private validated(overrides: Partial<LegendConfig>, base: LegendConfig): LegendConfig {
		try {
			return createLegendConfig(overrides, base);
		} catch (error) {
			if (error instanceof LegendConfigError) {
				for (const e of error.errors) {
					this.bus?.emitError(LayoutPhase.CONFIGURE, {
						event: LegendEvent.CONFIG_REJECTED,
						message: e.message,
						code: e.code,
						userMessage: error.userMessage,
						field: e.field,
					});
				}
			}
			throw error;
		}
	}
}
