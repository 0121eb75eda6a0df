import { LayoutPhase, LegendEvent } from "@legend-layout/constants";
import type { LegendEventBus } from "@legend-layout/event-bus";
import type { LegendConfig } from "./config/types";
import { entriesFromColors } from "./entries/entry";
import type { LegendEntry } from "./entries/types";
import { LegendLayoutEngine } from "./layout/engine";
import type { LayoutResult, TextMeasurer, Viewport } from "./layout/types";

/**
 * The legend of a chart: which entries it shows and the layout computed for them.
 *
 * Entries are either computed automatically by the chart (`setEntries`) and
 * followed by any extra entries, or replaced entirely by custom entries.
 */
export class Legend {
	private entries: readonly LegendEntry[] = [];
	private extraEntries: readonly LegendEntry[] = [];
	private customEntries: readonly LegendEntry[] | undefined;
	private readonly engine: LegendLayoutEngine;
	private measurer: TextMeasurer | undefined;
	private viewport: Viewport | undefined;

	constructor(
		config: Partial<LegendConfig> = {},
		private readonly bus?: LegendEventBus,
	) {
		this.engine = new LegendLayoutEngine(config, bus);
	}

	/**
	 * Set the automatically computed entries. Not used while custom entries are set.
	 */
	setEntries(entries: readonly LegendEntry[]): void {
		this.entries = [...entries];
	}

	/**
	 * Entries the layout uses: the custom entries, or the automatic entries followed by the extra ones.
	 */
	getEntries(): readonly LegendEntry[] {
		if (this.customEntries) {
			return this.customEntries;
		}
		return [...this.entries, ...this.extraEntries];
	}

	getExtraEntries(): readonly LegendEntry[] {
		return this.extraEntries;
	}

	/**
	 * Entries appended after the automatic ones. Call `notifyDataSetChanged()` for a
	 * computed legend to pick them up.
	 */
	setExtra(entries: readonly LegendEntry[] | null | undefined): void {
		this.extraEntries = entries ? [...entries] : [];
	}

	setExtraFromColors(colors: readonly string[], labels: readonly string[]): void {
		this.extraEntries = entriesFromColors(colors, labels);
	}

	/**
	 * Replace the automatic entries with `entries` until `resetCustom()` is called.
	 * A stacked entry groups with the next labeled one.
	 */
	setCustom(entries: readonly LegendEntry[]): void {
		this.customEntries = [...entries];
	}

	/**
	 * Drop the custom entries; the automatic ones apply again after the next data change.
	 */
	resetCustom(): void {
		this.customEntries = undefined;
	}

	isLegendCustom(): boolean {
		return this.customEntries !== undefined;
	}

	getConfig(): LegendConfig {
		return this.engine.getConfig();
	}

	/**
	 * @throws LegendConfigError if any setting is rejected
	 */
	configure(overrides: Partial<LegendConfig>): void {
		this.engine.setConfig(overrides);
	}

	/**
	 * Compute the layout of the current entries.
	 */
	calculateDimensions(measurer: TextMeasurer, viewport: Viewport): LayoutResult {
		this.measurer = measurer;
		this.viewport = viewport;
		return this.engine.calculateDimensions(this.getEntries(), measurer, viewport);
	}

	get layout(): LayoutResult | undefined {
		return this.engine.lastResult;
	}

	/**
	 * Signal that entries, settings or fonts changed. Recomputes the layout
	 * with the measurer and viewport of the previous pass, if there was one.
	 */
	notifyDataSetChanged(): LayoutResult | undefined {
		const entries = this.getEntries();
		this.bus?.emitInfo(LegendEvent.DATA_CHANGED, LayoutPhase.MEASURE, "Legend data changed", {
			entries: entries.length,
			custom: this.isLegendCustom(),
		});

		if (!this.measurer || !this.viewport) {
			return undefined;
		}
		return this.engine.calculateDimensions(entries, this.measurer, this.viewport);
	}
}
