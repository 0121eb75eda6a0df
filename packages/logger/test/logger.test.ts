import { describe, expect, it } from "vitest";
import {
	LEGEND_LOGGER_NAME,
	createJsonLogger,
	createLegendLogger,
	createLogger,
	type AppLogObj,
} from "../src/logger";

describe("createLegendLogger", () => {
	it("should default to a pretty info logger named for the legend", () => {
		const logger = createLegendLogger();

		expect(logger.settings.name).toBe(LEGEND_LOGGER_NAME);
		expect(logger.settings.type).toBe("pretty");
		expect(logger.settings.minLevel).toBe(3);
	});

	it("should hide output in silent mode whatever the format", () => {
		const logger = createLegendLogger({ mode: "silent", format: "json" });

		expect(logger.settings.type).toBe("hidden");
		expect(logger.settings.minLevel).toBe(7);
	});

	it("should hand the pass context to transports", () => {
		const logs: Record<string, unknown>[] = [];
		const logger = createLegendLogger({ mode: "debug" });
		logger.settings.type = "hidden";
		logger.attachTransport((logObj: Record<string, unknown>) => {
			logs.push(logObj);
		});

		const context: AppLogObj = { phase: "horizontal", entries: 3, lines: 2, neededWidth: 49, neededHeight: 15 };
		logger.debug("Legend layout computed", context);

		expect(logs).toHaveLength(1);
		expect(logs[0]["1"]).toEqual({ phase: "horizontal", entries: 3, lines: 2, neededWidth: 49, neededHeight: 15 });
	});
});

describe("createLogger", () => {
	it("should pretty-print at info level by default", () => {
		const logger = createLogger("legend-demo");

		expect(logger.settings.name).toBe("legend-demo");
		expect(logger.settings.type).toBe("pretty");
		expect(logger.settings.minLevel).toBe(3);
	});

	it("should hide output in silent mode", () => {
		const logger = createLogger(LEGEND_LOGGER_NAME, "silent");

		expect(logger.settings.type).toBe("hidden");
		expect(logger.settings.minLevel).toBe(7);
	});
});

describe("createJsonLogger", () => {
	it("should emit JSON at debug level by default", () => {
		const logger = createJsonLogger();

		expect(logger.settings.name).toBe(LEGEND_LOGGER_NAME);
		expect(logger.settings.type).toBe("json");
		expect(logger.settings.minLevel).toBe(2);
	});

	it("should honour the requested mode", () => {
		expect(createJsonLogger(LEGEND_LOGGER_NAME, "error").settings.minLevel).toBe(5);
	});
});
