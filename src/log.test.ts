import { describe, expect, it } from "vitest";
import { createLogger, isLogLevel, silentLogger } from "./log.js";
import { captureSink } from "./testing/fixtures.js";

describe("createLogger", () => {
	it("drops messages below the threshold and tags warnings and errors", () => {
		const { lines, sink } = captureSink();
		const logger = createLogger("warn", sink);
		logger.debug("d");
		logger.info("i");
		logger.warn("w");
		logger.error("e");
		expect(lines).toEqual({ log: [], warn: ["Warning: w"], error: ["Error: e"] });
	});

	it("sends debug and info to the log stream", () => {
		const { lines, sink } = captureSink();
		const logger = createLogger("debug", sink);
		logger.debug("d");
		logger.info("i");
		expect(lines.log).toEqual(["d", "i"]);
	});

	it("has a silent logger", () => {
		expect(() => silentLogger.error("ignored")).not.toThrow();
	});
});

describe("isLogLevel", () => {
	it("accepts only level names", () => {
		expect(isLogLevel("info")).toBe(true);
		expect(isLogLevel("silent")).toBe(true);
		expect(isLogLevel("verbose")).toBe(false);
		expect(isLogLevel("toString")).toBe(false);
	});
});
