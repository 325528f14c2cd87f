import { ConfigurationError } from "@ferry/core";
import { describe, expect, it } from "vitest";
import { DEFAULT_APP_CONFIG, loadConfig } from "../config";

describe("loadConfig", () => {
	it("returns the defaults for an empty environment", () => {
		expect(loadConfig({})).toEqual({ logLevel: "info", trimLastSlash: false });
		expect(loadConfig({})).toEqual(DEFAULT_APP_CONFIG);
	});

	it("reads the log level case-insensitively", () => {
		expect(loadConfig({ FERRY_LOG_LEVEL: " DEBUG " }).logLevel).toBe("debug");
	});

	it.each([
		["true", true],
		["1", true],
		["FALSE", false],
		["0", false],
	])("reads FERRY_TRIM_LAST_SLASH=%s", (raw, expected) => {
		expect(loadConfig({ FERRY_TRIM_LAST_SLASH: raw }).trimLastSlash).toBe(expected);
	});

	it("ignores empty variables", () => {
		expect(loadConfig({ FERRY_LOG_LEVEL: "", FERRY_TRIM_LAST_SLASH: " " })).toEqual(
			DEFAULT_APP_CONFIG,
		);
	});

	it("rejects an unknown log level", () => {
		expect(() => loadConfig({ FERRY_LOG_LEVEL: "verbose" })).toThrow(ConfigurationError);
		expect(() => loadConfig({ FERRY_LOG_LEVEL: "verbose" })).toThrow(
			'FERRY_LOG_LEVEL must be one of debug, info, warn, error (got "verbose")',
		);
	});

	it("rejects a value that is not a boolean", () => {
		expect(() => loadConfig({ FERRY_TRIM_LAST_SLASH: "yes" })).toThrow(
			'FERRY_TRIM_LAST_SLASH must be one of true, false, 1, 0 (got "yes")',
		);
	});
});
