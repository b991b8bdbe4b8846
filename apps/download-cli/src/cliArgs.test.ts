import { describe, expect, it } from "vitest";
import { ConfigurationError } from "@tapearchive/core";
import {
	parseCliArgs,
	readFlag,
	readList,
	readNumber,
	requireString,
} from "./cliArgs";

describe("download CLI arg parsing", () => {
	it("takes the first positional as the command", () => {
		const parsed = parseCliArgs([
			"download",
			"--exchange",
			"bybit",
			"--start=2023-09-01",
		]);
		expect(parsed).toEqual({
			command: "download",
			args: { exchange: "bybit", start: "2023-09-01" },
		});
	});

	it("treats a key without a value as a flag", () => {
		const { args } = parseCliArgs([
			"load",
			"--include-incomplete",
			"--flatten",
			"--exchange",
			"okx",
		]);
		expect(args).toEqual({
			"include-incomplete": true,
			flatten: true,
			exchange: "okx",
		});
		expect(readFlag(args, "include-incomplete")).toBe(true);
		expect(readFlag(args, "json")).toBe(false);
	});

	it("splits comma separated lists", () => {
		const { args } = parseCliArgs([
			"download",
			"--symbols",
			"BTC/USDT:USDT, ETH/USDT:USDT,,",
		]);
		expect(readList(args, "symbols")).toEqual(["BTC/USDT:USDT", "ETH/USDT:USDT"]);
		expect(readList(args, "kinds")).toBeUndefined();
	});

	it("validates numbers and required values", () => {
		const { args } = parseCliArgs(["tickers", "--threshold", "lots"]);
		expect(() => readNumber(args, "threshold")).toThrow(
			"Invalid numeric value for --threshold: lots"
		);
		expect(() => requireString(args, "exchange")).toThrow(ConfigurationError);
	});
});
