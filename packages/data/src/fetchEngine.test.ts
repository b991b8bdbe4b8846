import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
	DAY_MS,
	HOUR_MS,
	MINUTE_MS,
	type FundingEvent,
	type TradePrint,
} from "@tapearchive/core";
import { PARTITION_SCHEMAS, PartitionStore } from "@tapearchive/persistence";
import { FetchEngine, type FetchEngineConfig } from "./fetchEngine";
import { RateLimiter } from "./rateLimiter";
import {
	FakeMarketDataClient,
	buildBars,
	createTestLogger,
} from "./testing/fakeMarketDataClient";

const SEP_1 = Date.UTC(2023, 8, 1);
const SEP_2 = SEP_1 + DAY_MS;
const LATER = Date.UTC(2024, 0, 1);

const CANDLE_FILE = "bybit_1m_candles_2023-09-01_BTC%2FUSDT.parquet";

const trade = (timestamp: number, price: number): TradePrint => ({
	timestamp,
	symbol: "BTC/USDT",
	side: "buy",
	price,
	amount: 1,
	cost: price,
	fee: null,
});

describe("FetchEngine", () => {
	let dir: string;
	let store: PartitionStore;
	let limiter: RateLimiter;

	const engineFor = (
		client: FakeMarketDataClient,
		overrides: Partial<FetchEngineConfig> = {}
	): FetchEngine =>
		new FetchEngine({
			client,
			store,
			rateLimiter: limiter,
			logger: createTestLogger(),
			now: () => LATER,
			...overrides,
		});

	// two minutes of lead-in and four minutes past the window
	const btcCandles = () => ({
		"BTC/USDT": buildBars(SEP_1 - 2 * MINUTE_MS, 1_447, MINUTE_MS),
	});

	beforeEach(() => {
		dir = fs.mkdtempSync(path.join(os.tmpdir(), "tapearchive-fetch-"));
		store = new PartitionStore(dir);
		limiter = new RateLimiter({ maxRequests: 1_000, periodMs: 60_000 });
	});

	afterEach(async () => {
		await limiter.stop();
		fs.rmSync(dir, { recursive: true, force: true });
	});

	it("writes one daily partition for a day of minute candles", async () => {
		const client = new FakeMarketDataClient("bybit", { candles: btcCandles() });

		const report = await engineFor(client).run({
			dataKinds: ["candles"],
			symbols: ["BTC/USDT"],
			start: SEP_1,
			end: SEP_2,
		});

		expect(report).toEqual({
			exchange: "bybit",
			start: SEP_1,
			end: SEP_2,
			pipelines: [
				{
					dataKind: "candles",
					symbol: "BTC/USDT",
					subKindId: "1m",
					status: "completed",
					written: 1,
					skipped: 0,
					empty: 0,
				},
			],
		});
		expect(client.marketLoads).toBe(1);
		expect(client.calls).toEqual([
			{
				method: "fetchOHLCV",
				symbol: "BTC/USDT",
				since: SEP_1,
				limit: 1_441,
				timeframe: "1m",
			},
		]);
		expect(fs.readdirSync(dir)).toEqual([CANDLE_FILE]);

		const rows = await store.read(
			path.join(dir, CANDLE_FILE),
			PARTITION_SCHEMAS.candles
		);
		expect(rows).toHaveLength(1_440);
		expect(rows?.[0]).toEqual({
			timestamp: SEP_1,
			open: 102,
			high: 103,
			low: 101,
			close: 102.5,
			volume: 12,
			exchange: "bybit",
			symbol: "BTC/USDT",
		});
		expect(rows?.[1_439]?.timestamp).toBe(SEP_2 - MINUTE_MS);
	});

	it("skips windows whose complete partition exists", async () => {
		const client = new FakeMarketDataClient("bybit", { candles: btcCandles() });
		const request = {
			dataKinds: ["candles" as const],
			symbols: ["BTC/USDT"],
			start: SEP_1,
			end: SEP_2,
		};

		await engineFor(client).run(request);
		const second = await engineFor(client).run(request);

		expect(second.pipelines[0]).toMatchObject({ written: 0, skipped: 1 });
		expect(client.calls).toHaveLength(1);
	});

	it("replaces an incomplete partition once its window has elapsed", async () => {
		const client = new FakeMarketDataClient("bybit", { candles: btcCandles() });
		const request = {
			dataKinds: ["candles" as const],
			symbols: ["BTC/USDT"],
			start: SEP_1,
			end: SEP_2,
		};

		await engineFor(client, { now: () => SEP_1 + 12 * HOUR_MS }).run(request);
		expect(fs.readdirSync(dir)).toEqual([
			"bybit_1m_candles_2023-09-01_BTC%2FUSDT_incomplete.parquet",
		]);

		const report = await engineFor(client).run(request);
		expect(report.pipelines[0]).toMatchObject({ written: 1, skipped: 0 });
		expect(fs.readdirSync(dir)).toEqual([CANDLE_FILE]);
		expect(client.calls).toHaveLength(2);
	});

	it("writes nothing for a window without data", async () => {
		const logger = createTestLogger();
		const client = new FakeMarketDataClient("bybit");

		const report = await engineFor(client, { logger }).run({
			dataKinds: ["candles"],
			symbols: ["ETH/USDT"],
			start: SEP_1,
			end: SEP_2,
		});

		expect(report.pipelines[0]).toMatchObject({
			status: "completed",
			written: 0,
			empty: 1,
		});
		expect(fs.readdirSync(dir)).toEqual([]);
		expect(logger.info).toHaveBeenCalledWith(
			"window_empty",
			expect.objectContaining({ dataKind: "candles", symbol: "ETH/USDT" })
		);
	});

	it("contains a provider failure to its own pipeline", async () => {
		const client = new FakeMarketDataClient("bybit", {
			candles: btcCandles(),
			failures: { "BAD/USDT": new Error("venue exploded") },
		});

		const report = await engineFor(client).run({
			dataKinds: ["candles"],
			symbols: ["BTC/USDT", "BAD/USDT"],
			start: SEP_1,
			end: SEP_2,
		});

		expect(report.pipelines).toEqual([
			{
				dataKind: "candles",
				symbol: "BTC/USDT",
				subKindId: "1m",
				status: "completed",
				written: 1,
				skipped: 0,
				empty: 0,
			},
			{
				dataKind: "candles",
				symbol: "BAD/USDT",
				subKindId: "1m",
				status: "failed",
				written: 0,
				skipped: 0,
				empty: 0,
				error: "venue exploded",
			},
		]);
		expect(fs.readdirSync(dir)).toEqual([CANDLE_FILE]);
	});

	it("fails only the candle pipeline on an unparseable timeframe", async () => {
		const funding: FundingEvent[] = [
			SEP_1 - 8 * HOUR_MS,
			SEP_1,
			SEP_1 + 8 * HOUR_MS,
			SEP_1 + 16 * HOUR_MS,
			SEP_2,
		].map((timestamp) => ({
			timestamp,
			symbol: "BTC/USDT:USDT",
			fundingRate: 0.0001,
		}));
		const client = new FakeMarketDataClient("bybit", {
			funding: { "BTC/USDT:USDT": funding },
		});

		const report = await engineFor(client).run({
			dataKinds: ["candles", "funding"],
			symbols: ["BTC/USDT:USDT"],
			start: SEP_1,
			end: SEP_2,
			options: { timeframe: "2x" },
		});

		expect(report.pipelines[0]).toEqual({
			dataKind: "candles",
			symbol: "BTC/USDT:USDT",
			status: "failed",
			written: 0,
			skipped: 0,
			empty: 0,
			error: 'Invalid timeframe "2x": unknown unit "x", expected one of s, m, h, d',
		});
		expect(report.pipelines[1]).toMatchObject({
			dataKind: "funding",
			status: "completed",
			written: 1,
		});
		expect(client.calls).toEqual([
			{
				method: "fetchFundingRateHistory",
				symbol: "BTC/USDT:USDT",
				since: SEP_1,
				limit: undefined,
			},
		]);

		const rows = await store.read(
			path.join(dir, "bybit_funding_2023-09-01_BTC%2FUSDT%3AUSDT.parquet"),
			PARTITION_SCHEMAS.funding
		);
		expect(rows?.map((row) => row.timestamp)).toEqual([
			SEP_1,
			SEP_1 + 8 * HOUR_MS,
			SEP_1 + 16 * HOUR_MS,
		]);
	});

	it("fails a pipeline whose upstream call stalls past the timeout", async () => {
		const client = new FakeMarketDataClient("bybit", { stalled: ["BTC/USDT"] });

		const report = await engineFor(client, { requestTimeoutMs: 20 }).run({
			dataKinds: ["candles"],
			symbols: ["BTC/USDT"],
			start: SEP_1,
			end: SEP_2,
		});

		expect(report.pipelines[0]).toMatchObject({
			status: "failed",
			error: "fetch candles BTC/USDT did not settle within 20ms",
		});
	});

	it("follows the last trade timestamp across pages", async () => {
		const client = new FakeMarketDataClient("bybit", {
			trades: {
				"BTC/USDT": [
					trade(SEP_1 + 1_000, 10),
					trade(SEP_1 + 1_000, 11),
					trade(SEP_1 + 2_000, 12),
					trade(SEP_1 + 3_000, 13),
				],
			},
		});

		await engineFor(client).run({
			dataKinds: ["trades"],
			symbols: ["BTC/USDT"],
			start: SEP_1,
			end: SEP_2,
			options: { tradesLimit: 2 },
		});

		expect(client.calls.map((call) => call.since)).toEqual([
			SEP_1,
			SEP_1 + 1_001,
			SEP_1 + 3_001,
		]);
		const rows = await store.read(
			path.join(dir, "bybit_trades_2023-09-01_BTC%2FUSDT.parquet"),
			PARTITION_SCHEMAS.trades
		);
		expect(rows?.map((row) => row.price)).toEqual([10, 11, 12, 13]);
		expect(rows?.[0]).toEqual({
			timestamp: SEP_1 + 1_000,
			symbol: "BTC/USDT",
			side: "buy",
			price: 10,
			amount: 1,
			cost: 10,
			fee: null,
			exchange: "bybit",
		});
	});

	it("stops paging a window at the page cap", async () => {
		const logger = createTestLogger();
		const client = new FakeMarketDataClient("bybit", {
			trades: {
				"BTC/USDT": [
					trade(SEP_1 + 1_000, 10),
					trade(SEP_1 + 2_000, 11),
					trade(SEP_1 + 3_000, 12),
				],
			},
		});

		await engineFor(client, { logger, maxPagesPerWindow: 1 }).run({
			dataKinds: ["trades"],
			symbols: ["BTC/USDT"],
			start: SEP_1,
			end: SEP_2,
			options: { tradesLimit: 2 },
		});

		expect(logger.warn).toHaveBeenCalledWith(
			"window_page_cap_reached",
			expect.objectContaining({ dataKind: "trades", symbol: "BTC/USDT", pages: 1 })
		);
		const rows = await store.read(
			path.join(dir, "bybit_trades_2023-09-01_BTC%2FUSDT.parquet"),
			PARTITION_SCHEMAS.trades
		);
		expect(rows?.map((row) => row.price)).toEqual([10, 11]);
	});

	it("runs pipelines for several symbols side by side", async () => {
		const client = new FakeMarketDataClient("bybit", {
			candles: {
				"BTC/USDT": buildBars(SEP_1, 1_440, MINUTE_MS),
				"ETH/USDT": buildBars(SEP_1, 1_440, MINUTE_MS),
			},
		});

		const report = await engineFor(client).run({
			dataKinds: ["candles"],
			symbols: ["BTC/USDT", "ETH/USDT", "BTC/USDT"],
			start: SEP_1,
			end: SEP_2,
		});

		expect(report.pipelines.map((pipeline) => pipeline.symbol)).toEqual([
			"BTC/USDT",
			"ETH/USDT",
		]);
		expect(fs.readdirSync(dir).sort()).toEqual([
			CANDLE_FILE,
			"bybit_1m_candles_2023-09-01_ETH%2FUSDT.parquet",
		]);
		for (const symbol of ["BTC/USDT", "ETH/USDT"]) {
			const rows = await store.read(
				path.join(
					dir,
					`bybit_1m_candles_2023-09-01_${symbol.replace("/", "%2F")}.parquet`
				),
				PARTITION_SCHEMAS.candles
			);
			expect(rows).toHaveLength(1_440);
			expect(rows?.every((row) => row.symbol === symbol)).toBe(true);
		}
	});

	it("keeps trades in daily partitions across a multi-day range", async () => {
		const client = new FakeMarketDataClient("bybit", {
			trades: {
				"BTC/USDT": [
					trade(SEP_1 + 1_000, 10),
					trade(SEP_2 + 1_000, 20),
					trade(SEP_2 + DAY_MS + 1_000, 30),
				],
			},
		});

		const report = await engineFor(client).run({
			dataKinds: ["trades"],
			symbols: ["BTC/USDT"],
			start: SEP_1,
			end: SEP_2 + DAY_MS,
		});

		expect(report.pipelines[0]).toMatchObject({ status: "completed", written: 2 });
		// each page runs past its day, so one call per window
		expect(client.calls.map((call) => call.since)).toEqual([SEP_1, SEP_2]);
		expect(fs.readdirSync(dir).sort()).toEqual([
			"bybit_trades_2023-09-01_BTC%2FUSDT.parquet",
			"bybit_trades_2023-09-02_BTC%2FUSDT.parquet",
		]);
		const second = await store.read(
			path.join(dir, "bybit_trades_2023-09-02_BTC%2FUSDT.parquet"),
			PARTITION_SCHEMAS.trades
		);
		expect(second?.map((row) => row.price)).toEqual([20]);
	});

	it("writes a month-aligned 31-day partition for hourly candles", async () => {
		const client = new FakeMarketDataClient("bybit", {
			candles: { "BTC/USDT": buildBars(SEP_1, 31 * 24 + 48, HOUR_MS) },
		});

		const report = await engineFor(client).run({
			dataKinds: ["candles"],
			symbols: ["BTC/USDT"],
			start: Date.UTC(2023, 8, 15),
			end: Date.UTC(2023, 8, 16),
			options: { timeframe: "1h" },
		});

		expect(report.pipelines[0]).toMatchObject({
			subKindId: "1h",
			status: "completed",
			written: 1,
		});
		expect(client.calls).toEqual([
			{
				method: "fetchOHLCV",
				symbol: "BTC/USDT",
				since: SEP_1,
				limit: 745,
				timeframe: "1h",
			},
		]);
		expect(fs.readdirSync(dir)).toEqual([
			"bybit_1h_candles_2023-09-01_BTC%2FUSDT.parquet",
		]);

		const rows = await store.read(
			path.join(dir, "bybit_1h_candles_2023-09-01_BTC%2FUSDT.parquet"),
			PARTITION_SCHEMAS.candles
		);
		expect(rows).toHaveLength(744);
		expect(rows?.[0]?.timestamp).toBe(SEP_1);
		expect(rows?.[743]?.timestamp).toBe(Date.UTC(2023, 9, 1, 23));
		expect(
			rows?.filter((row) => row.timestamp >= Date.UTC(2023, 9, 1))
		).toHaveLength(24);
	});

	it("shares one rate limit across concurrent pipelines", async () => {
		const shared = new RateLimiter(
			{ maxRequests: 2, periodMs: 300 },
			createTestLogger()
		);
		const client = new FakeMarketDataClient("bybit", {
			candles: {
				"BTC/USDT": buildBars(SEP_1, 1_440, MINUTE_MS),
				"ETH/USDT": buildBars(SEP_1, 1_440, MINUTE_MS),
			},
		});

		try {
			const origin = Date.now();
			const report = await engineFor(client, { rateLimiter: shared }).run({
				dataKinds: ["candles"],
				symbols: ["BTC/USDT", "ETH/USDT"],
				start: SEP_1,
				end: SEP_2,
			});

			expect(report.pipelines.map((pipeline) => pipeline.status)).toEqual([
				"completed",
				"completed",
			]);
			// market load plus a full and an empty page per symbol
			expect(client.startedAt).toHaveLength(5);
			const elapsed = client.startedAt.map((at) => at - origin);
			expect(elapsed.filter((ms) => ms < 250)).toHaveLength(2);
		} finally {
			await shared.stop();
		}
	});
});
