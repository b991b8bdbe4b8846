import {
	DAILY_LAYOUT,
	durationFromLabel,
	granularityLayout,
	type CandleRow,
	type DataKind,
	type FundingRow,
	type MarketDataClient,
	type PartitionLayout,
	type RowOf,
	type TradeRow,
} from "@tapearchive/core";
import type { FetchOptions } from "./types";

export const DEFAULT_TIMEFRAME = "1m";
export const DEFAULT_TRADES_PAGE_LIMIT = 1000;

/**
 * How one data kind is paged out of the upstream client and shaped into
 * partition rows. Selected once per requested kind.
 */
export interface DataKindHandler<K extends DataKind> {
	readonly kind: K;
	/** Candle timeframe label; absent for trades and funding */
	readonly subKindId?: string;
	readonly layout: PartitionLayout;
	/** Page size for the call starting at `currentTs`; undefined lets the venue choose */
	pageLimit(currentTs: number, endTs: number): number | undefined;
	fetchPage(
		client: MarketDataClient,
		symbol: string,
		since: number,
		limit: number | undefined,
		exchange: string
	): Promise<RowOf<K>[]>;
}

const candleHandler = (options: FetchOptions): DataKindHandler<"candles"> => {
	const timeframe = options.timeframe ?? DEFAULT_TIMEFRAME;
	const granularityMs = durationFromLabel(timeframe);
	return {
		kind: "candles",
		subKindId: timeframe,
		layout: granularityLayout(granularityMs),
		pageLimit: (currentTs, endTs) =>
			Math.ceil((endTs - currentTs) / granularityMs) + 1,
		async fetchPage(client, symbol, since, limit, exchange) {
			const bars = await client.fetchOHLCV(symbol, timeframe, since, limit);
			return bars.map(
				([timestamp, open, high, low, close, volume]): CandleRow => ({
					timestamp,
					open,
					high,
					low,
					close,
					volume,
					exchange,
					symbol,
				})
			);
		},
	};
};

const tradeHandler = (options: FetchOptions): DataKindHandler<"trades"> => ({
	kind: "trades",
	layout: DAILY_LAYOUT,
	pageLimit: () => options.tradesLimit ?? DEFAULT_TRADES_PAGE_LIMIT,
	async fetchPage(client, symbol, since, limit, exchange) {
		const trades = await client.fetchTrades(symbol, since, limit);
		return trades.map(
			(trade): TradeRow => ({
				timestamp: trade.timestamp,
				symbol: trade.symbol,
				side: trade.side,
				price: trade.price,
				amount: trade.amount,
				cost: trade.cost,
				fee: trade.fee,
				exchange,
			})
		);
	},
});

const fundingHandler = (options: FetchOptions): DataKindHandler<"funding"> => ({
	kind: "funding",
	layout: DAILY_LAYOUT,
	pageLimit: () => options.fundingLimit,
	async fetchPage(client, symbol, since, limit, exchange) {
		const events = await client.fetchFundingRateHistory(symbol, since, limit);
		return events.map(
			(event): FundingRow => ({
				timestamp: event.timestamp,
				symbol: event.symbol,
				fundingRate: event.fundingRate,
				exchange,
			})
		);
	},
});

const HANDLERS: {
	[K in DataKind]: (options: FetchOptions) => DataKindHandler<K>;
} = {
	candles: candleHandler,
	trades: tradeHandler,
	funding: fundingHandler,
};

/**
 * Resolve the handler for a kind. Throws `TimeframeParseError` when the
 * candle timeframe label cannot be parsed.
 */
export const resolveDataKind = <K extends DataKind>(
	kind: K,
	options: FetchOptions = {}
): DataKindHandler<K> => HANDLERS[kind](options);

/**
 * Layout and sub kind a query uses to enumerate partitions, without
 * building a fetch handler.
 */
export const partitionLayout = (
	kind: DataKind,
	subKindId?: string
): { layout: PartitionLayout; subKindId?: string } => {
	if (kind !== "candles") {
		return { layout: DAILY_LAYOUT };
	}
	const timeframe = subKindId ?? DEFAULT_TIMEFRAME;
	return {
		layout: granularityLayout(durationFromLabel(timeframe)),
		subKindId: timeframe,
	};
};
