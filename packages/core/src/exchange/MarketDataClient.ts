/**
 * One OHLCV bar as returned by the upstream venue:
 * [timestamp, open, high, low, close, volume].
 */
export type OhlcvBar = [number, number, number, number, number, number];

export interface TradePrint {
	timestamp: number;
	symbol: string;
	side: string;
	price: number;
	amount: number;
	cost: number;
	fee: number | null;
}

export interface FundingEvent {
	timestamp: number;
	symbol: string;
	fundingRate: number;
}

/**
 * Paginated historical market data source.
 *
 * Every fetch is cursor-based: it returns records at or after `since`, in
 * chronological order, at most `limit` of them when a limit is given. Retry
 * policy belongs to the implementation; errors propagate to the caller.
 */
export interface MarketDataClient {
	/** Lower-case venue identifier used in partition names (e.g. "bybit") */
	readonly id: string;

	/** Load market metadata once before any fetch. */
	loadMarkets(): Promise<void>;

	fetchOHLCV(
		symbol: string,
		timeframe: string,
		since: number,
		limit?: number
	): Promise<OhlcvBar[]>;

	fetchTrades(
		symbol: string,
		since: number,
		limit?: number
	): Promise<TradePrint[]>;

	fetchFundingRateHistory(
		symbol: string,
		since: number,
		limit?: number
	): Promise<FundingEvent[]>;

	/** Release connections held by the client. */
	close(): Promise<void>;
}
