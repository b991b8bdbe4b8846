import type { Exchange } from "ccxt";
import type {
	FundingEvent,
	MarketDataClient,
	OhlcvBar,
	TradePrint,
} from "@tapearchive/core";
import { compact, mapFunding, mapOhlcv, mapTrade } from "./mappers";

/**
 * Historical market data read through a ccxt exchange instance. Records
 * without a timestamp are dropped.
 */
export class CcxtMarketDataClient implements MarketDataClient {
	readonly id: string;

	constructor(private readonly exchange: Exchange) {
		this.id = exchange.id;
	}

	async loadMarkets(): Promise<void> {
		await this.exchange.loadMarkets();
	}

	async fetchOHLCV(
		symbol: string,
		timeframe: string,
		since: number,
		limit?: number
	): Promise<OhlcvBar[]> {
		const rows = await this.exchange.fetchOHLCV(symbol, timeframe, since, limit);
		return compact(rows.map(mapOhlcv));
	}

	async fetchTrades(
		symbol: string,
		since: number,
		limit?: number
	): Promise<TradePrint[]> {
		const trades = await this.exchange.fetchTrades(symbol, since, limit);
		return compact(trades.map((trade) => mapTrade(trade, symbol)));
	}

	async fetchFundingRateHistory(
		symbol: string,
		since: number,
		limit?: number
	): Promise<FundingEvent[]> {
		const events = await this.exchange.fetchFundingRateHistory(
			symbol,
			since,
			limit
		);
		return compact(events.map((event) => mapFunding(event, symbol)));
	}

	async close(): Promise<void> {
		await this.exchange.close();
	}
}
