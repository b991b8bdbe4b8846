import type { Exchange, Ticker } from "ccxt";
import { resolveExchange } from "./exchange";

export interface MarketLike {
	symbol: string;
	type?: string;
}

export interface TickerLike {
	symbol: string;
	quoteVolume?: number;
}

export const selectSymbols = (
	markets: Iterable<MarketLike | undefined>,
	marketType: string
): string[] =>
	Array.from(markets).flatMap((market) =>
		market && market.type === marketType ? [market.symbol] : []
	);

/**
 * Tickers whose quote volume is strictly above `threshold`, keyed by symbol
 * and ordered by descending quote volume.
 */
export const rankTickers = <T extends TickerLike>(
	tickers: Iterable<T>,
	threshold: number
): Map<string, T> => {
	const ranked = Array.from(tickers)
		.filter((ticker) => (ticker.quoteVolume ?? 0) > threshold)
		.sort((a, b) => (b.quoteVolume ?? 0) - (a.quoteVolume ?? 0));
	return new Map(ranked.map((ticker) => [ticker.symbol, ticker]));
};

const withExchange = async <T>(
	exchange: string | Exchange,
	task: (instance: Exchange) => Promise<T>
): Promise<T> => {
	const instance = resolveExchange(exchange);
	try {
		return await task(instance);
	} finally {
		// only connections this module opened are closed here
		if (typeof exchange === "string") {
			await instance.close();
		}
	}
};

/** Unified symbols of every market of one type ("swap", "spot", ...). */
export const getSymbols = (
	exchange: string | Exchange,
	marketType = "swap"
): Promise<string[]> =>
	withExchange(exchange, async (instance) => {
		const markets = await instance.loadMarkets();
		return selectSymbols(Object.values(markets), marketType);
	});

export const getTickers = (
	exchange: string | Exchange,
	threshold = 0,
	marketType = "swap"
): Promise<Map<string, Ticker>> =>
	withExchange(exchange, async (instance) => {
		const markets = await instance.loadMarkets();
		const symbols = selectSymbols(Object.values(markets), marketType);
		if (!symbols.length) {
			return new Map<string, Ticker>();
		}
		const tickers = await instance.fetchTickers(symbols);
		return rankTickers(Object.values(tickers), threshold);
	});
