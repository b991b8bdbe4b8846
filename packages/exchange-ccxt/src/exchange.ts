import ccxt, { type Exchange } from "ccxt";
import {
	ConfigurationError,
	createLogger,
	type MarketDataClient,
} from "@tapearchive/core";
import { CcxtMarketDataClient } from "./CcxtMarketDataClient";

const exchangeLogger = createLogger("exchange:ccxt");

type ExchangeClass = new (config?: Record<string, unknown>) => Exchange;

/** An exchange id ("bybit"), a ccxt instance or a ready client. */
export type ExchangeInput = string | Exchange | MarketDataClient;

const isExchangeClass = (value: unknown): value is ExchangeClass =>
	typeof value === "function" && value.prototype instanceof ccxt.Exchange;

const isMarketDataClient = (value: unknown): value is MarketDataClient =>
	typeof value === "object" &&
	value !== null &&
	"id" in value &&
	typeof value.id === "string" &&
	"fetchOHLCV" in value &&
	"fetchTrades" in value &&
	"fetchFundingRateHistory" in value &&
	"loadMarkets" in value &&
	"close" in value;

/**
 * Build a ccxt exchange from its id, or pass an instance through.
 * Throws `ConfigurationError` for anything ccxt does not know.
 */
export const resolveExchange = (exchange: string | Exchange): Exchange => {
	if (exchange instanceof ccxt.Exchange) {
		return exchange;
	}
	if (typeof exchange !== "string") {
		throw new ConfigurationError(
			"Exchange must be a ccxt exchange id or a ccxt exchange instance"
		);
	}
	const id = exchange.trim().toLowerCase();
	const ExchangeCtor: unknown = ccxt.exchanges.includes(id)
		? Reflect.get(ccxt, id)
		: undefined;
	if (!isExchangeClass(ExchangeCtor)) {
		throw new ConfigurationError(`Unknown ccxt exchange "${exchange}"`);
	}
	exchangeLogger.debug("exchange_created", { exchange: id });
	return new ExchangeCtor({ enableRateLimit: true });
};

/**
 * Upstream client for any accepted exchange input.
 */
export const toMarketDataClient = (exchange: ExchangeInput): MarketDataClient => {
	if (typeof exchange === "string" || exchange instanceof ccxt.Exchange) {
		return new CcxtMarketDataClient(resolveExchange(exchange));
	}
	if (!isMarketDataClient(exchange)) {
		throw new ConfigurationError(
			"Exchange must be an id, a ccxt exchange instance or a market data client"
		);
	}
	return exchange;
};
