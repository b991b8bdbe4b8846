export { CcxtMarketDataClient } from "./CcxtMarketDataClient";
export { resolveExchange, toMarketDataClient } from "./exchange";
export type { ExchangeInput } from "./exchange";
export { getSymbols, getTickers, rankTickers, selectSymbols } from "./markets";
export type { MarketLike, TickerLike } from "./markets";
export { mapFunding, mapOhlcv, mapTrade } from "./mappers";
export type { CcxtFundingLike, CcxtTradeLike } from "./mappers";
