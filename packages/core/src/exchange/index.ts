export type {
	MarketDataClient,
	OhlcvBar,
	TradePrint,
	FundingEvent,
} from "./MarketDataClient";
