import type { FundingEvent, OhlcvBar, TradePrint } from "@tapearchive/core";

type Num = number | undefined;

/** The parts of a ccxt trade the archive keeps. */
export interface CcxtTradeLike {
	timestamp?: Num;
	symbol?: string;
	side?: string;
	price?: Num;
	amount?: Num;
	cost?: Num;
	fee?: { cost?: Num };
}

export interface CcxtFundingLike {
	timestamp?: Num;
	symbol?: string;
	fundingRate?: Num;
}

const isFiniteNumber = (value: Num): value is number =>
	typeof value === "number" && Number.isFinite(value);

/**
 * Map one ccxt OHLCV row; null when the venue left out the timestamp or any
 * price or volume.
 */
export const mapOhlcv = (row: readonly Num[]): OhlcvBar | null => {
	const [timestamp, open, high, low, close, volume] = row;
	if (
		!isFiniteNumber(timestamp) ||
		!isFiniteNumber(open) ||
		!isFiniteNumber(high) ||
		!isFiniteNumber(low) ||
		!isFiniteNumber(close) ||
		!isFiniteNumber(volume)
	) {
		return null;
	}
	return [timestamp, open, high, low, close, volume];
};

export const mapTrade = (
	trade: CcxtTradeLike,
	symbol: string
): TradePrint | null => {
	if (typeof trade.timestamp !== "number") {
		return null;
	}
	const price = Number(trade.price ?? 0);
	const amount = Number(trade.amount ?? 0);
	return {
		timestamp: trade.timestamp,
		symbol: trade.symbol ?? symbol,
		side: trade.side ?? "",
		price,
		amount,
		cost: Number(trade.cost ?? price * amount),
		fee: typeof trade.fee?.cost === "number" ? trade.fee.cost : null,
	};
};

export const mapFunding = (
	event: CcxtFundingLike,
	symbol: string
): FundingEvent | null => {
	if (typeof event.timestamp !== "number") {
		return null;
	}
	return {
		timestamp: event.timestamp,
		symbol: event.symbol ?? symbol,
		fundingRate: Number(event.fundingRate ?? 0),
	};
};

export const compact = <T>(values: readonly (T | null)[]): T[] =>
	values.filter((value): value is T => value !== null);
