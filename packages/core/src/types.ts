export type DataKind = "candles" | "trades" | "funding";

export const DATA_KINDS: readonly DataKind[] = ["candles", "trades", "funding"];

export const isDataKind = (value: string): value is DataKind =>
	(DATA_KINDS as readonly string[]).includes(value);

export interface CandleRow {
	timestamp: number;
	open: number;
	high: number;
	low: number;
	close: number;
	volume: number;
	exchange: string;
	symbol: string;
}

export interface TradeRow {
	timestamp: number;
	symbol: string;
	side: string;
	price: number;
	amount: number;
	cost: number;
	/** Fee cost in the fee currency, null when the venue omits it */
	fee: number | null;
	exchange: string;
}

export interface FundingRow {
	timestamp: number;
	symbol: string;
	fundingRate: number;
	exchange: string;
}

export interface DataKindRowMap {
	candles: CandleRow;
	trades: TradeRow;
	funding: FundingRow;
}

export type RowOf<K extends DataKind> = DataKindRowMap[K];

export type PartitionRow = RowOf<DataKind>;

/**
 * In-memory result of a query. Rows are sorted by timestamp; `columns` is
 * populated even when there are no rows.
 */
export interface Table<R> {
	columns: readonly string[];
	rows: R[];
}
