import type {
	CandleRow,
	DataKind,
	DataKindRowMap,
	FundingRow,
	TradeRow,
} from "@tapearchive/core";

export type ColumnType = "INT64" | "DOUBLE" | "STRING";

export interface ColumnSpec<R> {
	name: keyof R & string;
	type: ColumnType;
}

/**
 * Column layout of one data kind's partition files plus the decoder that
 * turns a raw Parquet record back into a typed row.
 */
export interface PartitionSchema<R> {
	kind: DataKind;
	columns: readonly ColumnSpec<R>[];
	/** Returns null when the record does not match the layout */
	decode(record: Record<string, unknown>): R | null;
}

const readNumber = (value: unknown): number | null => {
	if (typeof value === "bigint") {
		return Number(value);
	}
	if (typeof value === "number" && !Number.isNaN(value)) {
		return value;
	}
	return null;
};

const readString = (value: unknown): string | null =>
	typeof value === "string" ? value : null;

const candleSchema: PartitionSchema<CandleRow> = {
	kind: "candles",
	columns: [
		{ name: "timestamp", type: "INT64" },
		{ name: "open", type: "DOUBLE" },
		{ name: "high", type: "DOUBLE" },
		{ name: "low", type: "DOUBLE" },
		{ name: "close", type: "DOUBLE" },
		{ name: "volume", type: "DOUBLE" },
		{ name: "exchange", type: "STRING" },
		{ name: "symbol", type: "STRING" },
	],
	decode(record) {
		const timestamp = readNumber(record.timestamp);
		const open = readNumber(record.open);
		const high = readNumber(record.high);
		const low = readNumber(record.low);
		const close = readNumber(record.close);
		const volume = readNumber(record.volume);
		const exchange = readString(record.exchange);
		const symbol = readString(record.symbol);
		if (
			timestamp === null ||
			open === null ||
			high === null ||
			low === null ||
			close === null ||
			volume === null ||
			exchange === null ||
			symbol === null
		) {
			return null;
		}
		return { timestamp, open, high, low, close, volume, exchange, symbol };
	},
};

const tradeSchema: PartitionSchema<TradeRow> = {
	kind: "trades",
	columns: [
		{ name: "timestamp", type: "INT64" },
		{ name: "symbol", type: "STRING" },
		{ name: "side", type: "STRING" },
		{ name: "price", type: "DOUBLE" },
		{ name: "amount", type: "DOUBLE" },
		{ name: "cost", type: "DOUBLE" },
		{ name: "fee", type: "DOUBLE" },
		{ name: "exchange", type: "STRING" },
	],
	decode(record) {
		const timestamp = readNumber(record.timestamp);
		const symbol = readString(record.symbol);
		const side = readString(record.side);
		const price = readNumber(record.price);
		const amount = readNumber(record.amount);
		const cost = readNumber(record.cost);
		const exchange = readString(record.exchange);
		if (
			timestamp === null ||
			symbol === null ||
			side === null ||
			price === null ||
			amount === null ||
			cost === null ||
			exchange === null
		) {
			return null;
		}
		return {
			timestamp,
			symbol,
			side,
			price,
			amount,
			cost,
			fee: readNumber(record.fee),
			exchange,
		};
	},
};

const fundingSchema: PartitionSchema<FundingRow> = {
	kind: "funding",
	columns: [
		{ name: "timestamp", type: "INT64" },
		{ name: "symbol", type: "STRING" },
		{ name: "fundingRate", type: "DOUBLE" },
		{ name: "exchange", type: "STRING" },
	],
	decode(record) {
		const timestamp = readNumber(record.timestamp);
		const symbol = readString(record.symbol);
		const fundingRate = readNumber(record.fundingRate);
		const exchange = readString(record.exchange);
		if (
			timestamp === null ||
			symbol === null ||
			fundingRate === null ||
			exchange === null
		) {
			return null;
		}
		return { timestamp, symbol, fundingRate, exchange };
	},
};

export const PARTITION_SCHEMAS: {
	[K in DataKind]: PartitionSchema<DataKindRowMap[K]>;
} = {
	candles: candleSchema,
	trades: tradeSchema,
	funding: fundingSchema,
};

export const columnNames = <R>(schema: PartitionSchema<R>): string[] =>
	schema.columns.map((column) => column.name);
