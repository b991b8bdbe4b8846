import type { CandleRow, Table } from "@tapearchive/core";

export type CandleValueColumn = "open" | "high" | "low" | "close" | "volume";

export type FlatRow = { timestamp: number } & Record<string, number | null>;

export const isCandleValueColumn = (value: string): value is CandleValueColumn =>
	["open", "high", "low", "close", "volume"].includes(value);

/**
 * Pivot candles into one column per symbol keyed by timestamp. A symbol
 * without a bar at some timestamp carries its previous value forward; before
 * its first bar the value is null.
 */
export const flatten = (
	table: Table<CandleRow>,
	valueColumn: CandleValueColumn = "close"
): Table<FlatRow> => {
	const symbols = Array.from(new Set(table.rows.map((row) => row.symbol))).sort();
	const byTimestamp = new Map<number, Map<string, number>>();
	for (const row of table.rows) {
		const bucket = byTimestamp.get(row.timestamp) ?? new Map<string, number>();
		if (!bucket.has(row.symbol)) {
			bucket.set(row.symbol, row[valueColumn]);
		}
		byTimestamp.set(row.timestamp, bucket);
	}

	const last = new Map<string, number>();
	const rows = Array.from(byTimestamp.keys())
		.sort((a, b) => a - b)
		.map((timestamp) => {
			const bucket = byTimestamp.get(timestamp);
			const row: FlatRow = { timestamp };
			for (const symbol of symbols) {
				const value = bucket?.get(symbol);
				if (value !== undefined) {
					last.set(symbol, value);
				}
				row[symbol] = last.get(symbol) ?? null;
			}
			return row;
		});

	return { columns: ["timestamp", ...symbols], rows };
};
