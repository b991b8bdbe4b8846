import {
	ConfigurationError,
	PartitionDecodeError,
	createLogger,
	formatPartitionDate,
	parseDateInput,
	type DataKind,
	type ModuleLogger,
	type RowOf,
	type Table,
} from "@tapearchive/core";
import {
	PARTITION_SCHEMAS,
	PartitionStore,
	WILDCARD,
	columnNames,
	completePartitionPath,
	incompletePartitionPath,
	isIncompletePath,
	parsePartitionFileName,
	toCompletePath,
	type PartitionKey,
	type PartitionSchema,
} from "@tapearchive/persistence";
import { partitionLayout } from "./dataKinds";
import type { LoadDataQuery } from "./types";

interface DateRange {
	start: number;
	end: number;
}

const resolveRange = (query: LoadDataQuery): DateRange | null => {
	if (query.start === undefined && query.end === undefined) {
		return null;
	}
	if (query.start === undefined) {
		throw new ConfigurationError("A query with an end date needs a start date");
	}
	const now = query.now ?? Date.now;
	return {
		start: parseDateInput(query.start),
		end: query.end === undefined ? now() : parseDateInput(query.end),
	};
};

/**
 * Glob matches reduced to complete partitions, plus incomplete ones standing
 * in for a missing complete sibling when asked for.
 */
const selectGlobMatches = (
	matches: readonly string[],
	includeIncomplete: boolean
): string[] => {
	const available = new Set(matches);
	return matches.filter(
		(filePath) =>
			!isIncompletePath(filePath) ||
			(includeIncomplete && !available.has(toCompletePath(filePath)))
	);
};

const dedupeKey = <R extends RowOf<DataKind>>(
	row: R,
	schema: PartitionSchema<R>,
	multiSymbol: boolean
): string => {
	if (schema.kind === "trades") {
		return JSON.stringify(schema.columns.map((column) => row[column.name]));
	}
	return multiSymbol ? `${row.timestamp}|${row.symbol}` : `${row.timestamp}`;
};

/**
 * Reassemble partition files matching a query into one table sorted by
 * timestamp. Unreadable partitions are logged and skipped.
 */
export const loadData = async <K extends DataKind>(
	query: LoadDataQuery<K>,
	logger: ModuleLogger = createLogger("data:query")
): Promise<Table<RowOf<K>>> => {
	const { layout, subKindId } = partitionLayout(
		query.dataKind,
		query.subKindId
	);
	const schema: PartitionSchema<RowOf<K>> = PARTITION_SCHEMAS[query.dataKind];
	const store = new PartitionStore(query.downloadDir);
	const includeIncomplete = query.includeIncomplete ?? false;
	const symbols = query.symbols?.length
		? Array.from(new Set(query.symbols))
		: undefined;
	const range = resolveRange(query);

	const keyFor = (
		periodStart: PartitionKey["periodStart"],
		symbol: string
	): PartitionKey => ({
		exchange: query.exchange,
		dataKind: query.dataKind,
		subKindId,
		periodStart,
		symbol,
	});

	let files: string[] = [];
	if (range && symbols) {
		for (const periodStart of layout.starts(range.start, range.end)) {
			for (const symbol of symbols) {
				const key = keyFor(periodStart, symbol);
				const completePath = completePartitionPath(key, store.downloadDir);
				const incompletePath = incompletePartitionPath(key, store.downloadDir);
				if (
					includeIncomplete &&
					!(await store.exists(completePath)) &&
					(await store.exists(incompletePath))
				) {
					logger.debug("incomplete_substituted", { path: incompletePath });
					files.push(incompletePath);
				} else {
					files.push(completePath);
				}
			}
		}
	} else if (range) {
		const expectedDates = new Set(
			layout.starts(range.start, range.end).map(formatPartitionDate)
		);
		const matches = await store.glob(keyFor(WILDCARD, WILDCARD));
		files = selectGlobMatches(
			matches.filter((filePath) => {
				const parsed = parsePartitionFileName(filePath);
				return parsed !== null && expectedDates.has(parsed.date);
			}),
			includeIncomplete
		);
	} else {
		for (const symbol of symbols ?? [WILDCARD]) {
			const matches = await store.glob(keyFor(WILDCARD, symbol));
			files.push(...selectGlobMatches(matches, includeIncomplete));
		}
	}

	const loaded: RowOf<K>[] = [];
	for (const filePath of files) {
		try {
			const rows = await store.read(filePath, schema);
			if (rows) {
				loaded.push(...rows);
			}
		} catch (error) {
			if (!(error instanceof PartitionDecodeError)) {
				throw error;
			}
			logger.warn("partition_unreadable", {
				path: filePath,
				error: error.message,
			});
		}
	}

	loaded.sort((a, b) => a.timestamp - b.timestamp);
	const multiSymbol = symbols === undefined || symbols.length > 1;
	const seen = new Set<string>();
	const rows = loaded.filter((row) => {
		const key = dedupeKey(row, schema, multiSymbol);
		if (seen.has(key)) {
			return false;
		}
		seen.add(key);
		return true;
	});

	logger.debug("query_loaded", {
		exchange: query.exchange,
		dataKind: query.dataKind,
		files: files.length,
		rows: rows.length,
	});
	return { columns: columnNames(schema), rows };
};
