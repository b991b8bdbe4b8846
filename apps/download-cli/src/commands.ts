import {
	ConfigurationError,
	DATA_KINDS,
	isDataKind,
	type ArchiveConfig,
	type CandleRow,
	type DataKind,
	type Table,
} from "@tapearchive/core";
import {
	download,
	flatten,
	isCandleValueColumn,
	loadData,
	type CandleValueColumn,
	type DownloadOptions,
	type LoadDataQuery,
} from "@tapearchive/data";
import { getSymbols, getTickers } from "@tapearchive/exchange-ccxt";
import {
	readFlag,
	readList,
	readNumber,
	readString,
	requireString,
	type ArgValue,
} from "./cliArgs";

type Args = Record<string, ArgValue>;

const DEFAULT_PREVIEW_ROWS = 20;

export const USAGE = `Usage:
  tapearchive download --exchange <id> --symbols <a,b> --start <date> --end <date> [options]
  tapearchive load --exchange <id> [--kind candles] [--symbols <a,b>] [--start <date>] [--end <date>] [options]
  tapearchive symbols --exchange <id> [--type swap]
  tapearchive tickers --exchange <id> [--threshold <n>] [--type swap]

Options:
  --kinds <a,b>            Data kinds to download (candles, trades, funding; default candles)
  --kind <kind>            Data kind to load (default candles)
  --timeframe <label>      Candle timeframe such as 1m, 4h, 1d
  --dir <path>             Download directory (default TAPEARCHIVE_DATA_DIR or ~/.tapearchive)
  --trades-limit <n>       Trades per request
  --funding-limit <n>      Funding events per request
  --include-incomplete     Load partitions whose window had not closed when written
  --flatten [column]       Pivot loaded candles into one column per symbol (default close)
  --limit <n>              Rows to print after loading (default 20)
  --help                   Show this message
`;

const parseDataKind = (value: string): DataKind => {
	if (!isDataKind(value)) {
		throw new ConfigurationError(
			`Unknown data kind "${value}", expected one of ${DATA_KINDS.join(", ")}`
		);
	}
	return value;
};

export const buildDownloadOptions = (
	args: Args,
	config: ArchiveConfig
): DownloadOptions => {
	const symbols = readList(args, "symbols");
	if (!symbols) {
		throw new ConfigurationError("Missing required --symbols <a,b>");
	}
	return {
		exchange: requireString(args, "exchange"),
		dataKinds: (readList(args, "kinds") ?? ["candles"]).map(parseDataKind),
		symbols,
		start: requireString(args, "start"),
		end: requireString(args, "end"),
		downloadDir: readString(args, "dir") ?? config.downloadDir,
		options: {
			timeframe: readString(args, "timeframe"),
			tradesLimit: readNumber(args, "trades-limit"),
			fundingLimit: readNumber(args, "funding-limit"),
		},
		config,
	};
};

export const buildLoadQuery = (
	args: Args,
	config: ArchiveConfig
): LoadDataQuery => ({
	exchange: requireString(args, "exchange"),
	dataKind: parseDataKind(readString(args, "kind") ?? "candles"),
	symbols: readList(args, "symbols"),
	start: readString(args, "start"),
	end: readString(args, "end"),
	subKindId: readString(args, "timeframe") ?? config.defaultTimeframe,
	includeIncomplete: readFlag(args, "include-incomplete"),
	downloadDir: readString(args, "dir") ?? config.downloadDir,
});

/** Column to pivot on, or undefined when `--flatten` was not given. */
export const readFlattenColumn = (args: Args): CandleValueColumn | undefined => {
	const value = args.flatten;
	if (value === undefined || value === false) {
		return undefined;
	}
	if (value === true) {
		return "close";
	}
	if (!isCandleValueColumn(value)) {
		throw new ConfigurationError(
			`--flatten takes one of open, high, low, close, volume; got "${value}"`
		);
	}
	return value;
};

const isCandleTable = (
	table: Table<unknown>,
	kind: DataKind
): table is Table<CandleRow> => kind === "candles";

const printPreview = (rows: readonly object[], limit: number): void => {
	if (!rows.length) {
		return;
	}
	console.table(rows.slice(0, limit));
	if (rows.length > limit) {
		console.log(`... ${rows.length - limit} more rows`);
	}
};

export const runDownload = async (
	args: Args,
	config: ArchiveConfig
): Promise<number> => {
	const report = await download(buildDownloadOptions(args, config));
	const failed = report.pipelines.filter(
		(pipeline) => pipeline.status === "failed"
	);
	console.log(
		`Downloaded ${report.pipelines.length - failed.length}/${report.pipelines.length} series from ${report.exchange}`
	);
	for (const pipeline of failed) {
		console.error(
			`  ${pipeline.dataKind} ${pipeline.symbol}: ${pipeline.error ?? "failed"}`
		);
	}
	return failed.length ? 1 : 0;
};

export const runLoad = async (
	args: Args,
	config: ArchiveConfig
): Promise<number> => {
	const query = buildLoadQuery(args, config);
	const flattenColumn = readFlattenColumn(args);
	const limit = readNumber(args, "limit") ?? DEFAULT_PREVIEW_ROWS;
	const table = await loadData(query);
	console.log(
		`Loaded ${table.rows.length} ${query.dataKind} rows for ${query.exchange}`
	);

	if (flattenColumn) {
		if (!isCandleTable(table, query.dataKind)) {
			throw new ConfigurationError("--flatten only applies to candles");
		}
		printPreview(flatten(table, flattenColumn).rows, limit);
		return 0;
	}
	printPreview(table.rows, limit);
	return 0;
};

export const runSymbols = async (args: Args): Promise<number> => {
	const symbols = await getSymbols(
		requireString(args, "exchange"),
		readString(args, "type") ?? "swap"
	);
	for (const symbol of symbols) {
		console.log(symbol);
	}
	return 0;
};

export const runTickers = async (args: Args): Promise<number> => {
	const tickers = await getTickers(
		requireString(args, "exchange"),
		readNumber(args, "threshold") ?? 0,
		readString(args, "type") ?? "swap"
	);
	printPreview(
		Array.from(tickers.values()).map((ticker) => ({
			symbol: ticker.symbol,
			quoteVolume: ticker.quoteVolume ?? null,
			last: ticker.last ?? null,
		})),
		tickers.size
	);
	return 0;
};
