import path from "node:path";
import {
	DATA_KINDS,
	formatPartitionDate,
	windowContains,
	type DataKind,
} from "@tapearchive/core";

export const PARTITION_EXTENSION = ".parquet";
export const INCOMPLETE_SUFFIX = "_incomplete";
export const WILDCARD = "*";

const ESCAPES: ReadonlyArray<[string, string]> = [
	["/", "%2F"],
	[":", "%3A"],
];

export const escapeComponent = (value: string): string =>
	ESCAPES.reduce((acc, [raw, escaped]) => acc.split(raw).join(escaped), value);

export const unescapeComponent = (value: string): string =>
	ESCAPES.reduce((acc, [raw, escaped]) => acc.split(escaped).join(raw), value);

export interface PartitionKey {
	exchange: string;
	dataKind: DataKind;
	/** Candle timeframe label; absent for trades and funding */
	subKindId?: string;
	/** Aligned window start in epoch ms, or "*" for discovery */
	periodStart: number | typeof WILDCARD;
	/** Unified symbol, or "*" for discovery */
	symbol: string;
}

export interface PartitionPathOptions extends PartitionKey {
	windowLength: number;
	downloadDir: string;
	now: number;
}

export interface PartitionNameParts {
	exchange: string;
	subKindId?: string;
	dataKind: DataKind;
	date: string;
	symbol: string;
}

/**
 * Escaped file-name components for a key. Wildcards pass through unescaped.
 */
export const partitionNameParts = (key: PartitionKey): PartitionNameParts => ({
	exchange: escapeComponent(key.exchange.toLowerCase()),
	subKindId: key.subKindId ? escapeComponent(key.subKindId) : undefined,
	dataKind: key.dataKind,
	date:
		key.periodStart === WILDCARD
			? WILDCARD
			: formatPartitionDate(key.periodStart),
	symbol: key.symbol === WILDCARD ? WILDCARD : escapeComponent(key.symbol),
});

export const joinPartitionName = (
	parts: PartitionNameParts,
	incomplete: boolean
): string => {
	const subKind = parts.subKindId ? `${parts.subKindId}_` : "";
	const marker = incomplete ? INCOMPLETE_SUFFIX : "";
	return `${parts.exchange}_${subKind}${parts.dataKind}_${parts.date}_${parts.symbol}${marker}${PARTITION_EXTENSION}`;
};

/**
 * Path of the partition file for a window, marked incomplete when the window
 * still contains `now`.
 */
export const buildPartitionPath = (options: PartitionPathOptions): string => {
	const incomplete =
		options.periodStart !== WILDCARD &&
		windowContains(options.periodStart, options.windowLength, options.now);
	return path.join(
		options.downloadDir,
		joinPartitionName(partitionNameParts(options), incomplete)
	);
};

export const completePartitionPath = (
	key: PartitionKey,
	downloadDir: string
): string =>
	path.join(downloadDir, joinPartitionName(partitionNameParts(key), false));

export const incompletePartitionPath = (
	key: PartitionKey,
	downloadDir: string
): string =>
	path.join(downloadDir, joinPartitionName(partitionNameParts(key), true));

export const isIncompletePath = (filePath: string): boolean =>
	filePath.endsWith(`${INCOMPLETE_SUFFIX}${PARTITION_EXTENSION}`);

/** The complete-partition path an incomplete path stands in for. */
export const toCompletePath = (filePath: string): string =>
	isIncompletePath(filePath)
		? `${filePath.slice(
				0,
				-(INCOMPLETE_SUFFIX.length + PARTITION_EXTENSION.length)
		  )}${PARTITION_EXTENSION}`
		: filePath;

export interface ParsedPartitionName {
	exchange: string;
	subKindId?: string;
	dataKind: DataKind;
	date: string;
	/** Unescaped unified symbol */
	symbol: string;
	incomplete: boolean;
}

const DATE_TOKEN = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Recover the key components of a partition file name; null when the name
 * does not follow the partition layout.
 */
export const parsePartitionFileName = (
	filePath: string
): ParsedPartitionName | null => {
	const base = path.basename(filePath);
	if (!base.endsWith(PARTITION_EXTENSION)) {
		return null;
	}
	const incomplete = isIncompletePath(base);
	const stem = path.basename(toCompletePath(base), PARTITION_EXTENSION);
	const tokens = stem.split("_");

	const kindIdx = tokens.findIndex(
		(token, idx) =>
			idx > 0 && (DATA_KINDS as readonly string[]).includes(token)
	);
	const dataKind = DATA_KINDS.find((kind) => kind === tokens[kindIdx]);
	const date = tokens[kindIdx + 1];
	const symbolTokens = tokens.slice(kindIdx + 2);
	if (
		kindIdx < 1 ||
		!dataKind ||
		!date ||
		!DATE_TOKEN.test(date) ||
		!symbolTokens.length
	) {
		return null;
	}

	const subKindTokens = tokens.slice(1, kindIdx);
	return {
		exchange: unescapeComponent(tokens[0]),
		subKindId: subKindTokens.length
			? unescapeComponent(subKindTokens.join("_"))
			: undefined,
		dataKind,
		date,
		symbol: unescapeComponent(symbolTokens.join("_")),
		incomplete,
	};
};
