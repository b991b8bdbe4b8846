import type { DataKind } from "@tapearchive/core";

export interface FetchOptions {
	/** Candle timeframe label, "1m" when omitted */
	timeframe?: string;
	/** Trades per page, 1000 when omitted */
	tradesLimit?: number;
	/** Funding events per page; the venue default when omitted */
	fundingLimit?: number;
}

export interface FetchRequest {
	dataKinds: readonly DataKind[];
	symbols: readonly string[];
	/** Epoch ms, inclusive */
	start: number;
	/** Epoch ms, exclusive */
	end: number;
	options?: FetchOptions;
}

export type PipelineStatus = "completed" | "failed";

export interface PipelineReport {
	dataKind: DataKind;
	symbol: string;
	subKindId?: string;
	status: PipelineStatus;
	/** Partition files written by this pipeline */
	written: number;
	/** Windows whose complete partition already existed */
	skipped: number;
	/** Windows the venue returned no rows for */
	empty: number;
	error?: string;
}

export interface FetchReport {
	exchange: string;
	start: number;
	end: number;
	pipelines: PipelineReport[];
}

export interface LoadDataQuery<K extends DataKind = DataKind> {
	exchange: string;
	dataKind: K;
	symbols?: readonly string[];
	start?: string | number | Date;
	end?: string | number | Date;
	/** Candle timeframe label, "1m" when omitted */
	subKindId?: string;
	includeIncomplete?: boolean;
	downloadDir: string;
	/** Epoch ms clock used when only `start` is given */
	now?: () => number;
}
