export { FetchEngine } from "./fetchEngine";
export type { FetchEngineConfig } from "./fetchEngine";
export { RateLimiter, DEFAULT_RATE_LIMIT } from "./rateLimiter";
export {
	DEFAULT_TIMEFRAME,
	DEFAULT_TRADES_PAGE_LIMIT,
	partitionLayout,
	resolveDataKind,
} from "./dataKinds";
export type { DataKindHandler } from "./dataKinds";
export { loadData } from "./loadData";
export { flatten, isCandleValueColumn } from "./flatten";
export type { CandleValueColumn, FlatRow } from "./flatten";
export { download } from "./download";
export type { DownloadOptions } from "./download";
export { withTimeout } from "./utils/timeout";
export * from "./types";
