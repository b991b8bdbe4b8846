import {
	createLogger,
	loadArchiveConfig,
	parseDateInput,
	type ArchiveConfig,
	type DataKind,
	type ModuleLogger,
} from "@tapearchive/core";
import {
	toMarketDataClient,
	type ExchangeInput,
} from "@tapearchive/exchange-ccxt";
import { PartitionStore } from "@tapearchive/persistence";
import { FetchEngine } from "./fetchEngine";
import { RateLimiter } from "./rateLimiter";
import type { FetchOptions, FetchReport } from "./types";

export interface DownloadOptions {
	exchange: ExchangeInput;
	dataKinds: readonly DataKind[];
	symbols: readonly string[];
	start: string | number | Date;
	end: string | number | Date;
	downloadDir?: string;
	/** Shared limiter; one sized from the configuration is made otherwise */
	rateLimiter?: RateLimiter;
	options?: FetchOptions;
	logger?: ModuleLogger;
	config?: ArchiveConfig;
	now?: () => number;
	maxPagesPerWindow?: number;
}

/**
 * Fetch every (data kind, symbol) series over [start, end) into partition
 * files. The end is clamped to the current instant.
 */
export const download = async (
	options: DownloadOptions
): Promise<FetchReport> => {
	const config = options.config ?? loadArchiveConfig();
	const logger = options.logger ?? createLogger("data:download");
	const now = options.now ?? Date.now;
	const start = parseDateInput(options.start);
	const end = Math.min(parseDateInput(options.end), now());
	const client = toMarketDataClient(options.exchange);

	const store = new PartitionStore(options.downloadDir ?? config.downloadDir);
	const ownsLimiter = options.rateLimiter === undefined;
	const rateLimiter =
		options.rateLimiter ?? new RateLimiter(config.rateLimit);

	try {
		await store.ensureDir();
		logger.info("download_started", {
			exchange: client.id,
			dataKinds: options.dataKinds,
			symbols: options.symbols,
			start: new Date(start).toISOString(),
			end: new Date(end).toISOString(),
			downloadDir: store.downloadDir,
		});
		const engine = new FetchEngine({
			client,
			store,
			rateLimiter,
			logger: options.logger,
			now,
			requestTimeoutMs: config.requestTimeoutMs,
			maxPagesPerWindow: options.maxPagesPerWindow,
		});
		return await engine.run({
			dataKinds: options.dataKinds,
			symbols: options.symbols,
			start,
			end,
			options: {
				...options.options,
				timeframe: options.options?.timeframe ?? config.defaultTimeframe,
			},
		});
	} finally {
		await client.close();
		if (ownsLimiter) {
			await rateLimiter.stop();
		}
	}
};
