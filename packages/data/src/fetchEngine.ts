import {
	createLogger,
	type DataKind,
	type MarketDataClient,
	type ModuleLogger,
	type RowOf,
} from "@tapearchive/core";
import {
	PARTITION_SCHEMAS,
	buildPartitionPath,
	completePartitionPath,
	incompletePartitionPath,
	type PartitionKey,
	type PartitionStore,
} from "@tapearchive/persistence";
import { resolveDataKind, type DataKindHandler } from "./dataKinds";
import type { RateLimiter } from "./rateLimiter";
import type {
	FetchReport,
	FetchRequest,
	PipelineReport,
} from "./types";
import { withTimeout } from "./utils/timeout";

const DEFAULT_MAX_PAGES_PER_WINDOW = 10_000;

export interface FetchEngineConfig {
	client: MarketDataClient;
	store: PartitionStore;
	rateLimiter: RateLimiter;
	logger?: ModuleLogger;
	/** Clock deciding whether a written window is still incomplete */
	now?: () => number;
	/** Per upstream call; a stalled call fails its pipeline */
	requestTimeoutMs?: number;
	maxPagesPerWindow?: number;
}

type WindowOutcome = "written" | "skipped" | "empty";

const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error);

/**
 * Walks partition windows for every (data kind, symbol) pipeline, pages each
 * window out of the upstream client and persists one file per window.
 */
export class FetchEngine {
	private readonly logger: ModuleLogger;
	private readonly now: () => number;
	private readonly maxPagesPerWindow: number;

	constructor(private readonly config: FetchEngineConfig) {
		this.logger = config.logger ?? createLogger("data:fetch");
		this.now = config.now ?? Date.now;
		this.maxPagesPerWindow = Math.max(
			config.maxPagesPerWindow ?? DEFAULT_MAX_PAGES_PER_WINDOW,
			1
		);
	}

	async run(request: FetchRequest): Promise<FetchReport> {
		const { client } = this.config;
		await this.call("loadMarkets", () => client.loadMarkets());

		const dataKinds = Array.from(new Set(request.dataKinds));
		const symbols = Array.from(new Set(request.symbols));
		const pipelines = await Promise.all(
			dataKinds.flatMap((kind) =>
				symbols.map((symbol) => this.runPipeline(kind, symbol, request))
			)
		);

		const report: FetchReport = {
			exchange: client.id,
			start: request.start,
			end: request.end,
			pipelines,
		};
		this.logger.info("fetch_report", {
			exchange: client.id,
			start: new Date(request.start).toISOString(),
			end: new Date(request.end).toISOString(),
			pipelines,
		});
		return report;
	}

	private async runPipeline<K extends DataKind>(
		kind: K,
		symbol: string,
		request: FetchRequest
	): Promise<PipelineReport> {
		const report: PipelineReport = {
			dataKind: kind,
			symbol,
			status: "completed",
			written: 0,
			skipped: 0,
			empty: 0,
		};

		try {
			const handler = resolveDataKind(kind, request.options);
			report.subKindId = handler.subKindId;
			const { windowMs } = handler.layout;
			const starts = handler.layout.starts(request.start, request.end);

			for (const windowStart of starts) {
				const outcome = await this.fetchPartition(
					handler,
					symbol,
					windowStart,
					windowMs
				);
				report[outcome] += 1;
			}
		} catch (error) {
			report.status = "failed";
			report.error = describeError(error);
			this.logger.error("pipeline_failed", {
				dataKind: kind,
				symbol,
				error,
			});
		}

		return report;
	}

	private async fetchPartition<K extends DataKind>(
		handler: DataKindHandler<K>,
		symbol: string,
		windowStart: number,
		windowMs: number
	): Promise<WindowOutcome> {
		const { client, store } = this.config;
		const key: PartitionKey = {
			exchange: client.id,
			dataKind: handler.kind,
			subKindId: handler.subKindId,
			periodStart: windowStart,
			symbol,
		};

		const completePath = completePartitionPath(key, store.downloadDir);
		if (await store.exists(completePath)) {
			this.logger.debug("partition_exists", { path: completePath });
			return "skipped";
		}

		const incompletePath = incompletePartitionPath(key, store.downloadDir);
		if (await store.remove(incompletePath)) {
			this.logger.debug("incomplete_partition_removed", {
				path: incompletePath,
			});
		}

		const windowEnd = windowStart + windowMs;
		const rows = await this.fetchWindow(handler, symbol, windowStart, windowEnd);
		if (!rows.length) {
			this.logger.info("window_empty", {
				dataKind: handler.kind,
				symbol,
				windowStart: new Date(windowStart).toISOString(),
			});
			return "empty";
		}

		rows.sort((a, b) => a.timestamp - b.timestamp);
		const filePath = buildPartitionPath({
			...key,
			windowLength: windowMs,
			downloadDir: store.downloadDir,
			now: this.now(),
		});
		await store.write(filePath, PARTITION_SCHEMAS[handler.kind], rows);
		this.logger.info("partition_written", {
			path: filePath,
			rows: rows.length,
		});
		return "written";
	}

	/**
	 * Page through [startTs, endTs) following the timestamp of each page's
	 * last record. Rows outside the window are dropped.
	 */
	private async fetchWindow<K extends DataKind>(
		handler: DataKindHandler<K>,
		symbol: string,
		startTs: number,
		endTs: number
	): Promise<RowOf<K>[]> {
		const { client } = this.config;
		const rows: RowOf<K>[] = [];
		let currentTs = startTs;
		let pages = 0;

		while (currentTs < endTs) {
			if (pages >= this.maxPagesPerWindow) {
				this.logger.warn("window_page_cap_reached", {
					dataKind: handler.kind,
					symbol,
					windowStart: new Date(startTs).toISOString(),
					pages,
				});
				break;
			}

			const since = currentTs;
			const limit = handler.pageLimit(since, endTs);
			const page = await this.call(`fetch ${handler.kind} ${symbol}`, () =>
				handler.fetchPage(client, symbol, since, limit, client.id)
			);
			pages += 1;

			const last = page[page.length - 1];
			if (!last) {
				break;
			}
			for (const row of page) {
				if (row.timestamp >= startTs && row.timestamp < endTs) {
					rows.push(row);
				}
			}
			currentTs = Math.max(last.timestamp + 1, currentTs + 1);
		}

		return rows;
	}

	private call<T>(operation: string, task: () => Promise<T>): Promise<T> {
		return this.config.rateLimiter.schedule(() =>
			withTimeout(task(), this.config.requestTimeoutMs, operation)
		);
	}
}
