import Bottleneck from "bottleneck";
import {
	createLogger,
	type ModuleLogger,
	type RateLimitConfig,
} from "@tapearchive/core";

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
	maxRequests: 100,
	periodMs: 30_000,
};

/**
 * Fixed-window admission control shared by every fetch pipeline of a call.
 * At most `maxRequests` scheduled calls start per `periodMs`; the rest wait
 * for the reservoir to refill.
 */
export class RateLimiter {
	private readonly limiter: Bottleneck;
	private stopped = false;

	constructor(
		readonly config: RateLimitConfig = DEFAULT_RATE_LIMIT,
		private readonly logger: ModuleLogger = createLogger("data:rate-limiter")
	) {
		this.limiter = new Bottleneck({
			reservoir: config.maxRequests,
			reservoirRefreshAmount: config.maxRequests,
			reservoirRefreshInterval: config.periodMs,
		});
		this.limiter.on("depleted", () => {
			this.logger.debug("rate_limit_depleted", {
				maxRequests: config.maxRequests,
				periodMs: config.periodMs,
			});
		});
	}

	schedule<T>(task: () => Promise<T>): Promise<T> {
		return this.limiter.schedule(task);
	}

	/** Let in-flight calls finish, then release the refill timer. */
	async stop(): Promise<void> {
		if (this.stopped) {
			return;
		}
		this.stopped = true;
		await this.limiter.stop({ dropWaitingJobs: false });
		await this.limiter.disconnect();
	}
}
