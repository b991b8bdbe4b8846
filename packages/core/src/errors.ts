export class TapeArchiveError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/**
 * Bad exchange identifier, unsupported timeframe, unreadable option. Raised
 * before any network activity for the scope it belongs to.
 */
export class ConfigurationError extends TapeArchiveError {}

export class TimeframeParseError extends ConfigurationError {
	constructor(
		readonly label: string,
		reason: string
	) {
		super(`Invalid timeframe "${label}": ${reason}`);
	}
}

/** A partition file exists but could not be decoded. */
export class PartitionDecodeError extends TapeArchiveError {
	constructor(
		readonly filePath: string,
		cause: unknown
	) {
		super(
			`Failed to decode partition ${filePath}: ${
				cause instanceof Error ? cause.message : String(cause)
			}`,
			{ cause }
		);
	}
}

export class ProviderTimeoutError extends TapeArchiveError {
	constructor(
		readonly operation: string,
		readonly timeoutMs: number
	) {
		super(`${operation} did not settle within ${timeoutMs}ms`);
	}
}
