export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogEntry {
	ts: string;
	level: LogLevel;
	event: string;
	module: string;
	[key: string]: unknown;
}

export interface LogSettings {
	minLevel: LogLevel;
	/** Only these modules log when set */
	modules: ReadonlySet<string> | null;
	pretty: boolean;
	json: boolean;
}

export interface ModuleLogger {
	debug: (event: string, data?: Record<string, unknown>) => void;
	info: (event: string, data?: Record<string, unknown>) => void;
	warn: (event: string, data?: Record<string, unknown>) => void;
	error: (event: string, data?: Record<string, unknown>) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_RANK;

/**
 * Read `LOG_LEVEL`, `LOG_MODULE` (comma separated), `LOG_PRETTY` and
 * `LOG_JSON`. Pretty output is on in development; JSON lines are on
 * whenever pretty output is off.
 */
export const readLogSettings = (
	env: Record<string, string | undefined> = process.env
): LogSettings => {
	const level = env.LOG_LEVEL?.trim().toLowerCase() ?? "";
	const modules = (env.LOG_MODULE ?? "")
		.split(",")
		.map((name) => name.trim())
		.filter(Boolean);
	const pretty = env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: isLogLevel(level) ? level : "info",
		modules: modules.length ? new Set(modules) : null,
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
	};
};

const processSettings = readLogSettings();

/**
 * Copy of a payload that JSON.stringify accepts: bigint as a string, errors
 * as name/message/stack, dates as ISO strings, cycles cut.
 */
export const toJsonSafe = (
	value: unknown,
	ancestors: WeakSet<object> = new WeakSet()
): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (value === null || typeof value !== "object") {
		return value;
	}
	if (ancestors.has(value)) {
		return "[circular]";
	}

	ancestors.add(value);
	const copy = Array.isArray(value)
		? value.map((item) => toJsonSafe(item, ancestors))
		: Object.fromEntries(
				Object.entries(value).map(([key, nested]) => [
					key,
					toJsonSafe(nested, ancestors),
				])
			);
	ancestors.delete(value);
	return copy;
};

const printJson = (entry: LogEntry): void => {
	try {
		console.log(JSON.stringify(toJsonSafe(entry)));
	} catch (err) {
		console.log(
			JSON.stringify({
				ts: entry.ts,
				level: "error",
				event: "logging_error",
				module: "logger",
				error: err instanceof Error ? err.message : "serialization_failed",
			})
		);
	}
};

const formatPrettyValue = (value: unknown): string => {
	if (value === undefined || value === null) {
		return "-";
	}
	return typeof value === "string" ? value : JSON.stringify(toJsonSafe(value));
};

const printPretty = (entry: LogEntry): void => {
	const { ts, level, event, module, ...rest } = entry;
	const head = `[${ts}] [${level.toUpperCase()}] ${module}:${event}`;

	// fetch reports read better as one row per pipeline
	if (event === "fetch_report" && Array.isArray(rest.pipelines)) {
		console.log(head);
		console.table(rest.pipelines);
		return;
	}

	const details = Object.entries(rest)
		.map(([key, value]) => `${key}=${formatPrettyValue(value)}`)
		.join(" ");
	console.log(details ? `${head} ${details}` : head);
};

export const createLogger = (
	moduleName: string,
	settings: LogSettings = processSettings
): ModuleLogger => {
	const enabled = (level: LogLevel): boolean =>
		LEVEL_RANK[level] >= LEVEL_RANK[settings.minLevel] &&
		(settings.modules === null || settings.modules.has(moduleName));

	const emitter =
		(level: LogLevel) =>
		(event: string, data: Record<string, unknown> = {}): void => {
			if (!enabled(level)) {
				return;
			}
			const entry: LogEntry = {
				ts: new Date().toISOString(),
				level,
				event,
				module: moduleName,
				...data,
			};
			if (settings.pretty) {
				printPretty(entry);
			}
			if (settings.json) {
				printJson(entry);
			}
		};

	return {
		debug: emitter("debug"),
		info: emitter("info"),
		warn: emitter("warn"),
		error: emitter("error"),
	};
};
