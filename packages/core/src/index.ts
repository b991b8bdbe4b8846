/**
 * Core package centralizes shared contracts, time windowing and configuration
 * helpers. Everything else in the monorepo should depend on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./time";
export * from "./exchange";
export { loadArchiveConfig, DEFAULT_DOWNLOAD_DIR } from "./config";
export type { ArchiveConfig, RateLimitConfig } from "./config";
export { loadEnvFiles } from "./env";
export { createLogger, readLogSettings } from "./utils/logger";
export type {
	LogEntry,
	LogLevel,
	LogSettings,
	ModuleLogger,
} from "./utils/logger";
