import os from "node:os";
import path from "node:path";
import { ConfigurationError } from "./errors";
import { durationFromLabel } from "./time";

export const DEFAULT_DOWNLOAD_DIR = path.join(os.homedir(), ".tapearchive");

const DEFAULT_RATE_LIMIT = 100;
const DEFAULT_RATE_PERIOD_MS = 30_000;
const DEFAULT_TIMEFRAME = "1m";

export interface RateLimitConfig {
	/** Calls admitted per period across every pipeline */
	maxRequests: number;
	periodMs: number;
}

export interface ArchiveConfig {
	downloadDir: string;
	rateLimit: RateLimitConfig;
	/** Per upstream call; undefined waits indefinitely */
	requestTimeoutMs?: number;
	defaultTimeframe: string;
}

type EnvSource = Record<string, string | undefined>;

const readOptionalEnvVar = (env: EnvSource, key: string): string | undefined => {
	const value = env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

const readPositiveNumber = (
	env: EnvSource,
	key: string
): number | undefined => {
	const raw = readOptionalEnvVar(env, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isFinite(value) || value <= 0) {
		throw new ConfigurationError(
			`Environment variable ${key} must be a positive number, got "${raw}"`
		);
	}
	return value;
};

const readPositiveInteger = (
	env: EnvSource,
	key: string
): number | undefined => {
	const raw = readOptionalEnvVar(env, key);
	if (raw === undefined) {
		return undefined;
	}
	const value = Number(raw);
	if (!Number.isSafeInteger(value) || value < 1) {
		throw new ConfigurationError(
			`Environment variable ${key} must be a positive integer, got "${raw}"`
		);
	}
	return value;
};

const expandHome = (value: string): string =>
	value === "~" || value.startsWith("~/")
		? path.join(os.homedir(), value.slice(1))
		: value;

/**
 * Resolve archive settings from the environment. Call `loadEnvFiles` first
 * when `.env` files should participate.
 */
export const loadArchiveConfig = (
	env: EnvSource = process.env
): ArchiveConfig => {
	const downloadDir = readOptionalEnvVar(env, "TAPEARCHIVE_DATA_DIR");
	const defaultTimeframe =
		readOptionalEnvVar(env, "TAPEARCHIVE_DEFAULT_TIMEFRAME") ??
		DEFAULT_TIMEFRAME;
	durationFromLabel(defaultTimeframe);

	return {
		downloadDir: downloadDir
			? path.resolve(expandHome(downloadDir))
			: DEFAULT_DOWNLOAD_DIR,
		rateLimit: {
			maxRequests:
				readPositiveInteger(env, "TAPEARCHIVE_RATE_LIMIT") ?? DEFAULT_RATE_LIMIT,
			periodMs:
				readPositiveNumber(env, "TAPEARCHIVE_RATE_PERIOD_MS") ??
				DEFAULT_RATE_PERIOD_MS,
		},
		requestTimeoutMs: readPositiveNumber(env, "TAPEARCHIVE_REQUEST_TIMEOUT_MS"),
		defaultTimeframe,
	};
};
