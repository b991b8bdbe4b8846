import { ConfigurationError } from "@tapearchive/core";

export type ArgValue = string | boolean;

export interface ParsedCli {
	command?: string;
	args: Record<string, ArgValue>;
}

/**
 * Split argv into a leading command and `--key value` / `--key=value`
 * options. A key without a value is a boolean flag.
 */
export const parseCliArgs = (argv: string[]): ParsedCli => {
	const args: Record<string, ArgValue> = {};
	const positionals: string[] = [];
	for (let i = 0; i < argv.length; i++) {
		const token = argv[i];
		if (!token.startsWith("--")) {
			positionals.push(token);
			continue;
		}
		const eqIdx = token.indexOf("=");
		if (eqIdx !== -1) {
			const key = token.slice(2, eqIdx);
			const value = token.slice(eqIdx + 1);
			args[key] = value;
			continue;
		}
		const key = token.slice(2);
		const next = argv[i + 1];
		if (next && !next.startsWith("--")) {
			args[key] = next;
			i += 1;
		} else {
			args[key] = true;
		}
	}
	return { command: positionals[0], args };
};

export const readString = (
	args: Record<string, ArgValue>,
	key: string
): string | undefined => {
	const value = args[key];
	return typeof value === "string" && value.length ? value : undefined;
};

export const requireString = (
	args: Record<string, ArgValue>,
	key: string
): string => {
	const value = readString(args, key);
	if (value === undefined) {
		throw new ConfigurationError(`Missing required --${key} <value>`);
	}
	return value;
};

/** Comma separated values; empty entries are dropped. */
export const readList = (
	args: Record<string, ArgValue>,
	key: string
): string[] | undefined => {
	const value = readString(args, key);
	if (value === undefined) {
		return undefined;
	}
	const entries = value
		.split(",")
		.map((entry) => entry.trim())
		.filter((entry) => entry.length > 0);
	return entries.length ? entries : undefined;
};

export const readNumber = (
	args: Record<string, ArgValue>,
	key: string
): number | undefined => {
	const value = readString(args, key);
	if (value === undefined) {
		return undefined;
	}
	const num = Number(value);
	if (!Number.isFinite(num)) {
		throw new ConfigurationError(`Invalid numeric value for --${key}: ${value}`);
	}
	return num;
};

export const readFlag = (args: Record<string, ArgValue>, key: string): boolean =>
	args[key] === true || args[key] === "true";
