import { access, mkdir, rm } from "node:fs/promises";
import fg from "fast-glob";
import { readPartitionFile, writePartitionFile } from "./parquetCodec";
import {
	joinPartitionName,
	partitionNameParts,
	WILDCARD,
	type PartitionKey,
	type PartitionNameParts,
} from "./naming";
import type { PartitionSchema } from "./schema";

const globLiteral = (value: string): string =>
	value === WILDCARD ? value : fg.escapePath(value);

/**
 * Filesystem access for partition files under one download directory.
 */
export class PartitionStore {
	constructor(readonly downloadDir: string) {}

	async ensureDir(): Promise<void> {
		await mkdir(this.downloadDir, { recursive: true });
	}

	async exists(filePath: string): Promise<boolean> {
		try {
			await access(filePath);
			return true;
		} catch {
			return false;
		}
	}

	/**
	 * Delete a partition file.
	 * @returns false when there was nothing to delete
	 */
	async remove(filePath: string): Promise<boolean> {
		if (!(await this.exists(filePath))) {
			return false;
		}
		await rm(filePath);
		return true;
	}

	async write<R>(
		filePath: string,
		schema: PartitionSchema<R>,
		rows: readonly R[]
	): Promise<void> {
		await this.ensureDir();
		await writePartitionFile(filePath, schema, rows);
	}

	async read<R>(
		filePath: string,
		schema: PartitionSchema<R>
	): Promise<R[] | null> {
		return readPartitionFile(filePath, schema);
	}

	/**
	 * Partition files matching a key whose `periodStart` and/or `symbol` may be
	 * "*". Complete and incomplete files both match; results are sorted.
	 */
	async glob(key: PartitionKey): Promise<string[]> {
		const parts = partitionNameParts(key);
		const escaped: PartitionNameParts = {
			exchange: fg.escapePath(parts.exchange),
			subKindId: parts.subKindId ? fg.escapePath(parts.subKindId) : undefined,
			dataKind: parts.dataKind,
			date: globLiteral(parts.date),
			symbol: globLiteral(parts.symbol),
		};
		const patterns = [joinPartitionName(escaped, false)];
		// a wildcard symbol already spans the incomplete variants
		if (parts.symbol !== WILDCARD) {
			patterns.push(joinPartitionName(escaped, true));
		}
		const matches = await fg(patterns, {
			cwd: this.downloadDir,
			absolute: true,
			onlyFiles: true,
			dot: false,
		});
		return Array.from(new Set(matches)).sort();
	}
}
