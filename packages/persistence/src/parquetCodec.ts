import { rename, rm } from "node:fs/promises";
import { asyncBufferFromFile, parquetReadObjects } from "hyparquet";
import { parquetWriteFile } from "hyparquet-writer";
import { PartitionDecodeError } from "@tapearchive/core";
import type { ColumnType, PartitionSchema } from "./schema";

const isErrnoException = (
	error: unknown
): error is Error & { code: string } =>
	error instanceof Error && "code" in error && typeof error.code === "string";

export const isMissingFileError = (error: unknown): boolean =>
	isErrnoException(error) && error.code === "ENOENT";

const toColumnValue = (
	type: ColumnType,
	value: unknown
): bigint | number | string | null => {
	if (value === null || value === undefined) {
		return null;
	}
	switch (type) {
		case "INT64":
			return BigInt(Math.trunc(Number(value)));
		case "DOUBLE":
			return Number(value);
		case "STRING":
			return String(value);
	}
};

/**
 * Write rows as a Parquet file. The file is written beside its destination
 * and renamed into place, so readers never observe a partial partition.
 */
export const writePartitionFile = async <R>(
	filePath: string,
	schema: PartitionSchema<R>,
	rows: readonly R[]
): Promise<void> => {
	const tmpPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;
	try {
		await parquetWriteFile({
			filename: tmpPath,
			columnData: schema.columns.map((column) => ({
				name: column.name,
				data: rows.map((row) => toColumnValue(column.type, row[column.name])),
				type: column.type,
			})),
		});
		await rename(tmpPath, filePath);
	} catch (error) {
		await rm(tmpPath, { force: true });
		throw error;
	}
};

/**
 * Read a partition file back into typed rows.
 * @returns null when the file does not exist
 * @throws PartitionDecodeError when the file exists but cannot be decoded
 */
export const readPartitionFile = async <R>(
	filePath: string,
	schema: PartitionSchema<R>
): Promise<R[] | null> => {
	let records: Record<string, unknown>[];
	try {
		const file = await asyncBufferFromFile(filePath);
		records = await parquetReadObjects({ file });
	} catch (error) {
		if (isMissingFileError(error)) {
			return null;
		}
		if (isErrnoException(error)) {
			throw error;
		}
		throw new PartitionDecodeError(filePath, error);
	}

	const rows: R[] = [];
	for (const [idx, record] of records.entries()) {
		const row = schema.decode(record);
		if (!row) {
			throw new PartitionDecodeError(
				filePath,
				new Error(`row ${idx} does not match the ${schema.kind} layout`)
			);
		}
		rows.push(row);
	}
	return rows;
};
