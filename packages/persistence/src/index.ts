export * from "./naming";
export { PARTITION_SCHEMAS, columnNames } from "./schema";
export type { ColumnSpec, ColumnType, PartitionSchema } from "./schema";
export { writePartitionFile, readPartitionFile } from "./parquetCodec";
export { PartitionStore } from "./PartitionStore";
