import type { MetadataTables } from "../entities/metadata";
import type { DataRow, LatestPeriodRow, QuerySpec } from "../entities/query";

/**
 * Supplies the reference tables behind the metadata cache.
 */
export interface MetadataSourcePort {
  loadTables(): Promise<MetadataTables>;
}

/**
 * Executes structured queries against the financial warehouse. Failures surface as QueryExecutionError.
 */
export interface QueryExecutionPort {
  fetchRows(query: QuerySpec): Promise<DataRow[]>;
  fetchLatestPeriod(query: QuerySpec): Promise<LatestPeriodRow | null>;
  countRows(query: QuerySpec): Promise<number>;
}

export interface ClockPort {
  now(): Date;
}
