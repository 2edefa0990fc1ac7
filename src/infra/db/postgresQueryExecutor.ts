import { z } from "zod";
import { QueryExecutionError } from "../../core/entities/appError";
import type {
  DataRow,
  LatestPeriodRow,
  QueryParamValue,
  QuerySpec,
} from "../../core/entities/query";
import type { QueryExecutionPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  countRowSchema,
  dataRowSchema,
  latestPeriodRowSchema,
} from "../warehouse/rowSchemas";
import { lowerQuery } from "./sqlLowering";

/** The part of the postgres.js client the executor runs queries through. */
export type UnsafeSqlClient = {
  unsafe(query: string, parameters: QueryParamValue[]): Promise<Iterable<unknown>>;
};

/**
 * Executes lowered warehouse queries over the raw postgres.js client.
 */
export class PostgresQueryExecutor implements QueryExecutionPort {
  constructor(private readonly sql: UnsafeSqlClient) {}

  async fetchRows(query: QuerySpec): Promise<DataRow[]> {
    const rows = await this.execute(query);
    return this.parse(z.array(dataRowSchema), rows, query);
  }

  async fetchLatestPeriod(query: QuerySpec): Promise<LatestPeriodRow | null> {
    const rows = await this.execute({ ...query, limit: 1 });
    const [first] = this.parse(z.array(latestPeriodRowSchema), rows, query);
    return first ?? null;
  }

  async countRows(query: QuerySpec): Promise<number> {
    const rows = await this.execute(query);
    const [first] = this.parse(z.array(countRowSchema), rows, query);
    return first?.count ?? 0;
  }

  private async execute(query: QuerySpec): Promise<unknown[]> {
    const lowered = lowerQuery(query);
    logger.debug({ table: query.table, mode: query.mode, sql: lowered.text }, "Executing warehouse query");
    try {
      const rows = await this.sql.unsafe(lowered.text, lowered.values);
      return Array.from(rows);
    } catch (error) {
      throw new QueryExecutionError(`Warehouse query on ${query.table} failed.`, error);
    }
  }

  private parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown[], query: QuerySpec): T {
    const parsed = schema.safeParse(rows);
    if (!parsed.success) {
      throw new QueryExecutionError(
        `Unexpected row shape from ${query.table}: ${parsed.error.message}`,
        parsed.error,
      );
    }
    return parsed.data;
  }
}
