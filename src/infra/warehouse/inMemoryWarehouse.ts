import { z } from "zod";
import { QueryExecutionError } from "../../core/entities/appError";
import {
  DATA_TABLES,
  type ColumnName,
  type ColumnRef,
  type DataRow,
  type DataTable,
  type LatestPeriodRow,
  type LookupTable,
  type QuerySpec,
  type TableAlias,
} from "../../core/entities/query";
import type { QueryExecutionPort } from "../../core/ports/outboundPorts";
import { readWarehouseFile, type FactRow, type WarehouseFile } from "../files/warehouseFile";
import { countRowSchema, dataRowSchema, latestPeriodRowSchema } from "./rowSchemas";

type ColumnValue = string | number | null;
type RowRecord = Partial<Record<ColumnName, ColumnValue>>;
type JoinedRow = Partial<Record<TableAlias, RowRecord>>;

const factRecord = (row: FactRow): RowRecord => ({
  company_id: row.companyId,
  head_id: row.headId,
  period_end: row.periodEnd,
  term_id: row.termId,
  fiscal_year: row.fiscalYear,
  consolidation_id: row.consolidationId,
  value: row.value,
  dissection_group_id: row.dissectionGroupId ?? null,
});

const lookupRecords = (file: WarehouseFile): Record<LookupTable, RowRecord[]> => ({
  companies: file.companies.map((company) => ({ id: company.id, name: company.name })),
  regular_heads: file.regularHeads.map((head) => ({
    id: head.id,
    name: head.name,
    unit_id: head.unitId,
  })),
  ratio_heads: file.ratioHeads.map((head) => ({
    id: head.id,
    name: head.name,
    unit_id: head.unitId,
  })),
  units: file.units.map((unit) => ({ id: unit.id, name: unit.name })),
  terms: file.terms.map((term) => ({ id: term.id, label: term.label })),
  consolidation_types: file.consolidationTypes.map((item) => ({
    id: item.id,
    label: item.label,
  })),
  dissection_groups: file.dissectionGroups.map((group) => ({
    id: group.id,
    name: group.name,
  })),
});

const read = (row: JoinedRow, ref: ColumnRef): ColumnValue =>
  row[ref.alias]?.[ref.column] ?? null;

const compare = (left: ColumnValue, right: ColumnValue): number => {
  if (left === right) {
    return 0;
  }
  if (left === null) {
    return -1;
  }
  if (right === null) {
    return 1;
  }
  return left < right ? -1 : 1;
};

/**
 * Evaluates structured queries over fact rows held in memory. Used for local runs and tests.
 */
export class InMemoryWarehouse implements QueryExecutionPort {
  private readonly facts: Map<DataTable, RowRecord[]>;
  private readonly lookups: Record<LookupTable, RowRecord[]>;

  constructor(file: WarehouseFile) {
    this.facts = new Map(
      DATA_TABLES.map((table): [DataTable, RowRecord[]] => [
        table,
        (file.data[table] ?? []).map(factRecord),
      ]),
    );
    this.lookups = lookupRecords(file);
  }

  static async fromFile(path: string): Promise<InMemoryWarehouse> {
    const file = await readWarehouseFile(path);
    if (file.isErr()) {
      throw new QueryExecutionError(file.error.message, file.error.cause);
    }
    return new InMemoryWarehouse(file.value);
  }

  async fetchRows(query: QuerySpec): Promise<DataRow[]> {
    return this.parse(z.array(dataRowSchema), this.evaluate(query), query);
  }

  async fetchLatestPeriod(query: QuerySpec): Promise<LatestPeriodRow | null> {
    const [first] = this.parse(
      z.array(latestPeriodRowSchema),
      this.evaluate({ ...query, limit: 1 }),
      query,
    );
    return first ?? null;
  }

  async countRows(query: QuerySpec): Promise<number> {
    const [first] = this.parse(z.array(countRowSchema), this.evaluate(query), query);
    return first?.count ?? 0;
  }

  private parse<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    rows: unknown[],
    query: QuerySpec,
  ): T {
    const parsed = schema.safeParse(rows);
    if (!parsed.success) {
      throw new QueryExecutionError(
        `Unexpected row shape from ${query.table}: ${parsed.error.message}`,
        parsed.error,
      );
    }
    return parsed.data;
  }

  private evaluate(query: QuerySpec): Array<Record<string, ColumnValue>> {
    let rows: JoinedRow[] = (this.facts.get(query.table) ?? []).map((record) => ({
      f: record,
    }));

    for (const join of query.joins) {
      const [own, other] =
        join.on.left.alias === join.alias
          ? [join.on.left, join.on.right]
          : [join.on.right, join.on.left];
      rows = rows.flatMap((row) => {
        const key = read(row, other);
        const match = this.lookups[join.table].find(
          (record) => key !== null && record[own.column] === key,
        );
        if (!match) {
          return join.type === "left" ? [row] : [];
        }
        const joined: JoinedRow = { ...row };
        joined[join.alias] = match;
        return [joined];
      });
    }

    rows = rows.filter((row) =>
      query.predicates.every(
        (predicate) => read(row, predicate.ref) === query.params[predicate.param],
      ),
    );

    const { orderBy } = query;
    if (orderBy) {
      const direction = orderBy.direction === "desc" ? -1 : 1;
      rows = [...rows].sort(
        (left, right) => direction * compare(read(left, orderBy.ref), read(right, orderBy.ref)),
      );
    }
    if (query.limit !== undefined) {
      rows = rows.slice(0, query.limit);
    }

    if (query.mode === "count") {
      return [{ count: rows.length }];
    }

    return rows.map((row) =>
      Object.fromEntries(
        query.projection.map((item): [string, ColumnValue] =>
          item.type === "count"
            ? [item.as, rows.length]
            : [item.as, read(row, item.ref)],
        ),
      ),
    );
  }
}
