import {
  DISSECTION_GROUP_IDS,
  type HeadFamily,
  type MetricKind,
} from "../../core/entities/metric";
import type { ResolvedPeriod, TableFamily } from "../../core/entities/period";
import type {
  ColumnName,
  ColumnRef,
  DataTable,
  DataTarget,
  Join,
  Predicate,
  Projection,
  QueryParamValue,
  QuerySpec,
} from "../../core/entities/query";
import type { ResolvedQuerySpec } from "../../core/entities/resolution";

const FACT_TABLES: Record<Exclude<TableFamily, "ratio">, DataTable> = {
  regular: "financial_data",
  quarterly: "financial_data_quarter",
  ttm: "financial_data_ttm",
};

const TABLE_FAMILIES: Record<DataTable, TableFamily> = {
  financial_data: "regular",
  financial_data_quarter: "quarterly",
  financial_data_ttm: "ttm",
  ratio_data: "ratio",
  dissection_data: "regular",
  dissection_data_quarter: "quarterly",
  dissection_data_ttm: "ttm",
  dissection_data_ratio: "ratio",
};

const dissectionTable = (groupId: number, family: TableFamily): DataTable => {
  if (family === "ttm") {
    return "dissection_data_ttm";
  }
  if (family === "quarterly" || groupId === DISSECTION_GROUP_IDS.quarterlyGrowth) {
    return "dissection_data_quarter";
  }
  if (family === "ratio" || groupId !== DISSECTION_GROUP_IDS.perShare) {
    return "dissection_data_ratio";
  }
  return "dissection_data";
};

/**
 * Maps a metric kind and the period's table family onto the warehouse table that holds its values.
 */
export const selectTable = (kind: MetricKind, family: TableFamily): DataTable => {
  switch (kind.kind) {
    case "ratio":
      return "ratio_data";
    case "dissection":
      return dissectionTable(kind.dissectionGroupId, family);
    case "regular":
      return family === "ratio" ? FACT_TABLES.regular : FACT_TABLES[family];
  }
};

export const tableFamilyOf = (table: DataTable): TableFamily => TABLE_FAMILIES[table];

export const headFamilyOf = (kind: MetricKind): HeadFamily =>
  kind.kind === "dissection" ? kind.baseFamily : kind.kind;

const fact = (column: ColumnName): ColumnRef => ({ alias: "f", column });

export type LatestPeriodFilter = {
  fiscalYear?: number;
};

/**
 * Composes structured warehouse queries; values only ever travel as named params.
 */
export class QueryBuilder {
  /**
   * Full retrieval for a validated spec, newest period first.
   */
  buildRetrieval(spec: ResolvedQuerySpec): QuerySpec {
    const table = selectTable(spec.metricKind, spec.tableFamily);
    const headFamily = headFamilyOf(spec.metricKind);
    const target: DataTarget = {
      companyId: spec.companyId,
      headId: spec.headId,
      headFamily,
      consolidationId: spec.consolidationId,
      table,
      dissectionGroupId:
        spec.metricKind.kind === "dissection"
          ? spec.metricKind.dissectionGroupId
          : undefined,
    };

    const projection: Projection[] = [
      { type: "column", ref: fact("value"), as: "value" },
      { type: "column", ref: { alias: "u", column: "name" }, as: "unit" },
      { type: "column", ref: { alias: "t", column: "label" }, as: "term" },
      { type: "column", ref: { alias: "c", column: "name" }, as: "company" },
      { type: "column", ref: { alias: "h", column: "name" }, as: "metric" },
      { type: "column", ref: { alias: "con", column: "label" }, as: "consolidation" },
      { type: "column", ref: fact("period_end"), as: "period_end" },
      { type: "column", ref: fact("fiscal_year"), as: "fiscal_year" },
    ];

    const joins: Join[] = [
      {
        type: "inner",
        table: "companies",
        alias: "c",
        on: { left: { alias: "c", column: "id" }, right: fact("company_id") },
      },
      {
        type: "inner",
        table: headFamily === "ratio" ? "ratio_heads" : "regular_heads",
        alias: "h",
        on: { left: { alias: "h", column: "id" }, right: fact("head_id") },
      },
      {
        type: "left",
        table: "units",
        alias: "u",
        on: {
          left: { alias: "u", column: "id" },
          right: { alias: "h", column: "unit_id" },
        },
      },
      {
        type: "inner",
        table: "terms",
        alias: "t",
        on: { left: { alias: "t", column: "id" }, right: fact("term_id") },
      },
      {
        type: "inner",
        table: "consolidation_types",
        alias: "con",
        on: {
          left: { alias: "con", column: "id" },
          right: fact("consolidation_id"),
        },
      },
    ];

    if (target.dissectionGroupId !== undefined) {
      projection.push({
        type: "column",
        ref: { alias: "dg", column: "name" },
        as: "dissection_group",
      });
      joins.push({
        type: "inner",
        table: "dissection_groups",
        alias: "dg",
        on: {
          left: { alias: "dg", column: "id" },
          right: fact("dissection_group_id"),
        },
      });
    }

    const { predicates, params } = this.filters(target, spec.period);

    return {
      mode: "rows",
      table,
      alias: "f",
      projection,
      joins,
      predicates,
      params,
      orderBy: { ref: fact("period_end"), direction: "desc" },
    };
  }

  /**
   * Count of rows for a target and resolved period.
   */
  buildExistenceCheck(target: DataTarget, period: ResolvedPeriod): QuerySpec {
    const { predicates, params } = this.filters(target, period);
    return {
      mode: "count",
      table: target.table,
      alias: "f",
      projection: [{ type: "count", as: "count" }],
      joins: [],
      predicates,
      params,
    };
  }

  /**
   * Newest row for a target, optionally pinned to one fiscal year.
   */
  buildLatestPeriod(target: DataTarget, filter: LatestPeriodFilter = {}): QuerySpec {
    const { predicates, params } = this.filters(target, null);
    if (target.termId !== undefined) {
      predicates.push({ ref: fact("term_id"), op: "=", param: "termId" });
      params.termId = target.termId;
    }
    if (filter.fiscalYear !== undefined) {
      predicates.push({ ref: fact("fiscal_year"), op: "=", param: "fiscalYear" });
      params.fiscalYear = filter.fiscalYear;
    }

    return {
      mode: "rows",
      table: target.table,
      alias: "f",
      projection: [
        { type: "column", ref: fact("period_end"), as: "period_end" },
        { type: "column", ref: fact("term_id"), as: "term_id" },
        { type: "column", ref: fact("fiscal_year"), as: "fiscal_year" },
      ],
      joins: [],
      predicates,
      params,
      orderBy: { ref: fact("period_end"), direction: "desc" },
      limit: 1,
    };
  }

  private filters(
    target: DataTarget,
    period: ResolvedPeriod | null,
  ): { predicates: Predicate[]; params: Record<string, QueryParamValue> } {
    const predicates: Predicate[] = [
      { ref: fact("company_id"), op: "=", param: "companyId" },
      { ref: fact("head_id"), op: "=", param: "headId" },
      { ref: fact("consolidation_id"), op: "=", param: "consolidationId" },
    ];
    const params: Record<string, QueryParamValue> = {
      companyId: target.companyId,
      headId: target.headId,
      consolidationId: target.consolidationId,
    };

    if (period?.type === "period_end") {
      predicates.push({ ref: fact("period_end"), op: "=", param: "periodEnd" });
      params.periodEnd = period.periodEnd;
    } else if (period?.type === "term_year") {
      predicates.push(
        { ref: fact("term_id"), op: "=", param: "termId" },
        { ref: fact("fiscal_year"), op: "=", param: "fiscalYear" },
      );
      params.termId = period.termId;
      params.fiscalYear = period.fiscalYear;
    }

    if (target.dissectionGroupId !== undefined) {
      predicates.push({
        ref: fact("dissection_group_id"),
        op: "=",
        param: "dissectionGroupId",
      });
      params.dissectionGroupId = target.dissectionGroupId;
    }

    return { predicates, params };
  }
}
