import type { HeadFamily } from "./metric";

export const DATA_TABLES = [
  "financial_data",
  "financial_data_quarter",
  "financial_data_ttm",
  "ratio_data",
  "dissection_data",
  "dissection_data_quarter",
  "dissection_data_ttm",
  "dissection_data_ratio",
] as const;

export type DataTable = (typeof DATA_TABLES)[number];

export type LookupTable =
  | "companies"
  | "regular_heads"
  | "ratio_heads"
  | "units"
  | "terms"
  | "consolidation_types"
  | "dissection_groups";

export type TableAlias = "f" | "c" | "h" | "u" | "t" | "con" | "dg";

/**
 * Closed column vocabulary; lowering quotes these, never caller text.
 */
export type ColumnName =
  | "id"
  | "name"
  | "label"
  | "unit_id"
  | "company_id"
  | "head_id"
  | "term_id"
  | "consolidation_id"
  | "dissection_group_id"
  | "period_end"
  | "fiscal_year"
  | "value";

export type ColumnRef = {
  alias: TableAlias;
  column: ColumnName;
};

export type Projection =
  | { type: "column"; ref: ColumnRef; as: string }
  | { type: "count"; as: string };

export type Join = {
  type: "inner" | "left";
  table: LookupTable;
  alias: TableAlias;
  on: { left: ColumnRef; right: ColumnRef };
};

export type QueryParamValue = string | number;

export type Predicate = {
  ref: ColumnRef;
  op: "=";
  param: string;
};

/**
 * Structured retrieval query. Filter values live only in `params` and are bound at execution.
 */
export type QuerySpec = {
  mode: "rows" | "count";
  table: DataTable;
  alias: "f";
  projection: Projection[];
  joins: Join[];
  predicates: Predicate[];
  params: Record<string, QueryParamValue>;
  orderBy?: { ref: ColumnRef; direction: "asc" | "desc" };
  limit?: number;
};

export type ParameterizedQuery = {
  text: string;
  values: QueryParamValue[];
};

/**
 * Scope of a data lookup: who, which head, which consolidation and which table.
 */
export type DataTarget = {
  companyId: number;
  headId: number;
  headFamily: HeadFamily;
  consolidationId: number;
  table: DataTable;
  dissectionGroupId?: number;
  /** Extra term restriction for latest-period lookups, such as TTM rows in ratio_data. */
  termId?: number;
};

export type DataRow = {
  value: number | null;
  unit: string | null;
  term: string;
  company: string;
  metric: string;
  consolidation: string;
  periodEnd: string;
  fiscalYear: number | null;
  dissectionGroup?: string;
};

export type LatestPeriodRow = {
  periodEnd: string;
  termId: number;
  fiscalYear: number | null;
};
