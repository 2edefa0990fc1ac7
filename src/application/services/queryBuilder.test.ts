import { describe, expect, it } from "vitest";
import type { ResolvedQuerySpec } from "../../core/entities/resolution";
import { QueryBuilder, selectTable, tableFamilyOf } from "./queryBuilder";

const builder = new QueryBuilder();

const paramNames = (query: { predicates: Array<{ param: string }> }): string[] =>
  query.predicates.map((predicate) => predicate.param);

describe("selectTable", () => {
  it("routes regular heads by period family", () => {
    expect(selectTable({ kind: "regular" }, "regular")).toBe("financial_data");
    expect(selectTable({ kind: "regular" }, "quarterly")).toBe("financial_data_quarter");
    expect(selectTable({ kind: "regular" }, "ttm")).toBe("financial_data_ttm");
  });

  it("keeps ratio heads in ratio_data for every family", () => {
    expect(selectTable({ kind: "ratio" }, "ttm")).toBe("ratio_data");
    expect(selectTable({ kind: "ratio" }, "quarterly")).toBe("ratio_data");
  });

  it("routes dissections by family and group", () => {
    const dissection = (dissectionGroupId: number) =>
      ({ kind: "dissection", dissectionGroupId, baseFamily: "regular" }) as const;

    expect(selectTable(dissection(1), "regular")).toBe("dissection_data");
    expect(selectTable(dissection(1), "ttm")).toBe("dissection_data_ttm");
    expect(selectTable(dissection(1), "quarterly")).toBe("dissection_data_quarter");
    expect(selectTable(dissection(5), "regular")).toBe("dissection_data_quarter");
    expect(selectTable(dissection(2), "regular")).toBe("dissection_data_ratio");
    expect(selectTable(dissection(1), "ratio")).toBe("dissection_data_ratio");
  });

  it("maps tables back to their family", () => {
    expect(tableFamilyOf("dissection_data_quarter")).toBe("quarterly");
    expect(tableFamilyOf("ratio_data")).toBe("ratio");
  });
});

describe("QueryBuilder", () => {
  const ratioSpec: ResolvedQuerySpec = {
    companyId: 1,
    headId: 1,
    metricKind: { kind: "ratio" },
    period: { type: "term_year", termId: 9, fiscalYear: 2024 },
    tableFamily: "ttm",
    consolidationId: 2,
  };

  it("builds a parameterized retrieval for a ratio head", () => {
    const query = builder.buildRetrieval(ratioSpec);

    expect(query.table).toBe("ratio_data");
    expect(query.mode).toBe("rows");
    expect(query.joins.map((join) => `${join.type}:${join.table}`)).toEqual([
      "inner:companies",
      "inner:ratio_heads",
      "left:units",
      "inner:terms",
      "inner:consolidation_types",
    ]);
    expect(paramNames(query)).toEqual([
      "companyId",
      "headId",
      "consolidationId",
      "termId",
      "fiscalYear",
    ]);
    expect(query.params).toEqual({
      companyId: 1,
      headId: 1,
      consolidationId: 2,
      termId: 9,
      fiscalYear: 2024,
    });
    expect(query.orderBy).toEqual({
      ref: { alias: "f", column: "period_end" },
      direction: "desc",
    });
  });

  it("adds the dissection group join and filter", () => {
    const query = builder.buildRetrieval({
      companyId: 1,
      headId: 12,
      metricKind: { kind: "dissection", dissectionGroupId: 1, baseFamily: "regular" },
      period: { type: "period_end", periodEnd: "2023-12-31" },
      tableFamily: "regular",
      consolidationId: 2,
    });

    expect(query.table).toBe("dissection_data");
    expect(query.joins.at(-1)?.table).toBe("dissection_groups");
    expect(query.projection.map((item) => item.as)).toContain("dissection_group");
    expect(paramNames(query)).toEqual([
      "companyId",
      "headId",
      "consolidationId",
      "periodEnd",
      "dissectionGroupId",
    ]);
    expect(query.params.dissectionGroupId).toBe(1);
  });

  it("builds the same query for the same spec", () => {
    expect(builder.buildRetrieval(ratioSpec)).toEqual(builder.buildRetrieval(ratioSpec));
  });

  it("builds a count query for existence checks", () => {
    const query = builder.buildExistenceCheck(
      {
        companyId: 1,
        headId: 89,
        headFamily: "regular",
        consolidationId: 2,
        table: "financial_data",
      },
      { type: "period_end", periodEnd: "2021-03-31" },
    );

    expect(query.mode).toBe("count");
    expect(query.projection).toEqual([{ type: "count", as: "count" }]);
    expect(query.joins).toEqual([]);
    expect(query.params).toEqual({
      companyId: 1,
      headId: 89,
      consolidationId: 2,
      periodEnd: "2021-03-31",
    });
  });

  it("pins latest-period lookups to a term and fiscal year after the base filters", () => {
    const query = builder.buildLatestPeriod(
      {
        companyId: 1,
        headId: 12,
        headFamily: "regular",
        consolidationId: 2,
        table: "dissection_data_ttm",
        dissectionGroupId: 1,
        termId: 9,
      },
      { fiscalYear: 2024 },
    );

    expect(paramNames(query)).toEqual([
      "companyId",
      "headId",
      "consolidationId",
      "dissectionGroupId",
      "termId",
      "fiscalYear",
    ]);
    expect(query.limit).toBe(1);
    expect(query.projection.map((item) => item.as)).toEqual([
      "period_end",
      "term_id",
      "fiscal_year",
    ]);
  });
});
