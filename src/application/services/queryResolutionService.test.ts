import { describe, expect, it } from "vitest";
import { createSampleResolver } from "../../__tests__/support/sampleResolver";

describe("QueryResolutionService", () => {
  it("reports every missing fragment", async () => {
    const { resolver } = await createSampleResolver();

    const result = await resolver.resolveQuery("hello there");

    expect(result._unsafeUnwrapErr()).toEqual({
      code: "missing_fragment",
      fragments: ["company", "metric"],
      message: "Could not find the company and metric in the question.",
    });
  });

  it("carries low-confidence extraction forward as warnings", async () => {
    const { resolver } = await createSampleResolver({ confidenceThreshold: 0.9 });

    const result = await resolver.resolveQuery(
      "What was UBL's D&A as of 31-03-2021 (unconsolidated)?",
    );

    expect(result._unsafeUnwrap().warnings).toEqual([
      "Low confidence in the extracted metric.",
    ]);
  });

  it("defaults to the newest period and the default consolidation", async () => {
    const { resolver } = await createSampleResolver();

    const result = await resolver.resolveFragments({
      companyPhrase: "UBL",
      metricPhrase: "Total Assets",
    });

    const resolved = result._unsafeUnwrap();
    expect(resolved.spec.period).toEqual({ type: "period_end", periodEnd: "2024-03-31" });
    expect(resolved.identifiers.periodLabel).toBe("3M ending 2024-03-31");
    expect(resolved.identifiers.consolidationLabel).toBe("Unconsolidated");
  });

  it("maps standalone to unconsolidated and honours consolidated", async () => {
    const { resolver } = await createSampleResolver();

    const standalone = await resolver.resolveFragments({
      companyPhrase: "UBL",
      metricPhrase: "Total Assets",
      periodPhrase: "2023-12-31",
      consolidationPhrase: "standalone",
    });
    const consolidated = await resolver.resolveFragments({
      companyPhrase: "UBL",
      metricPhrase: "Total Assets",
      periodPhrase: "2023-12-31",
      consolidationPhrase: "Consolidated",
    });

    expect(standalone._unsafeUnwrap().spec.consolidationId).toBe(2);
    expect(consolidated._unsafeUnwrap().spec.consolidationId).toBe(1);
  });

  it("falls back to the default consolidation with a warning", async () => {
    const { resolver } = await createSampleResolver();

    const result = await resolver.resolveFragments({
      companyPhrase: "UBL",
      metricPhrase: "Total Assets",
      periodPhrase: "2023-12-31",
      consolidationPhrase: "bogus",
    });

    const resolved = result._unsafeUnwrap();
    expect(resolved.spec.consolidationId).toBe(2);
    expect(resolved.warnings).toEqual(["Unknown consolidation 'bogus', using Unconsolidated."]);
  });

  it("stops at an unresolvable period before touching metrics", async () => {
    let counts = 0;
    const { resolver } = await createSampleResolver({
      wrapExecutor: (warehouse) => ({
        fetchRows: (query) => warehouse.fetchRows(query),
        fetchLatestPeriod: (query) => warehouse.fetchLatestPeriod(query),
        countRows: (query) => {
          counts += 1;
          return warehouse.countRows(query);
        },
      }),
    });

    const result = await resolver.resolveFragments({
      companyPhrase: "UBL",
      metricPhrase: "Total Assets",
      periodPhrase: "next century",
    });

    expect(result._unsafeUnwrapErr().code).toBe("period_unresolvable");
    expect(counts).toBe(0);
  });

  it("reports metric_no_data with every head it tried", async () => {
    const { resolver } = await createSampleResolver();

    const result = await resolver.resolveFragments({
      companyPhrase: "UBL",
      metricPhrase: "Deposits",
      periodPhrase: "Q2 2023",
    });

    const failure = result._unsafeUnwrapErr();
    expect(failure.code).toBe("metric_no_data");
    if (failure.code !== "metric_no_data") {
      return;
    }
    expect(failure.tried).toEqual([
      { headId: 15, headName: "Deposits", kind: { kind: "regular" } },
      { headId: 4, headName: "Advances to Deposits Ratio", kind: { kind: "ratio" } },
    ]);
  });

  it("returns a timeout with the candidates tried so far", async () => {
    const { resolver } = await createSampleResolver({
      timeoutMs: 20,
      wrapExecutor: (warehouse) => ({
        fetchRows: (query) => warehouse.fetchRows(query),
        fetchLatestPeriod: (query) => warehouse.fetchLatestPeriod(query),
        countRows: () => new Promise<number>(() => undefined),
      }),
    });

    const result = await resolver.resolveFragments({
      companyPhrase: "UBL",
      metricPhrase: "Total Assets",
      periodPhrase: "2023-12-31",
    });

    expect(result._unsafeUnwrapErr()).toEqual({
      code: "timeout",
      stage: "metric",
      tried: [{ headId: 10, headName: "Total Assets", kind: { kind: "regular" } }],
      message: "Metric validation ran out of time.",
    });
  });

  it("answers with the rows of the resolved query", async () => {
    const { resolver } = await createSampleResolver();

    const result = await resolver.answer(
      "What was UBL's D&A as of 31-03-2021 (unconsolidated)?",
    );

    expect(result._unsafeUnwrap().rows).toEqual([
      {
        value: 1520.5,
        unit: "Rupees in thousand",
        term: "3M",
        company: "United Bank Limited",
        metric: "Depreciation and Amortisation - Operating",
        consolidation: "Unconsolidated",
        periodEnd: "2021-03-31",
        fiscalYear: 2021,
      },
    ]);
  });
});
