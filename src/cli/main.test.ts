import { describe, expect, it } from "vitest";
import { createSampleResolver } from "../__tests__/support/sampleResolver";
import { buildCli, formatFailure, formatResolution } from "./main";

describe("CLI formatting", () => {
  it("lists ambiguous candidates with their scores", () => {
    const output = formatFailure({
      code: "ambiguous_company",
      phrase: "United Bank",
      candidates: [
        { companyId: 1, name: "United Bank Limited", ticker: "UBL", score: 0.937 },
        { companyId: 2, name: "United Bank Holdings", ticker: "UBH", score: 0.933 },
      ],
      message: "'United Bank' matches several companies. Use a ticker or the full name.",
    });

    expect(output).toBe(
      [
        "Resolution failed (ambiguous_company): 'United Bank' matches several companies. Use a ticker or the full name.",
        "- United Bank Limited (UBL), score=0.94",
        "- United Bank Holdings (UBH), score=0.93",
      ].join("\n"),
    );
  });

  it("lists tried heads for metric_no_data", () => {
    const output = formatFailure({
      code: "metric_no_data",
      phrase: "Deposits",
      tried: [{ headId: 15, headName: "Deposits", kind: { kind: "regular" } }],
      message: "No data.",
    });

    expect(output.split("\n")).toEqual([
      "Resolution failed (metric_no_data): No data.",
      "- tried Deposits [regular #15]",
    ]);
  });

  it("prints accepted phrasing for an unresolvable period", () => {
    const output = formatFailure({
      code: "period_unresolvable",
      phrase: "soon",
      examples: ["Q2 2023", "TTM"],
      message: "Unrecognised period 'soon'.",
    });

    expect(output.split("\n")[1]).toBe("Accepted phrasing: Q2 2023, TTM");
  });

  it("prints identifiers and the bound parameters of a resolution", async () => {
    const { resolver } = await createSampleResolver();
    const result = await resolver.resolveFragments({
      companyPhrase: "UBL",
      metricPhrase: "D&A",
      periodPhrase: "2021-03-31",
    });

    const lines = formatResolution(result._unsafeUnwrap()).split("\n");

    expect(lines.slice(0, 5)).toEqual([
      "Company: United Bank Limited (UBL)",
      "Metric: Depreciation and Amortisation - Operating [regular #89]",
      "Period: 2021-03-31",
      "Consolidation: Unconsolidated",
      "Table: financial_data (1 rows)",
    ]);
    expect(lines[6]).toBe('Params: [1,89,2,"2021-03-31"]');
  });

  it("registers every command", () => {
    expect(buildCli().commands.map((command) => command.name())).toEqual([
      "resolve",
      "answer",
      "company",
      "period",
      "status",
    ]);
  });
});
