import { describe, expect, it } from "vitest";
import type { QueryExecutionPort } from "../../core/ports/outboundPorts";
import { InMemoryWarehouse } from "../../infra/warehouse/inMemoryWarehouse";
import {
  fixedClock,
  loadSampleWarehouse,
  sampleSnapshot,
} from "../../__tests__/support/sampleWarehouse";
import { CompanyResolver } from "./companyResolver";
import { Deadline } from "./deadline";
import { HeadValidator, type PeriodInput } from "./headValidator";
import { PeriodResolver } from "./periodResolver";
import { QueryBuilder } from "./queryBuilder";

const clock = fixedClock("2024-05-15T00:00:00.000Z");

const setup = async (suggestionLimit = 5) => {
  const snapshot = await sampleSnapshot();
  const warehouse = new InMemoryWarehouse(await loadSampleWarehouse());
  const countedHeads: number[] = [];
  const executor: QueryExecutionPort = {
    fetchRows: (query) => warehouse.fetchRows(query),
    fetchLatestPeriod: (query) => warehouse.fetchLatestPeriod(query),
    countRows: (query) => {
      const headId = query.params.headId;
      if (typeof headId === "number") {
        countedHeads.push(headId);
      }
      return warehouse.countRows(query);
    },
  };
  const queryBuilder = new QueryBuilder();
  const validator = new HeadValidator(
    executor,
    queryBuilder,
    new PeriodResolver(clock, executor, queryBuilder),
    suggestionLimit,
  );
  const companies = new CompanyResolver({ matchThreshold: 0.8, suggestionLimit: 5 });
  const company = (phrase: string) => {
    const result = companies.resolve(phrase, snapshot);
    if (result.isErr()) {
      throw new Error(result.error.message);
    }
    return result.value;
  };
  return { snapshot, validator, company, countedHeads };
};

const onDate = (periodEnd: string): PeriodInput => ({
  type: "static",
  resolution: { period: { type: "period_end", periodEnd }, family: "regular", label: periodEnd },
});

describe("HeadValidator", () => {
  it("moves past an exact match without data to the shortest containing head", async () => {
    const { snapshot, validator, company, countedHeads } = await setup();

    const result = await validator.validate({
      snapshot,
      company: company("UBL"),
      metricPhrase: "D&A",
      period: onDate("2021-03-31"),
      consolidationId: 2,
      deadline: new Deadline(1_000, clock),
    });

    const validated = result._unsafeUnwrap();
    expect(validated.candidate).toEqual({
      headId: 89,
      headName: "Depreciation and Amortisation - Operating",
      kind: { kind: "regular" },
    });
    expect(validated.table).toBe("financial_data");
    expect(validated.count).toBe(1);
    expect(countedHeads).toEqual([480, 89]);
  });

  it("checks industry-free steps only when the company has no sector", async () => {
    const { snapshot, validator, company } = await setup();

    const result = await validator.validate({
      snapshot,
      company: company("ORPH"),
      metricPhrase: "D&A",
      period: onDate("2021-03-31"),
      consolidationId: 2,
      deadline: new Deadline(1_000, clock),
    });

    const failure = result._unsafeUnwrapErr();
    expect(failure.code).toBe("metric_no_data");
    expect(failure.code === "metric_no_data" ? failure.tried.map((item) => item.headId) : []).toEqual([
      480, 89, 139, 124,
    ]);
  });

  it("excludes heads whose industry does not map to the company sector", async () => {
    const { snapshot, validator, company, countedHeads } = await setup();

    const result = await validator.validate({
      snapshot,
      company: company("LUCK"),
      metricPhrase: "Net Interest Margin",
      period: onDate("2023-12-31"),
      consolidationId: 2,
      deadline: new Deadline(1_000, clock),
    });

    expect(result._unsafeUnwrapErr().code).toBe("metric_no_data");
    expect(countedHeads).toEqual([12]);
  });

  it("suggests similar head names when nothing matches", async () => {
    const { snapshot, validator, company } = await setup(2);

    const result = await validator.validate({
      snapshot,
      company: company("UBL"),
      metricPhrase: "Total Asets",
      period: onDate("2023-12-31"),
      consolidationId: 2,
      deadline: new Deadline(1_000, clock),
    });

    const failure = result._unsafeUnwrapErr();
    expect(failure.code).toBe("metric_not_found");
    if (failure.code !== "metric_not_found") {
      return;
    }
    expect(failure.suggestions).toHaveLength(2);
    expect(failure.suggestions[0]).toBe("Total Assets");
  });

  it("resolves relative periods per candidate", async () => {
    const { snapshot, validator, company } = await setup();

    const result = await validator.validate({
      snapshot,
      company: company("UBL"),
      metricPhrase: "Profit After Tax",
      period: {
        type: "relative",
        phrase: { state: "relative_term", relative: "most_recent_quarter", source: "last quarter" },
      },
      consolidationId: 2,
      deadline: new Deadline(1_000, clock),
    });

    const validated = result._unsafeUnwrap();
    expect(validated.table).toBe("financial_data_quarter");
    expect(validated.period).toEqual({
      period: { type: "period_end", periodEnd: "2024-03-31" },
      family: "quarterly",
      label: "Q1 ending 2024-03-31",
    });
  });
});
