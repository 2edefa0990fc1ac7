import { err, ok, type Result } from "neverthrow";
import type { ResolutionFailure } from "../../core/entities/appError";
import type { Company } from "../../core/entities/company";
import type {
  PeriodPhrase,
  PeriodResolution,
  RelativeTermType,
  TableFamily,
} from "../../core/entities/period";
import type { DataTarget } from "../../core/entities/query";
import type {
  ClockPort,
  QueryExecutionPort,
} from "../../core/ports/outboundPorts";
import type { Deadline } from "./deadline";
import type { MetadataSnapshot } from "./metadataSnapshot";
import type { QueryBuilder } from "./queryBuilder";

export type PeriodFailure = Extract<
  ResolutionFailure,
  { code: "period_unresolvable" }
>;

export type StaticPeriodPhrase = Exclude<PeriodPhrase, { state: "relative_term" }>;

export const ACCEPTED_PERIOD_EXAMPLES = [
  "2023-12-31",
  "31/12/2023",
  "Q2 2023",
  "second quarter 2023",
  "6M 2023",
  "H1 2023",
  "FY2023",
  "current fiscal year",
  "last fiscal year",
  "latest",
  "most recent quarter",
  "YTD",
  "TTM",
];

const ORDINAL_QUARTERS: Record<string, number> = {
  first: 1,
  "1st": 1,
  second: 2,
  "2nd": 2,
  third: 3,
  "3rd": 3,
  fourth: 4,
  "4th": 4,
};

const RELATIVE_PHRASES: Record<string, RelativeTermType> = {
  latest: "latest",
  "most recent": "latest",
  "last reported": "latest",
  "latest available": "latest",
  "last quarter": "most_recent_quarter",
  "latest quarter": "most_recent_quarter",
  "most recent quarter": "most_recent_quarter",
  "recent quarter": "most_recent_quarter",
  ytd: "ytd",
  "year to date": "ytd",
  ttm: "ttm",
  ltm: "ttm",
  "trailing twelve months": "ttm",
  "trailing 12 months": "ttm",
  "last twelve months": "ttm",
  "last 12 months": "ttm",
};

const CURRENT_FISCAL_YEAR = new Set([
  "current fiscal year",
  "this fiscal year",
  "current fy",
  "this fy",
]);

const LAST_FISCAL_YEAR = new Set([
  "last fiscal year",
  "previous fiscal year",
  "prior fiscal year",
  "last fy",
  "previous fy",
  "prior fy",
]);

const RELATIVE_FAMILIES: Record<RelativeTermType, Exclude<TableFamily, "ratio">> = {
  latest: "regular",
  most_recent_quarter: "quarterly",
  ytd: "regular",
  ttm: "ttm",
};

const pad = (value: number): string => String(value).padStart(2, "0");

/**
 * Builds a YYYY-MM-DD string only when the parts form a real calendar date.
 */
export const toIsoDate = (year: number, month: number, day: number): string | null => {
  if (month < 1 || month > 12 || day < 1) {
    return null;
  }
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return `${year}-${pad(month)}-${pad(day)}`;
};

const toFullYear = (raw: string): number => {
  const year = Number(raw);
  return raw.length === 2 ? 2000 + year : year;
};

const cleanPhrase = (phrase: string): string =>
  phrase
    .toLowerCase()
    .replace(/[?.,()]/g, " ")
    .replace(/\s+/g, " ")
    .trim()
    .replace(/^(?:for|in|as of|as at|during|the)\s+/, "")
    .replace(/^the\s+/, "");

/**
 * Parses a period phrase into one of the supported shapes, with no metadata lookups.
 */
export const parsePeriodPhrase = (
  phrase: string,
): Result<PeriodPhrase, PeriodFailure> => {
  const source = phrase.trim();
  const text = cleanPhrase(phrase);

  const unresolvable = (reason: string): Result<PeriodPhrase, PeriodFailure> =>
    err({
      code: "period_unresolvable",
      phrase: source,
      examples: ACCEPTED_PERIOD_EXAMPLES,
      message: reason,
    });

  if (!text) {
    return unresolvable("Period phrase is empty.");
  }

  const relative = RELATIVE_PHRASES[text];
  if (relative) {
    return ok({ state: "relative_term", relative, source });
  }
  if (CURRENT_FISCAL_YEAR.has(text)) {
    return ok({ state: "fiscal_year_only", year: { type: "current", offset: 0 }, source });
  }
  if (LAST_FISCAL_YEAR.has(text)) {
    return ok({ state: "fiscal_year_only", year: { type: "current", offset: -1 }, source });
  }

  const iso = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(text);
  const dayFirst = /^(\d{1,2})[-/](\d{1,2})[-/](\d{4})$/.exec(text);
  if (iso || dayFirst) {
    const periodEnd = iso
      ? toIsoDate(Number(iso[1]), Number(iso[2]), Number(iso[3]))
      : dayFirst
        ? toIsoDate(Number(dayFirst[3]), Number(dayFirst[2]), Number(dayFirst[1]))
        : null;
    if (!periodEnd) {
      return unresolvable(`'${source}' is not a valid calendar date.`);
    }
    return ok({ state: "exact_date", periodEnd, source });
  }

  const quarter = /^q([1-4])\s*(?:fy\s*)?'?(\d{4}|\d{2})$/.exec(text);
  if (quarter) {
    return ok({
      state: "quarter_year",
      termLabel: `Q${quarter[1]}`,
      fiscalYear: toFullYear(quarter[2] ?? ""),
      source,
    });
  }

  const ordinal =
    /^(first|second|third|fourth|1st|2nd|3rd|4th) quarter (?:of )?(?:fy\s*)?(\d{4})$/.exec(text);
  if (ordinal) {
    return ok({
      state: "quarter_year",
      termLabel: `Q${ORDINAL_QUARTERS[ordinal[1] ?? ""] ?? 1}`,
      fiscalYear: Number(ordinal[2]),
      source,
    });
  }

  const cumulative =
    /^(3|6|9|12)\s*(?:m|months?)\s*(?:ended\s*)?(?:fy\s*)?(\d{4})$/.exec(text);
  if (cumulative) {
    return ok({
      state: "quarter_year",
      termLabel: `${cumulative[1]}M`,
      fiscalYear: Number(cumulative[2]),
      source,
    });
  }

  const half = /^h1\s*(?:fy\s*)?(\d{4})$/.exec(text);
  if (half) {
    return ok({ state: "quarter_year", termLabel: "6M", fiscalYear: Number(half[1]), source });
  }

  const fiscal = /^(?:fy|fiscal year|financial year)\s*'?(\d{4}|\d{2})$/.exec(text);
  const bare = /^((?:19|20)\d{2})$/.exec(text);
  const year = fiscal?.[1] ?? bare?.[1];
  if (year) {
    return ok({
      state: "fiscal_year_only",
      year: { type: "absolute", fiscalYear: toFullYear(year) },
      source,
    });
  }

  return unresolvable(`Unrecognised period '${source}'.`);
};

export type RelativeTarget = Omit<DataTarget, "table" | "termId">;

/**
 * Resolves period phrases against terms, the company's fiscal calendar and, for relative phrases, the warehouse.
 */
export class PeriodResolver {
  constructor(
    private readonly clock: ClockPort,
    private readonly executor: QueryExecutionPort,
    private readonly queryBuilder: QueryBuilder,
  ) {}

  parse(phrase: string): Result<PeriodPhrase, PeriodFailure> {
    return parsePeriodPhrase(phrase);
  }

  /**
   * Fiscal year labelled by the calendar year it ends in.
   */
  currentFiscalYear(company: Company): number {
    const now = this.clock.now();
    const month = now.getUTCMonth() + 1;
    const year = now.getUTCFullYear();
    return month > company.fiscalYearEndMonth ? year + 1 : year;
  }

  resolveStatic(
    phrase: StaticPeriodPhrase,
    company: Company,
    snapshot: MetadataSnapshot,
  ): Result<PeriodResolution, PeriodFailure> {
    switch (phrase.state) {
      case "exact_date":
        return ok({
          period: { type: "period_end", periodEnd: phrase.periodEnd },
          family: "regular",
          label: phrase.periodEnd,
        });
      case "quarter_year":
        return this.termYear(phrase.termLabel, phrase.fiscalYear, phrase.source, snapshot);
      case "fiscal_year_only": {
        const fiscalYear =
          phrase.year.type === "absolute"
            ? phrase.year.fiscalYear
            : this.currentFiscalYear(company) + phrase.year.offset;
        return this.termYear("12M", fiscalYear, phrase.source, snapshot);
      }
    }
  }

  /**
   * Resolves a relative phrase for one candidate from its newest row. Null means the candidate has no data.
   */
  async resolveRelative(
    relative: RelativeTermType,
    target: RelativeTarget,
    table: DataTarget["table"],
    company: Company,
    snapshot: MetadataSnapshot,
    deadline: Deadline,
  ): Promise<PeriodResolution | null> {
    const family = RELATIVE_FAMILIES[relative];
    const ttmTermId =
      relative === "ttm" && table === "ratio_data"
        ? snapshot.termByLabel("TTM")?.id
        : undefined;
    const fiscalYear =
      relative === "ytd" ? this.currentFiscalYear(company) : undefined;

    const latest = await deadline.run(() =>
      this.executor.fetchLatestPeriod(
        this.queryBuilder.buildLatestPeriod(
          { ...target, table, termId: ttmTermId },
          { fiscalYear },
        ),
      ),
    );
    if (!latest) {
      return null;
    }

    const termLabel = snapshot.termById(latest.termId)?.label ?? String(latest.termId);
    if (
      (relative === "ytd" || ttmTermId !== undefined) &&
      latest.fiscalYear !== null
    ) {
      return {
        period: { type: "term_year", termId: latest.termId, fiscalYear: latest.fiscalYear },
        family,
        label: `${termLabel} FY${latest.fiscalYear}`,
      };
    }

    return {
      period: { type: "period_end", periodEnd: latest.periodEnd },
      family,
      label: `${termLabel} ending ${latest.periodEnd}`,
    };
  }

  /** Table family a relative phrase reads from before kind refinements. */
  relativeFamily(relative: RelativeTermType): Exclude<TableFamily, "ratio"> {
    return RELATIVE_FAMILIES[relative];
  }

  private termYear(
    termLabel: string,
    fiscalYear: number,
    source: string,
    snapshot: MetadataSnapshot,
  ): Result<PeriodResolution, PeriodFailure> {
    const term = snapshot.termByLabel(termLabel);
    if (!term) {
      return err({
        code: "period_unresolvable",
        phrase: source,
        examples: ACCEPTED_PERIOD_EXAMPLES,
        message: `Term '${termLabel}' is not defined in the warehouse.`,
      });
    }

    return ok({
      period: { type: "term_year", termId: term.id, fiscalYear },
      family: /^Q[1-4]$/.test(term.label) ? "quarterly" : "regular",
      label: `${term.label} FY${fiscalYear}`,
    });
  }
}
