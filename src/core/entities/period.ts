export type Term = {
  id: number;
  label: string;
};

/**
 * Data-type axis of the warehouse. Regular and dissection tables exist once per family.
 */
export type TableFamily = "regular" | "quarterly" | "ttm" | "ratio";

export type RelativeTermType = "latest" | "most_recent_quarter" | "ytd" | "ttm";

/**
 * Parsed period phrase, before any lookup against terms or data.
 */
export type PeriodPhrase =
  | { state: "exact_date"; periodEnd: string; source: string }
  | {
      state: "quarter_year";
      termLabel: string;
      fiscalYear: number;
      source: string;
    }
  | {
      state: "fiscal_year_only";
      year:
        | { type: "absolute"; fiscalYear: number }
        | { type: "current"; offset: number };
      source: string;
    }
  | { state: "relative_term"; relative: RelativeTermType; source: string };

export type ResolvedPeriod =
  | { type: "period_end"; periodEnd: string }
  | { type: "term_year"; termId: number; fiscalYear: number };

export type PeriodResolution = {
  period: ResolvedPeriod;
  /** Table family the phrase implies for regular heads. Ratio and dissection kinds refine it. */
  family: Exclude<TableFamily, "ratio">;
  label: string;
};
