import type { CompanyContext } from "./company";
import type { ConsolidationType } from "./metadata";
import type { HeadCandidate, MetricKind } from "./metric";
import type { PeriodResolution, ResolvedPeriod, TableFamily } from "./period";
import type { DataRow, QuerySpec } from "./query";

export type Fragment = {
  text: string;
  confidence: number;
};

export type FragmentName = "company" | "metric" | "period" | "consolidation";

export type ExtractedEntities = {
  query: string;
  company: Fragment | null;
  metric: Fragment | null;
  period: Fragment | null;
  consolidation: Fragment | null;
  hasRelativePeriod: boolean;
  hasRatioIndicator: boolean;
  hasDissectionIndicator: boolean;
  dissectionGroup?: { id: number; label: string };
  lowConfidence: FragmentName[];
};

/**
 * Caller-supplied phrases for one resolution. Missing period and consolidation fall back to defaults.
 */
export type ResolutionFragments = {
  companyPhrase: string;
  metricPhrase: string;
  periodPhrase?: string;
  consolidationPhrase?: string;
};

/**
 * Validated tuple handed to the query builder.
 */
export type ResolvedQuerySpec = {
  companyId: number;
  headId: number;
  metricKind: MetricKind;
  period: ResolvedPeriod;
  tableFamily: TableFamily;
  consolidationId: number;
};

export type ResolvedIdentifiers = {
  companyName: string;
  ticker: string;
  metricName: string;
  periodLabel: string;
  consolidationLabel: string;
};

export type ResolvedQuery = {
  spec: ResolvedQuerySpec;
  query: QuerySpec;
  identifiers: ResolvedIdentifiers;
  company: CompanyContext;
  consolidation: ConsolidationType;
  candidate: HeadCandidate;
  periodResolution: PeriodResolution;
  dataCount: number;
  warnings: string[];
};

export type ResolvedAnswer = {
  resolved: ResolvedQuery;
  rows: DataRow[];
};
