/** The two head lexicons the warehouse keeps: line items and ratio definitions. */
export type HeadFamily = "regular" | "ratio";

export type MetricHead = {
  id: number;
  name: string;
  family: HeadFamily;
  industryId: number;
  unitId: number | null;
};

export type DissectionGroup = {
  id: number;
  name: string;
};

/**
 * Well-known dissection group ids as the warehouse numbers them.
 */
export const DISSECTION_GROUP_IDS = {
  perShare: 1,
  annualGrowth: 2,
  percentOfAssets: 3,
  percentOfSales: 4,
  quarterlyGrowth: 5,
} as const;

export type MetricKind =
  | { kind: "regular" }
  | { kind: "ratio" }
  | {
      kind: "dissection";
      dissectionGroupId: number;
      baseFamily: HeadFamily;
    };

export type MetricKindTag = MetricKind["kind"];

/**
 * A head that matched the metric phrase, typed with the kind it would be read as.
 */
export type HeadCandidate = {
  headId: number;
  headName: string;
  kind: MetricKind;
};
