import type {
  Company,
  Industry,
  IndustrySectorMapping,
  Sector,
} from "./company";
import type { DissectionGroup, MetricHead } from "./metric";
import type { Term } from "./period";

export type ConsolidationType = {
  id: number;
  label: string;
};

export type Unit = {
  id: number;
  name: string;
};

/**
 * Raw reference tables as a metadata source returns them.
 */
export type MetadataTables = {
  companies: Company[];
  sectors: Sector[];
  industries: Industry[];
  industrySectorMappings: IndustrySectorMapping[];
  regularHeads: MetricHead[];
  ratioHeads: MetricHead[];
  dissectionGroups: DissectionGroup[];
  terms: Term[];
  consolidationTypes: ConsolidationType[];
  units: Unit[];
};

export type MetadataTableName = keyof MetadataTables;
