import type {
  Company,
  Industry,
  IndustrySectorMapping,
  Sector,
} from "../../core/entities/company";
import type {
  ConsolidationType,
  MetadataTables,
  Unit,
} from "../../core/entities/metadata";
import type {
  DissectionGroup,
  HeadFamily,
  MetricHead,
} from "../../core/entities/metric";
import type { Term } from "../../core/entities/period";

const indexBy = <T, K>(items: readonly T[], key: (item: T) => K): Map<K, T> => {
  const index = new Map<K, T>();
  for (const item of items) {
    if (!index.has(key(item))) {
      index.set(key(item), item);
    }
  }
  return index;
};

const freezeAll = <T extends object>(items: T[]): readonly Readonly<T>[] =>
  Object.freeze(items.map((item) => Object.freeze({ ...item })));

/**
 * Immutable, indexed view of one metadata generation.
 */
export class MetadataSnapshot {
  readonly companies: readonly Company[];
  readonly sectors: readonly Sector[];
  readonly industries: readonly Industry[];
  readonly regularHeads: readonly MetricHead[];
  readonly ratioHeads: readonly MetricHead[];
  readonly dissectionGroups: readonly DissectionGroup[];
  readonly terms: readonly Term[];
  readonly consolidationTypes: readonly ConsolidationType[];
  readonly units: readonly Unit[];

  private readonly companiesById: Map<number, Company>;
  private readonly companiesByTicker: Map<string, Company>;
  private readonly sectorsById: Map<number, Sector>;
  private readonly industriesById: Map<number, Industry>;
  private readonly regularHeadsById: Map<number, MetricHead>;
  private readonly ratioHeadsById: Map<number, MetricHead>;
  private readonly dissectionGroupsById: Map<number, DissectionGroup>;
  private readonly termsById: Map<number, Term>;
  private readonly termsByLabel: Map<string, Term>;
  private readonly consolidationsById: Map<number, ConsolidationType>;
  private readonly consolidationsByLabel: Map<string, ConsolidationType>;
  private readonly unitsById: Map<number, Unit>;
  private readonly mappingKeys: Set<string>;

  constructor(
    tables: MetadataTables,
    readonly loadedAt: Date,
  ) {
    this.companies = freezeAll(tables.companies);
    this.sectors = freezeAll(tables.sectors);
    this.industries = freezeAll(tables.industries);
    this.regularHeads = freezeAll(
      tables.regularHeads.map((head) => ({ ...head, family: "regular" as const })),
    );
    this.ratioHeads = freezeAll(
      tables.ratioHeads.map((head) => ({ ...head, family: "ratio" as const })),
    );
    this.dissectionGroups = freezeAll(tables.dissectionGroups);
    this.terms = freezeAll(tables.terms);
    this.consolidationTypes = freezeAll(tables.consolidationTypes);
    this.units = freezeAll(tables.units);

    this.companiesById = indexBy(this.companies, (company) => company.id);
    this.companiesByTicker = indexBy(this.companies, (company) =>
      company.ticker.trim().toUpperCase(),
    );
    this.sectorsById = indexBy(this.sectors, (sector) => sector.id);
    this.industriesById = indexBy(this.industries, (industry) => industry.id);
    this.regularHeadsById = indexBy(this.regularHeads, (head) => head.id);
    this.ratioHeadsById = indexBy(this.ratioHeads, (head) => head.id);
    this.dissectionGroupsById = indexBy(this.dissectionGroups, (group) => group.id);
    this.termsById = indexBy(this.terms, (term) => term.id);
    this.termsByLabel = indexBy(this.terms, (term) =>
      term.label.trim().toUpperCase(),
    );
    this.consolidationsById = indexBy(
      this.consolidationTypes,
      (consolidation) => consolidation.id,
    );
    this.consolidationsByLabel = indexBy(this.consolidationTypes, (consolidation) =>
      consolidation.label.trim().toLowerCase(),
    );
    this.unitsById = indexBy(this.units, (unit) => unit.id);
    this.mappingKeys = new Set(
      tables.industrySectorMappings.map(
        (mapping: IndustrySectorMapping) =>
          `${mapping.industryId}:${mapping.sectorId}`,
      ),
    );
  }

  companyById(id: number): Company | undefined {
    return this.companiesById.get(id);
  }

  companyByTicker(ticker: string): Company | undefined {
    return this.companiesByTicker.get(ticker.trim().toUpperCase());
  }

  sectorById(id: number | null): Sector | undefined {
    return id === null ? undefined : this.sectorsById.get(id);
  }

  industryById(id: number | null): Industry | undefined {
    return id === null ? undefined : this.industriesById.get(id);
  }

  headsByFamily(family: HeadFamily): readonly MetricHead[] {
    return family === "regular" ? this.regularHeads : this.ratioHeads;
  }

  headById(family: HeadFamily, id: number): MetricHead | undefined {
    return family === "regular"
      ? this.regularHeadsById.get(id)
      : this.ratioHeadsById.get(id);
  }

  dissectionGroupById(id: number): DissectionGroup | undefined {
    return this.dissectionGroupsById.get(id);
  }

  termById(id: number): Term | undefined {
    return this.termsById.get(id);
  }

  termByLabel(label: string): Term | undefined {
    return this.termsByLabel.get(label.trim().toUpperCase());
  }

  consolidationById(id: number): ConsolidationType | undefined {
    return this.consolidationsById.get(id);
  }

  consolidationByLabel(label: string): ConsolidationType | undefined {
    return this.consolidationsByLabel.get(label.trim().toLowerCase());
  }

  unitById(id: number | null): Unit | undefined {
    return id === null ? undefined : this.unitsById.get(id);
  }

  /**
   * A head is valid for a company when the head's industry is mapped to the company's sector.
   * Returns null when the company carries no sector, so callers can tell "invalid" from "unknown".
   */
  isHeadValidForCompany(head: MetricHead, company: Company): boolean | null {
    if (company.sectorId === null) {
      return null;
    }
    return this.mappingKeys.has(`${head.industryId}:${company.sectorId}`);
  }
}
