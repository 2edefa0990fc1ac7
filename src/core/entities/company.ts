export type Company = {
  id: number;
  name: string;
  ticker: string;
  sectorId: number | null;
  industryId: number | null;
  /** Calendar month (1-12) in which the company's fiscal year closes. */
  fiscalYearEndMonth: number;
};

export type Sector = {
  id: number;
  name: string;
};

export type Industry = {
  id: number;
  name: string;
};

export type IndustrySectorMapping = {
  industryId: number;
  sectorId: number;
};

/**
 * Company identity plus the classification context head validation needs.
 */
export type CompanyContext = {
  company: Company;
  sector?: Sector;
  industry?: Industry;
  matchedBy: "ticker" | "name" | "fuzzy";
  confidence: number;
};

export type CompanySuggestion = {
  companyId: number;
  name: string;
  ticker: string;
  score: number;
};
