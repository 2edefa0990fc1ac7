import { err, ok, type Result } from "neverthrow";
import type { ResolutionFailure } from "../../core/entities/appError";
import type {
  Company,
  CompanyContext,
  CompanySuggestion,
} from "../../core/entities/company";
import { normalizeText, rankBySimilarity } from "../../shared/text/similarity";
import type { MetadataSnapshot } from "./metadataSnapshot";

export type CompanyResolutionFailure = Extract<
  ResolutionFailure,
  { code: "company_not_found" | "ambiguous_company" }
>;

export type CompanyResolverOptions = {
  matchThreshold: number;
  suggestionLimit: number;
};

const toSuggestion = (company: Company, score: number): CompanySuggestion => ({
  companyId: company.id,
  name: company.name,
  ticker: company.ticker,
  score: Number(score.toFixed(3)),
});

/**
 * Resolves a company phrase against the snapshot: ticker, then name, then fuzzy similarity.
 */
export class CompanyResolver {
  constructor(private readonly options: CompanyResolverOptions) {}

  resolve(
    phrase: string,
    snapshot: MetadataSnapshot,
  ): Result<CompanyContext, CompanyResolutionFailure> {
    const normalized = normalizeText(phrase);
    if (!normalized) {
      return err({
        code: "company_not_found",
        phrase,
        suggestions: [],
        message: "Company resolution requires a non-empty ticker or name.",
      });
    }

    const byTicker = snapshot.companyByTicker(phrase);
    if (byTicker) {
      return ok(this.toContext(byTicker, snapshot, "ticker", 1));
    }

    const byName = snapshot.companies.find(
      (company) => normalizeText(company.name) === normalized,
    );
    if (byName) {
      return ok(this.toContext(byName, snapshot, "name", 1));
    }

    const ranked = rankBySimilarity(phrase, snapshot.companies, (company) => [
      company.name,
      company.ticker,
    ]);
    const accepted = ranked.filter(
      (match) => match.score >= this.options.matchThreshold,
    );

    const [single] = accepted;
    if (single && accepted.length === 1) {
      return ok(this.toContext(single.item, snapshot, "fuzzy", single.score));
    }

    if (accepted.length > 1) {
      return err({
        code: "ambiguous_company",
        phrase,
        candidates: accepted
          .slice(0, this.options.suggestionLimit)
          .map((match) => toSuggestion(match.item, match.score)),
        message: `'${phrase}' matches several companies. Use a ticker or the full name.`,
      });
    }

    return err({
      code: "company_not_found",
      phrase,
      suggestions: ranked
        .slice(0, this.options.suggestionLimit)
        .map((match) => toSuggestion(match.item, match.score)),
      message: `No company matches '${phrase}'.`,
    });
  }

  private toContext(
    company: Company,
    snapshot: MetadataSnapshot,
    matchedBy: CompanyContext["matchedBy"],
    confidence: number,
  ): CompanyContext {
    return {
      company,
      sector: snapshot.sectorById(company.sectorId),
      industry: snapshot.industryById(company.industryId),
      matchedBy,
      confidence,
    };
  }
}
