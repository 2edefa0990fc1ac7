import { err, ok, type Result } from "neverthrow";
import {
  MetadataLoadError,
  type ResolutionFailure,
} from "../../core/entities/appError";
import type { ConsolidationType } from "../../core/entities/metadata";
import type {
  ResolutionFragments,
  ResolvedAnswer,
  ResolvedQuery,
  ResolvedQuerySpec,
} from "../../core/entities/resolution";
import type { QueryResolverPort } from "../../core/ports/inboundPorts";
import type {
  ClockPort,
  QueryExecutionPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import type { CompanyResolver } from "./companyResolver";
import { Deadline } from "./deadline";
import type { EntityExtractor } from "./entityExtractor";
import type { HeadValidator, PeriodInput } from "./headValidator";
import type { MetadataSnapshotProvider } from "./metadataCache";
import type { MetadataSnapshot } from "./metadataSnapshot";
import type { PeriodResolver } from "./periodResolver";
import type { QueryBuilder } from "./queryBuilder";

export type QueryResolutionOptions = {
  timeoutMs: number;
  defaultConsolidation: string;
};

const DEFAULT_PERIOD = "latest";

const CONSOLIDATION_SYNONYMS: Record<string, string> = {
  standalone: "unconsolidated",
  "stand-alone": "unconsolidated",
};

/**
 * Runs extraction, company, consolidation, period and metric resolution, then builds the retrieval query.
 */
export class QueryResolutionService implements QueryResolverPort {
  constructor(
    private readonly metadata: MetadataSnapshotProvider,
    private readonly extractor: EntityExtractor,
    private readonly companyResolver: CompanyResolver,
    private readonly periodResolver: PeriodResolver,
    private readonly headValidator: HeadValidator,
    private readonly queryBuilder: QueryBuilder,
    private readonly executor: QueryExecutionPort,
    private readonly clock: ClockPort,
    private readonly options: QueryResolutionOptions,
  ) {}

  async resolveQuery(
    query: string,
  ): Promise<Result<ResolvedQuery, ResolutionFailure>> {
    const snapshot = this.metadata.current();
    const entities = this.extractor.extract(query, snapshot);

    const missing: Array<"company" | "metric"> = [];
    if (!entities.company) {
      missing.push("company");
    }
    if (!entities.metric) {
      missing.push("metric");
    }
    if (!entities.company || !entities.metric) {
      return err({
        code: "missing_fragment",
        fragments: missing,
        message: `Could not find the ${missing.join(" and ")} in the question.`,
      });
    }

    const warnings = entities.lowConfidence.map(
      (name) => `Low confidence in the extracted ${name}.`,
    );

    return this.resolveWith(
      snapshot,
      {
        companyPhrase: entities.company.text,
        metricPhrase: entities.metric.text,
        periodPhrase: entities.period?.text,
        consolidationPhrase: entities.consolidation?.text,
      },
      warnings,
    );
  }

  async resolveFragments(
    fragments: ResolutionFragments,
  ): Promise<Result<ResolvedQuery, ResolutionFailure>> {
    return this.resolveWith(this.metadata.current(), fragments, []);
  }

  /**
   * Resolves the question, then fetches its rows.
   */
  async answer(query: string): Promise<Result<ResolvedAnswer, ResolutionFailure>> {
    const resolved = await this.resolveQuery(query);
    if (resolved.isErr()) {
      return err(resolved.error);
    }

    const rows = await this.executor.fetchRows(resolved.value.query);
    logger.info(
      {
        companyId: resolved.value.spec.companyId,
        headId: resolved.value.spec.headId,
        rows: rows.length,
      },
      "Answer rows fetched",
    );
    return ok({ resolved: resolved.value, rows });
  }

  private async resolveWith(
    snapshot: MetadataSnapshot,
    fragments: ResolutionFragments,
    warnings: string[],
  ): Promise<Result<ResolvedQuery, ResolutionFailure>> {
    const deadline = new Deadline(this.options.timeoutMs, this.clock);

    const company = this.companyResolver.resolve(fragments.companyPhrase, snapshot);
    if (company.isErr()) {
      return err(company.error);
    }

    const consolidation = this.resolveConsolidation(
      fragments.consolidationPhrase,
      snapshot,
      warnings,
    );

    const parsed = this.periodResolver.parse(fragments.periodPhrase ?? DEFAULT_PERIOD);
    if (parsed.isErr()) {
      return err(parsed.error);
    }

    let period: PeriodInput;
    if (parsed.value.state === "relative_term") {
      period = { type: "relative", phrase: parsed.value };
    } else {
      const resolution = this.periodResolver.resolveStatic(
        parsed.value,
        company.value.company,
        snapshot,
      );
      if (resolution.isErr()) {
        return err(resolution.error);
      }
      period = { type: "static", resolution: resolution.value };
    }

    const validated = await this.headValidator.validate({
      snapshot,
      company: company.value,
      metricPhrase: fragments.metricPhrase,
      period,
      consolidationId: consolidation.id,
      deadline,
    });
    if (validated.isErr()) {
      return err(validated.error);
    }

    const { candidate, head } = validated.value;
    const spec: ResolvedQuerySpec = {
      companyId: company.value.company.id,
      headId: candidate.headId,
      metricKind: candidate.kind,
      period: validated.value.period.period,
      tableFamily: validated.value.tableFamily,
      consolidationId: consolidation.id,
    };

    const group =
      candidate.kind.kind === "dissection"
        ? snapshot.dissectionGroupById(candidate.kind.dissectionGroupId)
        : undefined;

    logger.info(
      {
        companyId: spec.companyId,
        headId: spec.headId,
        kind: spec.metricKind.kind,
        period: spec.period,
        tableFamily: spec.tableFamily,
        remainingMs: deadline.remainingMs(),
      },
      "Query resolved",
    );

    return ok({
      spec,
      query: this.queryBuilder.buildRetrieval(spec),
      identifiers: {
        companyName: company.value.company.name,
        ticker: company.value.company.ticker,
        metricName: group ? `${head.name} (${group.name})` : head.name,
        periodLabel: validated.value.period.label,
        consolidationLabel: consolidation.label,
      },
      company: company.value,
      consolidation,
      candidate,
      periodResolution: validated.value.period,
      dataCount: validated.value.count,
      warnings,
    });
  }

  private resolveConsolidation(
    phrase: string | undefined,
    snapshot: MetadataSnapshot,
    warnings: string[],
  ): ConsolidationType {
    if (phrase) {
      const key = phrase.trim().toLowerCase();
      const matched = snapshot.consolidationByLabel(CONSOLIDATION_SYNONYMS[key] ?? key);
      if (matched) {
        return matched;
      }
      warnings.push(
        `Unknown consolidation '${phrase}', using ${this.options.defaultConsolidation}.`,
      );
    }

    const fallback =
      snapshot.consolidationByLabel(this.options.defaultConsolidation) ??
      snapshot.consolidationTypes[0];
    if (!fallback) {
      throw new MetadataLoadError("No consolidation types are loaded.");
    }
    return fallback;
  }
}
