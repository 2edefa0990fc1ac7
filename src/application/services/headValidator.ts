import { err, ok, type Result } from "neverthrow";
import type { ResolutionFailure } from "../../core/entities/appError";
import type { CompanyContext } from "../../core/entities/company";
import type {
  HeadCandidate,
  HeadFamily,
  MetricHead,
  MetricKind,
  MetricKindTag,
} from "../../core/entities/metric";
import type {
  PeriodPhrase,
  PeriodResolution,
  TableFamily,
} from "../../core/entities/period";
import type { DataTable } from "../../core/entities/query";
import type { QueryExecutionPort } from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import {
  containsPhrase,
  normalizeText,
  rankBySimilarity,
} from "../../shared/text/similarity";
import { DeadlineExceededError, type Deadline } from "./deadline";
import type { MetadataSnapshot } from "./metadataSnapshot";
import { classifyMetricPhrase, type MetricClassification } from "./metricClassifier";
import type { PeriodResolver } from "./periodResolver";
import { headFamilyOf, selectTable, tableFamilyOf, type QueryBuilder } from "./queryBuilder";

export type MetricFailure = Extract<
  ResolutionFailure,
  { code: "metric_not_found" | "metric_no_data" | "timeout" }
>;

/**
 * Period as the validator receives it: resolved up front, or relative and resolved per candidate.
 */
export type PeriodInput =
  | { type: "static"; resolution: PeriodResolution }
  | { type: "relative"; phrase: Extract<PeriodPhrase, { state: "relative_term" }> };

export type HeadValidationRequest = {
  snapshot: MetadataSnapshot;
  company: CompanyContext;
  metricPhrase: string;
  period: PeriodInput;
  consolidationId: number;
  deadline: Deadline;
};

export type ValidatedHead = {
  candidate: HeadCandidate;
  head: MetricHead;
  period: PeriodResolution;
  table: DataTable;
  tableFamily: TableFamily;
  count: number;
};

type CascadeStep = {
  match: "exact" | "contains";
  industryFilter: boolean;
};

export const CASCADE_STEPS: readonly CascadeStep[] = [
  { match: "exact", industryFilter: true },
  { match: "exact", industryFilter: false },
  { match: "contains", industryFilter: true },
  { match: "contains", industryFilter: false },
];

type RankedCandidate = {
  candidate: HeadCandidate;
  head: MetricHead;
};

const FAMILIES: readonly HeadFamily[] = ["regular", "ratio"];

const candidateKey = (candidate: HeadCandidate): string =>
  candidate.kind.kind === "dissection"
    ? `dissection:${candidate.kind.dissectionGroupId}:${candidate.kind.baseFamily}:${candidate.headId}`
    : `${candidate.kind.kind}:${candidate.headId}`;

const byNameThenId = (left: MetricHead, right: MetricHead): number =>
  left.name.length - right.name.length || left.id - right.id;

/**
 * Walks the four-step name/industry cascade and returns the first candidate with data.
 */
export class HeadValidator {
  constructor(
    private readonly executor: QueryExecutionPort,
    private readonly queryBuilder: QueryBuilder,
    private readonly periodResolver: PeriodResolver,
    private readonly suggestionLimit = 5,
  ) {}

  async validate(
    request: HeadValidationRequest,
  ): Promise<Result<ValidatedHead, MetricFailure>> {
    const classification = classifyMetricPhrase(request.metricPhrase);
    const { company } = request.company;
    const checked = new Set<string>();
    const tried: HeadCandidate[] = [];

    for (const [index, step] of CASCADE_STEPS.entries()) {
      if (step.industryFilter && company.sectorId === null) {
        logger.debug(
          { code: "industry_validation_failed", companyId: company.id, step: index + 1 },
          "Company has no sector; skipping industry-filtered step",
        );
        continue;
      }

      for (const ranked of this.candidatesFor(step, classification, request)) {
        const key = candidateKey(ranked.candidate);
        if (checked.has(key)) {
          continue;
        }
        checked.add(key);

        if (request.deadline.expired()) {
          return err(this.timeout(tried));
        }
        tried.push(ranked.candidate);

        let validated: ValidatedHead | null;
        try {
          validated = await this.evaluate(ranked, request);
        } catch (error) {
          if (error instanceof DeadlineExceededError) {
            return err(this.timeout(tried));
          }
          throw error;
        }

        if (validated) {
          logger.debug(
            {
              step: index + 1,
              headId: validated.candidate.headId,
              kind: validated.candidate.kind.kind,
              table: validated.table,
              count: validated.count,
            },
            "Metric head validated",
          );
          return ok(validated);
        }
      }
    }

    if (tried.length > 0) {
      return err({
        code: "metric_no_data",
        phrase: request.metricPhrase,
        tried,
        message: `Found heads matching '${request.metricPhrase}' but none has data for the requested company, period and consolidation.`,
      });
    }

    return err({
      code: "metric_not_found",
      phrase: request.metricPhrase,
      suggestions: this.suggestions(classification.phrase, request.snapshot),
      message: `No metric matches '${request.metricPhrase}'.`,
    });
  }

  private candidatesFor(
    step: CascadeStep,
    classification: MetricClassification,
    request: HeadValidationRequest,
  ): RankedCandidate[] {
    const { snapshot } = request;
    const { company } = request.company;

    const matching = (family: HeadFamily, phrase: string): MetricHead[] =>
      snapshot
        .headsByFamily(family)
        .filter((head) =>
          step.match === "exact"
            ? normalizeText(head.name) === phrase
            : containsPhrase(head.name, phrase),
        )
        .filter(
          (head) =>
            !step.industryFilter ||
            snapshot.isHeadValidForCompany(head, company) === true,
        )
        .sort(byNameThenId);

    const forKind = (tag: MetricKindTag): RankedCandidate[] => {
      if (tag === "dissection") {
        const { dissection, basePhrase } = classification;
        if (!dissection || !basePhrase) {
          return [];
        }
        return FAMILIES.flatMap((baseFamily) =>
          matching(baseFamily, basePhrase).map((head) =>
            this.toRanked(head, {
              kind: "dissection",
              dissectionGroupId: dissection.groupId,
              baseFamily,
            }),
          ),
        );
      }
      const kind: MetricKind = tag === "ratio" ? { kind: "ratio" } : { kind: "regular" };
      return matching(tag, classification.phrase).map((head) =>
        this.toRanked(head, kind),
      );
    };

    return classification.kindOrder.flatMap(forKind);
  }

  private toRanked(head: MetricHead, kind: MetricKind): RankedCandidate {
    return { head, candidate: { headId: head.id, headName: head.name, kind } };
  }

  private async evaluate(
    ranked: RankedCandidate,
    request: HeadValidationRequest,
  ): Promise<ValidatedHead | null> {
    const { candidate } = ranked;
    const baseTarget = {
      companyId: request.company.company.id,
      headId: candidate.headId,
      headFamily: headFamilyOf(candidate.kind),
      consolidationId: request.consolidationId,
      dissectionGroupId:
        candidate.kind.kind === "dissection"
          ? candidate.kind.dissectionGroupId
          : undefined,
    };

    let period: PeriodResolution;
    let table: DataTable;
    if (request.period.type === "static") {
      period = request.period.resolution;
      table = selectTable(candidate.kind, period.family);
    } else {
      const relative = request.period.phrase.relative;
      table = selectTable(candidate.kind, this.periodResolver.relativeFamily(relative));
      const resolved = await this.periodResolver.resolveRelative(
        relative,
        baseTarget,
        table,
        request.company.company,
        request.snapshot,
        request.deadline,
      );
      if (!resolved) {
        return null;
      }
      period = resolved;
    }

    const count = await request.deadline.run(() =>
      this.executor.countRows(
        this.queryBuilder.buildExistenceCheck({ ...baseTarget, table }, period.period),
      ),
    );
    if (count <= 0) {
      return null;
    }

    return {
      candidate,
      head: ranked.head,
      period,
      table,
      tableFamily: tableFamilyOf(table),
      count,
    };
  }

  private timeout(tried: HeadCandidate[]): MetricFailure {
    return {
      code: "timeout",
      stage: "metric",
      tried,
      message: "Metric validation ran out of time.",
    };
  }

  private suggestions(phrase: string, snapshot: MetadataSnapshot): string[] {
    const heads = [...snapshot.regularHeads, ...snapshot.ratioHeads];
    const names = Array.from(new Set(heads.map((head) => head.name)));
    return rankBySimilarity(phrase, names, (name) => [name])
      .slice(0, this.suggestionLimit)
      .map((match) => match.item);
  }
}
