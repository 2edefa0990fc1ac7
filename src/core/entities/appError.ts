import type { CompanySuggestion } from "./company";
import type { HeadCandidate } from "./metric";

/**
 * Describes canonical infrastructure failure categories. Both abort the request.
 */
export type InfrastructureErrorCode = "metadata_load" | "query_execution";

export class InfrastructureError extends Error {
  constructor(
    readonly code: InfrastructureErrorCode,
    message: string,
    cause?: unknown,
  ) {
    super(message, { cause });
    this.name = "InfrastructureError";
  }
}

export class MetadataLoadError extends InfrastructureError {
  constructor(message: string, cause?: unknown) {
    super("metadata_load", message, cause);
    this.name = "MetadataLoadError";
  }
}

export class QueryExecutionError extends InfrastructureError {
  constructor(message: string, cause?: unknown) {
    super("query_execution", message, cause);
    this.name = "QueryExecutionError";
  }
}

// Only metric validation touches the warehouse, so it is the only stage that can run out of time.
export type ResolutionStage = "metric";

/**
 * Recoverable resolution outcomes, returned to the caller with diagnostics.
 */
export type ResolutionFailure =
  | {
      code: "missing_fragment";
      fragments: Array<"company" | "metric">;
      message: string;
    }
  | {
      code: "company_not_found";
      phrase: string;
      suggestions: CompanySuggestion[];
      message: string;
    }
  | {
      code: "ambiguous_company";
      phrase: string;
      candidates: CompanySuggestion[];
      message: string;
    }
  | {
      code: "period_unresolvable";
      phrase: string;
      examples: string[];
      message: string;
    }
  | {
      code: "metric_not_found";
      phrase: string;
      suggestions: string[];
      message: string;
    }
  | {
      code: "metric_no_data";
      phrase: string;
      tried: HeadCandidate[];
      message: string;
    }
  | {
      code: "timeout";
      stage: ResolutionStage;
      tried: HeadCandidate[];
      message: string;
    };

export type ResolutionFailureCode = ResolutionFailure["code"];
