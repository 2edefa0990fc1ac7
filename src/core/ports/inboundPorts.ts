import type { Result } from "neverthrow";
import type { ResolutionFailure } from "../entities/appError";
import type {
  ResolutionFragments,
  ResolvedAnswer,
  ResolvedQuery,
} from "../entities/resolution";

/**
 * Entry point the natural-language handler calls.
 */
export interface QueryResolverPort {
  resolveQuery(query: string): Promise<Result<ResolvedQuery, ResolutionFailure>>;
  resolveFragments(
    fragments: ResolutionFragments,
  ): Promise<Result<ResolvedQuery, ResolutionFailure>>;
  answer(query: string): Promise<Result<ResolvedAnswer, ResolutionFailure>>;
}
