import { Command } from "commander";
import { createRuntime, type Runtime } from "../application/bootstrap/runtimeFactory";
import type { ResolutionFailure } from "../core/entities/appError";
import type { DataRow } from "../core/entities/query";
import type { ResolvedQuery } from "../core/entities/resolution";
import { lowerQuery } from "../infra/db/sqlLowering";
import { env } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

/**
 * Formats a structured failure with its suggestions for the terminal.
 */
export const formatFailure = (failure: ResolutionFailure): string => {
  const lines = [`Resolution failed (${failure.code}): ${failure.message}`];

  switch (failure.code) {
    case "company_not_found":
      failure.suggestions.forEach((suggestion) =>
        lines.push(`- did you mean ${suggestion.name} (${suggestion.ticker})?`),
      );
      break;
    case "ambiguous_company":
      failure.candidates.forEach((candidate) =>
        lines.push(`- ${candidate.name} (${candidate.ticker}), score=${candidate.score.toFixed(2)}`),
      );
      break;
    case "period_unresolvable":
      lines.push(`Accepted phrasing: ${failure.examples.join(", ")}`);
      break;
    case "metric_not_found":
      failure.suggestions.forEach((suggestion) => lines.push(`- did you mean ${suggestion}?`));
      break;
    case "metric_no_data":
    case "timeout":
      failure.tried.forEach((candidate) =>
        lines.push(`- tried ${candidate.headName} [${candidate.kind.kind} #${candidate.headId}]`),
      );
      break;
    case "missing_fragment":
      break;
  }

  return lines.join("\n");
};

/**
 * Formats resolved identifiers and the lowered retrieval query.
 */
export const formatResolution = (resolved: ResolvedQuery): string => {
  const lowered = lowerQuery(resolved.query);
  const lines = [
    `Company: ${resolved.identifiers.companyName} (${resolved.identifiers.ticker})`,
    `Metric: ${resolved.identifiers.metricName} [${resolved.spec.metricKind.kind} #${resolved.spec.headId}]`,
    `Period: ${resolved.identifiers.periodLabel}`,
    `Consolidation: ${resolved.identifiers.consolidationLabel}`,
    `Table: ${resolved.query.table} (${resolved.dataCount} rows)`,
    `SQL: ${lowered.text}`,
    `Params: ${JSON.stringify(lowered.values)}`,
  ];
  resolved.warnings.forEach((warning) => lines.push(`Warning: ${warning}`));
  return lines.join("\n");
};

const formatRows = (rows: DataRow[]): string =>
  rows.length === 0
    ? "No rows."
    : rows
        .map(
          (row) =>
            `${row.periodEnd} ${row.term}: ${row.value ?? "n/a"}${row.unit ? ` ${row.unit}` : ""}${row.dissectionGroup ? ` (${row.dissectionGroup})` : ""}`,
        )
        .join("\n");

const withRuntime = async (
  action: (runtime: Runtime) => Promise<void>,
): Promise<void> => {
  const runtime = await createRuntime();
  try {
    await action(runtime);
  } finally {
    await runtime.close();
  }
};

const reportFailure = (failure: ResolutionFailure): void => {
  console.log(formatFailure(failure));
  process.exitCode = 2;
};

/**
 * Defines a single command surface over the resolution pipeline.
 */
export const buildCli = () => {
  const cli = new Command();
  cli.name("fin-query").description("Financial query resolver CLI");

  cli
    .command("resolve")
    .description("Resolve a question, or explicit fragments, to a validated query")
    .argument("[query...]", "Natural-language question")
    .option("--company <phrase>", "Company ticker or name")
    .option("--metric <phrase>", "Metric phrase")
    .option("--period <phrase>", "Period phrase")
    .option("--consolidation <label>", "Consolidated or Unconsolidated")
    .option("--json", "Print the resolution as JSON")
    .action(
      async (
        words: string[],
        opts: {
          company?: string;
          metric?: string;
          period?: string;
          consolidation?: string;
          json?: boolean;
        },
      ) =>
        withRuntime(async (runtime) => {
          const result =
            opts.company && opts.metric
              ? await runtime.resolver.resolveFragments({
                  companyPhrase: opts.company,
                  metricPhrase: opts.metric,
                  periodPhrase: opts.period,
                  consolidationPhrase: opts.consolidation,
                })
              : await runtime.resolver.resolveQuery(words.join(" "));

          if (result.isErr()) {
            reportFailure(result.error);
            return;
          }

          console.log(
            opts.json
              ? JSON.stringify(
                  { spec: result.value.spec, identifiers: result.value.identifiers },
                  null,
                  2,
                )
              : formatResolution(result.value),
          );
        }),
    );

  cli
    .command("answer")
    .description("Resolve a question and fetch its rows")
    .argument("<query...>", "Natural-language question")
    .action(async (words: string[]) =>
      withRuntime(async (runtime) => {
        const result = await runtime.resolver.answer(words.join(" "));
        if (result.isErr()) {
          reportFailure(result.error);
          return;
        }
        console.log(formatResolution(result.value.resolved));
        console.log("");
        console.log(formatRows(result.value.rows));
      }),
    );

  cli
    .command("company")
    .description("Resolve a company phrase")
    .argument("<phrase...>", "Ticker or company name")
    .action(async (words: string[]) =>
      withRuntime(async (runtime) => {
        const result = runtime.companyResolver.resolve(
          words.join(" "),
          runtime.cache.current(),
        );
        if (result.isErr()) {
          reportFailure(result.error);
          return;
        }
        const { company, sector, industry, matchedBy, confidence } = result.value;
        console.log(
          `${company.name} (${company.ticker}) matchedBy=${matchedBy} confidence=${confidence.toFixed(2)} sector=${sector?.name ?? "n/a"} industry=${industry?.name ?? "n/a"} fiscalYearEnd=${company.fiscalYearEndMonth}`,
        );
      }),
    );

  cli
    .command("period")
    .description("Parse a period phrase and resolve it for a company")
    .argument("<phrase...>", "Period phrase")
    .requiredOption("--company <phrase>", "Company whose fiscal calendar applies")
    .action(async (words: string[], opts: { company: string }) =>
      withRuntime(async (runtime) => {
        const snapshot = runtime.cache.current();
        const company = runtime.companyResolver.resolve(opts.company, snapshot);
        if (company.isErr()) {
          reportFailure(company.error);
          return;
        }

        const parsed = runtime.periodResolver.parse(words.join(" "));
        if (parsed.isErr()) {
          reportFailure(parsed.error);
          return;
        }
        if (parsed.value.state === "relative_term") {
          console.log(
            `Relative period '${parsed.value.relative}' resolves per metric from the newest matching row.`,
          );
          return;
        }

        const resolved = runtime.periodResolver.resolveStatic(
          parsed.value,
          company.value.company,
          snapshot,
        );
        if (resolved.isErr()) {
          reportFailure(resolved.error);
          return;
        }
        console.log(JSON.stringify(resolved.value, null, 2));
      }),
    );

  cli
    .command("status")
    .description("Report configuration and metadata counts")
    .action(async () =>
      withRuntime(async (runtime) => {
        const snapshot = runtime.cache.current();
        logger.info(
          {
            metadataSource: env.METADATA_SOURCE,
            warehouse: env.WAREHOUSE,
            timeoutMs: env.RESOLUTION_TIMEOUT_MS,
            loadedAt: snapshot.loadedAt.toISOString(),
            counts: {
              companies: snapshot.companies.length,
              regularHeads: snapshot.regularHeads.length,
              ratioHeads: snapshot.ratioHeads.length,
              dissectionGroups: snapshot.dissectionGroups.length,
              terms: snapshot.terms.length,
              consolidationTypes: snapshot.consolidationTypes.length,
            },
          },
          "Runtime status",
        );
      }),
    );

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
