import { z } from "zod";
import type { DataRow, LatestPeriodRow } from "../../core/entities/query";

const periodEndSchema = z
  .union([z.string(), z.date()])
  .transform((value) =>
    typeof value === "string" ? value.slice(0, 10) : value.toISOString().slice(0, 10),
  );

// Postgres numeric and bigint columns arrive as strings.
const numberish = z.union([z.number(), z.string(), z.bigint()]).transform(Number);

export const dataRowSchema = z
  .object({
    value: numberish.nullable(),
    unit: z.string().nullable(),
    term: z.string(),
    company: z.string(),
    metric: z.string(),
    consolidation: z.string(),
    period_end: periodEndSchema,
    fiscal_year: numberish.nullable(),
    dissection_group: z.string().nullish(),
  })
  .transform(
    (row): DataRow => ({
      value: row.value,
      unit: row.unit,
      term: row.term,
      company: row.company,
      metric: row.metric,
      consolidation: row.consolidation,
      periodEnd: row.period_end,
      fiscalYear: row.fiscal_year,
      ...(row.dissection_group ? { dissectionGroup: row.dissection_group } : {}),
    }),
  );

export const latestPeriodRowSchema = z
  .object({
    period_end: periodEndSchema,
    term_id: numberish,
    fiscal_year: numberish.nullable(),
  })
  .transform(
    (row): LatestPeriodRow => ({
      periodEnd: row.period_end,
      termId: row.term_id,
      fiscalYear: row.fiscal_year,
    }),
  );

export const countRowSchema = z.object({ count: numberish });
