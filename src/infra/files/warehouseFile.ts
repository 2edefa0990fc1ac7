import { readFile } from "node:fs/promises";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { DATA_TABLES } from "../../core/entities/query";

const id = z.number().int();

const namedSchema = z.object({ id, name: z.string().min(1) });
const labelledSchema = z.object({ id, label: z.string().min(1) });

const headSchema = z.object({
  id,
  name: z.string().min(1),
  industryId: id,
  unitId: id.nullable().default(null),
});

const factRowSchema = z.object({
  companyId: id,
  headId: id,
  periodEnd: z.string().regex(/^\d{4}-\d{2}-\d{2}$/),
  termId: id,
  fiscalYear: id.nullable().default(null),
  consolidationId: id,
  value: z.number().nullable(),
  dissectionGroupId: id.optional(),
});

export const warehouseFileSchema = z.object({
  companies: z.array(
    z.object({
      id,
      name: z.string().min(1),
      ticker: z.string().min(1),
      sectorId: id.nullable().default(null),
      industryId: id.nullable().default(null),
      fiscalYearEndMonth: z.number().int().min(1).max(12).default(12),
    }),
  ),
  sectors: z.array(namedSchema),
  industries: z.array(namedSchema),
  industrySectorMappings: z.array(z.object({ industryId: id, sectorId: id })),
  regularHeads: z.array(headSchema),
  ratioHeads: z.array(headSchema),
  dissectionGroups: z.array(namedSchema),
  terms: z.array(labelledSchema),
  consolidationTypes: z.array(labelledSchema),
  units: z.array(namedSchema),
  data: z.record(z.enum(DATA_TABLES), z.array(factRowSchema)).default({}),
});

export type WarehouseFile = z.infer<typeof warehouseFileSchema>;
export type FactRow = z.infer<typeof factRowSchema>;

export type WarehouseFileError = {
  path: string;
  message: string;
  cause: unknown;
};

/**
 * Reads and validates a warehouse JSON file: lookup tables plus optional fact rows per data table.
 */
export const readWarehouseFile = async (
  path: string,
): Promise<Result<WarehouseFile, WarehouseFileError>> => {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    return err({ path, message: `Cannot read warehouse file '${path}'.`, cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    return err({ path, message: `Warehouse file '${path}' is not valid JSON.`, cause: error });
  }

  const parsed = warehouseFileSchema.safeParse(json);
  if (!parsed.success) {
    return err({
      path,
      message: `Warehouse file '${path}' is malformed: ${parsed.error.issues
        .map((issue) => `${issue.path.join(".")} ${issue.message}`)
        .join("; ")}`,
      cause: parsed.error,
    });
  }

  return ok(parsed.data);
};
