import { MetadataLoadError } from "../../core/entities/appError";
import type { MetadataTables } from "../../core/entities/metadata";
import type { MetadataSourcePort } from "../../core/ports/outboundPorts";
import { readWarehouseFile, type WarehouseFile } from "./warehouseFile";

export const toMetadataTables = (file: WarehouseFile): MetadataTables => ({
  companies: file.companies,
  sectors: file.sectors,
  industries: file.industries,
  industrySectorMappings: file.industrySectorMappings,
  regularHeads: file.regularHeads.map((head) => ({ ...head, family: "regular" as const })),
  ratioHeads: file.ratioHeads.map((head) => ({ ...head, family: "ratio" as const })),
  dissectionGroups: file.dissectionGroups,
  terms: file.terms,
  consolidationTypes: file.consolidationTypes,
  units: file.units,
});

/**
 * Serves metadata tables from a local JSON file, re-read on every load.
 */
export class JsonMetadataSource implements MetadataSourcePort {
  constructor(private readonly path: string) {}

  async loadTables(): Promise<MetadataTables> {
    const file = await readWarehouseFile(this.path);
    if (file.isErr()) {
      throw new MetadataLoadError(file.error.message, file.error.cause);
    }
    return toMetadataTables(file.value);
  }
}
