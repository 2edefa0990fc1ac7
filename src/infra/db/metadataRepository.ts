import { asc } from "drizzle-orm";
import type { PostgresJsDatabase } from "drizzle-orm/postgres-js";
import type { MetadataTables } from "../../core/entities/metadata";
import type { MetadataSourcePort } from "../../core/ports/outboundPorts";
import {
  companiesTable,
  consolidationTypesTable,
  dissectionGroupsTable,
  industriesTable,
  industrySectorMappingTable,
  ratioHeadsTable,
  regularHeadsTable,
  sectorsTable,
  termsTable,
  unitsTable,
} from "./schema";

/**
 * Reads the warehouse lookup tables that back the metadata cache.
 */
export class PostgresMetadataSource implements MetadataSourcePort {
  constructor(private readonly db: PostgresJsDatabase<Record<string, never>>) {}

  async loadTables(): Promise<MetadataTables> {
    const [
      companies,
      sectors,
      industries,
      industrySectorMappings,
      regularHeads,
      ratioHeads,
      dissectionGroups,
      terms,
      consolidationTypes,
      units,
    ] = await Promise.all([
      this.db.select().from(companiesTable).orderBy(asc(companiesTable.id)),
      this.db.select().from(sectorsTable).orderBy(asc(sectorsTable.id)),
      this.db.select().from(industriesTable).orderBy(asc(industriesTable.id)),
      this.db.select().from(industrySectorMappingTable),
      this.db.select().from(regularHeadsTable).orderBy(asc(regularHeadsTable.id)),
      this.db.select().from(ratioHeadsTable).orderBy(asc(ratioHeadsTable.id)),
      this.db
        .select()
        .from(dissectionGroupsTable)
        .orderBy(asc(dissectionGroupsTable.id)),
      this.db.select().from(termsTable).orderBy(asc(termsTable.id)),
      this.db
        .select()
        .from(consolidationTypesTable)
        .orderBy(asc(consolidationTypesTable.id)),
      this.db.select().from(unitsTable).orderBy(asc(unitsTable.id)),
    ]);

    return {
      companies,
      sectors,
      industries,
      industrySectorMappings,
      regularHeads: regularHeads.map((head) => ({ ...head, family: "regular" as const })),
      ratioHeads: ratioHeads.map((head) => ({ ...head, family: "ratio" as const })),
      dissectionGroups,
      terms,
      consolidationTypes,
      units,
    };
  }
}
