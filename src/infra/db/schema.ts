import { integer, pgTable, primaryKey, text } from "drizzle-orm/pg-core";

export const companiesTable = pgTable("companies", {
  id: integer("id").primaryKey(),
  name: text("name").notNull(),
  ticker: text("ticker").notNull(),
  sectorId: integer("sector_id"),
  industryId: integer("industry_id"),
  fiscalYearEndMonth: integer("fiscal_year_end_month").notNull().default(12),
});

export const sectorsTable = pgTable("sectors", {
  id: integer("id").primaryKey(),
  name: text("name").notNull(),
});

export const industriesTable = pgTable("industries", {
  id: integer("id").primaryKey(),
  name: text("name").notNull(),
});

export const industrySectorMappingTable = pgTable(
  "industry_sector_mapping",
  {
    industryId: integer("industry_id").notNull(),
    sectorId: integer("sector_id").notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.industryId, table.sectorId] }),
  }),
);

export const regularHeadsTable = pgTable("regular_heads", {
  id: integer("id").primaryKey(),
  name: text("name").notNull(),
  industryId: integer("industry_id").notNull(),
  unitId: integer("unit_id"),
});

export const ratioHeadsTable = pgTable("ratio_heads", {
  id: integer("id").primaryKey(),
  name: text("name").notNull(),
  industryId: integer("industry_id").notNull(),
  unitId: integer("unit_id"),
});

export const dissectionGroupsTable = pgTable("dissection_groups", {
  id: integer("id").primaryKey(),
  name: text("name").notNull(),
});

export const termsTable = pgTable("terms", {
  id: integer("id").primaryKey(),
  label: text("label").notNull(),
});

export const consolidationTypesTable = pgTable("consolidation_types", {
  id: integer("id").primaryKey(),
  label: text("label").notNull(),
});

export const unitsTable = pgTable("units", {
  id: integer("id").primaryKey(),
  name: text("name").notNull(),
});
