import { describe, expect, it } from "vitest";
import { MetadataLoadError } from "../../core/entities/appError";
import type { MetadataTables } from "../../core/entities/metadata";
import type { MetadataSourcePort } from "../../core/ports/outboundPorts";
import { toMetadataTables } from "../../infra/files/jsonMetadataSource";
import {
  fixedClock,
  loadSampleWarehouse,
  sampleSnapshot,
} from "../../__tests__/support/sampleWarehouse";
import { MetadataCache } from "./metadataCache";

const clock = fixedClock("2024-05-15T08:30:00.000Z");

const sampleTables = async (): Promise<MetadataTables> =>
  toMetadataTables(await loadSampleWarehouse());

describe("MetadataCache", () => {
  it("activates a snapshot stamped with the clock time", async () => {
    const tables = await sampleTables();
    const source: MetadataSourcePort = { loadTables: async () => tables };
    const cache = new MetadataCache(source, clock);

    const snapshot = await cache.refresh();

    expect(cache.current()).toBe(snapshot);
    expect(snapshot.loadedAt.toISOString()).toBe("2024-05-15T08:30:00.000Z");
    expect(snapshot.companies).toHaveLength(5);
  });

  it("rejects reads before the first load", () => {
    const cache = new MetadataCache({ loadTables: async () => sampleTables() }, clock);

    expect(() => cache.current()).toThrow(MetadataLoadError);
  });

  it("wraps source failures in MetadataLoadError", async () => {
    const cause = new Error("connection refused");
    const cache = new MetadataCache(
      {
        loadTables: async () => {
          throw cause;
        },
      },
      clock,
    );

    const failure = await cache.refresh().catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(MetadataLoadError);
    expect(failure instanceof MetadataLoadError ? failure.cause : undefined).toBe(cause);
  });

  it("refuses tables without terms", async () => {
    const tables = await sampleTables();
    const cache = new MetadataCache(
      { loadTables: async () => ({ ...tables, terms: [] }) },
      clock,
    );

    await expect(cache.refresh()).rejects.toThrow(
      "Metadata tables must not be empty: terms.",
    );
  });

  it("keeps the previous snapshot when a refresh fails", async () => {
    const tables = await sampleTables();
    let calls = 0;
    const cache = new MetadataCache(
      {
        loadTables: async () => {
          calls += 1;
          if (calls > 1) {
            throw new Error("warehouse offline");
          }
          return tables;
        },
      },
      clock,
    );

    const first = await cache.refresh();
    await expect(cache.refresh()).rejects.toBeInstanceOf(MetadataLoadError);

    expect(cache.current()).toBe(first);
  });

  it("shares one load between concurrent refreshes", async () => {
    const tables = await sampleTables();
    let calls = 0;
    const cache = new MetadataCache(
      {
        loadTables: async () => {
          calls += 1;
          return tables;
        },
      },
      clock,
    );

    const [left, right] = await Promise.all([cache.refresh(), cache.refresh()]);

    expect(calls).toBe(1);
    expect(left).toBe(right);
  });
});

describe("MetadataSnapshot", () => {
  it("indexes tickers, term labels and consolidation labels case-insensitively", async () => {
    const snapshot = await sampleSnapshot();

    expect(snapshot.companyByTicker(" ubl ")?.name).toBe("United Bank Limited");
    expect(snapshot.termByLabel("q2")?.id).toBe(6);
    expect(snapshot.consolidationByLabel("UNCONSOLIDATED")?.id).toBe(2);
    expect(snapshot.consolidationById(1)?.label).toBe("Consolidated");
    expect(snapshot.headById("ratio", 12)?.name).toBe("Net Interest Margin");
    expect(snapshot.headById("regular", 12)?.name).toBe("Profit After Tax");
  });

  it("checks head industries against the company sector mapping", async () => {
    const snapshot = await sampleSnapshot();
    const operatingDa = snapshot.headById("regular", 89);
    const totalAssets = snapshot.headById("regular", 10);
    const ubl = snapshot.companyByTicker("UBL");
    const luck = snapshot.companyByTicker("LUCK");
    const orphan = snapshot.companyByTicker("ORPH");
    if (!operatingDa || !totalAssets || !ubl || !luck || !orphan) {
      throw new Error("sample metadata is incomplete");
    }

    expect(snapshot.isHeadValidForCompany(operatingDa, ubl)).toBe(true);
    expect(snapshot.isHeadValidForCompany(operatingDa, luck)).toBe(false);
    expect(snapshot.isHeadValidForCompany(totalAssets, luck)).toBe(true);
    expect(snapshot.isHeadValidForCompany(totalAssets, orphan)).toBeNull();
  });

  it("freezes its tables", async () => {
    const snapshot = await sampleSnapshot();

    expect(Object.isFrozen(snapshot.companies)).toBe(true);
    expect(Object.isFrozen(snapshot.companies[0])).toBe(true);
  });
});
