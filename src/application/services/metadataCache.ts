import { MetadataLoadError } from "../../core/entities/appError";
import type { MetadataTables } from "../../core/entities/metadata";
import type {
  ClockPort,
  MetadataSourcePort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";
import { MetadataSnapshot } from "./metadataSnapshot";

const REQUIRED_NON_EMPTY = [
  "companies",
  "terms",
  "consolidationTypes",
] as const satisfies ReadonlyArray<keyof MetadataTables>;

/**
 * Read side of the cache that resolution services depend on.
 */
export interface MetadataSnapshotProvider {
  current(): MetadataSnapshot;
}

/**
 * Holds the active metadata snapshot and replaces it wholesale on refresh.
 */
export class MetadataCache implements MetadataSnapshotProvider {
  private snapshot: MetadataSnapshot | null = null;
  private inFlight: Promise<MetadataSnapshot> | null = null;

  constructor(
    private readonly source: MetadataSourcePort,
    private readonly clock: ClockPort,
  ) {}

  /**
   * Reads every lookup table and builds a snapshot without activating it.
   */
  async load(): Promise<MetadataSnapshot> {
    let tables: MetadataTables;
    try {
      tables = await this.source.loadTables();
    } catch (error) {
      if (error instanceof MetadataLoadError) {
        throw error;
      }
      throw new MetadataLoadError("Failed to read metadata tables.", error);
    }

    const empty = REQUIRED_NON_EMPTY.filter((name) => tables[name].length === 0);
    if (empty.length > 0) {
      throw new MetadataLoadError(
        `Metadata tables must not be empty: ${empty.join(", ")}.`,
      );
    }

    return new MetadataSnapshot(tables, this.clock.now());
  }

  /**
   * Loads and activates a new snapshot. Concurrent callers share one load.
   */
  refresh(): Promise<MetadataSnapshot> {
    if (this.inFlight) {
      return this.inFlight;
    }

    const pending = this.load()
      .then((snapshot) => {
        this.snapshot = snapshot;
        logger.info(
          {
            companies: snapshot.companies.length,
            regularHeads: snapshot.regularHeads.length,
            ratioHeads: snapshot.ratioHeads.length,
            terms: snapshot.terms.length,
          },
          "Metadata snapshot activated",
        );
        return snapshot;
      })
      .finally(() => {
        this.inFlight = null;
      });

    this.inFlight = pending;
    return pending;
  }

  current(): MetadataSnapshot {
    if (!this.snapshot) {
      throw new MetadataLoadError("Metadata has not been loaded yet.");
    }
    return this.snapshot;
  }
}
