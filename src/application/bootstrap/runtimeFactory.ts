import { CompanyResolver } from "../services/companyResolver";
import { EntityExtractor } from "../services/entityExtractor";
import { HeadValidator } from "../services/headValidator";
import { MetadataCache } from "../services/metadataCache";
import { PeriodResolver } from "../services/periodResolver";
import { QueryBuilder } from "../services/queryBuilder";
import { QueryResolutionService } from "../services/queryResolutionService";
import {
  env,
  usesPostgres,
  warehouseFile,
  type AppEnv,
} from "../../shared/config/env";
import { createDb, type DbClients } from "../../infra/db/client";
import { PostgresMetadataSource } from "../../infra/db/metadataRepository";
import { PostgresQueryExecutor } from "../../infra/db/postgresQueryExecutor";
import { JsonMetadataSource } from "../../infra/files/jsonMetadataSource";
import { InMemoryWarehouse } from "../../infra/warehouse/inMemoryWarehouse";
import { SystemClock } from "../../infra/system/systemPorts";
import type {
  ClockPort,
  MetadataSourcePort,
  QueryExecutionPort,
} from "../../core/ports/outboundPorts";

const requireDb = (clients: DbClients | null): DbClients => {
  if (!clients) {
    throw new Error("Postgres adapters need POSTGRES_URL to be configured.");
  }
  return clients;
};

/**
 * Resolves the configured metadata adapter.
 */
const createMetadataSource = (
  appEnv: AppEnv,
  clients: DbClients | null,
): MetadataSourcePort =>
  appEnv.METADATA_SOURCE === "postgres"
    ? new PostgresMetadataSource(requireDb(clients).db)
    : new JsonMetadataSource(appEnv.METADATA_FILE);

/**
 * Resolves the configured warehouse adapter.
 */
const createExecutor = async (
  appEnv: AppEnv,
  clients: DbClients | null,
): Promise<QueryExecutionPort> =>
  appEnv.WAREHOUSE === "postgres"
    ? new PostgresQueryExecutor(requireDb(clients).sql)
    : InMemoryWarehouse.fromFile(warehouseFile(appEnv));

/**
 * Centralizes runtime wiring so every CLI command shares one composition root.
 */
export const createRuntime = async (
  appEnv: AppEnv = env,
  clock: ClockPort = new SystemClock(),
) => {
  const clients = usesPostgres(appEnv)
    ? createDb(appEnv.POSTGRES_URL, appEnv.POSTGRES_MAX_CONNECTIONS)
    : null;

  const close = async (): Promise<void> => {
    await clients?.sql.end();
  };

  try {
    const cache = new MetadataCache(createMetadataSource(appEnv, clients), clock);
    const executor = await createExecutor(appEnv, clients);

    const queryBuilder = new QueryBuilder();
    const companyResolver = new CompanyResolver({
      matchThreshold: appEnv.COMPANY_MATCH_THRESHOLD,
      suggestionLimit: appEnv.COMPANY_SUGGESTION_LIMIT,
    });
    const periodResolver = new PeriodResolver(clock, executor, queryBuilder);
    const headValidator = new HeadValidator(
      executor,
      queryBuilder,
      periodResolver,
      appEnv.COMPANY_SUGGESTION_LIMIT,
    );
    const extractor = new EntityExtractor({
      confidenceThreshold: appEnv.EXTRACTOR_CONFIDENCE_THRESHOLD,
    });

    const resolver = new QueryResolutionService(
      cache,
      extractor,
      companyResolver,
      periodResolver,
      headValidator,
      queryBuilder,
      executor,
      clock,
      {
        timeoutMs: appEnv.RESOLUTION_TIMEOUT_MS,
        defaultConsolidation: appEnv.DEFAULT_CONSOLIDATION,
      },
    );

    await cache.refresh();

    return { cache, companyResolver, periodResolver, resolver, close };
  } catch (error) {
    await close();
    throw error;
  }
};

export type Runtime = Awaited<ReturnType<typeof createRuntime>>;
