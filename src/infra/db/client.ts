import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export type DbClients = ReturnType<typeof createDb>;

/**
 * Builds the typed ORM for lookup tables and the raw client for lowered warehouse queries.
 */
export const createDb = (connectionString: string, maxConnections = 5) => {
  const sql = postgres(connectionString, { max: maxConnections });
  const db = drizzle(sql);
  return { db, sql };
};
