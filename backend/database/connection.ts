import { Pool, type PoolConfig, type QueryResult, type QueryResultRow } from "pg";
import type { DatabaseConfig } from "../config/AppConfig";

// Cost Navigator: Database Connection Manager
// Single pool instance shared across the application. Read-only workload.

let pool: Pool | undefined;
let databaseConfig: DatabaseConfig | undefined;

const SLOW_QUERY_MS = 1000;

export function configureDatabase(config: DatabaseConfig): void {
  if (pool) throw new Error("Database pool already created; configure before first query.");
  databaseConfig = config;
}

export function getDatabasePool(): Pool {
  if (!pool) {
    if (!databaseConfig) throw new Error("Database is not configured. Set DATABASE_URL.");

    const config: PoolConfig = {
      connectionString: databaseConfig.connectionString,
      max: databaseConfig.poolMax,
      idleTimeoutMillis: databaseConfig.idleTimeoutMillis,
      connectionTimeoutMillis: databaseConfig.connectionTimeoutMillis,
      ssl: databaseConfig.ssl === false ? false : { rejectUnauthorized: databaseConfig.ssl.rejectUnauthorized },
      application_name: "cost_navigator",
    };

    pool = new Pool(config);

    pool.on("error", (err: Error) => {
      console.error("[CostNavigator DB] Unexpected error on idle client:", err.message);
    });

    console.log("[CostNavigator DB] Connection pool created");
  }
  return pool;
}

export type QueryFn = <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
) => Promise<QueryResult<T>>;

export const query: QueryFn = async <T extends QueryResultRow = QueryResultRow>(
  text: string,
  params?: unknown[],
): Promise<QueryResult<T>> => {
  const p = getDatabasePool();
  const start = Date.now();
  const result = await p.query<T>(text, params);
  const duration = Date.now() - start;

  if (duration > SLOW_QUERY_MS) {
    console.warn(`[CostNavigator DB] Slow query (${duration}ms):`, text.substring(0, 100));
  }

  return result;
};

export async function closeDatabasePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = undefined;
    console.log("[CostNavigator DB] Connection pool closed");
  }
}
