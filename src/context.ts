import type { Env } from "./config/env.js";
import { createDatabasePool, poolClient } from "./services/database.js";
import { createMealDbClient, type MealDbClient } from "./services/mealDb.js";
import { PostgresMealStore, type MealStore } from "./services/mealStore.js";
import { errorMessage } from "./middleware/error.js";
import type { Logger } from "./utils/logger.js";

/**
 * Everything a request handler needs. Built once at startup and handed to
 * the app factory; `store` is null when no datastore is configured or the
 * first connection failed.
 */
export type AppContext = {
  env: Env;
  logger: Logger;
  mealDb: MealDbClient;
  store: MealStore | null;
  close(): Promise<void>;
};

export async function createAppContext(env: Env, logger: Logger): Promise<AppContext> {
  const mealDb = createMealDbClient({
    apiURL: env.MEALDB_API_URL,
    timeoutMs: env.MEALDB_TIMEOUT_MS
  });

  const base = { env, logger, mealDb };

  if (!env.SUPABASE_DB_URL) {
    logger.error({ msg: "No database URL found, datastore features are disabled" });
    return { ...base, store: null, close: async () => {} };
  }

  logger.info({ msg: "Connecting to database" });
  const pool = createDatabasePool({
    connectionString: env.SUPABASE_DB_URL,
    min: env.DB_POOL_MIN,
    max: env.DB_POOL_MAX,
    ssl: env.DB_SSL
  });
  pool.on("error", (err) => {
    logger.error({ msg: "Idle database client error", error: err.message });
  });

  const store = new PostgresMealStore(poolClient(pool));
  try {
    await store.ping();
    logger.info({ msg: "Database connection successful" });
  } catch (error) {
    logger.error({ msg: "Database connection failed", error: errorMessage(error) });
    await pool.end();
    return { ...base, store: null, close: async () => {} };
  }

  return {
    ...base,
    store,
    close: async () => {
      await pool.end();
      logger.info({ msg: "Database pool closed" });
    }
  };
}
