import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().min(1).max(65535).default(8000),

  // Datastore
  SUPABASE_DB_URL: z.string().min(1).optional(),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(1),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_SSL: z.string().transform((val) => val !== "false").default("true"),

  // TheMealDB
  MEALDB_API_URL: z.string().url().default("https://www.themealdb.com/api/json/v1/1/search.php"),
  MEALDB_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),

  // CORS
  CORS_ORIGIN: z.string().default("*"),

  // Logging
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error", "silent"]).default("info"),
  LOG_PRETTY: z.string().transform((val) => val === "true").default("false"),
});

export type Env = z.infer<typeof envSchema>;

let env: Env | undefined;

export function getEnv(): Env {
  if (env) {
    return env;
  }

  env = parseEnv(process.env);
  return env;
}

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error("Invalid environment variables:");
    console.error(result.error.flatten().fieldErrors);
    throw new Error("Invalid environment configuration");
  }

  return result.data;
}

export function initEnv(): Env {
  const e = getEnv();

  if (e.NODE_ENV === "development") {
    console.log("Running in development mode");
    console.log("Port:", e.PORT);
  }

  return e;
}
