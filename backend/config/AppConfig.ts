import { z } from "zod";

// Cost Navigator: Runtime Configuration
//
// process.env is loaded by dotenv in server.ts before this runs.
// Every setting has a development default; only the LLM and database
// integrations are optional.

const DEFAULT_ORIGINS = [
  "http://localhost:3000",
  "http://localhost:3001",
  "http://localhost:5500",
  "http://127.0.0.1:5500",
];

const intFromEnv = (fallback: number) =>
  z.preprocess(
    (v) => (v === undefined || v === "" ? fallback : Number(v)),
    z.number().int().nonnegative(),
  );

const optionalString = z.preprocess(
  (v) => (typeof v === "string" && v.trim() ? v.trim() : undefined),
  z.string().optional(),
);

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: intFromEnv(3001),
  CORS_ORIGINS: optionalString,

  DATABASE_URL: optionalString,
  DB_POOL_MAX: intFromEnv(20),
  DB_IDLE_TIMEOUT: intFromEnv(30_000),
  DB_CONNECT_TIMEOUT: intFromEnv(5_000),
  DB_SSL: z.enum(["true", "false"]).default("true"),
  DB_SSL_REJECT_UNAUTHORIZED: z.enum(["true", "false"]).default("true"),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().min(1).default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: intFromEnv(30_000),

  DATA_DIR: optionalString,
});

export interface DatabaseConfig {
  readonly connectionString: string;
  readonly poolMax: number;
  readonly idleTimeoutMillis: number;
  readonly connectionTimeoutMillis: number;
  readonly ssl: false | { readonly rejectUnauthorized: boolean };
}

export interface AppConfig {
  readonly env: string;
  readonly port: number;
  readonly corsOrigins: readonly string[];
  readonly database?: DatabaseConfig;
  readonly llm: {
    readonly apiKey?: string;
    readonly model: string;
    readonly timeoutMs: number;
  };
  readonly dataDir?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment configuration. ${detail}`);
  }
  const e = parsed.data;

  const corsOrigins = e.CORS_ORIGINS
    ? e.CORS_ORIGINS.split(",").map((s) => s.trim()).filter(Boolean)
    : DEFAULT_ORIGINS;

  return {
    env: e.NODE_ENV,
    port: e.PORT,
    corsOrigins,
    database: e.DATABASE_URL
      ? {
          connectionString: e.DATABASE_URL,
          poolMax: e.DB_POOL_MAX,
          idleTimeoutMillis: e.DB_IDLE_TIMEOUT,
          connectionTimeoutMillis: e.DB_CONNECT_TIMEOUT,
          ssl: e.DB_SSL === "false" ? false : { rejectUnauthorized: e.DB_SSL_REJECT_UNAUTHORIZED !== "false" },
        }
      : undefined,
    llm: {
      apiKey: e.OPENAI_API_KEY,
      model: e.OPENAI_MODEL,
      timeoutMs: e.LLM_TIMEOUT_MS,
    },
    dataDir: e.DATA_DIR,
  };
}
