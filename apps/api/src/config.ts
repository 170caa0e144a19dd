import { z } from "zod";

/** Unset and empty variables both fall back to the default. */
const blankAsUndefined = (value: unknown) => (value === "" ? undefined : value);

const envSchema = z.object({
  PORT: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(3001)),
  HOST: z.preprocess(blankAsUndefined, z.string().default("0.0.0.0")),
  LOG_LEVEL: z.preprocess(
    blankAsUndefined,
    z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  ),
  DATABASE_URL: z.preprocess(blankAsUndefined, z.string().url().optional()),
  ANTHROPIC_API_KEY: z.preprocess(blankAsUndefined, z.string().optional()),
  DECISION_MODEL: z.preprocess(blankAsUndefined, z.string().default("claude-3-5-haiku-latest")),
  DECISION_TIMEOUT_MS: z.preprocess(blankAsUndefined, z.coerce.number().int().positive().default(5000)),
  CORS_ORIGINS: z.preprocess(blankAsUndefined, z.string().optional()),
});

export interface AppConfig {
  port: number;
  host: string;
  logLevel: string;
  databaseUrl: string | undefined;
  anthropicApiKey: string | undefined;
  decisionModel: string;
  decisionTimeoutMs: number;
  corsOrigins: string[];
}

/** Parse configuration from the environment. Throws listing every invalid variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid environment configuration: ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    logLevel: vars.LOG_LEVEL,
    databaseUrl: vars.DATABASE_URL,
    anthropicApiKey: vars.ANTHROPIC_API_KEY,
    decisionModel: vars.DECISION_MODEL,
    decisionTimeoutMs: vars.DECISION_TIMEOUT_MS,
    corsOrigins: (vars.CORS_ORIGINS ?? "")
      .split(",")
      .map((origin) => origin.trim())
      .filter((origin) => origin.length > 0),
  };
}
