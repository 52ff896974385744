import { z } from "zod";

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;

export const ConfigSchema = z.object({
  environment: z.enum(["development", "test", "production"]),
  logLevel: z.enum(LOG_LEVELS),
  serviceName: z.string().min(1),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

type Env = Record<string, string | undefined>;

function readEnvironment(env: Env): string {
  const value = env.NODE_ENV?.trim().toLowerCase();
  return value ? value : "development";
}

function readValues(env: Env) {
  const environment = readEnvironment(env);
  const defaultLevel = environment === "test" ? "silent" : "info";

  return {
    environment,
    logLevel: env.LOG_LEVEL?.trim().toLowerCase() || defaultLevel,
    serviceName: env.SERVICE_NAME?.trim() || "fort-entries",
  };
}

const FallbackConfigSchema = z.object({
  environment: ConfigSchema.shape.environment.catch("development"),
  logLevel: ConfigSchema.shape.logLevel.catch("info"),
  serviceName: ConfigSchema.shape.serviceName.catch("fort-entries"),
});

/**
 * Throws a `ZodError` when `NODE_ENV` or `LOG_LEVEL` holds an unknown value.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  return ConfigSchema.parse(readValues(env));
}

/**
 * Reads the same settings as `loadConfig`, replacing unknown values with
 * defaults. Never throws.
 */
export function loadConfigWithFallbacks(env: Env = process.env): AppConfig {
  return FallbackConfigSchema.parse(readValues(env));
}
