import pino from "pino";
import type { Logger } from "pino";
import { loadConfigWithFallbacks, type AppConfig } from "./config";

export type { Logger };

export function createLogger(config: AppConfig = loadConfigWithFallbacks()): Logger {
  return pino({
    level: config.logLevel,
    base: {
      env: config.environment,
      service: config.serviceName,
    },
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

// Built at import time from settings that fall back to defaults.
export const logger = createLogger();

export function createChildLogger(bindings: Record<string, unknown>): Logger {
  return logger.child(bindings);
}
