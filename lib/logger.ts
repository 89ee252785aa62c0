import pino from "pino";

import { formatEnvIssues, formBindEnvSchema } from "./env.schema";

export type Logger = pino.Logger;

const loggerCache = new Map<string, Logger>();

let rootLogger: Logger | undefined;

// Logging is created while modules load, so a bad variable must not throw
function createRootLogger(): Logger {
  const parsed = formBindEnvSchema.safeParse(process.env);
  const env = parsed.success
    ? parsed.data
    : formBindEnvSchema.parse({});

  const logger = pino({
    base: {
      environment: env.NODE_ENV,
      service: env.FORMBIND_SERVICE_NAME,
    },
    level: env.FORMBIND_LOG_LEVEL,
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  if (!parsed.success) {
    logger.warn(
      { issues: formatEnvIssues(parsed.error.issues) },
      "invalid environment, using defaults",
    );
  }

  return logger;
}

/**
 * Returns the logger for a category, creating it as a child of the root
 * logger on first use.
 */
export function getLogger(category: string): Logger {
  const cached = loggerCache.get(category);
  if (cached) {
    return cached;
  }

  rootLogger ??= createRootLogger();
  const logger = rootLogger.child({ category });
  loggerCache.set(category, logger);
  return logger;
}
