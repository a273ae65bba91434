// cdk/lambda/logger.ts
import pino, { stdTimeFunctions } from "pino";
import type { Logger, LoggerOptions } from "pino";

export type { Logger };

export const loggerOptions = (level: string, environment: string): LoggerOptions => ({
  level,
  base: { environment },
  timestamp: stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
});

export function createLogger(level: string, environment: string): Logger {
  return pino(loggerOptions(level, environment));
}

/** Logger for tests and callers that do not care about output. */
export const silentLogger: Logger = pino({ level: "silent" });
