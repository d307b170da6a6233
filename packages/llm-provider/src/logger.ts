import { pino, type Logger } from "pino";
import type { LoggerConfig } from "./config.js";

export type { Logger };

export function createLogger(config: LoggerConfig, bindings?: Record<string, unknown>): Logger {
  const baseLogger = pino({
    level: config.LOG_LEVEL,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(config.NODE_ENV === "development" && {
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      },
    }),
  });

  if (bindings) {
    return baseLogger.child(bindings);
  }

  return baseLogger;
}
