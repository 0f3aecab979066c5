import pino, { type Logger } from "pino";
import { loadConfig } from "./config";

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    const config = loadConfig();
    const options: pino.LoggerOptions = {
      level: config.logLevel,
      base: { service: "act-compare-api" },
      timestamp: pino.stdTimeFunctions.isoTime
    };
    rootLogger = config.logPretty
      ? pino({
          ...options,
          transport: {
            target: "pino-pretty",
            options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" }
          }
        })
      : pino(options);
  }
  return rootLogger;
}

/**
 * Module-scoped logger.
 *
 * @example
 * const log = createLogger("exportJob");
 * log.info({ compareId, format }, "export written");
 */
export function createLogger(moduleName?: string): Logger {
  const root = getRootLogger();
  return moduleName ? root.child({ module: moduleName }) : root;
}
