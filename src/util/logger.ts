import pino, { Logger, LoggerOptions } from "pino";
import { getStage, getString, isProduction, isTest } from "./env";

/**
 * Centralized structured logger for the HTTP server and the CLI.
 * - Local/dev: pretty-printed logs for readability
 * - Production: JSON lines
 * Every log line goes to stderr; stdout belongs to the CLI's JSON output.
 */
const STDERR = 2;

function resolveLevel(): string {
  const configured = getString("LOG_LEVEL");
  if (configured) return configured;
  if (isTest()) return "silent";
  return isProduction() ? "info" : "debug";
}

const baseOptions: LoggerOptions = {
  level: resolveLevel(),
  base: {
    service: "subscription-reporter",
    stage: getStage(),
  },
  redact: {
    // Remove sensitive fields from logs
    paths: [
      "*.password",
      "*.secret",
      "*.token",
      "headers.authorization",
    ],
    remove: true,
  },
  messageKey: "message",
  timestamp: pino.stdTimeFunctions.isoTime,
};

function createRootLogger(): Logger {
  const pretty = !isProduction() && !isTest() && process.stderr.isTTY;
  if (pretty) {
    return pino({
      ...baseOptions,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          singleLine: false,
          ignore: "pid,hostname",
          messageKey: "message",
          destination: STDERR,
        },
      },
    });
  }
  return pino(baseOptions, pino.destination(STDERR));
}

const rootLogger: Logger = createRootLogger();

/**
 * Returns a child logger with module-scoped bindings.
 */
export function getLogger(moduleName?: string): Logger {
  if (!moduleName) return rootLogger;
  return rootLogger.child({ module: moduleName });
}

export type { Logger };

export default rootLogger;
