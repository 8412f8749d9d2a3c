import { createLogger as createWinstonLogger, format, transports, type Logger } from "winston";

function resolveLogLevel(): string {
  if (process.env.LOG_LEVEL) {
    return process.env.LOG_LEVEL;
  }
  if (process.env.NODE_ENV === "test") {
    return "error";
  }
  return "warn";
}

const rootLogger = createWinstonLogger({
  level: resolveLogLevel(),
  format: format.combine(
    format.timestamp(),
    format.printf(({ level, message, timestamp, service, ...metadata }) => {
      const scope = typeof service === "string" ? ` [${service}]` : "";
      const details = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : "";
      return `${String(timestamp)} [${level}]${scope} ${String(message)}${details}`;
    })
  ),
  transports: [
    new transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug", "silly"],
    }),
  ],
});

export function createLogger(service: string): Logger {
  return rootLogger.child({ service });
}
