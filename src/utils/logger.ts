import winston from "winston";
import { LogLevel } from "../config";

const { combine, timestamp, printf, colorize } = winston.format;

const logFormat = printf(
  ({ level, message, timestamp: ts, module: mod, ...meta }) => {
    const moduleTag = mod ? `[${mod}]` : "";
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${ts} ${level} ${moduleTag} ${message}${metaStr}`;
  },
);

// Everything goes to stderr; stdout stays free for command output.
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL ?? "info",
  format: combine(timestamp({ format: "HH:mm:ss.SSS" }), logFormat),
  transports: [
    new winston.transports.Console({
      stderrLevels: ["error", "warn", "info", "http", "verbose", "debug"],
      format: combine(
        colorize(),
        timestamp({ format: "HH:mm:ss.SSS" }),
        logFormat,
      ),
    }),
  ],
});

export function createModuleLogger(moduleName: string): winston.Logger {
  return logger.child({ module: moduleName });
}

export function configureLogger(options: {
  level?: LogLevel;
  quiet?: boolean;
}): void {
  if (options.level) {
    logger.level = options.level;
  }
  logger.silent = options.quiet === true;
}
