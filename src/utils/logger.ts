import { createLogger, format, transports } from "winston";

const isTest = process.env.NODE_ENV === "test";

// Configure Winston logger
const logger = createLogger({
  level: process.env.LOG_LEVEL || "info",
  silent: process.env.LOG_SILENT === "true",
  format: format.combine(
    format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    format.errors({ stack: true }),
    format.splat(),
    format.json(),
  ),
  defaultMeta: { service: "resume-tailor" },
  transports: isTest
    ? []
    : [
        new transports.File({ filename: "logs/error.log", level: "error" }),
        new transports.File({ filename: "logs/combined.log" }),
      ],
});

// Console logging for non-production
if (process.env.NODE_ENV !== "PRODUCTION") {
  logger.add(
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.printf(({ level, message, timestamp, service, ...metadata }) => {
          let msg = `${timestamp} [${level}] ${service}: ${message}`;
          if (Object.keys(metadata).length > 0) {
            msg += ` ${JSON.stringify(metadata)}`;
          }
          return msg;
        }),
      ),
    }),
  );
}

/**
 * Reduces an unknown thrown value to something a log line can carry.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export default logger;
