import { join } from "node:path";
import { createLogger, format, transports } from "winston";

const level = process.env.LOG_LEVEL ?? (process.env.DEBUG === "true" ? "debug" : "info");
const logDir = process.env.LOG_DIR;

const line = format.printf(({ timestamp, level, message, context, ...rest }) => {
  const prefix = typeof context === "string" ? `[${context}] ` : "";
  const meta = Object.keys(rest).length > 0 ? ` ${JSON.stringify(rest)}` : "";
  return `${String(timestamp)} ${level}: ${prefix}${String(message)}${meta}`;
});

export const logger = createLogger({
  level,
  format: format.combine(format.timestamp(), format.errors({ stack: true }), line),
  transports: [
    new transports.Console({
      format: format.combine(format.colorize(), format.timestamp(), line),
    }),
    ...(logDir
      ? [
          new transports.File({ filename: join(logDir, "error.log"), level: "error" }),
          new transports.File({ filename: join(logDir, "combined.log") }),
        ]
      : []),
  ],
});

export function debug(context: string, message: string, data?: Record<string, unknown>): void {
  logger.debug(message, { context, ...data });
}
